import * as fs from 'fs-extra';
import * as path from 'path';
import { logger } from '../utils/logger';

const TEMP_FILE_MAX_AGE_MS = 60 * 60 * 1000; // 1 hour
const TEMP_FILE_PATTERN = /\.tmp\.\d+\.\d+$/; // Matches .tmp.{pid}.{timestamp}

export type JsonGuard<T> = (data: unknown) => data is T;

function parseJson<T>(content: string, isValid: JsonGuard<T>): T {
  const data: unknown = JSON.parse(content);
  if (!isValid(data)) {
    throw new Error('Schema validation failed');
  }
  return data;
}

/**
 * Reads a JSON file safely. SYNC version.
 * A missing or empty file yields defaultValue; an unparsable or invalid one is
 * backed up and also yields defaultValue.
 */
export function readJsonSafe<T>(filePath: string, defaultValue: T, isValid: JsonGuard<T>): T {
  try {
    if (!fs.existsSync(filePath)) {
      return defaultValue;
    }

    const content = fs.readFileSync(filePath, 'utf-8');
    if (!content.trim()) {
      return defaultValue;
    }

    return parseJson(content, isValid);
  } catch (error) {
    logger.warn(`Failed to read JSON at ${filePath}: ${error}. Backing up and returning default.`);
    backupCorruptFileSync(filePath);
    return defaultValue;
  }
}

/**
 * Reads a JSON file safely. ASYNC version.
 */
export async function readJsonSafeAsync<T>(
  filePath: string,
  defaultValue: T,
  isValid: JsonGuard<T>
): Promise<T> {
  try {
    if (!(await fs.pathExists(filePath))) {
      return defaultValue;
    }

    const content = await fs.readFile(filePath, 'utf-8');
    if (!content.trim()) {
      return defaultValue;
    }

    return parseJson(content, isValid);
  } catch (error) {
    logger.warn(`Failed to read JSON async at ${filePath}: ${error}. Backing up and returning default.`);
    backupCorruptFileSync(filePath);
    return defaultValue;
  }
}

/**
 * Writes JSON to a file atomically.
 * 1) Write to temp file
 * 2) fsync (best effort)
 * 3) Rename to target
 */
export async function writeJsonAtomic<T>(filePath: string, data: T): Promise<void> {
  const dir = path.dirname(filePath);
  await fs.ensureDir(dir);

  const tempPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;

  try {
    const content = JSON.stringify(data, null, 2);
    await fs.writeFile(tempPath, content, 'utf-8');

    const fd = await fs.open(tempPath, 'r+');
    try {
      await fs.fsync(fd);
    } finally {
      await fs.close(fd);
    }

    await fs.rename(tempPath, filePath);
  } catch (error) {
    logger.error(`Failed to write JSON atomically to ${filePath}: ${error}`);
    if (await fs.pathExists(tempPath)) {
      await fs.remove(tempPath).catch((cleanupError: unknown) => {
        logger.debug(`Could not remove temp file ${tempPath}: ${cleanupError}`);
      });
    }
    throw error;
  }
}

function backupCorruptFileSync(filePath: string): void {
  try {
    if (fs.existsSync(filePath)) {
      const backupPath = `${filePath}.corrupt.${Date.now()}`;
      fs.copySync(filePath, backupPath);
      logger.info(`Corrupt file backed up to ${backupPath}`);
    }
  } catch (backupError) {
    logger.error(`Failed to backup corrupt file ${filePath}: ${backupError}`);
  }
}

/**
 * Removes temp files left behind by interrupted atomic writes.
 * Called on server startup for the data and cache directories.
 *
 * @returns Number of files cleaned up
 */
export async function cleanupOrphanedTempFiles(
  directory: string,
  maxAgeMs: number = TEMP_FILE_MAX_AGE_MS
): Promise<number> {
  let cleanedCount = 0;
  const now = Date.now();

  try {
    if (!(await fs.pathExists(directory))) {
      return 0;
    }

    const entries = await fs.readdir(directory, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(directory, entry.name);

      if (entry.isDirectory()) {
        cleanedCount += await cleanupOrphanedTempFiles(fullPath, maxAgeMs);
      } else if (entry.isFile() && TEMP_FILE_PATTERN.test(entry.name)) {
        try {
          const stat = await fs.stat(fullPath);
          const fileAge = now - stat.mtimeMs;

          if (fileAge > maxAgeMs) {
            await fs.remove(fullPath);
            cleanedCount++;
            logger.debug(`Cleaned up orphaned temp file: ${fullPath} (age: ${Math.round(fileAge / 1000)}s)`);
          }
        } catch (statError) {
          // Removed by another process in the meantime
          logger.debug(`Could not stat temp file ${fullPath}: ${statError}`);
        }
      }
    }
  } catch (error) {
    logger.warn(`Error during orphaned temp file cleanup in ${directory}: ${error}`);
  }

  return cleanedCount;
}
