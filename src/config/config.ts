import * as fs from 'fs-extra';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errorHandler';
import { logger } from '../utils/logger';
import { PositionScores, ScoreTable, toPositionScores, toScoreTable } from '../scoring/scoreTable';

dotenv.config();

export interface ScoringConfig {
  width: ScoreTable;
  position: PositionScores;
  ratio: ScoreTable;
}

/**
 * Blacklist sources stay loosely typed until the blacklist is built:
 * an unknown kind must surface there rather than at startup.
 */
export interface BlacklistSourceConfig {
  kind: string;
  [key: string]: unknown;
}

export interface PageImagesConfig {
  namespaces: number[];
  scores: ScoringConfig;
  blacklist: BlacklistSourceConfig[];
  blacklistExpiry: number; // seconds
  thumbLimits: number[];
  defaultThumbSizeIndex: number;
  fileExtensions: string[];
  expandOpenSearch: boolean;
}

export interface StorageConfig {
  dataDir: string;
  cacheDir: string;
  pagesFile: string;
  filesFile: string;
  pagePropsFile: string;
}

export interface FilesConfig {
  baseUrl: string;
  thumbBaseUrl: string;
}

export interface ServerConfig {
  port: number;
}

export interface Config {
  pageImages: PageImagesConfig;
  storage: StorageConfig;
  files: FilesConfig;
  server: ServerConfig;
}

export const DEFAULT_SCORES = {
  // Very small images are usually from maintenance or stub templates;
  // very wide ones tend to be panoramas.
  width: { 119: -100, 400: 10, 600: 5, 601: 0 },
  position: [8, 6, 4, 3],
  ratio: { 3: -100, 5: 0, 20: 5, 30: 0, 31: -100 },
};

const DEFAULT_FILE_BASE_URL = '/images';

export const DEFAULT_FILE_EXTENSIONS = ['png', 'gif', 'jpg', 'jpeg', 'webp', 'svg'];

// Environment variables that are optional (won't crash if missing)
const OPTIONAL_ENV_VARS = new Set([
  'PAGE_IMAGES_FILE_BASE_URL',
  'PAGE_IMAGES_THUMB_BASE_URL',
]);

const scoreMapSchema = z.record(z.string(), z.number());

const rawConfigSchema = z.object({
  pageImages: z.object({
    namespaces: z.array(z.number().int()).default([0]),
    scores: z.object({
      width: scoreMapSchema.optional(),
      position: z.union([z.array(z.number()), scoreMapSchema]).optional(),
      ratio: scoreMapSchema.optional(),
    }).default({}),
    blacklist: z.array(z.object({}).passthrough()).default([]),
    blacklistExpiry: z.number().int().positive().default(15 * 60),
    thumbLimits: z.array(z.number().int().positive()).nonempty().default([120, 150, 180, 200, 250, 300]),
    defaultThumbSizeIndex: z.number().int().nonnegative().default(4),
    fileExtensions: z.array(z.string().min(1)).default(DEFAULT_FILE_EXTENSIONS),
    expandOpenSearch: z.boolean().default(false),
  }).default({}),
  storage: z.object({
    dataDir: z.string().default('data'),
    cacheDir: z.string().optional(),
    pagesFile: z.string().default('pages.json'),
    filesFile: z.string().default('files.json'),
    pagePropsFile: z.string().default('page_props.json'),
  }).default({}),
  files: z.object({
    baseUrl: z.string().default(DEFAULT_FILE_BASE_URL),
    thumbBaseUrl: z.string().optional(),
  }).default({}),
  server: z.object({
    port: z.number().int().positive().default(3000),
  }).default({}),
});

type RawConfig = z.infer<typeof rawConfigSchema>;

function resolveEnvValue(value: string): string {
  if (value.startsWith('env:')) {
    const envKey = value.substring(4);
    const envValue = process.env[envKey];

    if (envValue === undefined || envValue === '') {
      if (!OPTIONAL_ENV_VARS.has(envKey)) {
        throw new ConfigurationError(`Environment variable ${envKey} is not set`);
      }
      return '';
    }
    return envValue;
  }
  return value;
}

function resolveEnvObject(value: unknown): unknown {
  if (typeof value === 'string') {
    return resolveEnvValue(value);
  }
  if (Array.isArray(value)) {
    return value.map(item => resolveEnvObject(item));
  }
  if (value && typeof value === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      resolved[key] = resolveEnvObject(item);
    }
    return resolved;
  }
  return value;
}

/**
 * Older deployments describe blacklist sources as { type: 'db', db, page } and
 * { type: 'url', url }; those keys are mapped onto the current shape.
 */
function normalizeBlacklistSource(source: Record<string, unknown>): BlacklistSourceConfig {
  const { type, db, page, ...rest } = source;
  const rawKind = rest.kind ?? type;
  const kind = rawKind === 'db' ? 'internal' : rawKind === 'url' ? 'remote' : String(rawKind ?? '');
  const normalized: BlacklistSourceConfig = { ...rest, kind };
  if (normalized.databaseRef === undefined && typeof db === 'string' && db !== '') {
    normalized.databaseRef = db;
  }
  if (normalized.pageTitle === undefined && page !== undefined) {
    normalized.pageTitle = page;
  }
  return normalized;
}

function buildConfig(raw: RawConfig, baseDir: string): Config {
  const { pageImages, storage, files, server } = raw;

  if (pageImages.defaultThumbSizeIndex >= pageImages.thumbLimits.length) {
    throw new ConfigurationError(
      `defaultThumbSizeIndex ${pageImages.defaultThumbSizeIndex} is outside thumbLimits (${pageImages.thumbLimits.length} entries)`
    );
  }

  const dataDir = path.resolve(baseDir, storage.dataDir);
  // Optional env-backed URLs resolve to '' when unset
  const baseUrl = (files.baseUrl || DEFAULT_FILE_BASE_URL).replace(/\/+$/, '');

  return {
    pageImages: {
      namespaces: pageImages.namespaces,
      scores: {
        width: toScoreTable(pageImages.scores.width ?? DEFAULT_SCORES.width, 'width'),
        position: toPositionScores(pageImages.scores.position ?? DEFAULT_SCORES.position),
        ratio: toScoreTable(pageImages.scores.ratio ?? DEFAULT_SCORES.ratio, 'ratio'),
      },
      blacklist: pageImages.blacklist.map(normalizeBlacklistSource),
      blacklistExpiry: pageImages.blacklistExpiry,
      thumbLimits: pageImages.thumbLimits,
      defaultThumbSizeIndex: pageImages.defaultThumbSizeIndex,
      fileExtensions: pageImages.fileExtensions.map(ext => ext.replace(/^\./, '').toLowerCase()),
      expandOpenSearch: pageImages.expandOpenSearch,
    },
    storage: {
      dataDir,
      cacheDir: storage.cacheDir ? path.resolve(baseDir, storage.cacheDir) : path.join(dataDir, 'cache'),
      pagesFile: path.resolve(dataDir, storage.pagesFile),
      filesFile: path.resolve(dataDir, storage.filesFile),
      pagePropsFile: path.resolve(dataDir, storage.pagePropsFile),
    },
    files: {
      baseUrl,
      thumbBaseUrl: (files.thumbBaseUrl || `${baseUrl}/thumb`).replace(/\/+$/, ''),
    },
    server,
  };
}

/**
 * Validates raw configuration data (as read from JSON) and fills in defaults.
 */
export function parseConfig(data: unknown, baseDir: string = process.cwd()): Config {
  const parsed = rawConfigSchema.safeParse(resolveEnvObject(data));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  return buildConfig(parsed.data, baseDir);
}

export function loadConfig(configDir: string = path.join(process.cwd(), 'config')): Config {
  const configPath = path.join(configDir, 'config.json');
  const examplePath = path.join(configDir, 'config.example.json');

  let configData: unknown;

  if (fs.existsSync(configPath)) {
    configData = fs.readJsonSync(configPath);
  } else if (fs.existsSync(examplePath)) {
    configData = fs.readJsonSync(examplePath);
    logger.warn('Using example config file. Please create config/config.json for production.');
  } else {
    throw new ConfigurationError('No configuration file found. Please create config/config.json');
  }

  return parseConfig(configData, path.dirname(configDir));
}

let cachedConfig: Config | null = null;

export function getConfig(): Config {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Port from the command line, or the configured one when none was given.
 */
export function parsePort(raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const port = Number(raw);
  if (raw.trim() === '' || !Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new ConfigurationError(`Invalid port '${raw}'`);
  }
  return port;
}

export function getDefaultThumbSize(pageImages: PageImagesConfig): number {
  return pageImages.thumbLimits[pageImages.defaultThumbSizeIndex] ?? pageImages.thumbLimits[0];
}
