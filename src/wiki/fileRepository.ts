import { z } from 'zod';
import { readJsonSafe } from '../storage/jsonStore';
import { logger } from '../utils/logger';
import { normalizeFileKey } from './titles';

export interface Thumbnail {
  url: string;
  width: number;
  height: number;
}

export interface StoredFile {
  name: string;
  width: number;
  height: number;
  url: string;
  /**
   * Scales the file to fit the box. Asking for more than the original returns
   * the original URL with the requested (oversized) dimensions; callers clamp.
   */
  transform(box: { width: number; height: number }): Thumbnail | null;
}

export interface FileRepository {
  findFile(name: string): Promise<StoredFile | null>;
}

const fileEntrySchema = z.object({
  name: z.string().min(1),
  width: z.number().int().nonnegative(),
  height: z.number().int().nonnegative(),
  url: z.string().optional(),
});

export type FileEntry = z.infer<typeof fileEntrySchema>;

export interface FileUrls {
  baseUrl: string;
  thumbBaseUrl: string;
}

export function fitToBox(
  width: number,
  height: number,
  box: { width: number; height: number }
): { width: number; height: number } | null {
  if (width <= 0 || height <= 0 || box.width <= 0 || box.height <= 0) {
    return null;
  }
  const scale = Math.min(box.width / width, box.height / height);
  return {
    width: Math.max(1, Math.round(width * scale)),
    height: Math.max(1, Math.round(height * scale)),
  };
}

class ManifestFile implements StoredFile {
  readonly name: string;
  readonly width: number;
  readonly height: number;
  readonly url: string;

  constructor(entry: FileEntry, private readonly urls: FileUrls) {
    this.name = entry.name;
    this.width = entry.width;
    this.height = entry.height;
    this.url = entry.url || `${urls.baseUrl}/${encodeURIComponent(entry.name)}`;
  }

  transform(box: { width: number; height: number }): Thumbnail | null {
    const size = fitToBox(this.width, this.height, box);
    if (!size) {
      return null;
    }
    if (size.width >= this.width) {
      return { url: this.url, ...size };
    }
    const encoded = encodeURIComponent(this.name);
    return {
      url: `${this.urls.thumbBaseUrl}/${encoded}/${size.width}px-${encoded}`,
      ...size,
    };
  }
}

/**
 * Files described by a JSON manifest: [{ "name": "Sunset.jpg", "width": 1024, "height": 768 }].
 */
export class ManifestFileRepository implements FileRepository {
  private readonly files = new Map<string, StoredFile>();

  constructor(entries: readonly FileEntry[], urls: FileUrls) {
    for (const entry of entries) {
      const key = normalizeFileKey(entry.name);
      if (!key) {
        logger.warn(`Skipping file with invalid name "${entry.name}"`);
        continue;
      }
      this.files.set(key, new ManifestFile({ ...entry, name: key }, urls));
    }
  }

  static fromFile(filePath: string, urls: FileUrls): ManifestFileRepository {
    const raw = readJsonSafe<unknown[]>(filePath, [], (data): data is unknown[] => Array.isArray(data));
    const parsed = z.array(fileEntrySchema).safeParse(raw);
    if (!parsed.success) {
      logger.warn(`Ignoring malformed file manifest at ${filePath}: ${parsed.error.message}`);
      return new ManifestFileRepository([], urls);
    }
    return new ManifestFileRepository(parsed.data, urls);
  }

  async findFile(name: string): Promise<StoredFile | null> {
    const key = normalizeFileKey(name);
    return key ? this.files.get(key) ?? null : null;
  }
}
