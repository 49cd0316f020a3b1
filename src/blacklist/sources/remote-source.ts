import axios from 'axios';
import { normalizeFileKey } from '../../wiki/titles';
import { logger } from '../../utils/logger';
import { BlacklistSource, RemoteSourceDescriptor } from './base-source';

export const REMOTE_FETCH_TIMEOUT_MS = 3000;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches the target of escaped file links such as [[:File:Example.jpg|...]].
 * Localised namespace names are not understood; the prefix is kept in the capture.
 */
export function buildFileLinkPattern(extensions: readonly string[]): RegExp {
  const alternatives = extensions.map(escapeRegExp).join('|');
  return new RegExp(`\\[\\[:([^|#]*?\\.(?:${alternatives}))`, 'gi');
}

export function extractFileKeys(text: string, extensions: readonly string[]): string[] {
  if (extensions.length === 0) {
    return [];
  }
  const keys: string[] = [];
  for (const match of text.matchAll(buildFileLinkPattern(extensions))) {
    const key = normalizeFileKey(match[1]);
    if (key) {
      keys.push(key);
    }
  }
  return keys;
}

/**
 * A list of escaped file links published as plain text somewhere else,
 * typically a raw wiki page on another site.
 */
export class RemoteBlacklistSource implements BlacklistSource {
  constructor(
    private readonly descriptor: RemoteSourceDescriptor,
    private readonly fileExtensions: readonly string[]
  ) {}

  async fetchEntries(): Promise<string[]> {
    try {
      const response = await axios.get<unknown>(this.descriptor.url, {
        timeout: REMOTE_FETCH_TIMEOUT_MS,
        responseType: 'text',
      });
      const body = response.data;
      if (typeof body !== 'string' || body === '') {
        logger.warn(`Blacklist URL ${this.descriptor.url} returned no text`);
        return [];
      }
      const keys = extractFileKeys(body, this.fileExtensions);
      logger.debug(`Blacklist URL ${this.descriptor.url} lists ${keys.length} files`);
      return keys;
    } catch (error) {
      logger.warn(`Failed to fetch blacklist from ${this.descriptor.url}:`, error instanceof Error ? error.message : error);
      return [];
    }
  }
}
