import { z } from 'zod';
import { readJsonSafe } from '../storage/jsonStore';
import { logger } from '../utils/logger';
import { Namespace, PageTitle, parseTitle } from './titles';

const pageLinkSchema = z.object({
  namespace: z.number().int(),
  title: z.string(),
});

const pageRecordSchema = z.object({
  id: z.number().int().positive(),
  namespace: z.number().int(),
  title: z.string(),
  links: z.array(pageLinkSchema).default([]),
});

const pageListSchema = z.array(pageRecordSchema);

export type PageLink = z.infer<typeof pageLinkSchema>;
export type PageRecord = z.infer<typeof pageRecordSchema>;

/**
 * The slice of the link tables the internal blacklist source needs.
 */
export interface LinkGraph {
  findPageId(title: PageTitle): Promise<number | null>;
  getLinks(pageId: number, namespace: number): Promise<string[]>;
}

export interface PageLookup {
  getById(pageId: number): Promise<PageRecord | null>;
  getByTitle(title: PageTitle): Promise<PageRecord | null>;
}

function titleKey(namespace: number, dbKey: string): string {
  return `${namespace}:${dbKey}`;
}

/**
 * Brings page and link titles into the underscored key form, so "Bad image.jpg"
 * and "File:Bad_image.jpg" in a links list both become "Bad_image.jpg".
 */
function normalizePage(page: PageRecord): PageRecord {
  const links: PageLink[] = [];
  for (const link of page.links) {
    const title = parseTitle(link.title, link.namespace);
    if (!title) {
      logger.warn(`Skipping invalid link "${link.title}" on page ${page.id}`);
      continue;
    }
    links.push({ namespace: title.namespace, title: title.dbKey });
  }
  const own = parseTitle(page.title, page.namespace);
  return { ...page, title: own && own.namespace === page.namespace ? own.dbKey : page.title, links };
}

export class PageRepository implements LinkGraph, PageLookup {
  private readonly byId = new Map<number, PageRecord>();
  private readonly byTitle = new Map<string, PageRecord>();

  constructor(pages: readonly PageRecord[] = []) {
    for (const page of pages.map(normalizePage)) {
      this.byId.set(page.id, page);
      this.byTitle.set(titleKey(page.namespace, page.title), page);
    }
  }

  static fromFile(filePath: string): PageRepository {
    const raw = readJsonSafe<unknown[]>(filePath, [], (data): data is unknown[] => Array.isArray(data));
    const parsed = pageListSchema.safeParse(raw);
    if (!parsed.success) {
      logger.warn(`Ignoring malformed page list at ${filePath}: ${parsed.error.message}`);
      return new PageRepository();
    }
    logger.debug(`Loaded ${parsed.data.length} pages from ${filePath}`);
    return new PageRepository(parsed.data);
  }

  get size(): number {
    return this.byId.size;
  }

  async findPageId(title: PageTitle): Promise<number | null> {
    return this.byTitle.get(titleKey(title.namespace, title.dbKey))?.id ?? null;
  }

  async getLinks(pageId: number, namespace: number = Namespace.FILE): Promise<string[]> {
    const page = this.byId.get(pageId);
    if (!page) {
      return [];
    }
    return page.links.filter(link => link.namespace === namespace).map(link => link.title);
  }

  async getById(pageId: number): Promise<PageRecord | null> {
    return this.byId.get(pageId) ?? null;
  }

  async getByTitle(title: PageTitle): Promise<PageRecord | null> {
    return this.byTitle.get(titleKey(title.namespace, title.dbKey)) ?? null;
  }
}
