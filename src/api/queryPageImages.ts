import { z } from 'zod';
import { PAGE_IMAGE_PROP, PagePropsStore } from '../storage/pagePropsStore';
import { FileRepository } from '../wiki/fileRepository';
import { PageLookup } from '../wiki/pageRepository';
import { formatTitle, Namespace, PageTitle, parseTitle } from '../wiki/titles';
import { InvalidContinueError, InvalidParameterError } from '../utils/errorHandler';

export const PAGE_IMAGE_PROPS = ['thumbnail', 'name', 'original'] as const;
export type PageImageProp = (typeof PAGE_IMAGE_PROPS)[number];

export const DEFAULT_THUMB_SIZE = 50;
export const MAX_LIMIT = 50;

function splitMulti(value: unknown): unknown {
  if (typeof value === 'string') {
    return value === '' ? [] : value.split('|');
  }
  return value;
}

function toInteger(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() !== '') {
    return Number(value);
  }
  return value;
}

const integer = z.preprocess(toInteger, z.number().int());

export const queryParamsSchema = z.object({
  pageids: z.preprocess(splitMulti, z.array(integer)).default([]),
  titles: z.preprocess(splitMulti, z.array(z.string())).default([]),
  prop: z.preprocess(splitMulti, z.array(z.enum(PAGE_IMAGE_PROPS))).default(['thumbnail', 'name']),
  thumbsize: z.preprocess(toInteger, z.number().int().positive()).default(DEFAULT_THUMB_SIZE),
  limit: z.preprocess(toInteger, z.number().int().min(1))
    .default(1)
    .transform(limit => Math.min(limit, MAX_LIMIT)),
  continue: integer.optional(),
});

export type QueryParams = z.output<typeof queryParamsSchema>;
export type QueryInput = z.input<typeof queryParamsSchema>;

export function parseQueryParams(raw: unknown): QueryParams {
  const parsed = queryParamsSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidParameterError(`Invalid parameters: ${issues}`);
  }
  return parsed.data;
}

export interface ThumbnailInfo {
  source?: string;
  width?: number;
  height?: number;
  original?: string;
}

export interface PageImageEntry {
  pageid: number;
  ns: number;
  title: string;
  thumbnail?: ThumbnailInfo;
  pageimage?: string;
}

export interface PageImagesResult {
  pages: PageImageEntry[];
  continue?: number;
}

interface Candidate {
  pageId: number;          // Negative for file pages that only exist as files
  title: PageTitle;
}

export interface QueryDependencies {
  pages: PageLookup;
  pageProps: PagePropsStore;
  files: FileRepository;
}

/**
 * Thumbnail, original URL and name of the image chosen for each requested page.
 * File pages describe their own file.
 */
export class PageImagesQuery {
  constructor(private readonly deps: QueryDependencies) {}

  async execute(params: QueryParams): Promise<PageImagesResult> {
    const props = new Set<PageImageProp>(params.prop);
    if (props.size === 0) {
      throw new InvalidParameterError('No properties selected', 'noprop');
    }

    const candidates = await this.resolveCandidates(params);
    if (candidates.length === 0) {
      return { pages: [] };
    }

    let offset = 0;
    if (params.continue !== undefined) {
      offset = candidates.findIndex(candidate => candidate.pageId === params.continue);
      if (offset < 0) {
        throw new InvalidContinueError();
      }
    }

    const page = candidates.slice(offset, offset + params.limit);
    const next = candidates.at(offset + params.limit);

    const contentPageIds = page
      .filter(candidate => candidate.title.namespace !== Namespace.FILE)
      .map(candidate => candidate.pageId);
    const stored = contentPageIds.length > 0
      ? await this.deps.pageProps.getProperties(contentPageIds, PAGE_IMAGE_PROP)
      : new Map<number, string>();

    const pages: PageImageEntry[] = [];
    for (const candidate of page) {
      const fileName = candidate.title.namespace === Namespace.FILE
        ? candidate.title.dbKey
        : stored.get(candidate.pageId);
      const entry: PageImageEntry = {
        pageid: candidate.pageId,
        ns: candidate.title.namespace,
        title: formatTitle(candidate.title),
      };
      if (fileName) {
        Object.assign(entry, await this.describeImage(fileName, props, params.thumbsize));
      }
      pages.push(entry);
    }

    return next ? { pages, continue: next.pageId } : { pages };
  }

  private async describeImage(
    fileName: string,
    props: ReadonlySet<PageImageProp>,
    size: number
  ): Promise<Pick<PageImageEntry, 'thumbnail' | 'pageimage'>> {
    const values: Pick<PageImageEntry, 'thumbnail' | 'pageimage'> = {};

    if (props.has('thumbnail') || props.has('original')) {
      const file = await this.deps.files.findFile(fileName);

      if (file && props.has('thumbnail')) {
        const thumb = file.transform({ width: size, height: size });
        if (thumb && thumb.url) {
          values.thumbnail = {
            source: thumb.url,
            // An oversized request reports the requested size; never claim more than the original
            width: Math.min(thumb.width, file.width),
            height: Math.min(thumb.height, file.height),
          };
        }
      }

      if (file && props.has('original')) {
        values.thumbnail = { ...values.thumbnail, original: file.url };
      }
    }

    if (props.has('name')) {
      values.pageimage = fileName;
    }

    return values;
  }

  /**
   * Requested pages in request order, without duplicates. Titles in the file
   * namespace that have no page are kept under negative ids, since their file may
   * still exist.
   */
  private async resolveCandidates(params: QueryParams): Promise<Candidate[]> {
    const candidates: Candidate[] = [];
    const seen = new Set<string>();
    let missingFileId = 0;

    const add = (pageId: number, title: PageTitle) => {
      const key = `${title.namespace}:${title.dbKey}`;
      if (seen.has(key)) return;
      seen.add(key);
      candidates.push({ pageId, title });
    };

    for (const pageId of params.pageids) {
      const page = await this.deps.pages.getById(pageId);
      if (page) {
        add(page.id, { namespace: page.namespace, dbKey: page.title });
      }
    }

    for (const text of params.titles) {
      const title = parseTitle(text);
      if (!title) continue;
      const page = await this.deps.pages.getByTitle(title);
      if (page) {
        add(page.id, title);
      } else if (title.namespace === Namespace.FILE) {
        add(--missingFileId, title);
      }
    }

    return candidates;
  }
}
