import { DEFAULT_THUMB_SIZE, PageImagesQuery, ThumbnailInfo } from './queryPageImages';

export interface SearchResult {
  title: string;
  image?: ThumbnailInfo | null;
  [key: string]: unknown;
}

/**
 * Adds each result's page image thumbnail (or null) to search suggestions,
 * keyed by page id. Leaves the results alone when expansion is disabled.
 */
export async function expandSearchResults(
  results: Map<number, SearchResult>,
  query: PageImagesQuery,
  enabled: boolean
): Promise<Map<number, SearchResult>> {
  if (!enabled || results.size === 0) {
    return results;
  }

  const pageIds = Array.from(results.keys());
  const { pages } = await query.execute({
    pageids: pageIds,
    titles: [],
    prop: ['thumbnail'],
    thumbsize: DEFAULT_THUMB_SIZE,
    limit: pageIds.length,
  });
  const thumbnails = new Map(pages.map(page => [page.pageid, page.thumbnail]));

  for (const [pageId, result] of results) {
    result.image = thumbnails.get(pageId) ?? null;
  }
  return results;
}
