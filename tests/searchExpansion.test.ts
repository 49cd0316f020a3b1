import { describe, it, expect } from 'vitest';
import { expandSearchResults, SearchResult } from '../src/api/searchExpansion';
import { PageImagesQuery } from '../src/api/queryPageImages';
import { MemoryPagePropsStore, PAGE_IMAGE_PROP } from '../src/storage/pagePropsStore';
import { ManifestFileRepository } from '../src/wiki/fileRepository';
import { PageRepository } from '../src/wiki/pageRepository';

async function createQuery(): Promise<PageImagesQuery> {
  const pageProps = new MemoryPagePropsStore();
  await pageProps.setProperty(1, PAGE_IMAGE_PROP, 'Harbour_at_dusk.jpg');
  return new PageImagesQuery({
    pages: new PageRepository([
      { id: 1, namespace: 0, title: 'Harbour', links: [] },
      { id: 2, namespace: 0, title: 'Harbour_master', links: [] },
    ]),
    pageProps,
    files: new ManifestFileRepository([{ name: 'Harbour_at_dusk.jpg', width: 1600, height: 1067 }], {
      baseUrl: '/images',
      thumbBaseUrl: '/images/thumb',
    }),
  });
}

function suggestions(): Map<number, SearchResult> {
  return new Map([
    [1, { title: 'Harbour', url: '/wiki/Harbour' }],
    [2, { title: 'Harbour master', url: '/wiki/Harbour_master' }],
  ]);
}

describe('expandSearchResults', () => {
  it('should attach a thumbnail or null to every suggestion', async () => {
    const results = await expandSearchResults(suggestions(), await createQuery(), true);

    expect(results.get(1)).toEqual({
      title: 'Harbour',
      url: '/wiki/Harbour',
      image: { source: '/images/thumb/Harbour_at_dusk.jpg/50px-Harbour_at_dusk.jpg', width: 50, height: 33 },
    });
    expect(results.get(2)?.image).toBeNull();
  });

  it('should leave suggestions untouched when disabled', async () => {
    const results = await expandSearchResults(suggestions(), await createQuery(), false);
    expect(results.get(1)).toEqual({ title: 'Harbour', url: '/wiki/Harbour' });
  });
});
