import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import axios, { AxiosInstance } from 'axios';
import { Server } from 'http';
import { parseConfig } from '../src/config/config';
import { createContext } from '../src/context';
import { createApp } from '../src/server';
import { MemoryCacheStore } from '../src/storage/cacheStore';
import { MemoryPagePropsStore } from '../src/storage/pagePropsStore';
import { ManifestFileRepository } from '../src/wiki/fileRepository';
import { PageRepository } from '../src/wiki/pageRepository';

vi.mock('../src/utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

describe('page images routes', () => {
  let server: Server;
  let client: AxiosInstance;

  beforeAll(async () => {
    const config = parseConfig({
      pageImages: {
        expandOpenSearch: true,
        blacklist: [{ kind: 'internal', pageTitle: 'MediaWiki:Pageimages-blacklist' }],
      },
    });
    const context = createContext(config, {
      pages: new PageRepository([
        { id: 1, namespace: 0, title: 'Main_Page', links: [] },
        { id: 2, namespace: 0, title: 'Pier', links: [] },
        { id: 9, namespace: 8, title: 'Pageimages-blacklist', links: [{ namespace: 6, title: 'Stub_icon.png' }] },
      ]),
      files: new ManifestFileRepository([{ name: 'A.jpg', width: 120, height: 80 }], {
        baseUrl: '/images',
        thumbBaseUrl: '/images/thumb',
      }),
      pageProps: new MemoryPagePropsStore(),
      cache: new MemoryCacheStore(),
    });

    server = await new Promise<Server>(resolve => {
      const listening = createApp(context).listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    client = axios.create({ baseURL: `http://127.0.0.1:${port}`, validateStatus: () => true });
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
  });

  it('should answer health checks', async () => {
    const response = await client.get('/api/health');
    expect(response.status).toBe(200);
    expect(response.data).toEqual({ status: 'ok' });
  });

  it('should choose a page image from rendered placements', async () => {
    const response = await client.post('/api/pages/1/render', {
      namespace: 0,
      title: 'Main Page',
      placements: [
        { imageId: 'Stub_icon.png', width: 300, fullWidth: 40, fullHeight: 40 },
        { imageId: 'A.jpg', width: 120, layout: ['thumbnail'], fullWidth: 120, fullHeight: 80 },
        { imageId: 'B.jpg', width: 300, fullWidth: 300, fullHeight: 300 },
      ],
    });

    // A.jpg: 10 + 6 + 5; B.jpg: 10 + 4 + 5; Stub_icon.png is blacklisted
    expect(response.status).toBe(200);
    expect(response.data).toEqual({ pageId: 1, pageImage: 'A.jpg' });
  });

  it('should serve the chosen image through the query endpoint', async () => {
    const response = await client.get('/api/query/pageimages', { params: { pageids: '1|2', limit: '1' } });

    expect(response.status).toBe(200);
    expect(response.data).toEqual({
      query: {
        pages: [{
          pageid: 1,
          ns: 0,
          title: 'Main Page',
          thumbnail: { source: '/images/thumb/A.jpg/50px-A.jpg', width: 50, height: 33 },
          pageimage: 'A.jpg',
        }],
      },
      continue: { continue: 2 },
    });
  });

  it('should expand search suggestions with thumbnails', async () => {
    const response = await client.post('/api/search/expand', {
      results: [{ pageId: 1, title: 'Main Page' }, { pageId: 2, title: 'Pier' }],
    });

    expect(response.data).toEqual({
      results: [
        { pageId: 1, title: 'Main Page', image: { source: '/images/thumb/A.jpg/50px-A.jpg', width: 50, height: 33 } },
        { pageId: 2, title: 'Pier', image: null },
      ],
    });
  });

  it('should report invalid continue values as API errors', async () => {
    const response = await client.get('/api/query/pageimages', { params: { pageids: '1', continue: '99' } });

    expect(response.status).toBe(400);
    expect(response.data).toEqual({
      error: {
        code: 'badcontinue',
        info: 'Invalid continue param. You should pass the original value returned by the previous query',
      },
    });
  });

  it('should reject malformed render requests', async () => {
    const badId = await client.post('/api/pages/abc/render', { namespace: 0, placements: [] });
    expect(badId.status).toBe(400);
    expect(badId.data).toEqual({ error: { code: 'badparams', info: 'Invalid page id' } });

    const badBody = await client.post('/api/pages/1/render', { namespace: 0 });
    expect(badBody.status).toBe(400);
    expect(badBody.data.error.code).toBe('badparams');
  });
});
