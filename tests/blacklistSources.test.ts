import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios from 'axios';
import {
  buildFileLinkPattern,
  createBlacklistSource,
  extractFileKeys,
  InternalBlacklistSource,
  LOCAL_LINK_GRAPH,
  parseSourceDescriptor,
  REMOTE_FETCH_TIMEOUT_MS,
  RemoteBlacklistSource,
} from '../src/blacklist/sources';
import { DEFAULT_FILE_EXTENSIONS } from '../src/config/config';
import { PageRepository } from '../src/wiki/pageRepository';
import { ConfigurationError } from '../src/utils/errorHandler';

vi.mock('axios');
vi.mock('../src/utils/logger', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

const pages = new PageRepository([
  {
    id: 2,
    namespace: 8,
    title: 'Pageimages-blacklist',
    links: [
      { namespace: 6, title: 'Question_mark.svg' },
      { namespace: 0, title: 'Main_Page' },
      { namespace: 6, title: 'Stub_icon.png' },
    ],
  },
]);

const deps = {
  linkGraphs: new Map([[LOCAL_LINK_GRAPH, pages]]),
  fileExtensions: DEFAULT_FILE_EXTENSIONS,
};

const remoteList = [
  'Images that should never represent a page:',
  '* [[:File:Bad image.png]] (placeholder)',
  '* [[:Image:Stub icon.PNG|stub marker]]',
  '* [[File:Inline.jpg]] is shown, not linked',
  '* [[:Flag of nowhere.svg]]',
  '* [[:File:Notes.txt]]',
].join('\n');

describe('extractFileKeys', () => {
  it('should pick escaped file links with known extensions', () => {
    expect(extractFileKeys(remoteList, DEFAULT_FILE_EXTENSIONS)).toEqual([
      'Bad_image.png',
      'Stub_icon.PNG',
      'Flag_of_nowhere.svg',
    ]);
  });

  it('should only consider the configured extensions', () => {
    expect(extractFileKeys(remoteList, ['svg'])).toEqual(['Flag_of_nowhere.svg']);
    expect(extractFileKeys(remoteList, [])).toEqual([]);
  });

  it('should stop the target at a pipe or an anchor', () => {
    expect(buildFileLinkPattern(['jpg']).exec('[[:File:Spacer#top.jpg]]')).toBeNull();
    expect(extractFileKeys('[[:File:Pier.jpg|a pier]]', ['jpg'])).toEqual(['Pier.jpg']);
  });
});

describe('RemoteBlacklistSource', () => {
  beforeEach(() => {
    vi.mocked(axios.get).mockReset();
  });

  it('should fetch the list as text with a short timeout', async () => {
    vi.mocked(axios.get).mockResolvedValueOnce({ data: remoteList });
    const source = new RemoteBlacklistSource({ kind: 'remote', url: 'https://lists.example.org/raw' }, DEFAULT_FILE_EXTENSIONS);

    expect(await source.fetchEntries()).toEqual(['Bad_image.png', 'Stub_icon.PNG', 'Flag_of_nowhere.svg']);
    expect(axios.get).toHaveBeenCalledWith('https://lists.example.org/raw', {
      timeout: REMOTE_FETCH_TIMEOUT_MS,
      responseType: 'text',
    });
  });

  it('should contribute nothing when the URL cannot be reached', async () => {
    vi.mocked(axios.get).mockRejectedValueOnce(new Error('timeout of 3000ms exceeded'));
    const source = new RemoteBlacklistSource({ kind: 'remote', url: 'https://lists.example.org/raw' }, DEFAULT_FILE_EXTENSIONS);

    expect(await source.fetchEntries()).toEqual([]);
  });

  it('should contribute nothing for an empty body', async () => {
    vi.mocked(axios.get).mockResolvedValueOnce({ data: '' });
    const source = new RemoteBlacklistSource({ kind: 'remote', url: 'https://lists.example.org/raw' }, DEFAULT_FILE_EXTENSIONS);

    expect(await source.fetchEntries()).toEqual([]);
  });
});

describe('InternalBlacklistSource', () => {
  it('should list the files linked from the blacklist page', async () => {
    const source = new InternalBlacklistSource({ kind: 'internal', pageTitle: 'MediaWiki:Pageimages-blacklist' }, pages);
    expect(await source.fetchEntries()).toEqual(['Question_mark.svg', 'Stub_icon.png']);
  });

  it('should normalise link titles from any link graph', async () => {
    const graph = {
      findPageId: async () => 2,
      getLinks: async () => ['bad image.jpg', 'File:Stub_icon.png', 'Category:Icons'],
    };
    const source = new InternalBlacklistSource({ kind: 'internal', pageTitle: 'MediaWiki:Pageimages-blacklist' }, graph);

    expect(await source.fetchEntries()).toEqual(['Bad_image.jpg', 'Stub_icon.png']);
  });

  it('should contribute nothing when the page does not exist', async () => {
    const source = new InternalBlacklistSource({ kind: 'internal', pageTitle: 'MediaWiki:No such page' }, pages);
    expect(await source.fetchEntries()).toEqual([]);
  });

  it('should contribute nothing for an invalid title', async () => {
    const source = new InternalBlacklistSource({ kind: 'internal', pageTitle: 'Bad {title}' }, pages);
    expect(await source.fetchEntries()).toEqual([]);
  });
});

describe('createBlacklistSource', () => {
  it('should build a source for each known kind', () => {
    expect(createBlacklistSource({ kind: 'internal', pageTitle: 'MediaWiki:Pageimages-blacklist' }, deps))
      .toBeInstanceOf(InternalBlacklistSource);
    expect(createBlacklistSource({ kind: 'remote', url: 'https://lists.example.org/raw' }, deps))
      .toBeInstanceOf(RemoteBlacklistSource);
  });

  it('should reject an unknown kind', () => {
    expect(() => createBlacklistSource({ kind: 'ftp', url: 'ftp://example.org' }, deps))
      .toThrow("Unrecognized image blacklist type 'ftp'");
  });

  it('should reject a reference to an unknown database', () => {
    expect(() => createBlacklistSource({ kind: 'internal', databaseRef: 'commonswiki', pageTitle: 'MediaWiki:Pageimages-blacklist' }, deps))
      .toThrow("Image blacklist refers to unknown database 'commonswiki'");
  });

  it('should reject a remote source without a valid URL', () => {
    expect(() => parseSourceDescriptor({ kind: 'remote', url: 'not a url' })).toThrow(ConfigurationError);
    expect(() => parseSourceDescriptor({ kind: 'internal' })).toThrow(/^Invalid internal image blacklist source: pageTitle/);
  });
});
