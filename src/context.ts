import { Config, getDefaultThumbSize } from './config/config';
import { BlacklistCache } from './blacklist/blacklistCache';
import { LOCAL_LINK_GRAPH } from './blacklist/sources';
import { PageImagesQuery } from './api/queryPageImages';
import { PageImageService } from './pageImages/pageImageService';
import { UsageRecorder } from './recorder/usageRecorder';
import { CacheStore, JsonFileCacheStore } from './storage/cacheStore';
import { JsonPagePropsStore, PagePropsStore } from './storage/pagePropsStore';
import { FileRepository, ManifestFileRepository } from './wiki/fileRepository';
import { LinkGraph, PageRepository } from './wiki/pageRepository';

export interface AppContext {
  config: Config;
  pages: PageRepository;
  files: FileRepository;
  pageProps: PagePropsStore;
  cache: CacheStore;
  blacklist: BlacklistCache;
  service: PageImageService;
  query: PageImagesQuery;
}

export interface ContextOverrides {
  pages?: PageRepository;
  files?: FileRepository;
  pageProps?: PagePropsStore;
  cache?: CacheStore;
  /** Extra link graphs for blacklist sources that name another database. */
  linkGraphs?: ReadonlyMap<string, LinkGraph>;
}

/**
 * Wires the stores, the blacklist and the service together from configuration.
 * Anything passed in overrides replaces the file-backed default.
 */
export function createContext(config: Config, overrides: ContextOverrides = {}): AppContext {
  const { pageImages, storage, files: fileUrls } = config;

  const pages = overrides.pages ?? PageRepository.fromFile(storage.pagesFile);
  const files = overrides.files ?? ManifestFileRepository.fromFile(storage.filesFile, fileUrls);
  const pageProps = overrides.pageProps ?? new JsonPagePropsStore(storage.pagePropsFile);
  const cache = overrides.cache ?? new JsonFileCacheStore(storage.cacheDir);

  const linkGraphs = new Map<string, LinkGraph>(overrides.linkGraphs ?? []);
  linkGraphs.set(LOCAL_LINK_GRAPH, pages);

  const blacklist = new BlacklistCache({
    sources: pageImages.blacklist,
    expirySeconds: pageImages.blacklistExpiry,
    store: cache,
    deps: { linkGraphs, fileExtensions: pageImages.fileExtensions },
  });

  const recorder = new UsageRecorder({
    eligibleNamespaces: pageImages.namespaces,
    defaultThumbSize: getDefaultThumbSize(pageImages),
  });

  const service = new PageImageService({
    recorder,
    blacklist,
    scores: pageImages.scores,
    pageProps,
    files,
  });

  const query = new PageImagesQuery({ pages, pageProps, files });

  return { config, pages, files, pageProps, cache, blacklist, service, query };
}
