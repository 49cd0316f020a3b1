export * from './types/usage';
export * from './scoring/scoreTable';
export * from './scoring/candidateScorer';
export * from './selection/imageSelector';
export * from './recorder/usageRecorder';
export * from './blacklist/blacklistCache';
export * from './blacklist/sources';
export * from './pageImages/pageImageService';
export * from './api/queryPageImages';
export * from './api/searchExpansion';
export * from './storage/cacheStore';
export * from './storage/pagePropsStore';
export * from './wiki/titles';
export * from './wiki/pageRepository';
export * from './wiki/fileRepository';
export { loadConfig, parseConfig, getConfig } from './config/config';
export type { Config, PageImagesConfig, ScoringConfig, BlacklistSourceConfig } from './config/config';
export { createContext } from './context';
export type { AppContext, ContextOverrides } from './context';
export { createApp, startServer } from './server';
export { PageImagesError, ConfigurationError, InvalidParameterError, InvalidContinueError } from './utils/errorHandler';
