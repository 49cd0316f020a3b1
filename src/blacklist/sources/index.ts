import { z } from 'zod';
import { BlacklistSourceConfig } from '../../config/config';
import { LinkGraph } from '../../wiki/pageRepository';
import { ConfigurationError } from '../../utils/errorHandler';
import { BlacklistSource, BlacklistSourceDescriptor } from './base-source';
import { InternalBlacklistSource } from './internal-source';
import { RemoteBlacklistSource } from './remote-source';

export * from './base-source';
export * from './internal-source';
export * from './remote-source';

export interface SourceDependencies {
  /** Link graphs by database reference; '' is the local wiki. */
  linkGraphs: ReadonlyMap<string, LinkGraph>;
  fileExtensions: readonly string[];
}

export const LOCAL_LINK_GRAPH = '';

const internalSchema = z.object({
  kind: z.literal('internal'),
  databaseRef: z.string().optional(),
  pageTitle: z.string().min(1),
});

const remoteSchema = z.object({
  kind: z.literal('remote'),
  url: z.string().url(),
});

const descriptorSchema = z.discriminatedUnion('kind', [internalSchema, remoteSchema]);

export function parseSourceDescriptor(source: BlacklistSourceConfig): BlacklistSourceDescriptor {
  if (source.kind !== 'internal' && source.kind !== 'remote') {
    throw new ConfigurationError(`Unrecognized image blacklist type '${source.kind}'`);
  }
  const parsed = descriptorSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`Invalid ${source.kind} image blacklist source: ${issues}`);
  }
  return parsed.data;
}

/**
 * Registry of available blacklist sources.
 */
export function createBlacklistSource(source: BlacklistSourceConfig, deps: SourceDependencies): BlacklistSource {
  const descriptor = parseSourceDescriptor(source);

  switch (descriptor.kind) {
    case 'internal': {
      const ref = descriptor.databaseRef ?? LOCAL_LINK_GRAPH;
      const graph = deps.linkGraphs.get(ref);
      if (!graph) {
        throw new ConfigurationError(`Image blacklist refers to unknown database '${ref}'`);
      }
      return new InternalBlacklistSource(descriptor, graph);
    }
    case 'remote':
      return new RemoteBlacklistSource(descriptor, deps.fileExtensions);
  }
}
