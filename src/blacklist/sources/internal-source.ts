import { LinkGraph } from '../../wiki/pageRepository';
import { Namespace, normalizeFileKey, parseTitle } from '../../wiki/titles';
import { logger } from '../../utils/logger';
import { BlacklistSource, InternalSourceDescriptor } from './base-source';

/**
 * Every file linked from a designated page on this (or a named) wiki is disallowed.
 */
export class InternalBlacklistSource implements BlacklistSource {
  constructor(
    private readonly descriptor: InternalSourceDescriptor,
    private readonly graph: LinkGraph
  ) {}

  async fetchEntries(): Promise<string[]> {
    const title = parseTitle(this.descriptor.pageTitle);
    if (!title) {
      logger.warn(`Blacklist page title "${this.descriptor.pageTitle}" is not a valid title`);
      return [];
    }

    const pageId = await this.graph.findPageId(title);
    if (pageId === null) {
      logger.debug(`Blacklist page "${this.descriptor.pageTitle}" does not exist`);
      return [];
    }

    const links = await this.graph.getLinks(pageId, Namespace.FILE);
    const keys = links.flatMap(link => normalizeFileKey(link) ?? []);
    logger.debug(`Blacklist page "${this.descriptor.pageTitle}" links ${keys.length} files`);
    return keys;
  }
}
