import { ScoringConfig } from '../config/config';
import { CandidateScorer, ScoreBreakdown } from '../scoring/candidateScorer';
import { rankImages, selectBestImage } from '../selection/imageSelector';
import { UsageRecorder } from '../recorder/usageRecorder';
import { PAGE_IMAGE_PROP, PagePropsStore } from '../storage/pagePropsStore';
import { FileRepository, StoredFile } from '../wiki/fileRepository';
import { DocumentRef, ImageUsageRecord, RawPlacement } from '../types/usage';
import { logger } from '../utils/logger';

export interface BlacklistProvider {
  getBlacklist(): Promise<ReadonlySet<string>>;
}

export interface PageImageServiceDeps {
  recorder: UsageRecorder;
  blacklist: BlacklistProvider;
  scores: ScoringConfig;
  pageProps: PagePropsStore;
  files: FileRepository;
}

export interface ScoredUsage extends ImageUsageRecord {
  breakdown: ScoreBreakdown;
}

export interface SelectionReport {
  chosen: string | null;
  usages: ScoredUsage[];
  ranking: { imageId: string; score: number }[];
}

/**
 * Glue between the renderer and storage: placements go in while a page renders,
 * the chosen image comes out as the page_image property when it finishes.
 */
export class PageImageService {
  constructor(private readonly deps: PageImageServiceDeps) {}

  onImagePlacement(document: DocumentRef, placement: RawPlacement): void {
    this.deps.recorder.record(document, placement);
  }

  /**
   * Scores everything recorded for the document and stores the winner.
   * A page that ends up without a winner loses any image chosen earlier.
   */
  async onRenderComplete(document: DocumentRef): Promise<string | null> {
    const eligible = this.deps.recorder.isEligible(document);
    const state = this.deps.recorder.take(document.id);
    if (!eligible) {
      return null;
    }

    const records = state?.records ?? [];
    const { chosen } = await this.evaluate(records);

    if (chosen) {
      await this.deps.pageProps.setProperty(document.id, PAGE_IMAGE_PROP, chosen);
      logger.info(`Page ${document.id}: chose ${chosen} from ${records.length} image usages`);
    } else {
      await this.deps.pageProps.deleteProperty(document.id, PAGE_IMAGE_PROP);
      logger.debug(`Page ${document.id}: no suitable image among ${records.length} usages`);
    }
    return chosen;
  }

  /**
   * Records a whole page's placements and completes it in one go.
   */
  async processRender(document: DocumentRef, placements: readonly RawPlacement[]): Promise<string | null> {
    for (const placement of placements) {
      this.onImagePlacement(document, placement);
    }
    return this.onRenderComplete(document);
  }

  peekRecords(documentId: number): ImageUsageRecord[] {
    return this.deps.recorder.peek(documentId)?.records ?? [];
  }

  async evaluate(records: readonly ImageUsageRecord[]): Promise<SelectionReport> {
    if (records.length === 0) {
      return { chosen: null, usages: [], ranking: [] };
    }
    const blacklist = await this.deps.blacklist.getBlacklist();
    const scorer = new CandidateScorer(this.deps.scores, blacklist);

    return {
      chosen: selectBestImage(records, scorer),
      usages: records.map(record => ({ ...record, breakdown: scorer.breakdown(record) })),
      ranking: rankImages(records, scorer),
    };
  }

  async getPageImage(pageId: number): Promise<StoredFile | null> {
    const name = await this.deps.pageProps.getProperty(pageId, PAGE_IMAGE_PROP);
    if (!name) {
      return null;
    }
    return this.deps.files.findFile(name);
  }
}
