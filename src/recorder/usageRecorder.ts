import { DocumentImageState, DocumentRef, ImageUsageRecord, RawPlacement } from '../types/usage';
import { logger } from '../utils/logger';
import { normalizeFileKey } from '../wiki/titles';

export interface RecorderOptions {
  eligibleNamespaces: readonly number[];
  defaultThumbSize: number;
}

/**
 * Approximate display width: explicit width, then width scaled from an explicit
 * height, then the default thumbnail size for framed layouts, then the full width.
 */
export function estimateDisplayWidth(placement: RawPlacement, defaultThumbSize: number): number {
  if (placement.width !== undefined) {
    return placement.width;
  }
  if (placement.height !== undefined && placement.fullHeight > 0) {
    return placement.fullWidth * (placement.height / placement.fullHeight);
  }
  if (placement.layout.length > 0) {
    return defaultThumbSize;
  }
  return placement.fullWidth;
}

/**
 * Collects image placements per document while it renders.
 * Each document's state is handed over once, by take(), when rendering finishes.
 */
export class UsageRecorder {
  private readonly eligibleNamespaces: ReadonlySet<number>;
  private readonly states = new Map<number, DocumentImageState>();
  private readonly eligibility = new Map<number, boolean>();

  constructor(private readonly options: RecorderOptions) {
    this.eligibleNamespaces = new Set(options.eligibleNamespaces);
  }

  isEligible(document: DocumentRef): boolean {
    const known = this.eligibility.get(document.id);
    if (known !== undefined) {
      return known;
    }
    const eligible = this.eligibleNamespaces.has(document.namespace);
    this.eligibility.set(document.id, eligible);
    return eligible;
  }

  /**
   * Returns the stored record, or null when the document is not in an eligible namespace
   * or the image name is not a valid file title.
   */
  record(document: DocumentRef, placement: RawPlacement): ImageUsageRecord | null {
    if (!this.isEligible(document)) {
      return null;
    }

    const imageId = normalizeFileKey(placement.imageId);
    if (!imageId) {
      logger.debug(`Skipping image "${placement.imageId}" on page ${document.id}: not a valid file name`);
      return null;
    }

    let state = this.states.get(document.id);
    if (!state) {
      state = { documentId: document.id, records: [] };
      this.states.set(document.id, state);
    }

    const usage: ImageUsageRecord = {
      imageId,
      declaredWidth: estimateDisplayWidth(placement, this.options.defaultThumbSize),
      declaredHeight: placement.height,
      layout: [...placement.layout],
      fullWidth: placement.fullWidth,
      fullHeight: placement.fullHeight,
      ordinal: state.records.length,
    };
    state.records.push(usage);
    logger.debug(`Recorded image ${usage.imageId} #${usage.ordinal} on page ${document.id} (width ${usage.declaredWidth})`);
    return usage;
  }

  peek(documentId: number): DocumentImageState | undefined {
    return this.states.get(documentId);
  }

  /**
   * Hands over and forgets the document's state; undefined when nothing was recorded.
   */
  take(documentId: number): DocumentImageState | undefined {
    const state = this.states.get(documentId);
    this.states.delete(documentId);
    this.eligibility.delete(documentId);
    return state;
  }
}
