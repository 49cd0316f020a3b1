import { ImageUsageRecord } from '../types/usage';
import { ScoringConfig } from '../config/config';
import { lookupScore, positionScore } from './scoreTable';

/** Score given to blacklisted images, whatever else they would have earned. */
export const BLACKLISTED_SCORE = -1000;

export interface ScoreBreakdown {
  width: number;
  position: number;
  ratio: number;
  blacklisted: boolean;
  total: number;
}

/**
 * Width/height ratio of the file, or 0 when either dimension is unknown.
 */
export function aspectRatio(usage: Pick<ImageUsageRecord, 'fullWidth' | 'fullHeight'>): number {
  const { fullWidth, fullHeight } = usage;
  if (!fullWidth || !fullHeight || fullWidth < 0 || fullHeight < 0) {
    return 0;
  }
  return fullWidth / fullHeight;
}

export class CandidateScorer {
  constructor(
    private readonly scores: ScoringConfig,
    private readonly blacklist: ReadonlySet<string> = new Set()
  ) {}

  /**
   * The more the better; anything at or below zero must not be chosen.
   */
  score(usage: ImageUsageRecord): number {
    return this.breakdown(usage).total;
  }

  breakdown(usage: ImageUsageRecord): ScoreBreakdown {
    const width = lookupScore(usage.declaredWidth, this.scores.width);
    const position = positionScore(usage.ordinal, this.scores.position);
    const ratio = lookupScore(Math.trunc(aspectRatio(usage) * 10), this.scores.ratio);
    const blacklisted = this.blacklist.has(usage.imageId);

    return {
      width,
      position,
      ratio,
      blacklisted,
      total: blacklisted ? BLACKLISTED_SCORE : width + position + ratio,
    };
  }
}
