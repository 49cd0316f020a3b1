import { ImageUsageRecord } from '../types/usage';

export interface UsageScorer {
  score(usage: ImageUsageRecord): number;
}

export interface RankedImage {
  imageId: string;
  score: number;
}

/**
 * Best score per image, in the order images were first seen.
 * An image used several times keeps its best usage.
 */
export function rankImages(records: readonly ImageUsageRecord[], scorer: UsageScorer): RankedImage[] {
  const scores = new Map<string, number>();
  const ordered = [...records].sort((a, b) => a.ordinal - b.ordinal);

  for (const record of ordered) {
    const previous = scores.get(record.imageId) ?? -1;
    scores.set(record.imageId, Math.max(previous, scorer.score(record)));
  }

  return Array.from(scores, ([imageId, score]) => ({ imageId, score }));
}

/**
 * Picks the highest-scoring image. Ties go to the image seen first on the page,
 * and nothing is chosen unless the winner scores above zero.
 */
export function selectBestImage(records: readonly ImageUsageRecord[], scorer: UsageScorer): string | null {
  let best: RankedImage | null = null;

  for (const candidate of rankImages(records, scorer)) {
    if (candidate.score > 0 && (!best || candidate.score > best.score)) {
      best = candidate;
    }
  }

  return best ? best.imageId : null;
}
