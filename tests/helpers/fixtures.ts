import { ScoringConfig } from '../../src/config/config';
import { toPositionScores, toScoreTable } from '../../src/scoring/scoreTable';
import { ImageUsageRecord } from '../../src/types/usage';

export function usage(overrides: Partial<ImageUsageRecord> & Pick<ImageUsageRecord, 'imageId'>): ImageUsageRecord {
  return {
    declaredWidth: 300,
    layout: [],
    fullWidth: 300,
    fullHeight: 200,
    ordinal: 0,
    ...overrides,
  };
}

/** Three-band example tables used across the scoring tests. */
export const exampleScores: ScoringConfig = {
  width: [
    { boundary: 100, score: 5 },
    { boundary: 250, score: 10 },
    { boundary: Number.POSITIVE_INFINITY, score: 15 },
  ],
  position: toPositionScores({ 0: 10, 1: 0 }),
  ratio: [
    { boundary: 10, score: 5 },
    { boundary: 20, score: 2 },
  ],
};

export const defaultScores: ScoringConfig = {
  width: toScoreTable({ 119: -100, 400: 10, 600: 5, 601: 0 }),
  position: toPositionScores([8, 6, 4, 3]),
  ratio: toScoreTable({ 3: -100, 5: 0, 20: 5, 30: 0, 31: -100 }),
};
