import { ConfigurationError } from '../utils/errorHandler';

export interface ScoreBand {
  /** Inclusive upper limit of the band. */
  boundary: number;
  score: number;
}

/** Bands in ascending boundary order. */
export type ScoreTable = ReadonlyArray<ScoreBand>;

/** Exact ordinal → bonus; ordinals without an entry score 0. */
export type PositionScores = ReadonlyMap<number, number>;

/**
 * Returns the score of the first band whose boundary is not exceeded by value.
 * Values above every boundary take the last band's score; an empty table scores 0.
 */
export function lookupScore(value: number, table: ScoreTable): number {
  let lastScore = 0;
  for (const { boundary, score } of table) {
    if (value <= boundary) {
      return score;
    }
    lastScore = score;
  }
  return lastScore;
}

export function positionScore(ordinal: number, scores: PositionScores): number {
  return scores.get(ordinal) ?? 0;
}

/**
 * Builds a table from a { "<boundary>": score } map, as found in configuration files.
 */
export function toScoreTable(map: Readonly<Record<string, number>>, name: string = 'score'): ScoreTable {
  const bands: ScoreBand[] = Object.entries(map).map(([key, score]) => {
    const boundary = Number(key);
    if (key.trim() === '' || !Number.isFinite(boundary)) {
      throw new ConfigurationError(`Score table "${name}" has a non-numeric boundary "${key}"`);
    }
    return { boundary, score };
  });
  return bands.sort((a, b) => a.boundary - b.boundary);
}

/**
 * Accepts either a list indexed by ordinal ([8, 6, 4, 3]) or a { "<ordinal>": score } map.
 */
export function toPositionScores(source: ReadonlyArray<number> | Readonly<Record<string, number>>): PositionScores {
  const scores = new Map<number, number>();
  if (isScoreList(source)) {
    source.forEach((score, ordinal) => scores.set(ordinal, score));
    return scores;
  }
  for (const [key, score] of Object.entries(source)) {
    const ordinal = Number(key);
    if (!Number.isInteger(ordinal) || ordinal < 0) {
      throw new ConfigurationError(`Position scores have an invalid ordinal "${key}"`);
    }
    scores.set(ordinal, score);
  }
  return scores;
}

function isScoreList(source: ReadonlyArray<number> | Readonly<Record<string, number>>): source is ReadonlyArray<number> {
  return Array.isArray(source);
}
