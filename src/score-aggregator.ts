// Interview Coach Engine - Score Aggregator
// Combines a MetricVector (optionally smoothed against recent history) into
// confidence and anxiety scores in [0,1]. Deterministic, no I/O.

import type { MetricVector, ScorePair } from "./types.js";

// ─── Weights ────────────────────────────────────────────────────────────────────

const CONFIDENCE_BASE = 0.5;
const CONFIDENCE_WEIGHTS = {
  positivity: 0.5,
  engagement: 0.3,
  fillerRatio: -0.4,
  mumbleScore: -0.3,
} as const;

// Theoretical range of the weighted confidence sum with every input in [0,1]
const CONFIDENCE_SUM_MIN = CONFIDENCE_BASE + CONFIDENCE_WEIGHTS.fillerRatio + CONFIDENCE_WEIGHTS.mumbleScore;
const CONFIDENCE_SUM_MAX = CONFIDENCE_BASE + CONFIDENCE_WEIGHTS.positivity + CONFIDENCE_WEIGHTS.engagement;

const ANXIETY_WEIGHTS = {
  facialAnxiety: 0.6,
  fillerRatio: 0.25,
  mumbleScore: 0.15,
} as const;

export const DEFAULT_SMOOTHING_ALPHA = 0.4;

/** Smoothing only kicks in once the history holds at least this many vectors. */
const MIN_HISTORY_FOR_SMOOTHING = 2;

// ─── Helpers ────────────────────────────────────────────────────────────────────

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/** Unsmoothed confidence for a single vector, min-max scaled to [0,1]. */
export function rawConfidence(vector: MetricVector): number {
  const sum =
    CONFIDENCE_BASE +
    CONFIDENCE_WEIGHTS.positivity * vector.facial.positivity +
    CONFIDENCE_WEIGHTS.engagement * vector.facial.engagement +
    CONFIDENCE_WEIGHTS.fillerRatio * vector.vocal.fillerRatio +
    CONFIDENCE_WEIGHTS.mumbleScore * vector.vocal.mumbleScore;
  return clamp01((sum - CONFIDENCE_SUM_MIN) / (CONFIDENCE_SUM_MAX - CONFIDENCE_SUM_MIN));
}

/** Unsmoothed anxiety for a single vector. */
export function rawAnxiety(vector: MetricVector): number {
  return clamp01(
    ANXIETY_WEIGHTS.facialAnxiety * vector.facial.anxiety +
      ANXIETY_WEIGHTS.fillerRatio * vector.vocal.fillerRatio +
      ANXIETY_WEIGHTS.mumbleScore * vector.vocal.mumbleScore,
  );
}

/**
 * Exponential moving average over values ordered oldest → newest, seeded with
 * the oldest value. The newest value carries weight `alpha`.
 */
export function exponentialMovingAverage(values: readonly number[], alpha: number): number {
  if (values.length === 0) return 0;
  let ema = values[0];
  for (let i = 1; i < values.length; i++) {
    ema = alpha * values[i] + (1 - alpha) * ema;
  }
  return ema;
}

// ─── Aggregator ─────────────────────────────────────────────────────────────────

export interface AggregateOptions {
  /** EMA weight of the newest score. Default: 0.4 */
  smoothingAlpha?: number;
  /** Timestamp stamped on the result. Default: 0 */
  now?: number;
}

/**
 * Compute the score pair for `vector`.
 *
 * `history` holds the session's earlier vectors, oldest first, and does not
 * include `vector`. With two or more history entries the scores are the EMA
 * of `[...history, vector]`; otherwise the raw scores of `vector`.
 */
export function aggregate(
  vector: MetricVector,
  history: readonly MetricVector[],
  options: AggregateOptions = {},
): ScorePair {
  const alpha = options.smoothingAlpha ?? DEFAULT_SMOOTHING_ALPHA;
  const computedAt = options.now ?? 0;

  if (history.length < MIN_HISTORY_FOR_SMOOTHING) {
    return {
      confidence: rawConfidence(vector),
      anxiety: rawAnxiety(vector),
      computedAt,
    };
  }

  const series = [...history, vector];
  return {
    confidence: clamp01(exponentialMovingAverage(series.map(rawConfidence), alpha)),
    anxiety: clamp01(exponentialMovingAverage(series.map(rawAnxiety), alpha)),
    computedAt,
  };
}
