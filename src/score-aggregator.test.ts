// Unit tests for the score aggregator

import { describe, it, expect } from "vitest";
import {
  DEFAULT_SMOOTHING_ALPHA,
  aggregate,
  clamp01,
  exponentialMovingAverage,
  rawAnxiety,
  rawConfidence,
} from "./score-aggregator.js";
import { neutralVector } from "./metric-normalizer.js";
import type { FacialMetrics, MetricVector, VocalMetrics } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeVector(facial: Partial<FacialMetrics> = {}, vocal: Partial<VocalMetrics> = {}): MetricVector {
  const base = neutralVector();
  return {
    facial: { ...base.facial, ...facial },
    vocal: { ...base.vocal, ...vocal },
    sources: base.sources,
  };
}

/** A composed, engaged candidate who barely uses fillers. */
const CONFIDENT = makeVector({ positivity: 0.9, engagement: 0.8 }, { fillerRatio: 0.05 });

describe("rawConfidence / rawAnxiety", () => {
  it("scores the neutral vector at 0.5 / 0.5", () => {
    expect(rawConfidence(neutralVector())).toBeCloseTo(0.5, 10);
    expect(rawAnxiety(neutralVector())).toBeCloseTo(0.5, 10);
  });

  it("rewards positivity and engagement", () => {
    // (0.5 + 0.45 + 0.24 - 0.02 - 0.15 + 0.2) / 1.5
    expect(rawConfidence(CONFIDENT)).toBeCloseTo(1.22 / 1.5, 10);
    expect(rawAnxiety(CONFIDENT)).toBeCloseTo(0.3875, 10);
  });

  it("spans the full unit range at the extremes", () => {
    const best = makeVector({ positivity: 1, engagement: 1 }, { fillerRatio: 0, mumbleScore: 0 });
    const worst = makeVector({ positivity: 0, engagement: 0, anxiety: 1 }, { fillerRatio: 1, mumbleScore: 1 });
    expect(rawConfidence(best)).toBeCloseTo(1, 10);
    expect(rawConfidence(worst)).toBeCloseTo(0, 10);
    expect(rawAnxiety(worst)).toBeCloseTo(1, 10);
  });

  it("weights facial anxiety most heavily", () => {
    const anxious = makeVector({ anxiety: 0.9 }, { fillerRatio: 0.5 });
    expect(rawAnxiety(anxious)).toBeCloseTo(0.74, 10);
  });

  it("ignores speech rate", () => {
    const fast = makeVector({}, { speechRateWpm: 240 });
    expect(rawConfidence(fast)).toBeCloseTo(rawConfidence(neutralVector()), 10);
    expect(rawAnxiety(fast)).toBeCloseTo(rawAnxiety(neutralVector()), 10);
  });
});

describe("clamp01", () => {
  it.each([
    [-0.5, 0],
    [0.25, 0.25],
    [1.5, 1],
    [Number.NaN, 0],
  ])("clamp01(%s) = %s", (input, expected) => {
    expect(clamp01(input)).toBe(expected);
  });
});

describe("exponentialMovingAverage", () => {
  it("returns 0 for no values", () => {
    expect(exponentialMovingAverage([], 0.4)).toBe(0);
  });

  it("seeds with the oldest value", () => {
    expect(exponentialMovingAverage([0.7], 0.4)).toBe(0.7);
  });

  it("gives the newest value weight alpha", () => {
    expect(exponentialMovingAverage([0, 1], 0.4)).toBeCloseTo(0.4, 10);
    expect(exponentialMovingAverage([0, 1, 1], 0.4)).toBeCloseTo(0.64, 10);
  });

  it("follows the newest value exactly when alpha is 1", () => {
    expect(exponentialMovingAverage([0.1, 0.9, 0.3], 1)).toBe(0.3);
  });
});

describe("aggregate", () => {
  it("uses raw scores with fewer than two history entries", () => {
    const scores = aggregate(CONFIDENT, [neutralVector()], { now: 1234 });
    expect(scores.confidence).toBeCloseTo(rawConfidence(CONFIDENT), 10);
    expect(scores.anxiety).toBeCloseTo(rawAnxiety(CONFIDENT), 10);
    expect(scores.computedAt).toBe(1234);
  });

  it("smooths against history once two entries exist", () => {
    const scores = aggregate(CONFIDENT, [neutralVector(), neutralVector()]);
    // 0.4 * 0.81333 + 0.6 * 0.5
    expect(scores.confidence).toBeCloseTo(0.4 * (1.22 / 1.5) + 0.6 * 0.5, 10);
    expect(scores.anxiety).toBeCloseTo(0.4 * 0.3875 + 0.6 * 0.5, 10);
  });

  it("honours a custom smoothing alpha", () => {
    const scores = aggregate(CONFIDENT, [neutralVector(), neutralVector()], { smoothingAlpha: 1 });
    expect(scores.confidence).toBeCloseTo(rawConfidence(CONFIDENT), 10);
  });

  it("defaults computedAt to 0 and alpha to 0.4", () => {
    expect(DEFAULT_SMOOTHING_ALPHA).toBe(0.4);
    expect(aggregate(neutralVector(), []).computedAt).toBe(0);
  });

  it("does not modify the history it is given", () => {
    const history = [neutralVector(), CONFIDENT];
    const copy = structuredClone(history);
    aggregate(CONFIDENT, history);
    expect(history).toEqual(copy);
  });
});
