// Interview Coach Engine - Metric Normalizer
// Converts a best-effort raw signal sample into a fixed-shape, bounded
// MetricVector. Never throws: out-of-range numbers are clamped, wrong types are
// dropped, and every gap is filled from the prior vector or the neutral value.

import type {
  MalformedSampleWarning,
  MetricField,
  MetricSource,
  MetricVector,
} from "./types.js";
import {
  DEFAULT_FILLER_WORDS,
  analyzeTranscript,
  deriveFacialFromEmotions,
  extractFillerHighlights,
} from "./signal-features.js";
import { clamp, isRecord } from "./utils.js";

// ─── Field Table ────────────────────────────────────────────────────────────────

export const METRIC_FIELDS: readonly MetricField[] = [
  "facial.engagement",
  "facial.positivity",
  "facial.anxiety",
  "vocal.fillerRatio",
  "vocal.mumbleScore",
  "vocal.speechRateWpm",
];

interface FieldRange {
  min: number;
  max: number;
}

const UNIT_RANGE: FieldRange = { min: 0, max: 1 };

export const METRIC_RANGES: Readonly<Record<MetricField, FieldRange>> = {
  "facial.engagement": UNIT_RANGE,
  "facial.positivity": UNIT_RANGE,
  "facial.anxiety": UNIT_RANGE,
  "vocal.fillerRatio": UNIT_RANGE,
  "vocal.mumbleScore": UNIT_RANGE,
  "vocal.speechRateWpm": { min: 0, max: Number.POSITIVE_INFINITY },
};

/**
 * Value used for a field the session has never observed. Unit-range fields sit
 * at the midpoint; speech rate sits at a typical conversational pace.
 */
export const NEUTRAL_METRICS: Readonly<Record<MetricField, number>> = {
  "facial.engagement": 0.5,
  "facial.positivity": 0.5,
  "facial.anxiety": 0.5,
  "vocal.fillerRatio": 0.5,
  "vocal.mumbleScore": 0.5,
  "vocal.speechRateWpm": 130,
};

export function readMetricField(vector: MetricVector, field: MetricField): number {
  switch (field) {
    case "facial.engagement":
      return vector.facial.engagement;
    case "facial.positivity":
      return vector.facial.positivity;
    case "facial.anxiety":
      return vector.facial.anxiety;
    case "vocal.fillerRatio":
      return vector.vocal.fillerRatio;
    case "vocal.mumbleScore":
      return vector.vocal.mumbleScore;
    case "vocal.speechRateWpm":
      return vector.vocal.speechRateWpm;
  }
}

/** Builds a complete per-field record from one function of the field. */
export function mapMetricFields<T>(fn: (field: MetricField) => T): Record<MetricField, T> {
  return {
    "facial.engagement": fn("facial.engagement"),
    "facial.positivity": fn("facial.positivity"),
    "facial.anxiety": fn("facial.anxiety"),
    "vocal.fillerRatio": fn("vocal.fillerRatio"),
    "vocal.mumbleScore": fn("vocal.mumbleScore"),
    "vocal.speechRateWpm": fn("vocal.speechRateWpm"),
  };
}

function buildVector(
  values: Record<MetricField, number>,
  sources: Record<MetricField, MetricSource>,
): MetricVector {
  return {
    facial: {
      engagement: values["facial.engagement"],
      positivity: values["facial.positivity"],
      anxiety: values["facial.anxiety"],
    },
    vocal: {
      fillerRatio: values["vocal.fillerRatio"],
      mumbleScore: values["vocal.mumbleScore"],
      speechRateWpm: values["vocal.speechRateWpm"],
    },
    sources,
  };
}

/** The vector of a session that has observed nothing yet. */
export function neutralVector(): MetricVector {
  return buildVector({ ...NEUTRAL_METRICS }, mapMetricFields((): MetricSource => "neutral"));
}

// ─── Defensive Readers ──────────────────────────────────────────────────────────

type UnknownRecord = Record<string, unknown>;

/** Reads an optional object section; anything else present is reported. */
function readSection(
  sample: UnknownRecord,
  key: string,
  warnings: MalformedSampleWarning[],
): UnknownRecord | undefined {
  const value = sample[key];
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    warnings.push({ field: key, reason: "invalid_type", received: value });
    return undefined;
  }
  return value;
}

/**
 * Reads an optional number and clamps it to `range`.
 * Returns undefined when absent or unusable.
 */
function readNumber(
  section: UnknownRecord | undefined,
  key: string,
  field: string,
  range: FieldRange,
  warnings: MalformedSampleWarning[],
): number | undefined {
  if (!section) return undefined;
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "number") {
    warnings.push({ field, reason: "invalid_type", received: value });
    return undefined;
  }
  if (!Number.isFinite(value)) {
    warnings.push({ field, reason: "not_finite", received: value });
    return undefined;
  }
  if (value < range.min || value > range.max) {
    warnings.push({ field, reason: "out_of_range", received: value });
    return clamp(value, range.min, range.max);
  }
  return value;
}

function readString(
  section: UnknownRecord | undefined,
  key: string,
  field: string,
  warnings: MalformedSampleWarning[],
): string | undefined {
  if (!section) return undefined;
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    warnings.push({ field, reason: "invalid_type", received: value });
    return undefined;
  }
  return value;
}

function readStringList(
  section: UnknownRecord | undefined,
  key: string,
  field: string,
  warnings: MalformedSampleWarning[],
): string[] | undefined {
  if (!section) return undefined;
  const value = section[key];
  if (value === undefined || value === null) return undefined;
  if (!Array.isArray(value)) {
    warnings.push({ field, reason: "invalid_type", received: value });
    return undefined;
  }
  const strings: string[] = [];
  value.forEach((item, index) => {
    if (typeof item === "string") {
      strings.push(item);
    } else {
      warnings.push({ field: `${field}[${index}]`, reason: "invalid_type", received: item });
    }
  });
  return strings;
}

function readEmotions(
  section: UnknownRecord | undefined,
  warnings: MalformedSampleWarning[],
): Record<string, number> | undefined {
  if (!section) return undefined;
  const value = section.emotions;
  if (value === undefined || value === null) return undefined;
  if (!isRecord(value)) {
    warnings.push({ field: "facial.emotions", reason: "invalid_type", received: value });
    return undefined;
  }
  const emotions: Record<string, number> = {};
  let found = 0;
  for (const key of Object.keys(value)) {
    const score = readNumber(value, key, `facial.emotions.${key}`, { min: 0, max: 100 }, warnings);
    if (score !== undefined) {
      emotions[key] = score;
      found++;
    }
  }
  return found > 0 ? emotions : undefined;
}

// ─── Normalizer ─────────────────────────────────────────────────────────────────

export interface NormalizeOptions {
  fillerWords?: readonly string[];
}

export interface NormalizedSample {
  vector: MetricVector;
  warnings: MalformedSampleWarning[];
  /** Transcript segments containing filler words, for display alongside the tip. */
  highlights: string[];
}

/**
 * Normalize a raw sample, reporting every malformed field instead of failing.
 *
 * Resolution order per field: explicit value in the sample, value derived from
 * richer sample data (emotion confidences, transcript), prior vector, neutral.
 */
export function normalizeSample(
  rawSample: unknown,
  priorVector?: MetricVector | null,
  options: NormalizeOptions = {},
): NormalizedSample {
  const fillerWords = options.fillerWords ?? DEFAULT_FILLER_WORDS;
  const warnings: MalformedSampleWarning[] = [];

  let sample: UnknownRecord = {};
  if (isRecord(rawSample)) {
    sample = rawSample;
  } else if (rawSample !== undefined && rawSample !== null) {
    warnings.push({ field: "sample", reason: "invalid_type", received: rawSample });
  }

  const facial = readSection(sample, "facial", warnings);
  const vocal = readSection(sample, "vocal", warnings);
  const transcript = readSection(sample, "transcript", warnings);

  const observed: Partial<Record<MetricField, number>> = {};
  const observe = (field: MetricField, section: UnknownRecord | undefined, key: string): void => {
    const value = readNumber(section, key, field, METRIC_RANGES[field], warnings);
    if (value !== undefined) observed[field] = value;
  };

  observe("facial.engagement", facial, "engagement");
  observe("facial.positivity", facial, "positivity");
  observe("facial.anxiety", facial, "anxiety");
  observe("vocal.fillerRatio", vocal, "fillerRatio");
  observe("vocal.mumbleScore", vocal, "mumbleScore");
  observe("vocal.speechRateWpm", vocal, "speechRateWpm");

  // Emotion confidences fill whichever facial fields were not given directly
  const emotions = readEmotions(facial, warnings);
  if (emotions) {
    const derived = deriveFacialFromEmotions(emotions);
    observed["facial.engagement"] ??= derived.engagement;
    observed["facial.positivity"] ??= derived.positivity;
    observed["facial.anxiety"] ??= derived.anxiety;
  }

  // Transcript statistics fill whichever vocal fields were not given directly
  const nonNegative: FieldRange = { min: 0, max: Number.POSITIVE_INFINITY };
  const text = readString(transcript, "text", "transcript.text", warnings);
  const segments = readStringList(transcript, "segments", "transcript.segments", warnings) ?? [];
  const fillerCount = readNumber(transcript, "fillerCount", "transcript.fillerCount", nonNegative, warnings);
  const wordCount = readNumber(transcript, "wordCount", "transcript.wordCount", nonNegative, warnings);
  const durationSeconds = readNumber(
    transcript,
    "durationSeconds",
    "transcript.durationSeconds",
    nonNegative,
    warnings,
  );

  const fullText = text !== undefined && text.trim().length > 0 ? text : segments.join(" ");
  const analysis = fullText.trim().length > 0 ? analyzeTranscript(fullText, fillerWords) : null;

  if (observed["vocal.fillerRatio"] === undefined) {
    if (fillerCount !== undefined && wordCount !== undefined && wordCount > 0) {
      const ratio = fillerCount / wordCount;
      if (ratio > 1) {
        warnings.push({ field: "vocal.fillerRatio", reason: "out_of_range", received: ratio });
      }
      observed["vocal.fillerRatio"] = Math.min(1, ratio);
    } else if (analysis) {
      observed["vocal.fillerRatio"] = analysis.fillerRatio;
    }
  }

  if (observed["vocal.mumbleScore"] === undefined && analysis) {
    observed["vocal.mumbleScore"] = analysis.mumbleScore;
  }

  if (observed["vocal.speechRateWpm"] === undefined && durationSeconds !== undefined && durationSeconds > 0) {
    const words = wordCount ?? analysis?.wordCount;
    const rate = words !== undefined ? words / (durationSeconds / 60) : Number.NaN;
    if (Number.isFinite(rate)) {
      observed["vocal.speechRateWpm"] = rate;
    }
  }

  // Carry forward, then neutral
  const sources = mapMetricFields((field): MetricSource => {
    if (observed[field] !== undefined) return "sample";
    if (priorVector && priorVector.sources[field] !== "neutral") return "carried";
    return "neutral";
  });
  const values = mapMetricFields((field) => {
    const fresh = observed[field];
    if (fresh !== undefined) return fresh;
    if (priorVector) return readMetricField(priorVector, field);
    return NEUTRAL_METRICS[field];
  });

  const highlightSource = segments.length > 0 ? segments : text !== undefined ? [text] : [];

  return {
    vector: buildVector(values, sources),
    warnings,
    highlights: extractFillerHighlights(highlightSource, fillerWords),
  };
}

/** Normalize a raw sample into a MetricVector, discarding diagnostics. */
export function normalize(rawSample: unknown, priorVector?: MetricVector | null): MetricVector {
  return normalizeSample(rawSample, priorVector).vector;
}
