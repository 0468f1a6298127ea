// Interview Coach Engine - Shared TypeScript interfaces and types
//
// Everything that crosses a module boundary lives here so the normalizer,
// aggregator, rule config, state machine and server agree on one vocabulary.

import type { MetricHistory } from "./metric-history.js";

// ─── Metric Vector ──────────────────────────────────────────────────────────────

export interface FacialMetrics {
  engagement: number; // [0,1]
  positivity: number; // [0,1]
  anxiety: number; // [0,1]
}

export interface VocalMetrics {
  fillerRatio: number; // [0,1]
  mumbleScore: number; // [0,1]
  speechRateWpm: number; // >= 0
}

/** Dotted path of every field a MetricVector carries. */
export type MetricField =
  | "facial.engagement"
  | "facial.positivity"
  | "facial.anxiety"
  | "vocal.fillerRatio"
  | "vocal.mumbleScore"
  | "vocal.speechRateWpm";

/**
 * Where a field's value came from on this tick:
 * - `sample`: present in the raw sample (possibly clamped)
 * - `carried`: reused from the session's previous vector
 * - `neutral`: never observed for this session
 */
export type MetricSource = "sample" | "carried" | "neutral";

export interface MetricVector {
  facial: FacialMetrics;
  vocal: VocalMetrics;
  sources: Record<MetricField, MetricSource>;
}

// ─── Raw Signal Sample ──────────────────────────────────────────────────────────

/**
 * Best-effort payload assembled from whatever the upstream providers managed
 * to produce for a tick. Every part is optional; the normalizer reads it
 * defensively and never trusts the declared types.
 */
export interface RawSignalSample {
  facial?: {
    engagement?: number;
    positivity?: number;
    anxiety?: number;
    /** Emotion confidences in percent, keyed by label (happy, calm, fear, ...). */
    emotions?: Record<string, number>;
  } | null;
  vocal?: {
    fillerRatio?: number;
    mumbleScore?: number;
    speechRateWpm?: number;
  } | null;
  transcript?: {
    text?: string;
    segments?: string[];
    fillerCount?: number;
    wordCount?: number;
    durationSeconds?: number;
  } | null;
}

export interface MalformedSampleWarning {
  field: string;
  reason: "out_of_range" | "invalid_type" | "not_finite";
  received: unknown;
}

// ─── Scores ─────────────────────────────────────────────────────────────────────

export interface ScorePair {
  confidence: number; // [0,1]
  anxiety: number; // [0,1]
  computedAt: number; // epoch ms
}

export type ScoreField = "confidence" | "anxiety";

/** Any field a guard clause may reference. */
export type GuardField = MetricField | ScoreField;

// ─── Rule Config ────────────────────────────────────────────────────────────────

export type Comparator = ">=" | ">" | "<=" | "<" | "==" | "!=";

export interface GuardClause {
  field: GuardField;
  comparator: Comparator;
  literal: number;
}

/** Conjunction of clauses; the empty conjunction always holds. */
export interface Guard {
  clauses: readonly GuardClause[];
}

export interface StateResponse {
  voiceLine: string;
  subtitle: string;
  tip: string;
}

export interface StateDefinition {
  id: string;
  priority: number;
  guard: Guard;
  cooldownMs: number;
  response: StateResponse;
  /** Position in the source document; lower wins priority ties. */
  declarationIndex: number;
}

export interface RulePolicy {
  /** EMA weight of the most recent score. */
  smoothingAlpha: number;
  /** Priority gap a candidate needs to preempt an unexpired cooldown. */
  overrideMargin: number;
  /** Capacity K of each session's metric history. */
  historyCapacity: number;
}

export interface RuleConfig {
  states: readonly StateDefinition[];
  defaultStateId: string;
  defaultState: StateDefinition;
  /** State selected for an all-neutral first tick. */
  initialStateId: string;
  policy: RulePolicy;
}

// ─── Session ────────────────────────────────────────────────────────────────────

export interface SessionState {
  sessionId: string;
  currentStateId: string;
  /** When the current state became active; a new session enters its initial state at creation. */
  enteredStateAt: number;
  metricHistory: MetricHistory;
  lastVector: MetricVector | null;
  lastScores: ScorePair | null;
  tickCount: number;
  createdAt: number;
  lastActivityAt: number;
}

// ─── Coaching Response ──────────────────────────────────────────────────────────

export interface CoachingResponse {
  sessionId: string;
  stateId: string;
  voiceLine: string;
  subtitle: string;
  tip: string;
  confidence: number;
  anxiety: number;
  transitioned: boolean;
  transcriptHighlights: string[];
  computedAt: number;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

export type ClientMessage =
  | { type: "signal_sample"; sample: unknown }
  | { type: "close_session" };

export type ServerMessage =
  | { type: "session_started"; sessionId: string; stateId: string }
  | { type: "coaching"; response: CoachingResponse }
  | { type: "session_closed"; sessionId: string }
  | { type: "error"; message: string; recoverable: boolean };
