// Interview Coach Engine - Coaching State Machine
// Selects one coaching state per tick under guard, priority and cooldown rules.
//
// Flat machine, no terminal state:
//
//   candidates = states whose guard holds            (empty → [default])
//   candidate  = highest priority, earliest declared on ties
//   candidate == current          → stay, cooldown timer untouched
//   candidate != current          → move only if
//        - current.cooldownMs has elapsed since enteredStateAt, or
//        - candidate.priority − current.priority ≥ overrideMargin
//
// A new session enters its initial state when it is created, so time spent
// there counts toward that state's cooldown.
//
// evaluate() never mutates its input session; it returns a new one.

import type {
  MetricVector,
  RuleConfig,
  ScorePair,
  SessionState,
  StateDefinition,
  StateResponse,
} from "./types.js";
import { evaluateGuard } from "./guard.js";

export type BlockReason = "cooldown";

export interface EvaluationResult {
  nextStateId: string;
  response: StateResponse;
  session: SessionState;
  /** True when this tick moved the session to a different state. */
  transitioned: boolean;
  /** Set when a different state was selected but the move was refused. */
  blocked: { candidateId: string; reason: BlockReason; remainingMs: number } | null;
}

/** Higher priority wins; ties go to the state declared first. */
function outranks(a: StateDefinition, b: StateDefinition): boolean {
  if (a.priority !== b.priority) return a.priority > b.priority;
  return a.declarationIndex < b.declarationIndex;
}

/**
 * Pick the state the scores call for, ignoring cooldowns.
 * Falls back to `defaultState` when no guard holds.
 */
export function selectCandidate(
  states: readonly StateDefinition[],
  defaultState: StateDefinition,
  vector: MetricVector,
  scores: ScorePair,
): StateDefinition {
  let best: StateDefinition | null = null;
  for (const state of states) {
    if (!evaluateGuard(state.guard, vector, scores)) continue;
    if (best === null || outranks(state, best)) {
      best = state;
    }
  }
  return best ?? defaultState;
}

/** The state declared under `stateId`, if the config still has one. */
export function findState(config: RuleConfig, stateId: string): StateDefinition | undefined {
  return config.states.find((state) => state.id === stateId);
}

/** Milliseconds of cooldown left before a non-override move away from `current` is allowed. */
function remainingCooldown(session: SessionState, current: StateDefinition, now: number): number {
  return Math.max(0, current.cooldownMs - (now - session.enteredStateAt));
}

export function evaluate(
  session: SessionState,
  vector: MetricVector,
  scores: ScorePair,
  config: RuleConfig,
  now: number,
): EvaluationResult {
  const candidate = selectCandidate(config.states, config.defaultState, vector, scores);
  // A reload may have removed the session's state; nothing then holds it in place
  const current = findState(config, session.currentStateId);

  const ticked: SessionState = {
    ...session,
    lastVector: vector,
    lastScores: scores,
    tickCount: session.tickCount + 1,
    lastActivityAt: now,
  };

  if (current && candidate.id === current.id) {
    return {
      nextStateId: current.id,
      response: current.response,
      session: ticked,
      transitioned: false,
      blocked: null,
    };
  }

  if (current) {
    const remainingMs = remainingCooldown(session, current, now);
    const isOverride = candidate.priority - current.priority >= config.policy.overrideMargin;
    if (remainingMs > 0 && !isOverride) {
      return {
        nextStateId: current.id,
        response: current.response,
        session: ticked,
        transitioned: false,
        blocked: { candidateId: candidate.id, reason: "cooldown", remainingMs },
      };
    }
  }

  const metricHistory = session.metricHistory.clone();
  metricHistory.push(vector);

  return {
    nextStateId: candidate.id,
    response: candidate.response,
    session: {
      ...ticked,
      currentStateId: candidate.id,
      enteredStateAt: now,
      metricHistory,
    },
    transitioned: true,
    blocked: null,
  };
}
