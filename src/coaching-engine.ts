// Interview Coach Engine - Coaching Engine
// The ingest entry point: one call per tick per session.
//
//   raw sample → normalizeSample → aggregate → evaluate → CoachingResponse
//
// A tick is synchronous and performs no I/O. The only async operation is a
// rule reload, which swaps the whole config at once.

import { v4 as uuidv4 } from "uuid";
import type { CoachingResponse, RuleConfig, StateDefinition } from "./types.js";
import { normalizeSample } from "./metric-normalizer.js";
import { aggregate } from "./score-aggregator.js";
import { evaluate, findState } from "./coaching-state-machine.js";
import { SessionStore } from "./session-store.js";
import type { RuleConfigHandle } from "./rule-config.js";
import { DEFAULT_FILLER_WORDS } from "./signal-features.js";
import { defaultLogger, withComponent, type Logger } from "./logger.js";
import { errorMessage } from "./utils.js";

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface CoachingEngineDeps {
  rules: RuleConfigHandle;
  /** Created over `rules` if omitted. */
  store?: SessionStore;
  /** Epoch-ms clock. Defaults to Date.now. */
  clock?: () => number;
  logger?: Logger;
  fillerWords?: readonly string[];
}

export interface SessionOpening {
  sessionId: string;
  stateId: string;
  voiceLine: string;
  subtitle: string;
  tip: string;
}

function stateOf(config: RuleConfig, stateId: string): StateDefinition {
  return findState(config, stateId) ?? config.defaultState;
}

export class CoachingEngine {
  private readonly rules: RuleConfigHandle;
  private readonly store: SessionStore;
  private readonly clock: () => number;
  private readonly log: Logger;
  private readonly fillerWords: readonly string[];

  constructor(deps: CoachingEngineDeps) {
    this.rules = deps.rules;
    this.store = deps.store ?? new SessionStore(() => deps.rules.current());
    this.clock = deps.clock ?? Date.now;
    this.log = withComponent(deps.logger ?? defaultLogger, "CoachingEngine");
    this.fillerWords = deps.fillerWords ?? DEFAULT_FILLER_WORDS;
  }

  /** Opens a session under a fresh id and returns its initial coaching line. */
  createSession(): SessionOpening {
    const sessionId = uuidv4();
    const session = this.store.get(sessionId, this.clock());
    const state = stateOf(this.rules.current(), session.currentStateId);
    this.log.info(`Session ${sessionId} opened in state "${state.id}"`);
    return { sessionId, stateId: state.id, ...state.response };
  }

  /**
   * Run one evaluation tick for `sessionId`. Any sample shape is accepted,
   * including `{}`; unknown sessions are created on the spot.
   */
  ingest(sessionId: string, rawSample: unknown): CoachingResponse {
    const now = this.clock();
    const config = this.rules.current();
    const session = this.store.get(sessionId, now);

    const { vector, warnings, highlights } = normalizeSample(rawSample, session.lastVector, {
      fillerWords: this.fillerWords,
    });
    for (const warning of warnings) {
      this.log.warn(
        `Malformed sample field "${warning.field}" (${warning.reason}) for session ${sessionId}: ` +
          `${JSON.stringify(warning.received) ?? String(warning.received)}`,
      );
    }

    const scores = aggregate(vector, session.metricHistory.toArray(), {
      smoothingAlpha: config.policy.smoothingAlpha,
      now,
    });
    const result = evaluate(session, vector, scores, config, now);
    this.store.update(sessionId, result.session);

    if (result.transitioned) {
      this.log.info(
        `Session ${sessionId}: "${session.currentStateId}" → "${result.nextStateId}" ` +
          `(confidence=${scores.confidence.toFixed(2)}, anxiety=${scores.anxiety.toFixed(2)})`,
      );
    }

    return {
      sessionId,
      stateId: result.nextStateId,
      ...result.response,
      confidence: scores.confidence,
      anxiety: scores.anxiety,
      transitioned: result.transitioned,
      transcriptHighlights: highlights,
      computedAt: scores.computedAt,
    };
  }

  /** Returns true if the session existed. */
  closeSession(sessionId: string): boolean {
    const removed = this.store.remove(sessionId);
    if (removed) {
      this.log.info(`Session ${sessionId} closed`);
    }
    return removed;
  }

  hasSession(sessionId: string): boolean {
    return this.store.has(sessionId);
  }

  /**
   * Swap in a freshly loaded rule config. On failure the active rules stay in
   * place and the error propagates to the caller.
   */
  async reloadRules(loader: () => RuleConfig | Promise<RuleConfig>): Promise<RuleConfig> {
    try {
      const next = await this.rules.reload(loader);
      this.log.info(`Rules reloaded: ${next.states.length} states, default "${next.defaultStateId}"`);
      return next;
    } catch (err) {
      this.log.error(`Rule reload rejected, keeping current rules: ${errorMessage(err)}`);
      throw err;
    }
  }

  /** Drops sessions with no tick for `idleMs`. Returns the dropped ids. */
  pruneIdleSessions(idleMs: number): string[] {
    const pruned = this.store.pruneIdle(this.clock(), idleMs);
    if (pruned.length > 0) {
      this.log.info(`Pruned ${pruned.length} idle session(s)`);
    }
    return pruned;
  }

  currentConfig(): RuleConfig {
    return this.rules.current();
  }

  get sessionCount(): number {
    return this.store.size;
  }
}
