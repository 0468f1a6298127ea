// Interview Coach Engine - Session Store
// Holds per-session coaching state between ticks. In-memory only.
//
// Concurrency: a tick (get → evaluate → update) runs synchronously, so Node's
// single thread already serializes read-modify-write for a session, including
// duplicate retries of the same request.

import type { RuleConfig, SessionState } from "./types.js";
import { MetricHistory } from "./metric-history.js";

export class SessionStore {
  private sessions: Map<string, SessionState> = new Map();
  private readonly configSource: () => RuleConfig;

  /**
   * @param configSource - Returns the active rule config; consulted only when a
   *   session is created, for its initial state and history capacity.
   */
  constructor(configSource: () => RuleConfig) {
    this.configSource = configSource;
  }

  /**
   * Returns the session, creating it in the config's initial state if absent.
   * Unknown ids are never an error: session lifecycle is owned by the caller.
   */
  get(sessionId: string, now: number = Date.now()): SessionState {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const config = this.configSource();
    const session: SessionState = {
      sessionId,
      currentStateId: config.initialStateId,
      enteredStateAt: now,
      metricHistory: new MetricHistory(config.policy.historyCapacity),
      lastVector: null,
      lastScores: null,
      tickCount: 0,
      createdAt: now,
      lastActivityAt: now,
    };
    this.sessions.set(sessionId, session);
    return session;
  }

  /** Returns the session without creating it. */
  peek(sessionId: string): SessionState | undefined {
    return this.sessions.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  update(sessionId: string, session: SessionState): void {
    if (session.sessionId !== sessionId) {
      throw new Error(`Session id mismatch: cannot store session ${session.sessionId} under ${sessionId}`);
    }
    this.sessions.set(sessionId, session);
  }

  /** Returns true if a session was removed. */
  remove(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /** Removes sessions idle for at least `idleMs` and returns their ids. */
  pruneIdle(now: number, idleMs: number): string[] {
    const pruned: string[] = [];
    for (const [id, session] of this.sessions) {
      if (now - session.lastActivityAt >= idleMs) {
        pruned.push(id);
      }
    }
    for (const id of pruned) {
      this.sessions.delete(id);
    }
    return pruned;
  }

  ids(): string[] {
    return [...this.sessions.keys()];
  }

  get size(): number {
    return this.sessions.size;
  }
}
