// Interview Coach Engine - Rule Config
// Loads and validates the coaching state table. Validation runs once per load;
// every problem surfaces as a ConfigLoadError naming the state and field at
// fault. A loaded RuleConfig is frozen and shared by every session.

import { readFile } from "node:fs/promises";
import type { RuleConfig, RulePolicy, StateDefinition, StateResponse } from "./types.js";
import { ConfigLoadError } from "./errors.js";
import { formatGuard, isAlwaysTrue, parseGuard } from "./guard.js";
import { neutralVector } from "./metric-normalizer.js";
import { aggregate, DEFAULT_SMOOTHING_ALPHA } from "./score-aggregator.js";
import { selectCandidate } from "./coaching-state-machine.js";
import { errorMessage, isRecord } from "./utils.js";

// ─── Policy Defaults ────────────────────────────────────────────────────────────

export const DEFAULT_POLICY: Readonly<RulePolicy> = Object.freeze({
  smoothingAlpha: DEFAULT_SMOOTHING_ALPHA,
  overrideMargin: 50,
  historyCapacity: 5,
});

const MAX_HISTORY_CAPACITY = 1000;

// ─── Field Parsers ──────────────────────────────────────────────────────────────

function parsePolicy(raw: unknown): RulePolicy {
  if (raw === undefined || raw === null) return { ...DEFAULT_POLICY };
  if (!isRecord(raw)) {
    throw new ConfigLoadError("policy must be an object", { field: "policy" });
  }

  const smoothingAlpha = raw.smoothingAlpha ?? DEFAULT_POLICY.smoothingAlpha;
  if (typeof smoothingAlpha !== "number" || !(smoothingAlpha > 0 && smoothingAlpha <= 1)) {
    throw new ConfigLoadError(`smoothingAlpha must be a number in (0, 1], got ${JSON.stringify(smoothingAlpha)}`, {
      field: "policy.smoothingAlpha",
    });
  }

  const overrideMargin = raw.overrideMargin ?? DEFAULT_POLICY.overrideMargin;
  if (typeof overrideMargin !== "number" || !Number.isInteger(overrideMargin) || overrideMargin < 1) {
    throw new ConfigLoadError(`overrideMargin must be a positive integer, got ${JSON.stringify(overrideMargin)}`, {
      field: "policy.overrideMargin",
    });
  }

  const historyCapacity = raw.historyCapacity ?? DEFAULT_POLICY.historyCapacity;
  if (
    typeof historyCapacity !== "number" ||
    !Number.isInteger(historyCapacity) ||
    historyCapacity < 1 ||
    historyCapacity > MAX_HISTORY_CAPACITY
  ) {
    throw new ConfigLoadError(
      `historyCapacity must be an integer in [1, ${MAX_HISTORY_CAPACITY}], got ${JSON.stringify(historyCapacity)}`,
      { field: "policy.historyCapacity" },
    );
  }

  return { smoothingAlpha, overrideMargin, historyCapacity };
}

function parseResponse(raw: unknown, stateId: string): StateResponse {
  if (!isRecord(raw)) {
    throw new ConfigLoadError("response must be an object", { stateId, field: "response" });
  }
  const text = (key: keyof StateResponse): string => {
    const value = raw[key];
    if (typeof value !== "string" || value.trim().length === 0) {
      throw new ConfigLoadError(`${key} must be a non-empty string`, { stateId, field: `response.${key}` });
    }
    return value;
  };
  return Object.freeze({ voiceLine: text("voiceLine"), subtitle: text("subtitle"), tip: text("tip") });
}

interface ParsedState {
  definition: StateDefinition;
  flaggedDefault: boolean;
}

function parseState(raw: unknown, index: number): ParsedState {
  if (!isRecord(raw)) {
    throw new ConfigLoadError("state must be an object", { field: `states[${index}]` });
  }

  const id = raw.id;
  if (typeof id !== "string" || id.trim().length === 0) {
    throw new ConfigLoadError("state id must be a non-empty string", { field: `states[${index}].id` });
  }

  const priority = raw.priority;
  if (typeof priority !== "number" || !Number.isInteger(priority)) {
    throw new ConfigLoadError(`priority must be an integer, got ${JSON.stringify(priority)}`, {
      stateId: id,
      field: "priority",
    });
  }

  const cooldownMs = raw.cooldownMs ?? 0;
  if (typeof cooldownMs !== "number" || !Number.isInteger(cooldownMs) || cooldownMs < 0) {
    throw new ConfigLoadError(`cooldownMs must be a non-negative integer, got ${JSON.stringify(cooldownMs)}`, {
      stateId: id,
      field: "cooldownMs",
    });
  }

  const flaggedDefault = raw.default ?? false;
  if (typeof flaggedDefault !== "boolean") {
    throw new ConfigLoadError("default must be a boolean", { stateId: id, field: "default" });
  }

  const guard = parseGuard(raw.guard, id);
  if (flaggedDefault && !isAlwaysTrue(guard)) {
    throw new ConfigLoadError(
      `the default state must have an empty guard, got "${formatGuard(guard)}"`,
      { stateId: id, field: "guard" },
    );
  }

  const definition: StateDefinition = Object.freeze({
    id,
    priority,
    guard,
    cooldownMs,
    response: parseResponse(raw.response, id),
    declarationIndex: index,
  });

  return { definition, flaggedDefault };
}

// ─── Loader ─────────────────────────────────────────────────────────────────────

/**
 * Validate a parsed rule document and build the immutable RuleConfig.
 *
 * @throws ConfigLoadError on any structural or semantic problem
 */
export function loadRuleConfig(source: unknown): RuleConfig {
  if (!isRecord(source)) {
    throw new ConfigLoadError("document must be a JSON object");
  }

  const policy = Object.freeze(parsePolicy(source.policy));

  if (!Array.isArray(source.states) || source.states.length === 0) {
    throw new ConfigLoadError("states must be a non-empty array", { field: "states" });
  }

  const parsed = source.states.map((raw: unknown, index: number) => parseState(raw, index));

  const seenIds = new Set<string>();
  for (const { definition } of parsed) {
    if (seenIds.has(definition.id)) {
      throw new ConfigLoadError("duplicate state id", { stateId: definition.id, field: "id" });
    }
    seenIds.add(definition.id);
  }

  const flagged = parsed.filter((p) => p.flaggedDefault);
  if (flagged.length > 1) {
    throw new ConfigLoadError("only one state may be marked default", {
      stateId: flagged[1].definition.id,
      field: "default",
    });
  }

  const states = Object.freeze(parsed.map((p) => p.definition));
  const defaultState =
    flagged.length === 1 ? flagged[0].definition : states.find((s) => isAlwaysTrue(s.guard));
  if (!defaultState) {
    throw new ConfigLoadError(
      "no default state: at least one state needs an empty guard so every tick selects a state",
      { field: "guard" },
    );
  }

  const neutral = neutralVector();
  const neutralScores = aggregate(neutral, [], { smoothingAlpha: policy.smoothingAlpha });
  const initialState = selectCandidate(states, defaultState, neutral, neutralScores);

  return Object.freeze({
    states,
    defaultStateId: defaultState.id,
    defaultState,
    initialStateId: initialState.id,
    policy,
  });
}

/** Parse and validate a rule document from JSON text. */
export function parseRuleConfig(json: string): RuleConfig {
  let source: unknown;
  try {
    source = JSON.parse(json);
  } catch (err) {
    throw new ConfigLoadError(`malformed JSON: ${errorMessage(err)}`);
  }
  return loadRuleConfig(source);
}

/** Read, parse and validate a rule document from disk. */
export async function loadRuleConfigFile(filePath: string): Promise<RuleConfig> {
  let json: string;
  try {
    json = await readFile(filePath, "utf-8");
  } catch (err) {
    throw new ConfigLoadError(`cannot read ${filePath}: ${errorMessage(err)}`);
  }
  return parseRuleConfig(json);
}

// ─── Handle ─────────────────────────────────────────────────────────────────────

/**
 * Holds the active RuleConfig. Readers take `current()` once per tick and use
 * that reference throughout, so a swap is never observed half-way.
 */
export class RuleConfigHandle {
  private config: RuleConfig;

  constructor(initial: RuleConfig) {
    this.config = initial;
  }

  current(): RuleConfig {
    return this.config;
  }

  /** Replace the active config, returning the previous one. */
  swap(next: RuleConfig): RuleConfig {
    const previous = this.config;
    this.config = next;
    return previous;
  }

  /**
   * Build a new config with `loader` and swap it in. If the loader throws, the
   * active config is left untouched and the error propagates.
   */
  async reload(loader: () => RuleConfig | Promise<RuleConfig>): Promise<RuleConfig> {
    const next = await loader();
    this.swap(next);
    return next;
  }
}
