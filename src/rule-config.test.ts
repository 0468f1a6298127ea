// Unit tests for rule config loading and validation

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  DEFAULT_POLICY,
  RuleConfigHandle,
  loadRuleConfig,
  loadRuleConfigFile,
  parseRuleConfig,
} from "./rule-config.js";
import { ConfigLoadError } from "./errors.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

const SHIPPED_RULES = fileURLToPath(new URL("../config/coaching-rules.json", import.meta.url));

function response(label: string) {
  return { voiceLine: `${label} voice`, subtitle: `${label} subtitle`, tip: `${label} tip` };
}

function state(id: string, priority: number, guard: unknown[], extra: Record<string, unknown> = {}) {
  return { id, priority, guard, response: response(id), ...extra };
}

function validDocument(): { policy?: unknown; states: unknown[] } {
  return {
    states: [
      state("alert", 100, ["anxiety >= 0.7"], { cooldownMs: 6000 }),
      state("praise", 20, [{ metric: "confidence", operator: ">=", value: 0.8 }], { cooldownMs: 5000 }),
      state("calm", 0, [], { default: true }),
    ],
  };
}

function captureConfigError(fn: () => unknown): ConfigLoadError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigLoadError) return err;
    throw err;
  }
  throw new Error("expected a ConfigLoadError");
}

// ─── Valid documents ────────────────────────────────────────────────────────────

describe("loadRuleConfig", () => {
  it("builds states in declaration order with an index each", () => {
    const config = loadRuleConfig(validDocument());
    expect(config.states.map((s) => [s.id, s.declarationIndex])).toEqual([
      ["alert", 0],
      ["praise", 1],
      ["calm", 2],
    ]);
    expect(config.states[1].cooldownMs).toBe(5000);
    expect(config.states[2].cooldownMs).toBe(0);
  });

  it("selects the flagged default state", () => {
    const config = loadRuleConfig(validDocument());
    expect(config.defaultStateId).toBe("calm");
    expect(config.defaultState.id).toBe("calm");
  });

  it("falls back to the first always-true state when none is flagged", () => {
    const doc = {
      states: [state("alert", 100, ["anxiety >= 0.7"]), state("idle", 0, []), state("idle-too", 0, [])],
    };
    expect(loadRuleConfig(doc).defaultStateId).toBe("idle");
  });

  it("derives the initial state from a neutral tick", () => {
    expect(loadRuleConfig(validDocument()).initialStateId).toBe("calm");

    const doc = validDocument();
    doc.states.push(state("neutral-watch", 10, ["confidence == 0.5"]));
    expect(loadRuleConfig(doc).initialStateId).toBe("neutral-watch");
  });

  it("uses the default policy when none is given", () => {
    expect(loadRuleConfig(validDocument()).policy).toEqual(DEFAULT_POLICY);
  });

  it("reads a custom policy", () => {
    const doc = validDocument();
    doc.policy = { smoothingAlpha: 1, overrideMargin: 10, historyCapacity: 3 };
    expect(loadRuleConfig(doc).policy).toEqual({ smoothingAlpha: 1, overrideMargin: 10, historyCapacity: 3 });
  });

  it("freezes the config all the way down", () => {
    const config = loadRuleConfig(validDocument());
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.states)).toBe(true);
    expect(Object.isFrozen(config.states[0])).toBe(true);
    expect(Object.isFrozen(config.states[0].guard)).toBe(true);
    expect(Object.isFrozen(config.states[0].guard.clauses[0])).toBe(true);
    expect(Object.isFrozen(config.states[0].response)).toBe(true);
    expect(Object.isFrozen(config.defaultState)).toBe(true);
    expect(Object.isFrozen(config.policy)).toBe(true);
  });

  it("loads the shipped rules file", async () => {
    const config = await loadRuleConfigFile(SHIPPED_RULES);
    expect(config.states.map((s) => s.id)).toEqual([
      "anxiety-alert",
      "low-confidence",
      "mumbling",
      "rushing",
      "dragging",
      "high-confidence",
      "steady",
    ]);
    expect(config.defaultStateId).toBe("steady");
    expect(config.initialStateId).toBe("steady");
  });
});

// ─── Validation errors ──────────────────────────────────────────────────────────

describe("loadRuleConfig validation", () => {
  it("rejects a non-object document", () => {
    const err = captureConfigError(() => loadRuleConfig([]));
    expect(err.message).toBe("Invalid rule config: document must be a JSON object");
    expect(err.stateId).toBeNull();
    expect(err.field).toBeNull();
  });

  it.each([[undefined], [[]], ["states"]])("rejects states = %j", (states) => {
    const err = captureConfigError(() => loadRuleConfig({ states }));
    expect(err.field).toBe("states");
  });

  it("rejects a state that is not an object", () => {
    const doc = validDocument();
    doc.states.splice(1, 0, "praise");
    expect(captureConfigError(() => loadRuleConfig(doc)).field).toBe("states[1]");
  });

  it("rejects a missing id", () => {
    const doc = validDocument();
    doc.states[0] = { priority: 1, guard: [], response: response("x") };
    expect(captureConfigError(() => loadRuleConfig(doc)).field).toBe("states[0].id");
  });

  it("rejects a duplicate id", () => {
    const doc = validDocument();
    doc.states.push(state("praise", 5, ["confidence >= 0.9"]));
    const err = captureConfigError(() => loadRuleConfig(doc));
    expect(err.stateId).toBe("praise");
    expect(err.field).toBe("id");
  });

  it.each([
    ["priority", { priority: 1.5 }],
    ["priority", { priority: "high" }],
    ["cooldownMs", { cooldownMs: -1 }],
    ["cooldownMs", { cooldownMs: 2.5 }],
    ["default", { default: "yes" }],
  ])("rejects an invalid %s", (field, patch) => {
    const doc = validDocument();
    doc.states[1] = { ...state("praise", 20, ["confidence >= 0.8"]), ...patch };
    const err = captureConfigError(() => loadRuleConfig(doc));
    expect(err.stateId).toBe("praise");
    expect(err.field).toBe(field);
  });

  it("rejects an unknown guard field and names state and clause", () => {
    const doc = validDocument();
    doc.states[1] = state("praise", 20, ["confidence >= 0.8", "facial.smile >= 0.5"]);
    const err = captureConfigError(() => loadRuleConfig(doc));
    expect(err.stateId).toBe("praise");
    expect(err.field).toBe("guard[1].metric");
  });

  it("rejects an unknown comparator", () => {
    const doc = validDocument();
    doc.states[0] = state("alert", 100, [{ metric: "anxiety", operator: "~", value: 0.7 }]);
    expect(captureConfigError(() => loadRuleConfig(doc)).field).toBe("guard[0].operator");
  });

  it.each(["voiceLine", "subtitle", "tip"])("rejects an empty response.%s", (key) => {
    const doc = validDocument();
    doc.states[2] = { ...state("calm", 0, [], { default: true }), response: { ...response("calm"), [key]: "  " } };
    const err = captureConfigError(() => loadRuleConfig(doc));
    expect(err.stateId).toBe("calm");
    expect(err.field).toBe(`response.${key}`);
  });

  it("rejects a missing response", () => {
    const doc = validDocument();
    doc.states[2] = { id: "calm", priority: 0, guard: [], default: true };
    expect(captureConfigError(() => loadRuleConfig(doc)).field).toBe("response");
  });

  it("rejects two default states", () => {
    const doc = validDocument();
    doc.states.push(state("rest", 0, [], { default: true }));
    const err = captureConfigError(() => loadRuleConfig(doc));
    expect(err.stateId).toBe("rest");
    expect(err.field).toBe("default");
  });

  it("rejects a default state with a guard", () => {
    const doc = validDocument();
    doc.states[2] = state("calm", 0, ["confidence >= 0"], { default: true });
    const err = captureConfigError(() => loadRuleConfig(doc));
    expect(err.stateId).toBe("calm");
    expect(err.field).toBe("guard");
  });

  it("rejects a table where no state always holds", () => {
    const doc = { states: [state("alert", 100, ["anxiety >= 0.7"])] };
    const err = captureConfigError(() => loadRuleConfig(doc));
    expect(err.stateId).toBeNull();
    expect(err.field).toBe("guard");
    expect(err.message).toContain("no default state");
  });

  it.each([
    ["policy", "strict"],
    ["policy.smoothingAlpha", { smoothingAlpha: 0 }],
    ["policy.smoothingAlpha", { smoothingAlpha: 1.5 }],
    ["policy.overrideMargin", { overrideMargin: 0 }],
    ["policy.historyCapacity", { historyCapacity: 0 }],
    ["policy.historyCapacity", { historyCapacity: 1001 }],
  ])("rejects an invalid %s", (field, policy) => {
    const doc = validDocument();
    doc.policy = policy;
    expect(captureConfigError(() => loadRuleConfig(doc)).field).toBe(field);
  });
});

// ─── JSON and files ─────────────────────────────────────────────────────────────

describe("parseRuleConfig / loadRuleConfigFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "coaching-rules-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reports malformed JSON", () => {
    const err = captureConfigError(() => parseRuleConfig("{ states: "));
    expect(err.message).toMatch(/^Invalid rule config: malformed JSON: /);
  });

  it("loads a file written to disk", async () => {
    const file = path.join(dir, "rules.json");
    await writeFile(file, JSON.stringify(validDocument()), "utf-8");
    const config = await loadRuleConfigFile(file);
    expect(config.defaultStateId).toBe("calm");
  });

  it("reports an unreadable file", async () => {
    const file = path.join(dir, "missing.json");
    await expect(loadRuleConfigFile(file)).rejects.toThrow(ConfigLoadError);
    await expect(loadRuleConfigFile(file)).rejects.toThrow(`cannot read ${file}`);
  });
});

// ─── Handle ─────────────────────────────────────────────────────────────────────

describe("RuleConfigHandle", () => {
  it("swaps configs and returns the previous one", () => {
    const first = loadRuleConfig(validDocument());
    const second = loadRuleConfig(validDocument());
    const handle = new RuleConfigHandle(first);

    expect(handle.swap(second)).toBe(first);
    expect(handle.current()).toBe(second);
  });

  it("reloads through a loader", async () => {
    const handle = new RuleConfigHandle(loadRuleConfig(validDocument()));
    const next = await handle.reload(() => loadRuleConfig({ states: [state("only", 0, [])] }));
    expect(handle.current()).toBe(next);
    expect(next.defaultStateId).toBe("only");
  });

  it("keeps the active config when the loader fails", async () => {
    const first = loadRuleConfig(validDocument());
    const handle = new RuleConfigHandle(first);

    await expect(handle.reload(() => loadRuleConfig({ states: [] }))).rejects.toThrow(ConfigLoadError);
    expect(handle.current()).toBe(first);
  });
});
