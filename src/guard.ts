// Interview Coach Engine - Guard Expressions
// A guard is a conjunction of `field comparator literal` clauses. Guards are
// parsed into typed clauses when the rule config loads, so an unknown field or
// comparator is rejected there and evaluation never has to look anything up
// by name.

import type {
  Comparator,
  Guard,
  GuardClause,
  GuardField,
  MetricVector,
  ScorePair,
} from "./types.js";
import { METRIC_FIELDS, readMetricField } from "./metric-normalizer.js";
import { ConfigLoadError } from "./errors.js";
import { isRecord } from "./utils.js";

// ─── Vocabulary ─────────────────────────────────────────────────────────────────

export const GUARD_FIELDS: readonly GuardField[] = [...METRIC_FIELDS, "confidence", "anxiety"];

export function isGuardField(value: string): value is GuardField {
  return GUARD_FIELDS.some((field) => field === value);
}

const COMPARATORS: ReadonlyMap<string, Comparator> = new Map<string, Comparator>([
  [">=", ">="],
  [">", ">"],
  ["<=", "<="],
  ["<", "<"],
  ["==", "=="],
  ["!=", "!="],
  ["gte", ">="],
  ["gt", ">"],
  ["lte", "<="],
  ["lt", "<"],
  ["eq", "=="],
  ["ne", "!="],
]);

/** Absolute tolerance for == and != on floating-point scores. */
export const EQUALITY_TOLERANCE = 1e-6;

export const ALWAYS_TRUE: Guard = Object.freeze({ clauses: Object.freeze([]) });

// ─── Parsing ────────────────────────────────────────────────────────────────────

const SYMBOLIC_CLAUSE = /^\s*([A-Za-z][\w.]*)\s*(>=|<=|==|!=|>|<)\s*(\S+)\s*$/;
const WORD_CLAUSE = /^\s*([A-Za-z][\w.]*)\s+([a-z]+)\s+(\S+)\s*$/;

interface ClauseParts {
  field: unknown;
  operator: unknown;
  value: unknown;
}

function splitClause(raw: unknown, stateId: string, path: string): ClauseParts {
  if (typeof raw === "string") {
    const match = SYMBOLIC_CLAUSE.exec(raw) ?? WORD_CLAUSE.exec(raw);
    if (!match) {
      throw new ConfigLoadError(`cannot parse guard clause "${raw}"`, { stateId, field: path });
    }
    const literal = Number(match[3]);
    return { field: match[1], operator: match[2], value: Number.isNaN(literal) ? match[3] : literal };
  }

  if (isRecord(raw)) {
    return {
      field: raw.metric ?? raw.field,
      operator: raw.operator ?? raw.op,
      value: raw.value,
    };
  }

  throw new ConfigLoadError("guard clause must be an object or a string", { stateId, field: path });
}

function parseClause(raw: unknown, stateId: string, index: number): GuardClause {
  const path = `guard[${index}]`;
  const parts = splitClause(raw, stateId, path);

  if (typeof parts.field !== "string" || !isGuardField(parts.field)) {
    throw new ConfigLoadError(
      `unknown guard field "${String(parts.field)}"; expected one of ${GUARD_FIELDS.join(", ")}`,
      { stateId, field: `${path}.metric` },
    );
  }

  const comparator = typeof parts.operator === "string" ? COMPARATORS.get(parts.operator) : undefined;
  if (comparator === undefined) {
    throw new ConfigLoadError(`unsupported comparator "${String(parts.operator)}"`, {
      stateId,
      field: `${path}.operator`,
    });
  }

  if (typeof parts.value !== "number" || !Number.isFinite(parts.value)) {
    throw new ConfigLoadError(`guard literal must be a finite number, got ${JSON.stringify(parts.value)}`, {
      stateId,
      field: `${path}.value`,
    });
  }

  return Object.freeze({ field: parts.field, comparator, literal: parts.value });
}

/**
 * Parse a guard from its config form: an array of clauses, each either
 * `{ metric, operator, value }` or a string such as `"confidence >= 0.8"`.
 * A missing guard or an empty array always holds.
 *
 * @throws ConfigLoadError naming the state and clause at fault
 */
export function parseGuard(raw: unknown, stateId: string): Guard {
  if (raw === undefined || raw === null) return ALWAYS_TRUE;
  if (!Array.isArray(raw)) {
    throw new ConfigLoadError("guard must be an array of clauses", { stateId, field: "guard" });
  }
  if (raw.length === 0) return ALWAYS_TRUE;
  const clauses = raw.map((clause, index) => parseClause(clause, stateId, index));
  return Object.freeze({ clauses: Object.freeze(clauses) });
}

// ─── Evaluation ─────────────────────────────────────────────────────────────────

export function compare(actual: number, comparator: Comparator, literal: number): boolean {
  switch (comparator) {
    case ">=":
      return actual >= literal;
    case ">":
      return actual > literal;
    case "<=":
      return actual <= literal;
    case "<":
      return actual < literal;
    case "==":
      return Math.abs(actual - literal) <= EQUALITY_TOLERANCE;
    case "!=":
      return Math.abs(actual - literal) > EQUALITY_TOLERANCE;
  }
}

export function readGuardField(field: GuardField, vector: MetricVector, scores: ScorePair): number {
  if (field === "confidence") return scores.confidence;
  if (field === "anxiety") return scores.anxiety;
  return readMetricField(vector, field);
}

export function evaluateGuard(guard: Guard, vector: MetricVector, scores: ScorePair): boolean {
  return guard.clauses.every((clause) =>
    compare(readGuardField(clause.field, vector, scores), clause.comparator, clause.literal),
  );
}

export function isAlwaysTrue(guard: Guard): boolean {
  return guard.clauses.length === 0;
}

export function formatGuard(guard: Guard): string {
  if (isAlwaysTrue(guard)) return "always";
  return guard.clauses.map((c) => `${c.field} ${c.comparator} ${c.literal}`).join(" && ");
}
