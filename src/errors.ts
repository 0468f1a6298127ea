// Interview Coach Engine - Error types

/**
 * Raised when a rule config document is malformed or semantically invalid.
 * Carries the offending state id and field when the problem is local to one.
 */
export class ConfigLoadError extends Error {
  readonly stateId: string | null;
  readonly field: string | null;

  constructor(message: string, details: { stateId?: string | null; field?: string | null } = {}) {
    const location = [
      details.stateId ? `state "${details.stateId}"` : null,
      details.field ? `field "${details.field}"` : null,
    ]
      .filter((part): part is string => part !== null)
      .join(", ");
    super(location ? `Invalid rule config (${location}): ${message}` : `Invalid rule config: ${message}`);
    this.name = "ConfigLoadError";
    this.stateId = details.stateId ?? null;
    this.field = details.field ?? null;
  }
}
