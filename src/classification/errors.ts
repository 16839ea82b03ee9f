// ============================================================================
// Classification Error Types
// ============================================================================

/**
 * Thrown when the rule table cannot be read or fails validation.
 * Raised at startup only; the server does not start with a bad rule set.
 */
export class RuleSetError extends Error {
  readonly source: string;

  constructor(message: string, source: string) {
    super(message);
    this.name = 'RuleSetError';
    this.source = source;
  }
}

/**
 * Thrown by a batch classifier when the external call fails or its output
 * cannot be parsed. The escalation stage catches it and applies no overrides.
 */
export class EscalationError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'EscalationError';
  }
}

/** Normalize an unknown thrown value into a loggable message */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
