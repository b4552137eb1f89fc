// ──────────────────────────────────────────
// Shared error types
// ──────────────────────────────────────────

export class HarmonizationError extends Error {
  constructor(
    readonly code: string,
    message: string,
    readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends HarmonizationError {
  constructor(message: string, details?: unknown) {
    super('VALIDATION', message, details);
  }
}

export class ConfigError extends HarmonizationError {
  constructor(message: string) {
    super('CONFIG', message);
  }
}

export class StagingError extends HarmonizationError {
  constructor(message: string, details?: unknown) {
    super('STAGING', message, details);
  }
}

/** Neither platform yielded an order date and no explicit range was configured. */
export class TimeRangeError extends HarmonizationError {
  constructor(message: string) {
    super('TIME_RANGE', message);
  }
}

export class IntegrityError extends HarmonizationError {
  constructor(readonly violations: string[]) {
    super('INTEGRITY', `Warehouse integrity check failed with ${violations.length} violation(s)`, violations);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
