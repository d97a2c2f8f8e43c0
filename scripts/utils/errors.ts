/**
 * Error handling utilities
 */

/**
 * Extracts error message from unknown error value
 * @param err - Unknown error value (Error, string, or other)
 * @returns Error message string
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Formats error for logging with optional context
 * @param err - Unknown error value
 * @param context - Optional context string (e.g., operation name)
 * @returns Formatted error message
 */
export function formatError(err: unknown, context?: string): string {
  const message = getErrorMessage(err);
  return context ? `${context}: ${message}` : message;
}

/**
 * Base class for every failure raised while generating a tuning config.
 * None of them are recoverable: the calculation is pure, so a retry would
 * reproduce the same error.
 */
export class TuningConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingVersionError extends TuningConfigError {
  constructor(readonly variable: string) {
    super(`${variable} environment variable is required (e.g. ${variable}=9.5)`);
  }
}

export class MalformedVersionError extends TuningConfigError {
  constructor(
    readonly raw: string,
    readonly summary: string
  ) {
    super(`Invalid PostgreSQL version "${raw}": expected dot-separated integers (${summary})`);
  }
}

export class MalformedSizeError extends TuningConfigError {
  constructor(
    readonly raw: string,
    readonly summary: string
  ) {
    super(`Invalid container size "${raw}": expected a whole number of megabytes (${summary})`);
  }
}

export class UnsupportedValueTypeError extends TuningConfigError {
  constructor(readonly value: unknown) {
    super(`Unsupported config value: ${inspect(value)}`);
  }
}

/**
 * Raised by the self-test when a fixture and the generated config disagree.
 * `got` is undefined when the key is missing from the generated config,
 * `expected` is undefined when the key should not be there at all.
 */
export class SelfTestMismatchError extends TuningConfigError {
  constructor(
    readonly fixture: { version: string; sizeMb: number },
    readonly key: string,
    readonly got: string | undefined,
    readonly expected: string | undefined
  ) {
    super(
      `${key} mismatch for PG_VERSION=${fixture.version} APTIBLE_CONTAINER_SIZE=${fixture.sizeMb}: ` +
        `got ${describe(got)}, expected ${describe(expected)}`
    );
  }
}

export class FixtureValidationError extends TuningConfigError {
  constructor(readonly summary: string) {
    super(`Self-test fixtures failed validation:\n${summary}`);
  }
}

function inspect(value: unknown): string {
  if (value !== null && typeof value === "object") {
    return JSON.stringify(value, (_key, v: unknown) =>
      typeof v === "number" && !Number.isFinite(v) ? String(v) : v
    );
  }
  return String(value);
}

function describe(value: string | undefined): string {
  return value === undefined ? "<absent>" : `"${value}"`;
}
