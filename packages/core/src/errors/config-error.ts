/**
 * Error types raised while defining or resolving configuration.
 * Every message names the offending key(s) so the host can refuse to start
 * the task with something a user can act on.
 */

export type ConfigErrorCode =
  | 'MISSING_REQUIRED_FIELD'
  | 'TYPE_COERCION_ERROR'
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_CONFLICT'
  | 'DUPLICATE_FIELD'
  | 'INVALID_DEFINITION'
  | 'UNKNOWN_FIELD'
  | 'WRONG_TYPE'
  | 'INVALID_INPUT';

export interface ConfigErrorDetails {
  /** Error code for programmatic handling */
  code: ConfigErrorCode;
  /** Human-readable message */
  message: string;
  /** Configuration key(s) involved */
  keys?: string[];
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: Error;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class ConfigError extends Error {
  readonly code: ConfigErrorCode;
  readonly keys: readonly string[];
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(details: ConfigErrorDetails) {
    super(details.message);
    this.name = 'ConfigError';
    this.code = details.code;
    this.keys = Object.freeze([...(details.keys ?? [])]);
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause) {
      this.cause = details.cause;
    }

    // Maintains proper stack trace in V8 environments
    if ('captureStackTrace' in Error) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Structured, actionable message for the hosting framework's logs
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.keys.length > 0) {
      parts.push(`Keys: ${this.keys.join(', ')}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      keys: [...this.keys],
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

type TaxonomyDetails = Omit<ConfigErrorDetails, 'code'>;

/** A field without a default was not supplied */
export class MissingRequiredFieldError extends ConfigError {
  constructor(key: string) {
    super({
      code: 'MISSING_REQUIRED_FIELD',
      message: `Missing required configuration "${key}" which has no default value.`,
      keys: [key],
      suggestion: `Set "${key}" in the connector configuration.`,
    });
    this.name = 'MissingRequiredFieldError';
  }
}

/** A raw value could not be coerced to the declared type, or is out of range */
export class TypeCoercionError extends ConfigError {
  constructor(details: TaxonomyDetails) {
    super({ ...details, code: 'TYPE_COERCION_ERROR' });
    this.name = 'TypeCoercionError';
  }
}

/** A coerced value was rejected by the field's validator */
export class ValidationError extends ConfigError {
  constructor(details: TaxonomyDetails) {
    super({ ...details, code: 'VALIDATION_ERROR' });
    this.name = 'ValidationError';
  }
}

/** An invariant spanning several fields does not hold */
export class ConfigurationConflictError extends ConfigError {
  constructor(details: TaxonomyDetails) {
    super({ ...details, code: 'CONFIGURATION_CONFLICT' });
    this.name = 'ConfigurationConflictError';
  }
}

/**
 * Helper to wrap unknown errors as ConfigError
 */
export function wrapError(
  error: unknown,
  defaultCode: ConfigErrorCode = 'INVALID_INPUT'
): ConfigError {
  if (error instanceof ConfigError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const cause = error instanceof Error ? error : undefined;

  return new ConfigError({
    code: defaultCode,
    message,
    cause,
  });
}
