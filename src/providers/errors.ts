/**
 * Error taxonomy for secret resolution.
 *
 * Every failure a provider surfaces is one of a small closed set of shapes.
 * Callers switch on `code` (or `instanceof`) instead of matching messages.
 */

// --- Error Codes -----------------------------------------

export enum SecretErrorCode {
  /** The referenced secret does not exist (expected outcome for resolve) */
  NOT_FOUND = 'NOT_FOUND',
  /** Authentication or authorization failed */
  AUTH_FAILED = 'AUTH_FAILED',
  /** A mandatory setting is missing or invalid, raised before any I/O */
  CONFIG_ERROR = 'CONFIG_ERROR',
  /** Operational failure the operator can plausibly fix */
  OPERATION_FAILED = 'OPERATION_FAILED',
  /** Raw failure wrapped by a backend adapter, before classification */
  BACKEND_ERROR = 'BACKEND_ERROR',
  /** The reference string does not match the backend's grammar */
  INVALID_REFERENCE = 'INVALID_REFERENCE',
}

export interface SecretErrorOptions {
  provider?: string;
  secretPath?: string;
  cause?: unknown;
}

/**
 * Base class for all normalized errors.
 */
export class SecretError extends Error {
  readonly code: SecretErrorCode;
  readonly provider?: string;
  readonly secretPath?: string;

  constructor(code: SecretErrorCode, message: string, options?: SecretErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'SecretError';
    this.code = code;
    this.provider = options?.provider;
    this.secretPath = options?.secretPath;
  }
}

// --- Error Kinds -----------------------------------------

export class NotFoundError extends SecretError {
  readonly key: string;

  constructor(provider: string, key: string, options?: { cause?: unknown }) {
    super(SecretErrorCode.NOT_FOUND, `secret not found: ${key} in ${provider}`, {
      provider,
      secretPath: key,
      cause: options?.cause,
    });
    this.name = 'NotFoundError';
    this.key = key;
  }
}

export class AuthError extends SecretError {
  readonly detail: string;
  readonly suggestion?: string;

  constructor(provider: string, detail: string, options?: { suggestion?: string; cause?: unknown }) {
    super(SecretErrorCode.AUTH_FAILED, `authentication failed for ${provider}: ${detail}`, {
      provider,
      cause: options?.cause,
    });
    this.name = 'AuthError';
    this.detail = detail;
    this.suggestion = options?.suggestion;
  }
}

export class ConfigError extends SecretError {
  readonly field: string;
  readonly value?: unknown;
  readonly suggestion: string;

  constructor(
    field: string,
    message: string,
    suggestion: string,
    options?: { provider?: string; value?: unknown }
  ) {
    super(SecretErrorCode.CONFIG_ERROR, message, { provider: options?.provider });
    this.name = 'ConfigError';
    this.field = field;
    this.value = options?.value;
    this.suggestion = suggestion;
  }
}

export interface UserErrorOptions extends SecretErrorOptions {
  suggestion: string;
  details?: string;
}

/**
 * Operational failure carrying an actionable suggestion.
 * This is the kind every unclassified backend fault ends up as.
 */
export class UserError extends SecretError {
  readonly suggestion: string;
  readonly details?: string;

  constructor(message: string, options: UserErrorOptions) {
    super(SecretErrorCode.OPERATION_FAILED, message, options);
    this.name = 'UserError';
    this.suggestion = options.suggestion;
    this.details = options.details;
  }
}

/**
 * Raised by backend adapters. Providers classify it into one of the
 * kinds above before it reaches a caller.
 */
export class BackendError extends SecretError {
  readonly operation: string;
  readonly resourcePath: string;
  /** What the backend itself reported, without operation or path */
  readonly detail: string;
  readonly statusCode?: number;

  constructor(
    operation: string,
    resourcePath: string,
    message: string,
    options?: { statusCode?: number; cause?: unknown; provider?: string }
  ) {
    super(SecretErrorCode.BACKEND_ERROR, `${operation} ${resourcePath}: ${message}`, {
      provider: options?.provider,
      secretPath: resourcePath,
      cause: options?.cause,
    });
    this.name = 'BackendError';
    this.operation = operation;
    this.resourcePath = resourcePath;
    this.detail = message;
    this.statusCode = options?.statusCode;
  }
}

export class MalformedReferenceError extends SecretError {
  readonly reference: string;

  constructor(reference: string, reason: string) {
    super(SecretErrorCode.INVALID_REFERENCE, `invalid reference "${reference}": ${reason}`, {
      secretPath: reference,
    });
    this.name = 'MalformedReferenceError';
    this.reference = reference;
  }
}

// --- Helpers ---------------------------------------------

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function isAbortError(err: unknown): err is Error {
  return err instanceof Error && err.name === 'AbortError';
}

export function isNotFound(err: unknown): err is NotFoundError {
  return err instanceof SecretError && err.code === SecretErrorCode.NOT_FOUND;
}

/**
 * Suggestion attached to an error, if its kind carries one.
 */
export function suggestionOf(err: unknown): string | undefined {
  if (err instanceof UserError || err instanceof ConfigError || err instanceof AuthError) {
    return err.suggestion;
  }
  return undefined;
}

/**
 * Render an error for terminal output:
 *
 *   message
 *     Details: ...
 *     Try: ...
 */
export function formatError(err: unknown): string {
  const lines = [errorMessage(err)];
  if (err instanceof UserError && err.details) {
    lines.push(...err.details.split('\n').map((line, i) => (i === 0 ? `  Details: ${line}` : `    ${line}`)));
  }
  const suggestion = suggestionOf(err);
  if (suggestion) {
    lines.push(`  Try: ${suggestion}`);
  }
  return lines.join('\n');
}
