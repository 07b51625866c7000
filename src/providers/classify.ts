/**
 * Table-driven classification of raw backend failures.
 *
 * Each backend declares an ordered list of rules. A rule matches on HTTP-ish
 * status codes or on case-insensitive substrings of the error text. Anything
 * no rule claims is an operational error: a failure is never labelled
 * NotFound or Auth on a guess.
 */

import {
  AuthError,
  BackendError,
  NotFoundError,
  SecretError,
  UserError,
  errorMessage,
  isAbortError,
} from './errors';

export type ErrorKind = 'not-found' | 'auth' | 'operational';

export interface ClassificationRule {
  kind: ErrorKind;
  /** Lowercase substrings matched against the lowercased error text */
  patterns: readonly string[];
  statusCodes?: readonly number[];
  /** Exact `code` values, e.g. Node's ETIMEDOUT; checked before any pattern */
  errorCodes?: readonly string[];
  suggestion?: string;
}

export interface ErrorClassifier {
  /** Human-readable backend label used in messages */
  backend: string;
  rules: readonly ClassificationRule[];
  fallbackSuggestion: string;
}

export interface ClassifyContext {
  provider: string;
  key: string;
  operation: string;
  /** Failures while authenticating never classify as NotFound */
  phase?: 'auth' | 'request';
}

/** Transport failures shared by every backend; checked before backend rules. */
export const TRANSPORT_RULES: readonly ClassificationRule[] = [
  {
    kind: 'operational',
    errorCodes: ['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT'],
    patterns: ['timed out', 'deadline exceeded', 'request timeout', 'etimedout'],
    suggestion: 'The backend did not respond in time. Check network connectivity and the backend status',
  },
  {
    kind: 'operational',
    errorCodes: ['ECONNREFUSED', 'ECONNRESET'],
    patterns: ['connection refused', 'econnrefused'],
    suggestion: 'Check that the backend endpoint is reachable and the service is running',
  },
  {
    kind: 'operational',
    errorCodes: ['ENOTFOUND', 'EAI_AGAIN'],
    patterns: ['no such host', 'getaddrinfo', 'eai_again'],
    suggestion: 'Check the endpoint address and DNS resolution',
  },
];

/**
 * Text a rule is matched against: error name, string code and message.
 * For a BackendError only the backend's own detail counts.
 */
export function errorText(err: unknown): string {
  const parts: string[] = [];
  if (err instanceof BackendError) {
    parts.push(err.detail);
  } else if (err instanceof Error) {
    if (err.name && err.name !== 'Error') parts.push(err.name);
    if ('code' in err && typeof err.code === 'string') parts.push(err.code);
    parts.push(err.message);
  } else {
    parts.push(String(err));
  }
  return parts.join(' ');
}

/** String `code` of the error, if any */
export function codeOf(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  return 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Remove the secret's own name from error text, so a key such as
 * "api/timeout" cannot match a rule. Whole names are removed wherever they
 * stand alone; single path segments only where the backend quoted them.
 */
export function withoutNames(text: string, names: readonly (string | undefined)[]): string {
  const whole = [...new Set(names.filter((name): name is string => !!name && name.trim().length > 0))];
  const segments = new Set(
    whole.flatMap((name) => name.split(/[/#@:]/)).filter((segment) => segment.length > 0)
  );

  let result = text;
  for (const name of [...whole].sort((a, b) => b.length - a.length)) {
    const pattern = new RegExp(`(^|[^A-Za-z0-9_-])${escapeRegExp(name)}(?![A-Za-z0-9_-])`, 'g');
    result = result.replace(pattern, '$1');
  }
  for (const segment of [...segments].sort((a, b) => b.length - a.length)) {
    const quoted = escapeRegExp(segment);
    result = result.replace(new RegExp(`"${quoted}"|'${quoted}'|\\[${quoted}\\]`, 'g'), '""');
  }
  return result;
}

/**
 * Numeric status reported by the error, if any. Understands `statusCode`,
 * `status` and the SDK-style `$metadata.httpStatusCode`.
 */
export function statusOf(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null) return undefined;
  if ('statusCode' in err && typeof err.statusCode === 'number') return err.statusCode;
  if ('status' in err && typeof err.status === 'number') return err.status;
  if (
    '$metadata' in err &&
    typeof err.$metadata === 'object' &&
    err.$metadata !== null &&
    'httpStatusCode' in err.$metadata &&
    typeof err.$metadata.httpStatusCode === 'number'
  ) {
    return err.$metadata.httpStatusCode;
  }
  return undefined;
}

export function matchRule(
  rules: readonly ClassificationRule[],
  text: string,
  status?: number,
  code?: string
): ClassificationRule | undefined {
  if (code !== undefined) {
    const upper = code.toUpperCase();
    const byCode = rules.find((rule) => rule.errorCodes?.includes(upper));
    if (byCode) return byCode;
  }
  const lower = text.toLowerCase();
  return rules.find(
    (rule) =>
      (status !== undefined && rule.statusCodes?.includes(status)) ||
      rule.patterns.some((pattern) => lower.includes(pattern))
  );
}

/**
 * Map a raw failure to a normalized error.
 *
 * Already-normalized errors pass through, except BackendError which is the
 * adapter-level wrapper and always gets classified. Abort errors are
 * returned untouched so cancellation stays recognizable.
 */
export function classifyError(err: unknown, classifier: ErrorClassifier, ctx: ClassifyContext): Error {
  if (isAbortError(err)) return err;
  if (err instanceof SecretError && !(err instanceof BackendError)) return err;

  const resourcePath = err instanceof BackendError ? err.resourcePath : undefined;
  const text = withoutNames(errorText(err), [ctx.key, resourcePath]);
  const status = statusOf(err);
  const code = codeOf(err);
  const transport = matchRule(TRANSPORT_RULES, text, status, code);
  const message = `${classifier.backend} ${ctx.operation} failed for "${ctx.key}": ${errorMessage(err)}`;

  if (transport) {
    return new UserError(message, {
      suggestion: transport.suggestion ?? classifier.fallbackSuggestion,
      provider: ctx.provider,
      secretPath: ctx.key,
      cause: err,
    });
  }

  const rule = matchRule(classifier.rules, text, status, code);

  if (ctx.phase === 'auth') {
    return new AuthError(ctx.provider, errorMessage(err), {
      suggestion: rule?.suggestion ?? classifier.fallbackSuggestion,
      cause: err,
    });
  }

  switch (rule?.kind) {
    case 'not-found':
      return new NotFoundError(ctx.provider, ctx.key, { cause: err });
    case 'auth':
      return new AuthError(ctx.provider, errorMessage(err), {
        suggestion: rule?.suggestion ?? classifier.fallbackSuggestion,
        cause: err,
      });
    default:
      return new UserError(message, {
        suggestion: rule?.suggestion ?? classifier.fallbackSuggestion,
        provider: ctx.provider,
        secretPath: ctx.key,
        cause: err,
      });
  }
}
