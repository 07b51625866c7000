import { describe, it, expect } from 'vitest';
import { classifyError, codeOf, errorText, matchRule, statusOf, withoutNames, type ErrorClassifier } from './classify';
import {
  AuthError,
  BackendError,
  ConfigError,
  MalformedReferenceError,
  NotFoundError,
  UserError,
} from './errors';

const classifier: ErrorClassifier = {
  backend: 'Example',
  rules: [
    { kind: 'not-found', patterns: ['no such secret'], statusCodes: [404] },
    { kind: 'auth', patterns: ['permission denied'], statusCodes: [403], suggestion: 'Grant read access' },
    { kind: 'operational', patterns: ['rate limit'], suggestion: 'Slow down' },
  ],
  fallbackSuggestion: 'Check the example backend',
};

const ctx = { provider: 'ex', key: 'app/db', operation: 'get' };

function statusError(message: string, statusCode: number): Error {
  return Object.assign(new Error(message), { statusCode });
}

describe('classifyError', () => {
  it('maps a not-found rule to NotFoundError', () => {
    const err = classifyError(new Error('no such secret: app/db'), classifier, ctx);
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err.message).toBe('secret not found: app/db in ex');
  });

  it('matches status codes as well as text', () => {
    expect(classifyError(statusError('gone', 404), classifier, ctx)).toBeInstanceOf(NotFoundError);
    const auth = classifyError(statusError('nope', 403), classifier, ctx);
    expect(auth).toBeInstanceOf(AuthError);
    expect(auth.message).toBe('authentication failed for ex: nope');
  });

  it('matches case-insensitively', () => {
    const err = classifyError(new Error('Permission Denied on path'), classifier, ctx);
    expect(err).toBeInstanceOf(AuthError);
    expect(err instanceof AuthError && err.suggestion).toBe('Grant read access');
  });

  it('uses the rule suggestion for operational failures', () => {
    const err = classifyError(new Error('rate limit exceeded'), classifier, ctx);
    expect(err).toBeInstanceOf(UserError);
    expect(err.message).toBe('Example get failed for "app/db": rate limit exceeded');
    expect(err instanceof UserError && err.suggestion).toBe('Slow down');
  });

  it('never guesses: unmatched failures are operational with the fallback suggestion', () => {
    const cause = new Error('something odd');
    const err = classifyError(cause, classifier, ctx);
    expect(err).toBeInstanceOf(UserError);
    expect(err instanceof UserError && err.suggestion).toBe('Check the example backend');
    expect(err.cause).toBe(cause);
  });

  it('checks transport rules before backend rules', () => {
    const err = classifyError(new Error('request timed out: no such secret yet'), classifier, ctx);
    expect(err).toBeInstanceOf(UserError);
    expect(err instanceof UserError && err.suggestion).toBe(
      'The backend did not respond in time. Check network connectivity and the backend status'
    );
  });

  it('recognizes transport failures by error code', () => {
    const err = classifyError(Object.assign(new Error('connect failed'), { code: 'ECONNREFUSED' }), classifier, ctx);
    expect(err).toBeInstanceOf(UserError);
    expect(err instanceof UserError && err.suggestion).toBe(
      'Check that the backend endpoint is reachable and the service is running'
    );
  });

  it('turns authentication-phase failures into AuthError, never NotFound', () => {
    const err = classifyError(new Error('no such secret'), classifier, { ...ctx, phase: 'auth' });
    expect(err).toBeInstanceOf(AuthError);
    expect(err instanceof AuthError && err.suggestion).toBe('Check the example backend');
  });

  it('keeps transport failures during authentication operational', () => {
    const err = classifyError(new Error('getaddrinfo ENOTFOUND vault.example'), classifier, { ...ctx, phase: 'auth' });
    expect(err).toBeInstanceOf(UserError);
  });

  it('passes normalized errors through', () => {
    const config = new ConfigError('address', 'missing address', 'Set it');
    const malformed = new MalformedReferenceError('x', 'bad');
    expect(classifyError(config, classifier, ctx)).toBe(config);
    expect(classifyError(malformed, classifier, ctx)).toBe(malformed);
  });

  it('classifies BackendError from adapters', () => {
    const err = classifyError(new BackendError('get', 'app/db', 'no such secret'), classifier, ctx);
    expect(err).toBeInstanceOf(NotFoundError);
  });

  it('ignores rule keywords that only appear in the secret name', () => {
    const slowKey = { ...ctx, key: 'jobs/deadline exceeded' };
    const missing = classifyError(new Error('jobs/deadline exceeded: no such secret'), classifier, slowKey);
    expect(missing).toBeInstanceOf(NotFoundError);

    const deniedKey = { ...ctx, key: 'permission denied' };
    const quoted = classifyError(new Error('"permission denied": something odd'), classifier, deniedKey);
    expect(quoted).toBeInstanceOf(UserError);
    expect(quoted instanceof UserError && quoted.suggestion).toBe('Check the example backend');
  });

  it('matches BackendError on the backend detail, not on the operation and path', () => {
    const err = classifyError(new BackendError('get', 'rate limit/db', 'something odd'), classifier, ctx);
    expect(err).toBeInstanceOf(UserError);
    expect(err instanceof UserError && err.suggestion).toBe('Check the example backend');
  });

  it('does not treat a setting named timeout as a transport failure', () => {
    const err = classifyError(new Error('invalid timeout value'), classifier, ctx);
    expect(err instanceof UserError && err.suggestion).toBe('Check the example backend');
  });

  it('recognizes timeouts by error code', () => {
    const err = classifyError(Object.assign(new Error('socket hang up'), { code: 'ETIMEDOUT' }), classifier, ctx);
    expect(err instanceof UserError && err.suggestion).toBe(
      'The backend did not respond in time. Check network connectivity and the backend status'
    );
  });

  it('returns abort errors untouched', () => {
    const abort = new Error('The operation was aborted');
    abort.name = 'AbortError';
    expect(classifyError(abort, classifier, ctx)).toBe(abort);
  });

  it('handles non-Error values', () => {
    const err = classifyError('rate limit', classifier, ctx);
    expect(err).toBeInstanceOf(UserError);
    expect(err.message).toBe('Example get failed for "app/db": rate limit');
  });
});

describe('errorText', () => {
  it('joins name, code and message', () => {
    const err = Object.assign(new Error('denied'), { code: 'E_DENIED' });
    err.name = 'AccessDeniedException';
    expect(errorText(err)).toBe('AccessDeniedException E_DENIED denied');
  });

  it('omits the generic Error name', () => {
    expect(errorText(new Error('plain'))).toBe('plain');
  });
});

describe('withoutNames', () => {
  it('removes whole names where they stand alone', () => {
    expect(withoutNames('Error: api/timeout is not in the password store.', ['api/timeout'])).toBe(
      'Error:  is not in the password store.'
    );
    expect(withoutNames('fetching api/timeouts failed', ['api/timeout'])).toBe('fetching api/timeouts failed');
  });

  it('removes quoted path segments only', () => {
    expect(withoutNames('"GitHub" isn\'t an item in the "Private" vault.', ['Private/GitHub'])).toBe(
      '"" isn\'t an item in the "" vault.'
    );
    expect(withoutNames('password store locked', ['db/password'])).toBe('password store locked');
  });

  it('ignores empty names', () => {
    expect(withoutNames('not found', ['', undefined])).toBe('not found');
  });
});

describe('codeOf', () => {
  it('reads a string code', () => {
    expect(codeOf(Object.assign(new Error('x'), { code: 'ECONNRESET' }))).toBe('ECONNRESET');
    expect(codeOf(Object.assign(new Error('x'), { code: 5 }))).toBeUndefined();
    expect(codeOf('x')).toBeUndefined();
  });
});

describe('statusOf', () => {
  it('reads statusCode, status and SDK metadata', () => {
    expect(statusOf({ statusCode: 404 })).toBe(404);
    expect(statusOf({ status: 403 })).toBe(403);
    expect(statusOf({ $metadata: { httpStatusCode: 400 } })).toBe(400);
    expect(statusOf(new Error('x'))).toBeUndefined();
    expect(statusOf('x')).toBeUndefined();
  });
});

describe('matchRule', () => {
  it('returns the first matching rule', () => {
    const rules = [
      { kind: 'operational' as const, patterns: ['command not found'] },
      { kind: 'not-found' as const, patterns: ['not found'] },
    ];
    expect(matchRule(rules, 'op: command not found')?.kind).toBe('operational');
    expect(matchRule(rules, 'item not found')?.kind).toBe('not-found');
    expect(matchRule(rules, 'fine')).toBeUndefined();
  });
});
