import { describe, expect, it } from 'vitest';
import {
  AuthenticationError,
  ProviderError,
  TransientProviderError,
  classifyProviderError,
  getErrorReasons,
  getErrorStatus,
  isRemoteNotFound,
  safeExecute,
} from '../../src/utils/errors.js';

function httpError(status: number, message = 'request failed'): Error {
  return Object.assign(new Error(message), { response: { status } });
}

describe('getErrorStatus', () => {
  it('reads the status wherever the client put it', () => {
    expect(getErrorStatus(httpError(404))).toBe(404);
    expect(getErrorStatus(Object.assign(new Error('x'), { status: 503 }))).toBe(503);
    expect(getErrorStatus(Object.assign(new Error('x'), { code: '429' }))).toBe(429);
    expect(getErrorStatus(Object.assign(new Error('x'), { code: 'ECONNRESET' }))).toBeUndefined();
    expect(getErrorStatus('boom')).toBeUndefined();
  });
});

describe('classifyProviderError', () => {
  it('passes application errors through unchanged', () => {
    const original = new ProviderError('already classified');

    expect(classifyProviderError(original, 'owner@example.com', 'gmail.list')).toBe(original);
  });

  it('maps 401 and revoked grants to AuthenticationError', () => {
    const unauthorized = classifyProviderError(httpError(401, 'Unauthorized'), 'owner@example.com', 'gmail.list');
    const revoked = classifyProviderError(new Error('invalid_grant'), 'owner@example.com', 'gmail.list');

    expect(unauthorized).toBeInstanceOf(AuthenticationError);
    expect(unauthorized.message).toBe('gmail.list: Unauthorized');
    expect(revoked).toBeInstanceOf(AuthenticationError);
  });

  it('treats rate limits, server errors and dropped connections as transient', () => {
    expect(classifyProviderError(httpError(429), 'a', 'op')).toBeInstanceOf(TransientProviderError);
    expect(classifyProviderError(httpError(502), 'a', 'op')).toBeInstanceOf(TransientProviderError);

    const reset = classifyProviderError(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }), 'a', 'op');
    expect(reset).toBeInstanceOf(TransientProviderError);
    expect(reset.context).toEqual({ operation: 'op', status: undefined, networkCode: 'ECONNRESET' });
  });

  it('treats a 403 rate or quota limit as transient', () => {
    const byReason = Object.assign(httpError(403, 'Forbidden'), {
      errors: [{ reason: 'userRateLimitExceeded', message: 'User Rate Limit Exceeded' }],
    });
    const byBody = Object.assign(new Error('Forbidden'), {
      response: { status: 403, data: { error: { errors: [{ reason: 'rateLimitExceeded' }] } } },
    });
    const byMessage = httpError(403, 'Quota exceeded for quota metric');

    const classified = classifyProviderError(byReason, 'a', 'gmail.trash');
    expect(classified).toBeInstanceOf(TransientProviderError);
    expect(classified.context).toEqual({ operation: 'gmail.trash', status: 403, rateLimited: true });
    expect(classifyProviderError(byBody, 'a', 'gmail.trash')).toBeInstanceOf(TransientProviderError);
    expect(classifyProviderError(byMessage, 'a', 'gmail.trash')).toBeInstanceOf(TransientProviderError);
    expect(classifyProviderError(httpError(403, 'User Rate Limit Exceeded'), 'a', 'gmail.trash'))
      .toBeInstanceOf(TransientProviderError);
  });

  it('treats other failures as permanent', () => {
    const error = classifyProviderError(httpError(403, 'Forbidden'), 'a', 'gmail.trash');

    expect(error).toBeInstanceOf(ProviderError);
    expect(error.code).toBe('PROVIDER_REJECTED');
    expect(error.recoverable).toBe(false);
    expect(error.message).toBe('gmail.trash: Forbidden');
  });
});

describe('safeExecute', () => {
  it('returns the data on success', async () => {
    expect(await safeExecute(async () => 42, 'test')).toEqual({ success: true, data: 42 });
  });

  it('returns the message and code on failure', async () => {
    expect(await safeExecute(async () => {
      throw new TransientProviderError('timed out');
    }, 'test')).toEqual({ success: false, error: 'timed out', code: 'PROVIDER_TRANSIENT' });

    expect(await safeExecute(async () => {
      throw new Error('boom');
    }, 'test')).toEqual({ success: false, error: 'boom', code: 'INTERNAL' });
  });
});

describe('getErrorReasons', () => {
  it('collects reasons from the error and from the response body', () => {
    const error = Object.assign(new Error('Forbidden'), {
      errors: [{ reason: 'insufficientPermissions' }, { message: 'no reason' }],
      response: { status: 403, data: { error: { errors: [{ reason: 'rateLimitExceeded' }] } } },
    });

    expect(getErrorReasons(error)).toEqual(['insufficientPermissions', 'rateLimitExceeded']);
    expect(getErrorReasons('boom')).toEqual([]);
  });
});

describe('isRemoteNotFound', () => {
  it('is true only for a classified 404', () => {
    expect(isRemoteNotFound(classifyProviderError(httpError(404, 'Not Found'), 'a', 'gmail.trash'))).toBe(true);
    expect(isRemoteNotFound(classifyProviderError(httpError(403, 'Forbidden'), 'a', 'gmail.trash'))).toBe(false);
    expect(isRemoteNotFound(httpError(404))).toBe(false);
  });
});
