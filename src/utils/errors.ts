/**
 * @fileoverview Standardized error handling utilities.
 *
 * Provides consistent error patterns across the codebase:
 * - AppError: Base class for application-specific errors
 * - The engine's error taxonomy (provider, auth, lifecycle, intent, conflict)
 * - classifyProviderError: Maps raw provider failures onto the taxonomy
 * - safeExecute: Returns result objects instead of throwing
 */

import { createLogger } from './observability/index.js';

const log = createLogger({ domain: 'errors' });

/**
 * Base class for application-specific errors.
 * Includes error code, recoverability flag, and optional context.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly recoverable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
  }
}

/** Network failure or rate limit from the remote mailbox. Retried with backoff. */
export class TransientProviderError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PROVIDER_TRANSIENT', true, context);
    this.name = 'TransientProviderError';
  }
}

/** The remote mailbox rejected the call for good (permission, missing message, bad cursor). */
export class ProviderError extends AppError {
  constructor(message: string, code = 'PROVIDER_REJECTED', context?: Record<string, unknown>) {
    super(message, code, false, context);
    this.name = 'ProviderError';
  }
}

/** Expired or revoked token. Suspends scheduling for the account. */
export class AuthenticationError extends AppError {
  constructor(public readonly accountId: string, message = 'Account is not authenticated') {
    super(message, 'UNAUTHENTICATED', false, { accountId });
    this.name = 'AuthenticationError';
  }
}

/** Trash lifecycle misuse (restore of an active email, purge of a purged one...). */
export class InvalidStateError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_STATE', false, context);
    this.name = 'InvalidStateError';
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`, 'NOT_FOUND', false, { entity, id });
    this.name = 'NotFoundError';
  }
}

/** Caller is not allowed to act on the entity (e.g. a non-member posting to a huddle). */
export class ForbiddenError extends AppError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'FORBIDDEN', false, context);
    this.name = 'ForbiddenError';
  }
}

/** Intent name outside the supported vocabulary. */
export class UnsupportedIntentError extends AppError {
  constructor(public readonly intentName: string) {
    super(`Unsupported intent: ${intentName}`, 'UNSUPPORTED_INTENT', false, { intentName });
    this.name = 'UnsupportedIntentError';
  }
}

/** Intent is missing required parameters; nothing was executed. */
export class IncompleteIntentError extends AppError {
  constructor(
    public readonly intentName: string,
    public readonly missingFields: string[],
    message?: string
  ) {
    super(
      message ?? `Intent ${intentName} is missing: ${missingFields.join(', ')}`,
      'INCOMPLETE_INTENT',
      false,
      { intentName, missingFields }
    );
    this.name = 'IncompleteIntentError';
  }
}

/** A row changed underneath an optimistic write. Safe to retry the single operation. */
export class ConflictError extends AppError {
  constructor(entity: string, id: string) {
    super(`${entity} ${id} was modified concurrently`, 'CONFLICT', true, { entity, id });
    this.name = 'ConflictError';
  }
}

/** Retryable network error codes commonly surfaced by node/gaxios. */
const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

/** Retryable HTTP statuses for transient upstream issues. */
function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 425 || status === 429 || status >= 500;
}

/** Google API error reasons that mean "slow down", whatever the status. */
const RATE_LIMIT_REASONS = new Set([
  'rateLimitExceeded',
  'userRateLimitExceeded',
  'quotaExceeded',
  'backendError',
]);

/**
 * Read an HTTP status from a provider error, wherever the client put it.
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (!error || typeof error !== 'object') return undefined;

  if ('response' in error) {
    const response = error.response;
    if (response && typeof response === 'object' && 'status' in response) {
      const status = response.status;
      if (typeof status === 'number') return status;
    }
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('code' in error) {
    if (typeof error.code === 'number') return error.code;
    if (typeof error.code === 'string' && /^\d{3}$/.test(error.code)) {
      return parseInt(error.code, 10);
    }
  }
  return undefined;
}

function getNetworkCode(error: unknown): string | undefined {
  if (!error || typeof error !== 'object') return undefined;
  if ('code' in error && typeof error.code === 'string' && !/^\d+$/.test(error.code)) {
    return error.code;
  }
  if ('cause' in error) {
    return getNetworkCode(error.cause);
  }
  return undefined;
}

function readReasons(list: unknown): string[] {
  if (!Array.isArray(list)) return [];
  const reasons: string[] = [];
  for (const entry of list) {
    if (entry && typeof entry === 'object' && 'reason' in entry && typeof entry.reason === 'string') {
      reasons.push(entry.reason);
    }
  }
  return reasons;
}

/**
 * Google API error reasons, from `errors[]` on the gaxios error or from
 * the `error.errors[]` body of its response.
 */
export function getErrorReasons(error: unknown): string[] {
  if (!error || typeof error !== 'object') return [];
  const reasons = 'errors' in error ? readReasons(error.errors) : [];

  if ('response' in error) {
    const response = error.response;
    const data = response && typeof response === 'object' && 'data' in response ? response.data : undefined;
    const body = data && typeof data === 'object' && 'error' in data ? data.error : undefined;
    if (body && typeof body === 'object' && 'errors' in body) {
      reasons.push(...readReasons(body.errors));
    }
  }
  return reasons;
}

function isRateLimited(error: unknown, message: string): boolean {
  if (getErrorReasons(error).some(reason => RATE_LIMIT_REASONS.has(reason))) return true;
  const lower = message.toLowerCase();
  return lower.includes('rate limit exceeded') || lower.includes('quota exceeded');
}

function isAuthFailureMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return lower.includes('invalid_grant')
    || lower.includes('invalid credentials')
    || lower.includes('insufficient authentication scopes')
    || lower.includes('token has been expired or revoked');
}

/**
 * Map a raw provider failure onto the error taxonomy.
 * Errors that are already AppErrors pass through unchanged.
 */
export function classifyProviderError(error: unknown, accountId: string, operation: string): AppError {
  if (error instanceof AppError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const status = getErrorStatus(error);
  const context = { operation, status };

  if (status === 401 || isAuthFailureMessage(message)) {
    return new AuthenticationError(accountId, `${operation}: ${message}`);
  }
  if (status !== undefined && isRetryableStatus(status)) {
    return new TransientProviderError(`${operation}: ${message}`, context);
  }
  if (isRateLimited(error, message)) {
    return new TransientProviderError(`${operation}: ${message}`, { ...context, rateLimited: true });
  }

  const networkCode = getNetworkCode(error);
  if (networkCode && RETRYABLE_ERROR_CODES.has(networkCode)) {
    return new TransientProviderError(`${operation}: ${message}`, { ...context, networkCode });
  }
  if (status === undefined && message.toLowerCase().includes('network')) {
    return new TransientProviderError(`${operation}: ${message}`, context);
  }

  return new ProviderError(`${operation}: ${message}`, 'PROVIDER_REJECTED', context);
}

/** The provider no longer has the message (or thread) the call named. */
export function isRemoteNotFound(error: unknown): boolean {
  return error instanceof ProviderError && error.context?.status === 404;
}

/**
 * Result type for operations that may fail.
 * Prefer this over try-catch when callers need to handle both cases.
 */
export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: string; code: string };

function errorCode(error: unknown): string {
  return error instanceof AppError ? error.code : 'INTERNAL';
}

/**
 * Execute an async function and return a Result object.
 * Use for operations where the caller wants to handle failure without exceptions.
 */
export async function safeExecute<T>(
  fn: () => Promise<T>,
  context: string
): Promise<Result<T>> {
  try {
    const data = await fn();
    return { success: true, data };
  } catch (error) {
    log.warn('operation_failed', {
      operation: context,
      code: errorCode(error),
      error: error instanceof Error ? error.message : String(error),
    });
    return {
      success: false,
      error: error instanceof Error ? error.message : String(error),
      code: errorCode(error),
    };
  }
}
