// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Provider error classification.
 *
 * The gateway does a single primary→fallback failover and never loops,
 * but callers still need to know whether a terminal failure might
 * succeed later (transient) or will not (permanent).
 */

export type ProviderErrorKind = 'transient' | 'permanent';

/**
 * Terminal failure from the provider gateway.
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly kind: ProviderErrorKind,
    public readonly provider: string,
    public readonly model: string,
    cause?: Error
  ) {
    super(message, { cause });
    this.name = 'ProviderError';
  }
}

/**
 * Check for errors that may succeed on a later attempt.
 * Covers rate limits, network errors, timeouts, aborts and server errors.
 */
export function isTransientError(error: Error): boolean {
  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }

  const message = error.message.toLowerCase();

  // Rate limit errors
  if (message.includes('rate limit') ||
      message.includes('too many requests') ||
      message.includes('429') ||
      message.includes('quota exceeded') ||
      message.includes('overloaded')) {
    return true;
  }

  // Network errors
  if (message.includes('network') ||
      message.includes('econnrefused') ||
      message.includes('econnreset') ||
      message.includes('etimedout') ||
      message.includes('socket') ||
      message.includes('fetch failed') ||
      message.includes('timed out') ||
      message.includes('timeout')) {
    return true;
  }

  // Server errors (5xx)
  if (message.includes('500') ||
      message.includes('502') ||
      message.includes('503') ||
      message.includes('504') ||
      message.includes('529') ||
      message.includes('server error') ||
      message.includes('internal error')) {
    return true;
  }

  return false;
}

/**
 * Map an arbitrary thrown value to a provider error kind.
 */
export function classifyProviderError(error: unknown): ProviderErrorKind {
  if (error instanceof ProviderError) {
    return error.kind;
  }
  if (error instanceof Error) {
    return isTransientError(error) ? 'transient' : 'permanent';
  }
  return 'permanent';
}

/**
 * Normalize a thrown value into an Error.
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}
