// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Review error taxonomy.
 *
 * ValidationError surfaces to the caller before a run exists.
 * ProducerFailure and CacheFailure are absorbed and logged.
 * StageFailure ends a run in the failed stage.
 */

/**
 * Error categories for classification
 */
export enum ErrorCategory {
  VALIDATION = 'validation',
  PRODUCER = 'producer',
  STAGE = 'stage',
  CACHE = 'cache',
}

export class ReviewError extends Error {
  constructor(
    message: string,
    public readonly category: ErrorCategory,
    public readonly retryable: boolean = false,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ReviewError';
  }
}

/**
 * Bad input shape or size. No run is created.
 */
export class ValidationError extends ReviewError {
  constructor(message: string, public readonly field?: string) {
    super(message, ErrorCategory.VALIDATION);
    this.name = 'ValidationError';
  }
}

/**
 * One (file, producer) pair failed.
 */
export class ProducerFailure extends ReviewError {
  constructor(
    message: string,
    public readonly producer: string,
    public readonly path: string,
    retryable: boolean = false,
    cause?: unknown
  ) {
    super(message, ErrorCategory.PRODUCER, retryable, cause);
    this.name = 'ProducerFailure';
  }
}

/**
 * A whole stage cannot proceed; the run fails.
 */
export class StageFailure extends ReviewError {
  constructor(message: string, public readonly stage: string) {
    super(message, ErrorCategory.STAGE);
    this.name = 'StageFailure';
  }
}

/**
 * Cache read or write failed; treated as a miss.
 */
export class CacheFailure extends ReviewError {
  constructor(
    message: string,
    public readonly operation: 'get' | 'put' | 'invalidate' | 'clear',
    public readonly key?: string
  ) {
    super(message, ErrorCategory.CACHE, true);
    this.name = 'CacheFailure';
  }
}

/**
 * Extract a message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
