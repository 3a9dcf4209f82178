// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for review output.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only essential information */
  NORMAL = 0,
  /** Verbose - stage transitions and producer results with timing */
  VERBOSE = 1,
  /** Debug - API details, cache hits and misses */
  DEBUG = 2,
  /** Trace - full request/response payloads */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;
  private quiet: boolean = false;

  /**
   * Set the current log level.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Get the current log level.
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Silence everything except errors (used when stdout carries JSON).
   */
  setQuiet(quiet: boolean): void {
    this.quiet = quiet;
  }

  /**
   * Check if a specific level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return !this.quiet && this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at VERBOSE level (shows at VERBOSE, DEBUG, TRACE).
   */
  verbose(message: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.error(chalk.dim(message));
    }
  }

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.error(chalk.dim(`[Debug] ${message}`));
    }
  }

  /**
   * Log at TRACE level (shows only at TRACE).
   */
  trace(message: string): void {
    if (this.isLevelEnabled(LogLevel.TRACE)) {
      console.error(chalk.gray(`[Trace] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log a pipeline stage transition at VERBOSE level.
   */
  stage(reviewId: string, stage: string): void {
    if (this.isLevelEnabled(LogLevel.VERBOSE)) {
      console.error(chalk.cyan(`▸ ${stage}`) + chalk.dim(` (${reviewId.slice(0, 8)})`));
    }
  }

  /**
   * Log a producer result at VERBOSE level.
   */
  producer(name: string, path: string, findings: number, durationMs: number, error?: string): void {
    if (!this.isLevelEnabled(LogLevel.VERBOSE)) return;
    const durationStr = (durationMs / 1000).toFixed(2);

    if (error) {
      console.error(chalk.red(`✗ ${name}`) + chalk.dim(` ${path} (error, ${durationStr}s)`));
      if (this.level >= LogLevel.DEBUG) {
        console.error(chalk.red(chalk.dim(`   ${error.slice(0, 200)}`)));
      }
    } else {
      console.error(chalk.green(`✓ ${name}`) + chalk.dim(` ${path} (${findings} findings, ${durationStr}s)`));
    }
  }

  /**
   * Log a cache event at DEBUG level.
   */
  cache(event: 'hit' | 'miss' | 'set' | 'invalidate', detail: string): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.error(chalk.dim(`[Cache] ${event} ${detail}`));
    }
  }

  /**
   * Log API request at DEBUG level.
   */
  apiRequest(model: string, promptChars: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.error(chalk.dim(`[API] Sending to ${model} (${promptChars.toLocaleString()} chars)...`));
    }
  }

  /**
   * Log API response at DEBUG level.
   */
  apiResponse(model: string, inputTokens: number, outputTokens: number, cost: number, duration: number): void {
    if (this.isLevelEnabled(LogLevel.DEBUG)) {
      console.error(chalk.dim(
        `[API] Response from ${model}: ${inputTokens} in / ${outputTokens} out, ` +
        `$${cost.toFixed(4)}, ${duration.toFixed(2)}s`
      ));
    }
  }

  /**
   * Sanitize a string for safe terminal output.
   */
  private sanitize(str: string): string {
    return str
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Remove control chars except \t, \n, \r
      .replace(/\r?\n/g, '\\n')
      .replace(/\t/g, '\\t');
  }

  /**
   * Log full API request at TRACE level.
   */
  apiRequestFull(model: string, systemPrompt: string, userPrompt: string): void {
    if (!this.isLevelEnabled(LogLevel.TRACE)) return;

    const truncate = (text: string, max: number): string =>
      text.length > max ? text.slice(0, max) + '...' : text;

    console.error(chalk.gray('\n' + '='.repeat(60)));
    console.error(chalk.gray('[API Request]'));
    console.error(chalk.gray('='.repeat(60)));
    console.error(chalk.gray(`  model: ${model}`));
    console.error(chalk.gray(`  system: "${this.sanitize(truncate(systemPrompt, 200))}"`));
    console.error(chalk.gray(`  user: "${this.sanitize(truncate(userPrompt, 300))}"`));
    console.error(chalk.gray('='.repeat(60) + '\n'));
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  /**
   * Log a warning.
   */
  warn(message: string): void {
    if (this.quiet) return;
    console.warn(chalk.yellow(`Warning: ${message}`));
  }

  /**
   * Log an info message.
   */
  info(message: string): void {
    if (this.quiet) return;
    console.error(chalk.blue(`Info: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
