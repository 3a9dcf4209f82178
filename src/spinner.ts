// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Spinner Manager
 *
 * Centralized spinner management using ora for visual feedback while a
 * review runs.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { ReviewStage } from './review/types.js';

/**
 * Manages a single spinner instance with TTY detection and state management.
 */
class SpinnerManager {
  private spinner: Ora | null = null;
  private enabled: boolean;

  constructor() {
    // Disable spinners in non-TTY environments (piped output)
    this.enabled = process.stdout.isTTY ?? false;
  }

  /**
   * Enable or disable spinners globally.
   */
  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
    if (!enabled && this.spinner) {
      this.stop();
    }
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Start a new spinner with the given text.
   * If a spinner is already running, it will be stopped first.
   */
  start(text: string): void {
    if (!this.isEnabled()) return;

    this.spinner?.stop();
    this.spinner = ora({
      text,
      color: 'cyan',
      spinner: 'dots',
    }).start();
  }

  update(text: string): void {
    if (this.spinner && this.isEnabled()) {
      this.spinner.text = text;
    }
  }

  /**
   * Stop the spinner with a success message.
   */
  succeed(text?: string): void {
    if (this.spinner) {
      this.spinner.succeed(text);
      this.spinner = null;
    }
  }

  /**
   * Stop the spinner with a failure message.
   */
  fail(text?: string): void {
    if (this.spinner) {
      this.spinner.fail(text);
      this.spinner = null;
    }
  }

  /**
   * Stop the spinner without any status symbol.
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  /**
   * Show the stage and progress of a running review.
   */
  stage(stage: ReviewStage, progress: number): void {
    const text = chalk.cyan(`${stage} `) + chalk.dim(`${progress}%`);
    if (this.spinner) {
      this.update(text);
    } else {
      this.start(text);
    }
  }

  /**
   * Show a spinner while fetching pull request files.
   */
  fetching(target: string): void {
    this.start(chalk.cyan(`Fetching ${target}...`));
  }
}

/**
 * Singleton spinner instance for global use.
 */
export const spinner = new SpinnerManager();
