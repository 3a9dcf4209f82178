// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Review Service
 *
 * The operations callers use: submit, synchronous review, status,
 * stream, delete and pull request review. Validation happens here,
 * before any run exists.
 */

import { randomUUID } from 'node:crypto';
import type { GitHubClient } from '../github/pull-requests.js';
import { logger } from '../logger.js';
import { ValidationError, errorMessage } from './errors.js';
import { DEFAULT_SUBMISSION_LIMITS, parseReviewOptions, validateSubmission, type SubmissionLimits } from './options.js';
import type { PipelineController } from './pipeline.js';
import type { ReviewRegistry, StreamOptions } from './registry.js';
import type { CodeUnit, ReviewOptions, ReviewRun, ReviewStage, ReviewStatus } from './types.js';

export interface SubmitResult {
  reviewId: string;
  stage: ReviewStage;
}

export interface PullRequestReviewOptions {
  /** Post the summary back to the pull request when the run completes */
  post?: boolean;
  /** Raw review options */
  options?: unknown;
}

export interface ReviewServiceDeps {
  registry: ReviewRegistry;
  pipeline: PipelineController;
  github?: GitHubClient;
  limits?: SubmissionLimits;
  /** Id source, for tests */
  createId?: () => string;
}

export class ReviewService {
  private readonly registry: ReviewRegistry;
  private readonly pipeline: PipelineController;
  private readonly github?: GitHubClient;
  private readonly limits: SubmissionLimits;
  private readonly createId: () => string;
  private running = new Map<string, Promise<void>>();

  constructor(deps: ReviewServiceDeps) {
    this.registry = deps.registry;
    this.pipeline = deps.pipeline;
    this.github = deps.github;
    this.limits = deps.limits ?? DEFAULT_SUBMISSION_LIMITS;
    this.createId = deps.createId ?? randomUUID;
  }

  /**
   * Validate and register a review, then run it in the background.
   * Throws ValidationError for bad input; no run is created then.
   */
  submit(files: unknown, rawOptions?: unknown): SubmitResult {
    const units = validateSubmission(files, this.limits);
    const options = parseReviewOptions(rawOptions);
    return this.start(units, options);
  }

  /**
   * Submit and wait for the run to finish.
   */
  async review(files: unknown, rawOptions?: unknown): Promise<ReviewStatus> {
    const { reviewId } = this.submit(files, rawOptions);
    return this.waitFor(reviewId);
  }

  status(reviewId: string): ReviewStatus | undefined {
    return this.registry.status(reviewId);
  }

  stream(reviewId: string, options?: StreamOptions): AsyncGenerator<ReviewStatus> {
    return this.registry.stream(reviewId, options);
  }

  /**
   * Cancel and forget a review. Returns false for unknown ids.
   */
  delete(reviewId: string): boolean {
    return this.registry.delete(reviewId);
  }

  /**
   * Resolve once the background run for reviewId has settled.
   */
  async waitFor(reviewId: string): Promise<ReviewStatus> {
    await this.running.get(reviewId);
    return this.status(reviewId) ?? {
      reviewId,
      stage: 'failed',
      progress: 0,
      error: 'Review was deleted before it finished',
    };
  }

  /**
   * Review the files of a pull request and optionally post the summary.
   */
  async reviewPullRequest(
    repo: string,
    prNumber: number,
    request: PullRequestReviewOptions = {}
  ): Promise<ReviewStatus> {
    if (!this.github) {
      throw new Error('GitHub integration is not configured');
    }
    const options = parseReviewOptions(request.options);

    const fetched = await this.github.fetchPullRequestFiles(repo, prNumber);
    const units = fetched.filter((unit) => {
      if (unit.size > this.limits.maxFileSize) {
        logger.warn(`Skipping ${unit.path}: ${unit.size} bytes exceeds ${this.limits.maxFileSize}`);
        return false;
      }
      return true;
    });

    if (units.length === 0) {
      throw new ValidationError(`No reviewable files in ${repo}#${prNumber}`, 'files');
    }
    if (units.length > this.limits.maxFiles) {
      throw new ValidationError(
        `Too many files: ${units.length} (maximum ${this.limits.maxFiles})`,
        'files'
      );
    }

    const { reviewId } = this.start(units, options);
    const status = await this.waitFor(reviewId);

    if (request.post && status.result) {
      const { summary, issues, recommendation } = status.result;
      await this.github.postReviewSummary(repo, prNumber, summary, issues, recommendation);
    }
    return status;
  }

  /**
   * Cancel live runs and wait for their pipelines to settle.
   */
  async close(): Promise<void> {
    this.registry.close();
    await Promise.all(this.running.values());
  }

  private start(units: CodeUnit[], options: ReviewOptions): SubmitResult {
    const reviewId = this.createId();
    const run: ReviewRun = {
      reviewId,
      units,
      options,
      stage: 'pending',
      staticResults: {},
      contexts: {},
      fileErrors: {},
      plannedPairs: 0,
      pairOutcomes: [],
      outcomes: {},
      createdAt: new Date().toISOString(),
      totalCost: 0,
    };
    this.registry.create(run);

    const task = this.pipeline
      .run(reviewId)
      .catch((error: unknown) => {
        logger.error(`Pipeline crashed for review ${reviewId}: ${errorMessage(error)}`);
      })
      .finally(() => {
        this.running.delete(reviewId);
      });
    this.running.set(reviewId, task);

    return { reviewId, stage: 'pending' };
  }
}
