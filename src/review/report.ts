// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Shapes derived from a run: per-producer aggregates and the final report.
 */

import { countBySeverity } from './consolidator.js';
import type { PairOutcome, ProducerOutcome, ReviewResult, ReviewRun } from './types.js';

/**
 * Fold the per-file outcomes of each producer into one outcome per
 * producer. A producer counts as succeeded if any of its files did.
 */
export function aggregateOutcomes(pairs: PairOutcome[]): Record<string, ProducerOutcome> {
  const grouped = new Map<string, ProducerOutcome[]>();
  for (const { outcome } of pairs) {
    const list = grouped.get(outcome.producerName);
    if (list) {
      list.push(outcome);
    } else {
      grouped.set(outcome.producerName, [outcome]);
    }
  }

  const aggregated: Record<string, ProducerOutcome> = {};
  for (const [name, outcomes] of grouped) {
    const succeeded = outcomes.filter((o) => o.succeeded);
    const scores = succeeded
      .map((o) => o.qualityScore)
      .filter((s): s is number => s !== undefined);
    const errors = outcomes
      .map((o) => o.error)
      .filter((e): e is string => Boolean(e));

    const outcome: ProducerOutcome = {
      producerName: name,
      findings: succeeded.flatMap((o) => o.findings),
      narrative: succeeded.map((o) => o.narrative).filter(Boolean).join('\n\n'),
      elapsedMs: outcomes.reduce((sum, o) => sum + o.elapsedMs, 0),
      cost: outcomes.reduce((sum, o) => sum + o.cost, 0),
      succeeded: succeeded.length > 0,
    };
    if (scores.length > 0) {
      outcome.qualityScore = Math.round(scores.reduce((a, b) => a + b, 0) / scores.length);
    }
    if (errors.length > 0) {
      outcome.error = errors.join('; ');
    }
    if (outcomes.every((o) => o.cached)) {
      outcome.cached = true;
    }
    aggregated[name] = outcome;
  }
  return aggregated;
}

/**
 * Final report for a completed run; undefined until the run is complete.
 */
export function toReviewResult(run: ReviewRun): ReviewResult | undefined {
  if (run.stage !== 'complete') return undefined;
  const { consolidated, summary, score, recommendation, completedAt } = run;
  if (!consolidated || summary === undefined || score === undefined || !recommendation || !completedAt) {
    return undefined;
  }

  return {
    reviewId: run.reviewId,
    files: run.units.map((u) => u.path),
    summary,
    score,
    recommendation,
    statistics: {
      totalIssues: consolidated.length,
      bySeverity: countBySeverity(consolidated),
      totalCost: run.totalCost,
    },
    issues: consolidated.map((f) => ({ ...f, sources: [...f.sources] })),
    metadata: {
      createdAt: run.createdAt,
      completedAt,
    },
  };
}
