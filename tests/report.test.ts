// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { aggregateOutcomes, toReviewResult } from '../src/review/report.js';
import { makeFinding, makeOutcome, makeRun } from './helpers/fixtures.js';

describe('aggregateOutcomes', () => {
  it('folds per-file outcomes into one per producer', () => {
    const aggregated = aggregateOutcomes([
      { path: 'a.py', outcome: makeOutcome({ findings: [makeFinding({ id: 'a' })], narrative: 'A ok.', qualityScore: 80, cost: 0.1, elapsedMs: 100 }) },
      { path: 'b.py', outcome: makeOutcome({ findings: [makeFinding({ id: 'b' })], narrative: 'B ok.', qualityScore: 91, cost: 0.2, elapsedMs: 50 }) },
      { path: 'a.py', outcome: makeOutcome({ producerName: 'security', narrative: 'Safe.' }) },
    ]);

    expect(Object.keys(aggregated)).toEqual(['analyzer', 'security']);
    expect(aggregated.analyzer.findings.map((f) => f.id)).toEqual(['a', 'b']);
    expect(aggregated.analyzer.narrative).toBe('A ok.\n\nB ok.');
    expect(aggregated.analyzer.qualityScore).toBe(86);
    expect(aggregated.analyzer.cost).toBeCloseTo(0.3);
    expect(aggregated.analyzer.elapsedMs).toBe(150);
    expect(aggregated.analyzer.succeeded).toBe(true);
    expect(aggregated.security.qualityScore).toBeUndefined();
  });

  it('keeps a producer succeeded when only some files failed', () => {
    const aggregated = aggregateOutcomes([
      { path: 'a.py', outcome: makeOutcome({ succeeded: false, error: 'timeout', findings: [makeFinding()] }) },
      { path: 'b.py', outcome: makeOutcome({ narrative: 'Fine.' }) },
    ]);

    expect(aggregated.analyzer.succeeded).toBe(true);
    expect(aggregated.analyzer.findings).toEqual([]);
    expect(aggregated.analyzer.error).toBe('timeout');
  });

  it('marks a producer failed when every file failed', () => {
    const aggregated = aggregateOutcomes([
      { path: 'a.py', outcome: makeOutcome({ succeeded: false, error: 'e1' }) },
      { path: 'b.py', outcome: makeOutcome({ succeeded: false, error: 'e2' }) },
    ]);

    expect(aggregated.analyzer.succeeded).toBe(false);
    expect(aggregated.analyzer.error).toBe('e1; e2');
  });

  it('marks cached only when every file was cached', () => {
    expect(aggregateOutcomes([
      { path: 'a.py', outcome: makeOutcome({ cached: true }) },
      { path: 'b.py', outcome: makeOutcome({ cached: true }) },
    ]).analyzer.cached).toBe(true);
    expect(aggregateOutcomes([
      { path: 'a.py', outcome: makeOutcome({ cached: true }) },
      { path: 'b.py', outcome: makeOutcome() },
    ]).analyzer.cached).toBeUndefined();
  });
});

describe('toReviewResult', () => {
  it('is undefined until the run completes', () => {
    expect(toReviewResult(makeRun('r1', { stage: 'consolidating' }))).toBeUndefined();
    expect(toReviewResult(makeRun('r1', { stage: 'complete' }))).toBeUndefined();
  });

  it('builds the report of a complete run', () => {
    const finding = makeFinding({ severity: 'critical', sources: ['analyzer', 'security'] });
    const result = toReviewResult(makeRun('r1', {
      stage: 'complete',
      consolidated: [finding, makeFinding({ severity: 'info' })],
      summary: 'Summary',
      score: 78,
      recommendation: 'reject',
      totalCost: 0.5,
      completedAt: '2026-01-01T00:02:00.000Z',
    }));

    expect(result).toEqual({
      reviewId: 'r1',
      files: ['app.py'],
      summary: 'Summary',
      score: 78,
      recommendation: 'reject',
      statistics: {
        totalIssues: 2,
        bySeverity: { critical: 1, major: 0, minor: 0, info: 1 },
        totalCost: 0.5,
      },
      issues: [finding, makeFinding({ severity: 'info' })],
      metadata: {
        createdAt: '2026-01-01T00:00:00.000Z',
        completedAt: '2026-01-01T00:02:00.000Z',
      },
    });
    expect(result?.issues[0].sources).not.toBe(finding.sources);
  });
});
