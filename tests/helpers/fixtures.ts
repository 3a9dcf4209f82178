// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Builders for findings, outcomes and runs used across tests.
 */

import { createCodeUnit } from '../../src/review/units.js';
import {
  DEFAULT_REVIEW_OPTIONS,
  type CodeUnit,
  type Finding,
  type ProducerOutcome,
  type ReviewOptions,
  type ReviewRun,
} from '../../src/review/types.js';

export function makeFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    id: 'analyzer_0',
    severity: 'minor',
    category: 'bug',
    lineStart: 1,
    title: 'Issue',
    description: 'Something is off',
    confidence: 0.8,
    sources: ['analyzer'],
    ...overrides,
  };
}

export function makeOutcome(overrides: Partial<ProducerOutcome> = {}): ProducerOutcome {
  return {
    producerName: 'analyzer',
    findings: [],
    narrative: '',
    elapsedMs: 10,
    cost: 0,
    succeeded: true,
    ...overrides,
  };
}

export function makeUnit(path: string = 'app.py', content: string = 'print("hi")\n'): CodeUnit {
  return createCodeUnit(path, content);
}

export function makeRun(reviewId: string, overrides: Partial<ReviewRun> = {}): ReviewRun {
  const options: ReviewOptions = { ...DEFAULT_REVIEW_OPTIONS };
  return {
    reviewId,
    units: [makeUnit()],
    options,
    stage: 'pending',
    staticResults: {},
    contexts: {},
    fileErrors: {},
    plannedPairs: 0,
    pairOutcomes: [],
    outcomes: {},
    createdAt: '2026-01-01T00:00:00.000Z',
    totalCost: 0,
    ...overrides,
  };
}

/**
 * A producer response body in the JSON shape the parser reads.
 */
export function producerJson(issues: Array<Record<string, unknown>>, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ issues, summary: 'Reviewed.', ...extra });
}
