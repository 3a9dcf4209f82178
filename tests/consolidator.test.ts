// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import {
  calculateScore,
  consolidate,
  countBySeverity,
  dedupKey,
  deduplicateFindings,
  determineRecommendation,
  generateSummary,
  rankFindings,
} from '../src/review/consolidator.js';
import { makeFinding, makeOutcome } from './helpers/fixtures.js';

describe('deduplicateFindings', () => {
  it('keeps the higher-confidence finding and merges sources', () => {
    const low = makeFinding({ id: 'a', lineStart: 10, title: 'SQL injection', category: 'security', confidence: 0.6, sources: ['analyzer'] });
    const high = makeFinding({ id: 'b', lineStart: 10, title: 'SQL injection', category: 'security', confidence: 0.9, sources: ['security'] });

    const result = deduplicateFindings([low, high]);

    expect(result).toHaveLength(1);
    expect(result[0].id).toBe('b');
    expect(result[0].confidence).toBe(0.9);
    expect(result[0].sources).toEqual(['analyzer', 'security']);
  });

  it('keeps the first finding on a confidence tie', () => {
    const first = makeFinding({ id: 'first', sources: ['b'] });
    const second = makeFinding({ id: 'second', sources: ['a'] });

    const [result] = deduplicateFindings([first, second]);

    expect(result.id).toBe('first');
    expect(result.sources).toEqual(['a', 'b']);
  });

  it('matches titles on their first 50 characters only', () => {
    const prefix = 'x'.repeat(50);
    const a = makeFinding({ title: `${prefix} one` });
    const b = makeFinding({ title: `${prefix} two` });
    expect(dedupKey(a)).toBe(dedupKey(b));
    expect(deduplicateFindings([a, b])).toHaveLength(1);
  });

  it('keeps findings on different lines or categories apart', () => {
    const findings = [
      makeFinding({ lineStart: 1 }),
      makeFinding({ lineStart: 2 }),
      makeFinding({ lineStart: 1, category: 'style' }),
    ];
    expect(deduplicateFindings(findings)).toHaveLength(3);
  });
});

describe('rankFindings', () => {
  it('orders by severity, then confidence', () => {
    const ranked = rankFindings([
      makeFinding({ id: 'minor', severity: 'minor', confidence: 0.99 }),
      makeFinding({ id: 'major-low', severity: 'major', confidence: 0.7 }),
      makeFinding({ id: 'critical', severity: 'critical', confidence: 0.75 }),
      makeFinding({ id: 'major-high', severity: 'major', confidence: 0.95 }),
    ]);
    expect(ranked.map((f) => f.id)).toEqual(['critical', 'major-high', 'major-low', 'minor']);
  });
});

describe('scoring', () => {
  it('subtracts severity penalties', () => {
    const findings = [
      makeFinding({ severity: 'critical' }),
      makeFinding({ severity: 'major' }),
      makeFinding({ severity: 'minor' }),
      makeFinding({ severity: 'info' }),
    ];
    expect(calculateScore(findings)).toBe(78);
    expect(countBySeverity(findings)).toEqual({ critical: 1, major: 1, minor: 1, info: 1 });
  });

  it('clamps at zero', () => {
    const findings = Array.from({ length: 10 }, () => makeFinding({ severity: 'critical' }));
    expect(calculateScore(findings)).toBe(0);
  });

  it('rejects any critical finding', () => {
    expect(determineRecommendation([makeFinding({ severity: 'critical' })], 85)).toBe('reject');
  });

  it('maps scores to recommendations', () => {
    expect(determineRecommendation([], 49)).toBe('reject');
    expect(determineRecommendation([], 50)).toBe('request_changes');
    expect(determineRecommendation([], 69)).toBe('request_changes');
    expect(determineRecommendation([], 70)).toBe('approve');
  });
});

describe('generateSummary', () => {
  it('calls out critical issues', () => {
    const summary = generateSummary([makeFinding({ severity: 'critical' }), makeFinding({ severity: 'major' })]);
    expect(summary).toBe('⚠️ Code review found 1 critical and 1 major issues that must be addressed before merging.');
  });

  it('distinguishes many and few major issues', () => {
    const four = Array.from({ length: 4 }, () => makeFinding({ severity: 'major' }));
    expect(generateSummary(four)).toBe('⚠️ Code review found 4 major issues. Please address these before merging.');
    expect(generateSummary(four.slice(0, 2))).toBe('✅ Code is generally good with 2 major issues to consider.');
  });

  it('praises clean code', () => {
    expect(generateSummary([])).toBe('✅ Code looks great! Only minor suggestions for improvement.');
  });
});

describe('consolidate', () => {
  it('dedups across producers and ignores failed outcomes except for cost', () => {
    const result = consolidate([
      makeOutcome({
        producerName: 'analyzer',
        cost: 0.01,
        findings: [makeFinding({ lineStart: 10, title: 'SQL injection', category: 'security', confidence: 0.6, severity: 'major', sources: ['analyzer'] })],
      }),
      makeOutcome({
        producerName: 'security',
        cost: 0.02,
        findings: [makeFinding({ lineStart: 10, title: 'SQL injection', category: 'security', confidence: 0.9, severity: 'major', sources: ['security'] })],
      }),
      makeOutcome({
        producerName: 'optimizer',
        cost: 0.005,
        succeeded: false,
        error: 'boom',
        findings: [makeFinding({ severity: 'critical' })],
      }),
    ]);

    expect(result.findings).toHaveLength(1);
    expect(result.findings[0].confidence).toBe(0.9);
    expect(result.findings[0].sources).toEqual(['analyzer', 'security']);
    expect(result.score).toBe(95);
    expect(result.recommendation).toBe('approve');
    expect(result.totalCost).toBeCloseTo(0.035, 10);
  });
});
