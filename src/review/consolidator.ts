// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Consolidator
 *
 * Merges findings from all producers into one ranked report:
 * deduplicate, rank, score, recommend, summarize. Only structural
 * metadata is consulted; finding text is never rewritten.
 */

import type {
  Finding,
  ProducerOutcome,
  Recommendation,
  Severity,
  SeverityCounts,
} from './types.js';

/** Title prefix width used in the dedup key */
export const TITLE_KEY_WIDTH = 50;

export const SEVERITY_RANK: Record<Severity, number> = {
  critical: 0,
  major: 1,
  minor: 2,
  info: 3,
};

const SEVERITY_PENALTY: Record<Severity, number> = {
  critical: 15,
  major: 5,
  minor: 2,
  info: 0,
};

export interface Consolidation {
  findings: Finding[];
  score: number;
  recommendation: Recommendation;
  summary: string;
  totalCost: number;
}

/**
 * Heuristic identity for "same issue reported by different producers".
 */
export function dedupKey(finding: Finding): string {
  return `${finding.lineStart}\u0000${finding.category}\u0000${finding.title.slice(0, TITLE_KEY_WIDTH)}`;
}

/**
 * Keep one finding per dedup key: the highest-confidence one (first wins
 * ties), with sources widened to the union of the group.
 */
export function deduplicateFindings(findings: Finding[]): Finding[] {
  const groups = new Map<string, Finding[]>();
  for (const finding of findings) {
    const key = dedupKey(finding);
    const group = groups.get(key);
    if (group) {
      group.push(finding);
    } else {
      groups.set(key, [finding]);
    }
  }

  const unique: Finding[] = [];
  for (const group of groups.values()) {
    let best = group[0];
    for (const candidate of group) {
      if (candidate.confidence > best.confidence) {
        best = candidate;
      }
    }
    const sources = new Set<string>();
    for (const finding of group) {
      for (const source of finding.sources) sources.add(source);
    }
    unique.push({ ...best, sources: [...sources].sort() });
  }
  return unique;
}

/**
 * Sort by severity (critical first), then confidence (highest first).
 */
export function rankFindings(findings: Finding[]): Finding[] {
  return [...findings].sort((a, b) =>
    SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity] || b.confidence - a.confidence
  );
}

export function countBySeverity(findings: Finding[]): SeverityCounts {
  const counts: SeverityCounts = { critical: 0, major: 0, minor: 0, info: 0 };
  for (const finding of findings) {
    counts[finding.severity]++;
  }
  return counts;
}

/**
 * 100 minus severity penalties, clamped to [0, 100].
 */
export function calculateScore(findings: Finding[]): number {
  let score = 100;
  for (const finding of findings) {
    score -= SEVERITY_PENALTY[finding.severity];
  }
  return Math.max(0, Math.min(100, score));
}

export function determineRecommendation(findings: Finding[], score: number): Recommendation {
  const hasCritical = findings.some((f) => f.severity === 'critical');
  if (hasCritical || score < 50) return 'reject';
  if (score < 70) return 'request_changes';
  return 'approve';
}

export function generateSummary(findings: Finding[]): string {
  const { critical, major } = countBySeverity(findings);

  if (critical > 0) {
    return `⚠️ Code review found ${critical} critical and ${major} major issues that must be addressed before merging.`;
  }
  if (major > 3) {
    return `⚠️ Code review found ${major} major issues. Please address these before merging.`;
  }
  if (major > 0) {
    return `✅ Code is generally good with ${major} major issues to consider.`;
  }
  return '✅ Code looks great! Only minor suggestions for improvement.';
}

/**
 * Consolidate producer outcomes into a single verdict.
 * Failed outcomes contribute cost but no findings.
 */
export function consolidate(outcomes: ProducerOutcome[]): Consolidation {
  const all: Finding[] = [];
  let totalCost = 0;
  for (const outcome of outcomes) {
    totalCost += outcome.cost;
    if (outcome.succeeded) {
      all.push(...outcome.findings);
    }
  }

  const findings = rankFindings(deduplicateFindings(all));
  const score = calculateScore(findings);

  return {
    findings,
    score,
    recommendation: determineRecommendation(findings, score),
    summary: generateSummary(findings),
    totalCost,
  };
}
