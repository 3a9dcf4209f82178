// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Terminal formatting for review reports.
 */

import chalk from 'chalk';
import type { CacheStats } from '../cache/types.js';
import type { Finding, Recommendation, ReviewStatus, Severity } from '../review/types.js';
import { formatCost } from '../usage.js';

export type OutputFormat = 'text' | 'json';

const SEVERITY_COLOR: Record<Severity, (text: string) => string> = {
  critical: chalk.red.bold,
  major: chalk.yellow,
  minor: chalk.blue,
  info: chalk.dim,
};

const RECOMMENDATION_COLOR: Record<Recommendation, (text: string) => string> = {
  approve: chalk.green.bold,
  request_changes: chalk.yellow.bold,
  reject: chalk.red.bold,
};

export function parseOutputFormat(value: string): OutputFormat {
  if (value === 'text' || value === 'json') return value;
  throw new Error(`Unknown output format "${value}" (expected text or json)`);
}

/**
 * One finding as a short block: severity tag, location, title, detail.
 */
export function formatFinding(finding: Finding): string {
  const color = SEVERITY_COLOR[finding.severity];
  const location = finding.origin?.path
    ? `${finding.origin.path}:${finding.lineStart}`
    : `line ${finding.lineStart}`;

  const lines = [
    `${color(`[${finding.severity.toUpperCase()}]`)} ${chalk.bold(finding.title)} ${chalk.dim(`(${location})`)}`,
    `  ${finding.description}`,
  ];
  if (finding.suggestion) {
    lines.push(chalk.cyan(`  Suggestion: ${finding.suggestion}`));
  }
  lines.push(chalk.dim(`  ${finding.category} · ${Math.round(finding.confidence * 100)}% · ${finding.sources.join(', ')}`));
  return lines.join('\n');
}

/**
 * Full text report for a terminal status.
 */
export function formatStatus(status: ReviewStatus): string {
  if (status.stage === 'failed') {
    return chalk.red(`Review ${status.reviewId} failed: ${status.error ?? 'unknown error'}`);
  }
  const result = status.result;
  if (!result) {
    return chalk.dim(`Review ${status.reviewId}: ${status.stage} (${status.progress}%)`);
  }

  const { bySeverity } = result.statistics;
  const lines = [
    chalk.bold(`Review ${result.reviewId}`),
    `Files: ${result.files.join(', ')}`,
    `Score: ${result.score}/100  Recommendation: ${RECOMMENDATION_COLOR[result.recommendation](result.recommendation)}`,
    `Issues: ${SEVERITY_COLOR.critical(`${bySeverity.critical} critical`)}, ` +
      `${SEVERITY_COLOR.major(`${bySeverity.major} major`)}, ` +
      `${SEVERITY_COLOR.minor(`${bySeverity.minor} minor`)}, ` +
      `${SEVERITY_COLOR.info(`${bySeverity.info} info`)}`,
    chalk.dim(`Cost: ${formatCost(result.statistics.totalCost)}`),
    '',
    result.summary,
  ];

  if (result.issues.length > 0) {
    lines.push('');
    lines.push(...result.issues.map(formatFinding));
  }
  return lines.join('\n');
}

/**
 * Machine-readable status for --format json.
 */
export function formatStatusJson(status: ReviewStatus): string {
  return JSON.stringify(status, null, 2);
}

export function formatCacheStats(stats: CacheStats): string {
  const kb = (stats.sizeBytes / 1024).toFixed(1);
  return `${chalk.bold('Cache')}: ${stats.entries} entries, ${kb} KB`;
}

/**
 * Exit code for a finished review: non-zero for reject and failed runs.
 */
export function exitCodeFor(status: ReviewStatus): number {
  if (status.stage === 'failed') return 1;
  return status.result?.recommendation === 'reject' ? 1 : 0;
}
