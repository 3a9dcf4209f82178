// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Review domain types.
 */

import type { StaticAnalysisResult } from '../analysis/static-analyzers.js';
import type { KnowledgeEntry } from '../knowledge/types.js';

/**
 * An immutable source file under review.
 * Identity is (path, fingerprint).
 */
export interface CodeUnit {
  readonly path: string;
  readonly content: string;
  readonly language: string;
  /** UTF-8 byte length of content */
  readonly size: number;
  /** sha256 of content, hex */
  readonly fingerprint: string;
}

export type Severity = 'critical' | 'major' | 'minor' | 'info';

export const SEVERITIES: readonly Severity[] = ['critical', 'major', 'minor', 'info'];

export type FindingCategory =
  | 'bug'
  | 'security'
  | 'performance'
  | 'style'
  | 'documentation'
  | 'best_practice';

export const FINDING_CATEGORIES: readonly FindingCategory[] = [
  'bug',
  'security',
  'performance',
  'style',
  'documentation',
  'best_practice',
];

/**
 * Producer-specific extras carried along with a finding.
 */
export interface FindingOrigin {
  /** File the finding was reported against */
  path?: string;
  cweId?: string;
  impact?: string;
}

/**
 * One reported issue.
 */
export interface Finding {
  id: string;
  severity: Severity;
  category: FindingCategory;
  lineStart: number;
  lineEnd?: number;
  title: string;
  description: string;
  suggestion?: string;
  suggestedPatch?: string;
  /** In [0, 1] */
  confidence: number;
  /** Producers that independently reported this finding */
  sources: string[];
  origin?: FindingOrigin;
}

/**
 * What one producer returned, for one file or aggregated over files.
 */
export interface ProducerOutcome {
  producerName: string;
  findings: Finding[];
  narrative: string;
  qualityScore?: number;
  elapsedMs: number;
  cost: number;
  succeeded: boolean;
  error?: string;
  /** Served from the result cache */
  cached?: boolean;
}

/**
 * Outcome of a single (file, producer) pair in the produce stage.
 */
export interface PairOutcome {
  path: string;
  outcome: ProducerOutcome;
}

export type ReviewStage =
  | 'pending'
  | 'preprocessing'
  | 'enriching'
  | 'producing'
  | 'consolidating'
  | 'complete'
  | 'failed';

export const STAGE_ORDER: readonly ReviewStage[] = [
  'pending',
  'preprocessing',
  'enriching',
  'producing',
  'consolidating',
  'complete',
];

export function isTerminalStage(stage: ReviewStage): boolean {
  return stage === 'complete' || stage === 'failed';
}

/**
 * Stages only move forward, one step at a time; any live stage may fail.
 */
export function canTransition(from: ReviewStage, to: ReviewStage): boolean {
  if (isTerminalStage(from)) return false;
  if (to === 'failed') return true;
  return STAGE_ORDER.indexOf(to) === STAGE_ORDER.indexOf(from) + 1;
}

export type Recommendation = 'approve' | 'request_changes' | 'reject';

/**
 * Recognized per-review options. Unknown keys are ignored.
 */
export interface ReviewOptions {
  enableSecurity: boolean;
  enablePerformance: boolean;
  enableDocumentation: boolean;
  enableStaticAnalysis: boolean;
  enableKnowledge: boolean;
  useCache: boolean;
}

export const DEFAULT_REVIEW_OPTIONS: ReviewOptions = {
  enableSecurity: true,
  enablePerformance: true,
  enableDocumentation: true,
  enableStaticAnalysis: true,
  enableKnowledge: true,
  useCache: true,
};

/**
 * Aggregate root for one review, owned by the registry.
 */
export interface ReviewRun {
  reviewId: string;
  units: CodeUnit[];
  options: ReviewOptions;
  stage: ReviewStage;
  staticResults: Record<string, StaticAnalysisResult>;
  contexts: Record<string, KnowledgeEntry[]>;
  /** Per-file preprocessing failures */
  fileErrors: Record<string, string>;
  /** Number of (file, producer) pairs scheduled in the produce stage */
  plannedPairs: number;
  pairOutcomes: PairOutcome[];
  /** Per-producer outcomes aggregated across files */
  outcomes: Record<string, ProducerOutcome>;
  consolidated?: Finding[];
  summary?: string;
  score?: number;
  recommendation?: Recommendation;
  createdAt: string;
  completedAt?: string;
  totalCost: number;
  error?: string;
}

export type SeverityCounts = Record<Severity, number>;

/**
 * Final report for a completed review.
 */
export interface ReviewResult {
  reviewId: string;
  files: string[];
  summary: string;
  score: number;
  recommendation: Recommendation;
  statistics: {
    totalIssues: number;
    bySeverity: SeverityCounts;
    totalCost: number;
  };
  issues: Finding[];
  metadata: {
    createdAt: string;
    completedAt: string;
  };
}

/**
 * Snapshot handed to pollers.
 */
export interface ReviewStatus {
  reviewId: string;
  stage: ReviewStage;
  progress: number;
  result?: ReviewResult;
  error?: string;
}

/**
 * Caller-supplied file before validation.
 */
export interface SubmittedFile {
  path: string;
  content: string;
  language?: string;
}
