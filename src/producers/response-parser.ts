// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Parsing of producer model output.
 *
 * Models are asked for a single JSON object but routinely wrap it in a
 * code fence or emit slightly malformed JSON. Parsing is lenient: an
 * unusable response yields no findings rather than an error.
 */

import { logger } from '../logger.js';
import {
  FINDING_CATEGORIES,
  SEVERITIES,
  type Finding,
  type FindingCategory,
  type FindingOrigin,
  type Severity,
} from '../review/types.js';

export const DEFAULT_SEVERITY: Severity = 'minor';
export const DEFAULT_CATEGORY: FindingCategory = 'style';
export const DEFAULT_TITLE = 'Issue found';
export const DEFAULT_CONFIDENCE = 0.8;

export interface ParsedResponse {
  findings: Finding[];
  narrative: string;
  qualityScore?: number;
}

export interface ParsedReflection {
  falsePositives: Set<string>;
  confidenceAdjustments: Map<string, number>;
}

/**
 * Strip a leading markdown code fence (and its optional `json` tag).
 */
export function stripCodeFence(content: string): string {
  const trimmed = content.trim();
  if (!trimmed.startsWith('```')) {
    return trimmed;
  }
  let inner = trimmed.split('```')[1] ?? '';
  if (inner.startsWith('json')) {
    inner = inner.slice(4);
  }
  return inner.trim();
}

/**
 * Attempt to fix common JSON issues from LLM output:
 * - Single quotes instead of double quotes
 * - Raw newlines inside strings (should be escaped as \n)
 * - Trailing quotes after numbers (e.g., "confidence":0.9"} -> "confidence":0.9})
 * - Trailing commas before a closing bracket
 */
export function tryFixJson(jsonStr: string): string {
  let fixed = jsonStr;

  // Match: : 'content' and replace with : "content"
  fixed = fixed.replace(/:(\s*)'((?:[^'\\]|\\.)*)'/gs, ':$1"$2"');

  // Match: :number"} or :number", and remove the errant quote
  fixed = fixed.replace(/:(\s*-?\d+(?:\.\d+)?)"(\s*[},\]])/g, ':$1$2');

  fixed = fixed.replace(/,(\s*[}\]])/g, '$1');

  return escapeNewlinesInStrings(fixed);
}

/**
 * Escape raw newlines inside JSON string values.
 * Walks through the string tracking quote state to only escape
 * newlines that appear inside quoted strings.
 */
function escapeNewlinesInStrings(jsonStr: string): string {
  const result: string[] = [];
  let inString = false;
  let isEscaped = false;

  for (let i = 0; i < jsonStr.length; i++) {
    const char = jsonStr[i];

    if (isEscaped) {
      result.push(char);
      isEscaped = false;
      continue;
    }

    if (char === '\\') {
      result.push(char);
      isEscaped = true;
      continue;
    }

    if (char === '"') {
      inString = !inString;
      result.push(char);
      continue;
    }

    if (inString && (char === '\n' || char === '\r')) {
      if (char === '\r' && jsonStr[i + 1] === '\n') {
        // CRLF as a single \n
        result.push('\\n');
        i++;
      } else if (char === '\n') {
        result.push('\\n');
      } else {
        result.push('\\r');
      }
      continue;
    }

    result.push(char);
  }

  return result.join('');
}

/**
 * Try to parse JSON, attempting to fix common issues if standard parse fails.
 */
export function tryParseJson(jsonStr: string): unknown {
  try {
    return JSON.parse(jsonStr);
  } catch {
    try {
      return JSON.parse(tryFixJson(jsonStr));
    } catch {
      return null;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(data: Record<string, unknown>, key: string): string | undefined {
  const value = data[key];
  return typeof value === 'string' ? value : undefined;
}

function numberField(data: Record<string, unknown>, key: string): number | undefined {
  const value = data[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function clampConfidence(value: number): number {
  return Math.max(0, Math.min(1, value));
}

function toSeverity(value: unknown): Severity {
  return SEVERITIES.find((s) => s === value) ?? DEFAULT_SEVERITY;
}

function toCategory(value: unknown): FindingCategory {
  return FINDING_CATEGORIES.find((c) => c === value) ?? DEFAULT_CATEGORY;
}

/**
 * Normalize one reported issue, defaulting anything missing or invalid.
 */
function toFinding(data: Record<string, unknown>, producerName: string, index: number): Finding {
  const lineStart = numberField(data, 'line_start');
  const lineEnd = numberField(data, 'line_end');
  const confidence = numberField(data, 'confidence');
  const suggestion = stringField(data, 'suggestion');
  const suggestedPatch = stringField(data, 'suggested_code');
  const cweId = stringField(data, 'cwe_id');
  const impact = stringField(data, 'impact');

  const finding: Finding = {
    id: `${producerName}_${index}`,
    severity: toSeverity(data.severity),
    category: toCategory(data.category),
    lineStart: lineStart !== undefined ? Math.max(0, Math.trunc(lineStart)) : 0,
    title: stringField(data, 'title') || DEFAULT_TITLE,
    description: stringField(data, 'description') ?? '',
    confidence: confidence !== undefined ? clampConfidence(confidence) : DEFAULT_CONFIDENCE,
    sources: [producerName],
  };

  if (lineEnd !== undefined) finding.lineEnd = Math.max(0, Math.trunc(lineEnd));
  if (suggestion) finding.suggestion = suggestion;
  if (suggestedPatch) finding.suggestedPatch = suggestedPatch;

  const origin: FindingOrigin = {};
  if (cweId) origin.cweId = cweId;
  if (impact) origin.impact = impact;
  if (Object.keys(origin).length > 0) finding.origin = origin;

  return finding;
}

/**
 * Parse a producer response of the form
 * `{ reasoning, issues: [...], overall_quality_score | score }`.
 */
export function parseProducerResponse(content: string, producerName: string): ParsedResponse {
  const body = stripCodeFence(content);
  const data = tryParseJson(body);

  if (!isRecord(data)) {
    logger.warn(`${producerName} returned a response that is not a JSON object`);
    logger.debug(`Response preview: ${body.slice(0, 200)}`);
    return { findings: [], narrative: '' };
  }

  const issues = Array.isArray(data.issues) ? data.issues : [];
  const findings: Finding[] = [];
  issues.forEach((issue: unknown, index: number) => {
    if (isRecord(issue)) {
      findings.push(toFinding(issue, producerName, index));
    }
  });

  const overall = numberField(data, 'overall_quality_score');
  const qualityScore = overall || numberField(data, 'score');

  const parsed: ParsedResponse = {
    findings,
    narrative: stringField(data, 'reasoning') ?? '',
  };
  if (qualityScore !== undefined) parsed.qualityScore = qualityScore;
  return parsed;
}

/**
 * Parse a self-reflection response:
 * `{ false_positives: [id], confidence_adjustments: { id: number } }`.
 * Returns null when the response cannot be used.
 */
export function parseReflection(content: string): ParsedReflection | null {
  const data = tryParseJson(stripCodeFence(content));
  if (!isRecord(data)) return null;

  const falsePositives = new Set<string>();
  if (Array.isArray(data.false_positives)) {
    for (const id of data.false_positives) {
      if (typeof id === 'string') falsePositives.add(id);
    }
  }

  const confidenceAdjustments = new Map<string, number>();
  const adjustments = data.confidence_adjustments;
  if (isRecord(adjustments)) {
    for (const [id, value] of Object.entries(adjustments)) {
      if (typeof value === 'number' && Number.isFinite(value)) {
        confidenceAdjustments.set(id, clampConfidence(value));
      }
    }
  }

  return { falsePositives, confidenceAdjustments };
}
