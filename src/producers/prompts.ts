// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Prompt templates shared by the producers.
 */

import type { StaticAnalysisResult } from '../analysis/static-analyzers.js';
import type { KnowledgeEntry } from '../knowledge/types.js';
import type { CodeUnit, Finding } from '../review/types.js';

/**
 * Enrichment output handed to a producer for one file.
 */
export interface ProducerContext {
  staticAnalysis?: StaticAnalysisResult;
  knowledge: KnowledgeEntry[];
}

export const EMPTY_CONTEXT: ProducerContext = { knowledge: [] };

const RESPONSE_FORMAT = `Respond with a single JSON object and nothing else:
{
  "reasoning": "short explanation of your overall assessment",
  "issues": [
    {
      "severity": "critical | major | minor | info",
      "category": "bug | security | performance | style | documentation | best_practice",
      "line_start": 1,
      "line_end": 1,
      "title": "short title",
      "description": "what is wrong and why it matters",
      "suggestion": "how to fix it",
      "suggested_code": "optional replacement code",
      "confidence": 0.9,
      "cwe_id": "optional, security findings only",
      "impact": "optional, performance findings only"
    }
  ],
  "overall_quality_score": 85
}
Report only real issues. Use exact line numbers from the file.`;

export const REFLECTION_SYSTEM_PROMPT = 'You are a self-reflective code reviewer.';

/**
 * Render static analysis and knowledge context as tagged blocks.
 */
export function formatContext(context: ProducerContext): string {
  let text = '';

  const staticResult = context.staticAnalysis;
  if (staticResult && staticResult.succeeded && staticResult.toolName !== 'none') {
    text += '\n<static_analysis>\n';
    text += 'Static analysis tools found:\n';
    text += `- ${staticResult.toolName}: ${staticResult.issues.length} issues\n`;
    text += '</static_analysis>\n';
  }

  if (context.knowledge.length > 0) {
    text += '\n<best_practices>\n';
    for (const entry of context.knowledge) {
      const title = entry.metadata.title ?? entry.metadata.topic ?? '';
      text += `- ${title}: ${entry.content}\n`;
    }
    text += '</best_practices>\n';
  }

  return text;
}

/**
 * Build the user prompt for a review focus.
 */
export function buildReviewPrompt(focus: string, unit: CodeUnit, context: ProducerContext): string {
  return `Review the following ${unit.language} file for ${focus}.

File: ${unit.path}
${formatContext(context)}
<code>
${unit.content}
</code>

${RESPONSE_FORMAT}`;
}

/**
 * Second-pass prompt asking the producer to weed out its own false positives.
 */
export function buildReflectionPrompt(unit: CodeUnit, findings: Finding[], previousAnalysis: string): string {
  const listed = findings
    .map((f) => `- ${f.id} (line ${f.lineStart}, ${f.severity}): ${f.title}`)
    .join('\n');

  return `Here is your previous analysis of ${unit.path}:

<previous_analysis>
${previousAnalysis}
</previous_analysis>

Issues reported:
${listed}

<code>
${unit.content}
</code>

Re-examine each issue against the code. Identify false positives and correct
over- or under-confident scores. Respond with a single JSON object:
{
  "false_positives": ["issue id", ...],
  "confidence_adjustments": { "issue id": 0.5 }
}`;
}
