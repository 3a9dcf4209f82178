// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { CodeUnit } from '../review/types.js';
import { BaseProducer } from './base.js';
import { buildReviewPrompt, type ProducerContext } from './prompts.js';

/**
 * Bugs, logic errors and general code quality.
 */
export class AnalyzerProducer extends BaseProducer {
  readonly name = 'analyzer';

  getSystemPrompt(): string {
    return `You are an expert code analyzer with deep knowledge of:
- Common bug patterns across multiple languages
- Edge cases and boundary conditions
- Logic errors and race conditions
- Type safety issues
- Error handling best practices
- Code smells and anti-patterns

You provide actionable, specific feedback with exact line numbers.`;
  }

  getUserPrompt(unit: CodeUnit, context: ProducerContext): string {
    return buildReviewPrompt('bugs, logic errors and code quality problems', unit, context);
  }
}
