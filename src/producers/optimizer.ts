// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { CodeUnit } from '../review/types.js';
import { BaseProducer } from './base.js';
import { buildReviewPrompt, type ProducerContext } from './prompts.js';

/**
 * Performance bottlenecks.
 */
export class OptimizerProducer extends BaseProducer {
  readonly name = 'optimizer';

  getSystemPrompt(): string {
    return `You are a performance optimization expert specializing in:
- Algorithm complexity analysis
- Database query optimization
- Memory usage optimization
- Caching strategies
- Async/await patterns
- Resource management

You identify bottlenecks and suggest concrete improvements.
Describe the expected effect of each fix in "impact".`;
  }

  getUserPrompt(unit: CodeUnit, context: ProducerContext): string {
    // Linter counts say nothing about performance
    return buildReviewPrompt('performance problems', unit, { knowledge: context.knowledge });
  }
}
