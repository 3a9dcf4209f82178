// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { CodeUnit } from '../review/types.js';
import { BaseProducer } from './base.js';
import { buildReviewPrompt, type ProducerContext } from './prompts.js';

/**
 * Documentation quality.
 */
export class DocumenterProducer extends BaseProducer {
  readonly name = 'documenter';

  getSystemPrompt(): string {
    return `You are a documentation quality expert focusing on:
- Function and class documentation
- API documentation
- Inline comments quality
- Type hints and annotations
- Code readability

You ensure code is well-documented and maintainable.`;
  }

  getUserPrompt(unit: CodeUnit, context: ProducerContext): string {
    return buildReviewPrompt('missing or misleading documentation', unit, context);
  }
}
