// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { CodeUnit } from '../review/types.js';
import { BaseProducer } from './base.js';
import { buildReviewPrompt, type ProducerContext } from './prompts.js';

/**
 * Security vulnerabilities, with CWE ids where they apply.
 */
export class SecurityProducer extends BaseProducer {
  readonly name = 'security';

  getSystemPrompt(): string {
    return `You are a security expert specializing in:
- OWASP Top 10 vulnerabilities
- SQL injection, XSS, CSRF
- Authentication and authorization flaws
- Insecure data handling
- Cryptographic issues
- Input validation
- Security misconfigurations

You think like an attacker to find exploitable vulnerabilities.
Tag each finding with the matching CWE id in "cwe_id".`;
  }

  getUserPrompt(unit: CodeUnit, context: ProducerContext): string {
    return buildReviewPrompt('security vulnerabilities', unit, context);
  }
}
