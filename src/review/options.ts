// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Request validation: review options and submitted files.
 */

import { logger } from '../logger.js';
import { ValidationError } from './errors.js';
import { createCodeUnit } from './units.js';
import { DEFAULT_REVIEW_OPTIONS, type CodeUnit, type ReviewOptions } from './types.js';

/**
 * Accepted spellings of each option.
 */
const OPTION_ALIASES: Record<string, keyof ReviewOptions> = {
  enableSecurity: 'enableSecurity',
  enable_security: 'enableSecurity',
  enablePerformance: 'enablePerformance',
  enable_performance: 'enablePerformance',
  enableDocumentation: 'enableDocumentation',
  enable_documentation: 'enableDocumentation',
  enableStaticAnalysis: 'enableStaticAnalysis',
  enable_static_analysis: 'enableStaticAnalysis',
  enableKnowledge: 'enableKnowledge',
  enable_knowledge: 'enableKnowledge',
  useCache: 'useCache',
  use_cache: 'useCache',
};

export interface SubmissionLimits {
  maxFiles: number;
  /** Per-file limit in bytes */
  maxFileSize: number;
}

export const DEFAULT_SUBMISSION_LIMITS: SubmissionLimits = {
  maxFiles: 50,
  maxFileSize: 100_000,
};

/**
 * Parse a free-form options map. Unknown keys are ignored with a
 * warning; a known key with a non-boolean value is rejected.
 */
export function parseReviewOptions(raw: unknown = {}): ReviewOptions {
  if (raw === undefined || raw === null) {
    return { ...DEFAULT_REVIEW_OPTIONS };
  }
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ValidationError('Options must be an object', 'options');
  }

  const options: ReviewOptions = { ...DEFAULT_REVIEW_OPTIONS };
  const entries: Array<[string, unknown]> = Object.entries(raw);
  for (const [key, value] of entries) {
    const option = Object.hasOwn(OPTION_ALIASES, key) ? OPTION_ALIASES[key] : undefined;
    if (!option) {
      logger.warn(`Ignoring unknown review option "${key}"`);
      continue;
    }
    if (typeof value !== 'boolean') {
      throw new ValidationError(`Option "${key}" must be a boolean`, key);
    }
    options[option] = value;
  }
  return options;
}

/**
 * Validate submitted files and turn them into code units.
 */
export function validateSubmission(files: unknown, limits: SubmissionLimits = DEFAULT_SUBMISSION_LIMITS): CodeUnit[] {
  if (!Array.isArray(files) || files.length === 0) {
    throw new ValidationError('At least one file is required', 'files');
  }
  if (files.length > limits.maxFiles) {
    throw new ValidationError(
      `Too many files: ${files.length} (maximum ${limits.maxFiles})`,
      'files'
    );
  }

  const seen = new Set<string>();
  const units: CodeUnit[] = [];

  files.forEach((file: unknown, index: number) => {
    const field = `files[${index}]`;
    if (typeof file !== 'object' || file === null) {
      throw new ValidationError(`${field} must be an object`, field);
    }
    if (!('path' in file) || typeof file.path !== 'string' || file.path.trim() === '') {
      throw new ValidationError(`${field}.path must be a non-empty string`, `${field}.path`);
    }
    const path = file.path;
    if (!('content' in file) || typeof file.content !== 'string') {
      throw new ValidationError(`${field}.content must be a string`, `${field}.content`);
    }
    const content = file.content;

    const size = Buffer.byteLength(content, 'utf-8');
    if (size > limits.maxFileSize) {
      throw new ValidationError(
        `${path} is ${size} bytes (maximum ${limits.maxFileSize})`,
        `${field}.content`
      );
    }
    if (seen.has(path)) {
      throw new ValidationError(`Duplicate file path: ${path}`, `${field}.path`);
    }
    seen.add(path);

    let language: string | undefined;
    if ('language' in file && file.language !== undefined && file.language !== null) {
      const declared = file.language;
      if (typeof declared !== 'string') {
        throw new ValidationError(`${field}.language must be a string`, `${field}.language`);
      }
      language = declared || undefined;
    }

    units.push(createCodeUnit(path, content, language));
  });

  return units;
}
