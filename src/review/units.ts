// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { createHash } from 'node:crypto';
import { extname } from 'node:path';
import type { CodeUnit } from './types.js';

/**
 * Languages the producers and source-hosting fetch accept.
 */
export const SUPPORTED_LANGUAGES = [
  'python',
  'javascript',
  'typescript',
  'go',
  'java',
  'rust',
  'cpp',
] as const;

const EXTENSION_LANGUAGES: Record<string, string> = {
  '.py': 'python',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.go': 'go',
  '.java': 'java',
  '.rs': 'rust',
  '.cpp': 'cpp',
  '.cc': 'cpp',
  '.c': 'cpp',
  '.h': 'cpp',
  '.hpp': 'cpp',
};

/**
 * Detect programming language from a file name.
 */
export function detectLanguage(filePath: string): string {
  return EXTENSION_LANGUAGES[extname(filePath).toLowerCase()] ?? 'unknown';
}

export function isSupportedLanguage(language: string): boolean {
  return SUPPORTED_LANGUAGES.some((l) => l === language);
}

/**
 * Compute the content fingerprint (sha256, hex).
 */
export function computeFingerprint(content: string): string {
  return createHash('sha256').update(content).digest('hex');
}

/**
 * Build a frozen CodeUnit.
 */
export function createCodeUnit(path: string, content: string, language?: string): CodeUnit {
  return Object.freeze({
    path,
    content,
    language: language || detectLanguage(path),
    size: Buffer.byteLength(content, 'utf-8'),
    fingerprint: computeFingerprint(content),
  });
}
