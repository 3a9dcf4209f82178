// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Static analysis tools integration.
 *
 * Runs a language-appropriate linter over a temp copy of each file and
 * normalizes its JSON report. Linters exit non-zero when they find
 * issues, so stdout is parsed regardless of exit status.
 */

import { execFile } from 'node:child_process';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, extname, join } from 'node:path';
import { logger } from '../logger.js';
import type { CodeUnit } from '../review/types.js';

/** Linter wall-clock limit */
const TOOL_TIMEOUT_MS = 10_000;
const MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

export interface StaticIssue {
  line: number;
  message: string;
  /** Rule or code identifier reported by the tool */
  rule: string;
  severity: 'major' | 'minor';
}

export interface StaticAnalysisResult {
  toolName: string;
  issues: StaticIssue[];
  elapsedMs: number;
  succeeded: boolean;
  error?: string;
}

export interface AnalyzerOptions {
  signal?: AbortSignal;
}

/**
 * Structural pre-analysis collaborator used by the preprocess stage.
 */
export type StaticAnalyzer = (unit: CodeUnit, options?: AnalyzerOptions) => Promise<StaticAnalysisResult>;

/**
 * Runs a tool and resolves its stdout, whatever the exit code.
 */
export type ToolRunner = (command: string, args: string[], signal?: AbortSignal) => Promise<string>;

/**
 * Default runner: execFile with a timeout. Spawn failures (tool not
 * installed, killed by timeout) reject; a plain non-zero exit does not.
 */
export const execTool: ToolRunner = (command, args, signal) =>
  new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { timeout: TOOL_TIMEOUT_MS, maxBuffer: MAX_OUTPUT_BYTES, signal },
      (error, stdout) => {
        if (error && (typeof error.code !== 'number' || error.killed)) {
          reject(error);
          return;
        }
        resolve(stdout);
      }
    );
  });

/**
 * Parse `ruff check --output-format json` output.
 */
export function parseRuffOutput(stdout: string): StaticIssue[] {
  if (!stdout.trim()) return [];
  const data: unknown = JSON.parse(stdout);
  if (!Array.isArray(data)) return [];

  const issues: StaticIssue[] = [];
  for (const item of data) {
    if (typeof item !== 'object' || item === null) continue;
    const location = 'location' in item && typeof item.location === 'object' && item.location !== null
      ? item.location
      : null;
    issues.push({
      line: location && 'row' in location && typeof location.row === 'number' ? location.row : 0,
      message: 'message' in item && typeof item.message === 'string' ? item.message : '',
      rule: 'code' in item && typeof item.code === 'string' ? item.code : '',
      severity: 'minor',
    });
  }
  return issues;
}

/**
 * Parse `eslint -f json` output. Severity 2 (error) maps to major.
 */
export function parseEslintOutput(stdout: string): StaticIssue[] {
  if (!stdout.trim()) return [];
  const data: unknown = JSON.parse(stdout);
  if (!Array.isArray(data)) return [];

  const issues: StaticIssue[] = [];
  for (const fileResult of data) {
    if (typeof fileResult !== 'object' || fileResult === null) continue;
    if (!('messages' in fileResult) || !Array.isArray(fileResult.messages)) continue;

    for (const message of fileResult.messages) {
      if (typeof message !== 'object' || message === null) continue;
      issues.push({
        line: 'line' in message && typeof message.line === 'number' ? message.line : 0,
        message: 'message' in message && typeof message.message === 'string' ? message.message : '',
        rule: 'ruleId' in message && typeof message.ruleId === 'string' ? message.ruleId : '',
        severity: 'severity' in message && message.severity === 2 ? 'major' : 'minor',
      });
    }
  }
  return issues;
}

interface ToolSpec {
  name: string;
  suffix: string;
  args: (file: string) => [string, string[]];
  parse: (stdout: string) => StaticIssue[];
}

function toolFor(language: string): ToolSpec | null {
  if (language === 'python') {
    return {
      name: 'ruff',
      suffix: '.py',
      args: (file) => ['ruff', ['check', file, '--output-format', 'json']],
      parse: parseRuffOutput,
    };
  }
  if (language === 'javascript' || language === 'typescript') {
    return {
      name: 'eslint',
      suffix: language === 'javascript' ? '.js' : '.ts',
      args: (file) => ['eslint', [file, '-f', 'json']],
      parse: parseEslintOutput,
    };
  }
  return null;
}

/**
 * Build a static analyzer around a tool runner.
 */
export function createStaticAnalyzer(runner: ToolRunner = execTool): StaticAnalyzer {
  return async (unit, options = {}) => {
    const start = Date.now();
    const tool = toolFor(unit.language);

    if (!tool) {
      return { toolName: 'none', issues: [], elapsedMs: 0, succeeded: true };
    }

    const dir = await mkdtemp(join(tmpdir(), 'revue-lint-'));
    try {
      // Keep the original base name so path-sensitive rules still apply
      const name = basename(unit.path, extname(unit.path)) || 'source';
      const file = join(dir, `${name}${tool.suffix}`);
      await writeFile(file, unit.content, 'utf-8');

      const [command, args] = tool.args(file);
      const stdout = await runner(command, args, options.signal);
      const issues = tool.parse(stdout);

      logger.debug(`${tool.name} found ${issues.length} issues in ${unit.path}`);
      return { toolName: tool.name, issues, elapsedMs: Date.now() - start, succeeded: true };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.verbose(`${tool.name} failed on ${unit.path}: ${message}`);
      return {
        toolName: tool.name,
        issues: [],
        elapsedMs: Date.now() - start,
        succeeded: false,
        error: message,
      };
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  };
}

/**
 * Analyzer backed by the locally installed ruff and eslint.
 */
export const runStaticAnalysis: StaticAnalyzer = createStaticAnalyzer();
