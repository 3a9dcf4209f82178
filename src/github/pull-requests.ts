// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * GitHub pull request integration through the GitHub CLI.
 *
 * All calls go through `gh api`, so authentication is whatever `gh auth`
 * already has. The runner is injectable for tests.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { logger } from '../logger.js';
import { ValidationError, errorMessage } from '../review/errors.js';
import { createCodeUnit, detectLanguage, isSupportedLanguage } from '../review/units.js';
import type { CodeUnit, Finding, Recommendation, Severity } from '../review/types.js';
import { countBySeverity } from '../review/consolidator.js';

const execFileAsync = promisify(execFile);

const PAGE_SIZE = 100;
/** GitHub stops listing PR files after 3000 */
const MAX_PAGES = 30;
/** Files with more changed lines than this are skipped */
const MAX_CHANGES = 1000;
/** Findings quoted in full in the summary comment */
const MAX_QUOTED_FINDINGS = 5;

const BINARY_EXTENSIONS = ['.png', '.jpg', '.gif', '.pdf'];

const SEVERITY_EMOJI: Record<Severity, string> = {
  critical: '🔴',
  major: '🟡',
  minor: '🔵',
  info: 'ℹ️',
};

/**
 * Runs `gh` with the given arguments and resolves its stdout.
 */
export type GhRunner = (args: string[]) => Promise<string>;

export const execGh: GhRunner = async (args) => {
  const { stdout } = await execFileAsync('gh', args, { maxBuffer: 20 * 1024 * 1024 });
  return stdout;
};

interface PullRequestFile {
  filename: string;
  status: string;
  changes: number;
  patch?: string;
}

function isPullRequestFile(value: unknown): value is PullRequestFile {
  return typeof value === 'object' && value !== null &&
    'filename' in value && typeof value.filename === 'string' &&
    'status' in value && typeof value.status === 'string' &&
    'changes' in value && typeof value.changes === 'number';
}

function validateTarget(repo: string, prNumber: number): void {
  if (!/^[\w.-]+\/[\w.-]+$/.test(repo)) {
    throw new ValidationError(`Invalid repository "${repo}", expected owner/name`, 'repo');
  }
  if (!Number.isInteger(prNumber) || prNumber < 1) {
    throw new ValidationError(`Invalid pull request number: ${prNumber}`, 'prNumber');
  }
}

/**
 * Render one finding as a markdown comment.
 */
export function formatIssueComment(finding: Finding): string {
  const emoji = SEVERITY_EMOJI[finding.severity] ?? '⚠️';

  let comment = `${emoji} **${finding.title}**\n\n`;
  comment += `**Severity:** ${finding.severity.toUpperCase()}\n`;
  comment += `**Category:** ${finding.category}\n`;
  if (finding.origin?.path) {
    comment += `**Location:** \`${finding.origin.path}:${finding.lineStart}\`\n`;
  }
  comment += `\n${finding.description}\n\n`;

  if (finding.suggestion) {
    comment += `**Suggestion:**\n${finding.suggestion}\n\n`;
  }
  if (finding.suggestedPatch) {
    comment += `**Suggested Fix:**\n\`\`\`\n${finding.suggestedPatch}\n\`\`\`\n\n`;
  }

  comment += `*Confidence: ${Math.floor(finding.confidence * 100)}%*`;
  return comment;
}

/**
 * Render the review summary comment: verdict, counts and the top
 * critical and major findings.
 */
export function formatReviewSummary(summary: string, issues: Finding[], recommendation: Recommendation): string {
  const counts = countBySeverity(issues);

  let comment = '## 🤖 Code Review Summary\n\n';
  comment += `${summary}\n\n`;

  comment += '### 📊 Statistics\n';
  comment += `- ${SEVERITY_EMOJI.critical} Critical: ${counts.critical}\n`;
  comment += `- ${SEVERITY_EMOJI.major} Major: ${counts.major}\n`;
  comment += `- ${SEVERITY_EMOJI.minor} Minor: ${counts.minor}\n`;
  comment += `- ${SEVERITY_EMOJI.info} Info: ${counts.info}\n\n`;

  comment += `### 🎯 Recommendation: **${recommendation.toUpperCase()}**\n\n`;

  const top = issues
    .filter((f) => f.severity === 'critical' || f.severity === 'major')
    .slice(0, MAX_QUOTED_FINDINGS);
  if (top.length > 0) {
    comment += '### Top Issues\n\n';
    comment += top.map(formatIssueComment).join('\n\n---\n\n');
    comment += '\n\n';
  }

  comment += '*This review was generated by revue*';
  return comment;
}

export class GitHubClient {
  constructor(private readonly runner: GhRunner = execGh) {}

  /**
   * Fetch the reviewable files of a pull request at its head commit.
   */
  async fetchPullRequestFiles(repo: string, prNumber: number): Promise<CodeUnit[]> {
    validateTarget(repo, prNumber);

    const headSha = await this.getHeadSha(repo, prNumber);
    const files = await this.listFiles(repo, prNumber);
    const units: CodeUnit[] = [];

    for (const file of files) {
      if (file.status === 'removed') continue;

      const lower = file.filename.toLowerCase();
      if (BINARY_EXTENSIONS.some((ext) => lower.endsWith(ext))) continue;

      if (file.changes > MAX_CHANGES) {
        logger.warn(`Skipping ${file.filename}: ${file.changes} changes`);
        continue;
      }

      const language = detectLanguage(file.filename);
      if (!isSupportedLanguage(language)) continue;

      let content: string;
      try {
        content = await this.getContent(repo, file.filename, headSha);
      } catch (error) {
        logger.verbose(`Using patch for ${file.filename}: ${errorMessage(error)}`);
        content = file.patch ?? '';
      }

      units.push(createCodeUnit(file.filename, content, language));
      logger.verbose(`Fetched ${file.filename} (${language}, ${content.length} chars)`);
    }

    return units;
  }

  /**
   * Post the review summary as a pull request comment.
   */
  async postReviewSummary(
    repo: string,
    prNumber: number,
    summary: string,
    issues: Finding[],
    recommendation: Recommendation
  ): Promise<boolean> {
    try {
      validateTarget(repo, prNumber);
      const body = formatReviewSummary(summary, issues, recommendation);
      await this.runner([
        'api',
        '-X',
        'POST',
        `repos/${repo}/issues/${prNumber}/comments`,
        '-f',
        `body=${body}`,
      ]);
      logger.info(`Posted review summary to ${repo}#${prNumber}`);
      return true;
    } catch (error) {
      logger.error(`Failed to post review summary to ${repo}#${prNumber}: ${errorMessage(error)}`);
      return false;
    }
  }

  private async getJson(path: string): Promise<unknown> {
    const stdout = await this.runner(['api', path]);
    return JSON.parse(stdout);
  }

  private async getHeadSha(repo: string, prNumber: number): Promise<string> {
    const pr = await this.getJson(`repos/${repo}/pulls/${prNumber}`);
    if (
      typeof pr === 'object' && pr !== null &&
      'head' in pr && typeof pr.head === 'object' && pr.head !== null &&
      'sha' in pr.head && typeof pr.head.sha === 'string'
    ) {
      return pr.head.sha;
    }
    throw new Error(`Pull request ${repo}#${prNumber} has no head commit`);
  }

  private async listFiles(repo: string, prNumber: number): Promise<PullRequestFile[]> {
    const files: PullRequestFile[] = [];
    for (let page = 1; page <= MAX_PAGES; page++) {
      const batch = await this.getJson(
        `repos/${repo}/pulls/${prNumber}/files?per_page=${PAGE_SIZE}&page=${page}`
      );
      if (!Array.isArray(batch)) {
        throw new Error(`Unexpected response listing files of ${repo}#${prNumber}`);
      }
      files.push(...batch.filter(isPullRequestFile));
      if (batch.length < PAGE_SIZE) break;
    }
    return files;
  }

  private async getContent(repo: string, path: string, ref: string): Promise<string> {
    const encodedPath = path.split('/').map(encodeURIComponent).join('/');
    const data = await this.getJson(`repos/${repo}/contents/${encodedPath}?ref=${ref}`);
    if (
      typeof data === 'object' && data !== null &&
      'content' in data && typeof data.content === 'string'
    ) {
      return Buffer.from(data.content, 'base64').toString('utf-8');
    }
    throw new Error(`No content returned for ${path}`);
  }
}
