#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import * as fs from 'fs';
import chalk from 'chalk';
import { program } from 'commander';
import { FileCacheStore } from './cache/file-store.js';
import { CacheGate } from './cache/gate.js';
import { exitCodeFor, formatCacheStats, formatStatus, formatStatusJson, parseOutputFormat, type OutputFormat } from './cli/output.js';
import { loadConfig, type ResolvedConfig } from './config/index.js';
import { KNOWLEDGE_COLLECTIONS } from './knowledge/types.js';
import { VectraKnowledgeStore } from './knowledge/vector-store.js';
import { OpenAIEmbedder } from './knowledge/embeddings.js';
import { logger, parseLogLevel } from './logger.js';
import { errorMessage } from './review/errors.js';
import type { ReviewStatus, SubmittedFile } from './review/types.js';
import { createReviewRuntime, type ReviewRuntime } from './runtime.js';
import { spinner } from './spinner.js';
import { VERSION } from './version.js';

interface GlobalOptions {
  config?: string;
  primary?: string;
  fallback?: string;
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}

interface ReviewCommandOptions {
  security: boolean;
  performance: boolean;
  documentation: boolean;
  static: boolean;
  knowledge: boolean;
  cache: boolean;
  format: OutputFormat;
  stream?: boolean;
}

interface PrCommandOptions {
  post?: boolean;
  format: OutputFormat;
}

/**
 * Apply global flags and resolve configuration.
 */
function setup(format: OutputFormat = 'text'): ResolvedConfig {
  const options = program.opts<GlobalOptions>();
  logger.setLevel(parseLogLevel(options));
  if (format === 'json') {
    logger.setQuiet(true);
    spinner.setEnabled(false);
  }
  return loadConfig({
    configFile: options.config,
    cli: { primary: options.primary, fallback: options.fallback },
  });
}

function readFiles(paths: string[]): SubmittedFile[] {
  return paths.map((filePath) => {
    if (!fs.existsSync(filePath)) {
      throw new Error(`File not found: ${filePath}`);
    }
    return { path: filePath, content: fs.readFileSync(filePath, 'utf-8') };
  });
}

/**
 * Follow a run until it settles, showing stage updates.
 */
async function follow(runtime: ReviewRuntime, reviewId: string, options: { stream?: boolean; format: OutputFormat }): Promise<ReviewStatus> {
  for await (const status of runtime.service.stream(reviewId)) {
    if (options.stream && options.format === 'text') {
      spinner.stop();
      console.log(chalk.dim(`[${status.stage}] ${status.progress}%`));
    } else if (options.stream) {
      console.log(JSON.stringify({ reviewId, stage: status.stage, progress: status.progress }));
    } else {
      spinner.stage(status.stage, status.progress);
    }
  }
  return runtime.service.waitFor(reviewId);
}

function report(status: ReviewStatus, format: OutputFormat): void {
  if (status.stage === 'complete') {
    spinner.succeed(chalk.green('Review complete'));
  } else {
    spinner.fail(chalk.red('Review failed'));
  }
  console.log(format === 'json' ? formatStatusJson(status) : formatStatus(status));
}

async function withRuntime(config: ResolvedConfig, fn: (runtime: ReviewRuntime) => Promise<number>): Promise<never> {
  const runtime = createReviewRuntime(config);
  try {
    const code = await fn(runtime);
    await runtime.close();
    process.exit(code);
  } catch (error) {
    await runtime.close();
    throw error;
  }
}

function knowledgeStore(config: ResolvedConfig): VectraKnowledgeStore {
  if (!process.env.OPENAI_API_KEY) {
    throw new Error('OPENAI_API_KEY is required for the knowledge store');
  }
  return new VectraKnowledgeStore({
    directory: config.knowledgeDir,
    embedder: new OpenAIEmbedder(config.embeddingModel),
  });
}

function fail(error: unknown): never {
  spinner.stop();
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exit(1);
}

// CLI setup
program
  .name('revue')
  .description('Multi-producer AI code review')
  .version(VERSION, '-v, --version', 'Output the current version')
  .option('-c, --config <file>', 'Configuration file (replaces workspace lookup)')
  .option('--primary <provider:model>', 'Primary provider and model')
  .option('--fallback <provider:model>', 'Fallback provider and model, or "none"')
  .option('--verbose', 'Show stage transitions and producer timing')
  .option('--debug', 'Show API calls and cache activity')
  .option('--trace', 'Show full request/response payloads');

program
  .command('review')
  .description('Review local files')
  .argument('<files...>', 'Files to review')
  .option('--no-security', 'Skip the security producer')
  .option('--no-performance', 'Skip the optimizer producer')
  .option('--no-documentation', 'Skip the documenter producer')
  .option('--no-static', 'Skip static analysis')
  .option('--no-knowledge', 'Skip knowledge retrieval')
  .option('--no-cache', 'Bypass the result cache')
  .option('-f, --format <format>', 'Output format (text, json)', parseOutputFormat, 'text')
  .option('--stream', 'Print every stage update')
  .action(async (files: string[], options: ReviewCommandOptions) => {
    try {
      const config = setup(options.format);
      const submitted = readFiles(files);
      await withRuntime(config, async (runtime) => {
        const { reviewId } = runtime.service.submit(submitted, {
          enableSecurity: options.security,
          enablePerformance: options.performance,
          enableDocumentation: options.documentation,
          enableStaticAnalysis: options.static,
          enableKnowledge: options.knowledge,
          useCache: options.cache,
        });
        logger.verbose(`Submitted review ${reviewId}`);
        const status = await follow(runtime, reviewId, options);
        report(status, options.format);
        return exitCodeFor(status);
      });
    } catch (error) {
      fail(error);
    }
  });

program
  .command('pr')
  .description('Review a GitHub pull request (uses the gh CLI)')
  .argument('<repo>', 'Repository as owner/name')
  .argument('<number>', 'Pull request number')
  .option('--post', 'Post the summary as a pull request comment')
  .option('-f, --format <format>', 'Output format (text, json)', parseOutputFormat, 'text')
  .action(async (repo: string, number: string, options: PrCommandOptions) => {
    try {
      const config = setup(options.format);
      await withRuntime(config, async (runtime) => {
        spinner.fetching(`${repo}#${number}`);
        const status = await runtime.service.reviewPullRequest(repo, Number(number), { post: options.post });
        report(status, options.format);
        return exitCodeFor(status);
      });
    } catch (error) {
      fail(error);
    }
  });

const cache = program.command('cache').description('Manage the review result cache');

function cacheGate(config: ResolvedConfig): CacheGate {
  return new CacheGate(new FileCacheStore({ directory: config.cacheDir }), config.cacheTtl);
}

cache
  .command('stats')
  .description('Show cache size')
  .action(async () => {
    try {
      const stats = await cacheGate(setup()).stats();
      console.log(formatCacheStats(stats));
    } catch (error) {
      fail(error);
    }
  });

cache
  .command('clear')
  .description('Remove every cached result')
  .action(async () => {
    try {
      await cacheGate(setup()).clear();
      console.log(chalk.green('Cache cleared'));
    } catch (error) {
      fail(error);
    }
  });

cache
  .command('invalidate')
  .description('Drop cached results for a file path')
  .argument('<path>', 'File path as submitted')
  .action(async (filePath: string) => {
    try {
      const removed = await cacheGate(setup()).invalidate(filePath);
      console.log(chalk.green(`Removed ${removed} cached results for ${filePath}`));
    } catch (error) {
      fail(error);
    }
  });

const knowledge = program.command('knowledge').description('Manage the knowledge store');

knowledge
  .command('seed')
  .description('Load <dir>/<collection>/*.md into the knowledge store')
  .argument('<dir>', 'Directory with one subdirectory per collection')
  .action(async (dir: string) => {
    try {
      const store = knowledgeStore(setup());
      spinner.start(chalk.cyan(`Seeding from ${dir}...`));
      const counts = await store.seedFromDirectory(dir);
      const total = KNOWLEDGE_COLLECTIONS.reduce((sum, c) => sum + counts[c], 0);
      spinner.succeed(chalk.green(`Loaded ${total} chunks`));
      for (const collection of KNOWLEDGE_COLLECTIONS) {
        console.log(`  ${collection}: ${counts[collection]}`);
      }
    } catch (error) {
      fail(error);
    }
  });

knowledge
  .command('stats')
  .description('Show item counts per collection')
  .action(async () => {
    try {
      const counts = await knowledgeStore(setup()).getStats();
      for (const collection of KNOWLEDGE_COLLECTIONS) {
        console.log(`${collection}: ${counts[collection]}`);
      }
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync().catch(fail);
