// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Wires a resolved configuration into a running review service.
 * Every collaborator can be overridden, which is how tests inject fakes.
 */

import { runStaticAnalysis, type StaticAnalyzer } from './analysis/static-analyzers.js';
import { FileCacheStore } from './cache/file-store.js';
import { CacheGate } from './cache/gate.js';
import { InFlightRegistry } from './cache/inflight.js';
import type { CacheStore } from './cache/types.js';
import type { ResolvedConfig } from './config/index.js';
import { GitHubClient } from './github/pull-requests.js';
import { OpenAIEmbedder } from './knowledge/embeddings.js';
import type { KnowledgeStore } from './knowledge/types.js';
import { VectraKnowledgeStore } from './knowledge/vector-store.js';
import { logger } from './logger.js';
import { createProducers, type BaseProducer } from './producers/index.js';
import { ProviderGateway, createProvider, type BaseProvider } from './providers/index.js';
import type { PromptInvoker } from './providers/gateway.js';
import { errorMessage } from './review/errors.js';
import { PipelineController } from './review/pipeline.js';
import type { ProducerOutcome } from './review/types.js';
import { ReviewRegistry } from './review/registry.js';
import { ReviewService } from './review/service.js';
import { CostTracker } from './usage.js';

export interface RuntimeOverrides {
  gateway?: PromptInvoker;
  producers?: BaseProducer[];
  cacheStore?: CacheStore;
  /** null disables knowledge retrieval */
  knowledge?: KnowledgeStore | null;
  analyzer?: StaticAnalyzer;
  github?: GitHubClient;
  createId?: () => string;
}

export interface ReviewRuntime {
  config: ResolvedConfig;
  service: ReviewService;
  registry: ReviewRegistry;
  cache: CacheGate;
  costs: CostTracker;
  knowledge: KnowledgeStore | null;
  close(): Promise<void>;
}

function buildProvider(config: ResolvedConfig, selection: ResolvedConfig['primary']): BaseProvider {
  return createProvider({
    type: selection.type,
    model: selection.model,
    baseUrl: selection.baseUrl,
    apiKey: selection.apiKey,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
  });
}

/**
 * Build the gateway: the primary is required, a fallback that cannot be
 * created is dropped with a warning.
 */
export function createGateway(config: ResolvedConfig, costs: CostTracker): ProviderGateway {
  const primary = buildProvider(config, config.primary);

  let fallback: BaseProvider | null = null;
  if (config.fallback) {
    try {
      fallback = buildProvider(config, config.fallback);
    } catch (error) {
      logger.warn(`Fallback provider disabled: ${errorMessage(error)}`);
    }
  }

  return new ProviderGateway(primary, fallback, costs);
}

/**
 * The vector knowledge store needs OpenAI embeddings; without a key the
 * enrich stage runs with no guidance.
 */
export function createKnowledgeStore(config: ResolvedConfig): KnowledgeStore | null {
  if (!process.env.OPENAI_API_KEY) {
    logger.debug('OPENAI_API_KEY not set, knowledge retrieval disabled');
    return null;
  }
  return new VectraKnowledgeStore({
    directory: config.knowledgeDir,
    embedder: new OpenAIEmbedder(config.embeddingModel),
  });
}

export function createReviewRuntime(config: ResolvedConfig, overrides: RuntimeOverrides = {}): ReviewRuntime {
  const costs = new CostTracker();
  const gateway = overrides.gateway ?? createGateway(config, costs);
  const producers = overrides.producers ?? createProducers(gateway, {
    confidenceThreshold: config.confidenceThreshold,
    selfReflection: config.selfReflection,
  });

  const store = overrides.cacheStore ?? new FileCacheStore({ directory: config.cacheDir });
  const cache = new CacheGate(store, config.cacheTtl);
  const inFlight = config.strictDedup ? new InFlightRegistry<ProducerOutcome>() : null;

  const registry = new ReviewRegistry({ retentionMs: config.retention * 1000 });
  registry.startSweeper();

  const knowledge = overrides.knowledge !== undefined ? overrides.knowledge : createKnowledgeStore(config);

  const pipeline = new PipelineController(
    {
      registry,
      producers,
      cache,
      inFlight,
      analyzer: overrides.analyzer ?? runStaticAnalysis,
      knowledge,
    },
    {
      maxConcurrency: config.maxConcurrency,
      reviewTimeout: config.reviewTimeout,
      cacheTtl: config.cacheTtl,
    }
  );

  const service = new ReviewService({
    registry,
    pipeline,
    github: overrides.github ?? new GitHubClient(),
    limits: { maxFiles: config.maxFiles, maxFileSize: config.maxFileSize },
    createId: overrides.createId,
  });

  return {
    config,
    service,
    registry,
    cache,
    costs,
    knowledge,
    close: () => service.close(),
  };
}
