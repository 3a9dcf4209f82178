// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Pipeline Controller
 *
 * Drives a registered run through preprocess -> enrich -> produce ->
 * consolidate. Stages run one after another over the whole batch; only
 * the produce stage fans out, one file at a time, with every enabled
 * producer for that file in flight together.
 *
 * All run state lives in the registry. The controller keeps no per-run
 * fields, so one controller serves every review in the process.
 */

import type { StaticAnalysisResult, StaticAnalyzer } from '../analysis/static-analyzers.js';
import type { CacheGate } from '../cache/gate.js';
import type { InFlightRegistry } from '../cache/inflight.js';
import type { KnowledgeEntry, KnowledgeStore } from '../knowledge/types.js';
import { logger } from '../logger.js';
import { selectProducers, type BaseProducer, type ProducerContext } from '../producers/index.js';
import { consolidate } from './consolidator.js';
import { StageFailure, errorMessage } from './errors.js';
import type { ReviewRegistry } from './registry.js';
import { aggregateOutcomes } from './report.js';
import { Semaphore } from './semaphore.js';
import type { CodeUnit, PairOutcome, ProducerOutcome, ReviewOptions, ReviewStage } from './types.js';

/** Guidance entries fetched per file */
const KNOWLEDGE_TOP_K = 3;

export interface PipelineDeps {
  registry: ReviewRegistry;
  producers: BaseProducer[];
  cache: CacheGate;
  /** Shared across reviews; null disables single-flight */
  inFlight: InFlightRegistry<ProducerOutcome> | null;
  analyzer: StaticAnalyzer;
  knowledge: KnowledgeStore | null;
}

export interface PipelineSettings {
  /** Live producer calls per review */
  maxConcurrency: number;
  /** Whole-run limit in seconds */
  reviewTimeout: number;
  /** Result cache TTL in seconds */
  cacheTtl: number;
}

export const DEFAULT_PIPELINE_SETTINGS: PipelineSettings = {
  maxConcurrency: 4,
  reviewTimeout: 300,
  cacheTtl: 3600,
};

interface RunSignal {
  signal: AbortSignal;
  dispose: () => void;
}

/**
 * Message for an aborted signal: the abort reason when it is an Error.
 */
export function abortMessage(signal: AbortSignal): string {
  return signal.reason instanceof Error ? signal.reason.message : 'Review cancelled';
}

function failedOutcome(producerName: string, error: string, elapsedMs: number = 0): ProducerOutcome {
  return {
    producerName,
    findings: [],
    narrative: '',
    elapsedMs,
    cost: 0,
    succeeded: false,
    error,
  };
}

export class PipelineController {
  private readonly settings: PipelineSettings;

  constructor(
    private readonly deps: PipelineDeps,
    settings: Partial<PipelineSettings> = {}
  ) {
    this.settings = { ...DEFAULT_PIPELINE_SETTINGS, ...settings };
  }

  /**
   * Run a registered review to a terminal stage. Never rejects: errors
   * end the run in the failed stage.
   */
  async run(reviewId: string): Promise<void> {
    const registrySignal = this.deps.registry.signalFor(reviewId);
    if (!registrySignal) {
      logger.warn(`Review ${reviewId} is not registered`);
      return;
    }

    const { signal, dispose } = this.runSignal(registrySignal);
    try {
      await this.preprocess(reviewId, signal);
      await this.enrich(reviewId, signal);
      await this.produce(reviewId, signal);
      this.consolidate(reviewId, signal);
    } catch (error) {
      if (!this.deps.registry.has(reviewId)) {
        logger.debug(`Review ${reviewId} was deleted while running`);
        return;
      }
      const message = errorMessage(error);
      logger.error(`Review ${reviewId} failed: ${message}`);
      this.deps.registry.update(reviewId, (run) => {
        run.stage = 'failed';
        run.error = message;
        run.completedAt = new Date().toISOString();
      });
    } finally {
      dispose();
    }
  }

  /**
   * Combine registry cancellation with the run timeout.
   */
  private runSignal(registrySignal: AbortSignal): RunSignal {
    const controller = new AbortController();
    const onCancel = (): void => controller.abort(registrySignal.reason);

    const timer = setTimeout(() => {
      controller.abort(new Error('Review timed out'));
    }, this.settings.reviewTimeout * 1000);
    timer.unref();

    if (registrySignal.aborted) {
      onCancel();
    } else {
      registrySignal.addEventListener('abort', onCancel, { once: true });
    }

    return {
      signal: controller.signal,
      dispose: () => {
        clearTimeout(timer);
        registrySignal.removeEventListener('abort', onCancel);
      },
    };
  }

  /**
   * Move the run to stage. A run that has been deleted stops here.
   */
  private advance(reviewId: string, stage: ReviewStage): void {
    if (!this.deps.registry.update(reviewId, (run) => { run.stage = stage; })) {
      throw new StageFailure(`Review ${reviewId} can no longer move to ${stage}`, stage);
    }
  }

  private units(reviewId: string): { units: CodeUnit[]; options: ReviewOptions } {
    const run = this.deps.registry.get(reviewId);
    if (!run) {
      throw new StageFailure(`Review ${reviewId} disappeared`, 'pending');
    }
    return { units: run.units, options: run.options };
  }

  private async preprocess(reviewId: string, signal: AbortSignal): Promise<void> {
    this.advance(reviewId, 'preprocessing');
    const { units, options } = this.units(reviewId);
    if (!options.enableStaticAnalysis) return;

    const results: Record<string, StaticAnalysisResult> = {};
    const fileErrors: Record<string, string> = {};

    for (const unit of units) {
      if (signal.aborted) {
        fileErrors[unit.path] = abortMessage(signal);
        continue;
      }
      try {
        const result = await this.deps.analyzer(unit, { signal });
        results[unit.path] = result;
        if (!result.succeeded) {
          fileErrors[unit.path] = result.error ?? `${result.toolName} failed`;
        }
      } catch (error) {
        fileErrors[unit.path] = errorMessage(error);
      }
    }

    this.deps.registry.update(reviewId, (run) => {
      run.staticResults = results;
      run.fileErrors = fileErrors;
    });
  }

  private async enrich(reviewId: string, signal: AbortSignal): Promise<void> {
    this.advance(reviewId, 'enriching');
    const { units, options } = this.units(reviewId);
    const knowledge = this.deps.knowledge;
    if (!options.enableKnowledge || !knowledge) return;

    const contexts: Record<string, KnowledgeEntry[]> = {};
    for (const unit of units) {
      if (signal.aborted) {
        contexts[unit.path] = [];
        continue;
      }
      try {
        contexts[unit.path] = await knowledge.retrieve({
          query: `best practices for ${unit.language}`,
          language: unit.language,
          topK: KNOWLEDGE_TOP_K,
          signal,
        });
      } catch (error) {
        logger.warn(`Knowledge lookup failed for ${unit.path}: ${errorMessage(error)}`);
        contexts[unit.path] = [];
      }
    }

    this.deps.registry.update(reviewId, (run) => {
      run.contexts = contexts;
    });
  }

  private async produce(reviewId: string, signal: AbortSignal): Promise<void> {
    const { units, options } = this.units(reviewId);
    const producers = selectProducers(this.deps.producers, options);

    if (!this.deps.registry.update(reviewId, (run) => {
      run.stage = 'producing';
      run.plannedPairs = units.length * producers.length;
    })) {
      throw new StageFailure(`Review ${reviewId} can no longer move to producing`, 'producing');
    }

    const semaphore = new Semaphore(this.settings.maxConcurrency);
    const run = this.deps.registry.get(reviewId);

    for (const unit of units) {
      const context: ProducerContext = {
        staticAnalysis: run?.staticResults[unit.path],
        knowledge: run?.contexts[unit.path] ?? [],
      };

      // Gather: every pair resolves, failures included
      await Promise.all(
        producers.map(async (producer) => {
          const outcome = await this.runPair(unit, producer, context, options, semaphore, signal);
          this.record(reviewId, { path: unit.path, outcome });
        })
      );
    }
  }

  /**
   * One (file, producer) pair: cache, then single-flight, then the
   * producer. Resolves a failed outcome instead of rejecting, and
   * resolves as soon as the run is aborted.
   */
  private runPair(
    unit: CodeUnit,
    producer: BaseProducer,
    context: ProducerContext,
    options: ReviewOptions,
    semaphore: Semaphore,
    signal: AbortSignal
  ): Promise<ProducerOutcome> {
    if (signal.aborted) {
      return Promise.resolve(failedOutcome(producer.name, abortMessage(signal)));
    }

    const start = Date.now();
    return new Promise((resolve) => {
      const onAbort = (): void => {
        resolve(failedOutcome(producer.name, abortMessage(signal), Date.now() - start));
      };
      signal.addEventListener('abort', onAbort, { once: true });

      this.computePair(unit, producer, context, options, semaphore, signal).then(
        (outcome) => {
          signal.removeEventListener('abort', onAbort);
          resolve(outcome);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          resolve(failedOutcome(producer.name, errorMessage(error), Date.now() - start));
        }
      );
    });
  }

  private async computePair(
    unit: CodeUnit,
    producer: BaseProducer,
    context: ProducerContext,
    options: ReviewOptions,
    semaphore: Semaphore,
    signal: AbortSignal
  ): Promise<ProducerOutcome> {
    const { cache, inFlight } = this.deps;

    if (options.useCache) {
      const hit = await cache.get(unit, producer.name);
      if (hit) return hit.outcome;
    }

    const compute = async (callSignal: AbortSignal): Promise<ProducerOutcome> => {
      const outcome = await semaphore.run(() => producer.analyze(unit, context, { signal: callSignal }), callSignal);
      if (outcome.succeeded && options.useCache) {
        await cache.put(unit, producer.name, outcome, this.settings.cacheTtl);
      }
      return outcome;
    };

    // A shared call outlives this run while another review still waits on it
    if (inFlight && options.useCache) {
      return inFlight.run(cache.keyFor(unit, producer.name), compute, signal);
    }
    return compute(signal);
  }

  private record(reviewId: string, pair: PairOutcome): void {
    this.deps.registry.update(reviewId, (run) => {
      run.pairOutcomes.push(pair);
      run.totalCost += pair.outcome.cost;
    });
  }

  private consolidate(reviewId: string, signal: AbortSignal): void {
    this.advance(reviewId, 'consolidating');

    const run = this.deps.registry.get(reviewId);
    if (!run) {
      throw new StageFailure(`Review ${reviewId} disappeared`, 'consolidating');
    }

    const pairs = run.pairOutcomes;
    const failures = pairs.filter((p) => !p.outcome.succeeded).length;
    if (pairs.length > 0 && failures === pairs.length) {
      const reason = signal.aborted ? abortMessage(signal) : 'no usable producer results';
      throw new StageFailure(`All ${failures} producer runs failed: ${reason}`, 'consolidating');
    }

    const outcomes = aggregateOutcomes(pairs);
    const result = consolidate(pairs.map((p) => p.outcome));

    this.deps.registry.update(reviewId, (draft) => {
      draft.outcomes = outcomes;
      draft.consolidated = result.findings;
      draft.summary = result.summary;
      draft.score = result.score;
      draft.recommendation = result.recommendation;
      draft.totalCost = result.totalCost;
      draft.stage = 'complete';
      draft.completedAt = new Date().toISOString();
    });

    logger.verbose(
      `Review ${reviewId}: ${result.findings.length} issues, score ${result.score}, ${result.recommendation}`
    );
  }
}
