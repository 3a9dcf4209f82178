// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Base Producer
 *
 * A producer turns one file into findings through the provider gateway:
 * prompt, parse, optional self-reflection, confidence filter. analyze()
 * always resolves; failures come back as an unsuccessful outcome.
 */

import { createHash } from 'node:crypto';
import { logger } from '../logger.js';
import type { PromptInvoker } from '../providers/gateway.js';
import { ProviderError } from '../providers/errors.js';
import { ProducerFailure, errorMessage } from '../review/errors.js';
import type { CodeUnit, Finding, ProducerOutcome } from '../review/types.js';
import { REFLECTION_SYSTEM_PROMPT, buildReflectionPrompt, type ProducerContext } from './prompts.js';
import { parseProducerResponse, parseReflection } from './response-parser.js';

export interface ProducerSettings {
  /** Findings below this confidence are dropped (inclusive bound) */
  confidenceThreshold: number;
  /** Ask the model to review its own findings */
  selfReflection: boolean;
}

export const DEFAULT_PRODUCER_SETTINGS: ProducerSettings = {
  confidenceThreshold: 0.7,
  selfReflection: true,
};

export interface AnalyzeOptions {
  signal?: AbortSignal;
}

interface Reflected {
  findings: Finding[];
  cost: number;
}

function shortHash(text: string): string {
  return createHash('sha256').update(text).digest('hex').slice(0, 8);
}

export abstract class BaseProducer {
  abstract readonly name: string;
  protected readonly settings: ProducerSettings;

  constructor(
    protected readonly gateway: PromptInvoker,
    settings: Partial<ProducerSettings> = {}
  ) {
    this.settings = { ...DEFAULT_PRODUCER_SETTINGS, ...settings };
  }

  abstract getSystemPrompt(): string;

  abstract getUserPrompt(unit: CodeUnit, context: ProducerContext): string;

  async analyze(unit: CodeUnit, context: ProducerContext, options: AnalyzeOptions = {}): Promise<ProducerOutcome> {
    const start = Date.now();
    let cost = 0;

    try {
      const response = await this.gateway.invoke(
        this.getSystemPrompt(),
        this.getUserPrompt(unit, context),
        { signal: options.signal }
      );
      cost += response.cost;

      const parsed = parseProducerResponse(response.content, this.name);
      let findings = parsed.findings;

      if (this.settings.selfReflection && findings.length > 0) {
        const reflected = await this.reflect(unit, findings, response.content, options.signal);
        findings = reflected.findings;
        cost += reflected.cost;
      }

      // Ids are unique across files once the producer is done with them
      const prefix = `${this.name}_${shortHash(unit.path)}`;
      findings = findings
        .filter((f) => f.confidence >= this.settings.confidenceThreshold)
        .map((f, i) => ({ ...f, id: `${prefix}_${i}`, origin: { ...f.origin, path: unit.path } }));

      const elapsedMs = Date.now() - start;
      logger.producer(this.name, unit.path, findings.length, elapsedMs);

      const outcome: ProducerOutcome = {
        producerName: this.name,
        findings,
        narrative: parsed.narrative,
        elapsedMs,
        cost,
        succeeded: true,
      };
      if (parsed.qualityScore !== undefined) outcome.qualityScore = parsed.qualityScore;
      return outcome;
    } catch (error) {
      const failure = new ProducerFailure(
        errorMessage(error),
        this.name,
        unit.path,
        error instanceof ProviderError && error.kind === 'transient',
        error
      );
      const elapsedMs = Date.now() - start;
      logger.producer(this.name, unit.path, 0, elapsedMs, failure.message);

      return {
        producerName: this.name,
        findings: [],
        narrative: '',
        elapsedMs,
        cost,
        succeeded: false,
        error: failure.message,
      };
    }
  }

  /**
   * Second pass over the findings. Any failure other than an abort keeps
   * the findings unchanged.
   */
  private async reflect(
    unit: CodeUnit,
    findings: Finding[],
    previousAnalysis: string,
    signal?: AbortSignal
  ): Promise<Reflected> {
    let cost = 0;
    try {
      const response = await this.gateway.invoke(
        REFLECTION_SYSTEM_PROMPT,
        buildReflectionPrompt(unit, findings, previousAnalysis),
        { signal }
      );
      cost = response.cost;

      const reflection = parseReflection(response.content);
      if (!reflection) {
        logger.warn(`${this.name} self-reflection returned an unusable response; keeping findings`);
        return { findings, cost };
      }

      const kept = findings
        .filter((f) => !reflection.falsePositives.has(f.id))
        .map((f) => {
          const adjusted = reflection.confidenceAdjustments.get(f.id);
          return adjusted === undefined ? f : { ...f, confidence: adjusted };
        });

      logger.verbose(
        `${this.name} self-reflection: ${findings.length - kept.length} false positives, ${kept.length} remaining`
      );
      return { findings: kept, cost };
    } catch (error) {
      if (signal?.aborted) throw error;
      logger.warn(`${this.name} self-reflection failed: ${errorMessage(error)}`);
      return { findings, cost };
    }
  }
}
