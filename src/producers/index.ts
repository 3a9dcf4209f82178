// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Producer registry.
 */

import type { PromptInvoker } from '../providers/gateway.js';
import type { ReviewOptions } from '../review/types.js';
import { AnalyzerProducer } from './analyzer.js';
import type { BaseProducer, ProducerSettings } from './base.js';
import { DocumenterProducer } from './documenter.js';
import { OptimizerProducer } from './optimizer.js';
import { SecurityProducer } from './security.js';

export { BaseProducer, DEFAULT_PRODUCER_SETTINGS } from './base.js';
export type { AnalyzeOptions, ProducerSettings } from './base.js';
export { EMPTY_CONTEXT } from './prompts.js';
export type { ProducerContext } from './prompts.js';
export { AnalyzerProducer, SecurityProducer, OptimizerProducer, DocumenterProducer };

/**
 * Option that switches each producer on. The analyzer always runs.
 */
const PRODUCER_TOGGLES: Record<string, keyof ReviewOptions | null> = {
  analyzer: null,
  security: 'enableSecurity',
  optimizer: 'enablePerformance',
  documenter: 'enableDocumentation',
};

/**
 * Instantiate the four built-in producers around one gateway.
 */
export function createProducers(gateway: PromptInvoker, settings: Partial<ProducerSettings> = {}): BaseProducer[] {
  return [
    new AnalyzerProducer(gateway, settings),
    new SecurityProducer(gateway, settings),
    new OptimizerProducer(gateway, settings),
    new DocumenterProducer(gateway, settings),
  ];
}

/**
 * Producers enabled for a review. Producers without a toggle always run.
 */
export function selectProducers(producers: BaseProducer[], options: ReviewOptions): BaseProducer[] {
  return producers.filter((producer) => {
    const toggle = PRODUCER_TOGGLES[producer.name];
    return !toggle || options[toggle];
  });
}
