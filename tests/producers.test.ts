// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  AnalyzerProducer,
  DocumenterProducer,
  EMPTY_CONTEXT,
  OptimizerProducer,
  SecurityProducer,
  createProducers,
  selectProducers,
  type ProducerContext,
} from '../src/producers/index.js';
import { REFLECTION_SYSTEM_PROMPT, buildReflectionPrompt, formatContext } from '../src/producers/prompts.js';
import { DEFAULT_REVIEW_OPTIONS } from '../src/review/types.js';
import { makeFinding, makeUnit, producerJson } from './helpers/fixtures.js';
import { ScriptedInvoker } from './helpers/invoker.js';

// sha256('app.py').slice(0, 8)
const APP_HASH = '568470d0';

const CONTEXT: ProducerContext = {
  staticAnalysis: { toolName: 'ruff', issues: [{ line: 1, message: 'unused', rule: 'F401', severity: 'minor' }], elapsedMs: 5, succeeded: true },
  knowledge: [{ content: 'Prefer context managers.', metadata: { topic: 'python' }, distance: 0.1 }],
};

describe('BaseProducer.analyze', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('filters by confidence and assigns per-file ids', async () => {
    const invoker = new ScriptedInvoker(() => ({
      content: producerJson([
        { title: 'Confident', line_start: 3, confidence: 0.9, severity: 'major', category: 'bug' },
        { title: 'Unsure', line_start: 5, confidence: 0.5 },
        { title: 'At threshold', line_start: 7, confidence: 0.7 },
      ], { reasoning: 'Two real problems.', overall_quality_score: 70 }),
      cost: 0.01,
    }));
    const producer = new AnalyzerProducer(invoker, { selfReflection: false });

    const outcome = await producer.analyze(makeUnit('app.py'), EMPTY_CONTEXT);

    expect(outcome.succeeded).toBe(true);
    expect(outcome.producerName).toBe('analyzer');
    expect(outcome.narrative).toBe('Two real problems.');
    expect(outcome.qualityScore).toBe(70);
    expect(outcome.cost).toBe(0.01);
    expect(outcome.findings.map((f) => [f.id, f.title])).toEqual([
      [`analyzer_${APP_HASH}_0`, 'Confident'],
      [`analyzer_${APP_HASH}_1`, 'At threshold'],
    ]);
    expect(outcome.findings[0].origin).toEqual({ path: 'app.py' });
    expect(invoker.calls).toHaveLength(1);
  });

  it('applies self-reflection before filtering', async () => {
    const invoker = new ScriptedInvoker((system) => {
      if (system === REFLECTION_SYSTEM_PROMPT) {
        return {
          content: JSON.stringify({ false_positives: ['analyzer_1'], confidence_adjustments: { analyzer_0: 0.95, analyzer_2: 0.4 } }),
          cost: 0.002,
        };
      }
      return {
        content: producerJson([
          { title: 'Real', confidence: 0.8 },
          { title: 'Imagined', confidence: 0.9 },
          { title: 'Overstated', confidence: 0.9 },
        ]),
        cost: 0.01,
      };
    });
    const producer = new AnalyzerProducer(invoker);

    const outcome = await producer.analyze(makeUnit('app.py'), EMPTY_CONTEXT);

    expect(outcome.findings).toHaveLength(1);
    expect(outcome.findings[0]).toMatchObject({ id: `analyzer_${APP_HASH}_0`, title: 'Real', confidence: 0.95 });
    expect(outcome.cost).toBeCloseTo(0.012, 10);
    expect(invoker.calls).toHaveLength(2);
    expect(invoker.calls[1].userPrompt).toContain('- analyzer_1 (line 0, minor): Imagined');
  });

  it('skips self-reflection when there are no findings', async () => {
    const invoker = new ScriptedInvoker(() => ({ content: producerJson([]) }));
    const producer = new AnalyzerProducer(invoker);

    const outcome = await producer.analyze(makeUnit(), EMPTY_CONTEXT);

    expect(outcome.succeeded).toBe(true);
    expect(invoker.calls).toHaveLength(1);
  });

  it('keeps findings when self-reflection fails', async () => {
    const invoker = new ScriptedInvoker((system) =>
      system === REFLECTION_SYSTEM_PROMPT
        ? { error: new Error('reflection down') }
        : { content: producerJson([{ title: 'Kept', confidence: 0.9 }]), cost: 0.01 }
    );
    const producer = new AnalyzerProducer(invoker);

    const outcome = await producer.analyze(makeUnit(), EMPTY_CONTEXT);

    expect(outcome.succeeded).toBe(true);
    expect(outcome.findings.map((f) => f.title)).toEqual(['Kept']);
    expect(outcome.cost).toBe(0.01);
  });

  it('keeps findings when self-reflection is unparseable', async () => {
    const invoker = new ScriptedInvoker((system) =>
      system === REFLECTION_SYSTEM_PROMPT
        ? { content: 'not json', cost: 0.001 }
        : { content: producerJson([{ title: 'Kept', confidence: 0.9 }]), cost: 0.01 }
    );
    const outcome = await new AnalyzerProducer(invoker).analyze(makeUnit(), EMPTY_CONTEXT);

    expect(outcome.findings.map((f) => f.title)).toEqual(['Kept']);
    expect(outcome.cost).toBeCloseTo(0.011, 10);
  });

  it('returns a failed outcome when the model call fails', async () => {
    const invoker = new ScriptedInvoker(() => ({ error: new Error('Primary provider failed: 401') }));
    const producer = new SecurityProducer(invoker);

    const outcome = await producer.analyze(makeUnit(), EMPTY_CONTEXT);

    expect(outcome).toMatchObject({
      producerName: 'security',
      succeeded: false,
      error: 'Primary provider failed: 401',
      findings: [],
      cost: 0,
    });
  });

  it('fails instead of keeping findings when cancelled during reflection', async () => {
    const controller = new AbortController();
    const invoker = new ScriptedInvoker((system) => {
      if (system === REFLECTION_SYSTEM_PROMPT) {
        controller.abort(new Error('Review cancelled'));
        return { content: '{}' };
      }
      return { content: producerJson([{ title: 'Found', confidence: 0.9 }]), cost: 0.01 };
    });

    const outcome = await new AnalyzerProducer(invoker).analyze(makeUnit(), EMPTY_CONTEXT, { signal: controller.signal });

    expect(outcome.succeeded).toBe(false);
    expect(outcome.error).toBe('Review cancelled');
    expect(outcome.cost).toBe(0.01);
  });

  it('keeps security metadata alongside the path', async () => {
    const invoker = new ScriptedInvoker(() => ({
      content: producerJson([{ title: 'Injection', category: 'security', confidence: 0.9, cwe_id: 'CWE-89' }]),
    }));
    const outcome = await new SecurityProducer(invoker, { selfReflection: false }).analyze(makeUnit('app.py'), EMPTY_CONTEXT);

    expect(outcome.findings[0].origin).toEqual({ cweId: 'CWE-89', path: 'app.py' });
  });
});

describe('prompts', () => {
  it('includes static analysis and knowledge blocks', () => {
    const text = formatContext(CONTEXT);
    expect(text).toContain('<static_analysis>\nStatic analysis tools found:\n- ruff: 1 issues\n</static_analysis>');
    expect(text).toContain('<best_practices>\n- python: Prefer context managers.\n</best_practices>');
  });

  it('omits static analysis that did not run', () => {
    const text = formatContext({ staticAnalysis: { toolName: 'none', issues: [], elapsedMs: 0, succeeded: true }, knowledge: [] });
    expect(text).toBe('');
  });

  it('lists findings by id in the reflection prompt', () => {
    const prompt = buildReflectionPrompt(makeUnit('app.py'), [makeFinding({ id: 'security_0', lineStart: 4, severity: 'major', title: 'Leak' })], 'prev');
    expect(prompt).toContain('- security_0 (line 4, major): Leak');
    expect(prompt).toContain('<previous_analysis>\nprev\n</previous_analysis>');
  });

  it('gives the optimizer knowledge but not linter output', () => {
    const invoker = new ScriptedInvoker(() => ({}));
    const unit = makeUnit('app.py');

    expect(new OptimizerProducer(invoker).getUserPrompt(unit, CONTEXT)).not.toContain('<static_analysis>');
    expect(new OptimizerProducer(invoker).getUserPrompt(unit, CONTEXT)).toContain('<best_practices>');
    expect(new AnalyzerProducer(invoker).getUserPrompt(unit, CONTEXT)).toContain('<static_analysis>');
  });

  it('names the file and language in the review prompt', () => {
    const prompt = new DocumenterProducer(new ScriptedInvoker(() => ({}))).getUserPrompt(makeUnit('app.py', 'x = 1'), EMPTY_CONTEXT);
    expect(prompt).toContain('Review the following python file for');
    expect(prompt).toContain('File: app.py');
    expect(prompt).toContain('<code>\nx = 1\n</code>');
  });
});

describe('producer registry', () => {
  const producers = createProducers(new ScriptedInvoker(() => ({})));

  it('creates the four producers', () => {
    expect(producers.map((p) => p.name)).toEqual(['analyzer', 'security', 'optimizer', 'documenter']);
  });

  it('selects producers by option toggles', () => {
    const selected = selectProducers(producers, {
      ...DEFAULT_REVIEW_OPTIONS,
      enableSecurity: false,
      enableDocumentation: false,
    });
    expect(selected.map((p) => p.name)).toEqual(['analyzer', 'optimizer']);
  });

  it('always keeps the analyzer', () => {
    const selected = selectProducers(producers, {
      ...DEFAULT_REVIEW_OPTIONS,
      enableSecurity: false,
      enablePerformance: false,
      enableDocumentation: false,
    });
    expect(selected.map((p) => p.name)).toEqual(['analyzer']);
  });
});
