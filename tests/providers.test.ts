// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  MockProvider,
  ProviderError,
  ProviderGateway,
  classifyProviderError,
  createProvider,
  getProviderTypes,
  hasProviderType,
  registerProviderFactory,
} from '../src/providers/index.js';
import { isTransientError, toError } from '../src/providers/errors.js';
import { CostTracker } from '../src/usage.js';

describe('provider factory', () => {
  it('registers the built-in providers', () => {
    expect(getProviderTypes()).toEqual(expect.arrayContaining(['anthropic', 'openai', 'mock']));
    expect(hasProviderType('mock')).toBe(true);
    expect(hasProviderType('nope')).toBe(false);
  });

  it('creates a mock provider with the requested model', () => {
    const provider = createProvider({ type: 'mock', model: 'reviewer' });
    expect(provider.getName()).toBe('Mock');
    expect(provider.getModel()).toBe('reviewer');
  });

  it('rejects unknown provider types', () => {
    expect(() => createProvider({ type: 'nope' })).toThrow('Unknown provider type: nope');
  });

  it('accepts additional provider types once', () => {
    registerProviderFactory('canned', (options) => new MockProvider({ model: options.model, name: 'Canned' }));

    expect(createProvider({ type: 'canned', model: 'm1' }).getName()).toBe('Canned');
    expect(() => registerProviderFactory('canned', () => new MockProvider())).toThrow(
      "Provider type 'canned' is already registered"
    );
  });
});

describe('error classification', () => {
  it('treats rate limits and server errors as transient', () => {
    expect(isTransientError(new Error('429 Too Many Requests'))).toBe(true);
    expect(isTransientError(new Error('503 Service Unavailable'))).toBe(true);
    expect(isTransientError(new Error('fetch failed'))).toBe(true);
  });

  it('treats auth and validation errors as permanent', () => {
    expect(classifyProviderError(new Error('invalid x-api-key'))).toBe('permanent');
    expect(classifyProviderError('not an error')).toBe('permanent');
  });

  it('keeps the kind of an existing ProviderError', () => {
    const error = new ProviderError('boom', 'transient', 'Mock', 'm');
    expect(classifyProviderError(error)).toBe('transient');
  });

  it('wraps non-errors', () => {
    expect(toError('text').message).toBe('text');
  });
});

describe('MockProvider', () => {
  it('serves queued responses before the default', async () => {
    const provider = new MockProvider({ responses: [{ content: 'first' }], defaultResponse: 'fallback' });
    expect((await provider.chat([{ role: 'user', content: 'q' }])).content).toBe('first');
    expect((await provider.chat([{ role: 'user', content: 'q' }])).content).toBe('fallback');
    expect(provider.getCallCount()).toBe(2);
  });

  it('passes prompts to the responder', async () => {
    const provider = new MockProvider({
      responder: (system, user) => ({ content: `${system}|${user}` }),
    });
    const response = await provider.chat([{ role: 'user', content: 'hello' }], 'sys');
    expect(response.content).toBe('sys|hello');
  });

  it('rejects a delayed response when aborted', async () => {
    const provider = new MockProvider({ responses: [{ content: 'late', delayMs: 10_000 }] });
    const controller = new AbortController();
    const pending = provider.chat([{ role: 'user', content: 'q' }], undefined, { signal: controller.signal });
    controller.abort(new Error('stop'));
    await expect(pending).rejects.toThrow('stop');
  });
});

describe('ProviderGateway', () => {
  let costs: CostTracker;

  beforeEach(() => {
    costs = new CostTracker();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('returns the primary response and records its cost', async () => {
    const primary = new MockProvider({ model: 'claude-sonnet-4-20250514', defaultResponse: 'ok' });
    const gateway = new ProviderGateway(primary, null, costs);

    const response = await gateway.invoke('system', 'user');

    expect(response.content).toBe('ok');
    expect(response.provider).toBe('Mock');
    expect(response.model).toBe('claude-sonnet-4-20250514');
    expect(response.tokenUsage).toEqual({ input: 100, output: 50 });
    // 100/1000 * 0.003 + 50/1000 * 0.015
    expect(response.cost).toBeCloseTo(0.00105, 8);
    expect(costs.getTotal()).toBeCloseTo(0.00105, 8);
  });

  it('fails over once to the fallback', async () => {
    const primary = new MockProvider({ responses: [{ error: new Error('overloaded') }] });
    const fallback = new MockProvider({ name: 'Backup', defaultResponse: 'from fallback' });
    const gateway = new ProviderGateway(primary, fallback, costs);

    const response = await gateway.invoke('system', 'user');

    expect(response.content).toBe('from fallback');
    expect(response.provider).toBe('Backup');
    expect(primary.getCallCount()).toBe(1);
    expect(fallback.getCallCount()).toBe(1);
  });

  it('raises a ProviderError when both providers fail', async () => {
    const unavailable = new Error('503 unavailable');
    const primary = new MockProvider({ responses: [{ error: new Error('invalid key') }] });
    const fallback = new MockProvider({ responses: [{ error: unavailable }] });
    const gateway = new ProviderGateway(primary, fallback, costs);

    const error = await gateway.invoke('s', 'u').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      message: 'Both primary and fallback providers failed: 503 unavailable',
      kind: 'transient',
      cause: unavailable,
    });
    expect(costs.getStats().totalRequests).toBe(0);
  });

  it('reports a primary failure without a fallback', async () => {
    const primary = new MockProvider({ responses: [{ error: new Error('invalid key') }] });
    const gateway = new ProviderGateway(primary, null, costs);

    await expect(gateway.invoke('s', 'u')).rejects.toMatchObject({
      message: 'Primary provider failed: invalid key',
      kind: 'permanent',
    });
  });

  it('treats empty content as a failure', async () => {
    const primary = new MockProvider({ responses: [{ content: '   ' }] });
    const gateway = new ProviderGateway(primary, null, costs);

    await expect(gateway.invoke('s', 'u')).rejects.toThrow('Malformed response from Mock: empty content');
  });

  it('does not fail over after an abort', async () => {
    const primary = new MockProvider({ responses: [{ content: 'late', delayMs: 10_000 }] });
    const fallback = new MockProvider({ defaultResponse: 'unused' });
    const gateway = new ProviderGateway(primary, fallback, costs);
    const controller = new AbortController();

    const pending = gateway.invoke('s', 'u', { signal: controller.signal });
    controller.abort(new Error('Review cancelled'));

    await expect(pending).rejects.toThrow('Review cancelled');
    expect(fallback.getCallCount()).toBe(0);
  });

  it('refuses to start when already aborted', async () => {
    const primary = new MockProvider();
    const gateway = new ProviderGateway(primary, null, costs);
    const controller = new AbortController();
    controller.abort(new Error('Review timed out'));

    await expect(gateway.invoke('s', 'u', { signal: controller.signal })).rejects.toThrow('Review timed out');
    expect(primary.getCallCount()).toBe(0);
  });
});
