// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Embedding providers for the knowledge store.
 */

import OpenAI from 'openai';

/**
 * Model dimensions for OpenAI embedding models.
 */
const MODEL_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

/** OpenAI caps the inputs of one embeddings request */
const BATCH_SIZE = 100;

export interface Embedder {
  getModel(): string;
  getDimensions(): number;
  embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

/**
 * OpenAI embedding provider.
 */
export class OpenAIEmbedder implements Embedder {
  private client: OpenAI;
  private model: string;

  constructor(model: string = 'text-embedding-3-small', apiKey?: string) {
    this.client = new OpenAI({
      apiKey: apiKey || process.env.OPENAI_API_KEY,
    });
    this.model = model;
  }

  getModel(): string {
    return this.model;
  }

  getDimensions(): number {
    return MODEL_DIMENSIONS[this.model] || 1536;
  }

  async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) return [];

    const allEmbeddings: number[][] = [];

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await this.client.embeddings.create(
        {
          model: this.model,
          input: batch,
        },
        { signal }
      );

      // Sort by index to maintain order
      const sorted = [...response.data].sort((a, b) => a.index - b.index);
      allEmbeddings.push(...sorted.map((d) => d.embedding));
    }

    return allEmbeddings;
  }
}
