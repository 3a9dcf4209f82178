// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Knowledge Store
 *
 * Guidance documents (best practices, security patterns, performance
 * tips, bug patterns) embedded into one vectra LocalIndex per collection.
 */

import { LocalIndex } from 'vectra';
import { glob } from 'glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import { logger } from '../logger.js';
import { RevuePaths } from '../paths.js';
import { errorMessage } from '../review/errors.js';
import type { FindingCategory } from '../review/types.js';
import type { Embedder } from './embeddings.js';
import { DEFAULT_SPLITTER_CONFIG, splitText, type SplitterConfig } from './text-splitter.js';
import {
  KNOWLEDGE_COLLECTIONS,
  type KnowledgeCollection,
  type KnowledgeEntry,
  type KnowledgeMetadata,
  type KnowledgeStore,
  type RetrieveQuery,
} from './types.js';

/** Results returned per issue lookup */
const ISSUE_TOP_K = 3;

const ISSUE_COLLECTIONS: Partial<Record<FindingCategory, KnowledgeCollection>> = {
  bug: 'bug_patterns',
  security: 'security_patterns',
  performance: 'performance_tips',
};

export interface VectraKnowledgeOptions {
  /** Base directory for the collections (default: ~/.revue/knowledge) */
  directory?: string;
  embedder: Embedder;
  splitter?: SplitterConfig;
}

export type SeedCounts = Record<KnowledgeCollection, number>;

function emptyCounts(): SeedCounts {
  return { best_practices: 0, security_patterns: 0, performance_tips: 0, bug_patterns: 0 };
}

/**
 * Vector-backed knowledge store.
 */
export class VectraKnowledgeStore implements KnowledgeStore {
  private readonly directory: string;
  private readonly embedder: Embedder;
  private readonly splitter: SplitterConfig;
  private indexes = new Map<KnowledgeCollection, LocalIndex<KnowledgeMetadata>>();

  constructor(options: VectraKnowledgeOptions) {
    this.directory = options.directory || RevuePaths.knowledge();
    this.embedder = options.embedder;
    this.splitter = options.splitter ?? DEFAULT_SPLITTER_CONFIG;
  }

  /**
   * Semantic search across one collection, or all of them.
   * Errors are logged and read as no results.
   */
  async retrieve(query: RetrieveQuery): Promise<KnowledgeEntry[]> {
    try {
      const [vector] = await this.embedder.embed([query.query], query.signal);
      if (!vector) return [];

      const collections = query.category ? [query.category] : KNOWLEDGE_COLLECTIONS;
      const filter = query.language ? { topic: { $eq: query.language } } : undefined;
      const entries: KnowledgeEntry[] = [];

      for (const collection of collections) {
        query.signal?.throwIfAborted();
        const index = await this.openIndex(collection, false);
        if (!index) continue;

        const results = await index.queryItems(vector, '', query.topK, filter);
        for (const result of results) {
          entries.push({
            content: result.item.metadata.content,
            metadata: { ...result.item.metadata },
            distance: 1 - result.score,
          });
        }
      }

      entries.sort((a, b) => a.distance - b.distance);
      return entries.slice(0, query.topK);
    } catch (error) {
      logger.error(`Knowledge retrieval failed: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Guidance for a specific finding, looked up in the collection that
   * matches its category.
   */
  retrieveForIssue(description: string, language: string, category: FindingCategory): Promise<KnowledgeEntry[]> {
    return this.retrieve({
      query: description,
      language,
      category: ISSUE_COLLECTIONS[category] ?? 'best_practices',
      topK: ISSUE_TOP_K,
    });
  }

  /**
   * Load `<dir>/<collection>/*.md` into the collections. The file name
   * (without extension) becomes the chunk topic.
   */
  async seedFromDirectory(dataDir: string): Promise<SeedCounts> {
    const counts = emptyCounts();

    for (const collection of KNOWLEDGE_COLLECTIONS) {
      const collectionDir = path.join(dataDir, collection);
      const files = (await glob('*.md', { cwd: collectionDir, nodir: true })).sort();

      if (files.length === 0) {
        logger.warn(`No documents found in ${collectionDir}`);
        continue;
      }

      const chunks: KnowledgeMetadata[] = [];
      for (const file of files) {
        const content = await fs.readFile(path.join(collectionDir, file), 'utf-8');
        const topic = path.basename(file, '.md');
        for (const chunk of splitText(content, this.splitter)) {
          chunks.push({ source: file, topic, collection, content: chunk });
        }
      }

      const vectors = await this.embedder.embed(chunks.map((c) => c.content));
      if (vectors.length !== chunks.length) {
        throw new Error(`Embedder returned ${vectors.length} vectors for ${chunks.length} chunks`);
      }

      const index = await this.requireIndex(collection);
      await index.beginUpdate();
      try {
        for (let i = 0; i < chunks.length; i++) {
          await index.insertItem({ vector: vectors[i], metadata: chunks[i] });
        }
        await index.endUpdate();
      } catch (error) {
        index.cancelUpdate();
        throw error;
      }

      counts[collection] = chunks.length;
      logger.verbose(`Loaded ${chunks.length} chunks into ${collection}`);
    }

    return counts;
  }

  /**
   * Item count per collection.
   */
  async getStats(): Promise<SeedCounts> {
    const counts = emptyCounts();
    for (const collection of KNOWLEDGE_COLLECTIONS) {
      const index = await this.openIndex(collection, false);
      if (index) {
        counts[collection] = (await index.listItems()).length;
      }
    }
    return counts;
  }

  private async requireIndex(collection: KnowledgeCollection): Promise<LocalIndex<KnowledgeMetadata>> {
    const index = await this.openIndex(collection, true);
    if (!index) {
      throw new Error(`Could not open knowledge collection ${collection}`);
    }
    return index;
  }

  private async openIndex(
    collection: KnowledgeCollection,
    create: boolean
  ): Promise<LocalIndex<KnowledgeMetadata> | null> {
    const existing = this.indexes.get(collection);
    if (existing) return existing;

    const index = new LocalIndex<KnowledgeMetadata>(path.join(this.directory, collection));
    if (!(await index.isIndexCreated())) {
      if (!create) return null;
      await fs.mkdir(this.directory, { recursive: true });
      await index.createIndex({ version: 1 });
    }

    this.indexes.set(collection, index);
    return index;
  }
}
