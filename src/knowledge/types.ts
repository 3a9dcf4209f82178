// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Knowledge store types.
 */

/**
 * Collections of guidance documents.
 */
export type KnowledgeCollection =
  | 'best_practices'
  | 'security_patterns'
  | 'performance_tips'
  | 'bug_patterns';

export const KNOWLEDGE_COLLECTIONS: readonly KnowledgeCollection[] = [
  'best_practices',
  'security_patterns',
  'performance_tips',
  'bug_patterns',
];

/**
 * Metadata stored with each chunk.
 */
export interface KnowledgeMetadata {
  /** Source file name */
  source: string;
  /** Topic, usually the language the document covers */
  topic: string;
  collection: KnowledgeCollection;
  /** Chunk text */
  content: string;
  [key: string]: string | number | boolean;
}

/**
 * One retrieved piece of guidance.
 */
export interface KnowledgeEntry {
  content: string;
  metadata: Record<string, string | number | boolean>;
  /** Lower is closer */
  distance: number;
}

export interface RetrieveQuery {
  query: string;
  language?: string;
  category?: KnowledgeCollection;
  topK: number;
  signal?: AbortSignal;
}

/**
 * Contextual guidance collaborator used by the enrich stage.
 */
export interface KnowledgeStore {
  retrieve(query: RetrieveQuery): Promise<KnowledgeEntry[]>;
}
