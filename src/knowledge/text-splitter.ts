// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Splits guidance documents into overlapping chunks for embedding.
 */

export interface SplitterConfig {
  /** Maximum chunk size in characters */
  chunkSize: number;
  /** Overlap between consecutive chunks in characters */
  chunkOverlap: number;
}

export const DEFAULT_SPLITTER_CONFIG: SplitterConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
};

/** Preferred break points, coarsest first */
const SEPARATORS = ['\n\n', '\n', ' '];

/**
 * Split text into chunks of at most chunkSize characters. Each cut is
 * moved back to the last paragraph, line or word boundary in the window
 * when one exists past the overlap; otherwise the window is cut hard.
 */
export function splitText(text: string, config: SplitterConfig = DEFAULT_SPLITTER_CONFIG): string[] {
  const { chunkSize, chunkOverlap } = config;
  if (chunkOverlap >= chunkSize) {
    throw new Error(`Chunk overlap (${chunkOverlap}) must be smaller than chunk size (${chunkSize})`);
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + chunkSize, text.length);

    if (end < text.length) {
      const window = text.slice(start, end);
      for (const separator of SEPARATORS) {
        const index = window.lastIndexOf(separator);
        if (index > chunkOverlap) {
          end = start + index + separator.length;
          break;
        }
      }
    }

    const chunk = text.slice(start, end).trim();
    if (chunk) {
      chunks.push(chunk);
    }

    if (end >= text.length) break;
    start = Math.max(end - chunkOverlap, start + 1);
  }

  return chunks;
}
