import type { Chunk, ChunkerConfig, Document, SectionKind } from '../core/types.js';
import { SECTION_KINDS } from '../core/types.js';
import { ChunkingError } from '../core/errors.js';
import { chunkId } from './chunk-id.js';
import { tokenize, type Token } from './tokenizer.js';

export const DEFAULT_CHUNKER_CONFIG: Readonly<ChunkerConfig> = {
  windowSize: 200,
  overlap: 50,
  minChunkTokens: 20,
};

interface TokenWindow {
  first: number;
  /** Exclusive. */
  last: number;
}

export function validateChunkerConfig(config: ChunkerConfig): void {
  const { windowSize, overlap, minChunkTokens } = config;
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new ChunkingError(`windowSize must be a positive integer, got ${windowSize}`);
  }
  if (!Number.isInteger(overlap) || overlap < 0 || overlap >= windowSize) {
    throw new ChunkingError(`overlap must be an integer in [0, windowSize), got ${overlap}`);
  }
  if (!Number.isInteger(minChunkTokens) || minChunkTokens < 0) {
    throw new ChunkingError(`minChunkTokens must be a non-negative integer, got ${minChunkTokens}`);
  }
}

/**
 * Token windows over `count` tokens. When fewer than `minChunkTokens` uncovered tokens
 * remain after a window, they are folded into it instead of opening another one.
 */
export function slideWindows(count: number, config: ChunkerConfig): TokenWindow[] {
  if (count === 0) return [];
  const step = config.windowSize - config.overlap;
  const windows: TokenWindow[] = [];
  let first = 0;
  for (;;) {
    const last = Math.min(first + config.windowSize, count);
    windows.push({ first, last });
    if (last === count) break;

    if (count - last < config.minChunkTokens) {
      windows[windows.length - 1] = { first, last: count };
      break;
    }
    first += step;
  }
  return windows;
}

function sectionItems(document: Document, kind: SectionKind): readonly string[] {
  if (kind === 'biography') {
    const bio = document.sections.biography;
    return bio === undefined ? [] : [bio];
  }
  return document.sections[kind] ?? [];
}

/**
 * Splits a document into overlapping windows. Chunk ids and texts are a pure function of
 * the document and the config.
 */
export function chunkDocument(document: Document, config: ChunkerConfig = DEFAULT_CHUNKER_CONFIG): Chunk[] {
  validateChunkerConfig(config);
  if (!document.id?.trim()) throw new ChunkingError('missing id');
  if (!document.subjectName?.trim()) throw new ChunkingError('missing subject name', document.id);

  const chunks: Chunk[] = [];
  for (const sectionKind of SECTION_KINDS) {
    const items = sectionItems(document, sectionKind);
    items.forEach((item, itemIndex) => {
      const tokens: Token[] = tokenize(item);
      slideWindows(tokens.length, config).forEach(({ first, last }, windowIndex) => {
        const start = tokens[first]?.start ?? 0;
        const end = tokens[last - 1]?.end ?? start;
        chunks.push({
          chunkId: chunkId(document.id, sectionKind, itemIndex, windowIndex),
          documentId: document.id,
          subjectName: document.subjectName,
          sectionKind,
          itemIndex,
          windowIndex,
          sequenceIndex: chunks.length,
          text: item.slice(start, end),
          charSpan: { start, end },
          tokenCount: last - first,
        });
      });
    });
  }
  return chunks;
}
