import type { SectionKind } from '../core/types.js';
import { stableUuid } from '../utils/uuid.js';

/**
 * Deterministic chunk id: the same (document, section, item, window) always maps to the same UUID v5.
 */
export function chunkId(documentId: string, sectionKind: SectionKind, itemIndex: number, windowIndex: number): string {
  return stableUuid(documentId, sectionKind, itemIndex, windowIndex);
}
