import { v5 as uuidv5 } from 'uuid';

/** Fixed namespace so ids stay stable across processes and releases. */
export const CHUNK_NAMESPACE = '6f1c2b8e-4d3a-5e7f-9a0b-1c2d3e4f5a6b';

export function stableUuid(...parts: Array<string | number>): string {
  return uuidv5(parts.map(String).join('\u001f'), CHUNK_NAMESPACE);
}
