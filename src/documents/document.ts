import { z } from 'zod';
import type { Document } from '../core/types.js';
import { ChunkingError } from '../core/errors.js';

/** Record shape emitted by the scraper. */
export const ScrapedRecordSchema = z.object({
  id: z.string().trim().min(1).optional(),
  name: z.string().trim().min(1),
  source_url: z.string().default(''),
  raw_content: z.string().optional(),
  speeches: z.array(z.string()).default([]),
  statements: z.array(z.string()).default([]),
  news: z.array(z.string()).default([]),
  timestamp: z
    .string()
    .refine((s) => !Number.isNaN(Date.parse(s)), { message: 'timestamp must be a parseable date' }),
});

export type ScrapedRecord = z.input<typeof ScrapedRecordSchema>;

/**
 * `name-YYYYMMDD`, e.g. `jane-doe-20240101`. The date is read from the leading `YYYY-MM-DD` of the timestamp text,
 * so an id does not depend on the host timezone. Other formats fall back to their UTC date.
 */
export function documentSlug(name: string, timestamp: string): string {
  const safeName = name
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]/gu, '')
    .replace(/\s+/g, '-');
  return `${safeName}-${slugDate(timestamp)}`;
}

function slugDate(timestamp: string): string {
  const m = /^(\d{4})-(\d{2})-(\d{2})/.exec(timestamp.trim());
  if (m) return `${m[1]}${m[2]}${m[3]}`;
  const date = new Date(timestamp);
  return [
    date.getUTCFullYear().toString().padStart(4, '0'),
    (date.getUTCMonth() + 1).toString().padStart(2, '0'),
    date.getUTCDate().toString().padStart(2, '0'),
  ].join('');
}

/**
 * Validates a raw scraper record and maps it onto a {@link Document}.
 * Throws {@link ChunkingError} when required fields are missing or malformed.
 */
export function parseScrapedRecord(raw: unknown): Document {
  const parsed = ScrapedRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    const id = typeof raw === 'object' && raw !== null && 'id' in raw && typeof raw.id === 'string' ? raw.id : undefined;
    throw new ChunkingError(`malformed scraper record (${detail})`, id);
  }
  const rec = parsed.data;
  return {
    id: rec.id ?? documentSlug(rec.name, rec.timestamp),
    subjectName: rec.name,
    sourceUrl: rec.source_url,
    sections: {
      ...(rec.raw_content !== undefined ? { biography: rec.raw_content } : {}),
      speech: rec.speeches,
      statement: rec.statements,
      news: rec.news,
    },
    retrievedAt: new Date(rec.timestamp).toISOString(),
  };
}
