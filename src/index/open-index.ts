import path from 'node:path';
import type { BackendKind } from '../core/types.js';
import { IndexUnavailableError } from '../core/errors.js';
import type { EventBus } from '../core/event-bus.js';
import { Logger } from '../utils/logger.js';
import type { IndexBackend } from './index-backend.js';
import { FlatIndexBackend } from './flat-index-backend.js';
import { SqliteIndexBackend } from './sqlite-index-backend.js';

export type BackendChoice = BackendKind | 'auto';

export interface OpenIndexOptions {
  backend: BackendChoice;
  /** Directory holding the collection. `null` keeps everything in memory. */
  dataDir: string | null;
  collection: string;
  events?: EventBus;
}

export function collectionPaths(dataDir: string | null, collection: string): { sqlite: string; flat: string | undefined } {
  if (dataDir === null) return { sqlite: ':memory:', flat: undefined };
  return {
    sqlite: path.join(dataDir, `${collection}.sqlite`),
    flat: path.join(dataDir, `${collection}.flat.json`),
  };
}

/**
 * Opens the configured backend once at startup. `auto` prefers sqlite and falls back to the flat store
 * when sqlite cannot be loaded or opened.
 */
export async function openIndexBackend(opts: OpenIndexOptions): Promise<IndexBackend> {
  const log = Logger.getInstance('index');
  const paths = collectionPaths(opts.dataDir, opts.collection);

  if (opts.backend === 'sqlite') return SqliteIndexBackend.open({ filePath: paths.sqlite });
  if (opts.backend === 'flat') return FlatIndexBackend.open({ filePath: paths.flat });

  let sqliteError: unknown;
  try {
    return await SqliteIndexBackend.open({ filePath: paths.sqlite });
  } catch (e) {
    sqliteError = e;
  }
  const reason = sqliteError instanceof Error ? sqliteError.message : String(sqliteError);
  log.warn('sqlite index unavailable, falling back to flat store', { reason, collection: opts.collection });
  opts.events?.emit({ type: 'backend_fallback', from: 'sqlite', to: 'flat', reason, at: Date.now() });

  try {
    return await FlatIndexBackend.open({ filePath: paths.flat });
  } catch (e) {
    throw new IndexUnavailableError('auto', `sqlite: ${reason}; flat: ${e instanceof Error ? e.message : String(e)}`, e);
  }
}
