import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { openIndexBackend } from '../src/index/open-index.js';
import { EventBus } from '../src/core/event-bus.js';
import { IndexUnavailableError } from '../src/core/errors.js';
import type { PipelineEvent } from '../src/core/types.js';
import { flushEvents, makeRecord, makeTempDir, removeDir } from './fixtures.js';

vi.mock('better-sqlite3', () => ({
  default: class {
    constructor() {
      throw new Error('incompatible native module');
    }
  },
}));

describe('openIndexBackend with an unusable sqlite', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await removeDir(dir);
  });

  it('falls back to the flat store in auto mode and says so', async () => {
    const events = new EventBus();
    const seen: PipelineEvent[] = [];
    events.subscribe((ev) => {
      seen.push(ev);
    });

    const index = await openIndexBackend({ backend: 'auto', dataDir: dir, collection: 'subjects', events });
    expect(index.kind).toBe('flat');

    await index.upsert([makeRecord({ chunkId: 'a', embedding: [1, 0] })]);
    await index.close();
    expect(await fs.readdir(dir)).toEqual(['subjects.flat.json']);

    await flushEvents();
    expect(seen).toHaveLength(1);
    expect(seen[0]).toMatchObject({ type: 'backend_fallback', from: 'sqlite', to: 'flat' });
  });

  it('fails when sqlite is requested explicitly', async () => {
    await expect(openIndexBackend({ backend: 'sqlite', dataDir: dir, collection: 'subjects' })).rejects.toThrow(
      IndexUnavailableError,
    );
  });

  it('fails when neither backend can be opened', async () => {
    const flatPath = path.join(dir, 'subjects.flat.json');
    await fs.writeFile(flatPath, 'not json');

    await expect(openIndexBackend({ backend: 'auto', dataDir: dir, collection: 'subjects' })).rejects.toThrow(
      /^Index backend unavailable: auto \(sqlite: .*; flat: .*is not valid JSON\)\)$/,
    );
  });
});
