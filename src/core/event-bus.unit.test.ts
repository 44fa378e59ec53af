import { describe, it, expect, vi, afterEach } from 'vitest';
import { EventBus } from './event-bus.js';
import type { PipelineEvent } from './types.js';
import { flushEvents } from '../../tests/fixtures.js';

const deleted: PipelineEvent = { type: 'document_deleted', documentId: 'doc-1', removed: 2, at: 0 };

describe('EventBus', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('delivers events to subscribers after the emitting call returns', async () => {
    const bus = new EventBus();
    const seen: PipelineEvent[] = [];
    bus.subscribe((ev) => {
      seen.push(ev);
    });

    bus.emit(deleted);
    expect(seen).toEqual([]);

    await flushEvents();
    expect(seen).toEqual([deleted]);
  });

  it('stops delivering after unsubscribe', async () => {
    const bus = new EventBus();
    const hook = vi.fn();
    const unsubscribe = bus.subscribe(hook);
    unsubscribe();

    bus.emit(deleted);
    await flushEvents();

    expect(hook).not.toHaveBeenCalled();
    expect(bus.size).toBe(0);
  });

  it('keeps going when a hook throws', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const bus = new EventBus();
    const healthy = vi.fn();
    bus.subscribe(() => {
      throw new Error('hook broke');
    });
    bus.subscribe(healthy);

    expect(() => bus.emit(deleted)).not.toThrow();
    await flushEvents();

    expect(healthy).toHaveBeenCalledWith(deleted);
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
