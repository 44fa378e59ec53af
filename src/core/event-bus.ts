import type { PipelineEvent } from './types.js';
import { Logger } from '../utils/logger.js';

export type EventHook = (ev: PipelineEvent) => void | Promise<void>;

export class EventBus {
  private readonly hooks = new Set<EventHook>();
  private readonly log = Logger.getInstance('events');

  emit(ev: PipelineEvent): void {
    // Hooks never fail the operation that emitted the event.
    for (const h of this.hooks) {
      void Promise.resolve()
        .then(() => h(ev))
        .catch((e: unknown) => this.log.warn(`Event hook failed for ${ev.type}`, { error: String(e) }));
    }
  }

  subscribe(hook: EventHook): () => void {
    this.hooks.add(hook);
    return () => this.hooks.delete(hook);
  }

  get size(): number {
    return this.hooks.size;
  }
}
