import type { TagEvent, TagEventHandler } from '../models/events.js';
import { logger } from '../utils/logger.js';

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Delivers tag notifications to registered listeners. Delivery is
 * best-effort: a failing listener is logged and the others still run.
 */
export class TagEventBus {
  private handlers: Set<TagEventHandler> = new Set();

  /**
   * Subscribe to tag events.
   * Returns an unsubscribe function.
   */
  subscribe(handler: TagEventHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  emit(event: TagEvent): void {
    for (const handler of this.handlers) {
      try {
        const result = handler(event);
        if (result instanceof Promise) {
          void result.catch((error: unknown) => {
            logger.warn(`${event.type} listener rejected: ${describe(error)}`);
          });
        }
      } catch (error) {
        logger.warn(`${event.type} listener failed: ${describe(error)}`);
      }
    }
  }

  handlerCount(): number {
    return this.handlers.size;
  }

  clear(): void {
    this.handlers.clear();
  }
}
