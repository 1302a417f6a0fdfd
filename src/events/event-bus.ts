import { ProxyEvent, ProxyEventType } from '../types';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export type ProxyEventHandler = (event: ProxyEvent) => void | Promise<void>;

/**
 * Fire-and-forget fan-out keyed by event type. emit() only schedules:
 * every handler runs on its own macrotask, so a slow or throwing handler
 * never delays the request that produced the event.
 */
export class EventBus {
  private handlers: Map<ProxyEventType, ProxyEventHandler[]> = new Map();

  on(type: ProxyEventType, handler: ProxyEventHandler): () => void {
    const current = this.handlers.get(type) ?? [];
    this.handlers.set(type, [...current, handler]);
    return () => {
      this.off(type, handler);
    };
  }

  off(type: ProxyEventType, handler: ProxyEventHandler): boolean {
    const current = this.handlers.get(type);
    if (!current) {
      return false;
    }
    const index = current.indexOf(handler);
    if (index === -1) {
      return false;
    }
    this.handlers.set(type, [...current.slice(0, index), ...current.slice(index + 1)]);
    return true;
  }

  emit(event: ProxyEvent): void {
    const handlers = this.handlers.get(event.type);
    if (!handlers) {
      return;
    }
    for (const handler of handlers) {
      setImmediate(() => {
        Promise.resolve()
          .then(() => handler(event))
          .catch((error: unknown) => {
            logger.error('Event handler failed', {
              eventType: event.type,
              error: errorMessage(error)
            });
          });
      });
    }
  }

  listenerCount(type: ProxyEventType): number {
    return this.handlers.get(type)?.length ?? 0;
  }

  removeAllListeners(): void {
    this.handlers.clear();
  }
}
