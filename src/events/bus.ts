import { logger } from '../utils/logger';
import type { EngineEvent } from './types';

export type EngineEventListener = (event: EngineEvent) => void;

export class EventBus {
  private readonly listeners = new Set<EngineEventListener>();

  subscribe(listener: EngineEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Delivers an event to every listener. A failing listener is logged and
   * does not affect the operation that already committed.
   */
  emit(event: EngineEvent): void {
    logger.info('Engine event', { ...event });
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        logger.error('Event listener failed', { error, action: event.action });
      }
    }
  }
}
