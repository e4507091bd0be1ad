/**
 * Event hooks for the extraction pipeline
 * Emits one event per attempt, per swallowed failure, and per finished result
 */

import type { ExtractionResult } from '../types';

/** Optional signals whose failures degrade to a zero component. */
export type SignalName = 'semantic' | 'corroboration';

/**
 * Type-safe mapping of event names to their data payloads.
 */
export type ExtractionEventData = {
  attempt: { rawTitle: string };
  heuristicFailure: { heuristicId: string; error: string };
  signalFailure: { signal: SignalName; artist: string; title: string; error: string };
  complete: { rawTitle: string; result: ExtractionResult; elapsedMs: number };
};

export type ExtractionEvent = keyof ExtractionEventData;

type TypedEventListener<K extends ExtractionEvent> = (data: ExtractionEventData[K]) => void;

/**
 * Internal storage type - stores listeners with unknown data for flexibility
 */
type StoredListener = (data: unknown) => void;

export class ExtractionEvents {
  private listeners: Map<ExtractionEvent, StoredListener[]> = new Map();

  on<K extends ExtractionEvent>(event: K, listener: TypedEventListener<K>): void {
    const eventListeners = this.listeners.get(event) ?? [];
    // Cast to StoredListener for internal storage
    eventListeners.push(listener as StoredListener);
    this.listeners.set(event, eventListeners);
  }

  off<K extends ExtractionEvent>(event: K, listener: TypedEventListener<K>): void {
    const eventListeners = this.listeners.get(event);
    if (!eventListeners) {
      return;
    }

    const index = eventListeners.indexOf(listener as StoredListener);
    if (index !== -1) {
      eventListeners.splice(index, 1);
    }
  }

  /**
   * Emit an event. A throwing listener is logged and never reaches the
   * extraction that emitted the event.
   */
  emit<K extends ExtractionEvent>(event: K, data: ExtractionEventData[K]): void {
    const eventListeners = this.listeners.get(event);
    if (!eventListeners) {
      return;
    }

    for (const listener of eventListeners) {
      try {
        listener(data);
      } catch (error) {
        console.warn(
          `[events] ${event} listener failed:`,
          error instanceof Error ? error.message : String(error)
        );
      }
    }
  }

  reset(): void {
    this.listeners.clear();
  }
}

export type ExtractionStats = {
  attempts: number;
  completed: number;
  heuristicFailures: number;
  signalFailures: number;
  byMethod: Record<string, number>;
};

/**
 * Attach counting listeners and return the live tally.
 */
export function trackExtractionStats(events: ExtractionEvents): ExtractionStats {
  const stats: ExtractionStats = {
    attempts: 0,
    completed: 0,
    heuristicFailures: 0,
    signalFailures: 0,
    byMethod: {},
  };

  events.on('attempt', () => {
    stats.attempts++;
  });
  events.on('heuristicFailure', () => {
    stats.heuristicFailures++;
  });
  events.on('signalFailure', () => {
    stats.signalFailures++;
  });
  events.on('complete', ({ result }) => {
    stats.completed++;
    stats.byMethod[result.method] = (stats.byMethod[result.method] ?? 0) + 1;
  });

  return stats;
}
