/**
 * Worker lifecycle and job outcome events.
 */

import { randomUUID } from 'node:crypto';

/** All event types emitted by this library. */
export type GearmanEventType =
  | 'job.completed'
  | 'job.failed'
  | 'worker.started'
  | 'worker.stopped';

/** Event envelope. */
export interface GearmanEvent<T = Record<string, unknown>> {
  id: string;
  type: GearmanEventType;
  source: string;
  time: string;
  subject?: string;
  data: T;
}

// ---- Event data type definitions ----

export interface JobCompletedData {
  function_name: string;
  duration_ms: number;
  result_bytes: number;
  [key: string]: unknown;
}

export interface JobFailedData {
  function_name: string;
  duration_ms: number;
  error: string;
  [key: string]: unknown;
}

export interface WorkerStartedData {
  worker_id: string;
  functions: string[];
  [key: string]: unknown;
}

export interface WorkerStoppedData {
  worker_id: string;
  reason: 'graceful_shutdown' | 'connection_lost' | 'error';
  jobs_completed: number;
  uptime_ms: number;
  [key: string]: unknown;
}

/** Event data type map for type-safe event handling. */
export interface GearmanEventDataMap {
  'job.completed': JobCompletedData;
  'job.failed': JobFailedData;
  'worker.started': WorkerStartedData;
  'worker.stopped': WorkerStoppedData;
}

/** Event listener callback type. */
export type GearmanEventListener<T = Record<string, unknown>> = (
  event: GearmanEvent<T>,
) => void | Promise<void>;

// Method syntax keeps the parameter bivariant, so typed listeners fit one store.
type AnyListener = {
  bivarianceHack(event: GearmanEvent<unknown>): void | Promise<void>;
}['bivarianceHack'];

/**
 * A small typed event emitter.
 */
export class GearmanEventEmitter {
  private listeners = new Map<GearmanEventType | '*', Set<AnyListener>>();

  /**
   * Subscribe to an event type.
   * @returns An unsubscribe function.
   */
  on<E extends GearmanEventType>(
    eventType: E,
    listener: GearmanEventListener<GearmanEventDataMap[E]>,
  ): () => void {
    return this.add(eventType, listener);
  }

  /**
   * Subscribe to all events.
   * @returns An unsubscribe function.
   */
  onAny(listener: GearmanEventListener<unknown>): () => void {
    return this.add('*', listener);
  }

  /**
   * Emit an event to all matching listeners and wait for them.
   */
  async emit(
    event: GearmanEvent<GearmanEventDataMap[GearmanEventType]>,
  ): Promise<void> {
    const promises: (void | Promise<void>)[] = [];

    for (const key of [event.type, '*'] as const) {
      const set = this.listeners.get(key);
      if (!set) continue;
      for (const listener of set) {
        promises.push(listener(event));
      }
    }

    await Promise.all(promises);
  }

  /** Remove all listeners. */
  removeAllListeners(): void {
    this.listeners.clear();
  }

  /** Create an event with the standard envelope. */
  static createEvent<E extends GearmanEventType>(
    type: E,
    source: string,
    data: GearmanEventDataMap[E],
    subject?: string,
  ): GearmanEvent<GearmanEventDataMap[E]> {
    const event: GearmanEvent<GearmanEventDataMap[E]> = {
      id: `evt_${randomUUID()}`,
      type,
      source,
      time: new Date().toISOString(),
      data,
    };
    if (subject !== undefined) event.subject = subject;
    return event;
  }

  private add(key: GearmanEventType | '*', listener: AnyListener): () => void {
    const set = this.listeners.get(key) ?? new Set<AnyListener>();
    this.listeners.set(key, set);
    set.add(listener);

    return () => {
      set.delete(listener);
    };
  }
}
