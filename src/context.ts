/**
 * ClaimScout - Run Context
 *
 * Holds the counters and the structured event log for one run. Every
 * component receives the context explicitly; nothing is module-global.
 */

import type { Ecosystem } from './types.js';

export type RunEvent =
  | { type: 'manifest_parsed'; file: string; ecosystem: Ecosystem; records: number }
  | { type: 'manifest_failed'; file: string; ecosystem: Ecosystem | null; message: string }
  | { type: 'extraction_finished'; rootDir: string; files: number; records: number }
  | { type: 'lookup_started'; name: string }
  | { type: 'lookup_retry'; name: string; attempt: number; delayMs: number; message: string }
  | { type: 'lookup_finished'; name: string; status: 'found' | 'unclaimed' | 'error'; attempts: number }
  | { type: 'verification_cancelled'; completed: number; skipped: number };

export type RunEventType = RunEvent['type'];

export interface TimedRunEvent {
  at: string;
  event: RunEvent;
}

export interface RunCounters {
  filesScanned: number;
  filesWithRecords: number;
  filesFailed: number;
  lookupsStarted: number;
  lookupsFinished: number;
  retries: number;
  /** Highest number of simultaneous registry lookups observed */
  peakInFlight: number;
}

export type RunEventListener = (event: RunEvent) => void;

export class RunContext {
  readonly counters: RunCounters = {
    filesScanned: 0,
    filesWithRecords: 0,
    filesFailed: 0,
    lookupsStarted: 0,
    lookupsFinished: 0,
    retries: 0,
    peakInFlight: 0,
  };

  private readonly log: TimedRunEvent[] = [];
  private readonly listeners = new Set<RunEventListener>();
  private readonly keepEvents: boolean;
  private inFlight = 0;

  constructor(options: { keepEvents?: boolean } = {}) {
    this.keepEvents = options.keepEvents ?? true;
  }

  emit(event: RunEvent): void {
    if (this.keepEvents) {
      this.log.push({ at: new Date().toISOString(), event });
    }
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /**
   * Subscribe to events. Returns an unsubscribe function.
   */
  on(listener: RunEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get events(): readonly TimedRunEvent[] {
    return this.log;
  }

  eventsOfType<T extends RunEventType>(type: T): Array<Extract<RunEvent, { type: T }>> {
    const matches: Array<Extract<RunEvent, { type: T }>> = [];
    for (const { event } of this.log) {
      if (isEventOfType(event, type)) {
        matches.push(event);
      }
    }
    return matches;
  }

  lookupStarted(): void {
    this.inFlight++;
    this.counters.lookupsStarted++;
    this.counters.peakInFlight = Math.max(this.counters.peakInFlight, this.inFlight);
  }

  lookupSettled(): void {
    this.inFlight = Math.max(0, this.inFlight - 1);
    this.counters.lookupsFinished++;
  }
}

function isEventOfType<T extends RunEventType>(
  event: RunEvent,
  type: T
): event is Extract<RunEvent, { type: T }> {
  return event.type === type;
}
