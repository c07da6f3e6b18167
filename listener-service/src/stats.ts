import { SERVICE } from './config.js';
import type { ListenerErrorCode } from './errors.js';

export type Counter =
  | 'received'
  | 'decoded'
  | 'parsed'
  | 'unsupported'
  | 'filtered'
  | 'persisted'
  | 'skippedCommodities';

const COUNTERS: readonly Counter[] = [
  'received', 'decoded', 'parsed', 'unsupported', 'filtered', 'persisted', 'skippedCommodities',
];

function isCounter(name: string): name is Counter {
  return COUNTERS.some((c) => c === name);
}

export interface StatsSnapshot {
  counters: Record<Counter, number>;
  errors: Partial<Record<ListenerErrorCode | 'UNEXPECTED', number>>;
}

/**
 * Pipeline counters, owned by the main thread. Worker threads count each frame
 * locally and the pool merges their counts in.
 */
export class ListenerStats {
  private readonly counters: Record<Counter, number> = {
    received: 0,
    decoded: 0,
    parsed: 0,
    unsupported: 0,
    filtered: 0,
    persisted: 0,
    skippedCommodities: 0,
  };
  private readonly errors = new Map<ListenerErrorCode | 'UNEXPECTED', number>();

  increment(counter: Counter, by = 1): void {
    this.counters[counter] += by;
  }

  merge(counters: Partial<Record<Counter, number>>): void {
    for (const [counter, n] of Object.entries(counters)) {
      if (isCounter(counter) && n) this.counters[counter] += n;
    }
  }

  recordError(code: ListenerErrorCode | 'UNEXPECTED'): void {
    this.errors.set(code, (this.errors.get(code) ?? 0) + 1);
  }

  get(counter: Counter): number {
    return this.counters[counter];
  }

  errorCount(code?: ListenerErrorCode | 'UNEXPECTED'): number {
    if (code) return this.errors.get(code) ?? 0;
    let total = 0;
    for (const n of this.errors.values()) total += n;
    return total;
  }

  snapshot(): StatsSnapshot {
    const errors: StatsSnapshot['errors'] = {};
    for (const [code, n] of this.errors) errors[code] = n;
    return { counters: { ...this.counters }, errors };
  }

  format(): string {
    const c = this.counters;
    const errs = [...this.errors.entries()].map(([k, v]) => `${k}=${v}`).join(' ') || 'none';
    return `received=${c.received} decoded=${c.decoded} parsed=${c.parsed} unsupported=${c.unsupported} ` +
      `filtered=${c.filtered} persisted=${c.persisted} skippedCommodities=${c.skippedCommodities} errors: ${errs}`;
  }
}

/** Log a stats line every `intervalMs`. Returns a stop function. */
export function startStatsReporter(stats: ListenerStats, intervalMs: number): () => void {
  if (intervalMs <= 0) return () => {};
  const timer = setInterval(() => {
    console.log(`[${SERVICE}] stats ${stats.format()}`);
  }, intervalMs).unref();
  return () => clearInterval(timer);
}
