import path from 'path';
import dotenv from 'dotenv';

dotenv.config();

export const SERVICE = 'listener-service';

export function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
}

export function nonNegativeInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw);
  return raw !== undefined && raw !== '' && Number.isInteger(n) && n >= 0 ? n : fallback;
}

// EDDN relay (public, all topics)
export const EDDN_RELAY: string = process.env.EDDN_RELAY || 'tcp://eddn.edcd.io:9500';

// TradeDangerous database; schema is owned by TradeDangerous, never created here
export const TRADE_DB: string = process.env.TRADE_DB || path.resolve(process.cwd(), 'data', 'TradeDangerous.db');
export const DB_BUSY_TIMEOUT_MS: number = nonNegativeInt(process.env.DB_BUSY_TIMEOUT_MS, 5000);

// Pipeline sizing. More workers means more store contention, not more throughput past a point.
export const WORKER_COUNT: number = positiveInt(process.env.WORKER_COUNT, 16);
export const QUEUE_CAPACITY: number = positiveInt(process.env.QUEUE_CAPACITY, 4096);

// Timing
export const POLL_TIMEOUT_MS: number = positiveInt(process.env.POLL_TIMEOUT_MS, 1000);
export const IDLE_SLEEP_MS: number = nonNegativeInt(process.env.IDLE_SLEEP_MS, 100);
export const RETRY_DELAY_MS: number = nonNegativeInt(process.env.RETRY_DELAY_MS, 1000);
export const DEQUEUE_TIMEOUT_MS: number = positiveInt(process.env.DEQUEUE_TIMEOUT_MS, 100);
export const STATS_INTERVAL_MS: number = nonNegativeInt(process.env.STATS_INTERVAL_MS, 60_000); // 0 disables

// One summary line per accepted message
export const LOG_MESSAGES: boolean = (process.env.LOG_MESSAGES ?? 'true') !== 'false';

