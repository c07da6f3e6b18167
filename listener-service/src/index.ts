/**
 * Listener Service
 * ---------------------------------------------
 * Purpose
 * - Keep a local TradeDangerous database current from the live EDDN feed.
 *
 * Responsibilities
 * - Subscribe to every topic on the EDDN ZeroMQ relay and queue raw frames.
 * - Inflate and parse commodity/3 and journal/1 FSDJump messages; ignore the rest.
 * - Drop fleet-carrier markets and systems without powerplay relevance.
 * - UPDATE `StationItem`, `Item.avg_price` and `System.power` (never INSERT/DELETE).
 *
 * Environment & Dependencies
 * - EDDN_RELAY: relay address (default tcp://eddn.edcd.io:9500).
 * - TRADE_DB: TradeDangerous SQLite file (default ./data/TradeDangerous.db); must already exist.
 * - WORKER_COUNT, QUEUE_CAPACITY: pipeline sizing (defaults 16 / 4096).
 * - STATS_INTERVAL_MS, LOG_MESSAGES: observability.
 *
 * Operational Notes
 * - Each message gets its own connection and transaction; an error rolls back that message only.
 * - Each worker writes from its own thread; a locked store stalls that worker, not the feed.
 * - Workers run concurrently: the last write committed wins, whatever the event timestamps.
 * - SIGINT/SIGTERM/ESC drains the queue before exit; a second interrupt stops workers early.
 */
import { EDDN_RELAY, SERVICE, TRADE_DB, WORKER_COUNT } from './config.js';
import { runListener } from './pipeline.js';
import { registerShutdown } from './shutdown.js';
import { createZmqFeedSocket } from './subscriber.js';

async function main() {
  console.log(`[${SERVICE}] starting... relay=${EDDN_RELAY} db=${TRADE_DB} workers=${WORKER_COUNT}`);
  const graceful = new AbortController();
  const force = new AbortController();
  const unregister = registerShutdown(graceful, force);
  try {
    const { frames } = await runListener({
      socket: createZmqFeedSocket(EDDN_RELAY),
      signal: graceful.signal,
      forceStop: force.signal,
    });
    console.log(`[${SERVICE}] stopped after ${frames} frame(s)`);
  } finally {
    unregister();
  }
}

main().catch((e) => {
  console.error(`[${SERVICE}] startup failed:`, e);
  process.exitCode = 1;
});
