import { QUEUE_CAPACITY, SERVICE, STATS_INTERVAL_MS, TRADE_DB } from './config.js';
import { WorkerPool, type WorkItem, type WorkerPoolOptions } from './pool.js';
import { FrameQueue } from './queue.js';
import { ListenerStats, startStatsReporter } from './stats.js';
import { verifyTradeDb } from './store.js';
import { FeedSubscriber, type FeedSocket, type SubscriberOptions } from './subscriber.js';

export interface ListenerOptions extends Omit<WorkerPoolOptions, 'stats'>, Omit<SubscriberOptions, 'stats'> {
  socket: FeedSocket;
  signal: AbortSignal;
  queueCapacity?: number;
  statsIntervalMs?: number;
  stats?: ListenerStats;
}

export interface ListenerSummary {
  frames: number;
  stats: ListenerStats;
}

/**
 * Subscriber → queue → worker pool, until `signal` aborts.
 *
 * Store and feed problems at startup are fatal and reject. Once running, every
 * failure is contained to its message or poll cycle. On abort the subscriber
 * closes the feed, the pool drains what is queued, and the summary is returned.
 */
export async function runListener(opts: ListenerOptions): Promise<ListenerSummary> {
  const dbPath = opts.dbPath ?? TRADE_DB;
  const stats = opts.stats ?? new ListenerStats();

  try {
    verifyTradeDb(dbPath, opts);
  } catch (e) {
    opts.socket.close();
    throw e;
  }
  console.log(`[${SERVICE}] trade db: ${dbPath}`);

  const queue = new FrameQueue<WorkItem>(opts.queueCapacity ?? QUEUE_CAPACITY);
  const pool = new WorkerPool(queue, { ...opts, dbPath, stats });
  const subscriber = new FeedSubscriber(opts.socket, queue, { ...opts, stats });
  const stopReporter = startStatsReporter(stats, opts.statsIntervalMs ?? STATS_INTERVAL_MS);

  pool.start();
  let frames: number;
  try {
    frames = await subscriber.run(opts.signal);
  } finally {
    // Also reached on a fatal connect error, so no worker is left waiting.
    const handled = await pool.shutdown();
    stopReporter();
    console.log(`[${SERVICE}] final stats ${stats.format()} per-worker=${handled.join(',')}`);
  }
  return { frames, stats };
}
