import { LOG_MESSAGES, SERVICE, TRADE_DB } from './config.js';
import { decodeFrame } from './decoder.js';
import { acceptCommodityUpdate, acceptSystemEvent } from './filters.js';
import { parseEnvelope } from './parser.js';
import { ListenerError, errorMessage, type ListenerErrorCode } from './errors.js';
import type { CommodityEnvelope, Header, SystemEnvelope } from './schemas.js';
import { ListenerStats, type StatsSnapshot } from './stats.js';
import { applyCommodityUpdate, applySystemEvent, withTradeDb, type StoreOptions } from './store.js';
import { normalizeTimestamp } from './timestamps.js';

export type ProcessOutcome = 'unsupported' | 'filtered' | 'persisted';

export interface ProcessContext extends StoreOptions {
  dbPath?: string;
  stats?: ListenerStats;
  logMessages?: boolean;
}

function software(header: Header): string {
  return `${header.softwareName} ${header.softwareVersion}`;
}

function persistCommodity(env: CommodityEnvelope, ctx: ProcessContext): void {
  const msg = env.message;
  // Normalized before the connection opens: a bad timestamp must not write anything.
  const modified = normalizeTimestamp(msg.timestamp);
  if (ctx.logMessages ?? LOG_MESSAGES) {
    console.log(`[${SERVICE}] [Market] ${msg.systemName} - ${msg.stationName} (${software(env.header)})`);
  }
  const result = withTradeDb(ctx.dbPath ?? TRADE_DB, (db) => applyCommodityUpdate(db, msg, modified), ctx);
  if (result.skipped.length) ctx.stats?.increment('skippedCommodities', result.skipped.length);
}

function persistSystem(env: SystemEnvelope, ctx: ProcessContext): void {
  const msg = env.message;
  const modified = normalizeTimestamp(msg.timestamp);
  if (ctx.logMessages ?? LOG_MESSAGES) {
    console.log(
      `[${SERVICE}] [System] ${msg.StarSystem} ${msg.ControllingPower ?? 'None'} - ${msg.PowerplayState ?? 'None'} (${software(env.header)})`
    );
  }
  withTradeDb(ctx.dbPath ?? TRADE_DB, (db) => applySystemEvent(db, msg, modified), ctx);
}

/**
 * Decode, parse, filter and persist one frame.
 * Throws a `ListenerError` subclass on any per-message failure.
 */
export function processFrame(frame: Buffer, ctx: ProcessContext = {}): ProcessOutcome {
  const { stats } = ctx;
  const payload = decodeFrame(frame);
  stats?.increment('decoded');

  const env = parseEnvelope(payload);
  if (!env) {
    stats?.increment('unsupported');
    return 'unsupported';
  }
  stats?.increment('parsed');

  switch (env.kind) {
    case 'commodity':
      if (!acceptCommodityUpdate(env.message)) break;
      persistCommodity(env, ctx);
      stats?.increment('persisted');
      return 'persisted';
    case 'system':
      if (!acceptSystemEvent(env.message)) break;
      persistSystem(env, ctx);
      stats?.increment('persisted');
      return 'persisted';
  }
  stats?.increment('filtered');
  return 'filtered';
}

export interface FrameFailure {
  code: ListenerErrorCode | 'UNEXPECTED';
  name: string;
  message: string;
}

/** What a frame worker thread posts back for each frame it was handed. */
export type FrameReply =
  | { type: 'done'; outcome: ProcessOutcome; counters: StatsSnapshot['counters'] }
  | { type: 'failed'; error: FrameFailure; counters: StatsSnapshot['counters'] };

/**
 * `processFrame` with its outcome and failure turned into a plain message.
 * Counters cover this frame only; the receiving side merges them.
 */
export function runFrame(frame: Buffer, ctx: Omit<ProcessContext, 'stats'> = {}): FrameReply {
  const stats = new ListenerStats();
  try {
    const outcome = processFrame(frame, { ...ctx, stats });
    return { type: 'done', outcome, counters: stats.snapshot().counters };
  } catch (e) {
    const error: FrameFailure =
      e instanceof ListenerError
        ? { code: e.code, name: e.name, message: e.message }
        : { code: 'UNEXPECTED', name: e instanceof Error ? e.name : 'Error', message: errorMessage(e) };
    return { type: 'failed', error, counters: stats.snapshot().counters };
  }
}
