import Database from 'better-sqlite3';
import { DB_BUSY_TIMEOUT_MS } from './config.js';
import { ListenerError, PersistenceError, errorMessage } from './errors.js';
import type { CommodityUpdate, SystemEvent } from './schemas.js';

// Tables this service touches. TradeDangerous owns the schema.
const REQUIRED_TABLES = ['Item', 'StationItem', 'System'] as const;

export type TradeDb = Database.Database;

export interface StoreOptions {
  busyTimeoutMs?: number;
}

export interface CommodityResult {
  matched: number;
  skipped: string[];
}

function openTradeDb(path: string, opts: StoreOptions & { readonly?: boolean } = {}): TradeDb {
  try {
    const db = new Database(path, { fileMustExist: true, readonly: opts.readonly ?? false });
    db.pragma(`busy_timeout = ${opts.busyTimeoutMs ?? DB_BUSY_TIMEOUT_MS}`);
    return db;
  } catch (e) {
    throw new PersistenceError(`cannot open trade db ${path}: ${errorMessage(e)}`, { cause: e });
  }
}

/** Startup check: the store exists and carries the tables we update. */
export function verifyTradeDb(path: string, opts: StoreOptions = {}): void {
  const db = openTradeDb(path, { ...opts, readonly: true });
  try {
    const rows = db
      .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table'`)
      .all();
    const present = new Set(rows.map((r) => r.name));
    const missing = REQUIRED_TABLES.filter((t) => !present.has(t));
    if (missing.length) {
      throw new PersistenceError(`trade db ${path} is missing table(s): ${missing.join(', ')}`);
    }
  } catch (e) {
    if (e instanceof ListenerError) throw e;
    throw new PersistenceError(`cannot read trade db ${path}: ${errorMessage(e)}`, { cause: e });
  } finally {
    db.close();
  }
}

/**
 * Run `fn` inside one transaction on a connection private to this call.
 * Commits when `fn` returns, rolls back when it throws, always closes.
 *
 * The write lock is taken at BEGIN so a busy store is waited on for
 * `busyTimeoutMs`; a deferred transaction would fail at once when its read
 * lock could not be upgraded.
 */
export function withTradeDb<T>(path: string, fn: (db: TradeDb) => T, opts: StoreOptions = {}): T {
  const db = openTradeDb(path, opts);
  try {
    return db.transaction(fn).immediate(db);
  } catch (e) {
    if (e instanceof ListenerError) throw e;
    throw new PersistenceError(`trade db write failed: ${errorMessage(e)}`, { cause: e });
  } finally {
    db.close();
  }
}

/** Escape LIKE wildcards so names match literally (used with ESCAPE '\'). */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, '\\$&');
}

/** Names on the wire may carry spaces the store omits, and vice versa. */
export function normalizeCommodityName(name: string): string {
  return name.replace(/\s+/g, '');
}

export function findItemId(db: TradeDb, commodityName: string): number | null {
  const row = db
    .prepare<[string], { item_id: number }>(
      `SELECT item_id FROM Item WHERE REPLACE(name, ' ', '') LIKE ? ESCAPE '\\'`
    )
    .get(escapeLike(normalizeCommodityName(commodityName)));
  return row ? row.item_id : null;
}

/**
 * Write fresh market data for every commodity we know.
 * Unknown commodity names are skipped individually; the rest still apply.
 */
export function applyCommodityUpdate(db: TradeDb, msg: CommodityUpdate, modified: string): CommodityResult {
  const updateStationItem = db.prepare<[number, number, number, number, string, number, number]>(`
    UPDATE StationItem SET demand_price = ?, demand_units = ?, demand_level = 0,
                           supply_price = ?, supply_units = ?, supply_level = 0,
                           modified = ?, from_live = 1
    WHERE station_id = ? AND item_id = ?
  `);
  const updateAvgPrice = db.prepare<[number, number]>('UPDATE Item SET avg_price = ? WHERE item_id = ?');

  const result: CommodityResult = { matched: 0, skipped: [] };
  for (const commodity of msg.commodities) {
    const itemId = findItemId(db, commodity.name);
    if (itemId === null) {
      result.skipped.push(commodity.name);
      continue;
    }
    updateStationItem.run(
      commodity.sellPrice, commodity.demand,
      commodity.buyPrice, commodity.stock,
      modified, msg.marketId, itemId
    );
    updateAvgPrice.run(commodity.meanPrice, itemId);
    result.matched++;
  }
  return result;
}

/**
 * Record the controlling power of a system. Name match is case-insensitive;
 * the number of rows hit is reported, not enforced.
 */
export function applySystemEvent(db: TradeDb, msg: SystemEvent, modified: string): number {
  const info = db
    .prepare<[string | null, string, string]>(`UPDATE System SET power = ?, modified = ? WHERE name LIKE ? ESCAPE '\\'`)
    .run(msg.ControllingPower ?? null, modified, escapeLike(msg.StarSystem));
  return info.changes;
}
