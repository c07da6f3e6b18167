import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import { join } from 'path';
import { PersistenceError } from '../src/errors.js';
import type { CommodityUpdate, SystemEvent } from '../src/schemas.js';
import {
  applyCommodityUpdate,
  applySystemEvent,
  escapeLike,
  findItemId,
  verifyTradeDb,
  withTradeDb,
} from '../src/store.js';
import { MARKET_ID, createTradeDb, type TestTradeDb } from './helpers/tradeDb.js';

function update(commodities: CommodityUpdate['commodities']): CommodityUpdate {
  return { systemName: 'Sol', stationName: 'Abraham Lincoln', marketId: MARKET_ID, timestamp: '2024-01-01T12:00:00Z', commodities };
}

const tritium = { name: 'tritium', meanPrice: 41000, buyPrice: 1200, stock: 50, sellPrice: 1500, demand: 200 };

describe('trade store', () => {
  let store: TestTradeDb;

  beforeEach(() => {
    store = createTradeDb();
  });

  afterEach(() => {
    store.cleanup();
  });

  describe('findItemId', () => {
    it('ignores whitespace and case', () => {
      withTradeDb(store.path, (db) => {
        expect(findItemId(db, 'Tritium ')).toBe(1);
        expect(findItemId(db, 'tritium')).toBe(1);
        expect(findItemId(db, 'liquidoxygen')).toBe(2);
        expect(findItemId(db, 'Liquid Oxygen')).toBe(2);
      });
    });

    it('matches LIKE wildcards literally', () => {
      withTradeDb(store.path, (db) => {
        expect(findItemId(db, 'Trit%')).toBeNull();
        expect(findItemId(db, 'G_ld')).toBeNull();
        expect(findItemId(db, 'unobtainium')).toBeNull();
      });
    });
  });

  it('escapes backslash, percent and underscore', () => {
    expect(escapeLike('a%b_c\\d')).toBe('a\\%b\\_c\\\\d');
  });

  describe('applyCommodityUpdate', () => {
    it('writes live demand and supply terms and resets the levels', () => {
      const result = withTradeDb(store.path, (db) => applyCommodityUpdate(db, update([tritium]), '2024-01-01 12:00:00'));

      expect(result).toEqual({ matched: 1, skipped: [] });
      expect(store.stationItem(1)).toEqual({
        demand_price: 1500,
        demand_units: 200,
        demand_level: 0,
        supply_price: 1200,
        supply_units: 50,
        supply_level: 0,
        modified: '2024-01-01 12:00:00',
        from_live: 1,
      });
      expect(store.avgPrice(1)).toBe(41000);
    });

    it('only touches the station named by the market id', () => {
      withTradeDb(store.path, (db) => applyCommodityUpdate(db, update([tritium]), '2024-01-01 12:00:00'));
      expect(store.stationItem(1, 999)?.demand_price).toBe(100);
    });

    it('skips unknown commodities without aborting the others', () => {
      const gold = { name: 'gold', meanPrice: 9500, buyPrice: 9100, stock: 30, sellPrice: 9400, demand: 0 };
      const unknown = { ...tritium, name: 'unobtainium' };
      const result = withTradeDb(store.path, (db) =>
        applyCommodityUpdate(db, update([unknown, gold]), '2024-01-01 12:00:00')
      );

      expect(result).toEqual({ matched: 1, skipped: ['unobtainium'] });
      expect(store.stationItem(3)?.demand_price).toBe(9400);
      expect(store.stationItem(3)?.supply_units).toBe(30);
      expect(store.avgPrice(3)).toBe(9500);
      expect(store.stationItem(1)?.demand_price).toBe(100);
    });

    it('handles an empty commodity list', () => {
      const result = withTradeDb(store.path, (db) => applyCommodityUpdate(db, update([]), '2024-01-01 12:00:00'));
      expect(result).toEqual({ matched: 0, skipped: [] });
    });

    it('is idempotent', () => {
      const apply = () =>
        withTradeDb(store.path, (db) => applyCommodityUpdate(db, update([tritium]), '2024-01-01 12:00:00'));
      apply();
      const once = { row: store.stationItem(1), avg: store.avgPrice(1) };
      apply();
      expect({ row: store.stationItem(1), avg: store.avgPrice(1) }).toEqual(once);
    });
  });

  describe('withTradeDb', () => {
    it('rolls back every write when the message fails midway', () => {
      expect(() =>
        withTradeDb(store.path, (db) => {
          applyCommodityUpdate(db, update([tritium]), '2024-01-01 12:00:00');
          db.prepare('UPDATE NoSuchTable SET x = 1').run();
        })
      ).toThrow(PersistenceError);

      expect(store.stationItem(1)?.demand_price).toBe(100);
      expect(store.avgPrice(1)).toBe(40000);
    });

    it('fails with PersistenceError when the store is missing', () => {
      expect(() => withTradeDb(join(store.path, '..', 'missing.db'), () => 1)).toThrow(PersistenceError);
    });

    it('takes the write lock before running the callback and waits for a busy store', () => {
      const other = new Database(store.path);
      other.exec('BEGIN IMMEDIATE');
      const fn = vi.fn(() => 1);
      const started = Date.now();
      try {
        expect(() => withTradeDb(store.path, fn, { busyTimeoutMs: 50 })).toThrow(/trade db write failed: database is locked/);
      } finally {
        other.exec('ROLLBACK');
        other.close();
      }
      expect(fn).not.toHaveBeenCalled();
      expect(Date.now() - started).toBeGreaterThanOrEqual(40);
    });

    it('returns the callback result after commit', () => {
      expect(withTradeDb(store.path, () => 'done')).toBe('done');
    });
  });

  describe('applySystemEvent', () => {
    const jump = (overrides: Partial<SystemEvent>): SystemEvent => ({
      StarSystem: 'achenar',
      SystemAddress: 0,
      Population: 1000000,
      ...overrides,
    });

    it('sets the controlling power by case-insensitive name', () => {
      const changed = withTradeDb(store.path, (db) =>
        applySystemEvent(db, jump({ ControllingPower: 'Federation' }), '2024-01-01 12:00:00')
      );
      expect(changed).toBe(1);
      expect(store.systemPower('Achenar')).toEqual({ power: 'Federation', modified: '2024-01-01 12:00:00' });
    });

    it('clears the power of an unoccupied system', () => {
      withTradeDb(store.path, (db) => applySystemEvent(db, jump({ PowerplayState: 'Unoccupied' }), '2024-01-01 12:00:00'));
      expect(store.systemPower('Achenar')).toEqual({ power: null, modified: '2024-01-01 12:00:00' });
    });

    it('tolerates an unknown system', () => {
      const changed = withTradeDb(store.path, (db) =>
        applySystemEvent(db, jump({ StarSystem: 'Colonia', ControllingPower: 'Federation' }), '2024-01-01 12:00:00')
      );
      expect(changed).toBe(0);
    });
  });

  describe('verifyTradeDb', () => {
    it('passes for a store with the expected tables', () => {
      expect(() => verifyTradeDb(store.path)).not.toThrow();
    });

    it('names the missing tables', () => {
      const path = join(store.path, '..', 'partial.db');
      const db = new Database(path);
      db.exec('CREATE TABLE Item (item_id INTEGER PRIMARY KEY, name TEXT, avg_price INTEGER)');
      db.close();
      expect(() => verifyTradeDb(path)).toThrow('missing table(s): StationItem, System');
    });

    it('fails when the file does not exist', () => {
      expect(() => verifyTradeDb(join(store.path, '..', 'nope.db'))).toThrow(PersistenceError);
    });
  });
});
