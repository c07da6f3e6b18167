import type { CommodityUpdate, SystemEvent } from './schemas.js';

// Fleet carrier callsigns, e.g. "J1X-7QP". Carrier markets move with the carrier.
const CARRIER_NAME = /^[a-zA-Z0-9]{3}-[a-zA-Z0-9]{3}$/;

export function isCarrier(stationName: string): boolean {
  return CARRIER_NAME.test(stationName);
}

export function acceptCommodityUpdate(msg: CommodityUpdate): boolean {
  return !isCarrier(msg.stationName);
}

/** Keep populated systems that are under a power's control or open for it. */
export function acceptSystemEvent(msg: SystemEvent): boolean {
  if (msg.Population <= 0) return false;
  return Boolean(msg.ControllingPower) || msg.PowerplayState === 'Unoccupied';
}
