import { z } from 'zod';

// Only the fields the pipeline reads are described. Unknown keys are stripped,
// absent or null optional keys are fine.

export const HeaderSchema = z.object({
  uploaderID: z.string(),
  softwareName: z.string(),
  softwareVersion: z.string(),
  gameVersion: z.string().nullish(),
  gameBuild: z.string().nullish(),
  gatewayTimestamp: z.string().nullish(),
});

export const CommoditySchema = z.object({
  name: z.string(),
  meanPrice: z.number(),
  buyPrice: z.number(),
  stock: z.number(),
  sellPrice: z.number(),
  demand: z.number(),
  statusFlags: z.array(z.string()).nullish(),
});

export const EconomySchema = z.object({
  name: z.string(),
  proportion: z.number(),
});

/** commodity/3 message body */
export const CommodityUpdateSchema = z.object({
  systemName: z.string(),
  stationName: z.string(),
  marketId: z.number().int(),
  timestamp: z.string(),
  commodities: z.array(CommoditySchema),
  stationType: z.string().nullish(),
  carrierDockingAccess: z.string().nullish(),
  horizons: z.boolean().nullish(),
  odyssey: z.boolean().nullish(),
  economies: z.array(EconomySchema).nullish(),
  prohibited: z.array(z.string()).nullish(),
});

/** journal/1 message body, FSDJump event */
export const SystemEventSchema = z.object({
  StarSystem: z.string(),
  event: z.string().nullish(),
  timestamp: z.string().nullish(),
  StarPos: z.array(z.number()).nullish(),
  SystemAddress: z.number().int().nullish().transform((v) => v ?? 0),
  SystemAllegiance: z.string().nullish(),
  SystemSecurity: z.string().nullish(),
  Population: z.number().int().nullish().transform((v) => v ?? 0),
  Powers: z.array(z.string()).nullish(),
  ControllingPower: z.string().nullish(),
  PowerplayState: z.string().nullish(),
});

const envelope = <T extends z.ZodTypeAny>(message: T) =>
  z.object({
    $schemaRef: z.string(),
    header: HeaderSchema,
    message,
  });

export const CommodityEnvelopeSchema = envelope(CommodityUpdateSchema);
export const SystemEnvelopeSchema = envelope(SystemEventSchema);

export type Header = z.infer<typeof HeaderSchema>;
export type Commodity = z.infer<typeof CommoditySchema>;
export type CommodityUpdate = z.infer<typeof CommodityUpdateSchema>;
export type SystemEvent = z.infer<typeof SystemEventSchema>;

export type CommodityEnvelope = {
  kind: 'commodity';
  schemaRef: string;
  header: Header;
  message: CommodityUpdate;
};

export type SystemEnvelope = {
  kind: 'system';
  schemaRef: string;
  header: Header;
  message: SystemEvent;
};

export type Envelope = CommodityEnvelope | SystemEnvelope;
export type EnvelopeKind = Envelope['kind'];
