import type { ZodError } from 'zod';
import { ParseError, errorMessage } from './errors.js';
import {
  CommodityEnvelopeSchema,
  SystemEnvelopeSchema,
  type Envelope,
  type EnvelopeKind,
} from './schemas.js';

type Attempt = { ok: true; envelope: Envelope } | { ok: false; issues: string[] };

interface Variant {
  kind: EnvelopeKind;
  /** Cheap content sniff deciding whether the structural parse is worth attempting. */
  sniff(payload: string): boolean;
  parse(json: unknown): Attempt;
}

function describeIssues(error: ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
}

// Priority order matters: a payload matching both sniffs is tried as a commodity update first.
const VARIANTS: Variant[] = [
  {
    kind: 'commodity',
    sniff: (p) => p.includes('commodity'),
    parse(json) {
      const r = CommodityEnvelopeSchema.safeParse(json);
      if (!r.success) return { ok: false, issues: describeIssues(r.error) };
      const { $schemaRef, header, message } = r.data;
      return { ok: true, envelope: { kind: 'commodity', schemaRef: $schemaRef, header, message } };
    },
  },
  {
    kind: 'system',
    sniff: (p) => p.includes('journal') && p.includes('FSDJump'),
    parse(json) {
      const r = SystemEnvelopeSchema.safeParse(json);
      if (!r.success) return { ok: false, issues: describeIssues(r.error) };
      const { $schemaRef, header, message } = r.data;
      return { ok: true, envelope: { kind: 'system', schemaRef: $schemaRef, header, message } };
    },
  },
];

/** Kinds whose sniff matches the payload, in priority order. */
export function classify(payload: string): EnvelopeKind[] {
  return VARIANTS.filter((v) => v.sniff(payload)).map((v) => v.kind);
}

/**
 * Turn decoded text into a typed envelope.
 *
 * Returns `null` for payloads of a schema we do not handle (most of the feed).
 * Throws `ParseError` when the payload looked like a supported schema but is not
 * JSON or lacks a required field for every candidate.
 */
export function parseEnvelope(payload: string): Envelope | null {
  const candidates = VARIANTS.filter((v) => v.sniff(payload));
  if (candidates.length === 0) return null;

  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch (e) {
    throw new ParseError(`invalid JSON: ${errorMessage(e)}`, [], { cause: e });
  }

  let firstFailure: { kind: EnvelopeKind; issues: string[] } | undefined;
  for (const variant of candidates) {
    const attempt = variant.parse(json);
    if (attempt.ok) return attempt.envelope;
    firstFailure ??= { kind: variant.kind, issues: attempt.issues };
  }
  // candidates is non-empty, so at least one failure was recorded
  const issues = firstFailure?.issues ?? [];
  throw new ParseError(`${firstFailure?.kind ?? 'unknown'} message rejected: ${issues.join('; ')}`, issues);
}
