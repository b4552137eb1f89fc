// ──────────────────────────────────────────
// Modeling: Platform mapper contract
// ──────────────────────────────────────────

import {
  CanonicalLineDocument,
  FieldResult,
  CanonicalOrder,
  CanonicalProduct,
  CanonicalTraffic,
  OrderSource,
  OrderStatus,
  Platform,
  PlatformKey,
  RawDocument,
} from '../../../shared/types';
import { fromCents, toCents } from '../../../shared/money';
import { MISSING, describeRaw, firstUsable, identifier, ok, parseDateString, parseDecimal, parseTimeKey } from '../parsing';

export type LineDocumentLookup = (platformOrderId: string) => RawDocument | undefined;

export type MapResult<T> = { status: 'ok'; value: T } | { status: 'unparsable'; reason: string };

/**
 * Normalizes one marketplace's raw documents into canonical records.
 * Implementations are pure and never throw on malformed input.
 */
export interface PlatformMapper {
  readonly platform: Platform;
  readonly platformKey: PlatformKey;

  /**
   * `lineDocumentFor` finds the matching order-item document, when one
   * exists. For `order_items` sources `raw` is itself that document.
   */
  mapOrder(raw: RawDocument, source: OrderSource, lineDocumentFor?: LineDocumentLookup): MapResult<CanonicalOrder>;
  mapLineDocument(raw: RawDocument): MapResult<CanonicalLineDocument>;
  mapProduct(raw: RawDocument): MapResult<CanonicalProduct>;
  /** One `reportoverview` record: clicks and impressions for one day. */
  mapTraffic(raw: RawDocument): MapResult<CanonicalTraffic>;
  mapStatus(rawStatus: string): OrderStatus;
}

export function mapped<T>(value: T): MapResult<T> {
  return { status: 'ok', value };
}

export function rejected<T>(reason: string): MapResult<T> {
  return { status: 'unparsable', reason };
}

/** Product SKU base: the first variant SKU up to its first `-`. */
export function skuBase(variantSkus: string[]): string {
  const first = variantSkus.find((sku) => sku !== '');
  return first ? first.split('-')[0] : '';
}

/** Buyer reference, or null for blank and zero ids. */
export function buyerRef(value: unknown): string | null {
  const id = identifier(value);
  return id === null || id === '0' ? null : id;
}

export function sumCandidate(amounts: FieldResult<number>[]): FieldResult<number> {
  if (amounts.length === 0) return MISSING;
  let cents = 0;
  for (const amount of amounts) {
    if (amount.status !== 'ok') return amount;
    cents += toCents(amount.value);
  }
  return ok(fromCents(cents));
}

/**
 * Both marketplaces export the report overview as `{ time_key, clicks,
 * impressions }`; a `date` string is accepted in place of `time_key`.
 */
export function trafficRecord(
  platform: Platform,
  platformKey: PlatformKey,
  raw: RawDocument
): MapResult<CanonicalTraffic> {
  const date = firstUsable([
    ['time_key', parseTimeKey(raw.time_key)],
    ['date', parseDateString(raw.date)],
  ]);
  if (date.status === 'missing') return rejected('time_key missing');
  if (date.status === 'unparsable') return rejected(`time_key ${describeRaw(date)} is not a date`);

  const impressions = parseDecimal(raw.impressions);
  if (impressions.status === 'unparsable') return rejected(`impressions ${describeRaw(impressions)} is not a number`);
  const clicks = parseDecimal(raw.clicks);
  if (clicks.status === 'unparsable') return rejected(`clicks ${describeRaw(clicks)} is not a number`);

  return mapped({
    platform,
    platformKey,
    date: date.value,
    clicks: clicks.status === 'ok' ? Math.max(0, Math.floor(clicks.value)) : null,
    impressions: impressions.status === 'ok' ? Math.max(0, Math.floor(impressions.value)) : 0,
  });
}
