// ──────────────────────────────────────────
// Analytics: Sales aggregate builder
// ──────────────────────────────────────────
// Grain: (time, platform, customer, product). Sums run in cents so the
// aggregate reconciles to the unit facts exactly.

import { FactOrderRow, PlatformKey, SalesAggregateRow } from '../../shared/types';
import { fromCents, toCents } from '../../shared/money';
import { IntegrityError } from '../../shared/errors';

interface Bucket {
  timeKey: number;
  platformKey: PlatformKey;
  customerKey: string;
  productKey: number;
  orders: Set<number>;
  items: number;
  netCents: number;
  discountCents: number;
}

export interface SalesTotals {
  items: number;
  netCents: number;
  discountCents: number;
}

export class SalesAggregateBuilder {
  build(facts: FactOrderRow[]): SalesAggregateRow[] {
    const buckets = new Map<string, Bucket>();

    for (const fact of facts) {
      const key = `${fact.time_key}|${fact.platform_key}|${fact.customer_key}|${fact.product_key}`;
      let bucket = buckets.get(key);
      if (!bucket) {
        bucket = {
          timeKey: fact.time_key,
          platformKey: fact.platform_key,
          customerKey: fact.customer_key,
          productKey: fact.product_key,
          orders: new Set(),
          items: 0,
          netCents: 0,
          discountCents: 0,
        };
        buckets.set(key, bucket);
      }
      bucket.orders.add(fact.orders_key);
      bucket.items += fact.item_quantity;
      bucket.netCents += toCents(fact.paid_price);
      bucket.discountCents += toCents(fact.voucher_platform_amount) + toCents(fact.voucher_seller_amount);
    }

    const rows = [...buckets.values()].sort(compareGrain).map(
      (b): SalesAggregateRow => ({
        time_key: b.timeKey,
        platform_key: b.platformKey,
        customer_key: b.customerKey,
        product_key: b.productKey,
        total_orders: b.orders.size,
        total_items_sold: b.items,
        gross_revenue: fromCents(b.netCents + b.discountCents),
        total_discounts: fromCents(b.discountCents),
        net_sales: fromCents(b.netCents),
      })
    );

    this.reconcile(facts, rows);
    console.log(`[SalesAggregate] Built ${rows.length} aggregate rows from ${facts.length} facts`);
    return rows;
  }

  /** Throws when aggregate totals drift from the unit facts. */
  reconcile(facts: FactOrderRow[], rows: SalesAggregateRow[]): void {
    const expected = factTotals(facts);
    const actual = aggregateTotals(rows);
    const violations: string[] = [];

    if (expected.items !== actual.items) {
      violations.push(`items sold ${actual.items} != fact units ${expected.items}`);
    }
    if (expected.netCents !== actual.netCents) {
      violations.push(`net sales ${fromCents(actual.netCents)} != fact paid ${fromCents(expected.netCents)}`);
    }
    if (expected.discountCents !== actual.discountCents) {
      violations.push(`discounts ${fromCents(actual.discountCents)} != fact vouchers ${fromCents(expected.discountCents)}`);
    }
    if (violations.length > 0) throw new IntegrityError(violations);
  }
}

export function factTotals(facts: FactOrderRow[]): SalesTotals {
  return facts.reduce(
    (totals, f) => ({
      items: totals.items + f.item_quantity,
      netCents: totals.netCents + toCents(f.paid_price),
      discountCents: totals.discountCents + toCents(f.voucher_platform_amount) + toCents(f.voucher_seller_amount),
    }),
    { items: 0, netCents: 0, discountCents: 0 }
  );
}

export function aggregateTotals(rows: SalesAggregateRow[]): SalesTotals {
  return rows.reduce(
    (totals, r) => ({
      items: totals.items + r.total_items_sold,
      netCents: totals.netCents + toCents(r.net_sales),
      discountCents: totals.discountCents + toCents(r.total_discounts),
    }),
    { items: 0, netCents: 0, discountCents: 0 }
  );
}

function compareGrain(a: Bucket, b: Bucket): number {
  return (
    a.timeKey - b.timeKey ||
    a.platformKey - b.platformKey ||
    (a.customerKey < b.customerKey ? -1 : a.customerKey > b.customerKey ? 1 : 0) ||
    a.productKey - b.productKey
  );
}
