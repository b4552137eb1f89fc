// ──────────────────────────────────────────
// Analytics: Warehouse integrity validator
// ──────────────────────────────────────────

import { WarehouseTables } from '../../shared/types';
import { toCents } from '../../shared/money';
import { aggregateTotals, factTotals } from './sales-aggregate.builder';

const PLATFORM_KEYS = new Set<number>([1, 2]);

/** Returns every violation found; an empty list means the tables are consistent. */
export function validateWarehouse(tables: WarehouseTables): string[] {
  const violations: string[] = [];

  const unique = (table: string, keys: string[]): void => {
    const seen = new Set<string>();
    for (const key of keys) {
      if (seen.has(key)) violations.push(`${table}: duplicate natural key ${key}`);
      seen.add(key);
    }
  };

  unique('dim_time', tables.dim_time.map((r) => String(r.time_key)));
  unique('dim_time', tables.dim_time.map((r) => r.date));
  unique('dim_customer', tables.dim_customer.map((r) => `${r.platform_key}|${r.platform_id}`));
  unique('dim_customer', tables.dim_customer.map((r) => r.customer_key));
  unique('dim_product', tables.dim_product.map((r) => `${r.platform_key}|${r.product_item_id}`));
  unique('dim_product', tables.dim_product.map((r) => String(r.product_key)));
  unique('dim_product_variant', tables.dim_product_variant.map((r) => `${r.platform_key}|${r.platform_sku_id}`));
  unique('dim_product_variant', tables.dim_product_variant.map((r) => String(r.product_variant_key)));
  unique('dim_order', tables.dim_order.map((r) => `${r.platform_key}|${r.platform_order_id}`));
  unique('dim_order', tables.dim_order.map((r) => String(r.orders_key)));
  unique('fact_traffic', tables.fact_traffic.map((r) => `${r.time_key}|${r.platform_key}`));

  for (const day of tables.dim_time) {
    if (Number(day.date.replace(/-/g, '')) !== day.time_key) {
      violations.push(`dim_time: time_key ${day.time_key} does not match date ${day.date}`);
    }
  }

  const timeKeys = new Set(tables.dim_time.map((r) => r.time_key));
  const customerKeys = new Set(tables.dim_customer.map((r) => r.customer_key));
  const productKeys = new Set(tables.dim_product.map((r) => r.product_key));
  const variantProducts = new Map(tables.dim_product_variant.map((r) => [r.product_variant_key, r.product_key]));
  const orderKeys = new Set(tables.dim_order.map((r) => r.orders_key));

  for (const variant of tables.dim_product_variant) {
    if (!productKeys.has(variant.product_key)) {
      violations.push(`dim_product_variant ${variant.product_variant_key}: unknown product_key ${variant.product_key}`);
    }
  }

  for (const fact of tables.fact_orders) {
    const where = `fact_orders ${fact.order_item_key}`;
    if (!orderKeys.has(fact.orders_key)) violations.push(`${where}: unknown orders_key ${fact.orders_key}`);
    if (!productKeys.has(fact.product_key)) violations.push(`${where}: unknown product_key ${fact.product_key}`);
    if (!timeKeys.has(fact.time_key)) violations.push(`${where}: unknown time_key ${fact.time_key}`);
    if (!customerKeys.has(fact.customer_key)) violations.push(`${where}: unknown customer_key ${fact.customer_key}`);
    const variantProduct = variantProducts.get(fact.product_variant_key);
    if (variantProduct === undefined) {
      violations.push(`${where}: unknown product_variant_key ${fact.product_variant_key}`);
    } else if (variantProduct !== fact.product_key) {
      violations.push(`${where}: variant ${fact.product_variant_key} belongs to product ${variantProduct}`);
    }
  }

  for (const row of tables.fact_traffic) {
    if (!timeKeys.has(row.time_key)) {
      violations.push(`fact_traffic ${row.traffic_event_key}: unknown time_key ${row.time_key}`);
    }
  }

  const platformKeyed: Array<[string, Array<{ platform_key: number }>]> = [
    ['dim_customer', tables.dim_customer],
    ['dim_product', tables.dim_product],
    ['dim_product_variant', tables.dim_product_variant],
    ['dim_order', tables.dim_order],
    ['fact_orders', tables.fact_orders],
    ['fact_sales_aggregate', tables.fact_sales_aggregate],
    ['fact_traffic', tables.fact_traffic],
  ];
  for (const [table, rows] of platformKeyed) {
    const bad = rows.filter((r) => !PLATFORM_KEYS.has(r.platform_key)).length;
    if (bad > 0) violations.push(`${table}: ${bad} rows with platform_key outside {1, 2}`);
  }

  for (const row of tables.fact_sales_aggregate) {
    if (toCents(row.gross_revenue) !== toCents(row.net_sales) + toCents(row.total_discounts)) {
      violations.push(
        `fact_sales_aggregate (${row.time_key}, ${row.platform_key}, ${row.customer_key}, ${row.product_key}): gross != net + discounts`
      );
    }
  }

  const facts = factTotals(tables.fact_orders);
  const aggregate = aggregateTotals(tables.fact_sales_aggregate);
  if (facts.netCents !== aggregate.netCents || facts.items !== aggregate.items) {
    violations.push('fact_sales_aggregate totals do not reconcile with fact_orders');
  }

  return violations;
}
