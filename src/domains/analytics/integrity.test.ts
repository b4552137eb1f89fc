import { describe, it, expect } from 'vitest';
import { validateWarehouse } from './integrity';
import { HarmonizationPipeline } from '../harmonization/pipeline';
import { stagedFixture } from '../harmonization/test-fixtures';
import { WarehouseTables } from '../../shared/types';

function harmonized(): WarehouseTables {
  return new HarmonizationPipeline({ timeRange: null, utcOffsetMinutes: 480 }).run(stagedFixture()).tables;
}

describe('validateWarehouse', () => {
  it('accepts pipeline output', () => {
    expect(validateWarehouse(harmonized())).toEqual([]);
  });

  it('reports duplicate natural keys', () => {
    const tables = harmonized();
    tables.dim_order.push({ ...tables.dim_order[0], orders_key: 99 });
    expect(validateWarehouse(tables)).toEqual(['dim_order: duplicate natural key 1|5001']);
  });

  it('reports dangling fact keys', () => {
    const tables = harmonized();
    tables.fact_orders[0] = { ...tables.fact_orders[0], customer_key: '19999.1' };
    expect(validateWarehouse(tables)).toEqual(['fact_orders 1: unknown customer_key 19999.1']);
  });

  it('reports a variant that belongs to another product', () => {
    const tables = harmonized();
    tables.fact_orders[0] = { ...tables.fact_orders[0], product_variant_key: 3 };
    expect(validateWarehouse(tables)).toEqual(['fact_orders 1: variant 3 belongs to product 2']);
  });

  it('reports aggregate drift', () => {
    const tables = harmonized();
    tables.fact_sales_aggregate[0] = { ...tables.fact_sales_aggregate[0], net_sales: 181, gross_revenue: 201 };
    expect(validateWarehouse(tables)).toEqual(['fact_sales_aggregate totals do not reconcile with fact_orders']);
  });

  it('reports a broken gross identity', () => {
    const tables = harmonized();
    tables.fact_sales_aggregate[0] = { ...tables.fact_sales_aggregate[0], gross_revenue: 250 };
    expect(validateWarehouse(tables)).toEqual([
      'fact_sales_aggregate (20251128, 1, 10001.1, 1): gross != net + discounts',
    ]);
  });

  it('reports a second traffic row for the same day and platform', () => {
    const tables = harmonized();
    tables.fact_traffic.push({ ...tables.fact_traffic[0], traffic_event_key: 3 });
    expect(validateWarehouse(tables)).toEqual(['fact_traffic: duplicate natural key 20251128|1']);
  });

  it('reports traffic on a day outside the time dimension', () => {
    const tables = harmonized();
    tables.fact_traffic[1] = { ...tables.fact_traffic[1], time_key: 20260101 };
    expect(validateWarehouse(tables)).toEqual(['fact_traffic 2: unknown time_key 20260101']);
  });

  it('reports a time key that does not match its date', () => {
    const tables = harmonized();
    tables.dim_time[0] = { ...tables.dim_time[0], time_key: 20251102 };
    expect(validateWarehouse(tables)).toContain('dim_time: time_key 20251102 does not match date 2025-11-01');
  });
});
