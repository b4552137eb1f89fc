import { describe, it, expect } from 'vitest';
import { SalesAggregateBuilder, factTotals } from './sales-aggregate.builder';
import { FactOrderRow, SalesAggregateRow } from '../../shared/types';
import { IntegrityError } from '../../shared/errors';

function fact(overrides: Partial<FactOrderRow>): FactOrderRow {
  return {
    order_item_key: 1,
    orders_key: 1,
    product_key: 1,
    product_variant_key: 1,
    time_key: 20250301,
    customer_key: '10001.1',
    platform_key: 1,
    item_quantity: 1,
    paid_price: 10,
    original_unit_price: 12,
    voucher_platform_amount: 1,
    voucher_seller_amount: 1,
    shipping_fee_paid_by_buyer: 0,
    ...overrides,
  };
}

describe('SalesAggregateBuilder', () => {
  const facts = [
    fact({ order_item_key: 1, orders_key: 1, paid_price: 33.34 }),
    fact({ order_item_key: 2, orders_key: 1, paid_price: 33.33 }),
    fact({ order_item_key: 3, orders_key: 2, paid_price: 33.33, voucher_seller_amount: 0.1 }),
    fact({ order_item_key: 4, orders_key: 3, time_key: 20250228, product_key: 2, voucher_platform_amount: 0 }),
    fact({ order_item_key: 5, orders_key: 4, platform_key: 2, customer_key: '10001.2' }),
  ];

  it('groups by time, platform, customer and product', () => {
    const rows = new SalesAggregateBuilder().build(facts);

    expect(rows).toEqual([
      {
        time_key: 20250228,
        platform_key: 1,
        customer_key: '10001.1',
        product_key: 2,
        total_orders: 1,
        total_items_sold: 1,
        gross_revenue: 11,
        total_discounts: 1,
        net_sales: 10,
      },
      {
        time_key: 20250301,
        platform_key: 1,
        customer_key: '10001.1',
        product_key: 1,
        total_orders: 2,
        total_items_sold: 3,
        gross_revenue: 105.1,
        total_discounts: 5.1,
        net_sales: 100,
      },
      {
        time_key: 20250301,
        platform_key: 2,
        customer_key: '10001.2',
        product_key: 1,
        total_orders: 1,
        total_items_sold: 1,
        gross_revenue: 12,
        total_discounts: 2,
        net_sales: 10,
      },
    ]);
    expect(factTotals(facts).netCents).toBe(12000);
  });

  it('rejects aggregates that do not reconcile', () => {
    const builder = new SalesAggregateBuilder();
    const rows: SalesAggregateRow[] = builder.build(facts).map((row) => ({ ...row, net_sales: row.net_sales + 1 }));
    expect(() => builder.reconcile(facts, rows)).toThrow(IntegrityError);
  });
});
