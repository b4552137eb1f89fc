// ──────────────────────────────────────────
// Warehouse: Table layouts (fixed column order, load order)
// ──────────────────────────────────────────

import {
  CustomerRow,
  FactOrderRow,
  FactTrafficRow,
  OrderRow,
  ProductRow,
  ProductVariantRow,
  SalesAggregateRow,
  TableName,
  TimeDayRow,
  WarehouseTables,
} from '../../shared/types';

export interface ProjectedTable {
  name: TableName;
  columns: string[];
  rows: unknown[][];
}

export const MONEY_COLUMNS: ReadonlySet<string> = new Set([
  'product_price',
  'variant_price',
  'price_total',
  'paid_price',
  'original_unit_price',
  'voucher_platform_amount',
  'voucher_seller_amount',
  'shipping_fee_paid_by_buyer',
  'gross_revenue',
  'total_discounts',
  'net_sales',
]);

const DIM_TIME: ReadonlyArray<keyof TimeDayRow> = [
  'time_key',
  'date',
  'year',
  'quarter',
  'month',
  'week',
  'day_of_week',
  'day_of_year',
  'is_weekend',
  'is_payday',
  'is_mega_sale_day',
];

const DIM_CUSTOMER: ReadonlyArray<keyof CustomerRow> = [
  'customer_key',
  'platform_id',
  'customer_city',
  'platform_key',
  'segment',
  'total_orders',
  'first_order_date',
  'last_order_date',
];

const DIM_PRODUCT: ReadonlyArray<keyof ProductRow> = [
  'product_key',
  'product_item_id',
  'product_name',
  'product_sku_base',
  'product_category',
  'product_status',
  'product_price',
  'product_rating',
  'platform_key',
];

const DIM_PRODUCT_VARIANT: ReadonlyArray<keyof ProductVariantRow> = [
  'product_variant_key',
  'product_key',
  'platform_sku_id',
  'variant_sku',
  'variant_attribute_1',
  'variant_attribute_2',
  'variant_attribute_3',
  'variant_price',
  'variant_stock',
  'platform_key',
];

const DIM_ORDER: ReadonlyArray<keyof OrderRow> = [
  'orders_key',
  'platform_order_id',
  'platform_key',
  'order_status',
  'order_date',
  'updated_at',
  'price_total',
  'total_item_count',
  'payment_method',
  'shipping_city',
];

const FACT_ORDERS: ReadonlyArray<keyof FactOrderRow> = [
  'order_item_key',
  'orders_key',
  'product_key',
  'product_variant_key',
  'time_key',
  'customer_key',
  'platform_key',
  'item_quantity',
  'paid_price',
  'original_unit_price',
  'voucher_platform_amount',
  'voucher_seller_amount',
  'shipping_fee_paid_by_buyer',
];

const FACT_SALES_AGGREGATE: ReadonlyArray<keyof SalesAggregateRow> = [
  'time_key',
  'platform_key',
  'customer_key',
  'product_key',
  'total_orders',
  'total_items_sold',
  'gross_revenue',
  'total_discounts',
  'net_sales',
];

const FACT_TRAFFIC: ReadonlyArray<keyof FactTrafficRow> = [
  'traffic_event_key',
  'time_key',
  'platform_key',
  'clicks',
  'impressions',
];

function project<T>(name: TableName, rows: T[], columns: ReadonlyArray<keyof T & string>): ProjectedTable {
  return {
    name,
    columns: [...columns],
    rows: rows.map((row) => columns.map((column) => row[column])),
  };
}

/** Every table in load order: dimensions first, facts last. */
export function projectTables(tables: WarehouseTables): ProjectedTable[] {
  return [
    project('dim_time', tables.dim_time, DIM_TIME),
    project('dim_customer', tables.dim_customer, DIM_CUSTOMER),
    project('dim_product', tables.dim_product, DIM_PRODUCT),
    project('dim_product_variant', tables.dim_product_variant, DIM_PRODUCT_VARIANT),
    project('dim_order', tables.dim_order, DIM_ORDER),
    project('fact_orders', tables.fact_orders, FACT_ORDERS),
    project('fact_sales_aggregate', tables.fact_sales_aggregate, FACT_SALES_AGGREGATE),
    project('fact_traffic', tables.fact_traffic, FACT_TRAFFIC),
  ];
}

export function rowCounts(tables: WarehouseTables): Record<TableName, number> {
  return {
    dim_time: tables.dim_time.length,
    dim_customer: tables.dim_customer.length,
    dim_product: tables.dim_product.length,
    dim_product_variant: tables.dim_product_variant.length,
    dim_order: tables.dim_order.length,
    fact_orders: tables.fact_orders.length,
    fact_sales_aggregate: tables.fact_sales_aggregate.length,
    fact_traffic: tables.fact_traffic.length,
  };
}
