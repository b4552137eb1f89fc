// ──────────────────────────────────────────
// Shared type definitions for the sales warehouse
// ──────────────────────────────────────────

export type Platform = 'lazada' | 'shopee';
export type PlatformKey = 1 | 2;
export type CollectionName = 'orders' | 'multiple_order_items' | 'products' | 'productitem' | 'reportoverview';
export type OrderSource = 'orders' | 'order_items';

export type OrderStatus =
  | 'UNPAID'
  | 'PENDING'
  | 'READY_TO_SHIP'
  | 'SHIPPED'
  | 'COMPLETED'
  | 'CANCELLED'
  | 'RETURNED'
  | 'UNKNOWN';

export type BuyerSegment = 'New Buyer' | 'Returning Buyer';

/** Calendar date as `YYYY-MM-DD`, no time-of-day. */
export type CalendarDate = string;

export type RawDocument = Record<string, unknown>;

export interface DateRange {
  start: CalendarDate;
  end: CalendarDate;
}

// ── Field parsing ──

export type FieldResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'missing' }
  | { status: 'unparsable'; raw: unknown };

// ── Canonical intermediate records (mapper output) ──

export interface CanonicalOrder {
  platform: Platform;
  platformKey: PlatformKey;
  platformOrderId: string;
  source: OrderSource;
  rawStatus: string;
  orderStatus: OrderStatus;
  orderDate: FieldResult<CalendarDate>;
  updatedAt: FieldResult<CalendarDate>;
  /** Price fields in resolution order, already in major units. */
  priceCandidates: FieldResult<number>[];
  totalItemCount: number;
  paymentMethod: string;
  shippingCity: string;
  buyerRef: string | null;
  /** `<field> <raw value>` for every value that could not be parsed. */
  unparsableFields: string[];
}

export interface CanonicalLineItem {
  itemId: string | null;
  skuId: string | null;
  sellerSku: string;
  variationAttributes: [string, string, string];
  quantity: number;
  /** Line totals in major units. */
  paidPrice: FieldResult<number>;
  originalPrice: number;
  voucherPlatform: number;
  voucherSeller: number;
  shippingFee: number;
}

export interface CanonicalLineDocument {
  platform: Platform;
  platformKey: PlatformKey;
  platformOrderId: string;
  buyerRef: string | null;
  orderDate: FieldResult<CalendarDate>;
  lines: CanonicalLineItem[];
}

export interface CanonicalVariant {
  platformSkuId: string;
  variantSku: string;
  attributes: [string, string, string];
  price: number | null;
  stock: number | null;
}

export interface CanonicalProduct {
  platform: Platform;
  platformKey: PlatformKey;
  productItemId: string;
  productName: string;
  productSkuBase: string;
  productCategory: string;
  productStatus: string;
  /** Resolved price: per-variant first, item-level fallback. */
  productPrice: number | null;
  productRating: number | null;
  variants: CanonicalVariant[];
}

/** One day of storefront traffic for one platform. */
export interface CanonicalTraffic {
  platform: Platform;
  platformKey: PlatformKey;
  date: CalendarDate;
  clicks: number | null;
  impressions: number;
}

// ── Warehouse rows ──

export interface TimeDayRow {
  time_key: number;
  date: CalendarDate;
  year: number;
  quarter: string;
  month: number;
  week: number;
  day_of_week: number;
  day_of_year: number;
  is_weekend: boolean;
  is_payday: boolean;
  is_mega_sale_day: boolean;
}

export interface CustomerRow {
  customer_key: string;
  platform_id: string;
  customer_city: string | null;
  platform_key: PlatformKey;
  segment: BuyerSegment;
  total_orders: number;
  first_order_date: CalendarDate | null;
  last_order_date: CalendarDate | null;
}

export interface ProductRow {
  product_key: number;
  product_item_id: string;
  product_name: string;
  product_sku_base: string;
  product_category: string;
  product_status: string;
  product_price: number | null;
  product_rating: number | null;
  platform_key: PlatformKey;
}

export interface ProductVariantRow {
  product_variant_key: number;
  product_key: number;
  platform_sku_id: string;
  variant_sku: string;
  variant_attribute_1: string;
  variant_attribute_2: string;
  variant_attribute_3: string;
  variant_price: number | null;
  variant_stock: number | null;
  platform_key: PlatformKey;
}

export interface OrderRow {
  orders_key: number;
  platform_order_id: string;
  platform_key: PlatformKey;
  order_status: OrderStatus;
  order_date: CalendarDate | null;
  updated_at: CalendarDate | null;
  price_total: number | null;
  total_item_count: number;
  payment_method: string;
  shipping_city: string;
}

export interface FactOrderRow {
  order_item_key: number;
  orders_key: number;
  product_key: number;
  product_variant_key: number;
  time_key: number;
  customer_key: string;
  platform_key: PlatformKey;
  item_quantity: number;
  paid_price: number;
  original_unit_price: number;
  voucher_platform_amount: number;
  voucher_seller_amount: number;
  shipping_fee_paid_by_buyer: number;
}

export interface SalesAggregateRow {
  time_key: number;
  platform_key: PlatformKey;
  customer_key: string;
  product_key: number;
  total_orders: number;
  total_items_sold: number;
  gross_revenue: number;
  total_discounts: number;
  net_sales: number;
}

export interface FactTrafficRow {
  traffic_event_key: number;
  time_key: number;
  platform_key: PlatformKey;
  clicks: number | null;
  impressions: number;
}

export interface WarehouseTables {
  dim_time: TimeDayRow[];
  dim_customer: CustomerRow[];
  dim_product: ProductRow[];
  dim_product_variant: ProductVariantRow[];
  dim_order: OrderRow[];
  fact_orders: FactOrderRow[];
  fact_sales_aggregate: SalesAggregateRow[];
  fact_traffic: FactTrafficRow[];
}

export type TableName = keyof WarehouseTables;

// ── Run bookkeeping ──

export interface Issue {
  component: string;
  message: string;
}

export type RunStatus = 'running' | 'completed' | 'failed';

export interface RunSummary {
  id: string;
  status: RunStatus;
  started_at: Date;
  completed_at: Date | null;
  row_counts: Partial<Record<TableName, number>>;
  /** Sinks that accepted the tables, in write order. */
  sinks: string[];
  warnings: Issue[];
  error: string | null;
  violations: string[];
}

// ── Staging ──

/** `null` marks a collection that is absent from staging. */
export type PlatformCollections = Record<CollectionName, RawDocument[] | null>;

export type StagedCollections = Record<Platform, PlatformCollections>;

export interface CollectionStatus {
  platform: Platform;
  collection: CollectionName;
  file: string;
  present: boolean;
  documents: number;
}
