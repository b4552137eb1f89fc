// ──────────────────────────────────────────
// Modeling: Lazada mapper (platform_key 1)
// ──────────────────────────────────────────
// Lazada reports money in major units and timestamps as local strings
// (`2025-03-04 22:10:05 +0800`). Order-item values are line totals.

import {
  CanonicalLineDocument,
  CanonicalLineItem,
  CanonicalOrder,
  CanonicalProduct,
  CanonicalTraffic,
  CanonicalVariant,
  FieldResult,
  OrderSource,
  OrderStatus,
  RawDocument,
} from '../../../shared/types';
import { fromCents, toCents } from '../../../shared/money';
import {
  asRecord,
  asRecords,
  countOr,
  decimalOr,
  firstUsable,
  identifier,
  ok,
  parseDateString,
  parseDecimal,
  text,
  valueOf,
} from '../parsing';
import {
  LineDocumentLookup,
  MapResult,
  PlatformMapper,
  buyerRef,
  mapped,
  rejected,
  skuBase,
  sumCandidate,
  trafficRecord,
} from './mapper';

const STATUS_MAP: Record<string, OrderStatus> = {
  unpaid: 'UNPAID',
  pending: 'PENDING',
  packed: 'READY_TO_SHIP',
  repacked: 'READY_TO_SHIP',
  ready_to_ship: 'READY_TO_SHIP',
  ready_to_ship_pending: 'READY_TO_SHIP',
  shipped: 'SHIPPED',
  delivered: 'COMPLETED',
  confirmed: 'COMPLETED',
  canceled: 'CANCELLED',
  cancelled: 'CANCELLED',
  returned: 'RETURNED',
  failed: 'RETURNED',
  failed_delivery: 'RETURNED',
  shipped_back: 'RETURNED',
  shipped_back_success: 'RETURNED',
};

const CATEGORY_NAMES: Record<string, string> = {
  '22490': 'Home Fragrance',
  '7539': 'Home Improvement',
  '8632': 'Health & Beauty',
  '18986': 'Electronics',
  '24428': 'Fashion',
  '24442': 'Automotive',
  '10100546': 'Baby & Toys',
};

export class LazadaMapper implements PlatformMapper {
  readonly platform = 'lazada';
  readonly platformKey = 1;

  mapStatus(rawStatus: string): OrderStatus {
    return STATUS_MAP[rawStatus.trim().toLowerCase()] ?? 'UNKNOWN';
  }

  mapOrder(raw: RawDocument, source: OrderSource, lineDocumentFor?: LineDocumentLookup): MapResult<CanonicalOrder> {
    const orderId = identifier(raw.order_id);
    if (!orderId) return rejected('order_id missing');

    const lineDoc = source === 'order_items' ? raw : lineDocumentFor?.(orderId) ?? raw;
    let items = asRecords(lineDoc.order_items);
    if (items.length === 0) items = asRecords(raw.order_items);
    const head: RawDocument = items[0] ?? {};
    const rawStatus = firstStatus(raw.statuses) || text(raw.status) || text(head.status);

    const unparsableFields: string[] = [];
    const orderDate = firstUsable(
      [
        ['created_at', parseDateString(raw.created_at)],
        ['order_items.created_at', parseDateString(lineDoc === raw ? undefined : lineDoc.created_at)],
        ['order_items[0].created_at', parseDateString(head.created_at)],
      ],
      unparsableFields
    );
    const updatedAt = firstUsable(
      [
        ['updated_at', parseDateString(raw.updated_at)],
        ['order_items.updated_at', parseDateString(lineDoc === raw ? undefined : lineDoc.updated_at)],
        ['order_items[0].updated_at', parseDateString(head.updated_at)],
      ],
      unparsableFields
    );

    const lineQuantity = items.reduce((sum, item) => sum + lineQuantityOf(item), 0);

    return mapped({
      platform: this.platform,
      platformKey: this.platformKey,
      platformOrderId: orderId,
      source,
      rawStatus,
      orderStatus: this.mapStatus(rawStatus),
      orderDate,
      updatedAt,
      priceCandidates: [
        parseDecimal(raw.price),
        parseDecimal(raw.total_amount),
        sumCandidate(items.map((item) => parseDecimal(item.item_price))),
      ],
      totalItemCount: countOr(raw.items_count, lineQuantity),
      paymentMethod: text(raw.payment_method) || text(head.payment_method),
      shippingCity: text(asRecord(raw.address_shipping)?.city),
      buyerRef: buyerRef(raw.buyer_id) ?? lineBuyer(lineDoc),
      unparsableFields,
    });
  }

  mapLineDocument(raw: RawDocument): MapResult<CanonicalLineDocument> {
    const orderId = identifier(raw.order_id);
    if (!orderId) return rejected('order_id missing');

    const items = asRecords(raw.order_items);
    const orderDate = firstUsable([
      ['created_at', parseDateString(raw.created_at)],
      ['order_items[0].created_at', parseDateString(items[0]?.created_at)],
    ]);

    return mapped({
      platform: this.platform,
      platformKey: this.platformKey,
      platformOrderId: orderId,
      buyerRef: buyerRef(raw.buyer_id) ?? lineBuyer(raw),
      orderDate,
      lines: items.map(mapLine),
    });
  }

  mapProduct(raw: RawDocument): MapResult<CanonicalProduct> {
    const itemId = identifier(raw.item_id);
    if (!itemId) return rejected('item_id missing');

    const attributes: RawDocument = asRecord(raw.attributes) ?? {};
    const variants = asRecords(raw.skus).flatMap((sku): CanonicalVariant[] => {
      const skuId = identifier(sku.SkuId) ?? identifier(sku.sku_id);
      if (!skuId) return [];
      return [
        {
          platformSkuId: skuId,
          variantSku: text(sku.SellerSku),
          attributes: [text(sku.Variation1), text(sku.Variation2), text(sku.Variation3)],
          price: valueOf(parseDecimal(sku.price)),
          stock: valueOf(parseDecimal(sku.quantity)),
        },
      ];
    });

    const variantPrice = variants.find((v) => v.price !== null)?.price ?? null;

    return mapped({
      platform: this.platform,
      platformKey: this.platformKey,
      productItemId: itemId,
      productName: text(attributes.name) || text(raw.name),
      productSkuBase: skuBase(variants.map((v) => v.variantSku)),
      productCategory: categoryName(raw.primary_category),
      productStatus: text(raw.status),
      productPrice: variantPrice ?? valueOf(parseDecimal(raw.price)),
      productRating: valueOf(parseDecimal(raw.rating)),
      variants,
    });
  }

  mapTraffic(raw: RawDocument): MapResult<CanonicalTraffic> {
    return trafficRecord(this.platform, this.platformKey, raw);
  }
}

function firstStatus(statuses: unknown): string {
  if (!Array.isArray(statuses) || statuses.length === 0) return '';
  const first: unknown = statuses[0];
  return text(asRecord(first)?.status ?? first);
}

function lineBuyer(lineDoc: RawDocument): string | null {
  for (const item of asRecords(lineDoc.order_items)) {
    const ref = buyerRef(item.buyer_id);
    if (ref) return ref;
  }
  return null;
}

function lineQuantityOf(item: RawDocument): number {
  return Math.max(1, countOr(item.quantity, 1));
}

function mapLine(item: RawDocument): CanonicalLineItem {
  const itemPrice = parseDecimal(item.item_price);
  const voucherPlatform = decimalOr(item.voucher_platform, 0);
  const voucherSeller = decimalOr(item.voucher_seller, 0);

  let paidPrice: FieldResult<number> = parseDecimal(item.paid_price);
  if (paidPrice.status !== 'ok' && itemPrice.status === 'ok') {
    paidPrice = ok(fromCents(toCents(itemPrice.value) - toCents(voucherPlatform) - toCents(voucherSeller)));
  }

  return {
    itemId: identifier(item.item_id) ?? identifier(item.product_id),
    skuId: identifier(item.sku_id),
    sellerSku: text(item.sku) || text(item.SellerSku),
    variationAttributes: splitVariation(text(item.variation)),
    quantity: lineQuantityOf(item),
    paidPrice,
    originalPrice: valueOf(itemPrice) ?? 0,
    voucherPlatform,
    voucherSeller,
    shippingFee: decimalOr(item.shipping_amount, 0),
  };
}

/** `Color family:Black, Size:M` → up to three attribute slots. */
function splitVariation(variation: string): [string, string, string] {
  const parts = variation === '' ? [] : variation.split(',').map((part) => part.trim());
  return [parts[0] ?? '', parts[1] ?? '', parts[2] ?? ''];
}

function categoryName(value: unknown): string {
  const id = identifier(value);
  if (!id) return '';
  return CATEGORY_NAMES[id] ?? `Category_${id}`;
}
