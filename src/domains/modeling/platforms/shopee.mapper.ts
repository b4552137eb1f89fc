// ──────────────────────────────────────────
// Modeling: Shopee mapper (platform_key 2)
// ──────────────────────────────────────────
// Shopee reports money as integer minor units and timestamps as Unix epoch
// seconds. Line prices are per unit; order-level income amounts are spread
// across lines by quantity.

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
import { allocateCents, fromCents, toCents } from '../../../shared/money';
import {
  asRecord,
  asRecords,
  countOr,
  firstUsable,
  identifier,
  ok,
  parseDecimal,
  parseEpochDate,
  parseMinorUnits,
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
  UNPAID: 'UNPAID',
  READY_TO_SHIP: 'READY_TO_SHIP',
  PROCESSED: 'READY_TO_SHIP',
  RETRY_SHIP: 'READY_TO_SHIP',
  SHIPPED: 'SHIPPED',
  TO_CONFIRM_RECEIVE: 'SHIPPED',
  COMPLETED: 'COMPLETED',
  IN_CANCEL: 'CANCELLED',
  CANCELLED: 'CANCELLED',
  TO_RETURN: 'RETURNED',
};

export class ShopeeMapper implements PlatformMapper {
  readonly platform = 'shopee';
  readonly platformKey = 2;

  constructor(private utcOffsetMinutes: number) {}

  mapStatus(rawStatus: string): OrderStatus {
    return STATUS_MAP[rawStatus.trim().toUpperCase()] ?? 'UNKNOWN';
  }

  mapOrder(raw: RawDocument, source: OrderSource, lineDocumentFor?: LineDocumentLookup): MapResult<CanonicalOrder> {
    const orderSn = identifier(raw.order_sn);
    if (!orderSn) return rejected('order_sn missing');

    const lineDoc = source === 'order_items' ? raw : lineDocumentFor?.(orderSn) ?? raw;
    let items = asRecords(lineDoc.item_list);
    if (items.length === 0) items = asRecords(raw.item_list);
    const rawStatus = text(raw.order_status) || text(lineDoc.order_status);

    const discountedTotals = items.map((item): FieldResult<number> => {
      const unit = parseMinorUnits(item.model_discounted_price);
      return unit.status === 'ok' ? ok(fromCents(toCents(unit.value) * quantityOf(item))) : unit;
    });

    const unparsableFields: string[] = [];
    const orderDate = this.orderDate(raw, lineDoc, unparsableFields);
    const updatedAt = firstUsable(
      [
        ['update_time', this.epochDate(raw.update_time)],
        ['order_items.update_time', this.epochDate(lineDoc === raw ? undefined : lineDoc.update_time)],
      ],
      unparsableFields
    );

    return mapped({
      platform: this.platform,
      platformKey: this.platformKey,
      platformOrderId: orderSn,
      source,
      rawStatus,
      orderStatus: this.mapStatus(rawStatus),
      orderDate,
      updatedAt,
      priceCandidates: [parseMinorUnits(raw.total_amount), sumCandidate(discountedTotals)],
      totalItemCount: items.reduce((sum, item) => sum + quantityOf(item), 0),
      paymentMethod: text(raw.payment_method),
      shippingCity: text(asRecord(raw.recipient_address)?.city),
      buyerRef: buyerRef(raw.buyer_user_id) ?? buyerRef(lineDoc.buyer_user_id),
      unparsableFields,
    });
  }

  mapLineDocument(raw: RawDocument): MapResult<CanonicalLineDocument> {
    const orderSn = identifier(raw.order_sn);
    if (!orderSn) return rejected('order_sn missing');

    return mapped({
      platform: this.platform,
      platformKey: this.platformKey,
      platformOrderId: orderSn,
      buyerRef: buyerRef(raw.buyer_user_id),
      orderDate: this.orderDate(raw, raw),
      lines: mapLines(raw),
    });
  }

  mapProduct(raw: RawDocument): MapResult<CanonicalProduct> {
    const itemId = identifier(raw.item_id);
    if (!itemId) return rejected('item_id missing');

    const tiers = asRecords(raw.tier_variation).map((tier) =>
      Array.isArray(tier.option_list) ? tier.option_list.map(optionText) : []
    );

    let variants = asRecords(raw.model_list).flatMap((model): CanonicalVariant[] => {
      const modelId = identifier(model.model_id);
      if (!modelId) return [];
      return [
        {
          platformSkuId: modelId,
          variantSku: text(model.model_sku),
          attributes: tierAttributes(model.tier_index, tiers),
          price: priceOf(model.price_info, 'current_price'),
          stock: valueOf(parseDecimal(asRecord(model.stock_info)?.current_stock)),
        },
      ];
    });

    const itemPrice = priceOf(raw.price_info, 'current_price') ?? priceOf(raw.price_info, 'original_price');
    const variantPrice = variants.find((v) => v.price !== null)?.price ?? null;

    // Items without variations are sold under the item id itself
    if (variants.length === 0) {
      variants = [
        {
          platformSkuId: itemId,
          variantSku: text(raw.item_sku),
          attributes: ['', '', ''],
          price: itemPrice,
          stock: valueOf(parseDecimal(asRecord(raw.stock_info)?.current_stock)),
        },
      ];
    }

    const categoryId = identifier(raw.category_id);

    return mapped({
      platform: this.platform,
      platformKey: this.platformKey,
      productItemId: itemId,
      productName: text(raw.item_name),
      productSkuBase: skuBase(variants.map((v) => v.variantSku)),
      productCategory: categoryId ? `Category_${categoryId}` : '',
      productStatus: text(raw.item_status),
      productPrice: variantPrice ?? itemPrice,
      productRating: valueOf(parseDecimal(raw.rating_star)),
      variants,
    });
  }

  private epochDate(value: unknown): FieldResult<string> {
    return parseEpochDate(value, this.utcOffsetMinutes);
  }

  mapTraffic(raw: RawDocument): MapResult<CanonicalTraffic> {
    return trafficRecord(this.platform, this.platformKey, raw);
  }

  private orderDate(raw: RawDocument, lineDoc: RawDocument, notes: string[] = []): FieldResult<string> {
    return firstUsable(
      [
        ['create_time', this.epochDate(raw.create_time)],
        ['order_items.create_time', this.epochDate(lineDoc === raw ? undefined : lineDoc.create_time)],
      ],
      notes
    );
  }
}

function quantityOf(item: RawDocument): number {
  return Math.max(1, countOr(item.model_quantity_purchased, 1));
}

function centsOf(value: unknown): number {
  return toCents(valueOf(parseMinorUnits(value)) ?? 0);
}

function mapLines(lineDoc: RawDocument): CanonicalLineItem[] {
  const items = asRecords(lineDoc.item_list);
  const quantities = items.map(quantityOf);
  const income: RawDocument = asRecord(lineDoc.order_income) ?? {};

  const platformVouchers = allocateCents(centsOf(income.voucher_from_shopee), quantities);
  const sellerVouchers = allocateCents(centsOf(income.voucher_from_seller), quantities);
  const shippingFees = allocateCents(centsOf(income.buyer_paid_shipping_fee), quantities);

  return items.map((item, i) => {
    const quantity = quantities[i];
    const discounted = parseMinorUnits(item.model_discounted_price);
    const original = parseMinorUnits(item.model_original_price);
    const originalCents = toCents(valueOf(original) ?? 0) * quantity;

    // Paid is net of order vouchers on both paths
    const vouchers = platformVouchers[i] + sellerVouchers[i];
    let paidPrice: FieldResult<number> = discounted;
    if (discounted.status === 'ok') {
      paidPrice = ok(fromCents(toCents(discounted.value) * quantity - vouchers));
    } else if (original.status === 'ok') {
      paidPrice = ok(fromCents(originalCents - vouchers));
    }

    const modelId = identifier(item.model_id);

    return {
      itemId: identifier(item.item_id),
      skuId: modelId === '0' ? null : modelId,
      sellerSku: text(item.model_sku) || text(item.item_sku),
      variationAttributes: splitModelName(text(item.model_name)),
      quantity,
      paidPrice,
      originalPrice: fromCents(originalCents),
      voucherPlatform: fromCents(platformVouchers[i]),
      voucherSeller: fromCents(sellerVouchers[i]),
      shippingFee: fromCents(shippingFees[i]),
    };
  });
}

function optionText(option: unknown): string {
  return text(asRecord(option)?.option ?? option);
}

function tierAttributes(tierIndex: unknown, tiers: string[][]): [string, string, string] {
  const indexes = Array.isArray(tierIndex) ? tierIndex : [];
  const slot = (n: number): string => {
    const index: unknown = indexes[n];
    return typeof index === 'number' ? tiers[n]?.[index] ?? '' : '';
  };
  return [slot(0), slot(1), slot(2)];
}

/** `Black,M` → up to three attribute slots. */
function splitModelName(modelName: string): [string, string, string] {
  const parts = modelName === '' ? [] : modelName.split(',').map((part) => part.trim());
  return [parts[0] ?? '', parts[1] ?? '', parts[2] ?? ''];
}

/** `price_info` arrives as an object or a one-element array. */
function priceOf(priceInfo: unknown, field: 'current_price' | 'original_price'): number | null {
  const info = Array.isArray(priceInfo) ? asRecord(priceInfo[0]) : asRecord(priceInfo);
  if (!info) return null;
  return valueOf(parseMinorUnits(info[field]));
}
