// ──────────────────────────────────────────
// Modeling: Canonical record factories for builder tests
// ──────────────────────────────────────────

import {
  CanonicalLineDocument,
  CanonicalLineItem,
  CanonicalOrder,
  CanonicalProduct,
  CanonicalVariant,
} from '../../../shared/types';
import { MISSING, ok } from '../parsing';

export function canonicalOrder(overrides: Partial<CanonicalOrder> = {}): CanonicalOrder {
  return {
    platform: 'lazada',
    platformKey: 1,
    platformOrderId: '1',
    source: 'orders',
    rawStatus: 'delivered',
    orderStatus: 'COMPLETED',
    orderDate: ok('2025-03-01'),
    updatedAt: MISSING,
    priceCandidates: [ok(100)],
    totalItemCount: 1,
    paymentMethod: 'COD',
    shippingCity: 'Manila',
    buyerRef: 'B1',
    unparsableFields: [],
    ...overrides,
  };
}

export function lineItem(overrides: Partial<CanonicalLineItem> = {}): CanonicalLineItem {
  return {
    itemId: '10',
    skuId: '100',
    sellerSku: 'SKU-100',
    variationAttributes: ['', '', ''],
    quantity: 1,
    paidPrice: ok(100),
    originalPrice: 100,
    voucherPlatform: 0,
    voucherSeller: 0,
    shippingFee: 0,
    ...overrides,
  };
}

export function lineDocument(overrides: Partial<CanonicalLineDocument> = {}): CanonicalLineDocument {
  return {
    platform: 'lazada',
    platformKey: 1,
    platformOrderId: '1',
    buyerRef: 'B1',
    orderDate: ok('2025-03-01'),
    lines: [lineItem()],
    ...overrides,
  };
}

export function variant(overrides: Partial<CanonicalVariant> = {}): CanonicalVariant {
  return {
    platformSkuId: '100',
    variantSku: 'SKU-100',
    attributes: ['', '', ''],
    price: 100,
    stock: 1,
    ...overrides,
  };
}

export function canonicalProduct(overrides: Partial<CanonicalProduct> = {}): CanonicalProduct {
  return {
    platform: 'lazada',
    platformKey: 1,
    productItemId: '10',
    productName: 'Candle',
    productSkuBase: 'SKU',
    productCategory: 'Home Fragrance',
    productStatus: 'Active',
    productPrice: 100,
    productRating: null,
    variants: [variant()],
    ...overrides,
  };
}
