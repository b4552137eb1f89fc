import { describe, it, expect } from 'vitest';
import { LazadaMapper } from './lazada.mapper';

const mapper = new LazadaMapper();

const order = {
  order_id: 1001,
  statuses: ['delivered'],
  created_at: '2025-03-04 22:10:05 +0800',
  updated_at: '2025-03-06 09:00:00 +0800',
  price: '1,299.00',
  items_count: 2,
  payment_method: 'COD',
  address_shipping: { city: 'Quezon City' },
};

const lineDocument = {
  order_id: 1001,
  order_items: [
    { buyer_id: 555, status: 'delivered', item_id: 11, sku_id: 22, item_price: '700.00', paid_price: '650.00' },
    { buyer_id: 555, status: 'delivered', item_id: 12, sku_id: 23, item_price: '599.00', paid_price: '599.00' },
  ],
};

describe('LazadaMapper', () => {
  it('maps statuses into the canonical vocabulary', () => {
    expect(mapper.mapStatus('delivered')).toBe('COMPLETED');
    expect(mapper.mapStatus('Ready_To_Ship')).toBe('READY_TO_SHIP');
    expect(mapper.mapStatus('canceled')).toBe('CANCELLED');
    expect(mapper.mapStatus('shipped_back')).toBe('RETURNED');
    expect(mapper.mapStatus('teleported')).toBe('UNKNOWN');
  });

  it('maps a primary order and borrows the buyer from its line document', () => {
    const result = mapper.mapOrder(order, 'orders', () => lineDocument);
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;

    const mapped = result.value;
    expect(mapped.platformOrderId).toBe('1001');
    expect(mapped.platformKey).toBe(1);
    expect(mapped.orderStatus).toBe('COMPLETED');
    expect(mapped.orderDate).toEqual({ status: 'ok', value: '2025-03-04' });
    expect(mapped.updatedAt).toEqual({ status: 'ok', value: '2025-03-06' });
    expect(mapped.priceCandidates).toEqual([
      { status: 'ok', value: 1299 },
      { status: 'missing' },
      { status: 'ok', value: 1299 },
    ]);
    expect(mapped.totalItemCount).toBe(2);
    expect(mapped.shippingCity).toBe('Quezon City');
    expect(mapped.paymentMethod).toBe('COD');
    expect(mapped.buyerRef).toBe('555');
  });

  it('maps an order that only exists as an order-item document', () => {
    const result = mapper.mapOrder(
      { order_id: 'X1', order_items: [{ status: 'shipped', created_at: '2025-01-02 10:00:00 +0800', item_price: 80 }] },
      'order_items'
    );
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.value.source).toBe('order_items');
    expect(result.value.orderStatus).toBe('SHIPPED');
    expect(result.value.orderDate).toEqual({ status: 'ok', value: '2025-01-02' });
    expect(result.value.totalItemCount).toBe(1);
    expect(result.value.buyerRef).toBeNull();
  });

  it('rejects an order without an id', () => {
    expect(mapper.mapOrder({ statuses: ['pending'] }, 'orders')).toEqual({
      status: 'unparsable',
      reason: 'order_id missing',
    });
  });

  it('derives the paid price from item price minus vouchers', () => {
    const result = mapper.mapLineDocument({
      order_id: 77,
      order_items: [
        {
          item_id: 11,
          sku_id: 22,
          sku: 'CANDLE-RED',
          variation: 'Color family:Red, Size:L',
          paid_price: '',
          item_price: '250.00',
          voucher_platform: 20,
          voucher_seller: '10.50',
          shipping_amount: 0,
        },
      ],
    });
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;

    const [line] = result.value.lines;
    expect(line.paidPrice).toEqual({ status: 'ok', value: 219.5 });
    expect(line.originalPrice).toBe(250);
    expect(line.quantity).toBe(1);
    expect(line.skuId).toBe('22');
    expect(line.variationAttributes).toEqual(['Color family:Red', 'Size:L', '']);
  });

  it('maps a catalog product with its skus', () => {
    const result = mapper.mapProduct({
      item_id: 9001,
      attributes: { name: 'Lavender Candle' },
      primary_category: 22490,
      status: 'Active',
      skus: [
        { SkuId: 1, SellerSku: 'LAV-S', Variation1: 'Small', price: '199.00', quantity: 5 },
        { SkuId: 2, SellerSku: 'LAV-L', price: '299', quantity: '3' },
      ],
    });
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;

    const product = result.value;
    expect(product.productName).toBe('Lavender Candle');
    expect(product.productCategory).toBe('Home Fragrance');
    expect(product.productSkuBase).toBe('LAV');
    expect(product.productPrice).toBe(199);
    expect(product.variants).toHaveLength(2);
    expect(product.variants[0].attributes).toEqual(['Small', '', '']);
    expect(product.variants[1].stock).toBe(3);
  });

  it('names unknown categories by id', () => {
    const result = mapper.mapProduct({ item_id: 1, primary_category: 555, skus: [] });
    expect(result.status === 'ok' && result.value.productCategory).toBe('Category_555');
  });

  it('falls back to the line document when its own dates do not parse', () => {
    const result = mapper.mapOrder(
      { order_id: '7', created_at: 'not a date', updated_at: 12, statuses: ['delivered'] },
      'orders',
      () => ({
        order_id: '7',
        order_items: [
          { created_at: '2025-11-28 10:00:00 +0800', updated_at: '2025-11-30 08:00:00 +0800', item_price: '10.00' },
        ],
      })
    );
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;

    expect(result.value.orderDate).toEqual({ status: 'ok', value: '2025-11-28' });
    expect(result.value.updatedAt).toEqual({ status: 'ok', value: '2025-11-30' });
    expect(result.value.unparsableFields).toEqual(['created_at "not a date"', 'updated_at 12']);
  });

  it('keeps an unparsable date when nothing else is usable', () => {
    const result = mapper.mapOrder({ order_id: '8', created_at: 'yesterday', statuses: ['delivered'] }, 'orders');
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.value.orderDate).toEqual({ status: 'unparsable', raw: 'yesterday' });
    expect(result.value.unparsableFields).toEqual(['created_at "yesterday"']);
  });

  it('maps a report overview record', () => {
    expect(mapper.mapTraffic({ time_key: 20251128, clicks: '120', impressions: 4500 })).toEqual({
      status: 'ok',
      value: { platform: 'lazada', platformKey: 1, date: '2025-11-28', clicks: 120, impressions: 4500 },
    });
    expect(mapper.mapTraffic({ date: '2025-11-29', impressions: 10 })).toEqual({
      status: 'ok',
      value: { platform: 'lazada', platformKey: 1, date: '2025-11-29', clicks: null, impressions: 10 },
    });
    expect(mapper.mapTraffic({ clicks: 1, impressions: 2 })).toEqual({ status: 'unparsable', reason: 'time_key missing' });
    expect(mapper.mapTraffic({ time_key: 20251128, impressions: 'lots' })).toEqual({
      status: 'unparsable',
      reason: 'impressions "lots" is not a number',
    });
  });
});

