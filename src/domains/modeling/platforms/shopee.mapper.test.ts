import { describe, it, expect } from 'vitest';
import { ShopeeMapper } from './shopee.mapper';
import { firstPositive } from '../parsing';

const mapper = new ShopeeMapper(480);

describe('ShopeeMapper', () => {
  it('maps statuses into the canonical vocabulary', () => {
    expect(mapper.mapStatus('COMPLETED')).toBe('COMPLETED');
    expect(mapper.mapStatus('TO_CONFIRM_RECEIVE')).toBe('SHIPPED');
    expect(mapper.mapStatus('IN_CANCEL')).toBe('CANCELLED');
    expect(mapper.mapStatus('TO_RETURN')).toBe('RETURNED');
    expect(mapper.mapStatus('???')).toBe('UNKNOWN');
  });

  it('converts minor units and epoch dates on an order', () => {
    const result = mapper.mapOrder(
      {
        order_sn: 'ABC123',
        order_status: 'COMPLETED',
        create_time: 1741107600,
        update_time: 1741194000,
        total_amount: 150000,
        payment_method: 'ShopeePay',
        recipient_address: { city: 'Makati' },
        buyer_user_id: 0,
        item_list: [
          { item_id: 7, model_id: 70, model_quantity_purchased: 2, model_discounted_price: 50000, model_original_price: 60000 },
        ],
      },
      'orders',
      (orderSn) => (orderSn === 'ABC123' ? { order_sn: 'ABC123', buyer_user_id: 888 } : undefined)
    );
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;

    const order = result.value;
    expect(order.platformKey).toBe(2);
    expect(order.orderDate).toEqual({ status: 'ok', value: '2025-03-05' });
    expect(order.updatedAt).toEqual({ status: 'ok', value: '2025-03-06' });
    expect(order.priceCandidates).toEqual([
      { status: 'ok', value: 1500 },
      { status: 'ok', value: 1000 },
    ]);
    expect(firstPositive(order.priceCandidates)).toBe(1500);
    expect(order.totalItemCount).toBe(2);
    expect(order.shippingCity).toBe('Makati');
    expect(order.buyerRef).toBe('888');
  });

  it('spreads order income across lines by quantity', () => {
    const result = mapper.mapLineDocument({
      order_sn: 'S1',
      buyer_user_id: 42,
      create_time: 1741107600,
      item_list: [
        {
          item_id: 1,
          model_id: 10,
          model_name: 'Black,M',
          model_quantity_purchased: 1,
          model_discounted_price: 10000,
          model_original_price: 12000,
        },
        { item_id: 2, model_id: 0, model_quantity_purchased: 2, model_original_price: 5000 },
      ],
      order_income: { voucher_from_shopee: 3000, voucher_from_seller: 0, buyer_paid_shipping_fee: 900 },
    });
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;

    const [first, second] = result.value.lines;
    expect(result.value.buyerRef).toBe('42');
    expect(first.paidPrice).toEqual({ status: 'ok', value: 90 });
    expect(first.originalPrice).toBe(120);
    expect(first.voucherPlatform).toBe(10);
    expect(first.shippingFee).toBe(3);
    expect(first.skuId).toBe('10');
    expect(first.variationAttributes).toEqual(['Black', 'M', '']);

    expect(second.skuId).toBeNull();
    expect(second.quantity).toBe(2);
    expect(second.originalPrice).toBe(100);
    expect(second.voucherPlatform).toBe(20);
    expect(second.shippingFee).toBe(6);
    expect(second.paidPrice).toEqual({ status: 'ok', value: 80 });
  });

  it('maps models through tier variations', () => {
    const result = mapper.mapProduct({
      item_id: 3001,
      item_name: 'Desk Lamp',
      category_id: 100012,
      item_status: 'NORMAL',
      rating_star: 4.8,
      price_info: [{ current_price: 99900, original_price: 129900 }],
      tier_variation: [
        { option_list: [{ option: 'White' }, { option: 'Black' }] },
        { option_list: [{ option: 'EU' }, { option: 'US' }] },
      ],
      model_list: [
        { model_id: 31, model_sku: 'LAMP-WH-EU', tier_index: [0, 0], price_info: [{ current_price: 89900 }], stock_info: { current_stock: 4 } },
        { model_id: 32, model_sku: 'LAMP-BK-US', tier_index: [1, 1] },
      ],
    });
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;

    const product = result.value;
    expect(product.productCategory).toBe('Category_100012');
    expect(product.productSkuBase).toBe('LAMP');
    expect(product.productPrice).toBe(899);
    expect(product.productRating).toBe(4.8);
    expect(product.variants[0]).toEqual({
      platformSkuId: '31',
      variantSku: 'LAMP-WH-EU',
      attributes: ['White', 'EU', ''],
      price: 899,
      stock: 4,
    });
    expect(product.variants[1].attributes).toEqual(['Black', 'US', '']);
    expect(product.variants[1].price).toBeNull();
  });

  it('sells an item without models under its item id', () => {
    const result = mapper.mapProduct({ item_id: 3002, item_name: 'Mug', item_sku: 'MUG-01', price_info: { current_price: 25000 } });
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;
    expect(result.value.variants).toHaveLength(1);
    expect(result.value.variants[0].platformSkuId).toBe('3002');
    expect(result.value.productPrice).toBe(250);
    expect(result.value.productSkuBase).toBe('MUG');
  });

  it('nets order vouchers out of the paid price on both price paths', () => {
    const line = (item: Record<string, unknown>) => {
      const result = mapper.mapLineDocument({
        order_sn: 'V1',
        item_list: [{ item_id: 1, model_id: 10, model_quantity_purchased: 1, model_original_price: 50000, ...item }],
        order_income: { voucher_from_seller: 1000 },
      });
      return result.status === 'ok' ? result.value.lines[0].paidPrice : null;
    };

    expect(line({ model_discounted_price: 50000 })).toEqual({ status: 'ok', value: 490 });
    expect(line({})).toEqual({ status: 'ok', value: 490 });
  });

  it('falls back to the order-item document when create_time does not parse', () => {
    const result = mapper.mapOrder(
      { order_sn: 'S7', order_status: 'COMPLETED', create_time: 'soon', update_time: 'later' },
      'orders',
      () => ({ order_sn: 'S7', create_time: 1741107600, update_time: 1741194000 })
    );
    expect(result.status).toBe('ok');
    if (result.status !== 'ok') return;

    expect(result.value.orderDate).toEqual({ status: 'ok', value: '2025-03-05' });
    expect(result.value.updatedAt).toEqual({ status: 'ok', value: '2025-03-06' });
    expect(result.value.unparsableFields).toEqual(['create_time "soon"', 'update_time "later"']);
  });

  it('maps a report overview record', () => {
    expect(mapper.mapTraffic({ time_key: '20251130', clicks: 30, impressions: 900 })).toEqual({
      status: 'ok',
      value: { platform: 'shopee', platformKey: 2, date: '2025-11-30', clicks: 30, impressions: 900 },
    });
  });
});

