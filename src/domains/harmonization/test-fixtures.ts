// ──────────────────────────────────────────
// Harmonization: Staged collections for pipeline tests
// ──────────────────────────────────────────
// Lazada: two primary orders, one order known only from its order-item
// document, and a pulled-out item X999. Shopee: order ABC123 present in both
// order collections with conflicting values, and no secondary catalog. Each
// platform reports one day of traffic.

import { StagedCollections } from '../../shared/types';

/** 2025-11-30 01:00 at +08:00 */
const SHOPEE_CREATE_TIME = 1764435600;

export function stagedFixture(): StagedCollections {
  return {
    lazada: {
      orders: [
        {
          order_id: 5001,
          statuses: ['delivered'],
          created_at: '2025-11-28 10:00:00 +0800',
          updated_at: '2025-11-30 10:00:00 +0800',
          price: '300.00',
          items_count: 2,
          payment_method: 'COD',
          address_shipping: { city: 'Cebu' },
        },
        {
          order_id: 5002,
          statuses: ['canceled'],
          created_at: '2025-11-29 11:00:00 +0800',
          price: '0',
          payment_method: 'COD',
          address_shipping: { city: 'Davao' },
        },
      ],
      multiple_order_items: [
        {
          order_id: 5001,
          order_items: [
            {
              buyer_id: 700,
              status: 'delivered',
              created_at: '2025-11-28 10:00:00 +0800',
              item_id: 9001,
              sku_id: 1,
              sku: 'LAV-S',
              paid_price: '180.00',
              item_price: '200.00',
              voucher_platform: 10,
              voucher_seller: 10,
              shipping_amount: 0,
            },
            {
              buyer_id: 700,
              status: 'delivered',
              created_at: '2025-11-28 10:00:00 +0800',
              item_id: 'X999',
              sku: 'OLD-1',
              paid_price: '100.00',
              item_price: '100.00',
            },
          ],
        },
        {
          order_id: 5002,
          order_items: [
            {
              buyer_id: 0,
              status: 'canceled',
              created_at: '2025-11-29 11:00:00 +0800',
              item_id: 'X999',
              sku: 'OLD-1',
              paid_price: '100.00',
              item_price: '100.00',
            },
          ],
        },
        {
          order_id: 5003,
          order_items: [
            {
              buyer_id: 701,
              status: 'delivered',
              created_at: '2025-12-01 09:00:00 +0800',
              item_id: 9001,
              sku_id: 2,
              sku: 'LAV-L',
              paid_price: '299.00',
              item_price: '299.00',
            },
          ],
        },
      ],
      products: [
        {
          item_id: 9001,
          attributes: { name: 'Lavender Candle' },
          primary_category: 22490,
          status: 'Active',
          skus: [{ SkuId: 1, SellerSku: 'LAV-S', Variation1: 'Small', price: '199.00', quantity: 5 }],
        },
      ],
      productitem: [
        {
          item_id: 9001,
          attributes: { name: '' },
          skus: [
            { SkuId: 1, SellerSku: 'LAV-S' },
            { SkuId: 2, SellerSku: 'LAV-L', Variation1: 'Large', price: '299.00', quantity: 2 },
          ],
        },
      ],
      reportoverview: [{ time_key: 20251128, clicks: 120, impressions: 4500 }],
    },
    shopee: {
      orders: [
        {
          order_sn: 'ABC123',
          order_status: 'COMPLETED',
          create_time: SHOPEE_CREATE_TIME,
          total_amount: 150000,
          buyer_user_id: 900,
          payment_method: 'ShopeePay',
          recipient_address: { city: 'Makati' },
          item_list: [
            { item_id: 3001, model_id: 31, model_quantity_purchased: 3, model_discounted_price: 50000, model_original_price: 60000 },
          ],
        },
      ],
      multiple_order_items: [
        {
          order_sn: 'ABC123',
          order_status: 'CANCELLED',
          create_time: SHOPEE_CREATE_TIME,
          total_amount: 99999,
          buyer_user_id: 900,
          item_list: [
            { item_id: 3001, model_id: 31, model_quantity_purchased: 3, model_discounted_price: 50000, model_original_price: 60000 },
          ],
          order_income: { voucher_from_shopee: 3000, voucher_from_seller: 1500, buyer_paid_shipping_fee: 0 },
        },
      ],
      products: [
        {
          item_id: 3001,
          item_name: 'Desk Lamp',
          category_id: 100012,
          item_status: 'NORMAL',
          tier_variation: [{ option_list: [{ option: 'White' }] }],
          model_list: [{ model_id: 31, model_sku: 'LAMP-WH', tier_index: [0], price_info: [{ current_price: 50000 }] }],
        },
      ],
      productitem: null,
      reportoverview: [{ date: '2025-11-30', clicks: '30', impressions: 900 }],
    },
  };
}
