// ──────────────────────────────────────────
// Modeling: Order dimension builder
// ──────────────────────────────────────────

import { CanonicalOrder, OrderRow, PlatformKey } from '../../../shared/types';
import { IssueLog } from '../../../shared/issue-log';
import { KeyedArena, comparePlatformThenId, naturalKey } from '../keyed-arena';
import { firstPositive, valueOf } from '../parsing';

export interface OrderDimension {
  rows: OrderRow[];
  /** Canonical orders in `orders_key` order. */
  orders: CanonicalOrder[];
  keyOf(platformKey: PlatformKey, platformOrderId: string): number | null;
}

export class OrderDimensionBuilder {
  constructor(private issues: IssueLog) {}

  /**
   * Primary orders first; order-item documents only contribute orders the
   * primary collection lacks. A captured natural key is never overwritten.
   */
  merge(primary: CanonicalOrder[], secondary: CanonicalOrder[]): CanonicalOrder[] {
    const orders = new KeyedArena<CanonicalOrder>((o) => naturalKey(o.platformKey, o.platformOrderId));
    for (const order of primary) orders.add(order);

    let supplemented = 0;
    for (const order of secondary) {
      if (orders.add(order)) supplemented++;
    }
    if (supplemented > 0) {
      console.log(`[OrderDimension] ${supplemented} orders found only in order-item documents`);
    }

    return orders.values();
  }

  build(merged: CanonicalOrder[]): OrderDimension {
    const orders = [...merged].sort((a, b) =>
      comparePlatformThenId(
        { platformKey: a.platformKey, id: a.platformOrderId },
        { platformKey: b.platformKey, id: b.platformOrderId }
      )
    );

    const keys = new Map<string, number>();
    const rows = orders.map((order, i): OrderRow => {
      const ordersKey = i + 1;
      keys.set(naturalKey(order.platformKey, order.platformOrderId), ordersKey);

      const price = firstPositive(order.priceCandidates);
      if (price === null) {
        this.issues.warn(
          'OrderDimension',
          `No usable price for order ${order.platformOrderId} on platform ${order.platformKey}`
        );
      }
      for (const field of order.unparsableFields) {
        this.issues.warn('OrderDimension', `Order ${order.platformOrderId} on platform ${order.platformKey}: unparsable ${field}`);
      }

      return {
        orders_key: ordersKey,
        platform_order_id: order.platformOrderId,
        platform_key: order.platformKey,
        order_status: order.orderStatus,
        order_date: valueOf(order.orderDate),
        updated_at: valueOf(order.updatedAt),
        price_total: price,
        total_item_count: order.totalItemCount,
        payment_method: order.paymentMethod,
        shipping_city: order.shippingCity,
      };
    });

    console.log(`[OrderDimension] Built ${rows.length} orders`);
    return {
      rows,
      orders,
      keyOf: (platformKey, platformOrderId) => keys.get(naturalKey(platformKey, platformOrderId)) ?? null,
    };
  }
}
