// ──────────────────────────────────────────
// Modeling: Customer dimension builder
// ──────────────────────────────────────────

import { CalendarDate, CanonicalOrder, CustomerRow, PlatformKey } from '../../../shared/types';
import { KeyedArena, comparePlatformThenId, naturalKey } from '../keyed-arena';
import { valueOf } from '../parsing';

/** Natural key shared by every order whose buyer reference is empty. */
export const DELETED_USER = 'Deleted User';

const FIRST_SEQUENCE = 10001;

interface BuyerActivity {
  platformKey: PlatformKey;
  id: string;
  orders: number;
  firstOrder: CalendarDate | null;
  lastOrder: CalendarDate | null;
  /** City of the latest order that names one, with the order it came from. */
  city: { name: string; rank: string } | null;
}

export interface CustomerDimension {
  rows: CustomerRow[];
  keyOf(platformKey: PlatformKey, buyerRef: string | null): string | null;
}

export function buyerIdOf(order: Pick<CanonicalOrder, 'buyerRef'>): string {
  return order.buyerRef ?? DELETED_USER;
}

export class CustomerDimensionBuilder {
  /**
   * `orders` holds one entry per distinct order, both sources merged. The
   * shared deleted-user row carries no city.
   */
  build(orders: CanonicalOrder[]): CustomerDimension {
    const buyers = new KeyedArena<BuyerActivity>((b) => naturalKey(b.platformKey, b.id));

    for (const order of orders) {
      const id = buyerIdOf(order);
      const key = naturalKey(order.platformKey, id);
      if (!buyers.has(key)) {
        buyers.add({ platformKey: order.platformKey, id, orders: 0, firstOrder: null, lastOrder: null, city: null });
      }
      const buyer = buyers.get(key);
      if (!buyer) continue;

      buyer.orders += 1;
      if (order.orderDate.status === 'ok') {
        const date = order.orderDate.value;
        if (buyer.firstOrder === null || date < buyer.firstOrder) buyer.firstOrder = date;
        if (buyer.lastOrder === null || date > buyer.lastOrder) buyer.lastOrder = date;
      }

      if (id !== DELETED_USER && order.shippingCity !== '') {
        const rank = `${valueOf(order.orderDate) ?? ''}|${order.platformOrderId}`;
        if (buyer.city === null || rank > buyer.city.rank) buyer.city = { name: order.shippingCity, rank };
      }
    }

    const sequences = new Map<PlatformKey, number>();
    const keys = new Map<string, string>();
    const rows = buyers
      .values()
      .sort(comparePlatformThenId)
      .map((buyer): CustomerRow => {
        const sequence = sequences.get(buyer.platformKey) ?? FIRST_SEQUENCE;
        sequences.set(buyer.platformKey, sequence + 1);
        const customerKey = `${sequence}.${buyer.platformKey}`;
        keys.set(naturalKey(buyer.platformKey, buyer.id), customerKey);
        return {
          customer_key: customerKey,
          platform_id: buyer.id,
          customer_city: buyer.city?.name ?? null,
          platform_key: buyer.platformKey,
          segment: buyer.orders === 1 ? 'New Buyer' : 'Returning Buyer',
          total_orders: buyer.orders,
          first_order_date: buyer.firstOrder,
          last_order_date: buyer.lastOrder,
        };
      });

    console.log(`[CustomerDimension] Built ${rows.length} customers`);

    return {
      rows,
      keyOf: (platformKey, buyerRef) => keys.get(naturalKey(platformKey, buyerRef ?? DELETED_USER)) ?? null,
    };
  }
}
