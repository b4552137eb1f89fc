// ──────────────────────────────────────────
// Modeling: Order line fact builder (one row per sold unit)
// ──────────────────────────────────────────

import { CanonicalLineDocument, FactOrderRow, TimeDayRow } from '../../../shared/types';
import { IssueLog } from '../../../shared/issue-log';
import { splitCents, toCents, fromCents } from '../../../shared/money';
import { naturalKey } from '../keyed-arena';
import { describeRaw } from '../parsing';
import { CustomerDimension } from './customer.builder';
import { OrderDimension } from './order.builder';
import { ProductDimension, ProductIndex } from './product.builder';
import { variantRefOf } from './orphan.resolver';
import { timeKey } from './calendar';

export interface FactInputs {
  orders: OrderDimension;
  customers: CustomerDimension;
  products: ProductDimension;
  time: TimeDayRow[];
  /** Line document per order natural key (see `naturalKey`). */
  lineDocuments: Map<string, CanonicalLineDocument>;
}

export class FactOrdersBuilder {
  constructor(private issues: IssueLog) {}

  build(inputs: FactInputs): FactOrderRow[] {
    const productIndex = new ProductIndex(inputs.products);
    const timeKeys = new Set(inputs.time.map((day) => day.time_key));
    const facts: FactOrderRow[] = [];
    let dropped = 0;

    for (const order of inputs.orders.orders) {
      if (order.orderStatus !== 'COMPLETED') continue;

      const ordersKey = inputs.orders.keyOf(order.platformKey, order.platformOrderId);
      const doc = inputs.lineDocuments.get(naturalKey(order.platformKey, order.platformOrderId));
      if (ordersKey === null || !doc || doc.lines.length === 0) {
        this.issues.warn('FactOrders', `Completed order ${order.platformOrderId} has no line items`);
        continue;
      }

      const date = order.orderDate.status === 'ok' ? order.orderDate.value : null;
      const orderTimeKey = date === null ? null : timeKey(date);
      if (orderTimeKey === null || !timeKeys.has(orderTimeKey)) {
        this.issues.warn('FactOrders', `Order ${order.platformOrderId} date is outside the time dimension; lines dropped`);
        dropped += doc.lines.length;
        continue;
      }

      const customerKey = inputs.customers.keyOf(order.platformKey, order.buyerRef);
      if (customerKey === null) {
        this.issues.warn('FactOrders', `No customer row for order ${order.platformOrderId}; lines dropped`);
        dropped += doc.lines.length;
        continue;
      }

      for (const line of doc.lines) {
        if (line.paidPrice.status !== 'ok') {
          this.issues.warn(
            'FactOrders',
            `Dropping line of order ${order.platformOrderId}: paid price ${describeRaw(line.paidPrice)}`
          );
          dropped++;
          continue;
        }

        const ref = variantRefOf(line);
        const variant = ref === null ? null : productIndex.variant(order.platformKey, ref);
        if (!variant) {
          this.issues.warn('FactOrders', `Dropping line of order ${order.platformOrderId}: unresolved variant ${ref ?? '(none)'}`);
          dropped++;
          continue;
        }

        const units = line.quantity;
        const paid = splitCents(toCents(line.paidPrice.value), units);
        const original = splitCents(toCents(line.originalPrice), units);
        const voucherPlatform = splitCents(toCents(line.voucherPlatform), units);
        const voucherSeller = splitCents(toCents(line.voucherSeller), units);
        const shipping = splitCents(toCents(line.shippingFee), units);

        for (let u = 0; u < units; u++) {
          facts.push({
            order_item_key: facts.length + 1,
            orders_key: ordersKey,
            product_key: variant.productKey,
            product_variant_key: variant.productVariantKey,
            time_key: orderTimeKey,
            customer_key: customerKey,
            platform_key: order.platformKey,
            item_quantity: 1,
            paid_price: fromCents(paid[u]),
            original_unit_price: fromCents(original[u]),
            voucher_platform_amount: fromCents(voucherPlatform[u]),
            voucher_seller_amount: fromCents(voucherSeller[u]),
            shipping_fee_paid_by_buyer: fromCents(shipping[u]),
          });
        }
      }
    }

    console.log(`[FactOrders] Emitted ${facts.length} unit rows (${dropped} lines dropped)`);
    return facts;
  }
}
