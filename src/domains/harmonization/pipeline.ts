// ──────────────────────────────────────────
// Harmonization: Pipeline: staged collections in, warehouse tables out
// ──────────────────────────────────────────
// Runs every builder in dependency order over complete inputs. Pure apart
// from logging: identical staged collections give identical tables.

import {
  CalendarDate,
  CanonicalLineDocument,
  CanonicalOrder,
  CanonicalProduct,
  CanonicalTraffic,
  DateRange,
  Issue,
  Platform,
  RawDocument,
  StagedCollections,
  WarehouseTables,
} from '../../shared/types';
import { IntegrityError } from '../../shared/errors';
import { IssueLog } from '../../shared/issue-log';
import { MapperRegistry, PLATFORMS, PlatformMapper, createMappers } from '../modeling/platforms';
import { naturalKey } from '../modeling/keyed-arena';
import { TimeDimensionBuilder } from '../modeling/builders/time.builder';
import { CustomerDimensionBuilder } from '../modeling/builders/customer.builder';
import { ProductDimensionBuilder } from '../modeling/builders/product.builder';
import { OrderDimensionBuilder } from '../modeling/builders/order.builder';
import { OrphanResolver } from '../modeling/builders/orphan.resolver';
import { FactOrdersBuilder } from '../modeling/builders/fact-orders.builder';
import { FactTrafficBuilder } from '../modeling/builders/fact-traffic.builder';
import { SalesAggregateBuilder } from '../analytics/sales-aggregate.builder';
import { validateWarehouse } from '../analytics/integrity';
import { COLLECTIONS } from '../staging/staging.repo';

export interface PipelineOptions {
  timeRange: DateRange | null;
  utcOffsetMinutes: number;
}

export interface PipelineResult {
  tables: WarehouseTables;
  warnings: Issue[];
}

/** Everything the builders need, after every raw document has been mapped. */
export interface MappedCollections {
  primaryOrders: CanonicalOrder[];
  secondaryOrders: CanonicalOrder[];
  primaryProducts: CanonicalProduct[];
  secondaryProducts: CanonicalProduct[];
  /** Effective line document per order natural key. */
  lineDocuments: Map<string, CanonicalLineDocument>;
  traffic: CanonicalTraffic[];
}

export class HarmonizationPipeline {
  private mappers: MapperRegistry;

  constructor(private options: PipelineOptions) {
    this.mappers = createMappers({ utcOffsetMinutes: options.utcOffsetMinutes });
  }

  run(staged: StagedCollections): PipelineResult {
    const issues = new IssueLog();
    const mapped = this.mapAll(staged, issues);

    const orderBuilder = new OrderDimensionBuilder(issues);
    const mergedOrders = orderBuilder.merge(mapped.primaryOrders, mapped.secondaryOrders);

    const timeBuilder = new TimeDimensionBuilder();
    const range = timeBuilder.resolveRange(this.options.timeRange, observedDates(mergedOrders, mapped.lineDocuments));
    const dimTime = timeBuilder.build(range);

    const customers = new CustomerDimensionBuilder().build(mergedOrders);

    const productBuilder = new ProductDimensionBuilder(issues);
    const catalog = productBuilder.build(productBuilder.merge(mapped.primaryProducts, mapped.secondaryProducts));
    const products = new OrphanResolver().resolve(catalog, [...mapped.lineDocuments.values()]);

    const orders = orderBuilder.build(mergedOrders);

    const facts = new FactOrdersBuilder(issues).build({
      orders,
      customers,
      products,
      time: dimTime,
      lineDocuments: mapped.lineDocuments,
    });
    const aggregate = new SalesAggregateBuilder().build(facts);
    const traffic = new FactTrafficBuilder(issues).build(mapped.traffic, dimTime);

    const tables: WarehouseTables = {
      dim_time: dimTime,
      dim_customer: customers.rows,
      dim_product: products.products,
      dim_product_variant: products.variants,
      dim_order: orders.rows,
      fact_orders: facts,
      fact_sales_aggregate: aggregate,
      fact_traffic: traffic,
    };

    const violations = validateWarehouse(tables);
    if (violations.length > 0) throw new IntegrityError(violations);

    console.log(`[Pipeline] Harmonized ${orders.rows.length} orders into ${facts.length} fact rows`);
    return { tables, warnings: issues.list() };
  }

  mapAll(staged: StagedCollections, issues: IssueLog): MappedCollections {
    const result: MappedCollections = {
      primaryOrders: [],
      secondaryOrders: [],
      primaryProducts: [],
      secondaryProducts: [],
      lineDocuments: new Map(),
      traffic: [],
    };

    for (const platform of PLATFORMS) {
      const collections = staged[platform];
      for (const name of COLLECTIONS) {
        if (collections[name] === null) {
          issues.warn('Staging', `${platform}_${name}_raw is absent; ${platform} contributes no ${name}`);
        }
      }
      this.mapPlatform(platform, this.mappers[platform], staged, result, issues);
    }

    return result;
  }

  private mapPlatform(
    platform: Platform,
    mapper: PlatformMapper,
    staged: StagedCollections,
    result: MappedCollections,
    issues: IssueLog
  ): void {
    const { orders, multiple_order_items: orderItems, products, productitem, reportoverview } = staged[platform];
    const component = `${capitalize(platform)}Mapper`;

    const rawLineDocuments = new Map<string, RawDocument>();
    for (const raw of orderItems ?? []) {
      const doc = mapper.mapLineDocument(raw);
      if (doc.status !== 'ok') {
        issues.warn(component, `Skipping order-item document: ${doc.reason}`);
        continue;
      }
      const key = naturalKey(mapper.platformKey, doc.value.platformOrderId);
      if (rawLineDocuments.has(key)) continue;
      rawLineDocuments.set(key, raw);
      if (doc.value.lines.length > 0) result.lineDocuments.set(key, doc.value);

      const order = mapper.mapOrder(raw, 'order_items');
      if (order.status === 'ok') result.secondaryOrders.push(order.value);
    }

    const lookup = (orderId: string): RawDocument | undefined => rawLineDocuments.get(naturalKey(mapper.platformKey, orderId));
    for (const raw of orders ?? []) {
      const order = mapper.mapOrder(raw, 'orders', lookup);
      if (order.status !== 'ok') {
        issues.warn(component, `Skipping order: ${order.reason}`);
        continue;
      }
      result.primaryOrders.push(order.value);

      const key = naturalKey(mapper.platformKey, order.value.platformOrderId);
      if (result.lineDocuments.has(key)) continue;
      const embedded = mapper.mapLineDocument(raw);
      if (embedded.status === 'ok' && embedded.value.lines.length > 0) {
        result.lineDocuments.set(key, embedded.value);
      }
    }

    for (const [raws, target] of [
      [products, result.primaryProducts],
      [productitem, result.secondaryProducts],
    ] as const) {
      for (const raw of raws ?? []) {
        const product = mapper.mapProduct(raw);
        if (product.status === 'ok') {
          target.push(product.value);
        } else {
          issues.warn(component, `Skipping product: ${product.reason}`);
        }
      }
    }

    for (const raw of reportoverview ?? []) {
      const traffic = mapper.mapTraffic(raw);
      if (traffic.status === 'ok') {
        result.traffic.push(traffic.value);
      } else {
        issues.warn(component, `Skipping traffic record: ${traffic.reason}`);
      }
    }
  }
}

function observedDates(orders: CanonicalOrder[], lineDocuments: Map<string, CanonicalLineDocument>): CalendarDate[] {
  const dates: CalendarDate[] = [];
  for (const order of orders) {
    if (order.orderDate.status === 'ok') dates.push(order.orderDate.value);
  }
  for (const doc of lineDocuments.values()) {
    if (doc.orderDate.status === 'ok') dates.push(doc.orderDate.value);
  }
  return dates;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
