// ──────────────────────────────────────────
// Migration: create the star schema
// ──────────────────────────────────────────

import { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // ── Dimensions ──

  await knex.schema.createTable('dim_time', (t) => {
    t.integer('time_key').primary();
    t.date('date').unique().notNullable();
    t.smallint('year').notNullable();
    t.string('quarter', 2).notNullable();
    t.smallint('month').notNullable();
    t.smallint('week').notNullable();
    t.smallint('day_of_week').notNullable();
    t.smallint('day_of_year').notNullable();
    t.boolean('is_weekend').notNullable();
    t.boolean('is_payday').notNullable();
    t.boolean('is_mega_sale_day').notNullable();
  });

  await knex.schema.createTable('dim_customer', (t) => {
    t.string('customer_key', 32).primary();
    t.string('platform_id', 255).notNullable();
    t.string('customer_city', 255);
    t.smallint('platform_key').notNullable();
    t.string('segment', 50).notNullable();
    t.integer('total_orders').notNullable();
    t.date('first_order_date');
    t.date('last_order_date');
    t.unique(['platform_key', 'platform_id']);
  });

  await knex.schema.createTable('dim_product', (t) => {
    t.integer('product_key').primary();
    t.string('product_item_id', 255).notNullable();
    t.text('product_name').notNullable();
    t.string('product_sku_base', 255).notNullable();
    t.string('product_category', 255).notNullable();
    t.string('product_status', 50).notNullable();
    t.decimal('product_price', 14, 2);
    t.decimal('product_rating', 3, 2);
    t.smallint('platform_key').notNullable();
    t.unique(['platform_key', 'product_item_id']);
  });

  await knex.schema.createTable('dim_product_variant', (t) => {
    t.integer('product_variant_key').primary();
    t.integer('product_key').notNullable().references('product_key').inTable('dim_product');
    t.string('platform_sku_id', 255).notNullable();
    t.string('variant_sku', 255).notNullable();
    t.string('variant_attribute_1', 255).notNullable();
    t.string('variant_attribute_2', 255).notNullable();
    t.string('variant_attribute_3', 255).notNullable();
    t.decimal('variant_price', 14, 2);
    t.integer('variant_stock');
    t.smallint('platform_key').notNullable();
    t.unique(['platform_key', 'platform_sku_id']);
  });

  await knex.schema.createTable('dim_order', (t) => {
    t.integer('orders_key').primary();
    t.string('platform_order_id', 255).notNullable();
    t.smallint('platform_key').notNullable();
    t.string('order_status', 20).notNullable();
    t.date('order_date');
    t.date('updated_at');
    t.decimal('price_total', 14, 2);
    t.integer('total_item_count').notNullable();
    t.string('payment_method', 100).notNullable();
    t.string('shipping_city', 255).notNullable();
    t.unique(['platform_key', 'platform_order_id']);
  });

  // ── Facts ──

  await knex.schema.createTable('fact_orders', (t) => {
    t.integer('order_item_key').primary();
    t.integer('orders_key').notNullable().references('orders_key').inTable('dim_order');
    t.integer('product_key').notNullable().references('product_key').inTable('dim_product');
    t.integer('product_variant_key').notNullable().references('product_variant_key').inTable('dim_product_variant');
    t.integer('time_key').notNullable().references('time_key').inTable('dim_time');
    t.string('customer_key', 32).notNullable().references('customer_key').inTable('dim_customer');
    t.smallint('platform_key').notNullable();
    t.integer('item_quantity').notNullable();
    t.decimal('paid_price', 14, 2).notNullable();
    t.decimal('original_unit_price', 14, 2).notNullable();
    t.decimal('voucher_platform_amount', 14, 2).notNullable();
    t.decimal('voucher_seller_amount', 14, 2).notNullable();
    t.decimal('shipping_fee_paid_by_buyer', 14, 2).notNullable();
    t.index(['time_key', 'platform_key']);
  });

  await knex.schema.createTable('fact_sales_aggregate', (t) => {
    t.integer('time_key').notNullable().references('time_key').inTable('dim_time');
    t.smallint('platform_key').notNullable();
    t.string('customer_key', 32).notNullable().references('customer_key').inTable('dim_customer');
    t.integer('product_key').notNullable().references('product_key').inTable('dim_product');
    t.integer('total_orders').notNullable();
    t.integer('total_items_sold').notNullable();
    t.decimal('gross_revenue', 14, 2).notNullable();
    t.decimal('total_discounts', 14, 2).notNullable();
    t.decimal('net_sales', 14, 2).notNullable();
    t.primary(['time_key', 'platform_key', 'customer_key', 'product_key']);
  });

  await knex.schema.createTable('fact_traffic', (t) => {
    t.integer('traffic_event_key').primary();
    t.integer('time_key').notNullable().references('time_key').inTable('dim_time');
    t.smallint('platform_key').notNullable();
    t.integer('clicks');
    t.integer('impressions').notNullable();
    t.unique(['time_key', 'platform_key']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('fact_traffic');
  await knex.schema.dropTableIfExists('fact_sales_aggregate');
  await knex.schema.dropTableIfExists('fact_orders');
  await knex.schema.dropTableIfExists('dim_order');
  await knex.schema.dropTableIfExists('dim_product_variant');
  await knex.schema.dropTableIfExists('dim_product');
  await knex.schema.dropTableIfExists('dim_customer');
  await knex.schema.dropTableIfExists('dim_time');
}
