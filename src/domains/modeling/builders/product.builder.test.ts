import { describe, it, expect } from 'vitest';
import { ProductDimensionBuilder, ProductIndex } from './product.builder';
import { canonicalProduct, variant } from './test-fixtures';
import { IssueLog } from '../../../shared/issue-log';

describe('ProductDimensionBuilder', () => {
  it('fills primary blanks from the secondary catalog and unions variants', () => {
    const builder = new ProductDimensionBuilder(new IssueLog());
    const [merged] = builder.merge(
      [canonicalProduct({ productName: 'Candle', productCategory: '', productRating: null, variants: [variant({ price: null })] })],
      [
        canonicalProduct({
          productName: 'Candle (old listing)',
          productCategory: 'Home Fragrance',
          productRating: 4.5,
          variants: [variant({ price: 120 }), variant({ platformSkuId: '101', variantSku: 'SKU-101' })],
        }),
      ]
    );

    expect(merged.productName).toBe('Candle');
    expect(merged.productCategory).toBe('Home Fragrance');
    expect(merged.productRating).toBe(4.5);
    expect(merged.variants.map((v) => [v.platformSkuId, v.price])).toEqual([
      ['100', 120],
      ['101', 100],
    ]);
  });

  it('numbers products and variants independently in natural key order', () => {
    const builder = new ProductDimensionBuilder(new IssueLog());
    const dimension = builder.build([
      canonicalProduct({ platform: 'shopee', platformKey: 2, productItemId: '5', variants: [variant({ platformSkuId: '50' })] }),
      canonicalProduct({
        productItemId: '20',
        variants: [variant({ platformSkuId: '202' }), variant({ platformSkuId: '201', attributes: ['Red', 'L', ''] })],
      }),
      canonicalProduct({ productItemId: '10', variants: [variant({ platformSkuId: '300' })] }),
    ]);

    expect(dimension.products.map((p) => [p.product_key, p.platform_key, p.product_item_id])).toEqual([
      [1, 1, '10'],
      [2, 1, '20'],
      [3, 2, '5'],
    ]);
    expect(dimension.variants.map((v) => [v.product_variant_key, v.platform_sku_id, v.product_key])).toEqual([
      [1, '201', 2],
      [2, '202', 2],
      [3, '300', 1],
      [4, '50', 3],
    ]);
    expect(dimension.variants[0].variant_attribute_1).toBe('Red');

    const index = new ProductIndex(dimension);
    expect(index.variant(1, '202')).toEqual({ productVariantKey: 2, productKey: 2 });
    expect(index.variant(2, '202')).toBeNull();
    expect(index.productKey(2, '5')).toBe(3);
  });

  it('warns when a sku appears under two products', () => {
    const issues = new IssueLog();
    const dimension = new ProductDimensionBuilder(issues).build([
      canonicalProduct({ productItemId: '1', variants: [variant({ platformSkuId: '9' })] }),
      canonicalProduct({ productItemId: '2', variants: [variant({ platformSkuId: '9' })] }),
    ]);
    expect(dimension.variants).toHaveLength(1);
    expect(dimension.variants[0].product_key).toBe(1);
    expect(issues.size).toBe(1);
  });
});
