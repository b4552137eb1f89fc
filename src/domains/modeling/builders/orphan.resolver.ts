// ──────────────────────────────────────────
// Modeling: Orphan resolver: placeholder rows for unknown line references
// ──────────────────────────────────────────

import {
  CanonicalLineDocument,
  CanonicalLineItem,
  PlatformKey,
  ProductRow,
  ProductVariantRow,
} from '../../../shared/types';
import { KeyedArena, comparePlatformThenId, naturalKey } from '../keyed-arena';
import { skuBase } from '../platforms/mapper';
import { ProductDimension, ProductIndex, variantRow } from './product.builder';

export const PLACEHOLDER_PRODUCT_NAME = 'Pulled Out Item';
export const PLACEHOLDER_PRODUCT_STATUS = 'Inactive/Removed';

/** A line's variant reference: its SKU / model id, else its item id. */
export function variantRefOf(line: Pick<CanonicalLineItem, 'skuId' | 'itemId'>): string | null {
  return line.skuId ?? line.itemId;
}

interface MissingVariant {
  platformKey: PlatformKey;
  ref: string;
  /** Item id the placeholder variant hangs under. */
  productItemId: string;
  line: CanonicalLineItem;
}

export class OrphanResolver {
  resolve(dimension: ProductDimension, lineDocuments: CanonicalLineDocument[]): ProductDimension {
    const index = new ProductIndex(dimension);
    const missing = new KeyedArena<MissingVariant>((m) => naturalKey(m.platformKey, m.ref));

    for (const doc of lineDocuments) {
      for (const line of doc.lines) {
        const ref = variantRefOf(line);
        if (ref === null || index.variant(doc.platformKey, ref)) continue;
        missing.add({ platformKey: doc.platformKey, ref, productItemId: line.itemId ?? ref, line });
      }
    }

    if (missing.size === 0) return dimension;

    const placeholderProducts = new KeyedArena<{ platformKey: PlatformKey; id: string; line: CanonicalLineItem }>(
      (p) => naturalKey(p.platformKey, p.id)
    );
    for (const m of missing.values()) {
      if (index.productKey(m.platformKey, m.productItemId) === null) {
        placeholderProducts.add({ platformKey: m.platformKey, id: m.productItemId, line: m.line });
      }
    }

    let nextProductKey = maxKey(dimension.products.map((p) => p.product_key)) + 1;
    const newProducts: ProductRow[] = placeholderProducts
      .values()
      .sort(comparePlatformThenId)
      .map((p) => ({
        product_key: nextProductKey++,
        product_item_id: p.id,
        product_name: PLACEHOLDER_PRODUCT_NAME,
        product_sku_base: skuBase([p.line.sellerSku]),
        product_category: '',
        product_status: PLACEHOLDER_PRODUCT_STATUS,
        product_price: null,
        product_rating: null,
        platform_key: p.platformKey,
      }));

    const productKeys = new Map(newProducts.map((p) => [naturalKey(p.platform_key, p.product_item_id), p.product_key]));
    const productKeyOf = (m: MissingVariant): number =>
      index.productKey(m.platformKey, m.productItemId) ?? productKeys.get(naturalKey(m.platformKey, m.productItemId)) ?? 0;

    let nextVariantKey = maxKey(dimension.variants.map((v) => v.product_variant_key)) + 1;
    const newVariants: ProductVariantRow[] = missing
      .values()
      .sort((a, b) => comparePlatformThenId({ platformKey: a.platformKey, id: a.ref }, { platformKey: b.platformKey, id: b.ref }))
      .map((m) =>
        variantRow(nextVariantKey++, productKeyOf(m), m.platformKey, {
          platformSkuId: m.ref,
          variantSku: m.line.sellerSku,
          attributes: m.line.variationAttributes,
          price: null,
          stock: null,
        })
      );

    console.log(
      `[OrphanResolver] Added ${newProducts.length} placeholder products, ${newVariants.length} placeholder variants`
    );

    return {
      products: [...dimension.products, ...newProducts],
      variants: [...dimension.variants, ...newVariants],
    };
  }
}

function maxKey(keys: number[]): number {
  return keys.reduce((max, key) => Math.max(max, key), 0);
}
