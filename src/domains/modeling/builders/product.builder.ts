// ──────────────────────────────────────────
// Modeling: Product & variant dimension builder
// ──────────────────────────────────────────

import {
  CanonicalProduct,
  CanonicalVariant,
  PlatformKey,
  ProductRow,
  ProductVariantRow,
} from '../../../shared/types';
import { IssueLog } from '../../../shared/issue-log';
import { KeyedArena, comparePlatformThenId, naturalKey } from '../keyed-arena';
import { skuBase } from '../platforms/mapper';

export interface VariantRef {
  productVariantKey: number;
  productKey: number;
}

export interface ProductDimension {
  products: ProductRow[];
  variants: ProductVariantRow[];
}

/** Lookup over the product tables by natural key. */
export class ProductIndex {
  private products = new Map<string, number>();
  private variants = new Map<string, VariantRef>();

  constructor(dimension: ProductDimension) {
    for (const p of dimension.products) {
      this.products.set(naturalKey(p.platform_key, p.product_item_id), p.product_key);
    }
    for (const v of dimension.variants) {
      this.variants.set(naturalKey(v.platform_key, v.platform_sku_id), {
        productVariantKey: v.product_variant_key,
        productKey: v.product_key,
      });
    }
  }

  productKey(platformKey: PlatformKey, itemId: string): number | null {
    return this.products.get(naturalKey(platformKey, itemId)) ?? null;
  }

  variant(platformKey: PlatformKey, skuId: string): VariantRef | null {
    return this.variants.get(naturalKey(platformKey, skuId)) ?? null;
  }
}

export class ProductDimensionBuilder {
  constructor(private issues: IssueLog) {}

  /**
   * Merges the primary and secondary catalogs by item id. The primary wins
   * field by field; the secondary only fills blanks and adds variants.
   */
  merge(primary: CanonicalProduct[], secondary: CanonicalProduct[]): CanonicalProduct[] {
    const catalog = new KeyedArena<CanonicalProduct>((p) => naturalKey(p.platformKey, p.productItemId));

    for (const product of primary) {
      const existing = catalog.get(naturalKey(product.platformKey, product.productItemId));
      catalog.replace(existing ? fillProduct(existing, product) : product);
    }
    for (const product of secondary) {
      const existing = catalog.get(naturalKey(product.platformKey, product.productItemId));
      catalog.replace(existing ? fillProduct(existing, product) : product);
    }

    return catalog.values();
  }

  build(catalog: CanonicalProduct[]): ProductDimension {
    const sorted = [...catalog].sort((a, b) =>
      comparePlatformThenId(
        { platformKey: a.platformKey, id: a.productItemId },
        { platformKey: b.platformKey, id: b.productItemId }
      )
    );

    const products: ProductRow[] = sorted.map((p, i) => ({
      product_key: i + 1,
      product_item_id: p.productItemId,
      product_name: p.productName,
      product_sku_base: p.productSkuBase,
      product_category: p.productCategory,
      product_status: p.productStatus,
      product_price: p.productPrice,
      product_rating: p.productRating,
      platform_key: p.platformKey,
    }));

    const variantArena = new KeyedArena<{ platformKey: PlatformKey; productKey: number; variant: CanonicalVariant }>(
      (entry) => naturalKey(entry.platformKey, entry.variant.platformSkuId)
    );
    sorted.forEach((p, i) => {
      for (const variant of p.variants) {
        const added = variantArena.add({ platformKey: p.platformKey, productKey: i + 1, variant });
        if (!added) {
          this.issues.warn(
            'ProductDimension',
            `SKU ${variant.platformSkuId} listed under more than one product on platform ${p.platformKey}; keeping the first`
          );
        }
      }
    });

    const variants: ProductVariantRow[] = variantArena
      .values()
      .sort((a, b) =>
        comparePlatformThenId(
          { platformKey: a.platformKey, id: a.variant.platformSkuId },
          { platformKey: b.platformKey, id: b.variant.platformSkuId }
        )
      )
      .map((entry, i) => variantRow(i + 1, entry.productKey, entry.platformKey, entry.variant));

    console.log(`[ProductDimension] Built ${products.length} products, ${variants.length} variants`);
    return { products, variants };
  }
}

export function variantRow(
  key: number,
  productKey: number,
  platformKey: PlatformKey,
  variant: CanonicalVariant
): ProductVariantRow {
  return {
    product_variant_key: key,
    product_key: productKey,
    platform_sku_id: variant.platformSkuId,
    variant_sku: variant.variantSku,
    variant_attribute_1: variant.attributes[0],
    variant_attribute_2: variant.attributes[1],
    variant_attribute_3: variant.attributes[2],
    variant_price: variant.price,
    variant_stock: variant.stock,
    platform_key: platformKey,
  };
}

function fillText(primary: string, fallback: string): string {
  return primary !== '' ? primary : fallback;
}

function fillVariant(primary: CanonicalVariant, fallback: CanonicalVariant): CanonicalVariant {
  return {
    platformSkuId: primary.platformSkuId,
    variantSku: fillText(primary.variantSku, fallback.variantSku),
    attributes: [
      fillText(primary.attributes[0], fallback.attributes[0]),
      fillText(primary.attributes[1], fallback.attributes[1]),
      fillText(primary.attributes[2], fallback.attributes[2]),
    ],
    price: primary.price ?? fallback.price,
    stock: primary.stock ?? fallback.stock,
  };
}

function fillProduct(primary: CanonicalProduct, fallback: CanonicalProduct): CanonicalProduct {
  const fallbackVariants = new Map(fallback.variants.map((v) => [v.platformSkuId, v]));
  const variants = primary.variants.map((v) => {
    const other = fallbackVariants.get(v.platformSkuId);
    return other ? fillVariant(v, other) : v;
  });
  const known = new Set(primary.variants.map((v) => v.platformSkuId));
  for (const v of fallback.variants) {
    if (!known.has(v.platformSkuId)) variants.push(v);
  }

  return {
    ...primary,
    productName: fillText(primary.productName, fallback.productName),
    productSkuBase: fillText(primary.productSkuBase, fallback.productSkuBase) || skuBase(variants.map((v) => v.variantSku)),
    productCategory: fillText(primary.productCategory, fallback.productCategory),
    productStatus: fillText(primary.productStatus, fallback.productStatus),
    productPrice: primary.productPrice ?? fallback.productPrice,
    productRating: primary.productRating ?? fallback.productRating,
    variants,
  };
}
