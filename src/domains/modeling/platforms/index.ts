// ──────────────────────────────────────────
// Modeling: Platform mapper registry
// ──────────────────────────────────────────

import { Platform } from '../../../shared/types';
import { LazadaMapper } from './lazada.mapper';
import { ShopeeMapper } from './shopee.mapper';
import { PlatformMapper } from './mapper';

export type { PlatformMapper, MapResult } from './mapper';
export { LazadaMapper } from './lazada.mapper';
export { ShopeeMapper } from './shopee.mapper';

/** Platforms in `platform_key` order. */
export const PLATFORMS: readonly Platform[] = ['lazada', 'shopee'];

export type MapperRegistry = Record<Platform, PlatformMapper>;

export interface MapperOptions {
  utcOffsetMinutes: number;
}

export function createMappers(options: MapperOptions): MapperRegistry {
  return {
    lazada: new LazadaMapper(),
    shopee: new ShopeeMapper(options.utcOffsetMinutes),
  };
}
