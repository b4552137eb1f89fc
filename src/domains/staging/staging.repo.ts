// ──────────────────────────────────────────
// Staging: Raw collection repository (JSON files on disk)
// ──────────────────────────────────────────

import fs from 'fs/promises';
import path from 'path';
import { StagingContract } from '../../shared/contracts';
import {
  CollectionName,
  CollectionStatus,
  Platform,
  PlatformCollections,
  RawDocument,
  StagedCollections,
} from '../../shared/types';
import { StagingError } from '../../shared/errors';
import { asRecords } from '../modeling/parsing';
import { PLATFORMS } from '../modeling/platforms';

export const COLLECTIONS: readonly CollectionName[] = [
  'orders',
  'multiple_order_items',
  'products',
  'productitem',
  'reportoverview',
];

export function collectionFile(platform: Platform, collection: CollectionName): string {
  return `${platform}_${collection}_raw.json`;
}

export class StagingRepo implements StagingContract {
  constructor(private dir: string) {}

  async loadAll(): Promise<StagedCollections> {
    return {
      lazada: await this.loadPlatform('lazada'),
      shopee: await this.loadPlatform('shopee'),
    };
  }

  async describe(): Promise<CollectionStatus[]> {
    const statuses: CollectionStatus[] = [];
    for (const platform of PLATFORMS) {
      for (const collection of COLLECTIONS) {
        const docs = await this.read(platform, collection);
        statuses.push({
          platform,
          collection,
          file: collectionFile(platform, collection),
          present: docs !== null,
          documents: docs?.length ?? 0,
        });
      }
    }
    return statuses;
  }

  private async loadPlatform(platform: Platform): Promise<PlatformCollections> {
    const [orders, orderItems, products, productItems, reportOverview] = await Promise.all(
      COLLECTIONS.map((collection) => this.read(platform, collection))
    );
    return {
      orders,
      multiple_order_items: orderItems,
      products,
      productitem: productItems,
      reportoverview: reportOverview,
    };
  }

  /** Documents of one collection, or null when its file is absent. */
  async read(platform: Platform, collection: CollectionName): Promise<RawDocument[] | null> {
    const file = path.join(this.dir, collectionFile(platform, collection));

    let content: string;
    try {
      content = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return null;
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new StagingError(`Invalid JSON in ${file}`, err instanceof Error ? err.message : String(err));
    }

    if (Array.isArray(parsed)) return asRecords(parsed);
    if (typeof parsed === 'object' && parsed !== null && 'data' in parsed && Array.isArray(parsed.data)) {
      return asRecords(parsed.data);
    }
    throw new StagingError(`${file} must hold a JSON array or an object with a "data" array`);
  }
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
