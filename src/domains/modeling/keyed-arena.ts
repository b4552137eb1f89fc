// ──────────────────────────────────────────
// Modeling: Insertion-ordered store indexed by natural key
// ──────────────────────────────────────────

import { PlatformKey } from '../../shared/types';

export function naturalKey(platformKey: PlatformKey, id: string): string {
  return `${platformKey}|${id}`;
}

/** Orders by platform, then by natural id as plain code-unit comparison. */
export function comparePlatformThenId(
  a: { platformKey: PlatformKey; id: string },
  b: { platformKey: PlatformKey; id: string }
): number {
  if (a.platformKey !== b.platformKey) return a.platformKey - b.platformKey;
  if (a.id === b.id) return 0;
  return a.id < b.id ? -1 : 1;
}

export class KeyedArena<T> {
  private items: T[] = [];
  private index = new Map<string, number>();

  constructor(private keyOf: (item: T) => string) {}

  /** Adds the item unless its key is taken. Returns whether it was added. */
  add(item: T): boolean {
    const key = this.keyOf(item);
    if (this.index.has(key)) return false;
    this.index.set(key, this.items.length);
    this.items.push(item);
    return true;
  }

  get(key: string): T | undefined {
    const position = this.index.get(key);
    return position === undefined ? undefined : this.items[position];
  }

  has(key: string): boolean {
    return this.index.has(key);
  }

  replace(item: T): void {
    const key = this.keyOf(item);
    const position = this.index.get(key);
    if (position === undefined) {
      this.add(item);
    } else {
      this.items[position] = item;
    }
  }

  values(): T[] {
    return [...this.items];
  }

  get size(): number {
    return this.items.length;
  }
}
