// ──────────────────────────────────────────
// Shared: cent arithmetic for warehouse money columns
// ──────────────────────────────────────────

export function toCents(value: number): number {
  return Math.round(value * 100);
}

export function fromCents(cents: number): number {
  return cents / 100;
}

/** Two-decimal rendering used by every money column. */
export function formatMoney(value: number): string {
  return fromCents(toCents(value)).toFixed(2);
}

/**
 * Splits `totalCents` into `parts` integer shares that sum back exactly.
 * Earlier shares carry the remainder: 1000 over 3 → [334, 333, 333].
 */
export function splitCents(totalCents: number, parts: number): number[] {
  if (parts <= 0) return [];
  const sign = totalCents < 0 ? -1 : 1;
  const abs = Math.abs(totalCents);
  const base = Math.floor(abs / parts);
  const remainder = abs - base * parts;
  return Array.from({ length: parts }, (_, i) => sign * (base + (i < remainder ? 1 : 0)));
}

/**
 * Distributes `totalCents` proportionally to `weights` using the largest
 * remainder method. Ties go to the lower index. Zero total weight falls back
 * to an even split.
 */
export function allocateCents(totalCents: number, weights: number[]): number[] {
  if (weights.length === 0) return [];
  const weightSum = weights.reduce((sum, w) => sum + Math.max(w, 0), 0);
  if (weightSum <= 0) return splitCents(totalCents, weights.length);

  const sign = totalCents < 0 ? -1 : 1;
  const abs = Math.abs(totalCents);
  const exact = weights.map((w) => (abs * Math.max(w, 0)) / weightSum);
  const shares = exact.map(Math.floor);
  let leftover = abs - shares.reduce((sum, s) => sum + s, 0);

  const order = exact
    .map((value, index) => ({ index, fraction: value - Math.floor(value) }))
    .sort((a, b) => b.fraction - a.fraction || a.index - b.index);

  for (const { index } of order) {
    if (leftover <= 0) break;
    shares[index] += 1;
    leftover -= 1;
  }

  return shares.map((s) => sign * s);
}
