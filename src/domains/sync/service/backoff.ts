/**
 * Delay before the next attempt after `failures` consecutive failures:
 * base, 2×base, 4×base … capped at max.
 */
export function computeBackoffMs(failures: number, baseMs: number, maxMs: number): number {
  if (failures <= 0) return 0;
  // Exponent capped so large failure counts cannot overflow to Infinity
  const exponent = Math.min(failures - 1, 30);
  return Math.min(baseMs * 2 ** exponent, maxMs);
}
