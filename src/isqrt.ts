/**
 * Exact integer square root of a perfect square.
 *
 * Scans `t` upward from zero, so the result is never subject to floating-point rounding.
 *
 * @param n - The value `t * t`.
 * @returns `t` when `t * t === n` for some `t` in `[0, n)`, otherwise `0`.
 */
export function isqrt(n: number): number {
  if (!Number.isSafeInteger(n) || n < 0) {
    return 0;
  }
  for (let t = 0; t < n && t * t <= n; t++) {
    if (t * t === n) {
      return t;
    }
  }
  return 0;
}
