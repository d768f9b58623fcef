// ---------------------------------------------------------------------------
// Fibonacci kernel: iterative, 64-bit unsigned wraparound
// ---------------------------------------------------------------------------

/** Position used when the query omits `n`. */
export const FIBONACCI_DEFAULT_N = 30;

/** Requested positions above this are silently reduced to it. */
export const FIBONACCI_MAX_N = 50;

/**
 * Returns F(n) with F(0) = 0 and F(1) = 1. Every addition wraps modulo 2^64.
 *
 * The body must stay self-contained: its source text is evaluated inside
 * compute worker threads, where no module scope is available.
 */
export function fibonacci(n: number): bigint {
  if (n === 0) return 0n;

  let a = 0n;
  let b = 1n;
  for (let i = 2; i <= n; i++) {
    const next = BigInt.asUintN(64, a + b);
    a = b;
    b = next;
  }
  return b;
}

export function clampFibonacciN(n: number): number {
  return Math.min(n, FIBONACCI_MAX_N);
}
