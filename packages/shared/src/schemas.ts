import { z } from "zod";
import { FIBONACCI_DEFAULT_N, FIBONACCI_MAX_N } from "./fibonacci.js";

export const U32_MAX = 0xffff_ffff;

// ---------------------------------------------------------------------------
// Query parameters
// ---------------------------------------------------------------------------

/** Textual unsigned 32-bit integer, as it arrives in a query string. */
export const UnsignedIntParam = z
  .string()
  .regex(/^\+?\d+$/, "Expected an unsigned integer")
  .transform(Number)
  .refine((value) => value <= U32_MAX, {
    message: `Expected an integer no greater than ${U32_MAX}`,
  });

export const FibonacciQuery = z
  .object({
    n: UnsignedIntParam.optional(),
  })
  .transform(({ n }) => ({ n: n ?? FIBONACCI_DEFAULT_N }));
export type FibonacciQuery = z.infer<typeof FibonacciQuery>;

// ---------------------------------------------------------------------------
// Responses
// ---------------------------------------------------------------------------

export const HealthResponse = z.object({
  status: z.literal("ok"),
  message: z.string(),
});
export type HealthResponse = z.infer<typeof HealthResponse>;

export const FibonacciResponse = z.object({
  n: z.number().int().min(0).max(FIBONACCI_MAX_N),
  result: z.bigint().nonnegative(),
  message: z.string(),
});
export type FibonacciResponse = z.infer<typeof FibonacciResponse>;
