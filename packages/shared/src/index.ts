// ---------------------------------------------------------------------------
// @compute-bench/shared — barrel export
// ---------------------------------------------------------------------------

// Fibonacci kernel
export {
  FIBONACCI_DEFAULT_N,
  FIBONACCI_MAX_N,
  clampFibonacciN,
  fibonacci,
} from "./fibonacci.js";

// Wire schemas
export {
  FibonacciQuery,
  FibonacciResponse,
  HealthResponse,
  U32_MAX,
  UnsignedIntParam,
} from "./schemas.js";
