import { fibonacci } from "@compute-bench/shared";
import { z } from "zod";
import { WorkerPool } from "./worker-pool.js";

export type FibonacciPool = WorkerPool<number, bigint>;

const FibonacciResult = z.bigint();

export function createFibonacciPool(size: number): FibonacciPool {
  return new WorkerPool({
    handler: fibonacci,
    decode: (value) => FibonacciResult.parse(value),
    size,
  });
}
