// ---------------------------------------------------------------------------
// Compute routes: CPU-bound work, offloaded to the worker pool
// ---------------------------------------------------------------------------

import {
  FibonacciQuery,
  type FibonacciResponse,
  clampFibonacciN,
} from "@compute-bench/shared";
import type { App } from "../app.js";
import { sendZodError } from "../lib/errors.js";

// fast-json-stringify writes bigint integers as exact digits
const fibonacciResponseSchema = {
  type: "object",
  properties: {
    n: { type: "integer" },
    result: { type: "integer" },
    message: { type: "string" },
  },
  required: ["n", "result", "message"],
} as const;

export default async function computeRoutes(app: App) {
  // -----------------------------------------------------------------
  // GET /api/compute/fibonacci?n=...
  // -----------------------------------------------------------------
  app.get(
    "/api/compute/fibonacci",
    { schema: { response: { 200: fibonacciResponseSchema } } },
    async (request, reply) => {
      const parsed = FibonacciQuery.safeParse(request.query);
      if (!parsed.success) return sendZodError(reply, parsed.error);

      const n = clampFibonacciN(parsed.data.n);
      const result = await app.computePool.run(n);

      const body: FibonacciResponse = {
        n,
        result,
        message: `Fibonacci number at position ${n}`,
      };
      return reply.send(body);
    },
  );
}
