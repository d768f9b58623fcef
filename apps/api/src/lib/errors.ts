// ---------------------------------------------------------------------------
// Shared API error helpers
// ---------------------------------------------------------------------------

import type { FastifyReply } from "fastify";
import type { ZodError } from "zod";

export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

/** Certificate or key could not be loaded; the server must not start. */
export class TlsConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TlsConfigError";
  }
}

export function sendZodError(reply: FastifyReply, error: ZodError) {
  return reply.status(400).send({
    error: "Validation failed",
    details: error.issues.map((i) => ({
      path: i.path.join("."),
      message: i.message,
    })),
  });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
