// ---------------------------------------------------------------------------
// Test helpers — shared across the route tests
// ---------------------------------------------------------------------------

import { type App, buildApp } from "../app.js";

/**
 * Build an app without TLS for `inject`-driven tests. Nothing binds a port.
 */
export async function getTestApp(): Promise<App> {
  const app = await buildApp({
    env: {
      LOG_LEVEL: "silent",
      COMPUTE_POOL_SIZE: 2,
    },
  });
  await app.ready();
  return app;
}
