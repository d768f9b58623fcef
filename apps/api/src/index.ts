// ---------------------------------------------------------------------------
// apps/api — production entry point
// ---------------------------------------------------------------------------

import "dotenv/config";
import { buildApp } from "./app.js";
import { loadEnv } from "./lib/env.js";
import { createLogger } from "./lib/logger.js";
import { type TlsMaterial, loadTlsMaterial } from "./lib/tls.js";

async function main() {
  const env = loadEnv();
  const logger = createLogger(env);

  let tls: TlsMaterial;
  try {
    tls = await loadTlsMaterial(env.TLS_CERT_PATH, env.TLS_KEY_PATH);
  } catch (err) {
    logger.fatal({ err }, "failed to load TLS configuration");
    process.exit(1);
  }

  const app = await buildApp({ env, tls, logger });

  try {
    await app.listen({ port: env.PORT, host: env.HOST });
  } catch (err) {
    app.log.fatal(err);
    process.exit(1);
  }
  app.log.info(
    `Server running on https://${env.HOST}:${env.PORT} (cert: ${env.TLS_CERT_PATH}, key: ${env.TLS_KEY_PATH})`,
  );

  // -------------------------------------------------------------------------
  // Graceful shutdown
  // -------------------------------------------------------------------------
  const shutdown = async () => {
    app.log.info("Shutting down...");
    await app.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      app.log.error(err);
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  console.error("[api] failed to start:", err);
  process.exit(1);
});
