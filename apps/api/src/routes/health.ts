import type { HealthResponse } from "@compute-bench/shared";
import type { App } from "../app.js";

const HEALTH_MESSAGE = "Rust backend is running";

export default async function healthRoutes(app: App) {
  app.get("/api/health", async (): Promise<HealthResponse> => ({
    status: "ok",
    message: HEALTH_MESSAGE,
  }));
}
