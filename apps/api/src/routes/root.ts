// ---------------------------------------------------------------------------
// GET / — embedded landing page
// ---------------------------------------------------------------------------

import type { App } from "../app.js";

const LANDING_PAGE = `<!DOCTYPE html>
<html>
<head>
    <title>Rust Backend - Benchmark</title>
    <style>
        body { font-family: Arial, sans-serif; margin: 40px; background: #f5f5f5; }
        .container { background: white; padding: 30px; border-radius: 8px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
        h1 { color: #333; }
        code { background: #f4f4f4; padding: 2px 6px; border-radius: 3px; }
        .endpoint { margin: 15px 0; padding: 10px; background: #f9f9f9; border-left: 3px solid #007bff; }
    </style>
</head>
<body>
    <div class="container">
        <h1>🦀 Rust Backend API</h1>
        <p>Backend with compute-intensive endpoints for benchmarking.</p>

        <h2>Available Endpoints:</h2>
        <div class="endpoint">
            <strong>GET /api/health</strong> - Health check
        </div>
        <div class="endpoint">
            <strong>GET /api/compute/fibonacci?n=30</strong> - Compute Fibonacci number (default n=30, max n=50)
        </div>
    </div>
</body>
</html>
`;

export default async function rootRoutes(app: App) {
  app.get("/", async (_request, reply) => {
    return reply.type("text/html; charset=utf-8").send(LANDING_PAGE);
  });
}
