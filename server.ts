import express from "express";
import { createServer as createViteServer } from "vite";
import path from "path";
import { fileURLToPath } from "url";
import { loadConfig } from "./server/config";
import { DatasetCache } from "./server/cache";
import { createApp } from "./server/app";

// ---------------------------------------------------------------------------
// SERVER STARTUP — The canonical dataset is loaded once up front and shared by
// every request through the cache. Dev mode embeds Vite as middleware;
// production serves the pre-built dist/ folder with an SPA fallback.
// ---------------------------------------------------------------------------
async function startServer() {
  const config = loadConfig();
  const cache = new DatasetCache(config.source);
  const app = createApp(cache);

  // A missing year or bad month aborts startup; there is no partial dataset.
  cache.get();

  if (!config.production) {
    const vite = await createViteServer({
      server: { middlewareMode: true },
      appType: "spa",
    });
    app.use(vite.middlewares);
  } else {
    const __filename = fileURLToPath(import.meta.url);
    const __dirname = path.dirname(__filename);
    const distPath = path.join(__dirname, "dist");

    app.use(express.static(distPath));
    app.get("*", (_req, res) => {
      res.sendFile(path.join(distPath, "index.html"));
    });
  }

  app.listen(config.port, "0.0.0.0", () => {
    console.log(`Server running on http://localhost:${config.port}`);
  });
}

startServer().catch(err => {
  console.error("Failed to start server:", err instanceof Error ? err.message : err);
  process.exit(1);
});
