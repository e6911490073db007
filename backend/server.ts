import "dotenv/config";
import { createApp } from "./app";
import { createServices } from "./services";
import { loadConfig } from "./shared/config";
import { createLogger } from "./shared/logger";

const log = createLogger("server");

async function startServer() {
  const config = loadConfig();
  const services = await createServices({ dataDir: config.dataDir });
  // Materialize the settings record before the first request needs it.
  await services.settings.get();

  const app = createApp(services, {
    tokens: { secret: config.jwtSecret, ttlSeconds: config.tokenTtlSeconds },
    corsOrigin: config.corsOrigin,
  });

  app.listen(config.port, () => {
    log.info(`API server listening on http://localhost:${config.port}`, { dataDir: config.dataDir });
  });
}

startServer().catch((err) => {
  log.error("Failed to start server", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
