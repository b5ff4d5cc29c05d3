import { loadConfigFromEnvironment } from "./config";
import { Dashboard } from "./dashboard";
import { createConsoleLogger } from "./logger";
import { createDashboardServer } from "./server";

async function main(): Promise<void> {
  const config = loadConfigFromEnvironment();
  const log = createConsoleLogger(config.LOG_LEVEL);

  const dashboard = new Dashboard({ logger: log });
  const server = createDashboardServer(dashboard, {
    staticDir: config.STATIC_DIR,
    logger: log
  });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, "Graceful shutdown started");
    try {
      await server.close();
    } catch (error) {
      log.error({ err: error }, "Server close failed");
    }
    process.exit(0);
  };

  process.once("SIGINT", () => void shutdown("SIGINT"));
  process.once("SIGTERM", () => void shutdown("SIGTERM"));

  const port = await server.listen(config.PORT, config.HOST);
  log.info({}, `Dashboard listening on http://localhost:${port}`);
}

main().catch((error) => {
  console.error("Fatal startup error", error);
  process.exit(1);
});
