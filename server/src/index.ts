import { createApp } from "./app.js";
import { loadConfigFromEnvFile } from "./config.js";
import { createSeededStore } from "./store/StockCountStore.js";
import { createLogger } from "./utils/log.js";

function start(): void {
  const config = loadConfigFromEnvFile();
  const store = createSeededStore();
  const log = createLogger(config.logLevel);
  const app = createApp({ store, config, log });

  const server = app.listen(config.port, () => {
    log.info(`stock-count-server listening on http://localhost:${config.port}`, { stockCounts: store.size });
  });

  server.on("error", (err) => {
    log.error("server failed", { message: err.message, stack: err.stack });
    process.exit(1);
  });
}

start();
