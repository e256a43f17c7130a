import { config } from "./config/env";
import { createApp } from "./app";
import { Dispatcher } from "./registry/dispatcher";
import { ServiceRegistry } from "./registry/serviceRegistry";
import { registerServices } from "./tools";
import { logger } from "./utils/logger";

const registry = new ServiceRegistry();
registerServices(registry);

const dispatcher = new Dispatcher(registry, { timeoutMs: config.handlerTimeoutMs });
const app = createApp({ registry, dispatcher });

const server = app.listen(config.port, () => {
  const { services, tools } = registry.size;
  logger.info(
    `Tool gateway listening on :${config.port} (${config.nodeEnv}, ${services} services, ${tools} tools)`
  );
});

function shutdown(signal: NodeJS.Signals) {
  logger.info(`${signal} received, shutting down`);
  server.close((err) => {
    registry.dispose();
    if (err) {
      logger.error({ err }, "Error while closing the HTTP server");
      process.exitCode = 1;
    }
  });
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
