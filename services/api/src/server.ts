import { createApp } from "./app";
import { APP_NAME, APP_VERSION, loadConfig } from "./lib/config";
import { createLogger, setLogLevel } from "./lib/log";

const config = loadConfig();
setLogLevel(config.logLevel);

const log = createLogger("server");
const app = createApp({ config });

const server = app.listen(config.port, config.host, () => {
  log.info(`Starting ${APP_NAME} v${APP_VERSION} on ${config.host}:${config.port}`);
  log.info(`Debug mode: ${config.debug}; artifacts in ${config.artifactsDir}`);
});

const shutdown = (signal: string) => {
  log.info(`Received ${signal}, shutting down ${APP_NAME}`);
  server.close(() => process.exit(0));
};
process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));
