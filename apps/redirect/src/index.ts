/**
 * Hopline Redirect Service entry point.
 */

import { createLogger } from "@hopline/logger";
import { loadConfig, validateConfig } from "./config.js";
import { startServer } from "./server.js";

const log = createLogger("main");

function main(): void {
  const config = loadConfig();
  validateConfig(config);

  const shutdown = startServer(config);

  let stopping = false;
  const stop = (signal: string) => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, "signal received");
    shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ err }, "shutdown failed");
        process.exit(1);
      });
  };

  process.on("SIGTERM", () => stop("SIGTERM"));
  process.on("SIGINT", () => stop("SIGINT"));

  process.on("unhandledRejection", (reason) => {
    // Log and continue; background tasks already catch their own failures
    log.error({ err: reason }, "unhandled rejection");
  });
}

try {
  main();
} catch (err) {
  log.fatal({ err }, "failed to start");
  process.exit(1);
}
