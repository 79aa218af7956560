/**
 * Runner entry point.
 *
 * Starts the demo jobs and runs until SIGINT/SIGTERM, or until RUN_FOR_MS
 * elapses when it is set.
 */

import { loadRunnerConfig } from "./config.js";
import { initRunnerLogging } from "./logging.js";
import { startApp } from "./app.js";

function main(): void {
  const config = loadRunnerConfig();
  const logger = initRunnerLogging({ minLevel: config.logLevel, logDir: config.logDir });
  const app = startApp(config);

  const onSignal = (signal: NodeJS.Signals): void => {
    app.stop(`received ${signal}`).catch((error: unknown) => {
      logger.fatal("Shutdown failed", error);
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  void app.stopped.then(() => {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  });
}

try {
  main();
} catch (error) {
  console.error("FATAL:", error instanceof Error ? error.message : error);
  process.exit(1);
}
