import "dotenv/config";
import type { Server } from "node:http";
import { createApp } from "./api/app.js";
import { createLogger } from "./logger.js";
import { onShutdownSignal, createRuntime } from "./runtime.js";
import { loadConfig } from "./tasks/config.js";

// API and worker pool in one process; run task-runner separately to scale workers out.
async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, "[server]");
  const runtime = createRuntime(config, logger);

  const app = createApp({
    queue: runtime.queue,
    group: config.group,
    deadLetters: runtime.deadLetters,
    progress: runtime.progress,
    logger: logger.child("[http]"),
  });

  runtime.manager.start();

  const server: Server = app.listen(config.http.port, config.http.host, () => {
    logger.info(`listening on http://${config.http.host}:${config.http.port}`);
  });

  onShutdownSignal(logger, async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      // open event streams would otherwise hold close() forever
      server.closeAllConnections();
    });
    await runtime.manager.stop();
    runtime.close();
  });
}

main().catch((e) => {
  console.error("[server] fatal:", e);
  process.exit(1);
});
