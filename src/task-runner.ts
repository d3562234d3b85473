import "dotenv/config";
import { createLogger } from "./logger.js";
import { onShutdownSignal, createRuntime } from "./runtime.js";
import { loadConfig } from "./tasks/config.js";

async function main() {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, "[task-runner]");
  const runtime = createRuntime(config, logger);

  runtime.manager.start();

  onShutdownSignal(logger, async () => {
    const summary = await runtime.manager.stop();
    if (!summary.graceful) {
      logger.warn(`exiting with ${summary.abandonedTaskIds.length} task(s) left for redelivery`);
    }
    runtime.close();
  });
}

main().catch((e) => {
  console.error("[task-runner] fatal:", e);
  process.exit(1);
});
