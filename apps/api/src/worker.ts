import { closePool } from "./db";
import { errorMessage, logError, logInfo } from "./logger";
import { createReviewService } from "./service";
import { startSlaChecker } from "./sla-checker";

const SHUTDOWN_TIMEOUT_MS = Number(process.env.SHUTDOWN_TIMEOUT_MS) || 15_000;

function main(): void {
  const service = createReviewService();
  const timer = startSlaChecker(service);
  let isShuttingDown = false;

  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logInfo("Shutting down SLA worker", { signal, timeoutMs: SHUTDOWN_TIMEOUT_MS });

    const forceExit = setTimeout(() => {
      logError("Graceful shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    clearInterval(timer);
    try {
      await service.engine.flushNotifications();
      await closePool();
      clearTimeout(forceExit);
      logInfo("Graceful shutdown complete");
      process.exit(0);
    } catch (err) {
      clearTimeout(forceExit);
      logError("Error during shutdown", { error: errorMessage(err) });
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main();
