import { logger } from "./logger";
import { startApp } from "./app";

async function main(): Promise<void> {
  let cleanup: (() => void) | null = null;
  let exiting = false;
  const shutdown = (code: number): void => {
    if (exiting) return;
    exiting = true;
    cleanup?.();
    logger.info("Arrêt CC Follower");
    process.exit(code);
  };

  cleanup = await startApp({
    configPath: process.argv[2],
    onInputEnd: () => shutdown(0),
  });

  // Sur interruption, fermer ports et watchers proprement
  process.on("SIGINT", () => shutdown(0));
}

main().catch((err) => {
  logger.error("Erreur fatale:", err);
  process.exit(1);
});
