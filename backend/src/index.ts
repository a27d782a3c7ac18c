import { createApp } from "./app";
import { config } from "./config";
import { createAppContext } from "./context";
import { startRefreshJobs } from "./polling/startRefresh";
import { describeError, logger } from "./utils/logger";

const main = async () => {
  const context = createAppContext(config);
  await context.redis.connect();
  context.schedule.load(true);
  await context.crowd.hydrate();

  const app = createApp(context);
  const refresh = startRefreshJobs(context);

  const server = app.listen(config.port, () => {
    logger.info(`Railwatch backend listening on http://localhost:${config.port}`, {
      admin: config.enableAdmin,
      crowdPersistence: context.crowd.persistenceKind,
    });
  });

  const shutdown = () => {
    logger.info("Shutting down server...");
    refresh.stop();
    server.close(() => {
      void context.redis
        .disconnect()
        .catch((error: unknown) => logger.warn("Redis disconnect failed", { message: describeError(error) }))
        .finally(() => process.exit(0));
    });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
};

main().catch((error: unknown) => {
  logger.error("Failed to start backend", { message: describeError(error) });
  process.exit(1);
});
