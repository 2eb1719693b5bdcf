import { createConsoleLogger, createResolverFromEnv, describeError } from "query-engine";
import { loadApiEnv } from "../env";
import { createApp } from "./app";

try {
  const env = loadApiEnv();
  const logger = createConsoleLogger(env.LOG_LEVEL, "API");
  const app = createApp(createResolverFromEnv(env, logger), { batchConcurrency: env.BATCH_CONCURRENCY, logger });

  app.listen(env.PORT, () => {
    logger.info(`listening on http://localhost:${env.PORT}`);
    logger.info(`resolve mode: ${env.RESOLVE_MODE}`);
  });
} catch (err) {
  createConsoleLogger("error", "API").error(describeError(err));
  process.exit(1);
}
