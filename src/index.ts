import { ENV } from "./lib/env";
import { logger } from "./lib/logger";
import { createApp } from "./app";

const app = createApp();

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "UNHANDLED_REJECTION");
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, "UNCAUGHT_EXCEPTION");
  process.exit(1);
});

app.listen(ENV.PORT, ENV.HOST, () => {
  logger.info(
    {
      url: `http://localhost:${ENV.PORT}`,
      newsUrl: ENV.SINA_NEWS_URL,
      encoding: ENV.NEWS_ENCODING,
      timeoutMs: ENV.NEWS_TIMEOUT_MS,
    },
    "Sina news server is running"
  );
});
