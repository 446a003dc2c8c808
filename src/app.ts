import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import pinoHttp from "pino-http";
import { logger } from "./lib/logger";
import { createNewsFetcher, type NewsFetcher } from "./news/fetcher";
import { docsRouter } from "./routes/docs";
import { homeRouter } from "./routes/home";
import { healthRouter } from "./routes/health";
import { newsRouter } from "./routes/news";
import type { ErrorResponse } from "./types/api";

export type AppDeps = {
  newsFetcher?: NewsFetcher;
};

function isBodyParseError(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "type" in err &&
    err.type === "entity.parse.failed"
  );
}

export function createApp(deps: AppDeps = {}) {
  const newsFetcher = deps.newsFetcher ?? createNewsFetcher();
  const app = express();

  app.use(pinoHttp({ logger }));
  app.use(cors());
  app.use(express.json());

  app.use("/", homeRouter);
  app.use("/health", healthRouter);
  app.use("/", docsRouter);
  app.use("/", newsRouter(newsFetcher));

  app.use((req: Request, res: Response) => {
    const body: ErrorResponse = { error: "NotFound", message: `No route for ${req.method} ${req.path}` };
    res.status(404).json(body);
  });

  // Express recognises error handlers by arity; `_next` must stay.
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      const body: ErrorResponse = { error: "BadRequest", message: "Malformed JSON body" };
      return res.status(400).json(body);
    }
    logger.error({ err, path: req.path }, "UNHANDLED_ROUTE_ERROR");
    const body: ErrorResponse = { error: "InternalError", message: "Server error" };
    return res.status(500).json(body);
  });

  return app;
}
