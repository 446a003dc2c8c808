import { Router, Request, Response } from "express";
import { buildOpenApiDocument } from "../lib/openapi";

export const docsRouter = Router();

const API_VERSION = "1.0.0";

// Plugin hosts import the service from this document.
docsRouter.get("/openapi.json", (_req: Request, res: Response) => {
  res.json(buildOpenApiDocument(API_VERSION));
});
