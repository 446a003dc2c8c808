import { Router, Request, Response } from "express";
import type { HealthResponse } from "../types/api";

export const healthRouter = Router();

// Liveness
healthRouter.get("/", (_req: Request, res: Response) => {
  const payload: HealthResponse = { status: "ok", timestamp: new Date().toISOString() };
  res.json(payload);
});
