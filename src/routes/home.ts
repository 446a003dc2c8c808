import { Router, Request, Response } from "express";
import { LIMITS } from "../news/config";

export const homeRouter = Router();

const PAGE = `<!DOCTYPE html>
<html>
<head>
  <meta charset="UTF-8">
  <title>Sina Finance Stock News</title>
  <style>
    body { font-family: -apple-system, "Segoe UI", Roboto, Arial, sans-serif; max-width: 800px; margin: 50px auto; padding: 20px; }
    .endpoint { background: #e8f5e9; padding: 12px; margin: 10px 0; border-left: 4px solid #4caf50; }
    code { background: #333; color: #4caf50; padding: 2px 6px; }
  </style>
</head>
<body>
  <h1>Sina Finance Stock News</h1>
  <p>Looks up the latest Sina Finance news articles for a Shanghai or Shenzhen listed stock.</p>

  <h2>Endpoints</h2>
  <div class="endpoint"><strong>GET /</strong> - this page</div>
  <div class="endpoint"><strong>GET /health</strong> - health check</div>
  <div class="endpoint">
    <strong>GET /news?symbol=sh600000&amp;limit=${LIMITS.default}</strong><br>
    <small>symbol required; limit optional, ${LIMITS.min}-${LIMITS.max}, default ${LIMITS.default}</small>
  </div>
  <div class="endpoint">
    <strong>POST /news</strong><br>
    <small>body: {"symbol": "sh600000", "limit": ${LIMITS.default}}</small>
  </div>

  <h2>API description</h2>
  <p><a href="/openapi.json">OpenAPI document</a> (/openapi.json)</p>

  <h2>Symbol format</h2>
  <ul>
    <li>Shanghai: <code>sh</code> + 6 digits, e.g. <code>sh600000</code></li>
    <li>Shenzhen: <code>sz</code> + 6 digits, e.g. <code>sz000001</code></li>
  </ul>
</body>
</html>`;

homeRouter.get("/", (_req: Request, res: Response) => {
  res.type("html").send(PAGE);
});
