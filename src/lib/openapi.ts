import { LIMITS } from "../news/config";

type JsonSchema = { [key: string]: unknown };

const symbolParam = {
  type: "string",
  pattern: "^(sh|sz)\\d{6}$",
  description: "Stock symbol, case-insensitive: sh600000 (Shanghai) or sz000001 (Shenzhen)",
  example: "sh600000",
};

const limitParam = {
  type: "integer",
  minimum: LIMITS.min,
  maximum: LIMITS.max,
  default: LIMITS.default,
  description: "Number of articles to return",
};

const newsResponses: JsonSchema = {
  "200": {
    description: "News articles in listing order",
    content: { "application/json": { schema: { $ref: "#/components/schemas/NewsResponse" } } },
  },
  "400": {
    description: "InvalidSymbol or InvalidLimit",
    content: { "application/json": { schema: { $ref: "#/components/schemas/ErrorResponse" } } },
  },
  "404": {
    description: "NotFound: the listing has no usable news",
    content: { "application/json": { schema: { $ref: "#/components/schemas/ErrorResponse" } } },
  },
  "500": {
    description: "FetchError or ParseError",
    content: { "application/json": { schema: { $ref: "#/components/schemas/ErrorResponse" } } },
  },
};

/** OpenAPI 3 description of the service, served at /openapi.json. */
export function buildOpenApiDocument(version: string): JsonSchema {
  return {
    openapi: "3.0.3",
    info: {
      title: "Sina Finance Stock News",
      description: "Looks up Sina Finance news articles for Shanghai and Shenzhen listed stocks.",
      version,
    },
    paths: {
      "/": {
        get: {
          operationId: "home",
          summary: "Landing page",
          responses: { "200": { description: "HTML page", content: { "text/html": {} } } },
        },
      },
      "/health": {
        get: {
          operationId: "health",
          summary: "Health check",
          responses: {
            "200": {
              description: "Service is up",
              content: {
                "application/json": { schema: { $ref: "#/components/schemas/HealthResponse" } },
              },
            },
          },
        },
      },
      "/news": {
        get: {
          operationId: "getNews",
          summary: "Get news for a stock symbol",
          parameters: [
            { name: "symbol", in: "query", required: true, schema: symbolParam },
            { name: "limit", in: "query", required: false, schema: limitParam },
          ],
          responses: newsResponses,
        },
        post: {
          operationId: "postNews",
          summary: "Get news for a stock symbol",
          requestBody: {
            required: true,
            content: {
              "application/json": { schema: { $ref: "#/components/schemas/NewsRequest" } },
            },
          },
          responses: newsResponses,
        },
      },
    },
    components: {
      schemas: {
        NewsRequest: {
          type: "object",
          required: ["symbol"],
          properties: { symbol: symbolParam, limit: { ...limitParam, nullable: true } },
        },
        NewsArticle: {
          type: "object",
          required: ["title", "url", "date"],
          properties: {
            title: { type: "string" },
            url: { type: "string", format: "uri" },
            date: { type: "string", pattern: "^\\d{4}-\\d{2}-\\d{2}$", nullable: true },
          },
        },
        NewsResponse: {
          type: "object",
          required: ["symbol", "news_count", "articles"],
          properties: {
            symbol: { type: "string" },
            news_count: { type: "integer" },
            articles: { type: "array", items: { $ref: "#/components/schemas/NewsArticle" } },
          },
        },
        ErrorResponse: {
          type: "object",
          required: ["error", "message"],
          properties: {
            error: {
              type: "string",
              enum: [
                "InvalidSymbol",
                "InvalidLimit",
                "FetchError",
                "ParseError",
                "NotFound",
                "BadRequest",
                "InternalError",
              ],
            },
            message: { type: "string" },
          },
        },
        HealthResponse: {
          type: "object",
          required: ["status", "timestamp"],
          properties: {
            status: { type: "string", enum: ["ok"] },
            timestamp: { type: "string", format: "date-time" },
          },
        },
      },
    },
  };
}
