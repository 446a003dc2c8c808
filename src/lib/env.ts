import * as dotenv from "dotenv";
import { z } from "zod";
dotenv.config();

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.string().optional(),
  SINA_ORIGIN: z
    .string()
    .url()
    .default("https://vip.stock.finance.sina.com.cn"),
  // {symbol} is replaced with the validated symbol
  SINA_NEWS_URL: z
    .string()
    .includes("{symbol}")
    .default(
      "https://vip.stock.finance.sina.com.cn/corp/view/vCB_AllNewsStock.php?symbol={symbol}&Page=1"
    ),
  NEWS_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  NEWS_ENCODING: z.string().default("gbk"),
});

export type Env = z.infer<typeof EnvSchema>;

/** Parses a raw environment; throws listing every bad variable. */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid environment: ${problems}`);
  }
  return parsed.data;
}

export const ENV = loadEnv();
