import { config } from "dotenv";
config({ path: `.env.${process.env.NODE_ENV || "development"}.local` });

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? "", 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const toFloat = (value: string | undefined, fallback: number): number => {
  const parsed = parseFloat(value ?? "");
  return Number.isNaN(parsed) ? fallback : parsed;
};

export const CREDENTIALS = process.env.CREDENTIALS === "true";
export const NODE_ENV = process.env.NODE_ENV || "development";
export const LOG_FORMAT = process.env.LOG_FORMAT || "dev";
export const LOG_DIR = process.env.LOG_DIR;
export const ORIGIN = process.env.ORIGIN || "*";
export const IP = process.env.IP || "0.0.0.0";
export const PORT = toInt(process.env.PORT, 3000);

// cluster
export const MONGO_URI = process.env.MONGO_URI || "mongodb://mongos:27017";
export const COLLECTION = process.env.COLLECTION || "marketplace.products";
export const PRIMARY_FIELD = process.env.PRIMARY_FIELD || "category_id";
export const TIEBREAKER_FIELD = process.env.TIEBREAKER_FIELD || "product_id";
export const KEY_DOMAIN_MIN = toInt(process.env.KEY_DOMAIN_MIN, 0);
export const KEY_DOMAIN_MAX = toInt(process.env.KEY_DOMAIN_MAX, 99);

// planning
export const SHARD_COUNT = toInt(process.env.SHARD_COUNT, 3);
export const SPLIT_COUNT = toInt(process.env.SPLIT_COUNT, 99);
export const TOLERANCE = toFloat(process.env.TOLERANCE, 0.05);
export const CONCURRENCY = toInt(process.env.CONCURRENCY, 4);

// every split/move/balancer call is bounded by these
export const RETRY_ATTEMPTS = toInt(process.env.RETRY_ATTEMPTS, 5);
export const RETRY_BASE_DELAY_MS = toInt(process.env.RETRY_BASE_DELAY_MS, 200);
export const RETRY_MAX_DELAY_MS = toInt(process.env.RETRY_MAX_DELAY_MS, 5000);
export const RUN_HISTORY_LIMIT = toInt(process.env.RUN_HISTORY_LIMIT, 100);
export const OPERATION_TIMEOUT_MS = toInt(process.env.OPERATION_TIMEOUT_MS, 60000);
