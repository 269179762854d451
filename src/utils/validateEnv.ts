import { cleanEnv, makeValidator, num, port, str, url, EnvError } from "envalid";

const toleranceValidator = makeValidator((input: string) => {
  const value = parseFloat(input);
  if (Number.isNaN(value) || value < 0 || value > 1) {
    throw new EnvError(`Invalid tolerance: ${input}`);
  }
  return value;
});

const positiveInt = makeValidator((input: string) => {
  const value = Number(input);
  if (!Number.isInteger(value) || value < 1) {
    throw new EnvError(`Expected a positive integer: ${input}`);
  }
  return value;
});

const namespaceValidator = makeValidator((input: string) => {
  if (!/^[^.\s]+\.[^\s]+$/.test(input)) {
    throw new EnvError(`Invalid namespace format: ${input}`);
  }
  return input;
});

const validateEnv = () => {
  cleanEnv(process.env, {
    NODE_ENV: str({ choices: ["development", "production", "test"], default: "development" }),
    PORT: port({ default: 3000 }),
    MONGO_URI: url({ default: "mongodb://mongos:27017" }),
    COLLECTION: namespaceValidator({ default: "marketplace.products" }),
    PRIMARY_FIELD: str({ default: "category_id" }),
    TIEBREAKER_FIELD: str({ default: "product_id" }),
    KEY_DOMAIN_MIN: num({ default: 0 }),
    KEY_DOMAIN_MAX: num({ default: 99 }),
    SHARD_COUNT: positiveInt({ default: 3 }),
    SPLIT_COUNT: positiveInt({ default: 99 }),
    TOLERANCE: toleranceValidator({ default: 0.05 }),
    CONCURRENCY: positiveInt({ default: 4 }),
    RETRY_ATTEMPTS: positiveInt({ default: 5 }),
    RETRY_BASE_DELAY_MS: num({ default: 200 }),
    RETRY_MAX_DELAY_MS: num({ default: 5000 }),
    OPERATION_TIMEOUT_MS: positiveInt({ default: 60000 }),
    RUN_HISTORY_LIMIT: positiveInt({ default: 100 }),
  });
};

export default validateEnv;
