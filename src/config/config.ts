import { config } from "dotenv";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import Joi from "joi";
import { ConfigError } from "../utils/errors.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: join(__dirname, "../../.env") });

type EnvVars = {
  NODE_ENV: "production" | "development" | "test";
  PORT: number;
  LOG_LEVEL: string;
  SEC_USER_AGENT: string;
  SEC_REQUEST_TIMEOUT_MS: number;
  SEC_REQUEST_DELAY_MS: number;
  IDENTITY_KEY_LENGTH: number;
  EXPORT_DIR: string;
  DEFAULT_CIK: string;
};

const envVarsSchema = Joi.object<EnvVars>()
  .keys({
    NODE_ENV: Joi.string().valid("production", "development", "test").default("development"),
    PORT: Joi.number().port().default(8000),
    LOG_LEVEL: Joi.string()
      .valid("error", "warn", "info", "http", "verbose", "debug", "silly")
      .default("info"),
    SEC_USER_AGENT: Joi.string()
      .pattern(/@/, "contact email")
      .default("Investment Research analysis@example.com")
      .description("SEC requires a contactable email in the User-Agent"),
    SEC_REQUEST_TIMEOUT_MS: Joi.number().integer().min(1).default(30000),
    SEC_REQUEST_DELAY_MS: Joi.number()
      .integer()
      .min(0)
      .default(200)
      .description("pause between two SEC requests"),
    IDENTITY_KEY_LENGTH: Joi.number()
      .integer()
      .min(6)
      .max(9)
      .default(8)
      .description("CUSIP characters used to aggregate share classes"),
    EXPORT_DIR: Joi.string().default("."),
    DEFAULT_CIK: Joi.string()
      .pattern(/^\d{1,10}$/)
      .default("0001067983"),
  })
  .unknown();

const validated = envVarsSchema.prefs({ errors: { label: "key" } }).validate(process.env);

if (validated.error) {
  throw new ConfigError(`Config validation error: ${validated.error.message}`);
}

const envVars = validated.value;

export const env = envVars.NODE_ENV;
export const port = envVars.PORT;
export const logLevel = envVars.LOG_LEVEL;
export const sec = {
  userAgent: envVars.SEC_USER_AGENT,
  requestTimeoutMs: envVars.SEC_REQUEST_TIMEOUT_MS,
  requestDelayMs: envVars.SEC_REQUEST_DELAY_MS,
};
export const analysis = {
  identityKeyLength: envVars.IDENTITY_KEY_LENGTH,
  exportDir: envVars.EXPORT_DIR,
  defaultCik: envVars.DEFAULT_CIK,
};
