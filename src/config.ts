import Joi from "joi";
import os from "os";
import path from "path";
import { ConfigError } from "./utils/errors";
import { normalizeKeyPrefix } from "./utils/keys";

export interface S3Config {
  bucket: string;
  region: string;
  endpoint?: string;
  verifyTls: boolean;
  forcePathStyle: boolean;
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  keyPrefix: string;
}

export interface AppConfig {
  s3: S3Config;
  uploadConcurrency: number;
  stagingDir: string;
  captureDir: string;
  broker: {
    enabled: boolean;
    redisUrl: string;
    channel: string;
  };
  http: {
    enabled: boolean;
    port: number;
    apiKey?: string;
  };
  logLevel: string;
}

interface RawEnv {
  S3_BUCKET: string;
  S3_REGION: string;
  S3_ENDPOINT?: string;
  S3_VERIFY_TLS: boolean;
  S3_FORCE_PATH_STYLE?: boolean;
  S3_ACCESS_KEY_ID?: string;
  S3_SECRET_ACCESS_KEY?: string;
  S3_KEY_PREFIX: string;
  UPLOAD_CONCURRENCY: number;
  STAGING_DIR?: string;
  CAPTURE_DIR: string;
  REDIS_URL: string;
  EVENTS_CHANNEL: string;
  BROKER_ENABLED: boolean;
  HTTP_ENABLED: boolean;
  SERVER_PORT: number;
  SERVER_API_KEY?: string;
  LOG_LEVEL: string;
}

const envSchema = Joi.object<RawEnv>({
  S3_BUCKET: Joi.string().required(),
  S3_REGION: Joi.string().default("us-east-1"),
  S3_ENDPOINT: Joi.string().uri({ scheme: ["http", "https"] }).optional(),
  S3_VERIFY_TLS: Joi.boolean().default(true),
  S3_FORCE_PATH_STYLE: Joi.boolean().optional(),
  S3_ACCESS_KEY_ID: Joi.string().optional(),
  S3_SECRET_ACCESS_KEY: Joi.string().optional(),
  S3_KEY_PREFIX: Joi.string().allow("").default(""),
  UPLOAD_CONCURRENCY: Joi.number().integer().min(1).default(10),
  STAGING_DIR: Joi.string().optional(),
  CAPTURE_DIR: Joi.string().default("downloads"),
  REDIS_URL: Joi.string()
    .uri({ scheme: ["redis", "rediss"] })
    .default("redis://localhost:6379"),
  EVENTS_CHANNEL: Joi.string().default("honeypot:events"),
  BROKER_ENABLED: Joi.boolean().default(true),
  HTTP_ENABLED: Joi.boolean().default(true),
  SERVER_PORT: Joi.number().port().default(8080),
  SERVER_API_KEY: Joi.string().optional(),
  LOG_LEVEL: Joi.string()
    .valid("error", "warn", "info", "http", "verbose", "debug", "silly")
    .default("info"),
})
  .and("S3_ACCESS_KEY_ID", "S3_SECRET_ACCESS_KEY")
  .unknown(true);

/**
 * Validates the environment and turns it into an AppConfig. Empty strings
 * count as unset, so `S3_ENDPOINT=` in a .env file behaves like omitting it.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present: Record<string, string> = {};
  for (const [name, value] of Object.entries(env)) {
    if (value !== undefined && (value !== "" || name === "S3_KEY_PREFIX")) {
      present[name] = value;
    }
  }

  const { error, value } = envSchema.validate(present, {
    abortEarly: false,
    convert: true,
  });
  if (error) {
    throw new ConfigError(`Invalid configuration: ${error.message}`);
  }

  const credentials =
    value.S3_ACCESS_KEY_ID && value.S3_SECRET_ACCESS_KEY
      ? {
          accessKeyId: value.S3_ACCESS_KEY_ID,
          secretAccessKey: value.S3_SECRET_ACCESS_KEY,
        }
      : undefined;

  return {
    s3: {
      bucket: value.S3_BUCKET,
      region: value.S3_REGION,
      endpoint: value.S3_ENDPOINT,
      verifyTls: value.S3_VERIFY_TLS,
      forcePathStyle: value.S3_FORCE_PATH_STYLE ?? value.S3_ENDPOINT !== undefined,
      credentials,
      keyPrefix: normalizeKeyPrefix(value.S3_KEY_PREFIX),
    },
    uploadConcurrency: value.UPLOAD_CONCURRENCY,
    stagingDir: value.STAGING_DIR ?? os.tmpdir(),
    captureDir: path.resolve(value.CAPTURE_DIR),
    broker: {
      enabled: value.BROKER_ENABLED,
      redisUrl: value.REDIS_URL,
      channel: value.EVENTS_CHANNEL,
    },
    http: {
      enabled: value.HTTP_ENABLED,
      port: value.SERVER_PORT,
      apiKey: value.SERVER_API_KEY,
    },
    logLevel: value.LOG_LEVEL,
  };
}
