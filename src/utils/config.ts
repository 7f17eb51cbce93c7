import Joi from "joi";
import os from "os";

export interface AdapterConfig {
  logLevel: string;
  tempDir: string;
  tempPrefix: string;
  httpTimeoutMs: number;
}

interface AdapterEnv {
  LOG_LEVEL: string;
  ADAPTER_TEMP_DIR: string;
  ADAPTER_TEMP_PREFIX: string;
  ADAPTER_HTTP_TIMEOUT_MS: number;
}

const envSchema = Joi.object<AdapterEnv>({
  LOG_LEVEL: Joi.string()
    .valid("error", "warn", "info", "http", "verbose", "debug", "silly")
    .empty("")
    .default("info"),
  ADAPTER_TEMP_DIR: Joi.string()
    .empty("")
    .default(() => os.tmpdir()),
  ADAPTER_TEMP_PREFIX: Joi.string()
    .pattern(/^[A-Za-z0-9._-]+$/)
    .empty("")
    .default("lfscustomdl"),
  ADAPTER_HTTP_TIMEOUT_MS: Joi.number().integer().min(0).empty("").default(0),
}).unknown(true);

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AdapterConfig {
  const { error, value } = envSchema.validate(env, {
    abortEarly: false,
    convert: true,
  });

  if (error) {
    const details = error.details.map((detail) => detail.message).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return {
    logLevel: value.LOG_LEVEL,
    tempDir: value.ADAPTER_TEMP_DIR,
    tempPrefix: value.ADAPTER_TEMP_PREFIX,
    httpTimeoutMs: value.ADAPTER_HTTP_TIMEOUT_MS,
  };
}
