import { readFileSync } from "fs";
import { z } from "zod";
import { ConfigError } from "./common/errors";
import { fromHex } from "./common/hex";
import { MAC_TRUNCATION_LENGTH } from "./beacon/signature";
import { TELEMETRY_SERVICE_UUID } from "./beacon/extractor";
import { DEFAULT_DB_PATH } from "./db/connection";

export const configSchema = z.object({
  scanner: z
    .object({
      deviceName: z.string().min(1).default("ESP32 TLM Beacon"),
      serviceUuid: z.string().min(4).default(TELEMETRY_SERVICE_UUID),
      allowDuplicates: z.boolean().default(true),
    })
    .default({}),
  security: z
    .object({
      secretKey: z.string().optional(),
      secretKeyEncoding: z.enum(["utf8", "hex"]).default("utf8"),
      macLength: z.number().int().min(1).max(32).default(MAC_TRUNCATION_LENGTH),
    })
    .default({}),
  database: z
    .object({
      path: z.string().min(1).default(DEFAULT_DB_PATH),
    })
    .default({}),
  ui: z
    .object({
      enabled: z.boolean().default(true),
      refreshIntervalMs: z.number().int().positive().default(100),
      flashDurationMs: z.number().int().positive().default(2500),
      logLines: z.number().int().positive().default(200),
    })
    .default({}),
  logging: z
    .object({
      file: z.string().min(1).default("./data/charger-telemetry.log"),
    })
    .default({}),
});

export type Config = z.infer<typeof configSchema>;

export type LoadConfigOptions = {
  /** Explicit config file; otherwise CONFIG_PATH, otherwise defaults only. */
  path?: string;
  env?: NodeJS.ProcessEnv;
  /** The scan command cannot run without a key; the report command can. */
  requireSecret?: boolean;
};

function readConfigFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (e) {
    throw new ConfigError(`Cannot read config file ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
  try {
    return JSON.parse(text);
  } catch (e) {
    throw new ConfigError(`Config file ${path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
}

export function parseConfig(raw: unknown): Config {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const path = options.path ?? env.CONFIG_PATH;
  const config = parseConfig(path ? readConfigFile(path) : {});

  if (env.BEACON_SECRET_KEY) config.security.secretKey = env.BEACON_SECRET_KEY;
  if (env.DUCKDB_PATH) config.database.path = env.DUCKDB_PATH;

  if (options.requireSecret && !config.security.secretKey) {
    throw new ConfigError(
      "No secret key configured; set security.secretKey or BEACON_SECRET_KEY"
    );
  }
  return config;
}

/** The HMAC key bytes, decoded according to `secretKeyEncoding`. */
export function resolveSecret(config: Config): string | Uint8Array {
  const { secretKey, secretKeyEncoding } = config.security;
  if (!secretKey) {
    throw new ConfigError("No secret key configured");
  }
  if (secretKeyEncoding === "hex") {
    try {
      return fromHex(secretKey);
    } catch (e) {
      throw new ConfigError(`security.secretKey is not valid hex: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  return secretKey;
}
