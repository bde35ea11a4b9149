import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { PrecedenceTable } from "../catalog/precedence.js";
import { resolvePrecedence } from "../catalog/precedence.js";
import { DEFAULT_BATCH_SIZE } from "../store/batch.js";

/** Invalid or missing configuration. Fatal: reported once, before any work. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const ConfigFileSchema = Type.Object(
  {
    batch_size: Type.Optional(
      Type.Integer({ minimum: 1, description: "Rows per upsert transaction" }),
    ),
    precedence: Type.Optional(
      Type.Record(Type.String(), Type.Array(Type.String({ minLength: 1 })), {
        description: 'Per-field source chains, e.g. { "camera_model": ["xmp:Model", "exif:Model"] }',
      }),
    ),
    url_map: Type.Optional(
      Type.String({ minLength: 1, description: "Default URL mapping file for gallery runs" }),
    ),
  },
  { additionalProperties: false },
);

export type ConfigFile = Static<typeof ConfigFileSchema>;

export type CatalogConfig = {
  dbPath: string;
  batchSize: number;
  precedence: PrecedenceTable;
  urlMapPath: string | null;
  configPath: string | null;
};

/** Parse and validate the JSON config file. Throws ConfigError. */
export function readConfigFile(configPath: string): ConfigFile {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(
      `cannot read config ${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  if (!Value.Check(ConfigFileSchema, parsed)) {
    const problems = [...Value.Errors(ConfigFileSchema, parsed)].map(
      (error) => `${error.path || "/"}: ${error.message}`,
    );
    throw new ConfigError(`invalid config ${configPath}: ${problems.join("; ")}`);
  }
  return parsed;
}

export function parseBatchSize(raw: string, source: string): number {
  const trimmed = raw.trim();
  const parsed = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${source} must be a positive integer, got "${raw}"`);
  }
  return parsed;
}

const URL_SCHEME = /^([a-z][a-z0-9+.-]+):/i;

/**
 * SQLite database location from an env value: a path, `:memory:` or a
 * `file:` URL. Any other URL scheme (a server connection string) is a
 * ConfigError; only the scheme is echoed so credentials stay out of logs.
 */
export function resolveDatabasePath(raw: string, source: string): string {
  if (raw === ":memory:") {
    return raw;
  }
  const scheme = URL_SCHEME.exec(raw)?.[1]?.toLowerCase();
  if (!scheme) {
    return path.resolve(raw);
  }
  if (scheme !== "file") {
    throw new ConfigError(`${source} must be a SQLite file path or file: URL, got a ${scheme}: URL`);
  }
  try {
    return fileURLToPath(raw);
  } catch (err) {
    throw new ConfigError(
      `${source} is not a usable file: URL: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/**
 * Resolve configuration from the environment and the optional config file.
 * Environment values win over the file; the file wins over defaults.
 */
export function loadCatalogConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  const explicitDb = env.PHOTO_CATALOG_DB?.trim();
  const rawDb = explicitDb || env.DATABASE_URL?.trim();
  if (!rawDb) {
    throw new ConfigError("PHOTO_CATALOG_DB (or DATABASE_URL) must name the catalog database");
  }
  const dbPath = resolveDatabasePath(rawDb, explicitDb ? "PHOTO_CATALOG_DB" : "DATABASE_URL");

  const rawConfigPath = env.PHOTO_CATALOG_CONFIG?.trim();
  const configPath = rawConfigPath ? path.resolve(rawConfigPath) : null;
  const file: ConfigFile = configPath ? readConfigFile(configPath) : {};

  const envBatchSize = env.PHOTO_CATALOG_BATCH_SIZE?.trim();
  const batchSize = envBatchSize
    ? parseBatchSize(envBatchSize, "PHOTO_CATALOG_BATCH_SIZE")
    : (file.batch_size ?? DEFAULT_BATCH_SIZE);

  const precedence = resolvePrecedence(file.precedence);
  if (!precedence.ok) {
    throw new ConfigError(`invalid precedence in ${configPath ?? "config"}: ${precedence.error}`);
  }

  const urlMap = env.PHOTO_CATALOG_URL_MAP?.trim() || file.url_map;
  return {
    dbPath,
    batchSize,
    precedence: precedence.table,
    urlMapPath: urlMap ? path.resolve(urlMap) : null,
    configPath,
  };
}
