import { z } from "zod";
import dotenv from "dotenv";

dotenv.config();

const positiveInt = z.coerce.number().int().positive();

const serverSchema = z.object({
  port: positiveInt.default(3000),
  host: z.string().default("0.0.0.0"),
  nodeEnv: z.string().default("development"),
  corsOrigin: z.string().optional(),
});

const neo4jSchema = z.object({
  uri: z.string().default("bolt://localhost:7687"),
  user: z.string().default("neo4j"),
  password: z.string().min(1, "NEO4J_PASSWORD is required"),
  database: z.string().default("neo4j"),
  queryTimeoutMs: positiveInt.default(30_000),
  connectionTimeoutMs: positiveInt.default(5_000),
});

const sqliteSchema = z.object({
  path: z.string().default("./data/embeds.db"),
  busyTimeoutMs: positiveInt.default(5_000),
});

const embedSchema = z
  .object({
    baseUrl: z.string().url().optional(),
    defaultExpiryDays: positiveInt.default(7),
    maxExpiryDays: positiveInt.default(90),
  })
  .refine((e) => e.defaultExpiryDays <= e.maxExpiryDays, {
    message: "DEFAULT_TOKEN_EXPIRY_DAYS must not exceed MAX_TOKEN_EXPIRY_DAYS",
    path: ["defaultExpiryDays"],
  });

const logSchema = z.object({
  level: z.string().default("info"),
});

const configSchema = z
  .object({
    server: serverSchema,
    neo4j: neo4jSchema,
    sqlite: sqliteSchema,
    embed: embedSchema,
    log: logSchema,
  })
  .transform((c) => ({
    ...c,
    embed: { ...c.embed, baseUrl: resolveBaseUrl(c.embed.baseUrl, c.server.port) },
  }));

const storeConfigSchema = z
  .object({
    server: serverSchema,
    sqlite: sqliteSchema,
    embed: embedSchema,
    log: logSchema,
  })
  .transform((c) => ({
    sqlite: c.sqlite,
    log: c.log,
    embed: { ...c.embed, baseUrl: resolveBaseUrl(c.embed.baseUrl, c.server.port) },
  }));

export type Config = z.infer<typeof configSchema>;
export type StoreConfig = z.infer<typeof storeConfigSchema>;

function resolveBaseUrl(baseUrl: string | undefined, port: number): string {
  return (baseUrl ?? `http://localhost:${port}`).replace(/\/+$/, "");
}

// Empty strings count as unset so blank `.env` entries fall back to defaults.
function env(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === "" ? undefined : value;
}

function buildRawConfig(): Record<string, unknown> {
  return {
    server: {
      port: env("PORT"),
      host: env("HOST"),
      nodeEnv: env("NODE_ENV"),
      corsOrigin: env("CORS_ORIGIN"),
    },
    neo4j: {
      uri: env("NEO4J_URI"),
      user: env("NEO4J_USER"),
      password: process.env["NEO4J_PASSWORD"] ?? "",
      database: env("NEO4J_DATABASE"),
      queryTimeoutMs: env("NEO4J_QUERY_TIMEOUT_MS"),
      connectionTimeoutMs: env("NEO4J_CONNECTION_TIMEOUT_MS"),
    },
    sqlite: {
      path: env("SQLITE_PATH"),
      busyTimeoutMs: env("SQLITE_BUSY_TIMEOUT_MS"),
    },
    embed: {
      baseUrl: env("EMBED_BASE_URL"),
      defaultExpiryDays: env("DEFAULT_TOKEN_EXPIRY_DAYS"),
      maxExpiryDays: env("MAX_TOKEN_EXPIRY_DAYS"),
    },
    log: {
      level: env("LOG_LEVEL"),
    },
  };
}

function deepFreeze<T extends object>(value: T): T {
  for (const child of Object.values(value)) {
    if (typeof child === "object" && child !== null) deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}

export function loadConfig(): Config {
  return deepFreeze(configSchema.parse(buildRawConfig()));
}

/** Config for tooling that only touches the token store, so no Neo4j credentials. */
export function loadStoreConfig(): StoreConfig {
  return deepFreeze(storeConfigSchema.parse(buildRawConfig()));
}
