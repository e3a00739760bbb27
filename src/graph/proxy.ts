import neo4j from "neo4j-driver";
import type pino from "pino";
import type { GraphClient } from "./client.js";
import { toPlainValue, type Row } from "./values.js";
import {
  EmbedderError,
  InternalError,
  QueryRejectedError,
  UnavailableError,
  ValidationError,
} from "../errors.js";

export interface QueryProxyOptions {
  /** Server-side transaction timeout applied to every proxied query. */
  queryTimeoutMs: number;
}

export interface QueryProxy {
  execute(query: string, params?: unknown): Promise<Row[]>;
}

const UNAVAILABLE_CODES = new Set<string>([
  neo4j.error.SERVICE_UNAVAILABLE,
  neo4j.error.SESSION_EXPIRED,
  "Neo.TransientError.General.DatabaseUnavailable",
  "Neo.ClientError.Transaction.TransactionTimedOut",
  "Neo.ClientError.Transaction.TransactionTimedOutClientConfiguration",
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENOTFOUND",
  "ETIMEDOUT",
]);

// Driver errors (Neo4jError) and socket errors both carry a string `code`.
function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Map a driver failure onto the proxy's three outcomes. Connection-level
 * problems, timeouts and authentication failures are `unavailable`; any
 * other client error means the database refused the query itself.
 */
export function classifyDriverError(err: unknown): EmbedderError {
  if (err instanceof EmbedderError) return err;

  const code = errorCode(err);
  const message = err instanceof Error ? err.message : String(err);

  if (
    (code !== undefined &&
      (UNAVAILABLE_CODES.has(code) || code.startsWith("Neo.ClientError.Security."))) ||
    /acquisition timed out/i.test(message)
  ) {
    return new UnavailableError(`Neo4j service unavailable: ${message}`, err);
  }
  if (code !== undefined && code.startsWith("Neo.ClientError.")) {
    return new QueryRejectedError(`Cypher query error: ${message}`, err);
  }

  return new InternalError(`Unexpected error: ${message}`, err);
}

function isParamMap(params: unknown): params is Record<string, unknown> {
  return typeof params === "object" && params !== null && !Array.isArray(params);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (!isParamMap(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * JSON has one number type and the driver sends JS numbers as Float, which
 * Neo4j refuses for LIMIT, SKIP and integer procedure arguments. Whole
 * numbers are sent as Integer; fractional ones stay Float.
 */
export function toDriverValue(value: unknown): unknown {
  if (typeof value === "number" && Number.isSafeInteger(value)) return neo4j.int(value);
  if (Array.isArray(value)) return value.map(toDriverValue);
  if (isPlainObject(value)) return toDriverParams(value);
  return value;
}

export function toDriverParams(params: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(params)) {
    out[key] = toDriverValue(value);
  }
  return out;
}

export function createQueryProxy(
  client: GraphClient,
  options: QueryProxyOptions,
  logger: pino.Logger,
): QueryProxy {
  const log = logger.child({ component: "proxy" });

  return {
    async execute(query, params = {}) {
      if (query.trim() === "") {
        throw new ValidationError("cypher is required");
      }
      if (!isParamMap(params)) {
        throw new ValidationError("params must be an object");
      }

      const startedAt = Date.now();
      const session = client.session();
      try {
        const result = await session.run(query, toDriverParams(params), {
          timeout: options.queryTimeoutMs,
        });
        const rows = result.records.map((record) => {
          const row: Row = {};
          for (const key of record.keys) {
            row[String(key)] = toPlainValue(record.get(key));
          }
          return row;
        });
        log.debug({ rows: rows.length, durationMs: Date.now() - startedAt }, "Query executed");
        return rows;
      } catch (err) {
        const classified = classifyDriverError(err);
        const level = classified.kind === "query_rejected" ? "warn" : "error";
        log[level]({ err, kind: classified.kind }, "Query failed");
        throw classified;
      } finally {
        await session.close();
      }
    },
  };
}
