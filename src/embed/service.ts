import { randomUUID } from "node:crypto";
import type pino from "pino";
import type { TokenStoreClient } from "../store/index.js";
import { findEmbedToken, insertEmbedToken } from "../store/index.js";
import { StorageError, UnavailableError, ValidationError } from "../errors.js";

const SECONDS_PER_DAY = 24 * 60 * 60;

export interface EmbedServiceOptions {
  /** Public origin the viewer is served from, without a trailing slash. */
  baseUrl: string;
  defaultExpiryDays: number;
  maxExpiryDays: number;
  now?: () => Date;
}

export interface CreatedEmbed {
  token: string;
  embedUrl: string;
  createdAt: Date;
  expiresAt: Date;
  expiresInSeconds: number;
}

export interface ResolvedEmbed {
  token: string;
  query: string;
  expiresAt: Date;
}

export type EmbedResolution =
  | { status: "valid"; embed: ResolvedEmbed }
  | { status: "not_found" }
  | { status: "expired"; expiresAt: Date };

export interface EmbedService {
  createEmbed(query: string, ttlDays?: number): CreatedEmbed;
  resolveEmbed(token: string): EmbedResolution;
}

export function buildEmbedUrl(baseUrl: string, token: string): string {
  return `${baseUrl}/view/${encodeURIComponent(token)}`;
}

/**
 * Settle the requested lifetime. Absent means the configured default; an
 * explicit 0 comes from older clients that sent it for "unspecified" and
 * is treated as one day rather than a token that is born expired.
 */
export function resolveTtlDays(
  ttlDays: number | undefined,
  options: Pick<EmbedServiceOptions, "defaultExpiryDays" | "maxExpiryDays">,
): number {
  if (ttlDays === undefined) return options.defaultExpiryDays;
  if (ttlDays === 0) return 1;
  if (!Number.isInteger(ttlDays) || ttlDays < 1) {
    throw new ValidationError("expiresInDays must be a positive integer");
  }
  if (ttlDays > options.maxExpiryDays) {
    throw new ValidationError(`expiresInDays must not exceed ${options.maxExpiryDays}`);
  }
  return ttlDays;
}

function asUnavailable(err: unknown): unknown {
  return err instanceof StorageError
    ? new UnavailableError("Embed storage is unavailable", err)
    : err;
}

export function createEmbedService(
  store: TokenStoreClient,
  options: EmbedServiceOptions,
  logger: pino.Logger,
): EmbedService {
  const log = logger.child({ component: "embed" });
  const now = options.now ?? (() => new Date());

  function withStore<T>(action: string, fields: Record<string, unknown>, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      log.error({ err, ...fields }, `Failed to ${action}`);
      throw asUnavailable(err);
    }
  }

  return {
    createEmbed(query, ttlDays) {
      const trimmed = query.trim();
      if (trimmed === "") {
        throw new ValidationError("cypherQuery is required");
      }
      const days = resolveTtlDays(ttlDays, options);

      const createdAt = now();
      const expiresInSeconds = days * SECONDS_PER_DAY;
      const expiresAt = new Date(createdAt.getTime() + expiresInSeconds * 1000);
      const token = randomUUID();

      withStore("persist embed token", { token }, () =>
        insertEmbedToken(store.db, { token, query: trimmed, createdAt, expiresAt }),
      );

      log.info({ token, expiresAt: expiresAt.toISOString() }, "Embed created");
      return {
        token,
        embedUrl: buildEmbedUrl(options.baseUrl, token),
        createdAt,
        expiresAt,
        expiresInSeconds,
      };
    },

    resolveEmbed(token) {
      const record = withStore("look up embed token", { token }, () =>
        findEmbedToken(store.db, token),
      );

      if (!record) {
        log.debug({ token }, "Embed token not found");
        return { status: "not_found" };
      }
      if (record.expiresAt.getTime() < now().getTime()) {
        log.debug({ token }, "Embed token expired");
        return { status: "expired", expiresAt: record.expiresAt };
      }
      return {
        status: "valid",
        embed: { token: record.token, query: record.query, expiresAt: record.expiresAt },
      };
    },
  };
}
