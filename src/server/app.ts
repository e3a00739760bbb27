import express from "express";
import cors from "cors";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type pino from "pino";
import type { EmbedService } from "../embed/service.js";
import type { QueryProxy } from "../graph/proxy.js";
import { EmbedderError, ValidationError, httpStatusFor, toErrorBody } from "../errors.js";
import { createEmbedBodySchema, parseBody, proxyQueryBodySchema } from "./schemas.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Viewer pages live beside the sources; a build runs from dist/ and looks back into src/. */
export function resolvePublicDir(): string {
  const local = path.join(__dirname, "public");
  if (fs.existsSync(local)) return local;
  const srcPath = path.join(__dirname, "../../../src/server/public");
  if (fs.existsSync(srcPath)) return srcPath;
  return local;
}

export interface AppDeps {
  embeds: EmbedService;
  proxy: QueryProxy;
  logger: pino.Logger;
  corsOrigin?: string;
  publicDir?: string;
}

const BODY_ERROR_MESSAGES: Record<string, string> = {
  "entity.parse.failed": "Request body is not valid JSON",
  "entity.too.large": "Request body is too large",
  "encoding.unsupported": "Request body encoding is not supported",
  "charset.unsupported": "Request body charset is not supported",
};

// body-parser rejects the request with an HttpError whose 4xx `status` marks it as the caller's fault.
function fromBodyParser(err: unknown): ValidationError | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if (!("type" in err) || typeof err.type !== "string") return undefined;
  if (!("status" in err) || typeof err.status !== "number") return undefined;
  if (err.status < 400 || err.status >= 500) return undefined;
  return new ValidationError(BODY_ERROR_MESSAGES[err.type] ?? "Request body could not be read");
}

export function createApp(deps: AppDeps): express.Express {
  const { embeds, proxy, logger } = deps;
  const log = logger.child({ component: "http" });
  const publicDir = deps.publicDir ?? resolvePublicDir();

  const app = express();
  app.disable("x-powered-by");
  app.use(cors({ origin: deps.corsOrigin ?? false }));
  app.use(express.json({ limit: "1mb" }));

  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      log.info(
        { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - startedAt },
        "Request handled",
      );
    });
    next();
  });

  app.use("/static", express.static(publicDir));

  app.get("/", (_req, res) => {
    res.json({ success: true, message: "graph-embedder backend" });
  });

  // --- Embeds ---

  app.post("/api/embed", (req, res, next) => {
    try {
      const body = parseBody(createEmbedBodySchema, req.body);
      const created = embeds.createEmbed(body.cypherQuery, body.expiresInDays);
      res.json({
        success: true,
        data: {
          embedUrl: created.embedUrl,
          embedToken: created.token,
          expiresAt: created.expiresAt.toISOString(),
          expiresIn: created.expiresInSeconds,
        },
      });
    } catch (err) {
      next(err);
    }
  });

  app.get("/api/embed/:token", (req, res, next) => {
    try {
      const resolution = embeds.resolveEmbed(req.params.token);
      switch (resolution.status) {
        case "not_found":
          res.status(404).json({ success: false, error: { kind: "not_found", message: "Token not found" } });
          return;
        case "expired":
          res.status(410).json({ success: false, error: { kind: "expired", message: "Token expired" } });
          return;
        case "valid":
          res.json({
            success: true,
            data: {
              cypherQuery: resolution.embed.query,
              token: resolution.embed.token,
              expiresAt: resolution.embed.expiresAt.toISOString(),
            },
          });
          return;
      }
    } catch (err) {
      next(err);
    }
  });

  app.get("/view/:token", (req, res, next) => {
    try {
      const resolution = embeds.resolveEmbed(req.params.token);
      // The page itself tells the viewer what happened; the JSON API carries 404/410.
      const page =
        resolution.status === "valid"
          ? "embed.html"
          : resolution.status === "expired"
            ? "embed-expired.html"
            : "embed-not-found.html";
      res.sendFile(path.join(publicDir, page));
    } catch (err) {
      next(err);
    }
  });

  // --- Query proxy ---

  app.post("/api/proxy/query", async (req, res, next) => {
    try {
      const body = parseBody(proxyQueryBodySchema, req.body);
      const rows = await proxy.execute(body.cypher, body.params);
      res.json({ success: true, data: rows });
    } catch (err) {
      next(err);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ success: false, error: { kind: "not_found", message: "Route not found" } });
  });

  app.use((err: unknown, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const error = fromBodyParser(err) ?? err;
    const status = httpStatusFor(error);
    if (status >= 500) {
      log.error({ err: error, path: req.path }, "Request failed");
    } else if (error instanceof EmbedderError) {
      log.warn({ kind: error.kind, path: req.path, message: error.message }, "Request rejected");
    }
    res.status(status).json(toErrorBody(error));
  });

  return app;
}
