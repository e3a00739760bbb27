import type { Server } from "node:http";
import type pino from "pino";
import { createApp, type AppDeps } from "./app.js";

export { createApp, resolvePublicDir } from "./app.js";
export type { AppDeps } from "./app.js";

export interface HttpServer {
  /** Resolves with the bound port, which differs from `port` when 0 is passed. */
  start(port: number, host?: string): Promise<number>;
  stop(): Promise<void>;
}

export function createHttpServer(deps: AppDeps): HttpServer {
  const app = createApp(deps);
  const logger: pino.Logger = deps.logger;
  let server: Server | null = null;

  return {
    start(port, host) {
      return new Promise((resolve, reject) => {
        const listening = app.listen(port, host ?? "0.0.0.0", () => {
          const address = listening.address();
          const bound = address !== null && typeof address === "object" ? address.port : port;
          logger.info({ port: bound, host }, "HTTP server started");
          resolve(bound);
        });
        listening.once("error", reject);
        server = listening;
      });
    },
    stop() {
      return new Promise((resolve, reject) => {
        if (!server) {
          resolve();
          return;
        }
        server.close((err) => {
          if (err) {
            reject(err);
            return;
          }
          logger.info("HTTP server stopped");
          resolve();
        });
        server = null;
      });
    },
  };
}
