/**
 * Process-wide Neo4j driver holder.
 *
 * Constructed once at startup and handed to the query proxy. Sessions are
 * opened per operation against the configured database and closed by the
 * caller; the driver's pool is the only state shared between requests.
 */

import neo4j, { type Driver, type Session, type SessionMode } from "neo4j-driver";
import type pino from "pino";
import type { Config } from "../config/index.js";

export interface GraphClientConfig {
  uri: string;
  user: string;
  password: string;
  database: string;
  connectionTimeoutMs?: number;
}

export class GraphClient {
  readonly driver: Driver;
  private readonly database: string;
  private readonly log: pino.Logger;
  private isConnected = false;

  constructor(config: GraphClientConfig, logger: pino.Logger, driver?: Driver) {
    this.database = config.database;
    this.log = logger.child({ component: "graph", uri: config.uri });
    this.driver =
      driver ??
      neo4j.driver(config.uri, neo4j.auth.basic(config.user, config.password), {
        connectionTimeout: config.connectionTimeoutMs ?? 5000,
        connectionAcquisitionTimeout: config.connectionTimeoutMs ?? 5000,
        maxConnectionLifetime: 3600000,
      });
  }

  get connected(): boolean {
    return this.isConnected;
  }

  /**
   * Check the database is reachable. An unreachable database at startup is
   * logged, not fatal: embeds can still be issued and resolved, and the
   * proxy reports `unavailable` per request until Neo4j comes up.
   */
  async connect(): Promise<boolean> {
    try {
      await this.driver.verifyConnectivity({ database: this.database });
      this.isConnected = true;
      this.log.info({ database: this.database }, "Neo4j connected");
    } catch (err) {
      this.isConnected = false;
      this.log.warn({ err }, "Neo4j unreachable at startup");
    }
    return this.isConnected;
  }

  session(mode: SessionMode = neo4j.session.WRITE): Session {
    return this.driver.session({ database: this.database, defaultAccessMode: mode });
  }

  async close(): Promise<void> {
    await this.driver.close();
    this.isConnected = false;
  }
}

export function createGraphClient(config: Config["neo4j"], logger: pino.Logger): GraphClient {
  return new GraphClient(
    {
      uri: config.uri,
      user: config.user,
      password: config.password,
      database: config.database,
      connectionTimeoutMs: config.connectionTimeoutMs,
    },
    logger,
  );
}
