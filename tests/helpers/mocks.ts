import { vi } from "vitest";
import type { Driver, Session } from "neo4j-driver";
import type { Logger } from "pino";

export function createMockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger as unknown as Logger;
}

export function createMockRecords(rows: Array<Record<string, unknown>>) {
  return rows.map((row) => ({
    keys: Object.keys(row),
    get: (key: string) => row[key],
  }));
}

export function createMockSession(rows: Array<Record<string, unknown>> = []): Session {
  return {
    run: vi.fn().mockResolvedValue({ records: createMockRecords(rows) }),
    close: vi.fn().mockResolvedValue(undefined),
  } as unknown as Session;
}

export function createMockDriver(session?: Session): Driver {
  return {
    session: vi.fn().mockReturnValue(session ?? createMockSession()),
    verifyConnectivity: vi.fn().mockResolvedValue({}),
    close: vi.fn().mockResolvedValue(undefined),
  } as unknown as Driver;
}

/** An Error shaped like the driver's Neo4jError: message plus a string `code`. */
export function driverError(message: string, code: string): Error & { code: string } {
  return Object.assign(new Error(message), { code });
}
