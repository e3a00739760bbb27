import pino from "pino";

// Covers a top-level `password` and one nested under a section, e.g. `{ neo4j: config.neo4j }`.
const REDACT_PATHS = ["password", "*.password"];

export function createLogger(
  level = "info",
  name?: string,
  destination?: pino.DestinationStream,
): pino.Logger {
  const options: pino.LoggerOptions = { level, name, redact: REDACT_PATHS };
  if (destination) return pino(options, destination);

  return pino({
    ...options,
    transport:
      process.env["NODE_ENV"] !== "production"
        ? { target: "pino-pretty", options: { colorize: true } }
        : undefined,
  });
}
