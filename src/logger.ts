import pino from "pino";

// stdout belongs to the MCP transport and the CLI's own output, so logs go to stderr.
export const logger = pino(
  {
    name: "liberate",
    level: process.env.LOG_LEVEL ?? "info",
    transport:
      process.env.NODE_ENV === "development"
        ? { target: "pino/file", options: { destination: 2 } }
        : undefined,
  },
  process.env.NODE_ENV === "development" ? undefined : pino.destination(2),
);
