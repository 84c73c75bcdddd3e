import pino from "pino";

// stdout carries the JSON-RPC stream, so every log line goes to stderr.
export const logger = pino(
  {
    name: "cargo-mcp",
    level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info"),
  },
  pino.destination(2),
);
