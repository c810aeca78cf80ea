import pino from "pino";

// stdout carries MCP JSON-RPC, so logs always go to stderr.
const BASE_LOGGER = pino(
  {
    level: process.env.LOG_LEVEL ?? "info",
    redact: {
      paths: [
        "accessToken",
        "access_token",
        "refreshToken",
        "refresh_token",
        "token",
        "client_secret",
        "clientSecret",
      ],
      censor: "[REDACTED]",
    },
    serializers: {
      error: pino.stdSerializers.err,
    },
  },
  pino.destination(2),
);

export function createLogger(module: string): pino.Logger {
  return BASE_LOGGER.child({ module });
}

export { BASE_LOGGER as logger };
