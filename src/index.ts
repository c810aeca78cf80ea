#!/usr/bin/env node
// Loads .env before any module reads process.env.
import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { GoogleSession } from "./auth/google-session.js";
import { type Config, loadConfig } from "./config.js";
import { createHttpApp, MCP_PATH } from "./http.js";
import { createCalendarServices, createServer, SERVER_NAME } from "./server.js";
import { AuthTokenError } from "./utils/errors.js";
import { createLogger } from "./utils/logger.js";

const logger = createLogger("server");

async function main() {
  let config: Config;
  try {
    config = loadConfig();
  } catch (error) {
    logger.error(
      { error },
      "Failed to load config. Ensure GOOGLE_CLIENT_ID, GOOGLE_CLIENT_SECRET and GOOGLE_REFRESH_TOKEN are set.",
    );
    process.exit(1);
  }

  const session = new GoogleSession(
    {
      clientId: config.google.clientId,
      clientSecret: config.google.clientSecret,
      refreshToken: config.google.refreshToken,
    },
    { retries: config.google.retries },
  );

  // Fail fast: an MCP subprocess cannot run the browser consent flow.
  try {
    await session.verify();
  } catch (error) {
    if (error instanceof AuthTokenError) {
      process.stderr.write(`\n[${SERVER_NAME}] ${error.message}\n\n`);
      process.exit(1);
    }
    throw error;
  }

  const services = createCalendarServices(session, config.limits);

  if (config.server.transport === "http") {
    const { host, port } = config.server;
    createHttpApp(services).listen(port, host, () => {
      logger.info({ host, port, path: MCP_PATH }, `${SERVER_NAME} HTTP server started`);
    });
    return;
  }

  const server = createServer(services);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info(`${SERVER_NAME} server started`);
}

main().catch((error) => {
  logger.error({ error }, "Fatal error starting server");
  process.exit(1);
});
