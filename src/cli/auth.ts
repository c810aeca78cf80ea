#!/usr/bin/env node

/**
 * Auth CLI for gcal-mcp.
 *
 * Mints the refresh token the MCP server runs on. The server itself never
 * opens a browser: it is a subprocess whose terminal the user cannot see.
 *
 * Usage:
 *   npm run auth login     Authorize in the browser and print GOOGLE_REFRESH_TOKEN
 *   npm run auth status    Verify the configured refresh token
 *   npx gcal-mcp-auth login
 */

import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import { google } from "googleapis";
import open from "open";
import { CALENDAR_SCOPES, GoogleSession } from "../auth/google-session.js";
import { redirectUriFor, waitForAuthorizationCode } from "../auth/loopback.js";
import { GoogleCalendarClient } from "../calendar/client.js";
import { loadConfig, loadOAuthClientConfig } from "../config.js";
import { errorMessage } from "../utils/type-guards.js";

/** Exit code when Google issues no refresh token (consent was granted before). */
export const EXIT_NO_REFRESH_TOKEN = 2;

export async function login(): Promise<void> {
  const { clientId, clientSecret, redirectPort } = loadOAuthClientConfig();
  const oauth = new google.auth.OAuth2(clientId, clientSecret, redirectUriFor(redirectPort));
  const authUrl = oauth.generateAuthUrl({
    access_type: "offline",
    prompt: "consent",
    scope: CALENDAR_SCOPES,
  });

  const code = await waitForAuthorizationCode(redirectPort, () => {
    console.log(`\n[gcal-mcp] Open this URL to authorize Google Calendar access:\n\n  ${authUrl}\n`);
    open(authUrl).catch((error: unknown) => {
      console.log(`[gcal-mcp] Could not open a browser (${errorMessage(error)}); use the URL above.`);
    });
  });

  const { tokens } = await oauth.getToken(code);
  if (!tokens.refresh_token) {
    console.error(
      "\n[gcal-mcp] Google returned no refresh token. Remove this app's access at " +
        "https://myaccount.google.com/permissions and run login again.\n",
    );
    process.exitCode = EXIT_NO_REFRESH_TOKEN;
    return;
  }

  console.log("\nAuthorized. Add this to the MCP server environment:\n");
  console.log(`GOOGLE_REFRESH_TOKEN="${tokens.refresh_token}"\n`);
}

export async function status(): Promise<void> {
  const config = loadConfig();
  const session = new GoogleSession(
    {
      clientId: config.google.clientId,
      clientSecret: config.google.clientSecret,
      refreshToken: config.google.refreshToken,
    },
    { retries: config.google.retries },
  );

  try {
    await session.verify();
  } catch (error) {
    console.log(`\n[gcal-mcp] Not authenticated: ${errorMessage(error)}`);
    console.log("Run: npm run auth login\n");
    process.exitCode = 1;
    return;
  }

  const primary = await new GoogleCalendarClient(session).getCalendarListEntry("primary");
  console.log(`\n[gcal-mcp] Authenticated. Primary calendar: ${primary.id ?? "(unknown)"}\n`);
}

export function showHelp(): void {
  console.log(`
Usage: gcal-mcp-auth <command>

Commands:
  login   Authorize in the browser and print a GOOGLE_REFRESH_TOKEN
  status  Check that the configured refresh token works

Examples:
  npm run auth login
  npx gcal-mcp-auth status
`);
}

// CLI dispatch: only runs when executed directly, not when imported for testing
const isMain = process.argv[1] === fileURLToPath(import.meta.url);
if (isMain) {
  dotenv.config();
  const command = process.argv[2];

  switch (command) {
    case "login":
      login().catch((error) => {
        console.error("\n[gcal-mcp] Login failed:", errorMessage(error));
        process.exit(1);
      });
      break;
    case "status":
      status().catch((error) => {
        console.error("\n[gcal-mcp] Status check failed:", errorMessage(error));
        process.exit(1);
      });
      break;
    default:
      showHelp();
      break;
  }
}
