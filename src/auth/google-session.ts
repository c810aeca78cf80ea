import { type calendar_v3, google } from "googleapis";
import type { TokenRefresher } from "../middleware/auth-retry.js";
import { mapGoogleError, readErrorResponse } from "../middleware/error-mapping.js";
import { AuthTokenError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { errorMessage } from "../utils/type-guards.js";

const logger = createLogger("auth");

export const CALENDAR_SCOPES = ["https://www.googleapis.com/auth/calendar"];

export interface GoogleCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface GoogleSessionOptions {
  /** gaxios retry count for 429/5xx responses; 0 disables retries. */
  retries?: number;
}

/** What the calendar facade needs from a session. */
export interface CalendarSession extends TokenRefresher {
  readonly calendar: calendar_v3.Calendar;
}

type OAuth2 = InstanceType<typeof google.auth.OAuth2>;

function isInvalidGrant(error: unknown): boolean {
  const response = readErrorResponse(error);
  if (response?.details.reason === "invalid_grant") return true;
  return errorMessage(error).includes("invalid_grant");
}

/**
 * Process-wide Google credential session.
 *
 * Owns the OAuth2 client that holds the refresh token and the cached access
 * token with its expiry. Components receive the session explicitly instead of
 * reading credentials from the environment. The OAuth2 client refreshes an
 * expired token on its own; `refresh()` forces a new token and shares one
 * in-flight refresh between concurrent callers.
 */
export class GoogleSession implements CalendarSession {
  readonly clientId: string;
  readonly calendar: calendar_v3.Calendar;
  private readonly oauth: OAuth2;
  private readonly refreshToken: string;
  private inflightRefresh: Promise<void> | null = null;

  constructor(credentials: GoogleCredentials, options: GoogleSessionOptions = {}) {
    this.clientId = credentials.clientId;
    this.refreshToken = credentials.refreshToken;
    this.oauth = new google.auth.OAuth2(credentials.clientId, credentials.clientSecret);
    this.oauth.setCredentials({ refresh_token: credentials.refreshToken });

    const retries = options.retries ?? 3;
    this.calendar = google.calendar({
      version: "v3",
      auth: this.oauth,
      retry: retries > 0,
      retryConfig: { retry: retries },
    });

    logger.debug({ retries }, "GoogleSession initialized");
  }

  /** Expiry of the cached access token in epoch ms, or null when none is cached. */
  get accessTokenExpiry(): number | null {
    return this.oauth.credentials.expiry_date ?? null;
  }

  /**
   * Drops the cached access token and exchanges the refresh token for a new one.
   * Concurrent callers share the same exchange.
   */
  refresh(): Promise<void> {
    if (!this.inflightRefresh) {
      this.inflightRefresh = this.performRefresh().finally(() => {
        this.inflightRefresh = null;
      });
    }
    return this.inflightRefresh;
  }

  /** Startup check: fails fast when the refresh token is unusable. */
  async verify(): Promise<void> {
    await this.refresh();
    logger.info("Google credentials verified");
  }

  private async performRefresh(): Promise<void> {
    this.oauth.setCredentials({ refresh_token: this.refreshToken });
    try {
      const { token } = await this.oauth.getAccessToken();
      if (!token) {
        throw new AuthTokenError("Google returned no access token for the configured refresh token.");
      }
      logger.debug({ expiresAt: this.accessTokenExpiry }, "Access token refreshed");
    } catch (error) {
      if (error instanceof AuthTokenError) throw error;
      if (isInvalidGrant(error)) {
        logger.warn("Refresh token rejected (invalid_grant)");
        throw new AuthTokenError();
      }
      throw mapGoogleError(error, { type: "oauth token", id: this.clientId });
    }
  }
}
