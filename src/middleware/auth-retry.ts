import { UpstreamError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("auth-retry");

/** Anything that can force a fresh access token. */
export interface TokenRefresher {
  refresh(): Promise<void>;
}

/**
 * Runs `attempt`; on a 401 refreshes the access token once and runs it again.
 * A second 401 propagates unchanged.
 */
export async function withAuthRetry<T>(
  refresher: TokenRefresher,
  operation: string,
  attempt: () => Promise<T>,
): Promise<T> {
  try {
    return await attempt();
  } catch (error) {
    if (!(error instanceof UpstreamError) || !error.isAuthFailure) {
      throw error;
    }
    logger.info({ operation }, "Access token rejected, refreshing and retrying once");
    await refresher.refresh();
    return attempt();
  }
}
