/**
 * Authenticated RingCentral session via `@ringcentral/sdk`.
 *
 * Login happens once, before any call-log request, and outside the request
 * quota. Rejected credentials are not retried.
 */

import { SDK } from "@ringcentral/sdk";
import type { Logger } from "../core/index.js";
import {
  AuthenticationError,
  errorMessage,
  readStatus,
  withRetry,
} from "../core/index.js";
import type { CallLogTransport } from "./api.js";
import type { RingCentralConfig } from "./types.js";

const LOGIN_RETRIES = 2;

function isCredentialRejection(err: unknown): boolean {
  const status = readStatus(err);
  return status === 400 || status === 401 || status === 403;
}

export async function openSession(
  config: RingCentralConfig,
  logger: Logger,
): Promise<CallLogTransport> {
  const sdk = new SDK({
    server: config.server,
    clientId: config.clientId,
    clientSecret: config.clientSecret,
  });
  const platform = sdk.platform();

  try {
    await withRetry(() => platform.login({ jwt: config.jwt }), {
      maxRetries: LOGIN_RETRIES,
      isFatal: isCredentialRejection,
      onRetry: (err, delayMs, attempt) =>
        logger.warn(
          `Login failed (${errorMessage(err)}), retrying in ${Math.round(delayMs / 1000)}s (attempt ${attempt}/${LOGIN_RETRIES})`,
        ),
    });
  } catch (err) {
    throw new AuthenticationError(
      `Unable to authenticate to platform: ${errorMessage(err)}`,
      { cause: err },
    );
  }

  logger.info("Authenticated", { server: config.server });
  return platform;
}
