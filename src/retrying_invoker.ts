import { v4 as uuidv4 } from "uuid";
import type { CredentialRefresher } from "./credential_fetcher";
import { attachRefreshFailure, isCredentialError } from "./errors";
import type { Logger } from "./logger";

export type CredentialRetryOptions = {
  /** Upper bound on how many times the operation runs. Values below 1 mean 1. */
  maxTryTimes: number;
  refresher: CredentialRefresher;
  /** Decides which operation errors mean "credential rejected". */
  isCredentialError?: (err: unknown) => boolean;
  logger?: Logger;
  /** Name used in log lines. */
  operationName?: string;
};

/**
 * Runs `operation`, refreshing the credential and running it again whenever
 * it fails with a credential error.
 *
 * Any other error is rethrown at once. If the refresh itself fails, the
 * operation's error is rethrown with the refresh failure attached (see
 * `getRefreshFailure`). When all attempts fail, the last operation error is
 * rethrown.
 */
export async function invokeWithCredentialRetry<T>(
  operation: () => Promise<T>,
  options: CredentialRetryOptions,
): Promise<T> {
  const {
    refresher,
    logger,
    operationName = "operation",
    isCredentialError: classify = isCredentialError,
  } = options;
  const maxTryTimes = Math.max(1, Math.floor(options.maxTryTimes));

  // Shared by every log line of this call, across attempts.
  const invocationId = uuidv4();

  let lastError: unknown;
  for (let attempt = 0; attempt < maxTryTimes; attempt++) {
    try {
      return await operation();
    } catch (err) {
      lastError = err;
      if (!classify(err)) {
        throw err;
      }

      logger?.debug(
        "Operation rejected credential, refreshing",
        "operation",
        operationName,
        "invocation_id",
        invocationId,
        "attempt",
        attempt + 1,
      );

      try {
        await refresher.fetch();
      } catch (refreshErr) {
        logger?.warn(
          "Credential refresh after operation failure failed",
          "operation",
          operationName,
          "invocation_id",
          invocationId,
          "error",
          err,
          "refresh_error",
          refreshErr,
        );
        throw attachRefreshFailure(err, refreshErr);
      }
    }
  }
  throw lastError;
}
