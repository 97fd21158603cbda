import type { CredentialState } from "./credential_state";
import { CredentialFetchError, HighFrequencyError } from "./errors";
import type { Logger } from "./logger";
import { sleep } from "./timers";

/** Access identity used to sign remote operations. */
export type Credential = {
  accessKeyId: string;
  accessKeySecret: string;
  securityToken: string;
};

/** A credential together with the moment the remote side stops accepting it. */
export type IssuedCredential = Credential & {
  expiresAt: Date;
};

/** Obtains a fresh credential, e.g. by calling an STS AssumeRole endpoint. */
export type CredentialIssuer = () => Promise<IssuedCredential>;

/** Receives every newly issued credential. */
export interface CredentialSink {
  resetAccessKeyToken(
    accessKeyId: string,
    accessKeySecret: string,
    securityToken: string,
  ): void;
}

/** Anything that can be asked for a credential refresh. */
export interface CredentialRefresher {
  fetch(): Promise<void>;
}

export type FetchSettings = {
  minFetchIntervalMs: number;
  backoffMinMs: number;
  backoffMaxMs: number;
};

/**
 * Performs single credential refresh attempts against the issuer.
 *
 * Attempts closer together than `minFetchIntervalMs` are rejected with
 * {@link HighFrequencyError} without calling the issuer. After consecutive
 * failures each admitted attempt first waits out the current backoff.
 */
export class CredentialFetcher implements CredentialRefresher {
  readonly #state: CredentialState;
  readonly #issuer: CredentialIssuer;
  readonly #sink: CredentialSink;
  readonly #settings: FetchSettings;
  readonly #logger: Logger;

  constructor(params: {
    state: CredentialState;
    issuer: CredentialIssuer;
    sink: CredentialSink;
    settings: FetchSettings;
    logger: Logger;
  }) {
    this.#state = params.state;
    this.#issuer = params.issuer;
    this.#sink = params.sink;
    this.#settings = params.settings;
    this.#logger = params.logger;
  }

  async fetch(): Promise<void> {
    const delayMs = this.#state.tryBeginAttempt(
      Date.now(),
      this.#settings.minFetchIntervalMs,
    );
    if (delayMs === undefined) {
      throw new HighFrequencyError();
    }
    if (delayMs > 0) {
      this.#logger.debug(
        "Backing off before credential fetch",
        "delay",
        `${delayMs}ms`,
      );
      await sleep(delayMs);
    }

    let issued: IssuedCredential;
    try {
      issued = await this.#issuer();
      validateIssuedCredential(issued);
    } catch (err) {
      const backoffMs = this.#state.recordFailure(
        this.#settings.backoffMinMs,
        this.#settings.backoffMaxMs,
      );
      this.#logger.warn(
        "Failed to fetch credential",
        "error",
        err,
        "next_backoff",
        `${backoffMs}ms`,
      );
      throw new CredentialFetchError(
        `Failed to fetch credential: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      );
    }

    this.#state.recordSuccess(issued.expiresAt.getTime());

    try {
      this.#sink.resetAccessKeyToken(
        issued.accessKeyId,
        issued.accessKeySecret,
        issued.securityToken,
      );
    } catch (err) {
      this.#logger.warn("Failed to push credential to client", "error", err);
    }

    this.#logger.debug(
      "Fetched credential",
      "accessKeyId",
      issued.accessKeyId,
      "expires_in",
      `${Math.round((issued.expiresAt.getTime() - Date.now()) / 1000)}s`,
    );
  }
}

function validateIssuedCredential(issued: IssuedCredential): void {
  if (!issued.accessKeyId || !issued.accessKeySecret) {
    throw new Error("issuer returned a credential without access key");
  }
  if (
    !(issued.expiresAt instanceof Date) ||
    Number.isNaN(issued.expiresAt.getTime())
  ) {
    throw new Error("issuer returned a credential without a valid expiry");
  }
}
