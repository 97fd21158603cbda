import type { CredentialRefresher } from "./credential_fetcher";
import type { CredentialState } from "./credential_state";
import { HighFrequencyError } from "./errors";
import type { Logger } from "./logger";
import { waitOrAbort } from "./timers";

const MINUTE = 60_000;

// Delay used once the credential is within a minute of expiring (or past it).
export const NEAR_EXPIRY_DELAY_MS = 30_000;

/**
 * Maps the time left on the credential to how long to sleep before the next
 * refresh: the shorter the remaining lifetime, the larger the fraction of it
 * that is slept.
 */
export function computeRefreshDelay(timeToExpiryMs: number): number {
  if (timeToExpiryMs < MINUTE) {
    return NEAR_EXPIRY_DELAY_MS;
  }
  if (timeToExpiryMs < 10 * MINUTE) {
    return Math.floor((timeToExpiryMs * 7) / 10);
  }
  if (timeToExpiryMs < 60 * MINUTE) {
    return Math.floor((timeToExpiryMs * 6) / 10);
  }
  return Math.floor(timeToExpiryMs / 2);
}

type SchedulerStatus = "idle" | "running" | "stopped";

/**
 * Background loop that refreshes the credential ahead of its expiry.
 *
 * The loop ends on {@link stop}, when the host `signal` aborts (even
 * mid-sleep), or when `isClosed` reports true after a refresh. Fetch
 * failures are logged and never end it.
 */
export class RefreshScheduler {
  readonly #state: CredentialState;
  readonly #refresher: CredentialRefresher;
  readonly #hostSignal: AbortSignal | undefined;
  readonly #stopController = new AbortController();
  readonly #isClosed: () => boolean;
  readonly #logger: Logger;

  #status: SchedulerStatus = "idle";
  #loop: Promise<void> = Promise.resolve();

  readonly #onHostAbort = () => this.#stopController.abort();

  constructor(params: {
    state: CredentialState;
    refresher: CredentialRefresher;
    /** Host-wide shutdown; its listener is removed once the loop stops. */
    signal?: AbortSignal;
    isClosed: () => boolean;
    logger: Logger;
  }) {
    this.#state = params.state;
    this.#refresher = params.refresher;
    this.#hostSignal = params.signal;
    this.#isClosed = params.isClosed;
    this.#logger = params.logger;

    if (this.#hostSignal?.aborted) {
      this.#stopController.abort();
    } else {
      this.#hostSignal?.addEventListener("abort", this.#onHostAbort, {
        once: true,
      });
    }
  }

  get status(): SchedulerStatus {
    return this.#status;
  }

  /** Resolves once the loop has exited. Resolves immediately if never started. */
  get done(): Promise<void> {
    return this.#loop;
  }

  start(): void {
    if (this.#status !== "idle") {
      return;
    }
    this.#status = "running";
    this.#loop = this.#run();
  }

  /**
   * Ends the loop, interrupting a pending sleep. A fetch already in progress
   * runs to completion first. Calling it again has no effect.
   */
  stop(): void {
    this.#stopController.abort();
    if (this.#status === "idle") {
      this.#status = "stopped";
      this.#detachHostSignal();
    }
  }

  #detachHostSignal(): void {
    this.#hostSignal?.removeEventListener("abort", this.#onHostAbort);
  }

  async #run(): Promise<void> {
    const signal = this.#stopController.signal;
    try {
      while (!signal.aborted) {
        const delayMs = computeRefreshDelay(
          this.#state.expiresAt - Date.now(),
        );
        this.#logger.debug("Next credential refresh", "delay", `${delayMs}ms`);

        const elapsed = await waitOrAbort(delayMs, signal);
        if (!elapsed) {
          this.#logger.debug("Received shutdown signal, stopping refresh loop");
          return;
        }

        await this.#refreshOnce();

        if (this.#isClosed() || signal.aborted) {
          this.#logger.debug("Client closed, stopping refresh loop");
          return;
        }
      }
    } finally {
      this.#status = "stopped";
      this.#detachHostSignal();
    }
  }

  async #refreshOnce(): Promise<void> {
    try {
      await this.#refresher.fetch();
      this.#logger.debug("Scheduled credential refresh done");
    } catch (err) {
      if (err instanceof HighFrequencyError) {
        this.#logger.debug("Scheduled credential refresh skipped", "error", err);
      } else {
        this.#logger.warn("Scheduled credential refresh failed", "error", err);
      }
    }
  }
}
