/** Point-in-time copy of {@link CredentialState}. */
export interface CredentialSnapshot {
  /** Epoch milliseconds at which the current credential stops being valid. */
  expiresAt: number;
  /** Epoch milliseconds of the last admitted fetch attempt, if any. */
  lastFetchAt: number | undefined;
  consecutiveFailures: number;
  /** Delay in milliseconds applied before the next admitted fetch. */
  currentBackoffMs: number;
}

/**
 * Expiry and refresh history of the credential held by one client.
 *
 * Every method is synchronous and never yields, so each runs to completion
 * without interleaving with another; that is the only locking the record
 * needs. Callers must not await between reading and writing through it.
 */
export class CredentialState {
  #expiresAt: number;
  #lastFetchAt: number | undefined = undefined;
  #consecutiveFailures = 0;
  #currentBackoffMs = 0;

  constructor(initialExpiresAt: number) {
    this.#expiresAt = initialExpiresAt;
  }

  get expiresAt(): number {
    return this.#expiresAt;
  }

  /**
   * Admits a fetch attempt unless one was admitted less than
   * `minFetchIntervalMs` ago.
   *
   * @returns the delay to wait before calling the issuer, or `undefined`
   *   when the attempt is debounced (nothing is recorded in that case).
   */
  tryBeginAttempt(now: number, minFetchIntervalMs: number): number | undefined {
    if (
      this.#lastFetchAt !== undefined &&
      now - this.#lastFetchAt < minFetchIntervalMs
    ) {
      return undefined;
    }
    this.#lastFetchAt = now;
    return this.#consecutiveFailures === 0 ? 0 : this.#currentBackoffMs;
  }

  /** Clears the failure history. `expiresAt` never moves backwards. */
  recordSuccess(expiresAt: number): void {
    this.#consecutiveFailures = 0;
    this.#currentBackoffMs = 0;
    if (expiresAt > this.#expiresAt) {
      this.#expiresAt = expiresAt;
    }
  }

  /**
   * Counts a failed attempt and doubles the backoff, clamped to
   * `[backoffMinMs, backoffMaxMs]`.
   *
   * @returns the new backoff.
   */
  recordFailure(backoffMinMs: number, backoffMaxMs: number): number {
    this.#consecutiveFailures++;
    this.#currentBackoffMs = Math.min(
      Math.max(this.#currentBackoffMs * 2, backoffMinMs),
      backoffMaxMs,
    );
    return this.#currentBackoffMs;
  }

  snapshot(): CredentialSnapshot {
    return {
      expiresAt: this.#expiresAt,
      lastFetchAt: this.#lastFetchAt,
      consecutiveFailures: this.#consecutiveFailures,
      currentBackoffMs: this.#currentBackoffMs,
    };
  }
}
