import {
  CredentialFetcher,
  type CredentialIssuer,
  type CredentialSink,
} from "./credential_fetcher";
import { CredentialState, type CredentialSnapshot } from "./credential_state";
import {
  getProfile,
  resolveRefreshSettings,
  type RefreshSettings,
} from "./config";
import { ClientClosedError } from "./errors";
import { createLogger, withFields, type Logger } from "./logger";
import { RefreshScheduler } from "./refresh_scheduler";
import { invokeWithCredentialRetry } from "./retrying_invoker";

/** Request signature scheme used by the underlying client. */
export type AuthVersion = "v1" | "v4";

/**
 * Contract of the client the refresh layer is placed in front of. Besides
 * these members it exposes any number of async operations.
 */
export interface RemoteClient extends CredentialSink {
  setUserAgent(userAgent: string): void;
  setRetryTimeout(timeoutMs: number): void;
  setAuthVersion(version: AuthVersion): void;
  /** Region name; required by the v4 signature scheme. */
  setRegion(region: string): void;
}

type AsyncMethodKeys<T> = {
  [K in keyof T]: T[K] extends (...args: never[]) => Promise<unknown>
    ? K
    : never;
}[keyof T];

/** The promise-returning methods of `T`, each wrapped with credential retry. */
export type WithCredentialRetry<T> = Pick<T, AsyncMethodKeys<T>>;

export interface TokenAutoUpdateClientParams {
  /** Upper bound on how many times one operation runs. Default 3. */
  maxTryTimes?: number;
  /** Minimum spacing between credential fetches. Default 1s. */
  minFetchIntervalMs?: number;
  /** Backoff bounds after failed fetches. Default 1s to 60s. */
  backoffMinMs?: number;
  backoffMaxMs?: number;
  /** Host-wide shutdown; stops the background refresh when aborted. */
  shutdownSignal?: AbortSignal;
  /** Custom logger; level filtering still applies. */
  logger?: Logger;
  logLevel?: string;
  /** Config file profile to read defaults from. */
  profile?: string;
  /** Overrides the classification of credential errors. */
  isCredentialError?: (err: unknown) => boolean;
}

/**
 * Keeps the credential of an underlying client fresh and retries its
 * operations when they fail on a rejected credential.
 *
 * @example
 * ```typescript
 * import { TokenAutoUpdateClient } from "sts-autorefresh";
 *
 * const client = await TokenAutoUpdateClient.create(logClient, assumeRole);
 * const project = await client.operations.getProject("my-project");
 * await client.close();
 * ```
 */
export class TokenAutoUpdateClient<C extends RemoteClient>
  implements RemoteClient
{
  /** Every async method of the underlying client, with credential retry. */
  readonly operations: WithCredentialRetry<C>;
  readonly settings: RefreshSettings;

  readonly #underlying: C;
  readonly #state: CredentialState;
  readonly #fetcher: CredentialFetcher;
  readonly #scheduler: RefreshScheduler;
  readonly #logger: Logger;
  readonly #isCredentialError?: (err: unknown) => boolean;
  #closed = false;

  constructor(
    underlying: C,
    issuer: CredentialIssuer,
    params: TokenAutoUpdateClientParams = {},
  ) {
    this.settings = resolveRefreshSettings(params, getProfile(params.profile));
    this.#logger = createLogger(params.logger, this.settings.logLevel);
    this.#underlying = underlying;
    this.#isCredentialError = params.isCredentialError;

    // Expired from the start so the first refresh happens right away.
    this.#state = new CredentialState(Date.now() - 60_000);
    this.#fetcher = new CredentialFetcher({
      state: this.#state,
      issuer,
      sink: underlying,
      settings: this.settings,
      logger: withFields(this.#logger, "component", "fetcher"),
    });

    this.#scheduler = new RefreshScheduler({
      state: this.#state,
      refresher: this.#fetcher,
      signal: params.shutdownSignal,
      isClosed: () => this.#closed,
      logger: withFields(this.#logger, "component", "scheduler"),
    });

    this.operations = this.wrap(underlying);
  }

  /**
   * Creates a client, fetches the first credential, and starts the background
   * refresh. Rejects with the fetch error if the first credential cannot be
   * obtained; the client is closed in that case, so nothing is left running
   * or attached to `shutdownSignal`.
   */
  static async create<C extends RemoteClient>(
    underlying: C,
    issuer: CredentialIssuer,
    params?: TokenAutoUpdateClientParams,
  ): Promise<TokenAutoUpdateClient<C>> {
    const client = new TokenAutoUpdateClient(underlying, issuer, params);
    try {
      await client.refresh();
    } catch (err) {
      await client.close();
      throw err;
    }
    client.start();
    return client;
  }

  /** Starts the background refresh. Calling it again has no effect. */
  start(): void {
    if (this.#closed) {
      throw new ClientClosedError();
    }
    this.#scheduler.start();
  }

  /** Requests one credential refresh now, subject to the debounce window. */
  refresh(): Promise<void> {
    return this.#fetcher.fetch();
  }

  credentialState(): CredentialSnapshot {
    return this.#state.snapshot();
  }

  /** Runs one deferred operation with credential retry. */
  call<T>(operation: () => Promise<T>, operationName?: string): Promise<T> {
    return invokeWithCredentialRetry(operation, {
      maxTryTimes: this.settings.maxTryTimes,
      refresher: this.#fetcher,
      isCredentialError: this.#isCredentialError,
      logger: this.#logger,
      operationName,
    });
  }

  /**
   * Returns a view of `target` whose methods run with credential retry. Use it
   * for objects other than the underlying client that send requests signed
   * with its credential.
   */
  wrap<T extends object>(target: T): WithCredentialRetry<T> {
    return new Proxy(target, {
      get: (obj, prop, receiver) => {
        const value: unknown = Reflect.get(obj, prop, receiver);
        if (typeof value !== "function") {
          return value;
        }
        return (...args: unknown[]) =>
          this.call(
            (): Promise<unknown> =>
              Promise.resolve(Reflect.apply(value, obj, args)),
            String(prop),
          );
      },
    });
  }

  setUserAgent(userAgent: string): void {
    this.#underlying.setUserAgent(userAgent);
  }

  setRetryTimeout(timeoutMs: number): void {
    this.#underlying.setRetryTimeout(timeoutMs);
  }

  setAuthVersion(version: AuthVersion): void {
    this.#underlying.setAuthVersion(version);
  }

  setRegion(region: string): void {
    this.#underlying.setRegion(region);
  }

  resetAccessKeyToken(
    accessKeyId: string,
    accessKeySecret: string,
    securityToken: string,
  ): void {
    this.#underlying.resetAccessKeyToken(
      accessKeyId,
      accessKeySecret,
      securityToken,
    );
  }

  get closed(): boolean {
    return this.#closed;
  }

  /**
   * Stops the background refresh and detaches from `shutdownSignal`.
   * Operations already in flight run to completion. Resolves once the refresh
   * loop has exited; a pending sleep ends at once, but a scheduled fetch that
   * is already running (its backoff sleep included, up to `backoffMaxMs`) is
   * awaited.
   */
  async close(): Promise<void> {
    this.#closed = true;
    this.#scheduler.stop();
    await this.#scheduler.done;
  }
}
