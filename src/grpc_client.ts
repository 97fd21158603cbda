import { createHmac } from "node:crypto";
import {
  type CallOptions,
  type Channel,
  type Client,
  ClientError,
  type ClientMiddleware,
  type ClientMiddlewareCall,
  type CompatServiceDefinition,
  createChannel,
  createClientFactory,
  Metadata,
  Status,
} from "nice-grpc";
import { v4 as uuidv4 } from "uuid";
import type { AuthVersion, RemoteClient } from "./client";
import type { Credential } from "./credential_fetcher";
import { AuthInvalidError } from "./errors";
import { defaultUserAgent } from "./version";

export const ACCESS_KEY_ID_HEADER = "x-acs-access-key-id";
export const SECURITY_TOKEN_HEADER = "x-acs-security-token";
export const SIGNATURE_HEADER = "x-acs-signature";
export const SIGNATURE_VERSION_HEADER = "x-acs-signature-version";
export const REGION_HEADER = "x-acs-region";
export const USER_AGENT_HEADER = "x-client-user-agent";
export const REQUEST_ID_HEADER = "x-request-id";

export interface GrpcRemoteClientParams {
  /** Server address, e.g. `"https://logs.example.com:443"`. */
  address?: string;
  /** Pre-built channel; takes precedence over `address`. */
  channel?: Channel;
  userAgent?: string;
  region?: string;
  authVersion?: AuthVersion;
  /** Default per-call timeout in milliseconds. */
  timeoutMs?: number;
}

type TimeoutOptions = {
  /** Timeout for this call, interpreted as a duration in milliseconds */
  timeoutMs?: number;
};

/**
 * Signature over one request: HMAC-SHA256 of the method path and request id,
 * keyed by the access key secret, base64 encoded.
 */
export function signRequest(
  methodPath: string,
  requestId: string,
  accessKeySecret: string,
): string {
  return createHmac("sha256", accessKeySecret)
    .update(`${methodPath}\n${requestId}`)
    .digest("base64");
}

/**
 * gRPC client for any service definition that signs each call with the
 * credential most recently set through {@link resetAccessKeyToken}.
 *
 * Put a {@link TokenAutoUpdateClient} in front of it to keep that credential
 * fresh, and call RPCs through `tokenClient.wrap(grpcClient.rpc)`.
 */
export class GrpcRemoteClient<Service extends CompatServiceDefinition>
  implements RemoteClient
{
  readonly rpc: Client<Service, TimeoutOptions>;

  readonly #channel: Channel;
  #credential: Credential | null = null;
  #userAgent: string;
  #region: string;
  #authVersion: AuthVersion;
  #timeoutMs: number | undefined;

  constructor(definition: Service, params: GrpcRemoteClientParams) {
    if (!params.channel && !params.address) {
      throw new Error("GrpcRemoteClient needs either an address or a channel");
    }
    this.#channel = params.channel ?? createChannel(params.address ?? "");
    this.#userAgent = params.userAgent ?? defaultUserAgent();
    this.#region = params.region ?? "";
    this.#authVersion = params.authVersion ?? "v1";
    this.#timeoutMs = params.timeoutMs;

    this.rpc = createClientFactory()
      .use(this.#signingMiddleware())
      .use(this.#timeoutMiddleware())
      .create(definition, this.#channel);
  }

  resetAccessKeyToken(
    accessKeyId: string,
    accessKeySecret: string,
    securityToken: string,
  ): void {
    this.#credential = { accessKeyId, accessKeySecret, securityToken };
  }

  setUserAgent(userAgent: string): void {
    this.#userAgent = userAgent;
  }

  setRetryTimeout(timeoutMs: number): void {
    this.#timeoutMs = timeoutMs;
  }

  setAuthVersion(version: AuthVersion): void {
    this.#authVersion = version;
  }

  setRegion(region: string): void {
    this.#region = region;
  }

  close(): void {
    this.#channel.close();
  }

  #signingMiddleware(): ClientMiddleware {
    const current = () => ({
      credential: this.#credential,
      userAgent: this.#userAgent,
      region: this.#region,
      authVersion: this.#authVersion,
    });

    return async function* signingMiddleware<Request, Response>(
      call: ClientMiddlewareCall<Request, Response>,
      options: CallOptions,
    ) {
      const { credential, userAgent, region, authVersion } = current();
      if (!credential) {
        throw new AuthInvalidError(
          `No credential set for ${call.method.path}`,
        );
      }
      if (authVersion === "v4" && !region) {
        throw new Error("Signature version v4 requires a region");
      }

      const requestId = uuidv4();
      const metadata = new Metadata(options.metadata ?? {});
      metadata.set(REQUEST_ID_HEADER, requestId);
      metadata.set(USER_AGENT_HEADER, userAgent);
      metadata.set(SIGNATURE_VERSION_HEADER, authVersion);
      metadata.set(ACCESS_KEY_ID_HEADER, credential.accessKeyId);
      metadata.set(
        SIGNATURE_HEADER,
        signRequest(call.method.path, requestId, credential.accessKeySecret),
      );
      if (credential.securityToken) {
        metadata.set(SECURITY_TOKEN_HEADER, credential.securityToken);
      }
      if (region) {
        metadata.set(REGION_HEADER, region);
      }

      return yield* call.next(call.request, { ...options, metadata });
    };
  }

  #timeoutMiddleware(): ClientMiddleware<TimeoutOptions> {
    const defaultTimeoutMs = () => this.#timeoutMs;

    return async function* timeoutMiddleware(call, options) {
      const {
        timeoutMs = defaultTimeoutMs(),
        signal: origSignal,
        ...restOptions
      } = options;
      if (!timeoutMs || origSignal?.aborted) {
        return yield* call.next(call.request, {
          ...restOptions,
          signal: origSignal,
        });
      }

      const abortController = new AbortController();
      const abortListener = () => abortController.abort();
      origSignal?.addEventListener("abort", abortListener);

      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        abortController.abort();
      }, timeoutMs);

      try {
        return yield* call.next(call.request, {
          ...restOptions,
          signal: abortController.signal,
        });
      } catch (err) {
        if (timedOut) {
          throw new ClientError(
            call.method.path,
            Status.DEADLINE_EXCEEDED,
            `Timed out after ${timeoutMs}ms`,
          );
        }
        throw err;
      } finally {
        origSignal?.removeEventListener("abort", abortListener);
        clearTimeout(timer);
      }
    };
  }
}

/** Creates a {@link GrpcRemoteClient} for `definition`. */
export function createGrpcRemoteClient<Service extends CompatServiceDefinition>(
  definition: Service,
  params: GrpcRemoteClientParams,
): GrpcRemoteClient<Service> {
  return new GrpcRemoteClient(definition, params);
}
