import { ClientError, Status } from "nice-grpc";

/** A credential refresh was requested sooner than the debounce window allows. */
export class HighFrequencyError extends Error {
  constructor(message: string = "credential fetch frequency is too high") {
    super(message);
    this.name = "HighFrequencyError";
  }
}

/** The credential issuer failed; `cause` carries its error. */
export class CredentialFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CredentialFetchError";
  }
}

/** The remote side rejected the credential an operation was signed with. */
export class AuthInvalidError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthInvalidError";
  }
}

/** An error reported by the remote service for a single operation. */
export class RemoteServiceError extends Error {
  readonly code: string;
  readonly httpCode: number;
  readonly requestId?: string;

  constructor(params: {
    code: string;
    message: string;
    httpCode: number;
    requestId?: string;
  }) {
    super(params.message);
    this.name = "RemoteServiceError";
    this.code = params.code;
    this.httpCode = params.httpCode;
    this.requestId = params.requestId;
  }
}

/** Thrown when starting a client that has already been closed. */
export class ClientClosedError extends Error {
  constructor(message: string = "client has been closed") {
    super(message);
    this.name = "ClientClosedError";
  }
}

/** A configuration value is missing or out of range. */
export class InvalidConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigError";
  }
}

const credentialErrorCodes = new Set([
  "Unauthorized",
  "InvalidAccessKeyId",
  "InvalidAccessKeyId.NotFound",
  "SecurityTokenExpired",
  "SignatureNotMatch",
  "InvalidSecurityToken",
]);

/**
 * Reports whether an operation failed because its credential was rejected,
 * as opposed to any other failure.
 */
export function isCredentialError(err: unknown): boolean {
  if (err instanceof AuthInvalidError) {
    return true;
  }
  if (err instanceof ClientError) {
    return err.code === Status.UNAUTHENTICATED;
  }
  if (err instanceof RemoteServiceError) {
    return err.httpCode === 401 || credentialErrorCodes.has(err.code);
  }
  return false;
}

const refreshFailures = new WeakMap<object, unknown>();

/**
 * Records the refresh failure that ended a retry loop on the operation error
 * that is returned to the caller. The operation error itself is unchanged.
 */
export function attachRefreshFailure<E>(err: E, refreshErr: unknown): E {
  if (typeof err === "object" && err !== null) {
    refreshFailures.set(err, refreshErr);
  }
  return err;
}

/** The refresh failure recorded by {@link attachRefreshFailure}, if any. */
export function getRefreshFailure(err: unknown): unknown {
  if (typeof err === "object" && err !== null) {
    return refreshFailures.get(err);
  }
  return undefined;
}
