export {
  TokenAutoUpdateClient,
  type AuthVersion,
  type RemoteClient,
  type TokenAutoUpdateClientParams,
  type WithCredentialRetry,
} from "./client";
export {
  configFilePath,
  getProfile,
  resolveRefreshSettings,
  type Profile,
  type RefreshSettings,
} from "./config";
export {
  CredentialFetcher,
  type Credential,
  type CredentialIssuer,
  type CredentialRefresher,
  type CredentialSink,
  type FetchSettings,
  type IssuedCredential,
} from "./credential_fetcher";
export { CredentialState, type CredentialSnapshot } from "./credential_state";
export {
  AuthInvalidError,
  ClientClosedError,
  CredentialFetchError,
  HighFrequencyError,
  InvalidConfigError,
  RemoteServiceError,
  getRefreshFailure,
  isCredentialError,
} from "./errors";
export {
  GrpcRemoteClient,
  createGrpcRemoteClient,
  signRequest,
  type GrpcRemoteClientParams,
} from "./grpc_client";
export {
  createLogger,
  parseLogLevel,
  withFields,
  type LogLevel,
  type Logger,
} from "./logger";
export { RefreshScheduler, computeRefreshDelay } from "./refresh_scheduler";
export {
  invokeWithCredentialRetry,
  type CredentialRetryOptions,
} from "./retrying_invoker";
