export type { ResolvedProtocolConfig } from "./config.js";
export { DEFAULT_ISSUER, DEFAULT_TIMEOUT_MS, ProtocolSettingsSchema, resolveProtocolConfig } from "./config.js";
export { createCredentialProtocol } from "./CredentialProtocol.js";
export { DEFAULT_RETRY_AFTER_SECONDS, resolveRetryAfter } from "./rateLimit.js";
export type { HttpMethod, HttpRequest, HttpResponse, HttpTransport } from "./transport.js";
export { createHttpTransport } from "./transport.js";
export type {
  CredentialProtocol,
  DisableSecondFactorResult,
  EnrollSecondFactorResult,
  FetchFn,
  FetchVaultResult,
  LoginResult,
  LookupSaltResult,
  MfaStatusResult,
  ProtocolConfig,
  ProtocolLogEvent,
  RegisterResult,
  SecondFactorEnrollment,
  SessionToken,
  StoreVaultResult,
  VerifySecondFactorResult,
} from "./types.js";
