import type {
  InvalidCredentialsFailure,
  InvalidInputFailure,
  NotFoundFailure,
  RateLimitedFailure,
  Result,
  SessionExpiredFailure,
  TransportFailure,
  UsernameTakenFailure,
} from "@keyward/errors";
import type { KeyDerivation } from "../crypto/keyDerivation.js";
import type { SecretInput } from "../crypto/secret.js";
import type { SealedVault } from "../vault/types.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type ProtocolLogEvent =
  | { type: "request"; operation: string; method: "GET" | "POST"; path: string }
  | { type: "response"; operation: string; method: "GET" | "POST"; path: string; status: number; durationMs: number }
  | { type: "error"; operation: string; method: "GET" | "POST"; path: string; error: unknown; durationMs: number };

export type ProtocolConfig = {
  baseUrl: string;
  timeoutMs?: number;
  /**
   * Issuer label used when the authority omits a provisioning URI.
   */
  issuer?: string;
  fetch?: FetchFn;
  keyDerivation?: KeyDerivation;
  logger?: (event: ProtocolLogEvent) => void;
  now?: () => number;
};

export type SessionToken = string;

export type SecondFactorEnrollment = {
  sharedSecret: string;
  provisioningUri: string;
  qrCode: string;
  recoveryCodes: string[];
};

type Base = InvalidInputFailure | TransportFailure;

export type LookupSaltResult = Result<Uint8Array, Base | NotFoundFailure | RateLimitedFailure>;
export type RegisterResult = Result<void, Base | UsernameTakenFailure | RateLimitedFailure>;
export type LoginResult = Result<
  SessionToken,
  Base | NotFoundFailure | InvalidCredentialsFailure | RateLimitedFailure
>;
export type MfaStatusResult = Result<boolean, Base | NotFoundFailure | RateLimitedFailure>;
export type EnrollSecondFactorResult = Result<
  SecondFactorEnrollment,
  TransportFailure | SessionExpiredFailure | RateLimitedFailure
>;
export type VerifySecondFactorResult = Result<boolean, Base | RateLimitedFailure>;
export type DisableSecondFactorResult = Result<boolean, TransportFailure | RateLimitedFailure>;
export type FetchVaultResult = Result<SealedVault | null, TransportFailure | SessionExpiredFailure>;
export type StoreVaultResult = Result<void, TransportFailure | SessionExpiredFailure | RateLimitedFailure>;

/**
 * Client side of the zero-knowledge exchange with the remote authority. The
 * secret never leaves the process; only Argon2id verifiers and sealed vaults do.
 */
export interface CredentialProtocol {
  lookupSalt(username: string): Promise<LookupSaltResult>;
  register(username: string, secret: SecretInput): Promise<RegisterResult>;
  login(username: string, secret: SecretInput): Promise<LoginResult>;
  loginWithSecondFactor(username: string, secret: SecretInput, code: string): Promise<LoginResult>;
  mfaStatus(username: string): Promise<MfaStatusResult>;
  enrollSecondFactor(token: SessionToken): Promise<EnrollSecondFactorResult>;
  verifySecondFactor(username: string, code: string): Promise<VerifySecondFactorResult>;
  disableSecondFactor(token: SessionToken): Promise<DisableSecondFactorResult>;
  fetchVault(token: SessionToken): Promise<FetchVaultResult>;
  storeVault(token: SessionToken, sealed: SealedVault): Promise<StoreVaultResult>;
}
