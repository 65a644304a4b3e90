import { type KeywardError, keywardError } from "./KeywardError.js";
import { KeywardReasons } from "./reasons.js";

/**
 * Expected outcomes of protocol, vault and session operations.
 *
 * Each variant carries only the data its caller can act on. Operations return
 * them inside a {@link Result}; `toKeywardError` lifts one into a throwable.
 */
export type InvalidInputFailure = { reason: typeof KeywardReasons.AuthInvalidInput; message: string };
export type NotFoundFailure = { reason: typeof KeywardReasons.AuthNotFound };
export type InvalidCredentialsFailure = {
  reason: typeof KeywardReasons.AuthInvalidCredentials;
  stage: "secret" | "second_factor";
};
export type UsernameTakenFailure = { reason: typeof KeywardReasons.AuthUsernameTaken };
export type WeakPasswordFailure = { reason: typeof KeywardReasons.AuthWeakPassword; unmet: readonly string[] };
export type RateLimitedFailure = {
  reason: typeof KeywardReasons.AuthRateLimited;
  retryAfterSeconds: number;
  message: string;
};
export type SessionExpiredFailure = { reason: typeof KeywardReasons.AuthSessionExpired };
export type DecryptionFailure = { reason: typeof KeywardReasons.VaultDecryptionFailed };
export type NetworkFailure = { reason: typeof KeywardReasons.TransportNetwork; message: string };
export type InvalidResponseFailure = {
  reason: typeof KeywardReasons.TransportInvalidResponse;
  status: number | null;
  message: string;
};

export type TransportFailure = NetworkFailure | InvalidResponseFailure;

export type Failure =
  | InvalidInputFailure
  | NotFoundFailure
  | InvalidCredentialsFailure
  | UsernameTakenFailure
  | WeakPasswordFailure
  | RateLimitedFailure
  | SessionExpiredFailure
  | DecryptionFailure
  | TransportFailure;

export type Ok<T> = { ok: true; value: T };
export type Err<E extends Failure> = { ok: false; error: E };
export type Result<T, E extends Failure> = Ok<T> | Err<E>;

export const ok = <T>(value: T): Ok<T> => ({ ok: true, value });
export const err = <E extends Failure>(error: E): Err<E> => ({ ok: false, error });

export const failures = {
  invalidInput: (message: string): InvalidInputFailure => ({ reason: KeywardReasons.AuthInvalidInput, message }),
  notFound: (): NotFoundFailure => ({ reason: KeywardReasons.AuthNotFound }),
  invalidCredentials: (stage: InvalidCredentialsFailure["stage"] = "secret"): InvalidCredentialsFailure => ({
    reason: KeywardReasons.AuthInvalidCredentials,
    stage,
  }),
  usernameTaken: (): UsernameTakenFailure => ({ reason: KeywardReasons.AuthUsernameTaken }),
  weakPassword: (unmet: readonly string[]): WeakPasswordFailure => ({
    reason: KeywardReasons.AuthWeakPassword,
    unmet: [...unmet],
  }),
  rateLimited: (retryAfterSeconds: number, message: string): RateLimitedFailure => ({
    reason: KeywardReasons.AuthRateLimited,
    retryAfterSeconds,
    message,
  }),
  sessionExpired: (): SessionExpiredFailure => ({ reason: KeywardReasons.AuthSessionExpired }),
  decryption: (): DecryptionFailure => ({ reason: KeywardReasons.VaultDecryptionFailed }),
  network: (message: string): NetworkFailure => ({ reason: KeywardReasons.TransportNetwork, message }),
  invalidResponse: (status: number | null, message: string): InvalidResponseFailure => ({
    reason: KeywardReasons.TransportInvalidResponse,
    status,
    message,
  }),
};

const describeFailure = (failure: Failure): string => {
  switch (failure.reason) {
    case KeywardReasons.AuthInvalidInput:
      return failure.message;
    case KeywardReasons.AuthNotFound:
      return "No account exists for this username";
    case KeywardReasons.AuthInvalidCredentials:
      return failure.stage === "second_factor" ? "Invalid verification code" : "Invalid username or password";
    case KeywardReasons.AuthUsernameTaken:
      return "Username is already taken";
    case KeywardReasons.AuthWeakPassword:
      return `Password does not meet requirements: ${failure.unmet.join(", ")}`;
    case KeywardReasons.AuthRateLimited:
      return failure.message;
    case KeywardReasons.AuthSessionExpired:
      return "Session token was rejected";
    case KeywardReasons.VaultDecryptionFailed:
      return "Invalid username or password";
    case KeywardReasons.TransportNetwork:
      return failure.message;
    case KeywardReasons.TransportInvalidResponse:
      return failure.message;
  }
};

export const toKeywardError = (failure: Failure): KeywardError => {
  const { reason, ...data } = failure;
  return keywardError({
    reason,
    message: describeFailure(failure),
    ...(Object.keys(data).length > 0 ? { data } : {}),
  });
};
