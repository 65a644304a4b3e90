export type {
  DecryptionFailure,
  Err,
  Failure,
  InvalidCredentialsFailure,
  InvalidInputFailure,
  InvalidResponseFailure,
  NetworkFailure,
  NotFoundFailure,
  Ok,
  RateLimitedFailure,
  Result,
  SessionExpiredFailure,
  TransportFailure,
  UsernameTakenFailure,
  WeakPasswordFailure,
} from "./failures.js";
export { err, failures, ok, toKeywardError } from "./failures.js";
export type { KeywardErrorInput, KeywardErrorJson } from "./KeywardError.js";
export { isKeywardError, KeywardError, keywardError } from "./KeywardError.js";
export type { KeywardReason } from "./reasons.js";
export { KeywardReasons } from "./reasons.js";
