export { DEFAULT_AUTO_LOCK_MS } from "./constants.js";
export { createSessionLockController, InMemorySessionLockController } from "./SessionLockController.js";
export type { SessionMessenger } from "./topics.js";
export {
  SESSION_LOCKED,
  SESSION_STATE_CHANGED,
  SESSION_TOPICS,
  SESSION_UNLOCK_FAILED,
  SESSION_UNLOCKED,
} from "./topics.js";
export type {
  AttemptOutcome,
  HostEvent,
  LockReason,
  RegisterFailure,
  RegisterOutcome,
  SecondFactorOrigin,
  SecondFactorOutcome,
  SessionCredentials,
  SessionFailure,
  SessionLockController,
  SessionLockControllerOptions,
  SessionLockedPayload,
  SessionPhase,
  SessionState,
  SessionTimers,
  SessionUnlockedPayload,
  SessionUnlockFailedPayload,
  SignInOutcome,
  TimerHandle,
  UnlockOutcome,
} from "./types.js";
