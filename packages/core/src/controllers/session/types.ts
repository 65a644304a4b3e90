import type {
  DecryptionFailure,
  Failure,
  InvalidCredentialsFailure,
  InvalidInputFailure,
  NotFoundFailure,
  RateLimitedFailure,
  SessionExpiredFailure,
  TransportFailure,
  UsernameTakenFailure,
  WeakPasswordFailure,
} from "@keyward/errors";
import type { Debugger } from "debug";
import type { SecretInput } from "../../crypto/secret.js";
import type { Unsubscribe } from "../../messenger/topic.js";
import type {
  CredentialProtocol,
  DisableSecondFactorResult,
  EnrollSecondFactorResult,
  StoreVaultResult,
  VerifySecondFactorResult,
} from "../../protocol/types.js";
import type { ActivityLogService } from "../../services/activityLog/types.js";
import type { CredentialCollection, VaultCipher } from "../../vault/types.js";
import type { SessionMessenger } from "./topics.js";

/**
 * `signedOut` sits outside the lock machine; the other three are its states.
 */
export type SessionPhase = "signedOut" | "unlocked" | "locked" | "awaitingSecondFactor";

export type LockReason = "manual" | "timeout";

/**
 * Where a cancelled second-factor prompt returns to.
 */
export type SecondFactorOrigin = "signIn" | "unlock";

export type HostEvent = { type: "activity" } | { type: "foregrounded" } | { type: "backgrounded" };

export type SessionState = {
  phase: SessionPhase;
  username: string | null;
  secondFactorEnrolled: boolean;
  pendingSecondFactor: SecondFactorOrigin | null;
  foreground: boolean;
  timeoutMs: number;
  lastActivityAt: number | null;
  nextAutoLockAt: number | null;
};

export type SessionFailure =
  | InvalidInputFailure
  | TransportFailure
  | NotFoundFailure
  | InvalidCredentialsFailure
  | RateLimitedFailure
  | SessionExpiredFailure
  | DecryptionFailure;

export type RegisterFailure = SessionFailure | UsernameTakenFailure | WeakPasswordFailure;

export type AttemptOutcome<E extends Failure = SessionFailure> =
  | { status: "unlocked" }
  | { status: "awaitingSecondFactor" }
  | { status: "failed"; error: E }
  /**
   * A later attempt, a lock or a logout overtook this one; nothing was applied.
   */
  | { status: "superseded" };

export type SignInOutcome = AttemptOutcome;
export type RegisterOutcome = AttemptOutcome<RegisterFailure>;
export type UnlockOutcome = AttemptOutcome;
export type SecondFactorOutcome = Exclude<AttemptOutcome, { status: "awaitingSecondFactor" }>;

export type SessionLockedPayload = { at: number; reason: LockReason };
export type SessionUnlockedPayload = { at: number; secondFactor: boolean };
export type SessionUnlockFailedPayload = { at: number; stage: InvalidCredentialsFailure["stage"] };

export type SessionCredentials = {
  username: string;
  secret: SecretInput;
};

export type TimerHandle = ReturnType<typeof setTimeout>;

export type SessionTimers = {
  setTimeout?: (handler: () => void, timeoutMs: number) => TimerHandle;
  clearTimeout?: (handle: TimerHandle) => void;
};

export type SessionLockControllerOptions = {
  messenger: SessionMessenger;
  protocol: CredentialProtocol;
  cipher: VaultCipher;
  activityLog?: ActivityLogService;
  autoLockDurationMs?: number;
  now?: () => number;
  timers?: SessionTimers;
  logger?: Debugger;
};

export interface SessionLockController {
  getState(): SessionState;

  register(credentials: { username: string; secret: string }): Promise<RegisterOutcome>;
  signIn(credentials: SessionCredentials): Promise<SignInOutcome>;
  submitSecondFactor(code: string): Promise<SecondFactorOutcome>;
  cancelSecondFactor(): void;
  unlock(secret: SecretInput): Promise<UnlockOutcome>;
  lock(reason?: LockReason): void;
  logout(): void;

  handleHostEvent(event: HostEvent): void;
  setAutoLockDuration(durationMs: number): void;

  getCollection(): CredentialCollection;
  saveCollection(next: CredentialCollection): Promise<StoreVaultResult>;

  enrollSecondFactor(): Promise<EnrollSecondFactorResult>;
  confirmSecondFactor(code: string): Promise<VerifySecondFactorResult>;
  disableSecondFactor(): Promise<DisableSecondFactorResult>;

  onStateChanged(handler: (state: SessionState) => void): Unsubscribe;
  onLocked(handler: (payload: SessionLockedPayload) => void): Unsubscribe;
  onUnlocked(handler: (payload: SessionUnlockedPayload) => void): Unsubscribe;
  onUnlockFailed(handler: (payload: SessionUnlockFailedPayload) => void): Unsubscribe;
}
