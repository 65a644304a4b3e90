import {
  type DecryptionFailure,
  err,
  type Failure,
  failures,
  isKeywardError,
  KeywardReasons,
  ok,
  type Result,
  type SessionExpiredFailure,
  type TransportFailure,
} from "@keyward/errors";
import type { Debugger } from "debug";
import { bytesEqual, copyBytes, zeroize } from "../../crypto/bytes.js";
import { toSecretBytes } from "../../crypto/secret.js";
import { sessionErrors } from "../../errors/session.js";
import { vaultErrors } from "../../errors/vault.js";
import type { CredentialProtocol, SessionToken } from "../../protocol/types.js";
import type { ActivityAction, ActivityLogService } from "../../services/activityLog/types.js";
import { createLogger } from "../../utils/logger.js";
import { assessPasswordStrength } from "../../utils/password.js";
import { createSerialQueue } from "../../utils/serialQueue.js";
import { normalizeUsername } from "../../utils/username.js";
import { cloneCollection } from "../../vault/collection.js";
import type { CredentialCollection, SealedVault, VaultCipher } from "../../vault/types.js";
import { DEFAULT_AUTO_LOCK_MS } from "./constants.js";
import {
  SESSION_LOCKED,
  SESSION_STATE_CHANGED,
  SESSION_UNLOCK_FAILED,
  SESSION_UNLOCKED,
  type SessionMessenger,
} from "./topics.js";
import type {
  HostEvent,
  LockReason,
  RegisterOutcome,
  SecondFactorOrigin,
  SecondFactorOutcome,
  SessionCredentials,
  SessionLockController,
  SessionLockControllerOptions,
  SessionPhase,
  SessionState,
  SignInOutcome,
  TimerHandle,
  UnlockOutcome,
} from "./types.js";

type Attempt = { ticket: number; epoch: number };

// Known from sign-in until logout; survives a lock.
type Account = {
  username: string;
  secondFactorEnrolled: boolean;
  sealed: SealedVault;
};

// Exists only while unlocked.
type UnlockedMaterial = {
  token: SessionToken;
  secret: Uint8Array;
  collection: CredentialCollection;
};

type PendingSecondFactor = {
  username: string;
  secret: Uint8Array;
  origin: SecondFactorOrigin;
};

type LoadedVault = { sealed: SealedVault; collection: CredentialCollection };
type LoadVaultResult = Result<LoadedVault, TransportFailure | SessionExpiredFailure | DecryptionFailure>;

const SUPERSEDED = { status: "superseded" } as const;

const failed = <E extends Failure>(error: E) => ({ status: "failed" as const, error });

const isDecryptionError = (error: unknown) =>
  isKeywardError(error) && error.reason === KeywardReasons.VaultDecryptionFailed;

const nullOnDecryptionError = (error: unknown): null => {
  if (isDecryptionError(error)) return null;
  throw error;
};

const isSameSealed = (left: SealedVault, right: SealedVault) =>
  bytesEqual(left.vaultSalt, right.vaultSalt) &&
  bytesEqual(left.nonce, right.nonce) &&
  bytesEqual(left.ciphertext, right.ciphertext);

const assertPositiveNumber = (value: number, label: string) => {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${label} must be a positive number`);
  }
  return Math.round(value);
};

/**
 * Gates the decrypted collection behind the lock state machine.
 *
 * Every sign-in, unlock and second-factor attempt takes a ticket. Its result is
 * applied only if no later ticket has been applied and no lock, logout or
 * cancel happened since it started; otherwise it resolves as `superseded`.
 */
export class InMemorySessionLockController implements SessionLockController {
  #messenger: SessionMessenger;
  #protocol: CredentialProtocol;
  #cipher: VaultCipher;
  #activityLog: ActivityLogService | null;
  #now: () => number;
  #setTimeout: (handler: () => void, timeoutMs: number) => TimerHandle;
  #clearTimeout: (handle: TimerHandle) => void;
  #log: Debugger;

  #phase: SessionPhase = "signedOut";
  #account: Account | null = null;
  #unlocked: UnlockedMaterial | null = null;
  #pending: PendingSecondFactor | null = null;

  #foreground = true;
  #timeoutMs: number;
  #lastActivityAt: number | null = null;
  #nextAutoLockAt: number | null = null;
  #timerId: TimerHandle | null = null;

  #ticket = 0;
  #appliedTicket = 0;
  #epoch = 0;
  #saveQueue = createSerialQueue();

  constructor(options: SessionLockControllerOptions) {
    this.#messenger = options.messenger;
    this.#protocol = options.protocol;
    this.#cipher = options.cipher;
    this.#activityLog = options.activityLog ?? null;
    this.#now = options.now ?? (() => Date.now());
    this.#setTimeout = options.timers?.setTimeout ?? ((handler, timeoutMs) => setTimeout(handler, timeoutMs));
    this.#clearTimeout = options.timers?.clearTimeout ?? ((handle) => clearTimeout(handle));
    this.#log = options.logger ?? createLogger("core:session");
    this.#timeoutMs = assertPositiveNumber(options.autoLockDurationMs ?? DEFAULT_AUTO_LOCK_MS, "Auto-lock duration");

    this.#publishState();
  }

  getState(): SessionState {
    return {
      phase: this.#phase,
      username: this.#account?.username ?? this.#pending?.username ?? null,
      secondFactorEnrolled: this.#account?.secondFactorEnrolled ?? this.#pending !== null,
      pendingSecondFactor: this.#pending?.origin ?? null,
      foreground: this.#foreground,
      timeoutMs: this.#timeoutMs,
      lastActivityAt: this.#lastActivityAt,
      nextAutoLockAt: this.#nextAutoLockAt,
    };
  }

  async register({ username, secret }: { username: string; secret: string }): Promise<RegisterOutcome> {
    this.#assertPhase("register", ["signedOut"]);

    const strength = assessPasswordStrength(secret);
    if (!strength.strong) return failed(failures.weakPassword(strength.unmet));

    const name = normalizeUsername(username);
    const registered = await this.#protocol.register(name, secret);
    if (!registered.ok) return failed(registered.error);
    this.#log("registered %s", name);

    if (this.#phase !== "signedOut") return SUPERSEDED;
    return await this.#signIn(name, secret, true);
  }

  async signIn({ username, secret }: SessionCredentials): Promise<SignInOutcome> {
    this.#assertPhase("signIn", ["signedOut"]);
    return await this.#signIn(normalizeUsername(username), secret, false);
  }

  async submitSecondFactor(code: string): Promise<SecondFactorOutcome> {
    this.#assertPhase("submitSecondFactor", ["awaitingSecondFactor"]);
    const pending = this.#pending;
    if (!pending) throw sessionErrors.invalidState("submitSecondFactor", this.#phase);

    const attempt = this.#beginAttempt();
    // Own copy: a cancel zeroizes the pending secret while this attempt may still be running.
    const secret = copyBytes(pending.secret);
    let retained = false;
    try {
      const login = await this.#protocol.loginWithSecondFactor(pending.username, secret, code);
      if (!this.#isCurrent(attempt)) return SUPERSEDED;
      if (!login.ok) {
        if (login.error.reason === KeywardReasons.AuthInvalidCredentials) {
          this.#reportUnlockFailure(login.error.stage);
        }
        return failed(login.error);
      }

      const loaded = await this.#loadVault(login.value, secret);
      if (!this.#isCurrent(attempt)) return SUPERSEDED;
      if (!loaded.ok) return failed(loaded.error);

      this.#apply(attempt);
      this.#enterUnlocked(
        { username: pending.username, secondFactorEnrolled: true, sealed: loaded.value.sealed },
        { token: login.value, secret, collection: loaded.value.collection },
        true,
      );
      retained = true;
      this.#record(
        pending.origin === "signIn" ? { type: "signedIn", secondFactor: true } : { type: "unlocked", secondFactor: true },
      );
      return { status: "unlocked" };
    } finally {
      if (!retained) zeroize(secret);
    }
  }

  cancelSecondFactor(): void {
    this.#assertPhase("cancelSecondFactor", ["awaitingSecondFactor"]);
    const origin = this.#pending?.origin ?? "signIn";

    this.#epoch += 1;
    this.#clearPending();

    if (origin === "unlock" && this.#account) {
      this.#phase = "locked";
    } else {
      this.#phase = "signedOut";
      this.#account = null;
      this.#activityLog?.setUser(null);
    }
    this.#log("second factor cancelled, back to %s", this.#phase);
    this.#publishState();
  }

  async unlock(secret: SessionCredentials["secret"]): Promise<UnlockOutcome> {
    this.#assertPhase("unlock", ["locked"]);
    const account = this.#account;
    if (!account) throw sessionErrors.invalidState("unlock", this.#phase);

    const attempt = this.#beginAttempt();
    const secretBytes = toSecretBytes(secret);
    let retained = false;
    try {
      // The held vault is the first check, so a wrong secret never reaches the second-factor prompt.
      const collection = await this.#cipher.unseal(account.sealed, secretBytes).catch(nullOnDecryptionError);
      if (!this.#isCurrent(attempt)) return SUPERSEDED;
      if (!collection) {
        this.#reportUnlockFailure("secret");
        return failed(failures.invalidCredentials("secret"));
      }

      if (account.secondFactorEnrolled) {
        this.#apply(attempt);
        this.#setPending({ username: account.username, secret: secretBytes, origin: "unlock" });
        retained = true;
        this.#phase = "awaitingSecondFactor";
        this.#publishState();
        return { status: "awaitingSecondFactor" };
      }

      const login = await this.#protocol.login(account.username, secretBytes);
      if (!this.#isCurrent(attempt)) return SUPERSEDED;
      if (!login.ok) return failed(login.error);

      const loaded = await this.#loadVault(login.value, secretBytes, { sealed: account.sealed, collection });
      if (!this.#isCurrent(attempt)) return SUPERSEDED;
      if (!loaded.ok) return failed(loaded.error);

      this.#apply(attempt);
      this.#enterUnlocked(
        { ...account, sealed: loaded.value.sealed },
        { token: login.value, secret: secretBytes, collection: loaded.value.collection },
        false,
      );
      retained = true;
      this.#record({ type: "unlocked", secondFactor: false });
      return { status: "unlocked" };
    } finally {
      if (!retained) zeroize(secretBytes);
    }
  }

  lock(reason: LockReason = "manual"): void {
    if (this.#phase !== "unlocked") {
      return;
    }

    this.#clearAutoLockTimer();
    this.#epoch += 1;
    this.#disposeUnlocked();

    const at = this.#now();
    this.#phase = "locked";
    this.#nextAutoLockAt = null;

    this.#log("locked (%s)", reason);
    this.#publishState();
    this.#messenger.publish(SESSION_LOCKED, { at, reason });
    this.#record({ type: "locked", reason });
  }

  logout(): void {
    if (this.#phase === "signedOut") {
      return;
    }

    this.#clearAutoLockTimer();
    this.#epoch += 1;
    this.#disposeUnlocked();
    this.#clearPending();
    this.#record({ type: "signedOut" });
    this.#activityLog?.setUser(null);

    this.#account = null;
    this.#phase = "signedOut";
    this.#lastActivityAt = null;
    this.#nextAutoLockAt = null;

    this.#log("signed out");
    this.#publishState();
  }

  handleHostEvent(event: HostEvent): void {
    switch (event.type) {
      case "activity":
        // The countdown keeps running in the background; input there does not extend it.
        if (this.#phase !== "unlocked" || !this.#foreground) return;
        this.#touch();
        return;
      case "backgrounded":
        this.#foreground = false;
        this.#publishState();
        return;
      case "foregrounded": {
        this.#foreground = true;
        if (this.#phase !== "unlocked") {
          this.#publishState();
          return;
        }
        const idleFor = this.#now() - (this.#lastActivityAt ?? this.#now());
        if (idleFor >= this.#timeoutMs) {
          this.lock("timeout");
          return;
        }
        this.#touch();
        return;
      }
    }
  }

  setAutoLockDuration(durationMs: number): void {
    const resolved = assertPositiveNumber(durationMs, "Auto-lock duration");
    if (resolved === this.#timeoutMs) {
      return;
    }

    this.#timeoutMs = resolved;
    if (this.#phase === "unlocked") {
      this.#scheduleAutoLock();
      return;
    }
    this.#publishState();
  }

  getCollection(): CredentialCollection {
    const unlocked = this.#unlocked;
    if (this.#phase !== "unlocked" || !unlocked) throw vaultErrors.locked();
    return cloneCollection(unlocked.collection);
  }

  /**
   * Seals `next` and replaces the remote vault with it. Saves run one at a time.
   */
  async saveCollection(next: CredentialCollection) {
    const unlocked = this.#unlocked;
    const account = this.#account;
    if (this.#phase !== "unlocked" || !unlocked || !account) throw vaultErrors.locked();

    const snapshot = cloneCollection(next);
    const secret = copyBytes(unlocked.secret);
    const { token } = unlocked;

    return await this.#saveQueue(async () => {
      try {
        const sealed = await this.#cipher.seal(snapshot, secret);
        const stored = await this.#protocol.storeVault(token, sealed);
        if (!stored.ok) return stored;

        if (this.#account === account) account.sealed = sealed;
        if (this.#unlocked === unlocked) unlocked.collection = snapshot;
        this.#log("vault saved with %d entries", snapshot.size);
        this.#record({ type: "vaultSaved", entries: snapshot.size });
        return stored;
      } finally {
        zeroize(secret);
      }
    });
  }

  async enrollSecondFactor() {
    const { unlocked } = this.#requireUnlocked("enrollSecondFactor");
    return await this.#protocol.enrollSecondFactor(unlocked.token);
  }

  async confirmSecondFactor(code: string) {
    const { account } = this.#requireUnlocked("confirmSecondFactor");
    const verified = await this.#protocol.verifySecondFactor(account.username, code);
    if (verified.ok && verified.value && this.#account === account) {
      account.secondFactorEnrolled = true;
      this.#record({ type: "secondFactorEnabled" });
      this.#publishState();
    }
    return verified;
  }

  async disableSecondFactor() {
    const { account, unlocked } = this.#requireUnlocked("disableSecondFactor");
    const disabled = await this.#protocol.disableSecondFactor(unlocked.token);
    if (disabled.ok && disabled.value && this.#account === account) {
      account.secondFactorEnrolled = false;
      this.#record({ type: "secondFactorDisabled" });
      this.#publishState();
    }
    return disabled;
  }

  onStateChanged(handler: (state: SessionState) => void) {
    return this.#messenger.subscribe(SESSION_STATE_CHANGED, handler);
  }

  onLocked(handler: (payload: { at: number; reason: LockReason }) => void) {
    return this.#messenger.subscribe(SESSION_LOCKED, handler);
  }

  onUnlocked(handler: (payload: { at: number; secondFactor: boolean }) => void) {
    return this.#messenger.subscribe(SESSION_UNLOCKED, handler);
  }

  onUnlockFailed(handler: (payload: { at: number; stage: "secret" | "second_factor" }) => void) {
    return this.#messenger.subscribe(SESSION_UNLOCK_FAILED, handler);
  }

  async #signIn(username: string, secret: SessionCredentials["secret"], registered: boolean): Promise<SignInOutcome> {
    const attempt = this.#beginAttempt();
    const secretBytes = toSecretBytes(secret);
    let retained = false;
    try {
      const login = await this.#protocol.login(username, secretBytes);
      if (!this.#isCurrent(attempt)) return SUPERSEDED;
      if (!login.ok) return failed(login.error);

      const status = await this.#protocol.mfaStatus(username);
      if (!this.#isCurrent(attempt)) return SUPERSEDED;
      if (!status.ok) return failed(status.error);

      if (status.value) {
        this.#apply(attempt);
        this.#startActivityLog(username, registered);
        this.#setPending({ username, secret: secretBytes, origin: "signIn" });
        retained = true;
        this.#phase = "awaitingSecondFactor";
        this.#log("%s awaits a second factor", username);
        this.#publishState();
        return { status: "awaitingSecondFactor" };
      }

      const loaded = await this.#loadVault(login.value, secretBytes);
      if (!this.#isCurrent(attempt)) return SUPERSEDED;
      if (!loaded.ok) return failed(loaded.error);

      this.#apply(attempt);
      this.#startActivityLog(username, registered);
      this.#enterUnlocked(
        { username, secondFactorEnrolled: false, sealed: loaded.value.sealed },
        { token: login.value, secret: secretBytes, collection: loaded.value.collection },
        false,
      );
      retained = true;
      this.#record({ type: "signedIn", secondFactor: false });
      return { status: "unlocked" };
    } finally {
      if (!retained) zeroize(secretBytes);
    }
  }

  async #loadVault(token: SessionToken, secret: Uint8Array, known?: LoadedVault): Promise<LoadVaultResult> {
    const fetched = await this.#protocol.fetchVault(token);
    if (!fetched.ok) return fetched;

    const remote = fetched.value;
    if (!remote) {
      if (known) return ok(known);
      // Nothing stored yet: seal an empty collection locally so a later unlock has something to check against.
      const empty: CredentialCollection = new Map();
      return ok({ sealed: await this.#cipher.seal(empty, secret), collection: empty });
    }
    if (known && isSameSealed(known.sealed, remote)) return ok(known);

    const collection = await this.#cipher.unseal(remote, secret).catch(nullOnDecryptionError);
    return collection ? ok({ sealed: remote, collection }) : err(failures.decryption());
  }

  #enterUnlocked(account: Account, material: UnlockedMaterial, secondFactor: boolean) {
    this.#clearPending();
    this.#disposeUnlocked();

    const at = this.#now();
    this.#account = account;
    this.#unlocked = material;
    this.#phase = "unlocked";
    this.#lastActivityAt = at;

    this.#log("unlocked %s", account.username);
    this.#scheduleAutoLock();
    this.#messenger.publish(SESSION_UNLOCKED, { at, secondFactor });
  }

  #touch() {
    this.#lastActivityAt = this.#now();
    this.#scheduleAutoLock();
  }

  #scheduleAutoLock() {
    this.#clearAutoLockTimer();
    if (this.#phase !== "unlocked") {
      this.#nextAutoLockAt = null;
      this.#publishState();
      return;
    }

    const timeout = this.#timeoutMs;
    this.#nextAutoLockAt = this.#now() + timeout;
    this.#timerId = this.#setTimeout(() => {
      this.#timerId = null;
      this.lock("timeout");
    }, timeout);
    this.#publishState();
  }

  #clearAutoLockTimer() {
    if (this.#timerId !== null) {
      this.#clearTimeout(this.#timerId);
      this.#timerId = null;
    }
  }

  #beginAttempt(): Attempt {
    this.#ticket += 1;
    return { ticket: this.#ticket, epoch: this.#epoch };
  }

  #isCurrent(attempt: Attempt) {
    return attempt.epoch === this.#epoch && attempt.ticket > this.#appliedTicket;
  }

  #apply(attempt: Attempt) {
    this.#appliedTicket = attempt.ticket;
  }

  #setPending(pending: PendingSecondFactor) {
    this.#clearPending();
    this.#pending = pending;
  }

  #clearPending() {
    if (this.#pending) {
      zeroize(this.#pending.secret);
      this.#pending = null;
    }
  }

  #disposeUnlocked() {
    if (this.#unlocked) {
      zeroize(this.#unlocked.secret);
      this.#unlocked = null;
    }
  }

  #requireUnlocked(operation: string) {
    const account = this.#account;
    const unlocked = this.#unlocked;
    if (this.#phase !== "unlocked" || !account || !unlocked) {
      throw sessionErrors.invalidState(operation, this.#phase);
    }
    return { account, unlocked };
  }

  #assertPhase(operation: string, allowed: readonly SessionPhase[]) {
    if (!allowed.includes(this.#phase)) {
      throw sessionErrors.invalidState(operation, this.#phase);
    }
  }

  #startActivityLog(username: string, registered: boolean) {
    this.#activityLog?.setUser(username);
    if (registered) this.#record({ type: "registered" });
  }

  #reportUnlockFailure(stage: "secret" | "second_factor") {
    this.#log("unlock failed at %s stage", stage);
    this.#messenger.publish(SESSION_UNLOCK_FAILED, { at: this.#now(), stage });
    this.#record({ type: "unlockFailed", stage });
  }

  #record(action: ActivityAction) {
    const activityLog = this.#activityLog;
    if (!activityLog) return;
    activityLog.record(action).catch((error: unknown) => {
      this.#log("activity log write failed: %O", error);
    });
  }

  #publishState() {
    this.#messenger.publish(SESSION_STATE_CHANGED, this.getState());
  }
}

export const createSessionLockController = (options: SessionLockControllerOptions): SessionLockController =>
  new InMemorySessionLockController(options);
