import { KeywardReasons } from "@keyward/errors";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createFakeAuthority, FAKE_AUTHORITY_URL, FAKE_VALID_CODE } from "../../__fixtures__/fakeAuthority.js";
import { createTestKeyDerivation } from "../../__fixtures__/keyDerivation.js";
import { Messenger } from "../../messenger/Messenger.js";
import { createCredentialProtocol } from "../../protocol/CredentialProtocol.js";
import type { FetchFn } from "../../protocol/types.js";
import { createActivityLogService } from "../../services/activityLog/ActivityLogService.js";
import { createInMemoryActivityLogPort } from "../../services/activityLog/port.js";
import type { CredentialCollection } from "../../vault/types.js";
import { createVaultCipher } from "../../vault/vaultCipher.js";
import { InMemorySessionLockController } from "./SessionLockController.js";
import { SESSION_TOPICS } from "./topics.js";
import type { SessionLockedPayload, SessionUnlockFailedPayload } from "./types.js";

const SECRET = "Secret123!";

const controllers: InMemorySessionLockController[] = [];

const setup = (options: { autoLockDurationMs?: number; wrapFetch?: (fetch: FetchFn) => FetchFn } = {}) => {
  const authority = createFakeAuthority();
  const keyDerivation = createTestKeyDerivation();
  const fetch = options.wrapFetch ? options.wrapFetch(authority.fetch) : authority.fetch;
  const protocol = createCredentialProtocol({
    baseUrl: FAKE_AUTHORITY_URL,
    fetch,
    keyDerivation,
    logger: () => {},
  });
  const activityLog = createActivityLogService({ port: createInMemoryActivityLogPort() });
  const controller = new InMemorySessionLockController({
    messenger: new Messenger().scope({ name: "session", topics: SESSION_TOPICS }),
    protocol,
    cipher: createVaultCipher({ keyDerivation }),
    activityLog,
    autoLockDurationMs: options.autoLockDurationMs ?? 60_000,
  });
  controllers.push(controller);
  return { authority, protocol, activityLog, controller };
};

const createGate = () => {
  let open = () => {};
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open: () => open() };
};

const sampleCollection = (): CredentialCollection =>
  new Map([
    ["email", { password: "MyP@ssw0rd!", updatedAt: "2024-01-01T00:00:00.000Z", category: "Personal" }],
    [
      "bank",
      {
        password: "hunter2",
        updatedAt: "2024-01-02T00:00:00.000Z",
        category: "Banking",
        fields: { username: "alice-bank" },
      },
    ],
  ]);

afterEach(() => {
  for (const controller of controllers.splice(0)) controller.logout();
  vi.useRealTimers();
});

describe("InMemorySessionLockController", () => {
  describe("sign-in", () => {
    it("starts signed out", () => {
      const { controller } = setup();

      expect(controller.getState()).toEqual({
        phase: "signedOut",
        username: null,
        secondFactorEnrolled: false,
        pendingSecondFactor: null,
        foreground: true,
        timeoutMs: 60_000,
        lastActivityAt: null,
        nextAutoLockAt: null,
      });
    });

    it("registers, signs in and records both", async () => {
      const { controller, activityLog } = setup();

      expect(await controller.register({ username: " Alice ", secret: SECRET })).toEqual({ status: "unlocked" });
      expect(controller.getState()).toMatchObject({ phase: "unlocked", username: "alice" });
      expect(controller.getCollection().size).toBe(0);
      expect((await activityLog.list()).map((entry) => entry.message)).toEqual(["Signed in", "Account created"]);
    });

    it("refuses a weak password before contacting the authority", async () => {
      const { controller, authority } = setup();

      expect(await controller.register({ username: "alice", secret: "short" })).toEqual({
        status: "failed",
        error: { reason: KeywardReasons.AuthWeakPassword, unmet: ["length", "uppercase", "digit", "symbol"] },
      });
      expect(authority.requests).toHaveLength(0);
    });

    it("surfaces an unknown account as NotFound", async () => {
      const { controller } = setup();

      expect(await controller.signIn({ username: "nobody", secret: SECRET })).toEqual({
        status: "failed",
        error: { reason: KeywardReasons.AuthNotFound },
      });
      expect(controller.getState().phase).toBe("signedOut");
    });

    it("rejects a wrong secret", async () => {
      const { controller, protocol } = setup();
      await protocol.register("alice", SECRET);

      expect(await controller.signIn({ username: "alice", secret: "WrongPass!" })).toEqual({
        status: "failed",
        error: { reason: KeywardReasons.AuthInvalidCredentials, stage: "secret" },
      });
      expect(controller.getState().phase).toBe("signedOut");
    });

    it("lets a later sign-in win over an earlier one that finishes last", async () => {
      const gate = createGate();
      let loginCalls = 0;
      const { controller, protocol } = setup({
        wrapFetch: (fetch) => async (input, init) => {
          if (new URL(input).pathname === "/login") {
            loginCalls += 1;
            if (loginCalls === 1) await gate.opened;
          }
          return fetch(input, init);
        },
      });
      await protocol.register("alice", SECRET);

      const first = controller.signIn({ username: "alice", secret: SECRET });
      await vi.waitFor(() => expect(loginCalls).toBe(1));
      const second = controller.signIn({ username: "alice", secret: SECRET });

      expect(await second).toEqual({ status: "unlocked" });
      gate.open();
      expect(await first).toEqual({ status: "superseded" });
      expect(controller.getState().phase).toBe("unlocked");
    });
  });

  describe("collection", () => {
    it("saves to the authority and reloads on the next sign-in", async () => {
      const { controller, authority } = setup();
      await controller.register({ username: "alice", secret: SECRET });

      expect(await controller.saveCollection(sampleCollection())).toEqual({ ok: true, value: undefined });
      expect(authority.account("alice")?.blob).toEqual({
        vault_salt: expect.stringMatching(/^[0-9a-f]{32}$/),
        nonce: expect.stringMatching(/^[0-9a-f]{48}$/),
        ciphertext: expect.stringMatching(/^[0-9a-f]+$/),
      });

      controller.logout();
      await controller.signIn({ username: "alice", secret: SECRET });
      expect(controller.getCollection()).toEqual(sampleCollection());
    });

    it("hands out copies", async () => {
      const { controller } = setup();
      await controller.register({ username: "alice", secret: SECRET });
      await controller.saveCollection(sampleCollection());

      controller.getCollection().delete("email");
      expect(controller.getCollection().has("email")).toBe(true);
    });

    it("refuses access while locked", async () => {
      const { controller } = setup();
      await controller.register({ username: "alice", secret: SECRET });
      controller.lock();

      expect(() => controller.getCollection()).toThrowError(
        expect.objectContaining({ reason: KeywardReasons.VaultLocked }),
      );
      await expect(controller.saveCollection(new Map())).rejects.toMatchObject({ reason: KeywardReasons.VaultLocked });
    });
  });

  describe("lock and unlock", () => {
    it("locks, rejects a wrong secret and unlocks with the right one", async () => {
      const { controller, authority, activityLog } = setup();
      await controller.register({ username: "alice", secret: SECRET });
      await controller.saveCollection(sampleCollection());

      const locked: SessionLockedPayload[] = [];
      const failures: SessionUnlockFailedPayload[] = [];
      controller.onLocked((payload) => locked.push(payload));
      controller.onUnlockFailed((payload) => failures.push(payload));

      controller.lock();
      expect(controller.getState()).toMatchObject({ phase: "locked", username: "alice", nextAutoLockAt: null });
      expect(locked).toEqual([{ at: expect.any(Number), reason: "manual" }]);

      const requestsBefore = authority.requests.length;
      expect(await controller.unlock("WrongPass!")).toEqual({
        status: "failed",
        error: { reason: KeywardReasons.AuthInvalidCredentials, stage: "secret" },
      });
      expect(controller.getState().phase).toBe("locked");
      expect(failures).toEqual([{ at: expect.any(Number), stage: "secret" }]);
      expect(authority.requests).toHaveLength(requestsBefore);

      expect(await controller.unlock(SECRET)).toEqual({ status: "unlocked" });
      expect(controller.getCollection()).toEqual(sampleCollection());
      expect(authority.requests.slice(requestsBefore).map((request) => request.path)).toEqual([
        "/auth_salt/alice",
        "/login",
        "/vault",
      ]);
      expect((await activityLog.list()).slice(0, 4).map((entry) => entry.message)).toEqual([
        "Vault unlocked",
        "Unlock failed: wrong password",
        "Vault locked",
        "Vault saved (2 entries)",
      ]);
    });

    it("ignores lock requests unless unlocked", async () => {
      const { controller } = setup();
      const onLocked = vi.fn();
      controller.onLocked(onLocked);

      controller.lock();
      expect(controller.getState().phase).toBe("signedOut");
      expect(onLocked).not.toHaveBeenCalled();
    });

    it("rejects an unlock outside the locked phase", async () => {
      const { controller } = setup();

      await expect(controller.unlock(SECRET)).rejects.toMatchObject({
        reason: KeywardReasons.SessionInvalidState,
        message: "Cannot unlock while the session is signedOut",
      });
    });

    it("drops an unlock overtaken by a logout", async () => {
      const { controller } = setup();
      await controller.register({ username: "alice", secret: SECRET });
      controller.lock();

      const pending = controller.unlock(SECRET);
      controller.logout();

      expect(await pending).toEqual({ status: "superseded" });
      expect(controller.getState().phase).toBe("signedOut");
    });

    it("clears everything on logout", async () => {
      const { controller, activityLog } = setup();
      await controller.register({ username: "alice", secret: SECRET });
      await controller.saveCollection(sampleCollection());

      controller.logout();

      expect(controller.getState()).toMatchObject({
        phase: "signedOut",
        username: null,
        secondFactorEnrolled: false,
        lastActivityAt: null,
        nextAutoLockAt: null,
      });
      expect(() => controller.getCollection()).toThrowError("Vault is locked");
      expect(activityLog.getUser()).toBeNull();
      activityLog.setUser("alice");
      expect((await activityLog.list())[0]?.message).toBe("Signed out");
    });
  });

  describe("second factor", () => {
    const enrolAlice = async (controller: InMemorySessionLockController) => {
      await controller.register({ username: "alice", secret: SECRET });
      const enrollment = await controller.enrollSecondFactor();
      expect(enrollment.ok).toBe(true);
      expect(await controller.confirmSecondFactor(FAKE_VALID_CODE)).toEqual({ ok: true, value: true });
    };

    it("enrols through the held session", async () => {
      const { controller, authority } = setup();
      await enrolAlice(controller);

      expect(controller.getState().secondFactorEnrolled).toBe(true);
      expect(authority.account("alice")?.mfaEnabled).toBe(true);
    });

    it("requires the code after the secret on sign-in", async () => {
      const { controller } = setup();
      await enrolAlice(controller);
      controller.logout();

      expect(await controller.signIn({ username: "alice", secret: "WrongPass!" })).toEqual({
        status: "failed",
        error: { reason: KeywardReasons.AuthInvalidCredentials, stage: "secret" },
      });
      expect(controller.getState().phase).toBe("signedOut");

      expect(await controller.signIn({ username: "alice", secret: SECRET })).toEqual({
        status: "awaitingSecondFactor",
      });
      expect(controller.getState()).toMatchObject({ phase: "awaitingSecondFactor", pendingSecondFactor: "signIn" });

      expect(await controller.submitSecondFactor("000000")).toEqual({
        status: "failed",
        error: { reason: KeywardReasons.AuthInvalidCredentials, stage: "second_factor" },
      });
      expect(controller.getState().phase).toBe("awaitingSecondFactor");

      expect(await controller.submitSecondFactor(FAKE_VALID_CODE)).toEqual({ status: "unlocked" });
      expect(controller.getState()).toMatchObject({ phase: "unlocked", pendingSecondFactor: null });
    });

    it("returns to signed out when a sign-in prompt is cancelled", async () => {
      const { controller } = setup();
      await enrolAlice(controller);
      controller.logout();
      await controller.signIn({ username: "alice", secret: SECRET });

      controller.cancelSecondFactor();

      expect(controller.getState()).toMatchObject({ phase: "signedOut", username: null, pendingSecondFactor: null });
    });

    it("only prompts for a code after the secret unseals the vault", async () => {
      const { controller, authority } = setup();
      await enrolAlice(controller);
      controller.lock();

      const requestsBefore = authority.requests.length;
      expect(await controller.unlock("WrongPass!")).toEqual({
        status: "failed",
        error: { reason: KeywardReasons.AuthInvalidCredentials, stage: "secret" },
      });
      expect(controller.getState().phase).toBe("locked");

      expect(await controller.unlock(SECRET)).toEqual({ status: "awaitingSecondFactor" });
      expect(controller.getState().pendingSecondFactor).toBe("unlock");
      expect(authority.requests).toHaveLength(requestsBefore);

      controller.cancelSecondFactor();
      expect(controller.getState()).toMatchObject({ phase: "locked", username: "alice" });

      expect(await controller.unlock(SECRET)).toEqual({ status: "awaitingSecondFactor" });
      expect(await controller.submitSecondFactor(FAKE_VALID_CODE)).toEqual({ status: "unlocked" });
    });

    it("returns to locked when a code check in flight is cancelled", async () => {
      const { controller, authority } = setup();
      await enrolAlice(controller);
      controller.lock();
      expect(await controller.unlock(SECRET)).toEqual({ status: "awaitingSecondFactor" });

      const release = authority.pause();
      const pending = controller.submitSecondFactor(FAKE_VALID_CODE);
      controller.cancelSecondFactor();
      release();

      expect(await pending).toEqual({ status: "superseded" });
      expect(controller.getState()).toMatchObject({ phase: "locked", pendingSecondFactor: null });
    });

    it("disables the second factor", async () => {
      const { controller, authority } = setup();
      await enrolAlice(controller);

      expect(await controller.disableSecondFactor()).toEqual({ ok: true, value: true });
      expect(controller.getState().secondFactorEnrolled).toBe(false);
      expect(authority.account("alice")?.mfaEnabled).toBe(false);
    });
  });

  describe("idle timer", () => {
    const useFakeClock = () => vi.useFakeTimers({ toFake: ["setTimeout", "clearTimeout", "Date"] });

    it("locks exactly once when the timeout elapses", async () => {
      useFakeClock();
      const { controller } = setup({ autoLockDurationMs: 100 });
      await controller.register({ username: "alice", secret: SECRET });
      const onLocked = vi.fn();
      controller.onLocked(onLocked);

      vi.advanceTimersByTime(99);
      expect(controller.getState().phase).toBe("unlocked");
      vi.advanceTimersByTime(1);
      expect(controller.getState().phase).toBe("locked");

      vi.advanceTimersByTime(1_000);
      expect(onLocked).toHaveBeenCalledTimes(1);
      expect(onLocked).toHaveBeenCalledWith({ at: expect.any(Number), reason: "timeout" });
    });

    it("restarts the countdown on activity", async () => {
      useFakeClock();
      const { controller } = setup({ autoLockDurationMs: 100 });
      await controller.register({ username: "alice", secret: SECRET });

      vi.advanceTimersByTime(50);
      controller.handleHostEvent({ type: "activity" });
      vi.advanceTimersByTime(99);
      expect(controller.getState().phase).toBe("unlocked");
      vi.advanceTimersByTime(1);
      expect(controller.getState().phase).toBe("locked");
    });

    it("keeps counting in the background and ignores activity there", async () => {
      useFakeClock();
      const { controller } = setup({ autoLockDurationMs: 100 });
      await controller.register({ username: "alice", secret: SECRET });

      vi.advanceTimersByTime(50);
      controller.handleHostEvent({ type: "backgrounded" });
      controller.handleHostEvent({ type: "activity" });
      vi.advanceTimersByTime(50);

      expect(controller.getState()).toMatchObject({ phase: "locked", foreground: false });
    });

    it("restarts at full duration when foregrounded in time", async () => {
      useFakeClock();
      const { controller } = setup({ autoLockDurationMs: 100 });
      await controller.register({ username: "alice", secret: SECRET });

      vi.advanceTimersByTime(30);
      controller.handleHostEvent({ type: "backgrounded" });
      vi.advanceTimersByTime(40);
      controller.handleHostEvent({ type: "foregrounded" });

      vi.advanceTimersByTime(99);
      expect(controller.getState().phase).toBe("unlocked");
      vi.advanceTimersByTime(1);
      expect(controller.getState().phase).toBe("locked");
    });

    it("locks on return when the background stay outlasted the timeout", async () => {
      useFakeClock();
      const { controller } = setup({ autoLockDurationMs: 100 });
      await controller.register({ username: "alice", secret: SECRET });

      controller.handleHostEvent({ type: "backgrounded" });
      // A suspended host may not run timers; only the clock moves.
      vi.setSystemTime(Date.now() + 500);
      controller.handleHostEvent({ type: "foregrounded" });

      expect(controller.getState()).toMatchObject({ phase: "locked", foreground: true });
    });

    it("applies a new duration immediately", async () => {
      useFakeClock();
      const { controller } = setup({ autoLockDurationMs: 100 });
      await controller.register({ username: "alice", secret: SECRET });

      controller.setAutoLockDuration(500);
      vi.advanceTimersByTime(499);
      expect(controller.getState()).toMatchObject({ phase: "unlocked", timeoutMs: 500 });
      vi.advanceTimersByTime(1);
      expect(controller.getState().phase).toBe("locked");
    });

    it("rejects a non-positive duration", () => {
      const { controller } = setup();
      expect(() => controller.setAutoLockDuration(0)).toThrowError("Auto-lock duration must be a positive number");
    });
  });
});
