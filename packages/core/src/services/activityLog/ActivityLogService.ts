import { EventEmitter } from "eventemitter3";

import { createSerialQueue } from "../../utils/serialQueue.js";
import type { ActivityLogPort } from "./port.js";
import type { ActivityAction, ActivityEntry, ActivityLogService } from "./types.js";

type ChangedEvent = "changed";

export const MAX_ACTIVITY_ENTRIES = 100;

export type CreateActivityLogServiceOptions = {
  port: ActivityLogPort;
  now?: () => number;
  maxEntries?: number;
};

export const describeActivity = (action: ActivityAction): string => {
  switch (action.type) {
    case "registered":
      return "Account created";
    case "signedIn":
      return action.secondFactor ? "Signed in with two-factor authentication" : "Signed in";
    case "unlocked":
      return action.secondFactor ? "Vault unlocked with two-factor authentication" : "Vault unlocked";
    case "locked":
      return action.reason === "timeout" ? "Vault locked after inactivity" : "Vault locked";
    case "unlockFailed":
      return action.stage === "second_factor" ? "Unlock failed: invalid verification code" : "Unlock failed: wrong password";
    case "secondFactorEnabled":
      return "Two-factor authentication enabled";
    case "secondFactorDisabled":
      return "Two-factor authentication disabled";
    case "vaultSaved":
      return `Vault saved (${action.entries} ${action.entries === 1 ? "entry" : "entries"})`;
    case "signedOut":
      return "Signed out";
  }
};

export const createActivityLogService = ({
  port,
  now,
  maxEntries = MAX_ACTIVITY_ENTRIES,
}: CreateActivityLogServiceOptions): ActivityLogService => {
  const emitter = new EventEmitter<ChangedEvent>();
  const clock = now ?? Date.now;
  const enqueue = createSerialQueue();
  let currentUser: string | null = null;

  const emitChanged = () => {
    emitter.emit("changed");
  };

  return {
    on(event, handler) {
      if (event !== "changed") return;
      emitter.on("changed", handler);
    },
    off(event, handler) {
      if (event !== "changed") return;
      emitter.off("changed", handler);
    },

    setUser(username) {
      currentUser = username;
    },
    getUser() {
      return currentUser;
    },

    async record(action) {
      // The user is read before queueing so a later sign-out cannot re-file the entry.
      const username = currentUser;
      if (!username) return null;

      const entry: ActivityEntry = { at: clock(), action, message: describeActivity(action) };
      return await enqueue(async () => {
        const existing = await port.load(username);
        await port.save(username, [entry, ...existing].slice(0, maxEntries));
        emitChanged();
        return entry;
      });
    },

    async list() {
      const username = currentUser;
      if (!username) return [];
      return await enqueue(() => port.load(username));
    },

    async clear() {
      const username = currentUser;
      if (!username) return;
      await enqueue(() => port.clear(username));
      emitChanged();
    },
  };
};
