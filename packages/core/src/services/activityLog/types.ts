import type { LockReason } from "../../controllers/session/types.js";

export type ActivityAction =
  | { type: "registered" }
  | { type: "signedIn"; secondFactor: boolean }
  | { type: "unlocked"; secondFactor: boolean }
  | { type: "locked"; reason: LockReason }
  | { type: "unlockFailed"; stage: "secret" | "second_factor" }
  | { type: "secondFactorEnabled" }
  | { type: "secondFactorDisabled" }
  | { type: "vaultSaved"; entries: number }
  | { type: "signedOut" };

export type ActivityEntry = {
  at: number;
  action: ActivityAction;
  message: string;
};

export type ActivityLogChangedHandler = () => void;

export type ActivityLogService = {
  on(event: "changed", handler: ActivityLogChangedHandler): void;
  off(event: "changed", handler: ActivityLogChangedHandler): void;

  /**
   * Entries are filed under this user until it changes; `null` turns recording off.
   */
  setUser(username: string | null): void;
  getUser(): string | null;

  record(action: ActivityAction): Promise<ActivityEntry | null>;
  /**
   * Newest first.
   */
  list(): Promise<ActivityEntry[]>;
  clear(): Promise<void>;
};
