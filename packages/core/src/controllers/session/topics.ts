import type { ScopedMessenger } from "../../messenger/Messenger.js";
import { eventTopic, stateTopic } from "../../messenger/topic.js";
import type {
  SessionLockedPayload,
  SessionState,
  SessionUnlockedPayload,
  SessionUnlockFailedPayload,
} from "./types.js";

export const SESSION_STATE_CHANGED = stateTopic<SessionState>("session:stateChanged", {
  isEqual: (prev, next) =>
    prev.phase === next.phase &&
    prev.username === next.username &&
    prev.secondFactorEnrolled === next.secondFactorEnrolled &&
    prev.pendingSecondFactor === next.pendingSecondFactor &&
    prev.foreground === next.foreground &&
    prev.timeoutMs === next.timeoutMs &&
    prev.lastActivityAt === next.lastActivityAt &&
    prev.nextAutoLockAt === next.nextAutoLockAt,
});

export const SESSION_LOCKED = eventTopic<SessionLockedPayload>("session:locked");
export const SESSION_UNLOCKED = eventTopic<SessionUnlockedPayload>("session:unlocked");
export const SESSION_UNLOCK_FAILED = eventTopic<SessionUnlockFailedPayload>("session:unlockFailed");

export const SESSION_TOPICS = [SESSION_STATE_CHANGED, SESSION_LOCKED, SESSION_UNLOCKED, SESSION_UNLOCK_FAILED] as const;

export type SessionMessenger = ScopedMessenger<typeof SESSION_TOPICS>;
