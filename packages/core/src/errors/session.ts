import { type KeywardError, KeywardReasons, keywardError } from "@keyward/errors";
import type { SessionPhase } from "../controllers/session/types.js";

export const sessionErrors = {
  invalidState: (operation: string, phase: SessionPhase): KeywardError =>
    keywardError({
      reason: KeywardReasons.SessionInvalidState,
      message: `Cannot ${operation} while the session is ${phase}`,
      data: { operation, phase },
    }),
};
