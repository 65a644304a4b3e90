import type { Debugger } from "debug";
import { InMemorySessionLockController } from "../controllers/session/SessionLockController.js";
import { SESSION_TOPICS } from "../controllers/session/topics.js";
import type { SessionLockController, SessionTimers } from "../controllers/session/types.js";
import { createKeyDerivation, type KeyDerivation } from "../crypto/keyDerivation.js";
import { Messenger } from "../messenger/Messenger.js";
import { createCredentialProtocol } from "../protocol/CredentialProtocol.js";
import type { CredentialProtocol, ProtocolConfig } from "../protocol/types.js";
import { createActivityLogService } from "../services/activityLog/ActivityLogService.js";
import { type ActivityLogPort, createInMemoryActivityLogPort } from "../services/activityLog/port.js";
import type { ActivityLogService } from "../services/activityLog/types.js";
import { createLogger, extendLogger } from "../utils/logger.js";
import type { VaultCipher } from "../vault/types.js";
import { createVaultCipher } from "../vault/vaultCipher.js";

export type CreateKeywardRuntimeOptions = {
  protocol: ProtocolConfig;
  session?: {
    autoLockDurationMs?: number;
    timers?: SessionTimers;
  };
  activityLog?: {
    port?: ActivityLogPort;
    maxEntries?: number;
  };
  /**
   * Shared by the protocol and the vault cipher unless the protocol config names its own.
   */
  keyDerivation?: KeyDerivation;
  now?: () => number;
  logger?: Debugger;
};

export type KeywardRuntime = {
  bus: Messenger;
  protocol: CredentialProtocol;
  cipher: VaultCipher;
  activityLog: ActivityLogService;
  session: SessionLockController;
  destroy: () => void;
};

export const createKeywardRuntime = (options: CreateKeywardRuntimeOptions): KeywardRuntime => {
  const log = options.logger ?? createLogger("core");
  const now = options.now ?? Date.now;
  const keyDerivation =
    options.keyDerivation ?? options.protocol.keyDerivation ?? createKeyDerivation({ logger: extendLogger(log, "kdf") });

  const bus = new Messenger({
    onListenerError: ({ topic, error }) => log(`messenger: listener error in "${topic}" %O`, error),
  });

  const protocol = createCredentialProtocol({ ...options.protocol, keyDerivation, now: options.protocol.now ?? now });
  const cipher = createVaultCipher({ keyDerivation, now });
  const activityLog = createActivityLogService({
    port: options.activityLog?.port ?? createInMemoryActivityLogPort(),
    now,
    ...(options.activityLog?.maxEntries !== undefined ? { maxEntries: options.activityLog.maxEntries } : {}),
  });

  const session = new InMemorySessionLockController({
    messenger: bus.scope({ name: "session", topics: SESSION_TOPICS }),
    protocol,
    cipher,
    activityLog,
    now,
    logger: extendLogger(log, "session"),
    ...(options.session?.autoLockDurationMs !== undefined
      ? { autoLockDurationMs: options.session.autoLockDurationMs }
      : {}),
    ...(options.session?.timers ? { timers: options.session.timers } : {}),
  });

  let destroyed = false;

  return {
    bus,
    protocol,
    cipher,
    activityLog,
    session,
    destroy: () => {
      if (destroyed) return;
      destroyed = true;
      session.logout();
      bus.clear();
    },
  };
};
