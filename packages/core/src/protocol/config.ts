import { z } from "zod";
import { createKeyDerivation, type KeyDerivation } from "../crypto/keyDerivation.js";
import { createLogger } from "../utils/logger.js";
import type { FetchFn, ProtocolConfig, ProtocolLogEvent } from "./types.js";

export const DEFAULT_TIMEOUT_MS = 15_000;
export const DEFAULT_ISSUER = "Keyward";

const httpUrlSchema = z.string().refine(
  (value) => {
    try {
      const parsed = new URL(value);
      return parsed.protocol === "http:" || parsed.protocol === "https:";
    } catch {
      return false;
    }
  },
  { error: "baseUrl must be an http(s) URL" },
);

export const ProtocolSettingsSchema = z.strictObject({
  baseUrl: httpUrlSchema,
  timeoutMs: z.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  issuer: z.string().min(1).default(DEFAULT_ISSUER),
});

export type ResolvedProtocolConfig = z.infer<typeof ProtocolSettingsSchema> & {
  fetch: FetchFn;
  keyDerivation: KeyDerivation;
  logger: (event: ProtocolLogEvent) => void;
  now: () => number;
};

const protocolLog = createLogger("core:protocol");

const defaultLogger = (event: ProtocolLogEvent) => {
  switch (event.type) {
    case "request":
      protocolLog("%s %s %s", event.operation, event.method, event.path);
      return;
    case "response":
      protocolLog("%s -> %d in %dms", event.operation, event.status, event.durationMs);
      return;
    case "error":
      protocolLog("%s failed after %dms: %O", event.operation, event.durationMs, event.error);
      return;
  }
};

export const resolveProtocolConfig = (config: ProtocolConfig): ResolvedProtocolConfig => {
  const settings = ProtocolSettingsSchema.parse({
    baseUrl: config.baseUrl,
    ...(config.timeoutMs !== undefined ? { timeoutMs: config.timeoutMs } : {}),
    ...(config.issuer !== undefined ? { issuer: config.issuer } : {}),
  });

  return {
    ...settings,
    baseUrl: settings.baseUrl.replace(/\/+$/, ""),
    fetch: config.fetch ?? ((input, init) => globalThis.fetch(input, init)),
    keyDerivation: config.keyDerivation ?? createKeyDerivation(),
    logger: config.logger ?? defaultLogger,
    now: config.now ?? Date.now,
  };
};
