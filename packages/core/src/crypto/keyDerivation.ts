import { argon2idAsync } from "@noble/hashes/argon2.js";
import type { Debugger } from "debug";
import { cryptoErrors } from "../errors/crypto.js";
import { createLogger } from "../utils/logger.js";

/**
 * Argon2id cost parameters: `t` passes, `m` KiB of memory, `p` lanes.
 */
export type Argon2Cost = {
  t: number;
  m: number;
  p: number;
};

export type KeyPurpose = "auth" | "vault";

export const SALT_BYTES = 16;
export const KEY_BYTES = 32;

export const ARGON2_PARAMS: Readonly<Argon2Cost> = Object.freeze({
  t: 3,
  m: 128 * 1024,
  p: 4,
});

// Milliseconds of hashing between event-loop yields.
const DEFAULT_ASYNC_TICK_MS = 10;

export type KeyDerivation = {
  readonly cost: Readonly<Argon2Cost>;
  derive(secret: Uint8Array, salt: Uint8Array, purpose: KeyPurpose): Promise<Uint8Array>;
};

export type KeyDerivationOptions = {
  cost?: Argon2Cost;
  asyncTick?: number;
  logger?: Debugger;
  now?: () => number;
};

const assertPositiveInteger = (value: number, label: string) => {
  if (!Number.isInteger(value) || value <= 0) {
    throw cryptoErrors.invalidLength(label, value);
  }
};

const resolveCost = (cost?: Argon2Cost): Readonly<Argon2Cost> => {
  if (!cost) return ARGON2_PARAMS;
  assertPositiveInteger(cost.t, "Argon2 iteration count");
  assertPositiveInteger(cost.m, "Argon2 memory cost");
  assertPositiveInteger(cost.p, "Argon2 parallelism");
  return Object.freeze({ ...cost });
};

export const createKeyDerivation = (options: KeyDerivationOptions = {}): KeyDerivation => {
  const cost = resolveCost(options.cost);
  const asyncTick = options.asyncTick ?? DEFAULT_ASYNC_TICK_MS;
  const log = options.logger ?? createLogger("core:kdf");
  const now = options.now ?? Date.now;

  return {
    cost,
    async derive(secret, salt, purpose) {
      if (salt.length !== SALT_BYTES) {
        throw cryptoErrors.invalidSalt(salt.length, SALT_BYTES);
      }
      if (secret.length === 0) {
        throw cryptoErrors.emptySecret();
      }

      const startedAt = now();
      const key = await argon2idAsync(secret, salt, {
        t: cost.t,
        m: cost.m,
        p: cost.p,
        dkLen: KEY_BYTES,
        asyncTick,
      });
      log("derived %s key in %dms", purpose, now() - startedAt);
      return key;
    },
  };
};

let defaultDerivation: KeyDerivation | null = null;

/**
 * Derives a 32-byte key with the production Argon2id profile.
 */
export const deriveKey = (secret: Uint8Array, salt: Uint8Array, purpose: KeyPurpose = "auth"): Promise<Uint8Array> => {
  defaultDerivation ??= createKeyDerivation();
  return defaultDerivation.derive(secret, salt, purpose);
};
