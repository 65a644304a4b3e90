import { type KeywardError, KeywardReasons, keywardError } from "@keyward/errors";

export const vaultErrors = {
  locked: (): KeywardError => keywardError({ reason: KeywardReasons.VaultLocked, message: "Vault is locked" }),
  // Same error for a wrong secret and for damaged data.
  decryptionFailed: (cause?: unknown): KeywardError =>
    keywardError({
      reason: KeywardReasons.VaultDecryptionFailed,
      message: "Vault could not be decrypted",
      cause,
    }),
};
