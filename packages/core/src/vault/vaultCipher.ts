import { xchacha20poly1305 } from "@noble/ciphers/chacha.js";
import { decodeUtf8, encodeUtf8, randomBytes, zeroize } from "../crypto/bytes.js";
import { createKeyDerivation, SALT_BYTES } from "../crypto/keyDerivation.js";
import { vaultErrors } from "../errors/vault.js";
import { createLogger } from "../utils/logger.js";
import { decodeCollection, serializeCollection } from "./collection.js";
import { NONCE_BYTES, TAG_BYTES } from "./codec.js";
import type { CredentialCollection, SealedVault, VaultCipher, VaultCipherOptions } from "./types.js";

const log = createLogger("core:vault");

export const createVaultCipher = (options: VaultCipherOptions = {}): VaultCipher => {
  const keyDerivation = options.keyDerivation ?? createKeyDerivation();
  const now = options.now ?? Date.now;

  return {
    async seal(collection: CredentialCollection, secret: Uint8Array): Promise<SealedVault> {
      // Salt and nonce are drawn anew on every seal, so no nonce ever repeats under a key.
      const vaultSalt = randomBytes(SALT_BYTES);
      const nonce = randomBytes(NONCE_BYTES);
      const plaintext = encodeUtf8(serializeCollection(collection));
      const key = await keyDerivation.derive(secret, vaultSalt, "vault");

      try {
        const ciphertext = xchacha20poly1305(key, nonce).encrypt(plaintext);
        log("sealed %d entries", collection.size);
        return { vaultSalt, nonce, ciphertext };
      } finally {
        zeroize(key);
        zeroize(plaintext);
      }
    },

    async unseal(sealed: SealedVault, secret: Uint8Array): Promise<CredentialCollection> {
      if (
        sealed.vaultSalt.length !== SALT_BYTES ||
        sealed.nonce.length !== NONCE_BYTES ||
        sealed.ciphertext.length < TAG_BYTES
      ) {
        throw vaultErrors.decryptionFailed();
      }

      let key: Uint8Array | null = null;
      let plaintext: Uint8Array | null = null;
      try {
        key = await keyDerivation.derive(secret, sealed.vaultSalt, "vault");
        plaintext = xchacha20poly1305(key, sealed.nonce).decrypt(sealed.ciphertext);
        const collection = decodeCollection(JSON.parse(decodeUtf8(plaintext)), now);
        log("unsealed %d entries", collection.size);
        return collection;
      } catch (error) {
        log("unseal rejected");
        throw vaultErrors.decryptionFailed(error);
      } finally {
        if (key) zeroize(key);
        if (plaintext) zeroize(plaintext);
      }
    },
  };
};
