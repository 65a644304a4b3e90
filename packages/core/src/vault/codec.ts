import { z } from "zod";
import { fromHex, toHex } from "../crypto/bytes.js";
import { SALT_BYTES } from "../crypto/keyDerivation.js";
import type { SealedVault, SealedVaultWire } from "./types.js";

export const NONCE_BYTES = 24;
export const TAG_BYTES = 16;

const hexOfLength = (bytes: number) =>
  z.string().regex(new RegExp(`^[0-9a-f]{${bytes * 2}}$`), {
    error: `Expected ${bytes} bytes of lowercase hexadecimal`,
  });

export const SealedVaultWireSchema = z.object({
  vault_salt: hexOfLength(SALT_BYTES),
  nonce: hexOfLength(NONCE_BYTES),
  ciphertext: z.string().regex(/^(?:[0-9a-f]{2})+$/, {
    error: "Ciphertext must be non-empty lowercase hexadecimal",
  }),
});

export const encodeSealedVault = (sealed: SealedVault): SealedVaultWire => ({
  vault_salt: toHex(sealed.vaultSalt),
  nonce: toHex(sealed.nonce),
  ciphertext: toHex(sealed.ciphertext),
});

/**
 * Validates a wire blob. Lengths are checked here; integrity is only known
 * once the vault is unsealed.
 */
export const decodeSealedVault = (input: unknown): SealedVault => {
  const wire = SealedVaultWireSchema.parse(input);
  return {
    vaultSalt: fromHex(wire.vault_salt, "Vault salt"),
    nonce: fromHex(wire.nonce, "Nonce"),
    ciphertext: fromHex(wire.ciphertext, "Ciphertext"),
  };
};
