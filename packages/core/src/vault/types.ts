import type { KeyDerivation } from "../crypto/keyDerivation.js";

export type CredentialRecord = {
  password: string;
  updatedAt: string;
  category?: string;
  fields?: Record<string, string>;
};

/**
 * Title → record. Titles are unique; order carries no meaning.
 */
export type CredentialCollection = Map<string, CredentialRecord>;

/**
 * The only vault artifact that leaves memory. `ciphertext` is the encrypted
 * payload followed by its 16-byte Poly1305 tag.
 */
export type SealedVault = {
  vaultSalt: Uint8Array;
  nonce: Uint8Array;
  ciphertext: Uint8Array;
};

export type SealedVaultWire = {
  vault_salt: string;
  nonce: string;
  ciphertext: string;
};

export type VaultCipherOptions = {
  keyDerivation?: KeyDerivation;
  now?: () => number;
};

export interface VaultCipher {
  seal(collection: CredentialCollection, secret: Uint8Array): Promise<SealedVault>;
  unseal(sealed: SealedVault, secret: Uint8Array): Promise<CredentialCollection>;
}
