export type { StoredEntry } from "./collection.js";
export {
  classifyEntry,
  cloneCollection,
  CollectionFormatError,
  decodeCollection,
  formatTimestamp,
  migrateEntry,
  serializeCollection,
} from "./collection.js";
export { decodeSealedVault, encodeSealedVault, NONCE_BYTES, SealedVaultWireSchema, TAG_BYTES } from "./codec.js";
export type {
  CredentialCollection,
  CredentialRecord,
  SealedVault,
  SealedVaultWire,
  VaultCipher,
  VaultCipherOptions,
} from "./types.js";
export { createVaultCipher } from "./vaultCipher.js";
