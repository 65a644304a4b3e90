export {
  bytesEqual,
  copyBytes,
  decodeUtf8,
  encodeUtf8,
  fromHex,
  isLowercaseHex,
  randomBytes,
  toHex,
  zeroize,
} from "./bytes.js";
export type { Argon2Cost, KeyDerivation, KeyDerivationOptions, KeyPurpose } from "./keyDerivation.js";
export { ARGON2_PARAMS, createKeyDerivation, deriveKey, KEY_BYTES, SALT_BYTES } from "./keyDerivation.js";
export type { SecretInput } from "./secret.js";
export { toSecretBytes } from "./secret.js";
