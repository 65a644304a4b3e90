import { copyBytes, encodeUtf8 } from "./bytes.js";

export type SecretInput = string | Uint8Array;

/**
 * Returns a private byte copy the caller owns and must zeroize.
 */
export const toSecretBytes = (secret: SecretInput): Uint8Array =>
  typeof secret === "string" ? encodeUtf8(secret) : copyBytes(secret);
