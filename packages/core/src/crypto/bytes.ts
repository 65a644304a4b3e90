import { bytesToHex, hexToBytes, randomBytes as nobleRandomBytes, utf8ToBytes } from "@noble/hashes/utils.js";
import { cryptoErrors } from "../errors/crypto.js";

const LOWERCASE_HEX = /^(?:[0-9a-f]{2})*$/;

const utf8Decoder = new TextDecoder("utf-8", { fatal: true });

export const randomBytes = (size: number): Uint8Array => {
  if (!Number.isInteger(size) || size <= 0) {
    throw cryptoErrors.invalidLength("Random byte length", size);
  }
  return nobleRandomBytes(size);
};

export const copyBytes = (input: Uint8Array): Uint8Array => new Uint8Array(input);

export const zeroize = (buffer: Uint8Array): void => {
  buffer.fill(0);
};

export const toHex = (bytes: Uint8Array): string => bytesToHex(bytes);

/**
 * Strict decoder for wire values: lowercase only, even length.
 */
export const fromHex = (value: string, label = "Value"): Uint8Array => {
  if (!LOWERCASE_HEX.test(value)) {
    throw cryptoErrors.invalidHex(label);
  }
  return hexToBytes(value);
};

export const isLowercaseHex = (value: string): boolean => LOWERCASE_HEX.test(value);

export const encodeUtf8 = (value: string): Uint8Array => utf8ToBytes(value);

export const decodeUtf8 = (bytes: Uint8Array): string => utf8Decoder.decode(bytes);

export const bytesEqual = (left: Uint8Array, right: Uint8Array): boolean => {
  if (left.length !== right.length) return false;
  let diff = 0;
  for (let index = 0; index < left.length; index += 1) {
    diff |= (left[index] ?? 0) ^ (right[index] ?? 0);
  }
  return diff === 0;
};
