import { type KeywardError, KeywardReasons, keywardError } from "@keyward/errors";

export const cryptoErrors = {
  invalidSalt: (length: number, expected: number): KeywardError =>
    keywardError({
      reason: KeywardReasons.CryptoInvalidInput,
      message: `Salt must be exactly ${expected} bytes`,
      data: { length, expected },
    }),
  emptySecret: (): KeywardError =>
    keywardError({ reason: KeywardReasons.CryptoInvalidInput, message: "Secret must not be empty" }),
  invalidHex: (label: string): KeywardError =>
    keywardError({ reason: KeywardReasons.CryptoInvalidInput, message: `${label} must be lowercase hexadecimal` }),
  invalidLength: (label: string, length: number): KeywardError =>
    keywardError({
      reason: KeywardReasons.CryptoInvalidInput,
      message: `${label} must be a positive integer`,
      data: { length },
    }),
  invalidGeneratorOptions: (message: string, data?: Record<string, unknown>): KeywardError =>
    keywardError({ reason: KeywardReasons.CryptoInvalidInput, message, ...(data ? { data } : {}) }),
};
