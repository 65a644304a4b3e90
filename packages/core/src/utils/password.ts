import { randomBytes } from "../crypto/bytes.js";
import { cryptoErrors } from "../errors/crypto.js";

export const PASSWORD_SYMBOLS = '!@#$%^&*(),.?":{}|<>';
export const MIN_PASSWORD_LENGTH = 8;
export const DEFAULT_GENERATED_LENGTH = 16;

const LOWERCASE = "abcdefghijklmnopqrstuvwxyz";
const UPPERCASE = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";
const DIGITS = "0123456789";

export type PasswordRequirement = "length" | "uppercase" | "lowercase" | "digit" | "symbol";

export type PasswordStrength = {
  strong: boolean;
  unmet: PasswordRequirement[];
};

const hasAny = (value: string, alphabet: string) => Array.from(value).some((char) => alphabet.includes(char));

/**
 * Checks the account password policy. Requirements are reported in a fixed order.
 */
export const assessPasswordStrength = (password: string): PasswordStrength => {
  const unmet: PasswordRequirement[] = [];
  if (Array.from(password).length < MIN_PASSWORD_LENGTH) unmet.push("length");
  if (!hasAny(password, UPPERCASE)) unmet.push("uppercase");
  if (!hasAny(password, LOWERCASE)) unmet.push("lowercase");
  if (!hasAny(password, DIGITS)) unmet.push("digit");
  if (!hasAny(password, PASSWORD_SYMBOLS)) unmet.push("symbol");
  return { strong: unmet.length === 0, unmet };
};

export type GeneratePasswordOptions = {
  length?: number;
  lowercase?: boolean;
  uppercase?: boolean;
  digits?: boolean;
  symbols?: boolean;
};

const UINT32_RANGE = 2 ** 32;

// Uniform integer in [0, bound) from 32-bit draws; draws above the last full multiple are rejected.
const randomIndex = (bound: number): number => {
  const limit = UINT32_RANGE - (UINT32_RANGE % bound);
  for (;;) {
    const bytes = randomBytes(4);
    const draw = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(0);
    if (draw < limit) return draw % bound;
  }
};

const pick = (alphabet: string): string => alphabet.charAt(randomIndex(alphabet.length));

export const generatePassword = (options: GeneratePasswordOptions = {}): string => {
  const length = options.length ?? DEFAULT_GENERATED_LENGTH;
  const classes = [
    options.lowercase ?? true ? LOWERCASE : null,
    options.uppercase ?? true ? UPPERCASE : null,
    options.digits ?? true ? DIGITS : null,
    options.symbols ?? true ? PASSWORD_SYMBOLS : null,
  ].filter((alphabet): alphabet is string => alphabet !== null);

  if (classes.length === 0) {
    throw cryptoErrors.invalidGeneratorOptions("At least one character class must be enabled");
  }
  if (!Number.isInteger(length) || length < classes.length) {
    throw cryptoErrors.invalidGeneratorOptions(`Password length must be an integer of at least ${classes.length}`, {
      length,
    });
  }

  const pool = classes.join("");
  const chars = classes.map(pick);
  while (chars.length < length) chars.push(pick(pool));

  // Fisher-Yates, so the guaranteed characters do not sit at the front.
  for (let i = chars.length - 1; i > 0; i -= 1) {
    const j = randomIndex(i + 1);
    const current = chars[i] ?? "";
    chars[i] = chars[j] ?? "";
    chars[j] = current;
  }

  return chars.join("");
};
