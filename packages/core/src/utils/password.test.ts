import { KeywardReasons } from "@keyward/errors";
import { describe, expect, it } from "vitest";
import { assessPasswordStrength, generatePassword, PASSWORD_SYMBOLS } from "./password.js";

describe("assessPasswordStrength", () => {
  it("accepts a password meeting every requirement", () => {
    expect(assessPasswordStrength("Secret123!")).toEqual({ strong: true, unmet: [] });
  });

  it("lists unmet requirements in order", () => {
    expect(assessPasswordStrength("abc")).toEqual({
      strong: false,
      unmet: ["length", "uppercase", "digit", "symbol"],
    });
    expect(assessPasswordStrength("ABCDEFGH1")).toEqual({ strong: false, unmet: ["lowercase", "symbol"] });
  });

  it("only counts listed symbols", () => {
    expect(assessPasswordStrength("Secret123_").unmet).toEqual(["symbol"]);
  });
});

describe("generatePassword", () => {
  it("defaults to sixteen characters that pass the strength check", () => {
    for (let run = 0; run < 50; run += 1) {
      const password = generatePassword();
      expect(password).toHaveLength(16);
      expect(assessPasswordStrength(password).strong).toBe(true);
    }
  });

  it("includes one of each enabled class even at the minimum length", () => {
    for (let run = 0; run < 50; run += 1) {
      const password = generatePassword({ length: 4 });
      expect(assessPasswordStrength(password).unmet).toEqual(["length"]);
    }
  });

  it("draws only from enabled classes", () => {
    const password = generatePassword({ length: 64, uppercase: false, symbols: false });
    expect(password).toMatch(/^[a-z0-9]{64}$/);
  });

  it("draws symbols from the accepted set", () => {
    const password = generatePassword({ length: 32, lowercase: false, uppercase: false, digits: false });
    expect(Array.from(password).every((char) => PASSWORD_SYMBOLS.includes(char))).toBe(true);
  });

  it("rejects impossible options", () => {
    expect(() =>
      generatePassword({ lowercase: false, uppercase: false, digits: false, symbols: false }),
    ).toThrowError(expect.objectContaining({ reason: KeywardReasons.CryptoInvalidInput }));
    expect(() => generatePassword({ length: 3 })).toThrowError("Password length must be an integer of at least 4");
  });
});
