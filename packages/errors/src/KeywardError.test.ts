import { describe, expect, it } from "vitest";
import { failures, KeywardError, KeywardReasons, keywardError, isKeywardError, toKeywardError } from "./index.js";

describe("KeywardError", () => {
  it("creates a KeywardError with kind/reason/message", () => {
    const err = keywardError({ reason: KeywardReasons.VaultLocked, message: "Vault is locked" });
    expect(err).toBeInstanceOf(KeywardError);
    expect(err.kind).toBe("KeywardError");
    expect(err.reason).toBe(KeywardReasons.VaultLocked);
    expect(err.message).toBe("Vault is locked");
    expect(isKeywardError(err)).toBe(true);
  });

  it("serializes without cause", () => {
    const cause = new Error("secret");
    const err = keywardError({ reason: KeywardReasons.TransportNetwork, message: "fetch failed", cause });
    const json = JSON.parse(JSON.stringify(err)) as { kind: string; reason: string; message: string; cause?: unknown };
    expect(json).toEqual({ kind: "KeywardError", reason: "transport/network", message: "fetch failed" });
    expect("cause" in json).toBe(false);
  });

  it("rejects lookalikes without a reason", () => {
    expect(isKeywardError({ kind: "KeywardError", message: "x" })).toBe(false);
    expect(isKeywardError(null)).toBe(false);
    expect(isKeywardError(new Error("plain"))).toBe(false);
  });
});

describe("toKeywardError", () => {
  it("keeps the wait duration of a rate-limit failure", () => {
    const err = toKeywardError(failures.rateLimited(60, "IP blocked. Try again in 60 seconds."));
    expect(err.reason).toBe(KeywardReasons.AuthRateLimited);
    expect(err.message).toBe("IP blocked. Try again in 60 seconds.");
    expect(err.data).toEqual({ retryAfterSeconds: 60, message: "IP blocked. Try again in 60 seconds." });
  });

  it("presents a decryption failure like wrong credentials", () => {
    const decryption = toKeywardError(failures.decryption());
    const credentials = toKeywardError(failures.invalidCredentials());
    expect(decryption.message).toBe(credentials.message);
    expect(decryption.data).toBeUndefined();
  });

  it("distinguishes the second-factor stage", () => {
    expect(toKeywardError(failures.invalidCredentials("second_factor")).message).toBe("Invalid verification code");
  });
});
