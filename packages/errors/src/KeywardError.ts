import type { KeywardReason } from "./reasons.js";

export type KeywardErrorJson = {
  kind: "KeywardError";
  reason: KeywardReason;
  message: string;
  data?: unknown;
};

export type KeywardErrorInput = {
  reason: KeywardReason;
  message: string;
  data?: unknown;
  cause?: unknown;
};

export class KeywardError extends Error {
  readonly kind = "KeywardError" as const;
  readonly reason: KeywardReason;
  readonly data?: unknown;

  constructor(input: KeywardErrorInput) {
    super(input.message, input.cause !== undefined ? { cause: input.cause } : undefined);
    this.name = "KeywardError";
    this.reason = input.reason;
    this.data = input.data;
  }

  toJSON(): KeywardErrorJson {
    return {
      kind: "KeywardError",
      reason: this.reason,
      message: this.message,
      ...(this.data !== undefined ? { data: this.data } : {}),
    };
  }
}

export const keywardError = (input: KeywardErrorInput): KeywardError => new KeywardError(input);

export const isKeywardError = (value: unknown): value is KeywardError => {
  if (!value || typeof value !== "object") return false;

  const candidate = value as Record<string, unknown>;
  return (
    candidate.kind === "KeywardError" && typeof candidate.reason === "string" && typeof candidate.message === "string"
  );
};
