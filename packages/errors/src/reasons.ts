export const KeywardReasons = {
  CryptoInvalidInput: "crypto/invalid_input",

  VaultDecryptionFailed: "vault/decryption_failed",
  VaultLocked: "vault/locked",

  AuthInvalidInput: "auth/invalid_input",
  AuthNotFound: "auth/not_found",
  AuthInvalidCredentials: "auth/invalid_credentials",
  AuthUsernameTaken: "auth/username_taken",
  AuthWeakPassword: "auth/weak_password",
  AuthRateLimited: "auth/rate_limited",
  AuthSessionExpired: "auth/session_expired",

  SessionInvalidState: "session/invalid_state",

  TransportNetwork: "transport/network",
  TransportInvalidResponse: "transport/invalid_response",
} as const;

export type KeywardReason = (typeof KeywardReasons)[keyof typeof KeywardReasons];
