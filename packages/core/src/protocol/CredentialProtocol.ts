import {
  err,
  failures,
  type InvalidResponseFailure,
  KeywardReasons,
  ok,
  type RateLimitedFailure,
} from "@keyward/errors";
import { fromHex, randomBytes, toHex, zeroize } from "../crypto/bytes.js";
import { SALT_BYTES } from "../crypto/keyDerivation.js";
import { type SecretInput, toSecretBytes } from "../crypto/secret.js";
import { isSecondFactorCode, normalizeUsername } from "../utils/username.js";
import { decodeSealedVault, encodeSealedVault } from "../vault/codec.js";
import { resolveProtocolConfig } from "./config.js";
import { resolveRetryAfter } from "./rateLimit.js";
import {
  AuthSaltResponseSchema,
  ErrorDetailSchema,
  MfaSetupResponseSchema,
  MfaStatusResponseSchema,
  TokenResponseSchema,
  VaultResponseSchema,
} from "./schemas.js";
import { createHttpTransport, type HttpResponse } from "./transport.js";
import type { CredentialProtocol, LookupSaltResult, ProtocolConfig } from "./types.js";

const DEFAULT_RATE_LIMIT_MESSAGE = "Too many requests";

const readDetail = (json: unknown): string | null => {
  const parsed = ErrorDetailSchema.safeParse(json);
  return parsed.success ? parsed.data.detail : null;
};

const unexpectedStatus = (operation: string, response: HttpResponse): InvalidResponseFailure =>
  failures.invalidResponse(response.status, `Unexpected status ${response.status} from ${operation}`);

const malformedBody = (operation: string, response: HttpResponse): InvalidResponseFailure =>
  failures.invalidResponse(response.status, `Malformed ${operation} response`);

const emptyUsername = () => failures.invalidInput("Username must not be empty");
const emptySecret = () => failures.invalidInput("Password must not be empty");

const isEmptySecret = (secret: SecretInput) => secret.length === 0;

export const createCredentialProtocol = (config: ProtocolConfig): CredentialProtocol => {
  const resolved = resolveProtocolConfig(config);
  const send = createHttpTransport(resolved);
  const { keyDerivation, now, issuer } = resolved;

  const rateLimited = (response: HttpResponse): RateLimitedFailure => {
    const detail = readDetail(response.json);
    return failures.rateLimited(
      resolveRetryAfter(response.headers.get("Retry-After"), detail, now()),
      detail ?? DEFAULT_RATE_LIMIT_MESSAGE,
    );
  };

  // Salt must come from the authority (login) or be fresh (register); never a vault salt.
  const computeVerifier = async (secret: SecretInput, authSalt: Uint8Array): Promise<string> => {
    const secretBytes = toSecretBytes(secret);
    try {
      const verifier = await keyDerivation.derive(secretBytes, authSalt, "auth");
      try {
        return toHex(verifier);
      } finally {
        zeroize(verifier);
      }
    } finally {
      zeroize(secretBytes);
    }
  };

  const lookupSalt = async (username: string): Promise<LookupSaltResult> => {
    const name = normalizeUsername(username);
    if (!name) return err(emptyUsername());

    const sent = await send({ operation: "lookupSalt", method: "GET", path: `/auth_salt/${encodeURIComponent(name)}` });
    if (!sent.ok) return sent;
    const response = sent.value;

    switch (response.status) {
      case 200: {
        const parsed = AuthSaltResponseSchema.safeParse(response.json);
        return parsed.success ? ok(fromHex(parsed.data.salt, "Salt")) : err(malformedBody("lookupSalt", response));
      }
      case 404:
        return err(failures.notFound());
      case 429:
        return err(rateLimited(response));
      default:
        return err(unexpectedStatus("lookupSalt", response));
    }
  };

  return {
    lookupSalt,

    async register(username, secret) {
      const name = normalizeUsername(username);
      if (!name) return err(emptyUsername());
      if (isEmptySecret(secret)) return err(emptySecret());

      const existing = await lookupSalt(name);
      if (existing.ok) return err(failures.usernameTaken());
      const lookupFailure = existing.error;
      if (lookupFailure.reason !== KeywardReasons.AuthNotFound) return err(lookupFailure);

      const authSalt = randomBytes(SALT_BYTES);
      const verifier = await computeVerifier(secret, authSalt);

      const sent = await send({
        operation: "register",
        method: "POST",
        path: "/register",
        body: { username: name, salt: toHex(authSalt), verifier },
      });
      if (!sent.ok) return sent;
      const response = sent.value;

      switch (response.status) {
        case 200:
        case 201:
          return ok(undefined);
        case 409:
          return err(failures.usernameTaken());
        case 429:
          return err(rateLimited(response));
        default:
          return err(unexpectedStatus("register", response));
      }
    },

    async login(username, secret) {
      if (isEmptySecret(secret)) return err(emptySecret());

      // Salt, then verifier, then submission; each step needs the previous one.
      const salt = await lookupSalt(username);
      if (!salt.ok) return salt;
      const name = normalizeUsername(username);
      const verifier = await computeVerifier(secret, salt.value);

      const sent = await send({ operation: "login", method: "POST", path: "/login", body: { username: name, verifier } });
      if (!sent.ok) return sent;
      const response = sent.value;

      switch (response.status) {
        case 200: {
          const parsed = TokenResponseSchema.safeParse(response.json);
          return parsed.success ? ok(parsed.data.token) : err(malformedBody("login", response));
        }
        case 400:
        case 401:
        case 403:
          return err(failures.invalidCredentials("secret"));
        case 429:
          return err(rateLimited(response));
        default:
          return err(unexpectedStatus("login", response));
      }
    },

    async loginWithSecondFactor(username, secret, code) {
      if (isEmptySecret(secret)) return err(emptySecret());
      if (!isSecondFactorCode(code)) return err(failures.invalidCredentials("second_factor"));

      const salt = await lookupSalt(username);
      if (!salt.ok) return salt;
      const name = normalizeUsername(username);
      const verifier = await computeVerifier(secret, salt.value);

      const sent = await send({
        operation: "loginWithSecondFactor",
        method: "POST",
        path: "/login/mfa",
        body: { username: name, verifier, mfa_code: code },
      });
      if (!sent.ok) return sent;
      const response = sent.value;

      switch (response.status) {
        case 200: {
          const parsed = TokenResponseSchema.safeParse(response.json);
          return parsed.success ? ok(parsed.data.token) : err(malformedBody("loginWithSecondFactor", response));
        }
        case 400:
        case 401:
        case 403:
          return err(failures.invalidCredentials("second_factor"));
        case 429:
          return err(rateLimited(response));
        default:
          return err(unexpectedStatus("loginWithSecondFactor", response));
      }
    },

    async mfaStatus(username) {
      const name = normalizeUsername(username);
      if (!name) return err(emptyUsername());

      const sent = await send({ operation: "mfaStatus", method: "GET", path: `/mfa/status/${encodeURIComponent(name)}` });
      if (!sent.ok) return sent;
      const response = sent.value;

      switch (response.status) {
        case 200: {
          const parsed = MfaStatusResponseSchema.safeParse(response.json);
          return parsed.success ? ok(parsed.data.mfa_enabled) : err(malformedBody("mfaStatus", response));
        }
        case 404:
          return err(failures.notFound());
        case 429:
          return err(rateLimited(response));
        default:
          return err(unexpectedStatus("mfaStatus", response));
      }
    },

    async enrollSecondFactor(token) {
      const sent = await send({ operation: "enrollSecondFactor", method: "POST", path: "/mfa/setup", token });
      if (!sent.ok) return sent;
      const response = sent.value;

      switch (response.status) {
        case 200: {
          const parsed = MfaSetupResponseSchema.safeParse(response.json);
          if (!parsed.success) return err(malformedBody("enrollSecondFactor", response));
          const { secret, qr_code, backup_codes, provisioning_uri } = parsed.data;
          const label = encodeURIComponent(issuer);
          return ok({
            sharedSecret: secret,
            provisioningUri:
              provisioning_uri ?? `otpauth://totp/${label}?secret=${encodeURIComponent(secret)}&issuer=${label}`,
            qrCode: qr_code,
            recoveryCodes: backup_codes,
          });
        }
        case 401:
        case 403:
          return err(failures.sessionExpired());
        case 429:
          return err(rateLimited(response));
        default:
          return err(unexpectedStatus("enrollSecondFactor", response));
      }
    },

    async verifySecondFactor(username, code) {
      const name = normalizeUsername(username);
      if (!name) return err(emptyUsername());
      if (!isSecondFactorCode(code)) return ok(false);

      const sent = await send({
        operation: "verifySecondFactor",
        method: "POST",
        path: "/mfa/verify",
        body: { username: name, code },
      });
      if (!sent.ok) return sent;
      const response = sent.value;

      switch (response.status) {
        case 200:
          return ok(true);
        case 400:
        case 401:
          return ok(false);
        case 429:
          return err(rateLimited(response));
        default:
          return err(unexpectedStatus("verifySecondFactor", response));
      }
    },

    async disableSecondFactor(token) {
      const sent = await send({ operation: "disableSecondFactor", method: "POST", path: "/mfa/disable", token });
      if (!sent.ok) return sent;
      const response = sent.value;

      switch (response.status) {
        case 200:
          return ok(true);
        case 401:
        case 403:
          return ok(false);
        case 429:
          return err(rateLimited(response));
        default:
          return err(unexpectedStatus("disableSecondFactor", response));
      }
    },

    async fetchVault(token) {
      const sent = await send({ operation: "fetchVault", method: "GET", path: "/vault", token });
      if (!sent.ok) return sent;
      const response = sent.value;

      switch (response.status) {
        case 200: {
          const parsed = VaultResponseSchema.safeParse(response.json);
          if (!parsed.success) return err(malformedBody("fetchVault", response));
          const blob = parsed.data.blob;
          return ok(blob ? decodeSealedVault(blob) : null);
        }
        case 401:
        case 403:
          return err(failures.sessionExpired());
        default:
          return err(unexpectedStatus("fetchVault", response));
      }
    },

    async storeVault(token, sealed) {
      const sent = await send({
        operation: "storeVault",
        method: "POST",
        path: "/vault",
        token,
        body: { blob: encodeSealedVault(sealed) },
      });
      if (!sent.ok) return sent;
      const response = sent.value;

      switch (response.status) {
        case 200:
        case 201:
        case 204:
          return ok(undefined);
        case 401:
        case 403:
          return err(failures.sessionExpired());
        case 429:
          return err(rateLimited(response));
        default:
          return err(unexpectedStatus("storeVault", response));
      }
    },
  };
};
