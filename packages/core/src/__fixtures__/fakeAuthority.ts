import { z } from "zod";
import type { FetchFn } from "../protocol/types.js";

export const FAKE_AUTHORITY_URL = "https://authority.test";
export const FAKE_VALID_CODE = "123456";
export const FAKE_RATE_LIMIT_DETAIL = "IP blocked. Try again in 60 seconds.";

type Account = {
  salt: string;
  verifier: string;
  mfaEnabled: boolean;
  failures: number;
  blob: unknown;
};

export type RecordedRequest = {
  method: string;
  path: string;
  authorization: string | null;
  body: unknown;
};

export type FakeAuthorityOptions = {
  validCode?: string;
  maxFailures?: number;
  retryAfterHeader?: string;
  rateLimitDetail?: string;
  provisioningUri?: string;
};

type CannedResponse = { status: number; body?: unknown; headers?: Record<string, string> };

const RegisterBody = z.object({ username: z.string(), salt: z.string(), verifier: z.string() });
const LoginBody = z.object({ username: z.string(), verifier: z.string() });
const LoginMfaBody = LoginBody.extend({ mfa_code: z.string() });
const VerifyBody = z.object({ username: z.string(), code: z.string() });
const StoreVaultBody = z.object({ blob: z.unknown() });

const respond = (status: number, body?: unknown, headers: Record<string, string> = {}) =>
  new Response(body === undefined ? null : JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });

const readBody = (init?: RequestInit): unknown => {
  if (typeof init?.body !== "string") return undefined;
  const parsed: unknown = JSON.parse(init.body);
  return parsed;
};

/**
 * In-process stand-in for the remote authority. Speaks the same HTTP/JSON
 * contract through an injected `fetch`; five failed logins for one account
 * block the sixth attempt with a 429.
 */
export const createFakeAuthority = (options: FakeAuthorityOptions = {}) => {
  const validCode = options.validCode ?? FAKE_VALID_CODE;
  const maxFailures = options.maxFailures ?? 5;
  const rateLimitDetail = options.rateLimitDetail ?? FAKE_RATE_LIMIT_DETAIL;

  const accounts = new Map<string, Account>();
  const tokens = new Map<string, string>();
  const requests: RecordedRequest[] = [];
  const canned = new Map<string, CannedResponse[]>();
  let tokenCounter = 0;
  let offline = false;
  let gate: Promise<void> | null = null;

  const issueToken = (username: string) => {
    tokenCounter += 1;
    const token = `test-token-${tokenCounter}`;
    tokens.set(token, username);
    return token;
  };

  const rateLimited = () =>
    respond(
      429,
      { detail: rateLimitDetail },
      options.retryAfterHeader ? { "Retry-After": options.retryAfterHeader } : {},
    );

  const invalidCredentials = (account: Account) => {
    account.failures += 1;
    return respond(401, { detail: "Invalid credentials" });
  };

  const route = (method: string, path: string, authorization: string | null, body: unknown): Response => {
    const owner = authorization ? tokens.get(authorization) : undefined;
    const ownerAccount = owner ? accounts.get(owner) : undefined;

    if (method === "GET" && path.startsWith("/auth_salt/")) {
      const account = accounts.get(decodeURIComponent(path.slice("/auth_salt/".length)));
      return account ? respond(200, { salt: account.salt }) : respond(404, { detail: "User not found" });
    }

    if (method === "GET" && path.startsWith("/mfa/status/")) {
      const account = accounts.get(decodeURIComponent(path.slice("/mfa/status/".length)));
      return account ? respond(200, { mfa_enabled: account.mfaEnabled }) : respond(404, { detail: "User not found" });
    }

    if (method === "POST" && path === "/register") {
      const parsed = RegisterBody.safeParse(body);
      if (!parsed.success) return respond(422, { detail: "Invalid body" });
      const { username, salt, verifier } = parsed.data;
      if (accounts.has(username)) return respond(409, { detail: "Username already registered" });
      accounts.set(username, { salt, verifier, mfaEnabled: false, failures: 0, blob: null });
      return respond(201, { message: "User registered" });
    }

    if (method === "POST" && path === "/login") {
      const parsed = LoginBody.safeParse(body);
      if (!parsed.success) return respond(422, { detail: "Invalid body" });
      const account = accounts.get(parsed.data.username);
      if (!account) return respond(401, { detail: "Invalid credentials" });
      if (account.failures >= maxFailures) return rateLimited();
      if (account.verifier !== parsed.data.verifier) return invalidCredentials(account);
      account.failures = 0;
      return respond(200, { token: issueToken(parsed.data.username) });
    }

    if (method === "POST" && path === "/login/mfa") {
      const parsed = LoginMfaBody.safeParse(body);
      if (!parsed.success) return respond(422, { detail: "Invalid body" });
      const account = accounts.get(parsed.data.username);
      if (!account) return respond(401, { detail: "Invalid credentials" });
      if (account.failures >= maxFailures) return rateLimited();
      if (account.verifier !== parsed.data.verifier || parsed.data.mfa_code !== validCode) {
        return invalidCredentials(account);
      }
      account.failures = 0;
      return respond(200, { token: issueToken(parsed.data.username) });
    }

    if (method === "POST" && path === "/mfa/verify") {
      const parsed = VerifyBody.safeParse(body);
      if (!parsed.success) return respond(422, { detail: "Invalid body" });
      const account = accounts.get(parsed.data.username);
      if (!account || parsed.data.code !== validCode) return respond(400, { detail: "Invalid code" });
      account.mfaEnabled = true;
      return respond(200, { message: "MFA enabled" });
    }

    // Everything below needs a bearer token.
    if (!ownerAccount) return respond(401, { detail: "Invalid token" });

    if (method === "POST" && path === "/mfa/setup") {
      return respond(200, {
        secret: "TESTSECRET",
        qr_code: "data:image/png;base64,AAAA",
        backup_codes: ["backup-1", "backup-2"],
        ...(options.provisioningUri ? { provisioning_uri: options.provisioningUri } : {}),
      });
    }

    if (method === "POST" && path === "/mfa/disable") {
      ownerAccount.mfaEnabled = false;
      return respond(200, { message: "MFA disabled" });
    }

    if (method === "GET" && path === "/vault") {
      return respond(200, { blob: ownerAccount.blob });
    }

    if (method === "POST" && path === "/vault") {
      const parsed = StoreVaultBody.safeParse(body);
      if (!parsed.success) return respond(422, { detail: "Invalid body" });
      ownerAccount.blob = parsed.data.blob;
      return respond(200, { message: "Vault saved" });
    }

    return respond(404, { detail: "Not Found" });
  };

  const fetch: FetchFn = async (input, init) => {
    const method = init?.method ?? "GET";
    const path = new URL(input).pathname;
    const authorization = new Headers(init?.headers).get("Authorization");
    const body = readBody(init);
    requests.push({ method, path, authorization, body });

    if (gate) await gate;
    if (offline) throw new TypeError("fetch failed");

    const queued = canned.get(path)?.shift();
    if (queued) return respond(queued.status, queued.body, queued.headers);

    return route(method, path, authorization, body);
  };

  return {
    fetch,
    requests,
    account: (username: string) => accounts.get(username),
    tokenOwner: (token: string) => tokens.get(token),
    revokeTokens: () => tokens.clear(),
    setOffline: (value: boolean) => {
      offline = value;
    },
    enableSecondFactor: (username: string) => {
      const account = accounts.get(username);
      if (account) account.mfaEnabled = true;
    },
    /**
     * Answers the next request to `path` with a fixed response.
     */
    respondOnce: (path: string, response: CannedResponse) => {
      const queue = canned.get(path) ?? [];
      queue.push(response);
      canned.set(path, queue);
    },
    /**
     * Holds every request until the returned function is called.
     */
    pause: () => {
      let release = () => {};
      gate = new Promise<void>((resolve) => {
        release = () => {
          gate = null;
          resolve();
        };
      });
      return release;
    },
  };
};

export type FakeAuthority = ReturnType<typeof createFakeAuthority>;
