import { KeywardReasons } from "@keyward/errors";
import { describe, expect, it, vi } from "vitest";
import { createHttpTransport } from "./transport.js";
import type { FetchFn, ProtocolLogEvent } from "./types.js";

const createTransport = (fetch: FetchFn, logger: (event: ProtocolLogEvent) => void = () => {}) =>
  createHttpTransport({ baseUrl: "https://authority.test", fetch, timeoutMs: 20, logger, now: () => 0 });

describe("createHttpTransport", () => {
  it("sends JSON with the token verbatim in Authorization", async () => {
    const fetch = vi.fn<FetchFn>(async () => new Response(JSON.stringify({ ok: 1 }), { status: 200 }));
    const send = createTransport(fetch);

    const result = await send({ operation: "storeVault", method: "POST", path: "/vault", token: "test-token", body: { a: 1 } });

    expect(result.ok && result.value.json).toEqual({ ok: 1 });
    const call = fetch.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe("https://authority.test/vault");
    expect(init?.body).toBe('{"a":1}');
    expect(new Headers(init?.headers).get("Authorization")).toBe("test-token");
    expect(new Headers(init?.headers).get("Content-Type")).toBe("application/json");
  });

  it("treats an empty or non-JSON body as undefined", async () => {
    const send = createTransport(async () => new Response("<html>", { status: 502 }));

    const result = await send({ operation: "lookupSalt", method: "GET", path: "/auth_salt/alice" });
    expect(result).toEqual({ ok: true, value: { status: 502, headers: expect.any(Headers), json: undefined } });
  });

  it("times out a request that never answers", async () => {
    const send = createTransport(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => {
            const abort = new Error("aborted");
            abort.name = "AbortError";
            reject(abort);
          });
        }),
    );

    expect(await send({ operation: "login", method: "POST", path: "/login", body: {} })).toEqual({
      ok: false,
      error: { reason: KeywardReasons.TransportNetwork, message: "Request timed out" },
    });
  });

  it("logs operations without request bodies", async () => {
    const events: ProtocolLogEvent[] = [];
    const send = createTransport(async () => new Response(null, { status: 204 }), (event) => events.push(event));

    await send({ operation: "storeVault", method: "POST", path: "/vault", token: "test-token", body: { blob: 1 } });

    expect(events).toEqual([
      { type: "request", operation: "storeVault", method: "POST", path: "/vault" },
      { type: "response", operation: "storeVault", method: "POST", path: "/vault", status: 204, durationMs: 0 },
    ]);
  });
});
