/**
 * @fileoverview Tests for the retrying API client against an in-process
 * fetch stand-in.
 */

import { describe, it, expect, vi } from "vitest";
import { ApiClient, type ApiClientOptions } from "../../src/services/api-client.js";
import { FatalApiError, TransientRequestError } from "../../src/utils/errors.js";
import { createLogger } from "../../src/utils/logger.js";
import { createFakeFetch, type Reply } from "../helpers/fake-fetch.js";

function setup(routes: Record<string, Reply | Reply[]>, overrides: Partial<ApiClientOptions> = {}) {
  const fake = createFakeFetch(routes);
  const sleep = vi.fn(async (_ms: number) => undefined);
  const lines: string[] = [];
  const client = new ApiClient({
    credentials: { accessToken: "test-token", serviceToken: "test-service" },
    fetch: fake.fetch,
    sleep,
    logger: createLogger({ level: "debug", write: (line) => lines.push(line) }),
    ...overrides,
  });
  return { client, requests: fake.requests, sleep, lines };
}

async function capture(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected the call to reject");
}

describe("ApiClient.call", () => {
  it("returns the envelope payload and sends credentials and version", async () => {
    const { client, requests } = setup({ "users.get": { body: { response: [{ id: 1 }] } } });

    const outcome = await client.call("users.get", { user_ids: 1, fields: "sex", skipped: undefined });

    expect(outcome).toEqual({ kind: "ok", payload: [{ id: 1 }] });
    expect(requests).toHaveLength(1);
    const url = requests[0];
    expect(`${url?.origin}${url?.pathname}`).toBe("https://api.vk.com/method/users.get");
    expect(url?.searchParams.get("user_ids")).toBe("1");
    expect(url?.searchParams.get("fields")).toBe("sex");
    expect(url?.searchParams.has("skipped")).toBe(false);
    expect(url?.searchParams.get("access_token")).toBe("test-token");
    expect(url?.searchParams.get("v")).toBe("5.131");
  });

  it("sends the service token in service mode", async () => {
    const { client, requests } = setup({ "groups.getById": { body: { response: [] } } });

    await client.call("groups.getById", { group_ids: "1,2" }, "service");

    expect(requests[0]?.searchParams.get("access_token")).toBe("test-service");
  });

  it("honours a custom base URL and version", async () => {
    const { client, requests } = setup(
      { "friends.get": { body: { response: { count: 0, items: [] } } } },
      { baseUrl: "http://localhost:9000/api/", version: "5.199" },
    );

    await client.call("friends.get", { user_id: 5 });

    expect(requests[0]?.pathname).toBe("/api/friends.get");
    expect(requests[0]?.searchParams.get("v")).toBe("5.199");
  });

  it("keeps the last path segment of a base URL without a trailing slash", async () => {
    const { client, requests } = setup(
      { "users.get": { body: { response: [] } } },
      { baseUrl: "https://api.vk.com/method" },
    );

    await client.call("users.get", { user_ids: 1 });

    expect(requests[0]?.pathname).toBe("/method/users.get");
  });

  it("reports error code 30 as private without retrying", async () => {
    const { client, requests, sleep, lines } = setup({
      "friends.get": { body: { error: { error_code: 30, error_msg: "This profile is private" } } },
    });

    const outcome = await client.call("friends.get", { user_id: 42 });

    expect(outcome).toEqual({ kind: "private" });
    expect(requests).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('WARN  Profile is private {"method":"friends.get","user_id":42}');
  });

  it("makes three attempts with two sleeps before failing", async () => {
    const { client, requests, sleep } = setup({ "friends.get": { status: 500, body: "oops" } });

    const error = await capture(client.call("friends.get", { user_id: 1 }));

    expect(error).toBeInstanceOf(FatalApiError);
    expect(requests).toHaveLength(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenNthCalledWith(1, 2000);
    expect(sleep).toHaveBeenNthCalledWith(2, 2000);
    if (error instanceof FatalApiError) {
      expect(error.attempts).toBe(3);
      expect(error.method).toBe("friends.get");
      expect(error.message).toBe("friends.get failed after 3 attempts: HTTP 500");
      expect(error.cause).toBeInstanceOf(TransientRequestError);
    }
  });

  it("recovers when a later attempt succeeds", async () => {
    const { client, requests, sleep } = setup({
      "users.get": [{ status: 502, body: "bad gateway" }, { body: { response: [{ id: 9 }] } }],
    });

    const outcome = await client.call("users.get", { user_ids: 9 });

    expect(outcome).toEqual({ kind: "ok", payload: [{ id: 9 }] });
    expect(requests).toHaveLength(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it("retries API errors other than 30", async () => {
    const { client, requests } = setup({
      "users.get": { body: { error: { error_code: 6, error_msg: "Too many requests per second" } } },
    });

    const error = await capture(client.call("users.get", { user_ids: 1 }));

    expect(requests).toHaveLength(3);
    expect(error).toBeInstanceOf(FatalApiError);
    const cause = error instanceof Error ? error.cause : undefined;
    expect(cause).toBeInstanceOf(TransientRequestError);
    if (cause instanceof TransientRequestError) {
      expect(cause.apiErrorCode).toBe(6);
      expect(cause.message).toBe("API error 6: Too many requests per second");
    }
  });

  it("treats a body that is not JSON as a failed attempt", async () => {
    const { client } = setup({ "users.get": { body: "<html>maintenance</html>" } });

    await expect(client.call("users.get", { user_ids: 1 })).rejects.toThrow(
      "users.get failed after 3 attempts: Malformed response body from users.get",
    );
  });

  it("treats JSON without response or error as a failed attempt", async () => {
    const { client } = setup({ "users.get": { body: { result: [] } } }, { retryCount: 1 });

    await expect(client.call("users.get", { user_ids: 1 })).rejects.toThrow(
      "users.get failed after 1 attempts: Malformed response envelope from users.get",
    );
  });

  it("wraps network errors", async () => {
    const { client, sleep } = setup({ "users.get": new Error("ECONNRESET") }, { retryCount: 2, retryDelayMs: 10 });

    await expect(client.call("users.get", { user_ids: 1 })).rejects.toThrow(
      "users.get failed after 2 attempts: Network error calling users.get: ECONNRESET",
    );
    expect(sleep).toHaveBeenCalledWith(10);
  });

  it("logs each failed attempt and each retry", async () => {
    const { client, lines } = setup({ "users.get": { status: 503, body: "" } }, { retryCount: 2 });

    await capture(client.call("users.get", { user_ids: 1 }));

    expect(lines.map((line) => line.slice(25))).toEqual([
      'ERROR API request failed {"method":"users.get","attempt":1,"error":"[TRANSIENT_REQUEST] HTTP 503"}',
      'INFO  Retrying in 2000ms {"method":"users.get","nextAttempt":2}',
      'ERROR API request failed {"method":"users.get","attempt":2,"error":"[TRANSIENT_REQUEST] HTTP 503"}',
    ]);
  });

  it("runs concurrent calls one at a time in submission order", async () => {
    const order: string[] = [];
    const client = new ApiClient({
      credentials: { accessToken: "test-token", serviceToken: "test-service" },
      sleep: async () => undefined,
      fetch: async (url) => {
        const method = new URL(url).pathname.split("/").pop() ?? "";
        order.push(`start ${method}`);
        await new Promise((resolve) => setTimeout(resolve, 5));
        order.push(`end ${method}`);
        return new Response(JSON.stringify({ response: [] }));
      },
    });

    await Promise.all([client.call("a.first", {}), client.call("b.second", {})]);

    expect(order).toEqual(["start a.first", "end a.first", "start b.second", "end b.second"]);
  });
});
