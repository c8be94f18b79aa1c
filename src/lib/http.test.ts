import { describe, expect, it, vi } from "vitest";
import { TransportError } from "@/lib/errors";
import { assertOk, createHttpTransport } from "@/lib/http";

const URL_1 = "https://env.example.com/api/config/v1/autoTags/t-1";

function fakeFetch(respond: () => Response) {
  return vi.fn<typeof globalThis.fetch>(async () => respond());
}

function networkFailure() {
  return vi.fn<typeof globalThis.fetch>(async () => {
    throw new TypeError("fetch failed");
  });
}

describe("createHttpTransport", () => {
  it("sends the token and JSON body and returns the raw response", async () => {
    const fetch = fakeFetch(() => new Response('{"ok":true}', { status: 200, headers: { "x-trace": "t1" } }));
    const transport = createHttpTransport({ fetch });

    const response = await transport.request({ method: "PUT", url: URL_1, token: "test-token", body: '{"a":1}' });

    expect(response.status).toBe(200);
    expect(response.body).toBe('{"ok":true}');
    expect(response.headers.get("x-trace")).toBe("t1");

    const [input, init] = fetch.mock.calls[0] ?? [];
    const headers = new Headers(init?.headers);
    expect(String(input)).toBe(URL_1);
    expect(init?.method).toBe("PUT");
    expect(init?.body).toBe('{"a":1}');
    expect(headers.get("authorization")).toBe("Api-Token test-token");
    expect(headers.get("content-type")).toBe("application/json");
  });

  it("returns error statuses instead of throwing, without retrying", async () => {
    const fetch = fakeFetch(() => new Response("boom", { status: 500 }));
    const transport = createHttpTransport({ fetch, retries: 3, retryDelayMs: 0 });

    const response = await transport.request({ method: "GET", url: URL_1, token: "test-token" });

    expect(response.status).toBe(500);
    expect(response.body).toBe("boom");
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("returns an empty body for 204", async () => {
    const transport = createHttpTransport({ fetch: fakeFetch(() => new Response(null, { status: 204 })) });

    const response = await transport.request({ method: "DELETE", url: URL_1, token: "test-token" });

    expect(response).toMatchObject({ status: 204, body: "" });
  });

  it("fails once with a TransportError when no response arrives", async () => {
    const fetch = networkFailure();
    const transport = createHttpTransport({ fetch });

    const error = await transport.request({ method: "GET", url: URL_1, token: "test-token" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ method: "GET", url: URL_1, status: undefined });
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it("retries network failures when asked to", async () => {
    const fetch = networkFailure();
    const transport = createHttpTransport({ fetch, retries: 2, retryDelayMs: 0 });

    await expect(transport.request({ method: "GET", url: URL_1, token: "test-token" })).rejects.toBeInstanceOf(
      TransportError,
    );
    expect(fetch).toHaveBeenCalledTimes(3);
  });
});

describe("assertOk", () => {
  it("passes 2xx responses through", () => {
    const response = { status: 201, body: "{}", headers: new Headers() };
    expect(assertOk("POST", URL_1, response)).toBe(response);
  });

  it("describes the failed call", () => {
    expect(() => assertOk("DELETE", URL_1, { status: 404, body: "", headers: new Headers() })).toThrow(
      `DELETE ${URL_1} failed (HTTP 404)`,
    );
  });
});
