import { describe, expect, it } from "vitest";
import { DariClient } from "../src/client";
import { ApiError } from "../src/errors";
import { captureError, createTransport, jsonResponse } from "./support/fake-transport";

function createClient(...replies: Parameters<typeof createTransport>) {
  const { transport, requests } = createTransport(...replies);
  const client = new DariClient({ apiKey: "test-key", baseUrl: "https://api.local", transport });
  return { client, requests };
}

describe("Browser sessions", () => {
  it("creates a session with only ttl and metadata", async () => {
    const created = { session_id: "sess_1", status: "active", metadata: { test: "x" } };
    const { client, requests } = createClient(jsonResponse(created, 201));

    const session = await client.createSession({ ttl: 3600, metadata: { test: "x" } });

    expect(session).toEqual(created);
    expect(`${requests[0].method} ${requests[0].url.pathname}`).toBe("POST /public/sessions");
    expect(requests[0].rawBody).toBe('{"ttl":3600,"metadata":{"test":"x"}}');
  });

  it("sends an empty object when no session options are given", async () => {
    const { client, requests } = createClient(jsonResponse({ session_id: "sess_2" }));

    await client.createSession();

    expect(requests[0].rawBody).toBe("{}");
    expect(requests[0].headers.get("Content-Type")).toBe("application/json");
  });

  it("creates a session on an external browser", async () => {
    const { client, requests } = createClient(jsonResponse({ session_id: "sess_3" }));

    await client.createSession({ cdpUrl: "ws://browser.local:9222", screenConfig: { width: 1920, height: 1080 } });

    expect(requests[0].rawBody).toBe('{"cdp_url":"ws://browser.local:9222","screen_config":{"width":1920,"height":1080}}');
  });

  it("gets a session by id", async () => {
    const { client, requests } = createClient(jsonResponse({ session_id: "sess_1", status: "active" }));

    const session = await client.getSession("sess_1");

    expect(session.status).toBe("active");
    expect(`${requests[0].method} ${requests[0].url.pathname}`).toBe("GET /public/sessions/sess_1");
  });

  it("lists sessions without a query string by default", async () => {
    const { client, requests } = createClient(jsonResponse({ sessions: [], total: 0 }));

    const list = await client.listSessions();

    expect(list).toEqual({ sessions: [], total: 0 });
    expect(requests[0].url.search).toBe("");
  });

  it("lists sessions with filters", async () => {
    const { client, requests } = createClient(jsonResponse({ sessions: [], total: 0 }));

    await client.listSessions({ statusFilter: "active", limit: 10, offset: 20 });

    expect(requests[0].url.search).toBe("?status_filter=active&limit=10&offset=20");
  });

  it("patches only the supplied session fields", async () => {
    const { client, requests } = createClient(jsonResponse({ session_id: "sess_1" }), jsonResponse({ session_id: "sess_1" }));

    await client.updateSession("sess_1", { ttl: 7200 });
    await client.updateSession("sess_1", { metadata: { owner: "qa" } });

    expect(`${requests[0].method} ${requests[0].url.pathname}`).toBe("PATCH /public/sessions/sess_1");
    expect(requests[0].rawBody).toBe('{"ttl":7200}');
    expect(requests[1].rawBody).toBe('{"metadata":{"owner":"qa"}}');
  });

  it("terminates and deletes without a body", async () => {
    const { client, requests } = createClient(new Response(null, { status: 204 }), new Response(null, { status: 204 }));

    await expect(client.terminateSession("sess_1")).resolves.toBeUndefined();
    await expect(client.deleteSession("sess_1")).resolves.toBeUndefined();

    expect(requests.map((request) => `${request.method} ${request.url.pathname}`)).toEqual([
      "POST /public/sessions/sess_1/terminate",
      "DELETE /public/sessions/sess_1",
    ]);
    expect(requests[0].rawBody).toBeUndefined();
    expect(requests[0].headers.has("Content-Type")).toBe(false);
  });

  it("encodes session ids in the path", async () => {
    const { client, requests } = createClient(jsonResponse({}));

    await client.getSession("sess/../1");

    expect(requests[0].url.pathname).toBe("/public/sessions/sess%2F..%2F1");
  });

  it("reports a missing session", async () => {
    const { client } = createClient(jsonResponse({ detail: "session not found" }, 404));

    const error = await captureError(client.getSession("missing"));

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ message: "session not found", httpStatus: 404 });
  });
});
