import { describe, expect, it } from "vitest";
import { DariClient } from "../src/client";
import { runSessionSmoke } from "../scripts/smoke-sessions";
import { createTransport, jsonResponse } from "./support/fake-transport";

describe("runSessionSmoke", () => {
  it("walks a session through its lifecycle", async () => {
    const { transport, requests } = createTransport(
      jsonResponse({ session_id: "sess_1", status: "active", expires_at: "2026-01-01T00:00:00Z" }, 201),
      jsonResponse({ session_id: "sess_1", status: "active" }),
      jsonResponse({ sessions: [], total: 1 }),
      jsonResponse({ session_id: "sess_1", expires_at: "2026-01-01T02:00:00Z" }),
      jsonResponse({ success: true, result: "A blank page" }),
      new Response(null, { status: 204 }),
      new Response(null, { status: 204 }),
    );
    const client = new DariClient({ apiKey: "test-key", baseUrl: "https://api.local", transport });
    const lines: string[] = [];

    const steps = await runSessionSmoke(client, (line) => lines.push(line));

    expect(steps.every((step) => step.ok)).toBe(true);
    expect(lines).toEqual([
      "✓ create session: sess_1 (active, expires 2026-01-01T00:00:00Z)",
      "✓ get session: sess_1 (active)",
      "✓ list active sessions: 1 active",
      "✓ update session: expires 2026-01-01T02:00:00Z",
      "✓ run action in session: success true",
      "✓ terminate session: terminated",
      "✓ delete session: deleted",
    ]);
    expect(requests[2].url.search).toBe("?status_filter=active&limit=10");
    expect(requests[4].url.pathname).toBe("/public/single-actions/run-action");
    expect(requests[4].rawBody).toBe('{"action":"What is on the screen?","session_id":"sess_1"}');
  });

  it("keeps going after a failed step", async () => {
    const { transport } = createTransport(
      jsonResponse({ error: "session limit reached" }, 429),
      jsonResponse({ sessions: [], total: 0 }),
    );
    const client = new DariClient({ apiKey: "test-key", baseUrl: "https://api.local", transport });
    const lines: string[] = [];

    const steps = await runSessionSmoke(client, (line) => lines.push(line));

    expect(steps.map((step) => step.ok)).toEqual([false, false, true, false, false, false, false]);
    expect(lines[0]).toBe("✗ create session: session limit reached");
    expect(lines[1]).toBe("✗ get session: no session was created");
    expect(lines[2]).toBe("✓ list active sessions: 0 active");
    expect(transport).toHaveBeenCalledTimes(2);
  });
});
