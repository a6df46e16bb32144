import { fileURLToPath } from "node:url";
import { DariClient } from "../src/client";
import { clientOptionsFromEnv } from "../src/config";

export interface SmokeStep {
  name: string;
  ok: boolean;
  detail: string;
}

type Log = (line: string) => void;

/**
 * Walks one session through create, get, list, update, a single action,
 * terminate and delete. Failed steps are reported and the walk continues.
 */
export async function runSessionSmoke(client: DariClient, log: Log = console.log): Promise<SmokeStep[]> {
  const steps: SmokeStep[] = [];
  let sessionId: string | undefined;

  const step = async (name: string, action: () => Promise<string>) => {
    try {
      const detail = await action();
      steps.push({ name, ok: true, detail });
      log(`✓ ${name}: ${detail}`);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      steps.push({ name, ok: false, detail });
      log(`✗ ${name}: ${detail}`);
    }
  };

  const requireSession = (): string => {
    if (!sessionId) {
      throw new Error("no session was created");
    }
    return sessionId;
  };

  await step("create session", async () => {
    const session = await client.createSession({
      screenConfig: { width: 1280, height: 720 },
      ttl: 3600,
      metadata: { test: "session_management" },
    });
    if (typeof session.session_id !== "string") {
      throw new Error("response is missing session_id");
    }
    sessionId = session.session_id;
    return `${sessionId} (${String(session.status)}, expires ${String(session.expires_at)})`;
  });

  await step("get session", async () => {
    const session = await client.getSession(requireSession());
    return `${String(session.session_id)} (${String(session.status)})`;
  });

  await step("list active sessions", async () => {
    const sessions = await client.listSessions({ statusFilter: "active", limit: 10 });
    return `${String(sessions.total)} active`;
  });

  await step("update session", async () => {
    const session = await client.updateSession(requireSession(), { ttl: 7200, metadata: { updated: true } });
    return `expires ${String(session.expires_at)}`;
  });

  // Sessions without an attached browser fail here; the walk carries on.
  await step("run action in session", async () => {
    const result = await client.runSingleAction({ action: "What is on the screen?", sessionId: requireSession() });
    return `success ${String(result.success)}`;
  });

  await step("terminate session", async () => {
    await client.terminateSession(requireSession());
    return "terminated";
  });

  await step("delete session", async () => {
    await client.deleteSession(requireSession());
    return "deleted";
  });

  return steps;
}

const __filename = fileURLToPath(import.meta.url);

if (process.argv[1] === __filename) {
  DariClient.use(clientOptionsFromEnv(), (client) => runSessionSmoke(client))
    .then((steps) => {
      const failed = steps.filter((result) => !result.ok).length;
      // eslint-disable-next-line no-console
      console.log(`${steps.length - failed}/${steps.length} steps passed`);
      process.exitCode = failed === 0 ? 0 : 1;
    })
    .catch((error: unknown) => {
      // eslint-disable-next-line no-console
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}
