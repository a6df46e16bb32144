import type { HttpMethod } from "./types";

export interface OperationDescriptor {
  readonly method: HttpMethod;
  readonly path: string;
  readonly operationId: string;
  readonly summary: string;
}

export const operations = [
  {
    method: "POST",
    path: "/public/workflows/start/{workflowId}",
    operationId: "startWorkflow",
    summary: "Start a workflow execution",
  },
  {
    method: "GET",
    path: "/public/workflows/{workflowId}",
    operationId: "listWorkflowExecutions",
    summary: "List executions of a workflow",
  },
  {
    method: "GET",
    path: "/public/workflows/{workflowId}/executions/{executionId}",
    operationId: "getExecutionDetails",
    summary: "Get a workflow execution",
  },
  {
    method: "GET",
    path: "/public/credentials",
    operationId: "listCredentials",
    summary: "List saved browser credentials",
  },
  {
    method: "POST",
    path: "/public/credentials",
    operationId: "createCredential",
    summary: "Create a credential",
  },
  {
    method: "GET",
    path: "/public/connected-accounts",
    operationId: "listConnectedAccounts",
    summary: "List OAuth accounts connected to the workspace",
  },
  {
    method: "GET",
    path: "/public/phone-numbers",
    operationId: "listPhoneNumbers",
    summary: "List workspace phone numbers",
  },
  {
    method: "POST",
    path: "/public/phone-numbers",
    operationId: "purchasePhoneNumber",
    summary: "Purchase a phone number",
  },
  {
    method: "POST",
    path: "/public/browser-profiles",
    operationId: "createBrowserProfile",
    summary: "Create a browser profile",
  },
  {
    method: "GET",
    path: "/public/browser-profiles",
    operationId: "listBrowserProfiles",
    summary: "List browser profiles",
  },
  {
    method: "POST",
    path: "/public/single-actions/run-action",
    operationId: "runSingleAction",
    summary: "Run one browser action",
  },
  {
    method: "POST",
    path: "/public/sessions",
    operationId: "createSession",
    summary: "Create a browser session",
  },
  {
    method: "GET",
    path: "/public/sessions/{sessionId}",
    operationId: "getSession",
    summary: "Get a browser session",
  },
  {
    method: "GET",
    path: "/public/sessions",
    operationId: "listSessions",
    summary: "List browser sessions",
  },
  {
    method: "PATCH",
    path: "/public/sessions/{sessionId}",
    operationId: "updateSession",
    summary: "Update session TTL or metadata",
  },
  {
    method: "POST",
    path: "/public/sessions/{sessionId}/terminate",
    operationId: "terminateSession",
    summary: "Terminate a browser session",
  },
  {
    method: "DELETE",
    path: "/public/sessions/{sessionId}",
    operationId: "deleteSession",
    summary: "Delete a browser session",
  },
] as const satisfies readonly OperationDescriptor[];

export type OperationId = (typeof operations)[number]["operationId"];

export function getOperation(operationId: OperationId): OperationDescriptor {
  const operation = operations.find((candidate) => candidate.operationId === operationId);
  if (!operation) {
    throw new Error(`Unknown operation: ${operationId}`);
  }
  return operation;
}

/** Fills `{name}` placeholders with URI-encoded values. */
export function buildPath(template: string, params: Record<string, string> = {}): string {
  return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = params[name];
    if (value === undefined) {
      throw new Error(`Missing path parameter "${name}" for ${template}`);
    }
    return encodeURIComponent(value);
  });
}
