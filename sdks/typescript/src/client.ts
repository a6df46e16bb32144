import { ApiError, ClientClosedError, ConfigurationError, DecodeError, TransportError } from "./errors";
import { resolveClientConfig, timeoutMsSchema } from "./config";
import { buildPath, getOperation, operations } from "./operations";
import type { OperationId } from "./operations";
import type {
  ApiRecord,
  BrowserProfile,
  BrowserProfileList,
  ClientOptions,
  CreateBrowserProfileParams,
  CreateCredentialParams,
  CreateSessionParams,
  CredentialRecord,
  HttpMethod,
  ListSessionsParams,
  PhoneNumberRecord,
  PurchasePhoneNumberParams,
  RequestOptions,
  ResolvedClientConfig,
  RunSingleActionParams,
  SessionList,
  SessionRecord,
  SingleActionResult,
  StartWorkflowOptions,
  UpdateSessionParams,
  WorkflowExecution,
} from "./types";
import pkg from "../package.json";

const API_KEY_HEADER = "X-API-Key";
const SINGLE_ACTION_TIMEOUT_MS = 120_000;
const ERROR_MESSAGE_KEYS = ["detail", "error", "message"] as const;

/** Drops undefined entries so omitted parameters never reach the wire. */
function compact(payload: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(payload)) {
    if (value === undefined) continue;
    result[key] = value;
  }
  return result;
}

function isAbsoluteUrl(value: string): boolean {
  return /^https?:\/\//i.test(value);
}

function isPresent(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === 0 || value === "") {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (typeof value === "object") {
    return Object.keys(value).length > 0;
  }
  return true;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export class DariClient {
  readonly config: ResolvedClientConfig;
  private readonly transport: typeof fetch;
  private readonly defaultHeaders: Readonly<Record<string, string>>;
  private readonly inFlight = new Set<AbortController>();
  private isClosed = false;

  constructor(options: ClientOptions) {
    this.config = resolveClientConfig(options);
    this.transport = options.transport ?? globalThis.fetch.bind(globalThis);

    const userAgent = [`dari-typescript/${pkg.version}`, this.config.userAgentSuffix].filter(Boolean).join(" ");
    this.defaultHeaders = Object.freeze({
      [API_KEY_HEADER]: this.config.apiKey,
      "User-Agent": userAgent,
      Accept: "application/json",
    });
  }

  /**
   * Creates a client, hands it to `fn` and closes it once `fn` settles,
   * whether it resolved or threw.
   */
  static async use<T>(options: ClientOptions, fn: (client: DariClient) => Promise<T>): Promise<T> {
    const client = new DariClient(options);
    try {
      return await fn(client);
    } finally {
      client.close();
    }
  }

  get supportedOperations() {
    return operations;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Aborts in-flight requests; any later call rejects with `ClientClosedError`. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    for (const controller of this.inFlight) {
      controller.abort();
    }
    this.inFlight.clear();
  }

  // Workflows

  startWorkflow(
    workflowId: string,
    inputVariables: Record<string, unknown>,
    options: StartWorkflowOptions = {},
  ): Promise<WorkflowExecution> {
    return this.call("startWorkflow", { workflowId }, {
      body: compact({
        input_variables: { ...inputVariables },
        timeout_minutes: options.timeoutMinutes,
        should_update_cache: options.shouldUpdateCache,
        allow_public_live_view: options.allowPublicLiveView,
        browser_profile_id: options.browserProfileId,
        use_proxy: options.useProxy,
        proxy_city: options.proxyCity,
        proxy_server: options.proxyServer,
        proxy_server_username: options.proxyServerUsername,
        proxy_server_password: options.proxyServerPassword,
        user_agent: options.userAgent,
      }),
    });
  }

  listWorkflowExecutions(workflowId: string): Promise<ApiRecord> {
    return this.call("listWorkflowExecutions", { workflowId });
  }

  getExecutionDetails(workflowId: string, executionId: string): Promise<WorkflowExecution> {
    return this.call("getExecutionDetails", { workflowId, executionId });
  }

  /** Resumes a paused workflow through the pre-authenticated URL from its webhook payload. */
  resumeWorkflow(resumeUrl: string, variables: Record<string, unknown>): Promise<ApiRecord> {
    return this.request("POST", resumeUrl, {
      body: { variables: { ...variables } },
      requireApiKey: false,
    });
  }

  // Credentials and workspace accounts

  listCredentials(): Promise<CredentialRecord[]> {
    return this.call("listCredentials");
  }

  createCredential(params: CreateCredentialParams): Promise<CredentialRecord> {
    return this.call("createCredential", {}, {
      body: compact({
        service_name: params.serviceName,
        username_or_email: params.usernameOrEmail,
        password: params.password,
        totp_secret: params.totpSecret,
        gmail_oauth_account_id: params.gmailOauthAccountId,
        phone_number_id: params.phoneNumberId,
      }),
    });
  }

  listConnectedAccounts(): Promise<ApiRecord[]> {
    return this.call("listConnectedAccounts");
  }

  listPhoneNumbers(): Promise<PhoneNumberRecord[]> {
    return this.call("listPhoneNumbers");
  }

  purchasePhoneNumber(params: PurchasePhoneNumberParams): Promise<PhoneNumberRecord> {
    return this.call("purchasePhoneNumber", {}, { body: { label: params.label } });
  }

  /** Browser profiles persist cookies and login state across executions. */
  createBrowserProfile(params: CreateBrowserProfileParams): Promise<BrowserProfile> {
    return this.call("createBrowserProfile", {}, {
      body: compact({ name: params.name, provider: params.provider }),
    });
  }

  listBrowserProfiles(): Promise<BrowserProfileList> {
    return this.call("listBrowserProfiles");
  }

  // Single actions

  runSingleAction(params: RunSingleActionParams): Promise<SingleActionResult> {
    return this.call("runSingleAction", {}, {
      body: compact({
        action: params.action,
        session_id: params.sessionId,
        id: params.id,
        variables: params.variables && { ...params.variables },
        screen_config: params.screenConfig && { ...params.screenConfig },
        set_cache: params.setCache,
      }),
      timeoutMs: SINGLE_ACTION_TIMEOUT_MS,
    });
  }

  // Sessions

  createSession(params: CreateSessionParams = {}): Promise<SessionRecord> {
    return this.call("createSession", {}, {
      body: compact({
        cdp_url: params.cdpUrl,
        screen_config: params.screenConfig && { ...params.screenConfig },
        ttl: params.ttl,
        metadata: params.metadata && { ...params.metadata },
      }),
    });
  }

  getSession(sessionId: string): Promise<SessionRecord> {
    return this.call("getSession", { sessionId });
  }

  listSessions(params: ListSessionsParams = {}): Promise<SessionList> {
    return this.call("listSessions", {}, {
      searchParams: {
        status_filter: params.statusFilter,
        limit: params.limit,
        offset: params.offset,
      },
    });
  }

  updateSession(sessionId: string, params: UpdateSessionParams = {}): Promise<SessionRecord> {
    return this.call("updateSession", { sessionId }, {
      body: compact({
        ttl: params.ttl,
        metadata: params.metadata && { ...params.metadata },
      }),
    });
  }

  async terminateSession(sessionId: string): Promise<void> {
    await this.call("terminateSession", { sessionId });
  }

  async deleteSession(sessionId: string): Promise<void> {
    await this.call("deleteSession", { sessionId });
  }

  /**
   * Sends one request and normalizes the outcome.
   *
   * Resolves with the decoded JSON body, the body text for non-JSON responses,
   * or `undefined` for 204 and empty bodies. Rejects with `TransportError`,
   * `ApiError` (status >= 400), `DecodeError` or `ClientClosedError`;
   * an invalid `timeoutMs` override rejects with `ConfigurationError`.
   */
  async request<T>(method: HttpMethod, pathOrUrl: string, options: RequestOptions = {}): Promise<T> {
    if (this.isClosed) {
      throw new ClientClosedError();
    }

    let url: URL;
    try {
      url = new URL(isAbsoluteUrl(pathOrUrl) ? pathOrUrl : `${this.config.baseUrl}${pathOrUrl}`);
    } catch (error) {
      throw new TransportError(error instanceof Error ? error.message : String(error), error);
    }
    if (options.searchParams) {
      for (const [key, value] of Object.entries(options.searchParams)) {
        if (value === undefined) continue;
        url.searchParams.set(key, String(value));
      }
    }

    const headers = new Headers(this.defaultHeaders);
    if (options.requireApiKey === false) {
      headers.delete(API_KEY_HEADER);
    }
    for (const [name, value] of Object.entries(options.headers ?? {})) {
      headers.set(name, value);
    }

    const body = options.body !== undefined ? JSON.stringify(options.body) : undefined;
    if (body !== undefined && !headers.has("Content-Type")) {
      headers.set("Content-Type", "application/json");
    }

    let timeoutMs = this.config.timeoutMs;
    if (options.timeoutMs !== undefined) {
      const override = timeoutMsSchema.safeParse(options.timeoutMs);
      if (!override.success) {
        throw new ConfigurationError(override.error.issues[0]?.message ?? "Invalid timeoutMs", override.error);
      }
      timeoutMs = override.data;
    }
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    this.inFlight.add(controller);

    try {
      let response: Response;
      let text: string;
      try {
        response = await this.transport(url, { method, headers, body, signal: controller.signal });
        text = await response.text();
      } catch (error) {
        if (timedOut) {
          throw new TransportError(`Request timed out after ${timeoutMs}ms`, error);
        }
        throw new TransportError(error instanceof Error ? error.message : String(error), error);
      }

      if (response.status >= 400) {
        throw this.toError(response, text);
      }

      if (response.status === 204 || text.length === 0) {
        return undefined as T;
      }

      const contentType = response.headers.get("Content-Type") ?? "";
      if (contentType.includes("application/json")) {
        try {
          return JSON.parse(text) as T;
        } catch (error) {
          throw new DecodeError({
            httpStatus: response.status,
            message: "Invalid JSON received from Dari",
            response,
            cause: error,
          });
        }
      }

      return text as T;
    } finally {
      clearTimeout(timeout);
      this.inFlight.delete(controller);
    }
  }

  private call<T>(
    operationId: OperationId,
    pathParams: Record<string, string> = {},
    options: RequestOptions = {},
  ): Promise<T> {
    const operation = getOperation(operationId);
    return this.request<T>(operation.method, buildPath(operation.path, pathParams), options);
  }

  private toError(response: Response, payload: string): ApiError {
    let parsed: unknown;
    try {
      parsed = JSON.parse(payload);
    } catch {
      const suffix = payload ? `: ${payload}` : "";
      return new ApiError({
        httpStatus: response.status,
        message: `Dari request failed with status ${response.status}${suffix}`,
        response,
      });
    }

    let message = `Dari request failed with status ${response.status}`;
    if (isRecord(parsed)) {
      const record = parsed;
      const key = ERROR_MESSAGE_KEYS.find((candidate) => isPresent(record[candidate]));
      if (key) {
        const value = record[key];
        message = typeof value === "string" ? value : JSON.stringify(value);
      }
    }

    return new ApiError({ httpStatus: response.status, message, response, details: parsed });
  }
}
