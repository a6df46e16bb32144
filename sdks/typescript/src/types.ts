export interface ClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  userAgentSuffix?: string;
  transport?: typeof fetch;
}

export interface ResolvedClientConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly userAgentSuffix?: string;
}

export type SearchParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
  searchParams?: SearchParams;
  body?: Record<string, unknown>;
  headers?: Record<string, string>;
  /** Set to false for pre-authenticated URLs such as workflow resume links. */
  requireApiKey?: boolean;
  timeoutMs?: number;
}

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

export interface ApiRecord {
  [key: string]: unknown;
}

export interface ScreenConfig {
  width: number;
  height: number;
}

// Workflows

export type ProxyCity =
  | "New York"
  | "Los Angeles"
  | "Chicago"
  | "Seattle"
  | "Miami"
  | "Toronto"
  | "London"
  | "Frankfurt"
  | "Singapore"
  | "Sydney";

export interface StartWorkflowOptions {
  timeoutMinutes?: number;
  shouldUpdateCache?: boolean;
  allowPublicLiveView?: boolean;
  browserProfileId?: string;
  useProxy?: boolean;
  proxyCity?: ProxyCity | (string & {});
  /** Custom proxy server URL, e.g. `http://proxy.example.com:8080`. */
  proxyServer?: string;
  proxyServerUsername?: string;
  proxyServerPassword?: string;
  userAgent?: string;
}

export interface WorkflowExecution extends ApiRecord {
  workflow_execution_id?: string;
  status?: string;
}

// Credentials and workspace accounts

export interface CreateCredentialParams {
  serviceName: string;
  usernameOrEmail?: string;
  password?: string;
  totpSecret?: string;
  gmailOauthAccountId?: string;
  phoneNumberId?: string;
}

export interface CredentialRecord extends ApiRecord {
  id?: string;
  service_name?: string;
}

export interface PurchasePhoneNumberParams {
  label: string;
}

export interface PhoneNumberRecord extends ApiRecord {
  id?: string;
  phone_number?: string;
  label?: string;
}

export type BrowserProvider = "hyperbrowser" | "kernel";

export interface CreateBrowserProfileParams {
  name: string;
  /** Defaults to hyperbrowser on the service side. */
  provider?: BrowserProvider | (string & {});
}

export interface BrowserProfile extends ApiRecord {
  id?: string;
  name?: string;
  created_at?: string;
}

export interface BrowserProfileList extends ApiRecord {
  profiles?: BrowserProfile[];
}

// Single actions

export interface RunSingleActionParams {
  action: string;
  /** Existing session to act in. Without it the service starts a short-lived session. */
  sessionId?: string;
  /** Step identifier used for caching. */
  id?: string;
  variables?: Record<string, unknown>;
  /** Only used when the service creates the session. */
  screenConfig?: ScreenConfig;
  setCache?: boolean;
}

export interface SingleActionResult extends ApiRecord {
  success?: boolean;
  result?: unknown;
  credits?: number;
  error?: string | null;
}

// Sessions

export interface CreateSessionParams {
  /** Bring-your-own browser via an external CDP endpoint. */
  cdpUrl?: string;
  screenConfig?: ScreenConfig;
  /** Time to live in seconds, at most 86400. */
  ttl?: number;
  metadata?: Record<string, unknown>;
}

export interface ListSessionsParams {
  statusFilter?: string;
  limit?: number;
  offset?: number;
}

export interface UpdateSessionParams {
  /** New TTL in seconds, extends the expiration. */
  ttl?: number;
  /** Merged into the existing metadata. */
  metadata?: Record<string, unknown>;
}

export interface SessionRecord extends ApiRecord {
  session_id?: string;
  cdp_url?: string;
  screen_config?: ScreenConfig;
  status?: string;
  expires_at?: string;
  metadata?: Record<string, unknown>;
  created_at?: string;
  updated_at?: string;
}

export interface SessionList extends ApiRecord {
  sessions?: SessionRecord[];
  total?: number;
}
