import { DEFAULT_API_URL, parseEnv, type Env, type LogLevel } from './env.js';

export { DEFAULT_API_URL, parseEnv, type Env, type LogLevel };

/**
 * Long-lived client configuration: the credential and base endpoint shared
 * by every call. Transport resources are created per call, never stored here.
 */
export interface ClientConfig {
  readonly apiUrl: string;
  readonly apiToken: string;
  readonly requestTimeoutMs: number;
  readonly logLevel: LogLevel;
  readonly prettyLogs: boolean;
}

export type ClientOptions = Pick<ClientConfig, 'apiToken'> & Partial<Omit<ClientConfig, 'apiToken'>>;

/** Base URLs are joined with relative paths, so they always end in a slash. */
export function normalizeApiUrl(url: string): string {
  return url.endsWith('/') ? url : `${url}/`;
}

export function createConfig(options: ClientOptions): ClientConfig {
  if (!options.apiToken) {
    throw new Error('apiToken is required');
  }
  return Object.freeze({
    apiUrl: normalizeApiUrl(options.apiUrl ?? DEFAULT_API_URL),
    apiToken: options.apiToken,
    requestTimeoutMs: options.requestTimeoutMs ?? 30000,
    logLevel: options.logLevel ?? 'info',
    prettyLogs: options.prettyLogs ?? false,
  });
}

/** Builds the client configuration from `EXAROTON_*` environment variables. */
export function loadConfig(raw: NodeJS.ProcessEnv = process.env): ClientConfig {
  const env = parseEnv(raw);
  return createConfig({
    apiUrl: env.EXAROTON_API_URL,
    apiToken: env.EXAROTON_API_TOKEN,
    requestTimeoutMs: env.EXAROTON_REQUEST_TIMEOUT_MS,
    logLevel: env.EXAROTON_LOG_LEVEL,
    prettyLogs: env.NODE_ENV === 'development',
  });
}
