/**
 * @exakit/client
 * Typed async client for the exaroton server hosting API.
 */

export { ExaClient, ServerHandle, ServerFiles, ServerPlayerLists, type ClientDeps } from './client.js';
export {
  createConfig,
  loadConfig,
  normalizeApiUrl,
  parseEnv,
  DEFAULT_API_URL,
  type ClientConfig,
  type ClientOptions,
  type Env,
  type LogLevel,
} from './config/index.js';
export { HttpTransport, encodeFilePath, route, type HttpMethod, type JsonBody } from './lib/http-transport.js';
export { createLogger, buildLoggerOptions, type Logger } from './lib/logger.js';
export type { StartOptions } from './resources/servers.js';
export { DEFAULT_CONFIG_FILE } from './resources/config-options.js';
export { DIRECTORY_CONTENT_TYPE } from './resources/files.js';

export * from '@exakit/shared';
