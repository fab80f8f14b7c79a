/**
 * Structured access to config files whose PathInfo has `isConfig` set,
 * most commonly server.properties.
 */
import { configOptionSchema, decodeEnvelope, parseRecords, type ConfigOption, type ConfigUpdate } from '@exakit/shared';
import type { HttpTransport } from '../lib/http-transport.js';
import { filesRoute } from './files.js';

export const DEFAULT_CONFIG_FILE = 'server.properties';

export async function getConfigOptions(
  transport: HttpTransport,
  serverId: string,
  path: string = DEFAULT_CONFIG_FILE,
): Promise<readonly ConfigOption[]> {
  const data = decodeEnvelope(await transport.get(filesRoute(serverId, 'config', path)), 'list');
  return parseRecords(configOptionSchema, data, 'ConfigOption');
}

/** Sets options from a `{ key: value }` map and returns the file's new options. */
export async function setConfigOptions(
  transport: HttpTransport,
  serverId: string,
  options: ConfigUpdate,
  path: string = DEFAULT_CONFIG_FILE,
): Promise<readonly ConfigOption[]> {
  const body = await transport.post(filesRoute(serverId, 'config', path), { ...options });
  return parseRecords(configOptionSchema, decodeEnvelope(body, 'list'), 'ConfigOption');
}
