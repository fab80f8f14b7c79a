/** Server listing, lifecycle, logs and server options. */
import {
  decodeEnvelope,
  logContentSchema,
  logUploadSchema,
  motdSettingSchema,
  parseRecord,
  parseRecords,
  ramSettingSchema,
  serverSchema,
  type LogUpload,
  type Server,
} from '@exakit/shared';
import { route, type HttpTransport } from '../lib/http-transport.js';

export interface StartOptions {
  /** Pay for a shared server with the caller's own credits. */
  useOwnCredits?: boolean;
}

export async function getServers(transport: HttpTransport): Promise<readonly Server[]> {
  const data = decodeEnvelope(await transport.get('servers'), 'list');
  return parseRecords(serverSchema, data, 'Server');
}

export async function getServer(transport: HttpTransport, serverId: string): Promise<Server> {
  const data = decodeEnvelope(await transport.get(route`servers/${serverId}`), 'object');
  return parseRecord(serverSchema, data, 'Server');
}

export async function getLog(transport: HttpTransport, serverId: string): Promise<string | null> {
  const data = decodeEnvelope(await transport.get(route`servers/${serverId}/logs`), 'object');
  return parseRecord(logContentSchema, data, 'LogContent').content;
}

export async function shareLog(transport: HttpTransport, serverId: string): Promise<LogUpload> {
  const data = decodeEnvelope(await transport.get(route`servers/${serverId}/logs/share`), 'object');
  return parseRecord(logUploadSchema, data, 'LogUpload');
}

export async function getRam(transport: HttpTransport, serverId: string): Promise<number> {
  const data = decodeEnvelope(await transport.get(route`servers/${serverId}/options/ram`), 'object');
  return parseRecord(ramSettingSchema, data, 'RamSetting').ram;
}

export async function setRam(transport: HttpTransport, serverId: string, ram: number): Promise<number> {
  const body = await transport.post(route`servers/${serverId}/options/ram`, { ram });
  return parseRecord(ramSettingSchema, decodeEnvelope(body, 'object'), 'RamSetting').ram;
}

export async function getMotd(transport: HttpTransport, serverId: string): Promise<string> {
  const data = decodeEnvelope(await transport.get(route`servers/${serverId}/options/motd`), 'object');
  return parseRecord(motdSettingSchema, data, 'MotdSetting').motd;
}

export async function setMotd(transport: HttpTransport, serverId: string, motd: string): Promise<string> {
  const body = await transport.post(route`servers/${serverId}/options/motd`, { motd });
  return parseRecord(motdSettingSchema, decodeEnvelope(body, 'object'), 'MotdSetting').motd;
}

// Lifecycle and command endpoints acknowledge with an undocumented optional
// string; it is passed through untouched.

export async function startServer(
  transport: HttpTransport,
  serverId: string,
  options: StartOptions = {},
): Promise<string | null> {
  const path = route`servers/${serverId}/start`;
  const body = options.useOwnCredits
    ? await transport.post(path, { useOwnCredits: true })
    : await transport.get(path);
  return decodeEnvelope(body, 'string', 'none');
}

export async function stopServer(transport: HttpTransport, serverId: string): Promise<string | null> {
  return decodeEnvelope(await transport.get(route`servers/${serverId}/stop`), 'string', 'none');
}

export async function restartServer(transport: HttpTransport, serverId: string): Promise<string | null> {
  return decodeEnvelope(await transport.get(route`servers/${serverId}/restart`), 'string', 'none');
}

export async function executeCommand(
  transport: HttpTransport,
  serverId: string,
  command: string,
): Promise<string | null> {
  const body = await transport.post(route`servers/${serverId}/command`, { command });
  return decodeEnvelope(body, 'string', 'none');
}
