/**
 * Player lists (whitelist, ops, banned-players, banned-ips, ...).
 * Entries are player names, UUIDs or IP addresses.
 */
import { decodeEnvelope, parseRecord, stringListSchema } from '@exakit/shared';
import { route, type HttpTransport } from '../lib/http-transport.js';

function toEntries(body: unknown, record: string): readonly string[] {
  return parseRecord(stringListSchema, decodeEnvelope(body, 'list'), record);
}

export async function getPlayerLists(transport: HttpTransport, serverId: string): Promise<readonly string[]> {
  return toEntries(await transport.get(route`servers/${serverId}/playerlists`), 'PlayerListNames');
}

export async function getPlayerList(transport: HttpTransport, serverId: string, list: string): Promise<readonly string[]> {
  return toEntries(await transport.get(route`servers/${serverId}/playerlists/${list}`), 'PlayerList');
}

export async function addToPlayerList(
  transport: HttpTransport,
  serverId: string,
  list: string,
  entries: readonly string[],
): Promise<readonly string[]> {
  const body = await transport.put(route`servers/${serverId}/playerlists/${list}`, { entries: [...entries] });
  return toEntries(body, 'PlayerList');
}

export async function removeFromPlayerList(
  transport: HttpTransport,
  serverId: string,
  list: string,
  entries: readonly string[],
): Promise<readonly string[]> {
  const body = await transport.delete(route`servers/${serverId}/playerlists/${list}`, { entries: [...entries] });
  return toEntries(body, 'PlayerList');
}
