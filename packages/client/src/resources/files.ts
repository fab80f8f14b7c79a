/**
 * File management. Content reads return raw bytes without an envelope;
 * writes and deletes are acknowledged through the envelope.
 */
import { decodeEnvelope, parseRecord, pathInfoSchema, type PathInfo } from '@exakit/shared';
import { encodeFilePath, route, type HttpTransport } from '../lib/http-transport.js';

export const DIRECTORY_CONTENT_TYPE = 'inode/directory';

export function filesRoute(serverId: string, kind: 'info' | 'data' | 'config', path: string): string {
  return `${route`servers/${serverId}/files/`}${kind}/${encodeFilePath(path)}`;
}

export async function getPathInfo(transport: HttpTransport, serverId: string, path: string): Promise<PathInfo> {
  const data = decodeEnvelope(await transport.get(filesRoute(serverId, 'info', path)), 'object');
  return parseRecord(pathInfoSchema, data, 'PathInfo');
}

export async function readFile(transport: HttpTransport, serverId: string, path: string): Promise<Uint8Array> {
  return transport.getBytes(filesRoute(serverId, 'data', path));
}

/** Writes a file, creating it when it does not exist. */
export async function writeFile(
  transport: HttpTransport,
  serverId: string,
  path: string,
  content: Uint8Array,
): Promise<string | null> {
  const body = await transport.putBytes(filesRoute(serverId, 'data', path), content, 'application/octet-stream');
  return decodeEnvelope(body, 'string', 'none');
}

export async function createDirectory(transport: HttpTransport, serverId: string, path: string): Promise<string | null> {
  const body = await transport.putBytes(filesRoute(serverId, 'data', path), undefined, DIRECTORY_CONTENT_TYPE);
  return decodeEnvelope(body, 'string', 'none');
}

/** Deletes a file or a directory. */
export async function deleteFile(transport: HttpTransport, serverId: string, path: string): Promise<string | null> {
  return decodeEnvelope(await transport.delete(filesRoute(serverId, 'data', path)), 'string', 'none');
}
