import { z } from 'zod';
import { nullable, type DeepReadonly } from '../validation.js';

/**
 * Server lifecycle status as sent on the wire.
 * Code 9 is not assigned and is rejected like any other unknown code.
 */
export const ServerStatus = {
  Offline: 0,
  Online: 1,
  Starting: 2,
  Stopping: 3,
  Restarting: 4,
  Saving: 5,
  Loading: 6,
  Crashed: 7,
  Pending: 8,
  Preparing: 10,
} as const;

export type ServerStatus = (typeof ServerStatus)[keyof typeof ServerStatus];

const STATUS_NAMES = {
  0: 'offline',
  1: 'online',
  2: 'starting',
  3: 'stopping',
  4: 'restarting',
  5: 'saving',
  6: 'loading',
  7: 'crashed',
  8: 'pending',
  10: 'preparing',
} as const satisfies Record<ServerStatus, string>;

export type ServerStatusName = (typeof STATUS_NAMES)[ServerStatus];

export function serverStatusName(status: ServerStatus): ServerStatusName {
  return STATUS_NAMES[status];
}

export const serverStatusSchema = z.nativeEnum(ServerStatus);

export const serverPlayersSchema = z.object({
  max: z.number().int(),
  count: z.number().int(),
  list: z.array(z.string()),
});

export type ServerPlayers = DeepReadonly<z.output<typeof serverPlayersSchema>>;

export const serverSoftwareSchema = z.object({
  id: z.string(),
  name: z.string(),
  version: z.string(),
});

export type ServerSoftware = DeepReadonly<z.output<typeof serverSoftwareSchema>>;

export const serverSchema = z.object({
  id: z.string(),
  name: z.string(),
  address: z.string(),
  motd: z.string(),
  status: serverStatusSchema,
  // only set while the instance is reachable
  host: nullable(z.string()),
  port: nullable(z.number().int()),
  players: serverPlayersSchema,
  software: nullable(serverSoftwareSchema),
  shared: z.boolean(),
});

export type Server = DeepReadonly<z.output<typeof serverSchema>>;
