/**
 * Typed async client for the exaroton API.
 *
 * Each method picks verb, path and body, runs one transport call, unwraps the
 * response envelope and validates the payload into a record. The client holds
 * only its immutable configuration, so any number of calls may run at once.
 */
import {
  RemoteOperationError,
  ShapeMismatchError,
  ValidationError,
  type Account,
  type ConfigOption,
  type ConfigUpdate,
  type LogUpload,
  type PathInfo,
  type Server,
} from '@exakit/shared';
import { createConfig, loadConfig, type ClientConfig, type ClientOptions } from './config/index.js';
import { HttpTransport } from './lib/http-transport.js';
import { createLogger, type Logger } from './lib/logger.js';
import { getAccount } from './resources/account.js';
import { getConfigOptions, setConfigOptions } from './resources/config-options.js';
import { createDirectory, deleteFile, getPathInfo, readFile, writeFile } from './resources/files.js';
import { addToPlayerList, getPlayerList, getPlayerLists, removeFromPlayerList } from './resources/player-lists.js';
import {
  executeCommand,
  getLog,
  getMotd,
  getRam,
  getServer,
  getServers,
  restartServer,
  setMotd,
  setRam,
  shareLog,
  startServer,
  stopServer,
  type StartOptions,
} from './resources/servers.js';

export interface ClientDeps {
  /** Defaults to a pino logger built from the config's level. */
  logger?: Logger;
}

export class ExaClient {
  readonly config: ClientConfig;
  private readonly logger: Logger;
  private readonly transport: HttpTransport;

  constructor(options: ClientOptions, deps: ClientDeps = {}) {
    this.config = createConfig(options);
    this.logger = deps.logger ?? createLogger(this.config);
    this.transport = new HttpTransport(this.config, this.logger);
  }

  /** Builds a client from `EXAROTON_*` environment variables. */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, deps: ClientDeps = {}): ExaClient {
    return new ExaClient(loadConfig(env), deps);
  }

  /** Operations bound to one server id. */
  forServer(serverId: string): ServerHandle {
    return new ServerHandle(this, serverId);
  }

  // ── Account & servers ─────────────────────────────────────────────────

  async account(): Promise<Account> {
    return this.run('account', () => getAccount(this.transport));
  }

  async servers(): Promise<readonly Server[]> {
    return this.run('servers', () => getServers(this.transport));
  }

  async server(serverId: string): Promise<Server> {
    return this.run('server', () => getServer(this.transport, serverId));
  }

  /** Current server log, or `null` when the server has none. */
  async log(serverId: string): Promise<string | null> {
    return this.run('log', () => getLog(this.transport, serverId));
  }

  async shareLog(serverId: string): Promise<LogUpload> {
    return this.run('shareLog', () => shareLog(this.transport, serverId));
  }

  /** RAM in GB. */
  async ram(serverId: string): Promise<number> {
    return this.run('ram', () => getRam(this.transport, serverId));
  }

  async setRam(serverId: string, ram: number): Promise<number> {
    return this.run('setRam', () => setRam(this.transport, serverId, ram));
  }

  async motd(serverId: string): Promise<string> {
    return this.run('motd', () => getMotd(this.transport, serverId));
  }

  async setMotd(serverId: string, motd: string): Promise<string> {
    return this.run('setMotd', () => setMotd(this.transport, serverId, motd));
  }

  // ── Lifecycle ─────────────────────────────────────────────────────────

  async start(serverId: string, options: StartOptions = {}): Promise<string | null> {
    return this.run('start', () => startServer(this.transport, serverId, options));
  }

  async stop(serverId: string): Promise<string | null> {
    return this.run('stop', () => stopServer(this.transport, serverId));
  }

  async restart(serverId: string): Promise<string | null> {
    return this.run('restart', () => restartServer(this.transport, serverId));
  }

  async executeCommand(serverId: string, command: string): Promise<string | null> {
    return this.run('executeCommand', () => executeCommand(this.transport, serverId, command));
  }

  // ── Player lists ──────────────────────────────────────────────────────

  async playerLists(serverId: string): Promise<readonly string[]> {
    return this.run('playerLists', () => getPlayerLists(this.transport, serverId));
  }

  async playerList(serverId: string, list: string): Promise<readonly string[]> {
    return this.run('playerList', () => getPlayerList(this.transport, serverId, list));
  }

  async addToPlayerList(serverId: string, list: string, entries: readonly string[]): Promise<readonly string[]> {
    return this.run('addToPlayerList', () => addToPlayerList(this.transport, serverId, list, entries));
  }

  async removeFromPlayerList(serverId: string, list: string, entries: readonly string[]): Promise<readonly string[]> {
    return this.run('removeFromPlayerList', () => removeFromPlayerList(this.transport, serverId, list, entries));
  }

  // ── Files ─────────────────────────────────────────────────────────────

  async pathInfo(serverId: string, path: string): Promise<PathInfo> {
    return this.run('pathInfo', () => getPathInfo(this.transport, serverId, path));
  }

  async readFile(serverId: string, path: string): Promise<Uint8Array> {
    return this.run('readFile', () => readFile(this.transport, serverId, path));
  }

  async writeFile(serverId: string, path: string, content: Uint8Array): Promise<string | null> {
    return this.run('writeFile', () => writeFile(this.transport, serverId, path, content));
  }

  async createDirectory(serverId: string, path: string): Promise<string | null> {
    return this.run('createDirectory', () => createDirectory(this.transport, serverId, path));
  }

  async deleteFile(serverId: string, path: string): Promise<string | null> {
    return this.run('deleteFile', () => deleteFile(this.transport, serverId, path));
  }

  async configOptions(serverId: string, path?: string): Promise<readonly ConfigOption[]> {
    return this.run('configOptions', () => getConfigOptions(this.transport, serverId, path));
  }

  async setConfigOptions(serverId: string, options: ConfigUpdate, path?: string): Promise<readonly ConfigOption[]> {
    return this.run('setConfigOptions', () => setConfigOptions(this.transport, serverId, options, path));
  }

  private async run<T>(operation: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      // transport failures are logged where they happen
      if (err instanceof RemoteOperationError) {
        this.logger.warn({ operation }, err.message);
      } else if (err instanceof ShapeMismatchError || err instanceof ValidationError) {
        this.logger.error({ operation, code: err.code, details: err.details }, err.message);
      }
      throw err;
    }
  }
}

export class ServerFiles {
  constructor(
    private readonly client: ExaClient,
    readonly serverId: string,
  ) {}

  info(path: string): Promise<PathInfo> {
    return this.client.pathInfo(this.serverId, path);
  }

  read(path: string): Promise<Uint8Array> {
    return this.client.readFile(this.serverId, path);
  }

  write(path: string, content: Uint8Array): Promise<string | null> {
    return this.client.writeFile(this.serverId, path, content);
  }

  createDirectory(path: string): Promise<string | null> {
    return this.client.createDirectory(this.serverId, path);
  }

  delete(path: string): Promise<string | null> {
    return this.client.deleteFile(this.serverId, path);
  }

  configOptions(path?: string): Promise<readonly ConfigOption[]> {
    return this.client.configOptions(this.serverId, path);
  }

  setConfigOptions(options: ConfigUpdate, path?: string): Promise<readonly ConfigOption[]> {
    return this.client.setConfigOptions(this.serverId, options, path);
  }
}

export class ServerPlayerLists {
  constructor(
    private readonly client: ExaClient,
    readonly serverId: string,
  ) {}

  names(): Promise<readonly string[]> {
    return this.client.playerLists(this.serverId);
  }

  get(list: string): Promise<readonly string[]> {
    return this.client.playerList(this.serverId, list);
  }

  add(list: string, entries: readonly string[]): Promise<readonly string[]> {
    return this.client.addToPlayerList(this.serverId, list, entries);
  }

  remove(list: string, entries: readonly string[]): Promise<readonly string[]> {
    return this.client.removeFromPlayerList(this.serverId, list, entries);
  }
}

/** A server id with its operations, so callers need not repeat the id. */
export class ServerHandle {
  readonly files: ServerFiles;
  readonly playerLists: ServerPlayerLists;

  constructor(
    private readonly client: ExaClient,
    readonly id: string,
  ) {
    this.files = new ServerFiles(client, id);
    this.playerLists = new ServerPlayerLists(client, id);
  }

  info(): Promise<Server> {
    return this.client.server(this.id);
  }

  start(options?: StartOptions): Promise<string | null> {
    return this.client.start(this.id, options);
  }

  stop(): Promise<string | null> {
    return this.client.stop(this.id);
  }

  restart(): Promise<string | null> {
    return this.client.restart(this.id);
  }

  executeCommand(command: string): Promise<string | null> {
    return this.client.executeCommand(this.id, command);
  }

  log(): Promise<string | null> {
    return this.client.log(this.id);
  }

  shareLog(): Promise<LogUpload> {
    return this.client.shareLog(this.id);
  }

  ram(): Promise<number> {
    return this.client.ram(this.id);
  }

  setRam(ram: number): Promise<number> {
    return this.client.setRam(this.id, ram);
  }

  motd(): Promise<string> {
    return this.client.motd(this.id);
  }

  setMotd(motd: string): Promise<string> {
    return this.client.setMotd(this.id, motd);
  }
}
