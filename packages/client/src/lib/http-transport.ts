/**
 * Thin HTTP transport over the global fetch (Node 20+).
 *
 * Each call builds its own request, abort timer and response; nothing is
 * shared between calls except the immutable config. Non-2xx responses raise
 * a TransportError before the caller sees the body, so envelope decoding
 * only ever runs on successful HTTP exchanges.
 */
import { TransportError } from '@exakit/shared';
import type { ClientConfig } from '../config/index.js';
import type { Logger } from './logger.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type JsonBody = Record<string, unknown>;

interface SendOptions {
  json?: JsonBody;
  bytes?: Uint8Array;
  contentType?: string;
  accept: string;
}

/** Encodes each segment of a file path, dropping leading and repeated slashes. */
export function encodeFilePath(path: string): string {
  return path
    .split('/')
    .filter((segment) => segment.length > 0)
    .map((segment) => encodeURIComponent(segment))
    .join('/');
}

/** Builds a relative route from already-safe literals and encoded identifiers. */
export function route(strings: TemplateStringsArray, ...ids: string[]): string {
  return strings.reduce((acc, literal, i) => {
    const id = ids[i - 1];
    return acc + (id === undefined ? '' : encodeURIComponent(id)) + literal;
  });
}

export class HttpTransport {
  constructor(
    private readonly config: ClientConfig,
    private readonly logger: Logger,
  ) {}

  async get(path: string): Promise<unknown> {
    return this.send('GET', path, { accept: 'application/json' }, (res) => this.readJson(res, 'GET', path));
  }

  async post(path: string, body?: JsonBody): Promise<unknown> {
    return this.sendJson('POST', path, body);
  }

  async put(path: string, body?: JsonBody): Promise<unknown> {
    return this.sendJson('PUT', path, body);
  }

  async delete(path: string, body?: JsonBody): Promise<unknown> {
    return this.sendJson('DELETE', path, body);
  }

  /** Raw response bytes; used for file content, which has no envelope. */
  async getBytes(path: string): Promise<Uint8Array> {
    return this.send('GET', path, { accept: '*/*' }, async (res) => new Uint8Array(await res.arrayBuffer()));
  }

  /** Uploads a raw body (or none) and returns the JSON acknowledgement. */
  async putBytes(path: string, bytes: Uint8Array | undefined, contentType: string): Promise<unknown> {
    return this.send('PUT', path, { bytes, contentType, accept: 'application/json' }, (res) =>
      this.readJson(res, 'PUT', path),
    );
  }

  private async sendJson(method: HttpMethod, path: string, body?: JsonBody): Promise<unknown> {
    return this.send(method, path, { json: body, accept: 'application/json' }, (res) =>
      this.readJson(res, method, path),
    );
  }

  private async send<T>(
    method: HttpMethod,
    path: string,
    options: SendOptions,
    read: (res: Response) => Promise<T>,
  ): Promise<T> {
    const url = new URL(path.replace(/^\/+/, ''), this.config.apiUrl);
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.config.apiToken}`,
      Accept: options.accept,
    };
    const init: RequestInit = { method, headers };

    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.json);
    } else if (options.contentType !== undefined) {
      headers['Content-Type'] = options.contentType;
      if (options.bytes !== undefined) init.body = options.bytes;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.requestTimeoutMs);
    init.signal = controller.signal;
    const started = Date.now();

    try {
      const res = await fetch(url.href, init);
      this.logger.debug({ method, path, status: res.status, durationMs: Date.now() - started }, 'request completed');

      if (!res.ok) {
        await res.body?.cancel();
        throw TransportError.http(res.status, method, path);
      }

      return await read(res);
    } catch (err) {
      const failure = this.toTransportError(err, method, path);
      this.logger.warn({ method, path, code: failure.code, status: failure.status }, failure.message);
      throw failure;
    } finally {
      clearTimeout(timeout);
    }
  }

  private async readJson(res: Response, method: HttpMethod, path: string): Promise<unknown> {
    const text = await res.text();
    try {
      const body: unknown = JSON.parse(text);
      return body;
    } catch {
      throw TransportError.invalidBody(method, path, res.status);
    }
  }

  private toTransportError(err: unknown, method: HttpMethod, path: string): TransportError {
    if (err instanceof TransportError) return err;
    if (err instanceof Error && err.name === 'AbortError') {
      return TransportError.timeout(method, path, this.config.requestTimeoutMs);
    }
    return TransportError.network(method, path, err);
  }
}
