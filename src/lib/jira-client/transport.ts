import { readFileSync } from 'node:fs';
import { Effect } from 'effect';
import { Agent } from 'undici';
import { ConfigError, NetworkError, TimeoutError } from '../errors.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export interface TransportRequest {
  method: HttpMethod;
  path: string;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
}

export interface TlsOptions {
  verifySsl: boolean;
  caCertPath?: string;
}

type Dispatcher = NonNullable<RequestInit['dispatcher']>;

/**
 * Build the fetch dispatcher for the configured TLS policy.
 * Returns undefined when the platform defaults apply.
 */
export function createDispatcher(tls: TlsOptions): Effect.Effect<Dispatcher | undefined, ConfigError> {
  if (tls.caCertPath) {
    const caCertPath = tls.caCertPath;
    return Effect.try({
      try: () => new Agent({ connect: { ca: readFileSync(caCertPath, 'utf-8'), rejectUnauthorized: tls.verifySsl } }),
      catch: (error) => new ConfigError(`Failed to read CA certificate ${caCertPath}: ${error}`, error),
    });
  }
  if (!tls.verifySsl) {
    return Effect.succeed(new Agent({ connect: { rejectUnauthorized: false } }));
  }
  return Effect.succeed(undefined);
}

/**
 * One authenticated connection to the tracker: base URL, cookie jar and auth header.
 * A session replaces its transport on every handshake; `generation` tells them apart.
 */
export class Transport {
  private readonly cookies = new Map<string, string>();
  private authorization: string | undefined;

  constructor(
    readonly baseUrl: string,
    readonly generation: number,
    private readonly dispatcher: Dispatcher | undefined,
    private readonly timeoutMs: number,
  ) {}

  setAuthorization(value: string | undefined): void {
    this.authorization = value;
  }

  setCookie(name: string, value: string): void {
    this.cookies.set(name, value);
  }

  url(path: string, query?: TransportRequest['query']): string {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  send(request: TransportRequest): Effect.Effect<Response, NetworkError | TimeoutError> {
    const url = this.url(request.path, request.query);
    return Effect.tryPromise({
      try: async () => {
        const response = await fetch(url, {
          method: request.method,
          headers: this.headers(request.body !== undefined),
          body: request.body === undefined ? undefined : JSON.stringify(request.body),
          signal: AbortSignal.timeout(this.timeoutMs),
          ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
        });
        this.absorbCookies(response);
        return response;
      },
      catch: (error) => {
        if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
          return new TimeoutError(`${request.method} ${request.path} timed out after ${this.timeoutMs / 1000}s`, error);
        }
        return new NetworkError(`Failed to reach ${url}: ${error}`, undefined, url, error);
      },
    });
  }

  private headers(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (hasBody) headers['Content-Type'] = 'application/json';
    if (this.authorization) headers.Authorization = this.authorization;
    if (this.cookies.size > 0) {
      headers.Cookie = [...this.cookies].map(([name, value]) => `${name}=${value}`).join('; ');
    }
    return headers;
  }

  private absorbCookies(response: Response): void {
    for (const header of response.headers.getSetCookie()) {
      const pair = header.split(';')[0];
      const eq = pair.indexOf('=');
      if (eq > 0) this.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
    }
  }
}
