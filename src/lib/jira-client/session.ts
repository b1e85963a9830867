import { confirm, input, password } from '@inquirer/prompts';
import { Effect, pipe, Schema } from 'effect';
import open from 'open';
import type { Config } from '../config.js';
import {
  AuthenticationError,
  CaptchaRequiredError,
  ConfigError,
  NetworkError,
  NotFoundError,
  ParseError,
  RemoteValidationError,
  type RequestError,
  type TimeoutError,
} from '../errors.js';
import type { LoggingService } from '../logging.js';
import { LoginResponseSchema, UserRefSchema } from './jira-client-types.js';
import { KerberosTokenProvider, type NegotiateTokenProvider } from './negotiate.js';
import { createDispatcher, Transport, type TransportRequest } from './transport.js';

export type SessionError = RequestError | ParseError;

type HandshakeError = AuthenticationError | CaptchaRequiredError | NetworkError | TimeoutError | ConfigError;

/**
 * The questions a session may need to ask while (re)connecting.
 */
export interface SessionPrompter {
  password(message: string): Promise<string>;
  confirm(message: string): Promise<boolean>;
  waitForEnter(message: string): Promise<void>;
}

export const inquirerPrompter: SessionPrompter = {
  password: (message) => password({ message, mask: '*' }),
  confirm: (message) => confirm({ message, default: true }),
  waitForEnter: async (message) => {
    await input({ message });
  },
};

export interface SessionOptions {
  config: Pick<Config, 'jiraUrl' | 'auth' | 'verifySsl' | 'caCertPath'>;
  logger: LoggingService;
  prompter?: SessionPrompter;
  negotiator?: NegotiateTokenProvider;
  openBrowser?: (url: string) => Promise<void>;
  timeoutMs?: number;
}

export const DEFAULT_TIMEOUT_MS = 30_000;

const SESSION_PATH = '/rest/auth/1/session';
const NEGOTIATE_PROBE_PATH = '/step-auth-gss';
const CAPTCHA_MARKER = 'CAPTCHA_CHALLENGE';

let tlsWarningShown = false;

/**
 * An authenticated conversation with the tracker.
 *
 * Requests that come back 401 trigger exactly one re-authentication and one retry.
 * Concurrent re-authentications are serialized: a request that failed on a transport
 * that has since been replaced reuses the replacement instead of logging in again.
 */
export class JiraSession {
  private transport: Transport | undefined;
  private generation = 0;
  private password: string | undefined;
  private userId: string | undefined;
  private readonly authLock = Effect.unsafeMakeSemaphore(1);
  private readonly baseUrl: string;
  private readonly logger: LoggingService;
  private readonly prompter: SessionPrompter;
  private readonly negotiator: NegotiateTokenProvider;
  private readonly openBrowser: (url: string) => Promise<void>;
  private readonly timeoutMs: number;

  constructor(private readonly options: SessionOptions) {
    this.baseUrl = options.config.jiraUrl.replace(/\/+$/, '');
    this.logger = options.logger.withModule('session');
    this.prompter = options.prompter ?? inquirerPrompter;
    this.negotiator = options.negotiator ?? new KerberosTokenProvider();
    this.openBrowser =
      options.openBrowser ??
      (async (url) => {
        await open(url);
      });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.password = options.config.auth.password;
  }

  get url(): string {
    return this.baseUrl;
  }

  /**
   * Establish a fresh authenticated transport, replacing any existing one.
   */
  connect(): Effect.Effect<void, HandshakeError> {
    return this.authLock.withPermits(1)(Effect.asVoid(this.connectTransport()));
  }

  /**
   * Forget the transport and the cached user; the next request logs in again.
   */
  reset(): void {
    this.transport = undefined;
    this.userId = undefined;
  }

  /**
   * Send a request, re-authenticating once on 401, and map error statuses to tagged errors.
   */
  request(request: TransportRequest): Effect.Effect<Response, SessionError> {
    return pipe(
      this.ensureTransport(),
      Effect.flatMap((transport) =>
        pipe(
          transport.send(request),
          Effect.flatMap((response) =>
            response.status === 401 ? this.retryAfterReauth(request, transport.generation) : Effect.succeed(response),
          ),
        ),
      ),
      Effect.flatMap((response) => this.checkResponse(request, response)),
    );
  }

  requestJson<A, I>(request: TransportRequest, schema: Schema.Schema<A, I>): Effect.Effect<A, SessionError> {
    return pipe(
      this.request(request),
      Effect.flatMap((response) =>
        Effect.tryPromise({
          try: (): Promise<unknown> => response.json(),
          catch: (error) => new ParseError(`Invalid JSON from ${request.method} ${request.path}: ${error}`, error),
        }),
      ),
      Effect.flatMap((data) =>
        Schema.decodeUnknown(schema)(data).pipe(
          Effect.mapError(
            (error) => new ParseError(`Unexpected response from ${request.method} ${request.path}: ${error.message}`, error),
          ),
        ),
      ),
    );
  }

  requestVoid(request: TransportRequest): Effect.Effect<void, SessionError> {
    return Effect.asVoid(this.request(request));
  }

  /**
   * The authenticated user's id, fetched once per session.
   */
  currentUserId(): Effect.Effect<string, SessionError> {
    const known = this.userId;
    if (known) return Effect.succeed(known);
    return pipe(
      this.requestJson({ method: 'GET', path: '/rest/api/2/myself' }, UserRefSchema),
      Effect.map((user) => user.key ?? user.name),
      Effect.tap((id) =>
        Effect.sync(() => {
          this.userId = id;
        }),
      ),
    );
  }

  private ensureTransport(): Effect.Effect<Transport, HandshakeError> {
    const current = this.transport;
    if (current) return Effect.succeed(current);
    return this.authLock.withPermits(1)(
      Effect.suspend(() => {
        const connected = this.transport;
        return connected ? Effect.succeed(connected) : this.connectTransport();
      }),
    );
  }

  private retryAfterReauth(request: TransportRequest, failedGeneration: number): Effect.Effect<Response, HandshakeError> {
    return pipe(
      this.logger.info('Session expired, attempting to refresh...'),
      Effect.flatMap(() => this.reauthenticate(failedGeneration)),
      Effect.flatMap((fresh) => fresh.send(request)),
      Effect.flatMap((retry) =>
        retry.status === 401
          ? pipe(
              readText(retry),
              Effect.flatMap((text) =>
                Effect.fail(new AuthenticationError(`Authentication failed after re-login: 401 - ${text}`)),
              ),
            )
          : Effect.succeed(retry),
      ),
    );
  }

  private reauthenticate(failedGeneration: number): Effect.Effect<Transport, HandshakeError> {
    return this.authLock.withPermits(1)(
      Effect.suspend(() => {
        const current = this.transport;
        // someone else already logged in again while we waited
        if (current && current.generation !== failedGeneration) {
          return Effect.succeed(current);
        }
        return this.connectTransport();
      }),
    );
  }

  private connectTransport(): Effect.Effect<Transport, HandshakeError> {
    return pipe(
      this.logger.info(`Connecting to jira at ${this.baseUrl}`),
      Effect.flatMap(() => this.handshakeWithCaptcha()),
      Effect.tap((transport) =>
        Effect.sync(() => {
          this.transport = transport;
        }),
      ),
    );
  }

  private handshakeWithCaptcha(): Effect.Effect<Transport, HandshakeError> {
    return pipe(
      this.handshake(),
      Effect.catchTag('CaptchaRequiredError', (captcha) =>
        pipe(
          this.solveCaptcha(captcha),
          Effect.flatMap(() => this.handshake()),
        ),
      ),
    );
  }

  private solveCaptcha(captcha: CaptchaRequiredError): Effect.Effect<void, CaptchaRequiredError> {
    return pipe(
      this.logger.warn('The server asks for a CAPTCHA before accepting a login'),
      Effect.flatMap(() =>
        Effect.tryPromise({
          try: () => this.prompter.confirm(`Open a browser to log in to '${this.baseUrl}'?`),
          catch: () => captcha,
        }),
      ),
      Effect.flatMap((accepted) => (accepted ? Effect.void : Effect.fail(captcha))),
      Effect.flatMap(() =>
        Effect.tryPromise({
          try: async () => {
            await this.openBrowser(captcha.loginUrl);
            await this.prompter.waitForEnter('Press ENTER after logging in through the browser');
          },
          catch: () => captcha,
        }),
      ),
    );
  }

  private handshake(): Effect.Effect<Transport, HandshakeError> {
    return this.options.config.auth.mode === 'negotiate' ? this.negotiateHandshake() : this.basicHandshake();
  }

  private newTransport(): Effect.Effect<Transport, ConfigError> {
    return pipe(
      this.warnIfUnverified(),
      Effect.flatMap(() => createDispatcher(this.options.config)),
      Effect.map((dispatcher) => {
        this.generation += 1;
        return new Transport(this.baseUrl, this.generation, dispatcher, this.timeoutMs);
      }),
    );
  }

  private warnIfUnverified(): Effect.Effect<void, never> {
    if (this.options.config.verifySsl || tlsWarningShown) return Effect.void;
    tlsWarningShown = true;
    return this.logger.warn('TLS certificate verification is disabled (verifySsl: false)');
  }

  private basicHandshake(): Effect.Effect<Transport, HandshakeError> {
    const username = this.options.config.auth.username;
    if (!username) {
      return Effect.fail(new ConfigError('auth.username is required for basic authentication'));
    }

    return pipe(
      this.resolvePassword(username),
      Effect.flatMap((secret) =>
        pipe(
          this.newTransport(),
          Effect.flatMap((transport) =>
            pipe(
              transport.send({ method: 'POST', path: SESSION_PATH, body: { username, password: secret } }),
              Effect.flatMap((response) => this.checkHandshake(response)),
              Effect.flatMap((text) => decodeLogin(text)),
              Effect.tap((login) =>
                Effect.sync(() => {
                  transport.setCookie(login.session.name, login.session.value);
                  this.password = secret;
                }),
              ),
              Effect.as(transport),
            ),
          ),
        ),
      ),
      Effect.tapError((error) =>
        Effect.sync(() => {
          // a rejected password must be asked for again next time
          if (error._tag === 'AuthenticationError') this.password = this.options.config.auth.password;
        }),
      ),
    );
  }

  private resolvePassword(username: string): Effect.Effect<string, ConfigError> {
    const known = this.password;
    if (known !== undefined) return Effect.succeed(known);
    return Effect.tryPromise({
      try: () => this.prompter.password(`Password for ${username}:`),
      catch: (error) => new ConfigError(`Password prompt cancelled: ${error}`, error),
    });
  }

  private negotiateHandshake(): Effect.Effect<Transport, HandshakeError> {
    const host = new URL(this.baseUrl).hostname;

    return pipe(
      this.newTransport(),
      Effect.flatMap((transport) =>
        pipe(
          this.negotiator.token(host),
          Effect.tap((token) => Effect.sync(() => transport.setAuthorization(`Negotiate ${token}`))),
          Effect.flatMap(() => transport.send({ method: 'GET', path: SESSION_PATH })),
          Effect.flatMap((response) => this.checkHandshake(response)),
          Effect.flatMap(() => this.negotiator.token(host)),
          Effect.tap((token) => Effect.sync(() => transport.setAuthorization(`Negotiate ${token}`))),
          Effect.flatMap(() => transport.send({ method: 'GET', path: NEGOTIATE_PROBE_PATH })),
          Effect.flatMap((probe) =>
            probe.status === 200
              ? this.logger.info('Authenticated successfully')
              : this.logger.warn(`Negotiate probe returned ${probe.status}; the session may not be fully authenticated`),
          ),
          // the session cookie carries authentication from here on
          Effect.tap(() => Effect.sync(() => transport.setAuthorization(undefined))),
          Effect.as(transport),
        ),
      ),
    );
  }

  /**
   * Validate a handshake response, returning its body.
   */
  private checkHandshake(response: Response): Effect.Effect<string, AuthenticationError | CaptchaRequiredError | NetworkError> {
    return pipe(
      readText(response),
      Effect.flatMap((text): Effect.Effect<string, AuthenticationError | CaptchaRequiredError | NetworkError> => {
        const deniedReason = response.headers.get('X-Authentication-Denied-Reason') ?? '';
        if (response.status === 403 && (deniedReason.includes(CAPTCHA_MARKER) || text.includes(CAPTCHA_MARKER))) {
          return Effect.fail(
            new CaptchaRequiredError('Login requires solving a CAPTCHA', `${this.baseUrl}/login.jsp?nosso`),
          );
        }
        if (response.status === 401 || response.status === 403) {
          return Effect.fail(new AuthenticationError(`Authentication failed: ${response.status} - ${text}`));
        }
        if (!response.ok) {
          return Effect.fail(new NetworkError(`Login failed: ${response.status} - ${text}`, response.status, response.url));
        }
        return Effect.succeed(text);
      }),
    );
  }

  private checkResponse(request: TransportRequest, response: Response): Effect.Effect<Response, RequestError> {
    if (response.ok) return Effect.succeed(response);

    const label = `${request.method} ${request.path}`;
    return pipe(
      readText(response),
      Effect.flatMap((text): Effect.Effect<never, RequestError> => {
        switch (response.status) {
          case 401:
          case 403:
            return Effect.fail(new AuthenticationError(`Not authorized for ${label}: ${response.status} - ${text}`));
          case 404:
            return Effect.fail(new NotFoundError(`Not found: ${label}`));
          case 400: {
            const messages = errorMessages(text);
            return Effect.fail(
              new RemoteValidationError(
                messages.length > 0 ? messages.join('; ') : `Request rejected: ${label}`,
                response.status,
                messages,
              ),
            );
          }
          default:
            return Effect.fail(
              new NetworkError(`${label} failed: ${response.status} - ${text}`, response.status, response.url),
            );
        }
      }),
    );
  }
}

function readText(response: Response): Effect.Effect<string, NetworkError> {
  return Effect.tryPromise({
    try: () => response.text(),
    catch: (error) => new NetworkError(`Failed to read response body: ${error}`, response.status, response.url, error),
  });
}

function decodeLogin(text: string): Effect.Effect<Schema.Schema.Type<typeof LoginResponseSchema>, AuthenticationError> {
  return pipe(
    Effect.try({
      try: (): unknown => JSON.parse(text),
      catch: (error) => new AuthenticationError(`Unexpected login response: ${error}`, error),
    }),
    Effect.flatMap((data) =>
      Schema.decodeUnknown(LoginResponseSchema)(data).pipe(
        Effect.mapError((error) => new AuthenticationError(`Unexpected login response: ${error.message}`, error)),
      ),
    ),
  );
}

const ErrorBodySchema = Schema.Struct({
  errorMessages: Schema.optionalWith(Schema.Array(Schema.String), { default: () => [] }),
  errors: Schema.optionalWith(Schema.Record({ key: Schema.String, value: Schema.String }), { default: () => ({}) }),
});

/**
 * The tracker's error text from a `{ errorMessages, errors }` body, verbatim.
 */
export function errorMessages(text: string): string[] {
  const raw = text.trim() ? [text.trim()] : [];
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return raw;
  }
  const decoded = Schema.decodeUnknownOption(ErrorBodySchema)(data);
  if (decoded._tag === 'None') return raw;
  return [
    ...decoded.value.errorMessages,
    ...Object.entries(decoded.value.errors).map(([field, message]) => `${field}: ${message}`),
  ];
}
