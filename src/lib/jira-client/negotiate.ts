import { Effect, pipe } from 'effect';
import { AuthenticationError, ConfigError } from '../errors.js';

/**
 * Produces a SPNEGO token for `Authorization: Negotiate <token>`.
 */
export interface NegotiateTokenProvider {
  token(host: string): Effect.Effect<string, ConfigError | AuthenticationError>;
}

interface KerberosClient {
  step(challenge: string): Promise<string>;
}

interface KerberosModule {
  initializeClient(service: string, options?: { mechOID?: unknown }): Promise<KerberosClient>;
  GSS_MECH_OID_SPNEGO?: unknown;
}

function isKerberosModule(value: unknown): value is KerberosModule {
  return typeof value === 'object' && value !== null && 'initializeClient' in value && typeof value.initializeClient === 'function';
}

// kept in a variable so the optional package is only resolved at run time
const KERBEROS_PACKAGE: string = 'kerberos';

/**
 * Token provider backed by the optional `kerberos` package and the user's ticket cache.
 */
export class KerberosTokenProvider implements NegotiateTokenProvider {
  private module: KerberosModule | undefined;

  token(host: string): Effect.Effect<string, ConfigError | AuthenticationError> {
    return pipe(
      this.load(),
      Effect.flatMap((kerberos) =>
        Effect.tryPromise({
          try: async () => {
            const client = await kerberos.initializeClient(`HTTP@${host}`, { mechOID: kerberos.GSS_MECH_OID_SPNEGO });
            return client.step('');
          },
          catch: (error) => new AuthenticationError(`Negotiate authentication failed: ${error}`, error),
        }),
      ),
    );
  }

  private load(): Effect.Effect<KerberosModule, ConfigError> {
    const loaded = this.module;
    if (loaded) return Effect.succeed(loaded);

    return pipe(
      Effect.tryPromise({
        try: async (): Promise<unknown> => import(KERBEROS_PACKAGE),
        catch: (error) =>
          new ConfigError('Negotiate authentication needs the "kerberos" package. Install it or use auth mode "basic".', error),
      }),
      Effect.flatMap((imported) => {
        const candidate =
          isKerberosModule(imported) ? imported
          : typeof imported === 'object' && imported !== null && 'default' in imported && isKerberosModule(imported.default) ?
            imported.default
          : undefined;
        if (!candidate) {
          return Effect.fail(new ConfigError('The installed "kerberos" package has an unexpected shape'));
        }
        this.module = candidate;
        return Effect.succeed(candidate);
      }),
    );
  }
}
