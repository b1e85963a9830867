import { chmodSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { Effect, pipe, Schema } from 'effect';
import { ConfigError, FileError, ParseError, ValidationError } from './errors.js';
import { LOG_LEVELS } from './logging.js';

export { ConfigError, FileError, ParseError, ValidationError };

const AuthSchema = Schema.Struct({
  mode: Schema.Literal('basic', 'negotiate'),
  username: Schema.optional(Schema.String),
  password: Schema.optional(Schema.String),
});

export const ConfigSchema = Schema.Struct({
  jiraUrl: Schema.String.pipe(Schema.pattern(/^https?:\/\/.+/)),
  auth: AuthSchema,
  verifySsl: Schema.optionalWith(Schema.Boolean, { default: () => true }),
  caCertPath: Schema.optional(Schema.String),
  board: Schema.String.pipe(Schema.minLength(1)),
  project: Schema.String.pipe(Schema.minLength(1)),
  labelCheck: Schema.optionalWith(Schema.Boolean, { default: () => false }),
  excludedTransitionMarker: Schema.optionalWith(Schema.String, { default: () => 'Parallel Team' }),
  logLevel: Schema.optionalWith(Schema.Literal(...LOG_LEVELS), { default: () => 'info' as const }),
});

export type Config = Schema.Schema.Type<typeof ConfigSchema>;
export type AuthConfig = Config['auth'];

export const ComponentLabelsSchema = Schema.Record({ key: Schema.String, value: Schema.Array(Schema.String) });

export type ComponentLabels = Schema.Schema.Type<typeof ComponentLabelsSchema>;

/**
 * Written into a new config file before the user edits it.
 */
export const DEFAULT_CONFIG_TEMPLATE = {
  jiraUrl: 'https://jira.example.com',
  auth: {
    mode: 'basic',
    username: 'your-user-id',
  },
  verifySsl: true,
  board: 'My Team Board',
  project: 'PROJ',
  labelCheck: false,
  excludedTransitionMarker: 'Parallel Team',
  logLevel: 'info',
};

export const DEFAULT_LABELS_TEMPLATE: ComponentLabels = {
  backend: ['bug', 'techdebt'],
  frontend: ['bug', 'ux'],
};

const CONFIG_KEYS: readonly string[] = Object.keys(ConfigSchema.fields);

export interface ConfigPaths {
  configFile?: string;
  labelsFile?: string;
}

export class ConfigManager {
  readonly configDir: string;
  readonly configFile: string;
  readonly labelsFile: string;

  constructor(paths: ConfigPaths = {}) {
    this.configDir = process.env.SPRINTDECK_CONFIG_DIR || join(homedir(), '.sprintdeck');
    this.configFile = paths.configFile ?? join(this.configDir, 'config.json');
    this.labelsFile = paths.labelsFile ?? join(this.configDir, 'labels.json');
  }

  configExists(): boolean {
    return existsSync(this.configFile);
  }

  labelsExist(): boolean {
    return existsSync(this.labelsFile);
  }

  /**
   * Read and validate config.json. Unknown keys are dropped and reported through `onUnknownKey`.
   */
  getConfigEffect(
    onUnknownKey: (key: string) => void = () => {},
  ): Effect.Effect<Config, ConfigError | FileError | ParseError | ValidationError> {
    return pipe(
      Effect.sync(() => this.configExists()),
      Effect.flatMap((fileExists): Effect.Effect<unknown, ConfigError | FileError | ParseError> =>
        fileExists
          ? this.readJsonEffect(this.configFile)
          : Effect.fail(new ConfigError(`No configuration found at ${this.configFile}. Start sprintdeck to create one.`)),
      ),
      Effect.tap((raw) =>
        Effect.sync(() => {
          if (raw !== null && typeof raw === 'object') {
            for (const key of Object.keys(raw)) {
              if (!CONFIG_KEYS.includes(key)) onUnknownKey(key);
            }
          }
        }),
      ),
      Effect.flatMap((raw) =>
        Schema.decodeUnknown(ConfigSchema)(raw).pipe(
          Effect.mapError((error) => new ValidationError(`Invalid config in ${this.configFile}: ${error.message}`)),
        ),
      ),
    );
  }

  /**
   * Read labels.json; a missing file is an empty map.
   */
  getComponentLabelsEffect(): Effect.Effect<ComponentLabels, FileError | ParseError | ValidationError> {
    if (!this.labelsExist()) {
      return Effect.succeed({});
    }
    return pipe(
      this.readJsonEffect(this.labelsFile),
      Effect.flatMap((raw) =>
        Schema.decodeUnknown(ComponentLabelsSchema)(raw).pipe(
          Effect.mapError((error) => new ValidationError(`Invalid labels in ${this.labelsFile}: ${error.message}`)),
        ),
      ),
    );
  }

  /**
   * Validate the text (as edited by the user) and write it with owner-only permissions.
   */
  writeConfigEffect(text: string): Effect.Effect<Config, FileError | ParseError | ValidationError> {
    return pipe(
      this.parseJsonEffect(text, this.configFile),
      Effect.flatMap((raw) =>
        Schema.decodeUnknown(ConfigSchema)(raw).pipe(
          Effect.mapError((error) => new ValidationError(`Invalid config: ${error.message}`)),
        ),
      ),
      Effect.tap(() => this.writeFileEffect(this.configFile, text)),
    );
  }

  writeLabelsEffect(text: string): Effect.Effect<ComponentLabels, FileError | ParseError | ValidationError> {
    return pipe(
      this.parseJsonEffect(text, this.labelsFile),
      Effect.flatMap((raw) =>
        Schema.decodeUnknown(ComponentLabelsSchema)(raw).pipe(
          Effect.mapError((error) => new ValidationError(`Invalid labels: ${error.message}`)),
        ),
      ),
      Effect.tap(() => this.writeFileEffect(this.labelsFile, text)),
    );
  }

  private readJsonEffect(path: string): Effect.Effect<unknown, FileError | ParseError> {
    return pipe(
      Effect.try({
        try: () => readFileSync(path, 'utf-8'),
        catch: (error) => new FileError(`Failed to read ${path}: ${error}`, error),
      }),
      Effect.flatMap((text) => this.parseJsonEffect(text, path)),
    );
  }

  private parseJsonEffect(text: string, path: string): Effect.Effect<unknown, ParseError> {
    return Effect.try({
      try: (): unknown => JSON.parse(text),
      catch: (error) => new ParseError(`Invalid JSON in ${path}: ${error}`, error),
    });
  }

  private writeFileEffect(path: string, text: string): Effect.Effect<void, FileError> {
    return Effect.try({
      try: () => {
        mkdirSync(dirname(path), { recursive: true, mode: 0o700 });
        writeFileSync(path, text.endsWith('\n') ? text : `${text}\n`, 'utf-8');
        // read/write for owner only; the config may hold a password
        chmodSync(path, 0o600);
      },
      catch: (error) => new FileError(`Failed to write ${path}: ${error}`, error),
    });
  }
}
