import type { LevelWithSilent } from 'pino';

export const DEFAULT_EMULATOR_HOST = 'localhost:8080';

const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/** Flags as commander hands them over. */
export interface CliOptions {
  readonly schema?: string;
  readonly collection?: string;
  readonly merge: boolean;
  readonly local?: boolean;
  readonly project?: string;
  readonly idColumn: string;
  readonly includeId?: boolean;
  readonly continueOnError?: boolean;
  readonly dryRun?: boolean;
  readonly delimiter?: string;
  readonly verbose?: boolean;
  readonly debug?: boolean;
}

/** Everything a run needs, after flags and environment are merged. */
export interface CliConfig {
  readonly csvFilePath: string;
  readonly schemaPath?: string;
  readonly collection?: string;
  readonly merge: boolean;
  readonly identifierColumn: string;
  readonly includeIdentifierInRow: boolean;
  readonly continueOnError: boolean;
  readonly dryRun: boolean;
  readonly delimiter?: string;
  readonly emulatorHost?: string;
  readonly projectId?: string;
  readonly logLevel: LevelWithSilent;
}

function isLogLevel(value: string): value is LevelWithSilent {
  return LOG_LEVELS.some((level) => level === value);
}

function resolveLogLevel(options: CliOptions, env: NodeJS.ProcessEnv): LevelWithSilent {
  if (options.debug) return 'debug';
  if (options.verbose) return 'info';
  const fromEnv = env.CSV_UPLOADER_LOG_LEVEL?.trim().toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'warn';
}

/**
 * Merge command-line flags with the environment.
 *
 * `--local` targets `FIRESTORE_EMULATOR_HOST` when it is set and
 * `localhost:8080` otherwise; without `--local` an emulator host already in
 * the environment is still honoured.
 */
export function resolveCliConfig(csvFilePath: string, options: CliOptions, env: NodeJS.ProcessEnv): CliConfig {
  const envEmulator = env.FIRESTORE_EMULATOR_HOST?.trim() || undefined;

  return {
    csvFilePath,
    schemaPath: options.schema,
    collection: options.collection,
    merge: options.merge,
    identifierColumn: options.idColumn,
    includeIdentifierInRow: options.includeId ?? false,
    continueOnError: options.continueOnError ?? false,
    dryRun: options.dryRun ?? false,
    delimiter: options.delimiter,
    emulatorHost: options.local ? (envEmulator ?? DEFAULT_EMULATOR_HOST) : envEmulator,
    projectId: options.project ?? (env.GOOGLE_CLOUD_PROJECT || env.GCLOUD_PROJECT || undefined),
    logLevel: resolveLogLevel(options, env),
  };
}
