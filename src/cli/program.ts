import { Command } from 'commander';
import type { LevelWithSilent } from 'pino';
import { CsvUploader } from '../CsvUploader.js';
import { CollectionSpec } from '../application/CollectionSpec.js';
import type { UploadSummary } from '../domain/model/UploadRun.js';
import type { DocumentStore } from '../domain/ports/DocumentStore.js';
import type { Logger } from '../domain/ports/Logger.js';
import { DEFAULT_IDENTIFIER_COLUMN } from '../domain/services/DocumentAssembler.js';
import { createLogger } from '../infrastructure/logging/createLogger.js';
import { InMemoryDocumentStore } from '../infrastructure/stores/InMemoryDocumentStore.js';
import { FirestoreDocumentStore } from '../infrastructure/stores/FirestoreDocumentStore.js';
import type { CliConfig, CliOptions } from './config.js';
import { resolveCliConfig } from './config.js';

export interface ProgramDeps {
  /** Where command output goes. */
  readonly stdout: (text: string) => void;
  readonly env: NodeJS.ProcessEnv;
  readonly createLogger: (level: LevelWithSilent) => Logger;
  readonly createStore: (config: CliConfig, logger: Logger) => DocumentStore;
}

export const defaultDeps: ProgramDeps = {
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
  env: process.env,
  createLogger: (level) => createLogger({ level }),
  createStore: (config, logger) =>
    FirestoreDocumentStore.connect({ projectId: config.projectId, emulatorHost: config.emulatorHost }, logger),
};

function jsonReplacer(_key: string, value: unknown): unknown {
  return value instanceof Uint8Array ? Buffer.from(value).toString('base64') : value;
}

export function formatSummary(summary: UploadSummary): string {
  return (
    `Uploaded ${String(summary.documentsUploaded)} document(s) to '${summary.collection}' ` +
    `(${String(summary.rowsRead)} rows read, ${String(summary.rowsSkipped)} skipped, ` +
    `${String(summary.documentsFailed)} failed)`
  );
}

/**
 * Run one upload as the command line describes it.
 *
 * @returns the process exit code.
 */
export async function runUpload(config: CliConfig, deps: ProgramDeps): Promise<number> {
  const logger = deps.createLogger(config.logLevel);
  const spec = new CollectionSpec({
    filePath: config.csvFilePath,
    merge: config.merge,
    name: config.collection,
    schemaPath: config.schemaPath,
  });

  logger.info(
    { csvFile: spec.filePath, collection: spec.name, schemaPath: spec.schemaPath, merge: spec.merge },
    'Preparing upload',
  );

  const options = {
    identifierColumn: config.identifierColumn,
    includeIdentifierInRow: config.includeIdentifierInRow,
    continueOnError: config.continueOnError,
    delimiter: config.delimiter,
    logger,
  };

  if (config.dryRun) {
    const uploader = await CsvUploader.forCollection(spec, new InMemoryDocumentStore(), options);
    const preview = await uploader.preview();
    const documents = Object.fromEntries(preview.documents.map((doc) => [doc.documentId, doc.fields]));
    deps.stdout(JSON.stringify(documents, jsonReplacer, 2));
    return 0;
  }

  const uploader = await CsvUploader.forCollection(spec, deps.createStore(config, logger), options);
  uploader.on('document:uploaded', (event) => {
    logger.info({ documentId: event.documentId, rowCount: event.rowCount }, `Uploaded ${event.documentId}`);
  });

  const summary = await uploader.start();
  deps.stdout(formatSummary(summary));
  return summary.documentsFailed > 0 ? 1 : 0;
}

export function createProgram(deps: ProgramDeps = defaultDeps): Command {
  const program = new Command();

  program
    .name('csv-document-uploader')
    .description('Upload CSV rows as nested documents to a Firestore collection')
    .argument('<csv-file>', 'CSV file to upload')
    .option('-s, --schema <path>', 'schema file (default: the CSV path with a .json extension)')
    .option('-c, --collection <name>', 'target collection (default: the CSV file name)')
    .option('--no-merge', 'replace existing documents instead of merging into them')
    .option('--local', 'write to the Firestore emulator')
    .option('--project <id>', 'Google Cloud project id')
    .option('--id-column <name>', 'column holding the document identifier', DEFAULT_IDENTIFIER_COLUMN)
    .option('--include-id', 'let schema fields read the identifier column')
    .option('--continue-on-error', 'keep going when a document fails to upload')
    .option('--delimiter <char>', 'column delimiter (default: auto-detect)')
    .option('--dry-run', 'print the documents as JSON instead of uploading them')
    .option('-v, --verbose', 'log progress')
    .option('-d, --debug', 'log everything')
    .action(async (csvFile: string, options: CliOptions) => {
      process.exitCode = await runUpload(resolveCliConfig(csvFile, options, deps.env), deps);
    });

  return program;
}
