/**
 * Command runner
 *
 * Wires config, logging, the metadata store and the document service
 * together for one CLI invocation. Command output goes to stdout, logs and
 * error reports to stderr.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import {
  ConsoleLogger,
  isChronicleError,
  parseTimestamp,
  toError,
  formatDisplayTimestamp,
  type DocumentMetadata,
  type Logger,
} from '@chronicle/shared';
import { ConfigManager, type ResolvedConfig } from '../config/manager';
import { BetterSqliteAdapter, IN_MEMORY } from '../database/adapter';
import { SqliteMetadataStore } from '../database/metadata-store';
import { DocumentService, documentKey, sanitizeFile } from '../services/document-service';
import { readTextFile } from '../storage/atomic-file';
import { USAGE, parseCliArgs, type CliArgs, type Command } from './cli-parser';

export const CLI_VERSION = '0.1.0';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_USAGE = 2;

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export const processIO: CliIO = {
  stdout: (line) => {
    process.stdout.write(`${line}\n`);
  },
  stderr: (line) => {
    process.stderr.write(`${line}\n`);
  },
};

const PREVIEW_LENGTH = 60;

function preview(text: string): string {
  return text.length > PREVIEW_LENGTH ? `${text.slice(0, PREVIEW_LENGTH - 3)}...` : text;
}

export function formatMetadata(metadata: DocumentMetadata): string[] {
  const lines = [
    `File:          ${metadata.filename}`,
    `Author:        ${metadata.author}`,
    `Created:       ${metadata.createdAt}`,
    `Last modified: ${metadata.lastModified}`,
    `Sentences:     ${metadata.sentenceCount}`,
    '',
  ];
  for (const s of metadata.sentences) {
    lines.push(`[${s.position}] rev ${s.revisionId}  ${s.createdAt}  ${s.modifiedAt}  ${s.author}  ${preview(s.text)}`);
  }
  return lines;
}

interface Context {
  config: ResolvedConfig;
  logger: Logger;
  io: CliIO;
}

async function withStore<T>(ctx: Context, fn: (service: DocumentService, store: SqliteMetadataStore) => Promise<T>): Promise<T> {
  const { databasePath } = ctx.config;
  if (databasePath !== IN_MEMORY) {
    await fs.mkdir(dirname(databasePath), { recursive: true });
  }
  const store = new SqliteMetadataStore(new BetterSqliteAdapter(databasePath), ctx.logger);
  await store.initialize();
  try {
    return await fn(new DocumentService(store, ctx.logger), store);
  } finally {
    await store.close();
  }
}

async function execute(command: Command, ctx: Context): Promise<void> {
  const { config, io } = ctx;

  switch (command.name) {
    case 'help':
      io.stdout(USAGE);
      return;

    case 'version':
      io.stdout(CLI_VERSION);
      return;

    case 'create': {
      // Parse everything before the store is opened
      const text = command.inputFile !== null ? await readTextFile(command.inputFile) : (command.text ?? '');
      const start = command.startDate !== null ? parseTimestamp(command.startDate) : undefined;

      const document = await withStore(ctx, (service) =>
        service.createDocumentFile(text, command.output, {
          author: command.author ?? config.defaultAuthor,
          start,
          minIntervalSeconds: command.minInterval ?? config.minIntervalSeconds,
          maxIntervalSeconds: command.maxInterval ?? config.maxIntervalSeconds,
          title: command.title ?? undefined,
          subject: command.subject ?? undefined,
          keywords: command.keywords ?? undefined,
          comments: command.comments ?? undefined,
          totalEditTimeMinutes: command.editTime ?? undefined,
          trackChanges: command.trackChanges,
          acceptAllChanges: command.acceptAllChanges,
          split: command.split,
        })
      );
      io.stdout(`Created ${command.output} with ${document.sentences.length} sentences`);
      return;
    }

    case 'sanitize': {
      const neutralInstant = parseTimestamp(command.date ?? config.neutralTimestamp);
      const output = command.output ?? command.input;
      await sanitizeFile(
        command.input,
        output,
        {
          neutralInstant,
          neutralAuthor: command.author ?? config.neutralAuthor,
          keepContent: !command.dropContent,
          removeTrackChanges: !command.keepTrackChanges,
          removeMetadata: !command.keepMetadata,
        },
        ctx.logger.child('documents')
      );
      io.stdout(`Sanitized ${command.input} -> ${output}`);
      return;
    }

    case 'edit-timestamp': {
      const instant = parseTimestamp(command.date);
      const sentence = await withStore(ctx, (service) =>
        service.editSentenceTimestamp(command.file, command.position, instant, {
          bumpRevision: command.bumpRevision,
        })
      );
      io.stdout(
        `Sentence ${sentence.position} of ${command.file} now modified at ${formatDisplayTimestamp(sentence.modifiedAt)} (revision ${sentence.revisionId})`
      );
      return;
    }

    case 'info': {
      const metadata = await withStore(ctx, (service) => service.describeDocument(command.file));
      if (command.json) {
        io.stdout(JSON.stringify(metadata, null, 2));
      } else {
        formatMetadata(metadata).forEach((line) => io.stdout(line));
      }
      return;
    }

    case 'list': {
      const documents = await withStore(ctx, (_service, store) => store.listDocuments());
      if (documents.length === 0) {
        io.stdout('No documents stored');
      }
      for (const doc of documents) {
        io.stdout(`${doc.id}\t${doc.filename}\t${doc.sentenceCount} sentences\t${formatDisplayTimestamp(doc.lastModified)}`);
      }
      return;
    }

    case 'delete': {
      const deleted = await withStore(ctx, (_service, store) => store.deleteDocument(documentKey(command.file)));
      io.stdout(deleted ? `Deleted ${command.file}` : `No stored document for ${command.file}`);
      return;
    }
  }
}

/**
 * Run one CLI invocation
 *
 * @returns process exit code
 */
export async function runCli(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    io.stderr(`Error: ${toError(error).message}`);
    io.stderr('Run "chronicle help" for usage.');
    return EXIT_USAGE;
  }

  const logger = new ConsoleLogger({ writer: io.stderr, scope: 'chronicle' });
  if (args.global.logLevel) {
    logger.setLevel(args.global.logLevel);
  }

  try {
    const manager = new ConfigManager(args.global.configPath ?? undefined);
    const config = await manager.resolve();
    logger.setLevel(args.global.logLevel ?? config.logLevel);
    if (args.global.dbPath) {
      config.databasePath = args.global.dbPath;
    }

    await execute(args.command, { config, logger, io });
    return EXIT_OK;
  } catch (error) {
    const err = toError(error);
    if (isChronicleError(err)) {
      io.stderr(`Error [${err.code}]: ${err.message}`);
      logger.debug('Command failed', { command: args.command.name, ...err.toJSON() });
    } else {
      logger.error('Unexpected failure', err, { command: args.command.name });
    }
    return EXIT_ERROR;
  }
}
