/**
 * CLI Parser
 *
 * Parses `chronicle <command> [positionals] [--key=value] [--flag]`.
 * Anything the parser rejects is a usage error (exit code 2).
 */

import { InputError, isSplitMethod, parseLogLevel, type LogLevel, type SplitMethod } from '@chronicle/shared';

export type CommandName = 'create' | 'sanitize' | 'edit-timestamp' | 'info' | 'list' | 'delete' | 'help' | 'version';

export interface GlobalOptions {
  configPath: string | null;
  dbPath: string | null;
  logLevel: LogLevel | null;
}

export interface CreateCommand {
  name: 'create';
  text: string | null;
  inputFile: string | null;
  output: string;
  author: string | null;
  startDate: string | null;
  minInterval: number | null;
  maxInterval: number | null;
  title: string | null;
  subject: string | null;
  keywords: string | null;
  comments: string | null;
  editTime: number | null;
  trackChanges: boolean;
  acceptAllChanges: boolean;
  split: SplitMethod;
}

export interface SanitizeCommand {
  name: 'sanitize';
  input: string;
  /** null overwrites the input */
  output: string | null;
  author: string | null;
  date: string | null;
  dropContent: boolean;
  keepTrackChanges: boolean;
  keepMetadata: boolean;
}

export interface EditTimestampCommand {
  name: 'edit-timestamp';
  file: string;
  position: number;
  date: string;
  bumpRevision: boolean;
}

export interface InfoCommand {
  name: 'info';
  file: string;
  json: boolean;
}

export interface DeleteCommand {
  name: 'delete';
  file: string;
}

export type Command =
  | CreateCommand
  | SanitizeCommand
  | EditTimestampCommand
  | InfoCommand
  | DeleteCommand
  | { name: 'list' }
  | { name: 'help' }
  | { name: 'version' };

export interface CliArgs {
  global: GlobalOptions;
  command: Command;
}

export const DEFAULT_OUTPUT = 'output.docx';

const GLOBAL_VALUES = ['config', 'db', 'log-level'];

const COMMAND_OPTIONS: Record<CommandName, { values: readonly string[]; flags: readonly string[] }> = {
  create: {
    values: [
      'input-file',
      'output',
      'author',
      'start-date',
      'min-interval',
      'max-interval',
      'title',
      'subject',
      'keywords',
      'comments',
      'edit-time',
      'split',
    ],
    flags: ['no-track-changes', 'accept-all-changes'],
  },
  sanitize: {
    values: ['output', 'author', 'date'],
    flags: ['drop-content', 'keep-track-changes', 'keep-metadata'],
  },
  'edit-timestamp': { values: ['position', 'date'], flags: ['bump-revision'] },
  info: { values: [], flags: ['json'] },
  list: { values: [], flags: [] },
  delete: { values: [], flags: [] },
  help: { values: [], flags: [] },
  version: { values: [], flags: [] },
};

function isCommandName(value: string): value is CommandName {
  return Object.prototype.hasOwnProperty.call(COMMAND_OPTIONS, value);
}

export function usageError(message: string): InputError {
  return new InputError('InvalidArgument', message, { operation: 'parseCliArgs', component: 'cli' });
}

interface Tokens {
  positionals: string[];
  values: Map<string, string>;
  flags: Set<string>;
}

function tokenize(argv: readonly string[]): Tokens {
  const tokens: Tokens = { positionals: [], values: new Map(), flags: new Set() };
  let optionsEnded = false;

  for (const arg of argv) {
    if (optionsEnded) {
      tokens.positionals.push(arg);
    } else if (arg === '--') {
      optionsEnded = true;
    } else if (arg.startsWith('--')) {
      const body = arg.slice(2);
      const eq = body.indexOf('=');
      if (eq === -1) {
        tokens.flags.add(body);
      } else {
        tokens.values.set(body.slice(0, eq), body.slice(eq + 1));
      }
    } else if (arg === '-h') {
      tokens.flags.add('help');
    } else if (arg === '-V') {
      tokens.flags.add('version');
    } else {
      tokens.positionals.push(arg);
    }
  }

  return tokens;
}

function parseInteger(name: string, value: string | undefined): number | null {
  if (value === undefined) return null;
  if (!/^\d+$/.test(value)) {
    throw usageError(`--${name} must be a non-negative integer, got "${value}"`);
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw usageError(`--${name} is too large, got "${value}"`);
  }
  return parsed;
}

function requirePositional(tokens: Tokens, index: number, what: string, command: string): string {
  const value = tokens.positionals[index];
  if (value === undefined) {
    throw usageError(`${command} needs ${what}`);
  }
  return value;
}

function parseGlobal(tokens: Tokens): GlobalOptions {
  const level = tokens.values.get('log-level');
  const logLevel = level === undefined ? null : parseLogLevel(level);
  if (level !== undefined && !logLevel) {
    throw usageError(`--log-level must be one of debug, info, warn, error, got "${level}"`);
  }
  return {
    configPath: tokens.values.get('config') || null,
    dbPath: tokens.values.get('db') || null,
    logLevel,
  };
}

function checkOptions(tokens: Tokens, name: CommandName): void {
  const allowed = COMMAND_OPTIONS[name];
  for (const key of tokens.values.keys()) {
    if (!allowed.values.includes(key) && !GLOBAL_VALUES.includes(key)) {
      throw usageError(
        allowed.flags.includes(key) ? `--${key} takes no value` : `Unknown option --${key} for ${name}`
      );
    }
  }
  for (const flag of tokens.flags) {
    if (!allowed.flags.includes(flag)) {
      throw usageError(
        allowed.values.includes(flag) || GLOBAL_VALUES.includes(flag)
          ? `--${flag} needs a value (--${flag}=...)`
          : `Unknown option --${flag} for ${name}`
      );
    }
  }
}

function parseCreate(tokens: Tokens): CreateCommand {
  const words = tokens.positionals.slice(1);
  const text = words.length > 0 ? words.join(' ') : null;
  const inputFile = tokens.values.get('input-file') ?? null;

  if (text === null && inputFile === null) {
    throw usageError('create needs text or --input-file=<path>');
  }
  if (text !== null && inputFile !== null) {
    throw usageError('create takes text or --input-file, not both');
  }

  const split = tokens.values.get('split') ?? 'regex';
  if (!isSplitMethod(split)) {
    throw usageError(`--split must be regex or simple, got "${split}"`);
  }

  return {
    name: 'create',
    text,
    inputFile,
    output: tokens.values.get('output') ?? DEFAULT_OUTPUT,
    author: tokens.values.get('author') ?? null,
    startDate: tokens.values.get('start-date') ?? null,
    minInterval: parseInteger('min-interval', tokens.values.get('min-interval')),
    maxInterval: parseInteger('max-interval', tokens.values.get('max-interval')),
    title: tokens.values.get('title') ?? null,
    subject: tokens.values.get('subject') ?? null,
    keywords: tokens.values.get('keywords') ?? null,
    comments: tokens.values.get('comments') ?? null,
    editTime: parseInteger('edit-time', tokens.values.get('edit-time')),
    trackChanges: !tokens.flags.has('no-track-changes'),
    acceptAllChanges: tokens.flags.has('accept-all-changes'),
    split,
  };
}

function parseSanitize(tokens: Tokens): SanitizeCommand {
  return {
    name: 'sanitize',
    input: requirePositional(tokens, 1, 'an input file', 'sanitize'),
    output: tokens.values.get('output') ?? null,
    author: tokens.values.get('author') ?? null,
    date: tokens.values.get('date') ?? null,
    dropContent: tokens.flags.has('drop-content'),
    keepTrackChanges: tokens.flags.has('keep-track-changes'),
    keepMetadata: tokens.flags.has('keep-metadata'),
  };
}

function parseEditTimestamp(tokens: Tokens): EditTimestampCommand {
  const position = parseInteger('position', tokens.values.get('position'));
  const date = tokens.values.get('date');
  if (position === null) {
    throw usageError('edit-timestamp needs --position=<n>');
  }
  if (date === undefined) {
    throw usageError('edit-timestamp needs --date=<timestamp>');
  }
  return {
    name: 'edit-timestamp',
    file: requirePositional(tokens, 1, 'a document file', 'edit-timestamp'),
    position,
    date,
    bumpRevision: tokens.flags.has('bump-revision'),
  };
}

/**
 * Parse command-line arguments
 *
 * @param argv - arguments after the executable and script (process.argv.slice(2))
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  const tokens = tokenize(argv);

  // --help and --version win over everything else
  for (const name of ['help', 'version'] as const) {
    if (tokens.flags.delete(name)) {
      return { global: parseGlobal(tokens), command: { name } };
    }
  }

  const name = tokens.positionals[0] ?? 'help';
  if (!isCommandName(name)) {
    throw usageError(`Unknown command: ${name}`);
  }
  checkOptions(tokens, name);
  const global = parseGlobal(tokens);

  switch (name) {
    case 'create':
      return { global, command: parseCreate(tokens) };
    case 'sanitize':
      return { global, command: parseSanitize(tokens) };
    case 'edit-timestamp':
      return { global, command: parseEditTimestamp(tokens) };
    case 'info':
      return {
        global,
        command: { name, file: requirePositional(tokens, 1, 'a document file', 'info'), json: tokens.flags.has('json') },
      };
    case 'delete':
      return { global, command: { name, file: requirePositional(tokens, 1, 'a document file', 'delete') } };
    case 'list':
    case 'help':
    case 'version':
      return { global, command: { name } };
  }
}

export const USAGE = `Usage: chronicle <command> [options]

Commands:
  create [text]            Build a .docx whose sentences carry a revision timeline
    --input-file=<path>    Read the text from a file instead
    --output=<path>        Output file (default: ${DEFAULT_OUTPUT})
    --author=<name>        Author of every revision
    --start-date=<ts>      Instant of the first sentence (default: now)
    --min-interval=<s>     Shortest gap between sentences in seconds
    --max-interval=<s>     Longest gap between sentences in seconds
    --title= --subject= --keywords= --comments=
    --edit-time=<min>      Total editing time recorded in the package
    --no-track-changes     Plain paragraphs without revision markup
    --accept-all-changes   Keep the markup but display the final text
    --split=regex|simple   Sentence splitting strategy
  sanitize <input>         Strip revision markup and neutralize metadata
    --output=<path>        Output file (default: overwrite the input)
    --author=<name>        Neutral author
    --date=<ts>            Neutral timestamp
    --drop-content         Empty the body
    --keep-track-changes   Leave revision markup in place
    --keep-metadata        Leave document properties in place
  edit-timestamp <file>    Change one sentence's timestamp and rebuild the file
    --position=<n>         Sentence position, starting at 0
    --date=<ts>            New timestamp
    --bump-revision        Record the change as a new revision
  info <file> [--json]     Print the stored timeline of a document
  list                     List stored documents
  delete <file>            Remove a document's stored timeline
  help, version

Global options:
  --config=<path>  --db=<path>  --log-level=debug|info|warn|error`;
