/**
 * @chronicle/cli
 *
 * Node.js side of docx-chronicle: SQLite metadata store, configuration,
 * file flows and the command-line front end.
 */

export { BetterSqliteAdapter, IN_MEMORY } from './database/adapter';
export { SqliteMetadataStore } from './database/metadata-store';
export { DocumentRepository, type NewDocumentRow } from './database/document-repository';
export { SentenceRepository, rowToSentence } from './database/sentence-repository';
export { SchemaRepository } from './database/schema-repository';
export {
  ConfigManager,
  validateConfig,
  defaultConfigDir,
  CONFIG_ENV_VAR,
  DEFAULT_NEUTRAL_TIMESTAMP,
  type AppConfig,
  type ResolvedConfig,
} from './config/manager';
export { readFileBytes, readTextFile, writeFileAtomic, pathExists } from './storage/atomic-file';
export {
  DocumentService,
  documentKey,
  resolveRenderMode,
  type CreateFileOptions,
  type SanitizeFileOptions,
} from './services/document-service';
export { parseCliArgs, USAGE, type CliArgs, type Command } from './cli/cli-parser';
export { runCli, processIO, CLI_VERSION, EXIT_OK, EXIT_ERROR, EXIT_USAGE, type CliIO } from './cli/commands';
