/**
 * Document Service
 *
 * File-level flows over the revision engine. Each flow reads its input,
 * computes the complete result in memory and only then replaces the output
 * file.
 */

import { resolve } from 'path';
import {
  InputError,
  SilentLogger,
  StoreError,
  readDocumentProperties,
  renderDocument,
  repackPackage,
  sanitizePackage,
  splitIntoSentences,
  unpackPackage,
} from '@chronicle/shared';
import type {
  DocumentKey,
  DocumentMetadata,
  DocumentProperties,
  DocumentRecord,
  Logger,
  MetadataStore,
  RandomSource,
  RenderMode,
  SanitizeOptions,
  SentenceRecord,
  SplitMethod,
  UpdateSentenceOptions,
} from '@chronicle/shared';
import { pathExists, readFileBytes, writeFileAtomic } from '../storage/atomic-file';

export interface CreateFileOptions {
  author?: string;
  start?: Date;
  minIntervalSeconds?: number;
  maxIntervalSeconds?: number;
  random?: RandomSource;
  title?: string;
  subject?: string;
  keywords?: string;
  comments?: string;
  company?: string;
  manager?: string;
  totalEditTimeMinutes?: number;
  /** false renders without revision markup */
  trackChanges?: boolean;
  /** Keep the markup but show the document as if every change was accepted */
  acceptAllChanges?: boolean;
  split?: SplitMethod;
}

export interface SanitizeFileOptions extends Omit<SanitizeOptions, 'logger'> {
  neutralInstant: Date;
}

/**
 * Render mode for the create flags; disabling tracking wins
 */
export function resolveRenderMode(options: Pick<CreateFileOptions, 'trackChanges' | 'acceptAllChanges'>): RenderMode {
  if (options.trackChanges === false) return 'clean';
  return options.acceptAllChanges ? 'final' : 'suggestions';
}

/**
 * Store key for a document file
 */
export function documentKey(path: string): string {
  return resolve(path);
}

/**
 * Strip revision history and identifying metadata from a package file.
 * Works on the file alone; the metadata store is never opened.
 */
export async function sanitizeFile(
  inputPath: string,
  outputPath: string,
  options: SanitizeFileOptions,
  logger: Logger = new SilentLogger()
): Promise<void> {
  const { neutralInstant, ...sanitizeOptions } = options;
  const pkg = await unpackPackage(await readFileBytes(inputPath));
  const sanitized = sanitizePackage(pkg, neutralInstant, { ...sanitizeOptions, logger });
  await writeFileAtomic(outputPath, await repackPackage(sanitized));
  logger.info('Sanitized document', { input: inputPath, output: outputPath });
}

export class DocumentService {
  private readonly logger: Logger;

  constructor(
    private readonly store: MetadataStore,
    logger?: Logger
  ) {
    this.logger = logger?.child('documents') ?? new SilentLogger();
  }

  async createDocumentFile(
    input: string | readonly string[],
    outputPath: string,
    options: CreateFileOptions = {}
  ): Promise<DocumentRecord> {
    const sentences = typeof input === 'string' ? splitIntoSentences(input, options.split) : input;
    if (sentences.length === 0) {
      throw new InputError('EmptyInput', 'Input text contains no sentences', {
        operation: 'createDocumentFile',
        component: 'document-service',
      });
    }

    const key = documentKey(outputPath);
    const document = await this.store.createDocument(key, sentences, {
      author: options.author,
      start: options.start,
      minIntervalSeconds: options.minIntervalSeconds,
      maxIntervalSeconds: options.maxIntervalSeconds,
      random: options.random,
    });

    const properties: DocumentProperties = {
      title: options.title,
      subject: options.subject,
      keywords: options.keywords,
      comments: options.comments,
      company: options.company,
      manager: options.manager,
      totalEditTimeMinutes: options.totalEditTimeMinutes,
      mode: resolveRenderMode(options),
    };

    try {
      await this.writeDocument(document, properties, outputPath);
    } catch (error) {
      // The stored timeline must not outlive a file that was never written
      await this.store.deleteDocument(document.id);
      throw error;
    }

    this.logger.info('Created document', {
      path: key,
      sentences: document.sentences.length,
      mode: properties.mode,
    });
    return document;
  }

  async editSentenceTimestamp(
    outputPath: string,
    position: number,
    instant: Date,
    options: UpdateSentenceOptions = {}
  ): Promise<SentenceRecord> {
    const key = documentKey(outputPath);

    // Properties of the current file survive the rebuild
    let properties: DocumentProperties = { mode: 'suggestions' };
    if (await pathExists(outputPath)) {
      const previous = readDocumentProperties(await unpackPackage(await readFileBytes(outputPath)));
      properties = { ...previous, totalEditTimeMinutes: undefined };
    }

    // A failed write rolls the store back, so the file keeps matching it
    const updated = await this.store.transaction(async () => {
      const sentence = await this.store.updateSentenceTimestamp(key, position, instant, options);
      const document = await this.requireDocument(key, 'editSentenceTimestamp');
      await this.writeDocument(document, properties, outputPath);
      return sentence;
    });

    this.logger.info('Rebuilt document after timestamp edit', {
      path: key,
      position,
      modifiedAt: updated.modifiedAt.toISOString(),
    });
    return updated;
  }

  async describeDocument(key: DocumentKey): Promise<DocumentMetadata> {
    const metadata = await this.store.getDocumentMetadata(typeof key === 'string' ? documentKey(key) : key);
    if (!metadata) {
      throw notFound(key, 'describeDocument');
    }
    return metadata;
  }

  private async writeDocument(
    document: DocumentRecord,
    properties: DocumentProperties,
    outputPath: string
  ): Promise<void> {
    const pkg = renderDocument(document.sentences, properties, document.author, { logger: this.logger });
    await writeFileAtomic(outputPath, await repackPackage(pkg));
  }

  private async requireDocument(key: DocumentKey, operation: string): Promise<DocumentRecord> {
    const document = await this.store.getDocument(key);
    if (!document) {
      throw notFound(key, operation);
    }
    return document;
  }
}

function notFound(key: DocumentKey, operation: string): StoreError {
  return new StoreError('DocumentNotFound', `No stored document for ${String(key)}`, {
    operation,
    component: 'document-service',
    data: { key },
  });
}
