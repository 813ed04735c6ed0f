import { promises as fsPromises } from 'fs';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import {
  detectRenderMode,
  readAppProperties,
  readCoreProperties,
  scanRevisions,
  unpackPackage,
  type DocxPackage,
} from '@chronicle/shared';
import { BetterSqliteAdapter, IN_MEMORY } from '../../database/adapter';
import { SqliteMetadataStore } from '../../database/metadata-store';
import { DocumentService, documentKey, resolveRenderMode, sanitizeFile } from '../document-service';

const EVERY_MINUTE = {
  author: 'Ada',
  start: new Date('2024-01-01T10:00:00Z'),
  minIntervalSeconds: 60,
  maxIntervalSeconds: 60,
};

async function load(path: string): Promise<DocxPackage> {
  return unpackPackage(new Uint8Array(await readFile(path)));
}

describe('resolveRenderMode', () => {
  it.each([
    [{}, 'suggestions'],
    [{ acceptAllChanges: true }, 'final'],
    [{ trackChanges: false }, 'clean'],
    [{ trackChanges: false, acceptAllChanges: true }, 'clean'],
  ])('should map %j to %s', (options, mode) => {
    expect(resolveRenderMode(options)).toBe(mode);
  });
});

describe('DocumentService', () => {
  let dir: string;
  let output: string;
  let store: SqliteMetadataStore;
  let service: DocumentService;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'chronicle-service-'));
    output = join(dir, 'report.docx');
    store = new SqliteMetadataStore(new BetterSqliteAdapter(IN_MEMORY));
    await store.initialize();
    service = new DocumentService(store);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await store.close();
    await rm(dir, { recursive: true, force: true });
  });

  describe('createDocumentFile', () => {
    it('should write a tracked document and store its timeline', async () => {
      const document = await service.createDocumentFile('One. Two. Three.', output, {
        ...EVERY_MINUTE,
        title: 'Quarterly',
      });
      const pkg = await load(output);

      expect(document.filename).toBe(resolve(output));
      expect(scanRevisions(pkg).map((tag) => [tag.id, tag.text, tag.date?.toISOString()])).toEqual([
        [1, ['One.'], '2024-01-01T10:00:00.000Z'],
        [2, ['Two.'], '2024-01-01T10:01:00.000Z'],
        [3, ['Three.'], '2024-01-01T10:02:00.000Z'],
      ]);
      expect(detectRenderMode(pkg)).toBe('suggestions');
      expect(readCoreProperties(pkg).title).toBe('Quarterly');
      expect((await store.getDocument(documentKey(output)))?.sentences).toHaveLength(3);
    });

    it('should honour the rendering flags', async () => {
      await service.createDocumentFile('One. Two.', output, { ...EVERY_MINUTE, acceptAllChanges: true });
      expect(detectRenderMode(await load(output))).toBe('final');

      await service.createDocumentFile('One. Two.', output, { ...EVERY_MINUTE, trackChanges: false });
      expect(detectRenderMode(await load(output))).toBe('clean');
    });

    it('should accept pre-split sentences', async () => {
      await service.createDocumentFile(['no capital. stays whole', 'Second'], output, EVERY_MINUTE);
      expect(scanRevisions(await load(output)).map((tag) => tag.text)).toEqual([['no capital. stays whole'], ['Second']]);
    });

    it('should refuse text without sentences', async () => {
      await expect(service.createDocumentFile('  \n ', output)).rejects.toMatchObject({ code: 'EmptyInput' });
      await expect(store.listDocuments()).resolves.toEqual([]);
    });

    it('should drop the stored timeline when the file cannot be written', async () => {
      const unwritable = join(dir, 'missing', 'report.docx');
      await expect(service.createDocumentFile('One.', unwritable, EVERY_MINUTE)).rejects.toMatchObject({
        code: 'PathNotWritable',
      });
      await expect(store.listDocuments()).resolves.toEqual([]);
    });
  });

  describe('editSentenceTimestamp', () => {
    beforeEach(async () => {
      await service.createDocumentFile('One. Two. Three.', output, {
        ...EVERY_MINUTE,
        title: 'Quarterly',
        totalEditTimeMinutes: 5,
        acceptAllChanges: true,
      });
    });

    it('should rebuild the file with the new timestamp', async () => {
      const updated = await service.editSentenceTimestamp(output, 1, new Date('2025-06-15T14:30:00Z'));
      const pkg = await load(output);

      expect(updated.modifiedAt.toISOString()).toBe('2025-06-15T14:30:00.000Z');
      expect(scanRevisions(pkg).map((tag) => tag.date?.toISOString())).toEqual([
        '2024-01-01T10:00:00.000Z',
        '2025-06-15T14:30:00.000Z',
        '2024-01-01T10:02:00.000Z',
      ]);
      expect(readCoreProperties(pkg).modified?.toISOString()).toBe('2025-06-15T14:30:00.000Z');
    });

    it('should keep sentence order, ids and creation times', async () => {
      await service.editSentenceTimestamp(output, 1, new Date('2025-06-15T14:30:00Z'));

      expect(scanRevisions(await load(output)).map((tag) => [tag.id, tag.text])).toEqual([
        [1, ['One.']],
        [2, ['Two.']],
        [3, ['Three.']],
      ]);
      const stored = await store.getDocument(documentKey(output));
      expect(stored?.sentences.map((s) => [s.position, s.text, s.revisionId, s.createdAt.toISOString()])).toEqual([
        [0, 'One.', 1, '2024-01-01T10:00:00.000Z'],
        [1, 'Two.', 2, '2024-01-01T10:01:00.000Z'],
        [2, 'Three.', 3, '2024-01-01T10:02:00.000Z'],
      ]);
    });

    it('should leave the store untouched when the file cannot be replaced', async () => {
      jest.spyOn(fsPromises, 'rename').mockRejectedValueOnce(Object.assign(new Error('busy'), { code: 'EBUSY' }));

      await expect(service.editSentenceTimestamp(output, 1, new Date('2025-06-15T14:30:00Z'))).rejects.toMatchObject({
        code: 'PathNotWritable',
        message: `Cannot write ${output}: EBUSY`,
      });

      const stored = await store.getDocument(documentKey(output));
      expect(stored?.sentences[1]?.modifiedAt.toISOString()).toBe('2024-01-01T10:01:00.000Z');
      expect(stored?.lastModified.toISOString()).toBe('2024-01-01T10:02:00.000Z');
      expect(scanRevisions(await load(output)).map((tag) => tag.date?.toISOString())).toEqual([
        '2024-01-01T10:00:00.000Z',
        '2024-01-01T10:01:00.000Z',
        '2024-01-01T10:02:00.000Z',
      ]);
    });

    it('should keep properties and mode but recompute the edit time', async () => {
      await service.editSentenceTimestamp(output, 1, new Date('2025-06-15T14:30:00Z'));
      const pkg = await load(output);

      expect(readCoreProperties(pkg).title).toBe('Quarterly');
      expect(detectRenderMode(pkg)).toBe('final');
      // 531 days, 4.5 hours
      expect(readAppProperties(pkg).totalTime).toBe(764910);
    });

    it('should report unknown documents', async () => {
      await expect(
        service.editSentenceTimestamp(join(dir, 'other.docx'), 0, new Date('2025-01-01T00:00:00Z'))
      ).rejects.toMatchObject({ code: 'DocumentNotFound' });
    });
  });

  describe('sanitizeFile', () => {
    it('should write a clean copy and leave the input alone', async () => {
      await service.createDocumentFile('One. Two.', output, EVERY_MINUTE);
      const cleaned = join(dir, 'clean.docx');

      await sanitizeFile(output, cleaned, { neutralInstant: new Date('2000-01-01T00:00:00Z') });

      const pkg = await load(cleaned);
      expect(scanRevisions(pkg)).toEqual([]);
      expect(readCoreProperties(pkg).creator).toBe('Anonymous');
      expect(scanRevisions(await load(output))).toHaveLength(2);
    });

    it('should reject a file that is not a package', async () => {
      const text = join(dir, 'notes.docx');
      await writeFile(text, 'plain text');
      await expect(
        sanitizeFile(text, text, { neutralInstant: new Date('2000-01-01T00:00:00Z') })
      ).rejects.toMatchObject({ code: 'NotAPackage' });
      expect(await readFile(text, 'utf-8')).toBe('plain text');
    });
  });

  describe('describeDocument', () => {
    it('should describe a stored document by path', async () => {
      await service.createDocumentFile('One. Two.', output, EVERY_MINUTE);
      await expect(service.describeDocument(output)).resolves.toMatchObject({
        filename: resolve(output),
        sentenceCount: 2,
        lastModified: '2024-01-01 10:01:00',
      });
    });

    it('should report unknown documents', async () => {
      await expect(service.describeDocument(output)).rejects.toMatchObject({ code: 'DocumentNotFound' });
    });
  });
});
