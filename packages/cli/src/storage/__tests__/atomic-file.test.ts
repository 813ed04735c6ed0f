import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { errnoCode, pathExists, readFileBytes, readTextFile, writeFileAtomic } from '../atomic-file';

describe('atomic file access', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'chronicle-files-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('writeFileAtomic', () => {
    it('should write the bytes and leave no temporary file', async () => {
      const target = join(dir, 'out.docx');
      await writeFileAtomic(target, new Uint8Array([1, 2, 3]));

      expect([...(await readFile(target))]).toEqual([1, 2, 3]);
      expect(await readdir(dir)).toEqual(['out.docx']);
    });

    it('should replace an existing file', async () => {
      const target = join(dir, 'out.docx');
      await writeFile(target, 'old');
      await writeFileAtomic(target, new TextEncoder().encode('new'));

      expect(await readFile(target, 'utf-8')).toBe('new');
    });

    it('should fail on a directory and clean up', async () => {
      const target = join(dir, 'taken');
      await mkdir(target);

      await expect(writeFileAtomic(target, new Uint8Array([1]))).rejects.toMatchObject({
        code: 'PathNotWritable',
        context: { data: { path: target } },
      });
      expect(await readdir(dir)).toEqual(['taken']);
    });

    it('should fail when the directory does not exist', async () => {
      await expect(writeFileAtomic(join(dir, 'missing', 'out.docx'), new Uint8Array([1]))).rejects.toMatchObject({
        code: 'PathNotWritable',
      });
    });
  });

  describe('reading', () => {
    it('should read bytes and text', async () => {
      const path = join(dir, 'in.txt');
      await writeFile(path, 'Grüße. Zweiter Satz.', 'utf-8');

      expect(await readTextFile(path)).toBe('Grüße. Zweiter Satz.');
      expect((await readFileBytes(path)).length).toBe(22);
    });

    it('should report a missing file', async () => {
      const path = join(dir, 'absent.txt');
      await expect(readFileBytes(path)).rejects.toMatchObject({
        code: 'PathNotFound',
        message: `File not found: ${path}`,
      });
    });

    it('should tell whether a path exists', async () => {
      await writeFile(join(dir, 'here'), '');
      await expect(pathExists(join(dir, 'here'))).resolves.toBe(true);
      await expect(pathExists(join(dir, 'gone'))).resolves.toBe(false);
    });
  });

  describe('errnoCode', () => {
    it('should read the code from any error-shaped value', () => {
      expect(errnoCode({ code: 'ENOENT', message: 'gone' })).toBe('ENOENT');
      expect(errnoCode(Object.assign(new Error('busy'), { code: 'EBUSY' }))).toBe('EBUSY');
    });

    it('should ignore values without a string code', () => {
      expect(errnoCode(new Error('plain'))).toBeUndefined();
      expect(errnoCode({ code: 2 })).toBeUndefined();
      expect(errnoCode('ENOENT')).toBeUndefined();
      expect(errnoCode(null)).toBeUndefined();
    });
  });
});
