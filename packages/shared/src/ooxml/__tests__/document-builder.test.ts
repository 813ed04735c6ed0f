import { NS, PART } from '../namespaces';
import { buildPlainDocument, timelineSpanMinutes } from '../document-builder';
import { computeTextStatistics, normalizeAuthor, readAppProperties, readCoreProperties } from '../properties';
import { partOrder } from '../package-io';
import { scanRevisions } from '../revision-scanner';
import { findDescendants, textOf } from '../xml';
import { THREE_SENTENCES, partRoot, sentence, thrownCode } from './fixtures';

describe('buildPlainDocument', () => {
  const pkg = buildPlainDocument(THREE_SENTENCES, { mode: 'suggestions', title: 'Notes' }, 'Ada');

  it('should emit the minimal part set', () => {
    expect(partOrder(pkg)).toEqual([
      '[Content_Types].xml',
      '_rels/.rels',
      'docProps/app.xml',
      'docProps/core.xml',
      'word/_rels/document.xml.rels',
      'word/document.xml',
      'word/settings.xml',
    ]);
  });

  it('should write one plain paragraph per record', () => {
    const body = partRoot(pkg, PART.document);
    expect(findDescendants(body, NS.w, ['p']).map((p) => textOf(p))).toEqual(['Alpha.', 'Beta.', 'Gamma.']);
    expect(scanRevisions(pkg)).toEqual([]);
  });

  it('should end the body with section properties', () => {
    const body = partRoot(pkg, PART.document);
    expect(findDescendants(body, NS.w, ['sectPr'])).toHaveLength(1);
  });

  it('should derive core properties from the timeline', () => {
    const core = readCoreProperties(pkg);
    expect(core.title).toBe('Notes');
    expect(core.subject).toBeNull();
    expect(core.creator).toBe('Ada');
    expect(core.lastModifiedBy).toBe('Ada');
    expect(core.revision).toBe(3);
    expect(core.created?.toISOString()).toBe('2024-01-01T10:00:00.000Z');
    expect(core.modified?.toISOString()).toBe('2024-01-01T10:02:30.000Z');
  });

  it('should write statistics and edit time to app properties', () => {
    const app = readAppProperties(pkg);
    expect(app.application).toBe('Microsoft Office Word');
    expect(app.appVersion).toBe('16.0000');
    expect(app.totalTime).toBe(3);
    expect(app.words).toBe(3);
    expect(app.characters).toBe(17);
    expect(app.paragraphs).toBe(3);
    expect(app.pages).toBe(1);
    expect(app.company).toBeNull();
  });

  it('should prefer an explicit edit time and application', () => {
    const custom = buildPlainDocument(
      THREE_SENTENCES,
      { mode: 'clean', totalEditTimeMinutes: 42, company: 'Acme' },
      'Ada',
      { application: 'Writer', appVersion: '1.0' }
    );
    const app = readAppProperties(custom);
    expect(app.totalTime).toBe(42);
    expect(app.company).toBe('Acme');
    expect(app.application).toBe('Writer');
    expect(app.appVersion).toBe('1.0');
  });

  it('should escape markup and keep edge whitespace', () => {
    const built = buildPlainDocument(
      [sentence(0, 'Fish & <chips>', '2024-01-01T10:00:00Z'), sentence(1, ' padded', '2024-01-01T10:01:00Z')],
      { mode: 'clean' },
      'Ada'
    );
    const body = partRoot(built, PART.document);
    const texts = findDescendants(body, NS.w, ['t']);

    expect(texts.map((t) => textOf(t))).toEqual(['Fish & <chips>', ' padded']);
    expect(texts[1]?.getAttributeNS(NS.xml, 'space')).toBe('preserve');
  });

  it('should refuse an empty record list', () => {
    expect(thrownCode(() => buildPlainDocument([], { mode: 'clean' }, 'Ada'))).toBe('EmptyDocument');
  });
});

describe('timelineSpanMinutes', () => {
  it('should round partial minutes up', () => {
    expect(timelineSpanMinutes(THREE_SENTENCES)).toBe(3);
  });

  it('should measure to the latest modification', () => {
    const edited = [
      sentence(0, 'A.', '2024-01-01T10:00:00Z', { modifiedAt: new Date('2024-01-01T11:00:00Z') }),
      sentence(1, 'B.', '2024-01-01T10:01:00Z'),
    ];
    expect(timelineSpanMinutes(edited)).toBe(60);
  });
});

describe('computeTextStatistics', () => {
  it('should count words and characters', () => {
    expect(computeTextStatistics(['Hello  world', ' x '])).toEqual({
      pages: 1,
      words: 3,
      characters: 11,
      charactersWithSpaces: 15,
      paragraphs: 2,
      lines: 2,
    });
  });

  it('should add a page per 500 words', () => {
    expect(computeTextStatistics(['word '.repeat(501)]).pages).toBe(2);
  });
});

describe('normalizeAuthor', () => {
  it('should strip invalid characters and truncate', () => {
    expect(normalizeAuthor('Bo\u0007b')).toBe('Bob');
    expect(normalizeAuthor('a'.repeat(300))).toHaveLength(255);
  });
});
