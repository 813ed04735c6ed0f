import { PART } from '../namespaces';
import { renderDocument } from '../render';
import { detectRenderMode, isTrackingEnabled, readDocumentProperties, scanRevisions } from '../revision-scanner';
import { THREE_SENTENCES, W, packageOf } from './fixtures';

const TRACKED_BODY = [
  `<w:document ${W}><w:body>`,
  '<w:p><w:ins w:id="4" w:author="Ada" w:date="2024-01-01T10:00:00Z"><w:r><w:t>new</w:t></w:r></w:ins>',
  '<w:del w:id="x" w:author="Bob"><w:r><w:delText>old</w:delText></w:r><w:r><w:delText>er</w:delText></w:r></w:del></w:p>',
  '</w:body></w:document>',
].join('');

describe('scanRevisions', () => {
  it('should list wrappers in document order', () => {
    const pkg = packageOf({ [PART.document]: TRACKED_BODY });
    expect(scanRevisions(pkg)).toEqual([
      { kind: 'insertion', id: 4, author: 'Ada', date: new Date('2024-01-01T10:00:00Z'), text: ['new'] },
      { kind: 'deletion', id: null, author: 'Bob', date: null, text: ['old', 'er'] },
    ]);
  });
});

describe('isTrackingEnabled', () => {
  it('should be off without a settings part', () => {
    expect(isTrackingEnabled(packageOf({ [PART.document]: TRACKED_BODY }))).toBe(false);
  });

  it.each([
    ['<w:trackRevisions/>', true],
    ['<w:trackRevisions w:val="true"/>', true],
    ['<w:trackRevisions w:val="false"/>', false],
    ['<w:trackRevisions w:val="0"/>', false],
    ['', false],
  ])('should read %s', (flag, expected) => {
    const pkg = packageOf({ [PART.settings]: `<w:settings ${W}>${flag}</w:settings>` });
    expect(isTrackingEnabled(pkg)).toBe(expected);
  });
});

describe('detectRenderMode', () => {
  it('should call insertions without tracking final', () => {
    expect(detectRenderMode(packageOf({ [PART.document]: TRACKED_BODY }))).toBe('final');
  });
});

describe('readDocumentProperties', () => {
  it('should recover what the package was rendered with', () => {
    const pkg = renderDocument(
      THREE_SENTENCES,
      { mode: 'final', title: 'Report', company: 'Acme', totalEditTimeMinutes: 15 },
      'Ada'
    );
    expect(readDocumentProperties(pkg)).toEqual({
      title: 'Report',
      company: 'Acme',
      totalEditTimeMinutes: 15,
      mode: 'final',
    });
  });

  it('should report the computed edit time', () => {
    const pkg = renderDocument(THREE_SENTENCES, { mode: 'suggestions' }, 'Ada');
    expect(readDocumentProperties(pkg)).toEqual({ totalEditTimeMinutes: 3, mode: 'suggestions' });
  });
});
