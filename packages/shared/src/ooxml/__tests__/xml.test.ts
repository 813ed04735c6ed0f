import { NS } from '../namespaces';
import {
  XML_DECLARATION,
  childElements,
  createTextRun,
  escapeXml,
  findDescendants,
  parseXmlPart,
  serializeXml,
  stripInvalidXmlChars,
  textOf,
  unwrapElement,
} from '../xml';
import { W, thrownCode } from './fixtures';

describe('escapeXml', () => {
  it('should escape the five special characters', () => {
    expect(escapeXml(`a<b>&"c'`)).toBe('a&lt;b&gt;&amp;&quot;c&apos;');
  });
});

describe('stripInvalidXmlChars', () => {
  it('should drop control characters but keep tab and newlines', () => {
    expect(stripInvalidXmlChars('a\u0001b\tc\nd\u000Be')).toBe('ab\tc\nde');
  });

  it('should drop non-characters and lone surrogates', () => {
    expect(stripInvalidXmlChars('x\uFFFEy\uFFFF')).toBe('xy');
    expect(stripInvalidXmlChars('\uD800x\uDC00')).toBe('x');
  });

  it('should keep surrogate pairs', () => {
    expect(stripInvalidXmlChars('ok \u{1F600}')).toBe('ok \u{1F600}');
  });
});

describe('parseXmlPart', () => {
  it('should reject text that is not XML', () => {
    expect(thrownCode(() => parseXmlPart('word/document.xml', 'plain text, no markup'))).toBe('CorruptPackage');
  });

  it('should reject an unexpected root element', () => {
    expect(thrownCode(() => parseXmlPart('word/document.xml', '<other/>', 'document'))).toBe('CorruptPackage');
  });

  it('should accept the expected root in any prefix', () => {
    const doc = parseXmlPart('word/document.xml', `<w:document ${W}/>`, 'document');
    expect(doc.documentElement.namespaceURI).toBe(NS.w);
  });
});

describe('serializeXml', () => {
  it('should add the declaration when the source had none', () => {
    expect(serializeXml(parseXmlPart('p', '<a/>'))).toBe(`${XML_DECLARATION}\n<a/>`);
  });

  it('should keep an existing declaration', () => {
    expect(serializeXml(parseXmlPart('p', `${XML_DECLARATION}<a/>`))).toBe(`${XML_DECLARATION}<a/>`);
  });
});

describe('tree helpers', () => {
  it('should unwrap an element in place', () => {
    const doc = parseXmlPart('p', '<root><wrap><a/><b/></wrap><c/></root>');
    const [wrap] = childElements(doc.documentElement);
    if (!wrap) throw new Error('no wrap');

    unwrapElement(wrap);

    expect(childElements(doc.documentElement).map((el) => el.localName)).toEqual(['a', 'b', 'c']);
  });

  it('should find descendants in document order', () => {
    const doc = parseXmlPart(
      'p',
      `<w:body ${W}><w:p><w:r><w:t>1</w:t></w:r></w:p><w:p><w:ins><w:r><w:t>2</w:t></w:r></w:ins></w:p></w:body>`
    );
    expect(findDescendants(doc, NS.w, ['r', 'ins']).map((el) => el.localName)).toEqual(['r', 'ins', 'r']);
  });

  it('should concatenate nested text', () => {
    const doc = parseXmlPart('p', '<a>one <b>two <c>three</c></b></a>');
    expect(textOf(doc.documentElement)).toBe('one two three');
  });
});

describe('createTextRun', () => {
  const doc = parseXmlPart('p', `<w:body ${W}/>`);

  it('should preserve edge whitespace', () => {
    const run = createTextRun(doc, ' padded ');
    const [t] = childElements(run);
    expect(t?.getAttributeNS(NS.xml, 'space')).toBe('preserve');
    expect(textOf(run)).toBe(' padded ');
  });

  it('should leave inner whitespace alone', () => {
    const [t] = childElements(createTextRun(doc, 'two words'));
    expect(t?.hasAttributeNS(NS.xml, 'space')).toBe(false);
  });
});
