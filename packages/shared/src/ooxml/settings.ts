/**
 * Document settings part (word/settings.xml)
 *
 * CT_Settings is an ordered sequence, so new children are placed after the
 * last sibling that precedes them in schema order.
 */

import settingsOrder from './settings-order.json';
import type { RenderMode } from '../types';
import { NS } from './namespaces';
import { XML_DECLARATION, childElements, createW, removeElement, setW } from './xml';

const ORDER = new Map<string, number>(settingsOrder.map((name, index) => [name, index]));

/**
 * Settings written into a freshly built package
 */
export function renderSettingsXml(): string {
  return [
    XML_DECLARATION,
    `<w:settings xmlns:w="${NS.w}">`,
    '<w:zoom w:percent="100"/>',
    '<w:defaultTabStop w:val="720"/>',
    '<w:characterSpacingControl w:val="doNotCompress"/>',
    '<w:compat>',
    `<w:compatSetting w:name="compatibilityMode" w:uri="http://schemas.microsoft.com/office/word" w:val="15"/>`,
    '</w:compat>',
    '</w:settings>',
  ].join('');
}

/**
 * Insert `element` among the children of `settings` at its schema position.
 * Children outside the known order are skipped when looking for the anchor.
 */
export function insertSetting(settings: Element, element: Element): void {
  const rank = ORDER.get(element.localName);
  if (rank === undefined) {
    settings.appendChild(element);
    return;
  }

  let anchor: Element | null = null;
  for (const child of childElements(settings)) {
    if (child.namespaceURI !== NS.w) continue;
    const childRank = ORDER.get(child.localName);
    if (childRank !== undefined && childRank <= rank) {
      anchor = child;
    }
  }

  settings.insertBefore(element, anchor ? anchor.nextSibling : settings.firstChild);
}

export function removeSettings(settings: Element, localNames: readonly string[]): number {
  const doomed = childElements(settings).filter(
    (child) => child.namespaceURI === NS.w && localNames.includes(child.localName)
  );
  doomed.forEach(removeElement);
  return doomed.length;
}

/**
 * Bring tracking flags in line with a render mode
 */
export function applyRenderModeSettings(doc: Document, mode: RenderMode): void {
  const settings = doc.documentElement;
  if (!settings) return;

  removeSettings(settings, ['trackRevisions', 'revisionView']);

  if (mode === 'suggestions') {
    insertSetting(settings, createW(doc, 'trackRevisions'));
  } else if (mode === 'final') {
    const view = createW(doc, 'revisionView');
    setW(view, 'markup', '0');
    setW(view, 'insDel', '0');
    setW(view, 'formatting', '0');
    insertSetting(settings, view);
  }
}
