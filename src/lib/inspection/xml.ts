import { JSDOM } from 'jsdom';

let domParser: DOMParser | null = null;

function getParser(): DOMParser {
  if (!domParser) {
    const { window } = new JSDOM('');
    domParser = new window.DOMParser();
  }
  return domParser;
}

export function parseXmlDocument(text: string): Element | null {
  let doc: Document;
  try {
    doc = getParser().parseFromString(text.replace(/^\uFEFF/, ''), 'application/xml');
  } catch (err) {
    console.debug('[InspectionLog] XML parser rejected document:', err instanceof Error ? err.message : String(err));
    return null;
  }

  const root = doc.documentElement;
  if (!root || root.localName === 'parsererror') return null;
  if (doc.getElementsByTagName('parsererror').length > 0) return null;
  return root;
}

export function childElements(node: Element): Element[] {
  return Array.from(node.children);
}

export function childElement(node: Element, tag: string): Element | null {
  for (const child of Array.from(node.children)) {
    if (child.localName === tag) return child;
  }
  return null;
}

export function elementText(node: Element | null): string {
  return node?.textContent ?? '';
}
