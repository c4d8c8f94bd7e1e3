import { parseHTML } from 'linkedom';

/**
 * The slice of the DOM the parsers and strategies read
 */
export interface DomElement {
  readonly tagName: string;
  readonly textContent: string | null;
  getAttribute(name: string): string | null;
  querySelector(selectors: string): DomElement | null;
  querySelectorAll(selectors: string): ArrayLike<DomElement>;
}

export interface DomDocument {
  querySelector(selectors: string): DomElement | null;
  querySelectorAll(selectors: string): ArrayLike<DomElement>;
}

export function loadDocument(html: string): DomDocument {
  const { document } = parseHTML(html);
  return document;
}

export function selectAll(root: DomDocument | DomElement, selectors: string): DomElement[] {
  return Array.from(root.querySelectorAll(selectors));
}

export function textOf(element: DomElement | null): string {
  return (element?.textContent ?? '').replace(/\s+/g, ' ').trim();
}
