import { loadDocument, selectAll, type DomDocument } from '../utils/dom.js';
import { resolveUrl } from './http-fetch.js';

export interface DiscoveredForm {
  action: string;
  method: 'GET' | 'POST';
  /** Every named field with its current value, hidden ones included */
  fields: Record<string, string>;
  /** Names of the fields a user would type into */
  visibleFields: string[];
}

const TRACKING_FIELD = /track|pro(?:number|_number|num)?$|search|number|reference|query|^q$/i;
const CSRF_FIELD = /csrf|xsrf|authenticity_token|requestverificationtoken|^_token$/i;
const SKIPPED_TYPES = new Set(['submit', 'button', 'image', 'reset', 'file']);
const VISIBLE_TYPES = new Set(['text', 'search', 'number', 'tel', '']);

export function discoverForms(doc: DomDocument, pageUrl: string): DiscoveredForm[] {
  return selectAll(doc, 'form').map((form) => {
    const fields: Record<string, string> = {};
    const visibleFields: string[] = [];

    for (const input of selectAll(form, 'input[name], select[name], textarea[name]')) {
      const name = input.getAttribute('name');
      if (!name) continue;
      const type = (input.getAttribute('type') ?? '').toLowerCase();
      if (SKIPPED_TYPES.has(type)) continue;
      fields[name] = input.getAttribute('value') ?? '';
      if (input.tagName.toLowerCase() !== 'select' && VISIBLE_TYPES.has(type)) visibleFields.push(name);
    }

    return {
      action: resolveUrl(form.getAttribute('action') || pageUrl, pageUrl),
      method: (form.getAttribute('method') ?? 'GET').toUpperCase() === 'POST' ? 'POST' : 'GET',
      fields,
      visibleFields,
    };
  });
}

/**
 * The field that should receive the tracking number: the configured one when the form
 * has it, else the first visible field whose name looks like a tracking input
 */
export function trackingField(form: DiscoveredForm, preferred?: string): string | undefined {
  if (preferred && preferred in form.fields) return preferred;
  return form.visibleFields.find((name) => TRACKING_FIELD.test(name));
}

/**
 * CSRF token from a meta tag or a hidden form field
 */
export function findCsrfToken(doc: DomDocument): string | undefined {
  for (const meta of selectAll(doc, 'meta[name]')) {
    const name = meta.getAttribute('name') ?? '';
    const content = meta.getAttribute('content');
    if (CSRF_FIELD.test(name) && content) return content;
  }
  for (const input of selectAll(doc, 'input[type="hidden"][name]')) {
    const value = input.getAttribute('value');
    if (CSRF_FIELD.test(input.getAttribute('name') ?? '') && value) return value;
  }
  return undefined;
}

export function parseForms(html: string, pageUrl: string): { forms: DiscoveredForm[]; csrf?: string } {
  const doc = loadDocument(html);
  return { forms: discoverForms(doc, pageUrl), csrf: findCsrfToken(doc) };
}
