import type { RetrievalStrategy, RetrievedPayload, StrategyRequest } from '../interfaces/strategy.js';
import type { PassThroughPolicy } from './http-fetch.js';
import { fetchPage } from './http-fetch.js';
import { parseForms, trackingField, type DiscoveredForm } from './forms.js';
import { CSRF_TOKEN } from './json-api.js';
import { resolveOptions, type StrategyOptions } from './options.js';
import { expandTemplate } from './template.js';

const DEFAULT_FIELD = 'trackingNumber';

export function submitForm(
  request: StrategyRequest,
  form: Pick<DiscoveredForm, 'action' | 'method'>,
  fields: Record<string, string>,
  referer: string,
  passThrough: PassThroughPolicy
): Promise<RetrievedPayload> {
  if (form.method === 'POST') {
    return fetchPage(
      request,
      { method: 'POST', url: form.action, kind: 'form', referer, data: new URLSearchParams(fields).toString() },
      passThrough
    );
  }
  const url = new URL(form.action);
  for (const [name, value] of Object.entries(fields)) url.searchParams.set(name, value);
  return fetchPage(request, { method: 'GET', url: url.toString(), kind: 'document', referer }, passThrough);
}

/**
 * Load the page hosting the tracking form, fill it in like a visitor would and submit it.
 * Hidden fields (CSRF, view state) are sent back unchanged.
 */
export function createFormSubmitStrategy(opts: StrategyOptions = {}): RetrievalStrategy {
  const { timeoutMs, passThrough } = resolveOptions('form-submit', opts);

  return {
    kind: 'form-submit',
    defaultTimeoutMs: timeoutMs,

    async execute(request: StrategyRequest): Promise<RetrievedPayload> {
      const { step, trackingNumber, profile, session } = request;
      const pageTemplate = step.pageUrl ?? step.url ?? profile.baseUrls[0];
      const pageUrl = expandTemplate(pageTemplate, trackingNumber, profile);

      const page = await fetchPage(request, { method: 'GET', url: pageUrl, kind: 'document' }, passThrough);
      // a block page goes straight to the classifier
      if (page.status >= 400) return page;

      const { forms, csrf } = parseForms(page.body, page.url);
      if (csrf) session.setToken(CSRF_TOKEN, csrf);

      for (const form of forms) {
        const field = trackingField(form, step.fieldName);
        if (!field) continue;
        return submitForm(
          request,
          form,
          { ...form.fields, [field]: trackingNumber.compact },
          page.url,
          passThrough
        );
      }

      if (step.url && step.pageUrl) {
        const action = expandTemplate(step.url, trackingNumber, profile);
        const fields: Record<string, string> = { [step.fieldName ?? DEFAULT_FIELD]: trackingNumber.compact };
        if (csrf) fields._csrf = csrf;
        return submitForm(request, { action, method: step.method }, fields, page.url, passThrough);
      }

      // no form: some sites render results on the form page itself
      return page;
    },
  };
}
