import type { RetrievalStrategy, RetrievedPayload, StrategyRequest } from '../interfaces/strategy.js';
import { fetchPage } from './http-fetch.js';
import { readChallenge } from './challenge.js';
import { submitForm } from './form-submit.js';
import { trackingField } from './forms.js';
import { CSRF_TOKEN } from './json-api.js';
import { resolveOptions, type StrategyOptions } from './options.js';
import { expandTemplate } from './template.js';

/**
 * Get past a simple interstitial: load it, collect its tokens (meta, hidden and inline),
 * answer an arithmetic question if it asks one, then ask for the tracking page again
 * with the cookies and tokens it handed out.
 */
export function createChallengeBypassStrategy(opts: StrategyOptions = {}): RetrievalStrategy {
  const { timeoutMs, passThrough } = resolveOptions('challenge-bypass', opts);

  return {
    kind: 'challenge-bypass',
    defaultTimeoutMs: timeoutMs,

    async execute(request: StrategyRequest): Promise<RetrievedPayload> {
      const { step, trackingNumber, profile, session } = request;
      const pageUrl = expandTemplate(step.pageUrl ?? step.url ?? profile.baseUrls[0], trackingNumber, profile);
      const targetUrl = step.url ? expandTemplate(step.url, trackingNumber, profile) : pageUrl;

      const challenge = await fetchPage(request, { method: 'GET', url: pageUrl, kind: 'document' }, passThrough);
      const tokens = readChallenge(challenge.body, challenge.url);
      if (tokens.csrf) session.setToken(CSRF_TOKEN, tokens.csrf);

      if (tokens.form && (tokens.answer !== undefined || tokens.csrf)) {
        const fields = { ...tokens.form.fields };
        if (tokens.answer !== undefined) fields[tokens.answerField ?? 'answer'] = String(tokens.answer);
        const field = trackingField(tokens.form, step.fieldName);
        if (field) fields[field] = trackingNumber.compact;
        return submitForm(request, tokens.form, fields, challenge.url, passThrough);
      }

      const headers: Record<string, string> = {};
      if (tokens.csrf) headers['X-CSRF-Token'] = tokens.csrf;
      return fetchPage(
        request,
        { method: 'GET', url: targetUrl, kind: 'document', referer: challenge.url, headers },
        passThrough
      );
    },
  };
}
