import { loadDocument, selectAll } from '../utils/dom.js';
import { htmlToText } from '../utils/text.js';
import { discoverForms, findCsrfToken, type DiscoveredForm } from './forms.js';

export interface ChallengeTokens {
  csrf?: string;
  /** Answer to an inline arithmetic question, when the page asks one */
  answer?: number;
  form?: DiscoveredForm;
  /** Form field that should carry the answer */
  answerField?: string;
}

const QUESTION = /(?:what is|solve|compute|calculate)\s*:?\s*(-?\d{1,6})\s*([+*x×-])\s*(-?\d{1,6})/i;
const SCRIPT_SUM = /\b(?:answer|result|challenge)\s*=\s*(-?\d{1,6})\s*([+*-])\s*(-?\d{1,6})\s*;/;
const INLINE_TOKEN = /(?:csrf|xsrf)[_-]?token["']?\s*[:=]\s*["']([^"']{8,})["']/i;
const ANSWER_FIELD = /answer|challenge|result|solution/i;

function apply(left: number, operator: string, right: number): number {
  switch (operator) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    default:
      return left * right;
  }
}

/**
 * Solve "what is 7 + 5"-style questions and `answer = 7 + 5;` script assignments
 */
export function solveArithmetic(text: string): number | undefined {
  const match = QUESTION.exec(text) ?? SCRIPT_SUM.exec(text);
  if (!match) return undefined;
  return apply(Number(match[1]), match[2], Number(match[3]));
}

/**
 * Collect whatever a simple interstitial expects back: tokens, a form, an answer
 */
export function readChallenge(html: string, pageUrl: string): ChallengeTokens {
  const doc = loadDocument(html);
  const tokens: ChallengeTokens = {};

  const scripts = selectAll(doc, 'script').map((script) => script.textContent ?? '').join('\n');
  tokens.csrf = findCsrfToken(doc) ?? INLINE_TOKEN.exec(scripts)?.[1];
  tokens.answer = solveArithmetic(htmlToText(html)) ?? solveArithmetic(scripts);

  const [form] = discoverForms(doc, pageUrl);
  if (form) {
    tokens.form = form;
    tokens.answerField =
      form.visibleFields.find((name) => ANSWER_FIELD.test(name)) ??
      Object.keys(form.fields).find((name) => ANSWER_FIELD.test(name));
  }
  return tokens;
}
