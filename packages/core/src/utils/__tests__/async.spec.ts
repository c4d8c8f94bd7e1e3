import { describe, it, expect } from 'vitest';
import { jitter, linkSignals, raceAbort, sleep } from '../async.js';
import { RetrievalError } from '../../errors/index.js';
import { cleanValue, decodeEntities, htmlToText } from '../text.js';

describe('jitter', () => {
  it('stays within bounds', () => {
    expect(jitter(250, 1000, () => 0)).toBe(250);
    expect(jitter(250, 1000, () => 1)).toBe(1000);
    expect(jitter(250, 1000, () => 0.5)).toBe(625);
  });

  it('returns the minimum when the range is empty', () => {
    expect(jitter(0, 0)).toBe(0);
    expect(jitter(300, 100)).toBe(300);
  });
});

describe('sleep', () => {
  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort(new Error('stop'));

    await expect(pending).rejects.toThrow('stop');
  });
});

describe('linkSignals', () => {
  it('aborts with a Timeout error when its own timer fires', async () => {
    const link = linkSignals([], 10, 'Timed out after 10ms');
    await sleep(30);

    expect(link.signal.aborted).toBe(true);
    expect(link.timedOut()).toBe(true);
    expect(link.signal.reason).toBeInstanceOf(RetrievalError);
    expect(link.signal.reason).toMatchObject({ kind: 'Timeout', message: 'Timed out after 10ms' });
    link.dispose();
  });

  it('follows a parent without reporting a timeout', () => {
    const parent = new AbortController();
    const link = linkSignals([parent.signal], 10_000);
    parent.abort('caller');

    expect(link.signal.aborted).toBe(true);
    expect(link.signal.reason).toBe('caller');
    expect(link.timedOut()).toBe(false);
    link.dispose();
  });

  it('starts aborted when a parent already is', () => {
    const parent = new AbortController();
    parent.abort('gone');

    expect(linkSignals([undefined, parent.signal], 1_000).signal.reason).toBe('gone');
  });
});

describe('raceAbort', () => {
  it('settles on abort even if the promise never does', async () => {
    const controller = new AbortController();
    const pending = raceAbort(new Promise<string>(() => undefined), controller.signal);
    controller.abort(new Error('deadline'));

    await expect(pending).rejects.toThrow('deadline');
  });

  it('passes the value through', async () => {
    await expect(raceAbort(Promise.resolve('ok'), new AbortController().signal)).resolves.toBe('ok');
  });
});

describe('text helpers', () => {
  it('cleans a table cell', () => {
    expect(cleanValue('<td> Columbus,&nbsp;OH <script>var x = 1;</script></td>')).toBe('Columbus, OH');
  });

  it('renders block elements as lines', () => {
    expect(htmlToText('<div>Status: <b>Delivered</b></div><p>Columbus, OH</p><style>p{}</style>')).toBe(
      'Status: Delivered\nColumbus, OH'
    );
  });

  it('leaves numeric references beyond U+10FFFF as written', () => {
    expect(decodeEntities('A&#x42;C &#x110000; &#99999999; &#233;')).toBe('ABC &#x110000; &#99999999; \u00e9');
  });
});
