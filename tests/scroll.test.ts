import { describe, it, expect } from 'vitest';

import { createScrollRunner } from '../src/core/scroll.js';
import { createMockClient } from '../src/llm/mock.js';
import type { MockLLMClient } from '../src/llm/mock.js';
import { createOracle } from '../src/llm/oracle.js';
import { FakePage } from './helpers/fakePage.js';
import { answerWith } from './helpers/oracle.js';
import { useTempDir } from './helpers/tmp.js';

const tempDir = useTempDir();

async function runnerFor(client: MockLLMClient) {
  return createScrollRunner({ oracle: createOracle(client), screenshotDir: await tempDir() });
}

function stuckPage(): FakePage {
  const page = new FakePage({ url: 'https://feed.test' });
  page.windowScrolls = false;
  page.containerScrolls = false;
  return page;
}

describe('createScrollRunner', () => {
  it('tries every strategy and reports failure when nothing moves', async () => {
    const runner = await runnerFor(createMockClient());

    const report = await runner.scroll(stuckPage());

    expect(report.message).toBe('All scroll strategies failed');
    expect(report.strategy).toBeNull();
    expect(report.attempts.map((a) => [a.strategy, a.success])).toEqual([
      ['AI strategy', false],
      ['Element scroll', false],
      ['Page scroll', false],
    ]);
  });

  it('chains each failed attempt into the next one', async () => {
    const runner = await runnerFor(createMockClient());

    const { attempts } = await runner.scroll(stuckPage());

    expect(attempts[1]?.beforeScreenshot).toBe(attempts[0]?.afterScreenshot);
    expect(attempts[2]?.beforeScreenshot).toBe(attempts[1]?.afterScreenshot);
  });

  it('runs the generated script once per step', async () => {
    const page = stuckPage();
    page.scrollScriptMarker = 'scrollBy';
    const client = answerWith({
      method: 'window',
      script: 'window.scrollBy(0, window.innerHeight)',
      explanation: 'the page itself scrolls',
    });
    const runner = await runnerFor(client);

    const report = await runner.scroll(page, { times: 3, description: 'the product list' });

    expect(report.message).toBe('Scrolled using AI strategy');
    expect(report.attempts).toHaveLength(1);
    expect(page.evaluated).toEqual([
      'window.scrollBy(0, window.innerHeight)',
      'window.scrollBy(0, window.innerHeight)',
      'window.scrollBy(0, window.innerHeight)',
    ]);
    expect(client.calls[0]?.userPrompt).toContain('scrolls the product list on the current page');
  });

  it('accepts a strategy that names its script "javascript"', async () => {
    const page = stuckPage();
    page.scrollScriptMarker = 'scrollTop';
    const runner = await runnerFor(answerWith({ javascript: "document.querySelector('main').scrollTop += 800" }));

    const report = await runner.scroll(page, { times: 1 });

    expect(report.strategy).toBe('AI strategy');
  });

  it('falls through to element scrolling', async () => {
    const page = stuckPage();
    page.containerScrolls = true;
    const runner = await runnerFor(createMockClient());

    const report = await runner.scroll(page);

    expect(report.message).toBe('Scrolled using Element scroll');
    expect(report.attempts.map((a) => a.success)).toEqual([false, true]);
  });

  it('falls through to page scrolling', async () => {
    const page = stuckPage();
    page.windowScrolls = true;
    const runner = await runnerFor(createMockClient());

    const report = await runner.scroll(page, { times: 2 });

    expect(report.message).toBe('Scrolled using Page scroll');
    expect(page.scrollOffset).toBe(2000);
  });

  it('continues past a strategy that throws', async () => {
    const page = stuckPage();
    page.windowScrolls = true;
    const runner = await runnerFor(
      createMockClient(() => {
        throw new Error('oracle offline');
      }),
    );

    const report = await runner.scroll(page);

    expect(report.attempts[0]).toMatchObject({ strategy: 'AI strategy', success: false });
    expect(report.strategy).toBe('Page scroll');
  });

  it('counts an unverifiable attempt as a success', async () => {
    const page = stuckPage();
    page.screenshotFails = true;
    const runner = await runnerFor(createMockClient());

    const report = await runner.scroll(page);

    expect(report.message).toBe('Scrolled using AI strategy');
  });
});
