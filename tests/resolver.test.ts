import { describe, it, expect } from 'vitest';

import { LocatorCache } from '../src/core/cache.js';
import { createResolver } from '../src/core/resolver.js';
import { createMockClient } from '../src/llm/mock.js';
import type { MockLLMClient } from '../src/llm/mock.js';
import { createOracle } from '../src/llm/oracle.js';
import { FakePage } from './helpers/fakePage.js';
import { answerWith, pickByText } from './helpers/oracle.js';

const PAGE_URL = 'https://shop.test/checkout';

async function setup(client: MockLLMClient, options: { minConfidence?: number; catalogLimit?: number } = {}) {
  const cache = await LocatorCache.open();
  const resolver = createResolver({ oracle: createOracle(client), cache, ...options });
  return { cache, resolver };
}

describe('createResolver', () => {
  it('resolves a description to the matching element', async () => {
    const page = new FakePage({ url: PAGE_URL, frames: [{ nodes: [{ tag: 'button', text: 'Submit' }] }] });
    const { resolver, cache } = await setup(pickByText('Submit'));

    const resolution = await resolver.resolve(page, 'the submit button');

    expect(resolution).toMatchObject({
      kind: 'found',
      source: 'oracle',
      element: { index: 0, tag: 'button', text: 'Submit', locator: '[data-wayfind-id="0"]' },
    });
    expect(cache.get(PAGE_URL, 'the submit button')).toEqual({
      locator: '[data-wayfind-id="0"]',
      tag: 'button',
      label: 'Submit',
      frameIndex: 0,
    });
  });

  it('asks the oracle once for repeated lookups on an unchanged page', async () => {
    const page = new FakePage({ url: PAGE_URL, frames: [{ nodes: [{ tag: 'button', text: 'Submit' }] }] });
    const client = pickByText('Submit');
    const { resolver } = await setup(client);

    const first = await resolver.resolve(page, 'the submit button');
    const second = await resolver.resolve(page, 'the submit button');

    expect(first).toMatchObject({ kind: 'found', source: 'oracle' });
    expect(second).toMatchObject({ kind: 'found', source: 'cache', element: { text: 'Submit' } });
    expect(client.calls).toHaveLength(1);
  });

  it('re-resolves and overwrites a cached locator that went stale', async () => {
    const page = new FakePage({
      url: PAGE_URL,
      frames: [{ nodes: [{ tag: 'button', text: 'Cancel' }, { tag: 'button', text: 'Submit' }] }],
    });
    const client = pickByText('Submit');
    const { resolver, cache } = await setup(client);

    await resolver.resolve(page, 'the submit button');
    expect(cache.get(PAGE_URL, 'the submit button')?.locator).toBe('[data-wayfind-id="1"]');

    page.frameTree = [{ nodes: [{ tag: 'button', text: 'Submit' }] }];
    const healed = await resolver.resolve(page, 'the submit button');

    expect(healed).toMatchObject({ kind: 'found', source: 'oracle', element: { index: 0 } });
    expect(cache.get(PAGE_URL, 'the submit button')?.locator).toBe('[data-wayfind-id="0"]');
    expect(client.calls).toHaveLength(2);
  });

  it('follows the cached node when elements are inserted ahead of it', async () => {
    const page = new FakePage({
      url: PAGE_URL,
      frames: [{ nodes: [{ tag: 'button', text: 'Cancel' }, { tag: 'button', text: 'Submit' }] }],
    });
    const client = pickByText('Submit');
    const { resolver } = await setup(client);

    await resolver.resolve(page, 'the submit button');
    page.frameTree[0]?.nodes.unshift({ tag: 'button', text: 'Delete account' });
    const again = await resolver.resolve(page, 'the submit button');

    expect(again).toMatchObject({
      kind: 'found',
      source: 'cache',
      element: { index: 2, text: 'Submit', locator: '[data-wayfind-id="1"]' },
    });
    expect(client.calls).toHaveLength(1);
  });

  it('treats a cached locator that now names a different element as stale', async () => {
    const page = new FakePage({
      url: PAGE_URL,
      frames: [{ nodes: [{ tag: 'button', text: 'Cancel' }, { tag: 'button', text: 'Submit' }] }],
    });
    const client = pickByText('Submit');
    const { resolver, cache } = await setup(client);

    await resolver.resolve(page, 'the submit button');
    // A reload: fresh document, stamps handed out from zero again
    page.frameTree = [
      {
        nodes: [
          { tag: 'button', text: 'Delete account' },
          { tag: 'button', text: 'Cancel' },
          { tag: 'button', text: 'Submit' },
        ],
      },
    ];
    const again = await resolver.resolve(page, 'the submit button');

    expect(again).toMatchObject({
      kind: 'found',
      source: 'oracle',
      element: { index: 2, text: 'Submit', locator: '[data-wayfind-id="2"]' },
    });
    expect(cache.get(PAGE_URL, 'the submit button')?.locator).toBe('[data-wayfind-id="2"]');
    expect(client.calls).toHaveLength(2);
  });

  it('trusts a stored entry whose node still matches after a reload', async () => {
    const cache = await LocatorCache.open();
    await cache.put(PAGE_URL, 'the submit button', {
      locator: '[data-wayfind-id="1"]',
      tag: 'button',
      label: 'Submit',
      frameIndex: 0,
    });
    const client = pickByText('Submit');
    const resolver = createResolver({ oracle: createOracle(client), cache });
    const page = new FakePage({
      url: PAGE_URL,
      frames: [{ nodes: [{ tag: 'button', text: 'Cancel' }, { tag: 'button', text: 'Submit' }] }],
    });

    const resolution = await resolver.resolve(page, 'the submit button');

    expect(resolution).toMatchObject({ kind: 'found', source: 'cache', element: { text: 'Submit' } });
    expect(client.calls).toHaveLength(0);
  });

  it('does not call the oracle when the page has nothing interactive', async () => {
    const client = createMockClient();
    const { resolver } = await setup(client);

    const resolution = await resolver.resolve(new FakePage({ url: PAGE_URL }), 'the submit button');

    expect(resolution).toEqual({ kind: 'not_found', reason: 'no interactive elements on the page' });
    expect(client.calls).toHaveLength(0);
  });

  it('reports not found when the oracle declines', async () => {
    const page = new FakePage({ url: PAGE_URL, frames: [{ nodes: [{ tag: 'button', text: 'Submit' }] }] });
    const { resolver, cache } = await setup(createMockClient());

    const resolution = await resolver.resolve(page, 'a field that does not exist anywhere');

    expect(resolution).toEqual({ kind: 'not_found', reason: 'oracle chose index -1' });
    expect(cache.size).toBe(0);
  });

  it('rejects an index outside the catalog', async () => {
    const page = new FakePage({ url: PAGE_URL, frames: [{ nodes: [{ tag: 'button', text: 'Submit' }] }] });
    const { resolver, cache } = await setup(answerWith({ index: 7, confidence: 0.9 }));

    const resolution = await resolver.resolve(page, 'the submit button');

    expect(resolution).toEqual({ kind: 'not_found', reason: 'oracle chose index 7' });
    expect(cache.size).toBe(0);
  });

  it('rejects answers below the confidence floor', async () => {
    const page = new FakePage({ url: PAGE_URL, frames: [{ nodes: [{ tag: 'button', text: 'Submit' }] }] });
    const { resolver } = await setup(answerWith({ index: 0, confidence: 0.2 }), { minConfidence: 0.5 });

    const resolution = await resolver.resolve(page, 'the submit button');

    expect(resolution).toEqual({ kind: 'not_found', reason: 'confidence 0.20 below 0.50' });
  });

  it('accepts a string index and a percentage confidence', async () => {
    const page = new FakePage({ url: PAGE_URL, frames: [{ nodes: [{ tag: 'button', text: 'Submit' }] }] });
    const { resolver } = await setup(answerWith({ index: '0', confidence: 85 }), { minConfidence: 0.8 });

    const resolution = await resolver.resolve(page, 'the submit button');

    expect(resolution).toMatchObject({ kind: 'found', element: { text: 'Submit' } });
  });

  it('degrades to not found when the oracle is unreachable', async () => {
    const page = new FakePage({ url: PAGE_URL, frames: [{ nodes: [{ tag: 'button', text: 'Submit' }] }] });
    const client = createMockClient(() => {
      throw new Error('connect ECONNREFUSED');
    });
    const { resolver } = await setup(client);

    const resolution = await resolver.resolve(page, 'the submit button');

    expect(resolution).toEqual({ kind: 'not_found', reason: 'oracle unavailable: connect ECONNREFUSED' });
  });

  it('shows the oracle at most catalogLimit elements', async () => {
    const page = new FakePage({
      url: PAGE_URL,
      frames: [{ nodes: [{ tag: 'button', text: 'Alpha' }, { tag: 'button', text: 'Beta' }] }],
    });
    const client = pickByText('Beta');
    const { resolver } = await setup(client, { catalogLimit: 1 });

    const resolution = await resolver.resolve(page, 'the beta button');

    expect(client.calls[0]?.userPrompt).toContain('[0] button "Alpha" pos=(0,0)');
    expect(client.calls[0]?.userPrompt).not.toContain('"Beta"');
    expect(resolution.kind).toBe('not_found');
  });

  it('passes a low sampling temperature to the model', async () => {
    const page = new FakePage({ url: PAGE_URL, frames: [{ nodes: [{ tag: 'button', text: 'Submit' }] }] });
    const client = pickByText('Submit');
    const { resolver } = await setup(client);

    await resolver.resolve(page, 'the submit button');

    expect(client.calls[0]?.options).toEqual({ temperature: 0.1 });
  });
});
