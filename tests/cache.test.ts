import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { describe, it, expect } from 'vitest';

import {
  LocatorCache,
  cacheEntryFor,
  createFileStore,
  createMemoryStore,
  entryDescribes,
  normalizePageKey,
  parseCacheDocument,
} from '../src/core/cache.js';
import type { CacheStore } from '../src/core/cache.js';
import type { CacheEntry, InteractiveElement } from '../src/schema/index.js';
import { useTempDir } from './helpers/tmp.js';

const tempDir = useTempDir();

function entry(locator: string, label = 'Search'): CacheEntry {
  return { locator, tag: 'input', label, frameIndex: 0 };
}

function element(overrides: Partial<InteractiveElement> = {}): InteractiveElement {
  return {
    index: 0,
    tag: 'button',
    text: 'Submit',
    x: 0,
    y: 0,
    width: 10,
    height: 10,
    locator: '[data-wayfind-id="4"]',
    frameIndex: 0,
    ...overrides,
  };
}

describe('normalizePageKey', () => {
  it('lower-cases and drops one trailing slash', () => {
    expect(normalizePageKey('https://Shop.test/Login/')).toBe('https://shop.test/login');
    expect(normalizePageKey('https://shop.test//')).toBe('https://shop.test/');
  });

  it('keeps the query string', () => {
    expect(normalizePageKey('https://shop.test/search?q=Shoes')).toBe('https://shop.test/search?q=shoes');
  });
});

describe('LocatorCache', () => {
  it('treats addresses that differ only by case or trailing slash as one page', async () => {
    const cache = await LocatorCache.open(createMemoryStore());

    await cache.put('https://shop.test/Cart/', 'checkout button', entry('[data-wayfind-id="3"]'));

    expect(cache.get('https://shop.test/cart', 'checkout button')?.locator).toBe('[data-wayfind-id="3"]');
    expect(cache.get('https://shop.test/cart', 'Checkout button')).toBeUndefined();
  });

  it('replaces an entry wholesale', async () => {
    const cache = await LocatorCache.open();

    await cache.put('https://shop.test', 'search', entry('#old'));
    await cache.put('https://shop.test', 'search', entry('#new', 'Find'));

    expect(cache.get('https://shop.test', 'search')).toEqual(entry('#new', 'Find'));
    expect(cache.size).toBe(1);
  });

  it('invalidates single entries and drops empty pages', async () => {
    const cache = await LocatorCache.open();
    await cache.put('https://shop.test', 'search', entry('#q'));
    await cache.put('https://shop.test', 'cart', entry('#cart', 'Cart'));

    await cache.invalidate('https://shop.test', 'search');
    expect(cache.get('https://shop.test', 'search')).toBeUndefined();
    expect(cache.size).toBe(1);

    await cache.invalidate('https://shop.test', 'cart');
    expect(cache.toDocument()).toEqual({ version: 2, pages: {} });
  });

  it('keeps working in memory when the store cannot save', async () => {
    const store: CacheStore = {
      load: async () => ({ pages: {}, status: { state: 'fresh' } }),
      save: async () => {
        throw new Error('disk full');
      },
    };
    const cache = await LocatorCache.open(store);

    await cache.put('https://shop.test', 'search', entry('#q'));

    expect(cache.get('https://shop.test', 'search')?.locator).toBe('#q');
  });
});

describe('file store', () => {
  it('starts fresh when the file does not exist', async () => {
    const dir = await tempDir();
    const cache = await LocatorCache.open(createFileStore(path.join(dir, 'cache.json')));

    expect(cache.loadStatus).toEqual({ state: 'fresh' });
    expect(cache.size).toBe(0);
  });

  it('writes a versioned document and reads it back', async () => {
    const dir = await tempDir();
    const file = path.join(dir, 'nested', 'cache.json');

    const first = await LocatorCache.open(createFileStore(file));
    await first.put('https://shop.test/', 'search', entry('[data-wayfind-id="0"]'));

    expect(JSON.parse(await readFile(file, 'utf-8'))).toEqual({
      version: 2,
      pages: {
        'https://shop.test': {
          search: { locator: '[data-wayfind-id="0"]', tag: 'input', label: 'Search', frameIndex: 0 },
        },
      },
    });

    const second = await LocatorCache.open(createFileStore(file));
    expect(second.loadStatus).toEqual({ state: 'loaded', entries: 1 });
    expect(second.get('https://shop.test', 'search')).toEqual(entry('[data-wayfind-id="0"]'));
  });

  it('migrates the unversioned layout, dropping its unverifiable entries', async () => {
    const dir = await tempDir();
    const file = path.join(dir, 'cache.json');
    await writeFile(file, JSON.stringify({ 'https://shop.test': { search: '#q', cart: '#cart' } }));

    const cache = await LocatorCache.open(createFileStore(file));

    expect(cache.loadStatus).toEqual({ state: 'migrated', from: 'legacy', dropped: 2 });
    expect(cache.get('https://shop.test', 'cart')).toBeUndefined();
  });

  it('migrates a version 1 document of bare locators', async () => {
    const dir = await tempDir();
    const file = path.join(dir, 'cache.json');
    await writeFile(file, JSON.stringify({ version: 1, pages: { 'https://shop.test': { search: '#q' } } }));

    const cache = await LocatorCache.open(createFileStore(file));
    await cache.put('https://shop.test', 'cart', entry('#cart', 'Cart'));

    expect(cache.loadStatus).toEqual({ state: 'migrated', from: 'v1', dropped: 1 });
    expect(JSON.parse(await readFile(file, 'utf-8'))).toEqual({
      version: 2,
      pages: { 'https://shop.test': { cart: entry('#cart', 'Cart') } },
    });
  });

  it('resets a corrupt file to empty', async () => {
    const dir = await tempDir();
    const file = path.join(dir, 'cache.json');
    await writeFile(file, '{"version": 2, "pages": ');

    const cache = await LocatorCache.open(createFileStore(file));

    expect(cache.loadStatus).toEqual({ state: 'reset', reason: 'invalid JSON' });
    expect(cache.size).toBe(0);
  });
});

describe('parseCacheDocument', () => {
  it('rejects versions it does not know', () => {
    expect(parseCacheDocument('{"version": 3, "pages": {}}').status).toEqual({
      state: 'reset',
      reason: 'unsupported document version 3',
    });
  });

  it('rejects shapes that are neither versioned nor legacy', () => {
    expect(parseCacheDocument('[1, 2]').status).toEqual({
      state: 'reset',
      reason: 'unrecognized document shape',
    });
    expect(parseCacheDocument('{"https://shop.test": "#q"}').status.state).toBe('reset');
  });
});

describe('cache entries', () => {
  it('labels an element by aria label, then placeholder, then text', () => {
    expect(cacheEntryFor(element())).toEqual({
      locator: '[data-wayfind-id="4"]',
      tag: 'button',
      label: 'Submit',
      frameIndex: 0,
    });
    expect(cacheEntryFor(element({ tag: 'input', text: 'typed', placeholder: 'Email' })).label).toBe('Email');
    expect(cacheEntryFor(element({ ariaLabel: 'Close', placeholder: 'Email' })).label).toBe('Close');
  });

  it('only describes an element with the same frame, tag and label', () => {
    const stored = cacheEntryFor(element());

    expect(entryDescribes(stored, element({ index: 7, x: 300 }))).toBe(true);
    expect(entryDescribes(stored, element({ text: 'Cancel' }))).toBe(false);
    expect(entryDescribes(stored, element({ tag: 'a' }))).toBe(false);
    expect(entryDescribes(stored, element({ frameIndex: 1 }))).toBe(false);
  });
});
