/**
 * @jest-environment jsdom
 */

import { DEFAULT_SITE_COPY } from '../config/siteCopy.js';
import type { BusinessRecord } from '../types/Business.js';
import { existsSync } from 'fs';
import { join } from 'path';
import { buildFilterScript, FILTER_SOURCE, loadStylesheet, STYLESHEET } from './assets.js';
import { renderIndexPage } from './renderPages.js';

const records: BusinessRecord[] = [
  { name: 'Dog House', slug: 'dog-house', category: 'grooming', features: [], searchHaystack: 'dog grooming taipei' },
  { name: 'Cat Corner', slug: 'cat-corner', category: 'spa', features: [], searchHaystack: 'cat spa' },
];

function pageBody(html: string): string {
  const match = /<body>([\s\S]*)<\/body>/.exec(html);
  return match ? match[1] : '';
}

describe('buildFilterScript', () => {
  const script = buildFilterScript();

  afterEach(() => {
    document.body.innerHTML = '';
  });

  it('wraps the compiled filter in a self-starting classic script', () => {
    expect(script.startsWith('(function () {\nvar exports = {};\n')).toBe(true);
    expect(script.endsWith('exports.bindFilter(document);\n})();\n')).toBe(true);
    expect(script).not.toMatch(/^\s*(import|export) /m);
  });

  it('is deterministic', () => {
    expect(buildFilterScript()).toBe(script);
  });

  it('filters the rendered index page', () => {
    document.body.innerHTML = pageBody(
      renderIndexPage(records, { copy: DEFAULT_SITE_COPY, sourceNames: ['listing.csv', 'detail.csv'] })
    );
    new Function(script)();

    const input = document.querySelector<HTMLInputElement>('[data-search-input]');
    if (!input) throw new Error('search input not rendered');
    input.value = 'dog';
    input.dispatchEvent(new Event('input'));

    const displays = Array.from(document.querySelectorAll<HTMLElement>('[data-card]')).map((card) => card.style.display);
    expect(displays).toEqual(['', 'none']);
  });

  it('runs on a store page with no filter controls', () => {
    document.body.innerHTML = '<main class="page"><h1>Dog House</h1></main>';
    expect(() => new Function(script)()).not.toThrow();
  });
});

describe('asset sources', () => {
  it('resolves inside src/ whether run from src/ or dist/', () => {
    expect(FILTER_SOURCE).toBe(join(__dirname, '..', 'browser', 'filter.ts'));
    expect(STYLESHEET).toBe(join(__dirname, 'assets', 'style.css'));
    expect(existsSync(FILTER_SOURCE)).toBe(true);
    expect(existsSync(STYLESHEET)).toBe(true);
  });
});

describe('loadStylesheet', () => {
  it('returns the shared stylesheet', () => {
    expect(loadStylesheet()).toContain('.card-grid {');
  });
});
