import { existsSync, mkdirSync, mkdtempSync, readdirSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join, relative } from 'path';
import { loadSiteConfig, type SiteConfig } from '../config/siteConfig.js';
import { generateSite } from './generateSite.js';

const LISTING = [
  'qBF1Pd,hfpxzc href,MW4etd,UY7F9,W4Efsd,W4Efsd (3),W4Efsd (4)',
  'Happy Paws,https://maps.example.com/a,4.8,(12),Grooming,12 Orchard Rd,Open',
  '   ,https://maps.example.com/blank,,,,,',
  'Happy Paws!,https://maps.example.com/b,4.1,(3),Grooming,88 River St,Closed',
  'Zen Spa,https://maps.example.com/c,,,Spa,,',
].join('\n');

const DETAIL = ['hfpxzc href,aoRNLd src', 'https://maps.example.com/a,https://images.example.com/a.jpg'].join('\n');

function readTree(root: string): Record<string, string> {
  const tree: Record<string, string> = {};
  const walk = (dir: string): void => {
    for (const entry of readdirSync(dir).sort()) {
      const fullPath = join(dir, entry);
      if (statSync(fullPath).isDirectory()) {
        walk(fullPath);
      } else {
        tree[relative(root, fullPath).split('\\').join('/')] = readFileSync(fullPath, 'utf-8');
      }
    }
  };
  walk(root);
  return tree;
}

describe('generateSite', () => {
  const logger = { log: jest.fn(), warn: jest.fn() };
  let dir: string;
  let config: SiteConfig;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'generate-site-'));
    writeFileSync(join(dir, 'listing.csv'), LISTING, 'utf-8');
    writeFileSync(join(dir, 'detail.csv'), DETAIL, 'utf-8');
    config = loadSiteConfig({ LISTING_CSV: 'listing.csv', DETAIL_CSV: 'detail.csv', OUTPUT_DIR: 'site' }, dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the index, one page per shop, and the shared assets', () => {
    const summary = generateSite(config, logger);

    expect(summary).toEqual({
      shopCount: 3,
      imageCount: 1,
      skippedRows: 1,
      fileCount: 6,
      outputDir: join(dir, 'site'),
    });
    expect(Object.keys(readTree(join(dir, 'site'))).sort()).toEqual([
      'assets/script.js',
      'assets/style.css',
      'index.html',
      'stores/happy-paws-2/index.html',
      'stores/happy-paws/index.html',
      'stores/zen-spa/index.html',
    ]);
  });

  it('attaches the cover image only to the matched shop', () => {
    generateSite(config, logger);
    const tree = readTree(join(dir, 'site'));

    expect(tree['stores/happy-paws/index.html']).toContain('<img src="https://images.example.com/a.jpg"');
    expect(tree['stores/happy-paws-2/index.html']).toContain('<div class="gallery placeholder">No image yet</div>');
  });

  it('produces byte-identical output on a second run', () => {
    generateSite(config, logger);
    const first = readTree(join(dir, 'site'));
    generateSite(config, logger);
    expect(readTree(join(dir, 'site'))).toEqual(first);
  });

  it('replaces stale store pages but keeps unmanaged files', () => {
    const stale = join(dir, 'site', 'stores', 'closed-shop');
    mkdirSync(stale, { recursive: true });
    writeFileSync(join(stale, 'index.html'), 'old', 'utf-8');
    writeFileSync(join(dir, 'site', 'CNAME'), 'shops.example.com', 'utf-8');

    generateSite(config, logger);

    expect(existsSync(stale)).toBe(false);
    expect(readFileSync(join(dir, 'site', 'CNAME'), 'utf-8')).toBe('shops.example.com');
  });

  it('writes a page for a shop whose name exceeds the filename limit', () => {
    const longName = '寵'.repeat(100);
    writeFileSync(join(dir, 'listing.csv'), `qBF1Pd,hfpxzc href\n${longName},\nShort,\n`, 'utf-8');

    const summary = generateSite(config, logger);
    const tree = readTree(join(dir, 'site'));

    expect(summary.shopCount).toBe(2);
    expect(tree[`stores/${'寵'.repeat(26)}/index.html`]).toContain(`<h1>${longName}</h1>`);
    expect(tree['stores/short/index.html']).toContain('<h1>Short</h1>');
  });

  it('leaves existing output untouched when an input file is missing', () => {
    mkdirSync(join(dir, 'site'));
    writeFileSync(join(dir, 'site', 'index.html'), 'previous build', 'utf-8');
    rmSync(join(dir, 'detail.csv'));

    expect(() => generateSite(config, logger)).toThrow(`❌ Detail CSV not found: ${join(dir, 'detail.csv')}`);
    expect(readTree(join(dir, 'site'))).toEqual({ 'index.html': 'previous build' });
  });
});
