import { mkdirSync, rmSync, writeFileSync } from 'fs';
import { dirname, join } from 'path';
import type { BusinessRecord } from '../types/Business.js';
import { buildFilterScript, loadStylesheet } from './assets.js';
import { renderIndexPage, renderStorePage, type PageContext } from './renderPages.js';

export interface SiteFile {
  /** POSIX path relative to the output directory */
  path: string;
  contents: string;
}

/** Entries of the output directory owned by the generator */
export const MANAGED_OUTPUTS = ['index.html', 'stores', 'assets'] as const;

export function buildSiteFiles(records: readonly BusinessRecord[], context: PageContext): SiteFile[] {
  return [
    { path: 'index.html', contents: renderIndexPage(records, context) },
    ...records.map((record) => ({
      path: `stores/${record.slug}/index.html`,
      contents: renderStorePage(record, context),
    })),
    { path: 'assets/style.css', contents: loadStylesheet() },
    { path: 'assets/script.js', contents: buildFilterScript() },
  ];
}

/**
 * Replace the managed outputs of a previous run with `files`.
 * Anything else in outputDir (CNAME, .nojekyll, ...) is kept.
 */
export function writeSite(outputDir: string, files: readonly SiteFile[]): void {
  mkdirSync(outputDir, { recursive: true });
  for (const entry of MANAGED_OUTPUTS) {
    rmSync(join(outputDir, entry), { recursive: true, force: true });
  }

  for (const file of files) {
    const target = join(outputDir, ...file.path.split('/'));
    mkdirSync(dirname(target), { recursive: true });
    writeFileSync(target, file.contents, 'utf-8');
  }
}
