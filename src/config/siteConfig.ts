/**
 * Generator configuration
 *
 * Loaded from environment variables (the CLI loads .env through dotenv
 * before calling this). Relative paths resolve against the working
 * directory.
 */

import { isAbsolute, resolve } from 'path';
import { DEFAULT_COLUMNS, type ColumnMap } from './columns.js';
import { DEFAULT_SITE_COPY, type SiteCopy } from './siteCopy.js';

export interface SiteConfig {
  listingPath: string;
  detailPath: string;
  outputDir: string;
  columns: ColumnMap;
  copy: SiteCopy;
}

const DEFAULT_LISTING_CSV = 'data/listing.csv';
const DEFAULT_DETAIL_CSV = 'data/detail.csv';
const DEFAULT_OUTPUT_DIR = 'docs';

function resolvePath(value: string, cwd: string): string {
  return isAbsolute(value) ? value : resolve(cwd, value);
}

function readSetting(env: NodeJS.ProcessEnv, name: string, fallback: string): string {
  const value = env[name]?.trim();
  return value ? value : fallback;
}

export function loadSiteConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): SiteConfig {
  const listingPath = resolvePath(readSetting(env, 'LISTING_CSV', DEFAULT_LISTING_CSV), cwd);
  const detailPath = resolvePath(readSetting(env, 'DETAIL_CSV', DEFAULT_DETAIL_CSV), cwd);
  const outputDir = resolvePath(readSetting(env, 'OUTPUT_DIR', DEFAULT_OUTPUT_DIR), cwd);

  if (listingPath === detailPath) {
    throw new Error(`❌ LISTING_CSV and DETAIL_CSV point at the same file: ${listingPath}`);
  }
  if (outputDir === resolve(cwd) || outputDir === resolve('/')) {
    throw new Error(`❌ OUTPUT_DIR must be a dedicated directory, got: ${outputDir}`);
  }

  return {
    listingPath,
    detailPath,
    outputDir,
    columns: DEFAULT_COLUMNS,
    copy: {
      ...DEFAULT_SITE_COPY,
      title: readSetting(env, 'SITE_TITLE', DEFAULT_SITE_COPY.title),
      lang: readSetting(env, 'SITE_LANG', DEFAULT_SITE_COPY.lang),
    },
  };
}
