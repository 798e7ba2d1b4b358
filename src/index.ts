#!/usr/bin/env npx tsx
/**
 * Regenerate the directory site from the configured listing and detail CSVs.
 * Takes no arguments; see .env.example for the settings.
 */

import 'dotenv/config';
import { loadSiteConfig } from './config/siteConfig.js';
import { generateSite } from './site/generateSite.js';

async function main() {
  console.log('Shop Directory Site Generator');
  const config = loadSiteConfig();
  generateSite(config);
}

main().catch((err) => {
  console.error('[generate] Unhandled error:', err instanceof Error ? err.message : err);
  console.error('[generate] Generation aborted; do not publish the output directory until a run succeeds.');
  process.exit(1);
});
