import { basename } from 'path';
import type { SiteConfig } from '../config/siteConfig.js';
import { loadBusinesses } from '../join/loadBusinesses.js';
import type { Logger } from '../types/Logger.js';
import { buildSiteFiles, writeSite } from './writeSite.js';

export interface GenerateSummary {
  shopCount: number;
  imageCount: number;
  skippedRows: number;
  fileCount: number;
  outputDir: string;
}

/**
 * Load, join, render, write. Rendering finishes in memory before the first
 * write, so an input error leaves the previous output untouched.
 */
export function generateSite(config: SiteConfig, logger: Logger = console): GenerateSummary {
  const { records, skippedRows, imageCount } = loadBusinesses({
    listingPath: config.listingPath,
    detailPath: config.detailPath,
    columns: config.columns,
    logger,
  });

  const files = buildSiteFiles(records, {
    copy: config.copy,
    sourceNames: [basename(config.listingPath), basename(config.detailPath)],
  });

  writeSite(config.outputDir, files);
  logger.log(`[generate] ✅ Generated ${records.length} shop pages in ${config.outputDir}`);

  return {
    shopCount: records.length,
    imageCount,
    skippedRows,
    fileCount: files.length,
    outputDir: config.outputDir,
  };
}
