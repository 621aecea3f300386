#!/usr/bin/env node
/**
 * Regenerate the asset list embedded in the portfolio page.
 *
 * Scans every album, derives titles and video posters, overlays meta.json and
 * tags.json, then rewrites the block between the ASSETS markers.
 * Usage:
 *   npm run update -- [--dry-run]
 */

import * as dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config(); // Fallback to .env
import { ConfigManager, type PortfolioConfig } from '../lib/config';
import { getPortfolioPaths } from '../lib/paths';
import type { PortfolioSummary } from '../lib/portfolio-types';
import { EmptyPortfolioError, errorMessage } from '../lib/types';
import { buildPortfolio, renderAssetBlock, summarizePortfolio, writeHostDocument } from '../services/portfolio';
import { hasFlag } from '../utils/cli-args';
import { logger } from '../utils/logger';

export interface UpdateOptions {
  dryRun?: boolean;
  config?: PortfolioConfig;
}

export interface UpdateResult {
  summary: PortfolioSummary;
  block: string;
  hostDocument: string;
  changed: boolean;
}

function printSummary(albums: string[], summary: PortfolioSummary): void {
  console.log(`[UPDATE] Albums found: ${albums.join(', ') || '(none)'}`);
  console.log(`[UPDATE] Photos: ${summary.photos} | Videos: ${summary.videos} | Total: ${summary.total}`);
  if (summary.withMeta) {
    console.log(`[UPDATE] Assets with metadata: ${summary.withMeta}`);
  }
  if (summary.withAlbumTitle) {
    console.log(`[UPDATE] Albums with custom title: ${summary.withAlbumTitle}`);
  }
  if (summary.withTags) {
    console.log(`[UPDATE] Assets with tags: ${summary.withTags}`);
  }
}

export async function runUpdate(options: UpdateOptions = {}): Promise<UpdateResult> {
  const config = options.config ?? (await ConfigManager.loadPortfolioConfig());
  logger.setLevel(config.logLevel);
  const paths = getPortfolioPaths(config);

  console.log(`[UPDATE] Scanning ${paths.root}...`);
  const build = await buildPortfolio(config);
  const summary = summarizePortfolio(build);
  printSummary(build.albums, summary);

  if (summary.total === 0) {
    throw new EmptyPortfolioError(paths.root);
  }

  const block = renderAssetBlock(build.assets, config.markers);

  if (options.dryRun) {
    console.log('[UPDATE] Dry run, no files were modified');
    return { summary, block, hostDocument: paths.hostDocument, changed: false };
  }

  console.log(`[UPDATE] Updating ${paths.hostDocument}...`);
  const { changed } = await writeHostDocument(paths.hostDocument, block, config.markers);
  console.log(changed ? '[UPDATE] ✓ Asset list updated' : '[UPDATE] ✓ Asset list already up to date');

  return { summary, block, hostDocument: paths.hostDocument, changed };
}

export function parseUpdateArgs(args: readonly string[]): UpdateOptions {
  return { dryRun: hasFlag(args, '--dry-run') };
}

async function main(args: readonly string[] = process.argv.slice(2)): Promise<void> {
  try {
    await runUpdate(parseUpdateArgs(args));
  } catch (error) {
    console.error('[UPDATE] ✗ Error:', errorMessage(error));
    if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    process.exit(1);
  }
}

// Run if called directly
if (require.main === module) {
  void main();
}

export default main;
