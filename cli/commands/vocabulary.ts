#!/usr/bin/env node
/**
 * Print the most frequent descriptive words of all asset filenames,
 * the starting point for writing the theme document by hand.
 * Usage:
 *   npm run vocabulary -- [--limit 30]
 */

import * as dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config(); // Fallback to .env
import { ConfigManager, type PortfolioConfig } from '../lib/config';
import { getPortfolioPaths } from '../lib/paths';
import { EmptyPortfolioError, errorMessage } from '../lib/types';
import { scanPortfolio } from '../services/portfolio';
import { collectTaggableItems, extractVocabulary, formatBar, type WordCount } from '../services/tags';
import { readPositiveInt } from '../utils/cli-args';
import { logger } from '../utils/logger';

const DEFAULT_LIMIT = 30;

export interface VocabularyOptions {
  limit?: number;
  config?: PortfolioConfig;
  stopwords?: string[];
}

export interface VocabularyResult {
  albums: number;
  files: number;
  words: WordCount[];
}

export async function runVocabulary(options: VocabularyOptions = {}): Promise<VocabularyResult> {
  const config = options.config ?? (await ConfigManager.loadPortfolioConfig());
  logger.setLevel(config.logLevel);
  const { limit = DEFAULT_LIMIT } = options;
  const paths = getPortfolioPaths(config);

  console.log('[VOCABULARY] Scanning filenames...');
  const scans = await scanPortfolio(paths.root, config.scanner);
  const items = collectTaggableItems(scans);
  console.log(`[VOCABULARY] ${scans.length} album(s), ${items.length} file(s)`);

  if (items.length === 0) {
    throw new EmptyPortfolioError(paths.root);
  }

  const stopwords = options.stopwords ?? (await ConfigManager.loadStopwords());
  const words = extractVocabulary(
    items.map((item) => item.stem),
    stopwords
  );

  console.log(`[VOCABULARY] Top ${Math.min(limit, words.length)} words:`);
  for (const { word, count } of words.slice(0, limit)) {
    console.log(`   ${word.padEnd(20)} ${String(count).padStart(4)}  ${formatBar(count, 2, 30)}`);
  }
  console.log(`[VOCABULARY] Unique words: ${words.length}`);

  return { albums: scans.length, files: items.length, words };
}

export function parseVocabularyArgs(args: readonly string[]): VocabularyOptions {
  return { limit: readPositiveInt(args, '--limit') };
}

async function main(args: readonly string[] = process.argv.slice(2)): Promise<void> {
  try {
    await runVocabulary(parseVocabularyArgs(args));
  } catch (error) {
    console.error('[VOCABULARY] ✗ Error:', errorMessage(error));
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
