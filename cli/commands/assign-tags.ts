#!/usr/bin/env node
/**
 * Assign theme tags to every photo and video by matching filename words
 * against the keywords of the theme document.
 *
 * Outputs: tags.json at the portfolio root
 * Usage:
 *   npm run assign-tags -- [--album 70s] [--dry-run]
 */

import fs from 'fs-extra';
import * as dotenv from 'dotenv';

dotenv.config({ path: '.env.local' });
dotenv.config(); // Fallback to .env
import { ConfigManager, type PortfolioConfig } from '../lib/config';
import { getPortfolioPaths } from '../lib/paths';
import { TagAssignmentsSchema, type TagAssignments } from '../lib/portfolio-types';
import { AlbumNotFoundError, errorMessage } from '../lib/types';
import { scanPortfolio } from '../services/portfolio';
import { readOptionalDocument } from '../services/portfolio/metadata';
import {
  assignTagsByKeywords,
  collectTaggableItems,
  computeTagStats,
  formatBar,
  loadThemes,
  mergeTagAssignments,
  type TagStats,
} from '../services/tags';
import { hasFlag, readFlagValue } from '../utils/cli-args';
import { logger } from '../utils/logger';

export interface AssignTagsOptions {
  album?: string;
  dryRun?: boolean;
  config?: PortfolioConfig;
}

export interface AssignTagsResult {
  assignments: TagAssignments;
  stats: TagStats;
  outputPath: string;
  written: boolean;
}

/**
 * Existing assignments a single-album run merges into. A malformed document is
 * not overwritten, since that would drop the other albums' tags.
 */
async function loadExistingAssignments(tagsPath: string): Promise<TagAssignments> {
  const read = await readOptionalDocument(tagsPath, TagAssignmentsSchema);
  if (read.status === 'invalid') {
    throw new Error(`Refusing to merge into malformed tag document ${tagsPath}: ${read.reason}`);
  }
  return read.status === 'ok' ? read.data : {};
}

function printStats(stats: TagStats): void {
  console.log('[ASSIGN-TAGS] Tag summary:');
  for (const theme of stats.themes) {
    console.log(`  [${theme.tag.padEnd(20)}] ${String(theme.count).padStart(4)}  ${formatBar(theme.count, 3, 25)}`);
    for (const example of theme.examples.slice(0, 3)) {
      console.log(`    · ${example}`);
    }
  }
  if (stats.untagged) {
    console.log(`  Untagged: ${stats.untagged} file(s)`);
  }
  console.log(`  Total: ${stats.total} file(s), ${stats.tagged} tagged, ${stats.untagged} untagged`);
}

export async function runAssignTags(options: AssignTagsOptions = {}): Promise<AssignTagsResult> {
  const config = options.config ?? (await ConfigManager.loadPortfolioConfig());
  logger.setLevel(config.logLevel);
  const paths = getPortfolioPaths(config);

  const themes = await loadThemes(paths.themes);
  console.log(`[ASSIGN-TAGS] ${themes.length} theme(s) loaded from ${paths.themes}`);

  let items = collectTaggableItems(await scanPortfolio(paths.root, config.scanner));
  if (options.album !== undefined) {
    items = items.filter((item) => item.album === options.album);
    if (items.length === 0) {
      throw new AlbumNotFoundError(options.album);
    }
  }
  console.log(`[ASSIGN-TAGS] ${items.length} file(s) to process`);

  let assignments = assignTagsByKeywords(items, themes);
  if (options.album !== undefined) {
    assignments = mergeTagAssignments(await loadExistingAssignments(paths.tags), assignments);
  }

  const stats = computeTagStats(assignments, themes);
  printStats(stats);

  if (options.dryRun) {
    console.log('[ASSIGN-TAGS] Dry run, tags.json not written');
    return { assignments, stats, outputPath: paths.tags, written: false };
  }

  await fs.writeJson(paths.tags, assignments, { spaces: 2 });
  console.log(`[ASSIGN-TAGS] ✓ Output: ${paths.tags}`);

  return { assignments, stats, outputPath: paths.tags, written: true };
}

export function parseAssignTagsArgs(args: readonly string[]): AssignTagsOptions {
  return {
    album: readFlagValue(args, '--album'),
    dryRun: hasFlag(args, '--dry-run'),
  };
}

async function main(args: readonly string[] = process.argv.slice(2)): Promise<void> {
  try {
    await runAssignTags(parseAssignTagsArgs(args));
  } catch (error) {
    console.error('[ASSIGN-TAGS] ✗ Error:', errorMessage(error));
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
