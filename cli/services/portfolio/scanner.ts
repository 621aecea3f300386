import * as fs from 'fs/promises';
import type { Stats } from 'fs';
import path from 'path';
import type { ScannerConfig } from '../../lib/config';
import type { AlbumScan, MediaType, ScannedFile } from '../../lib/portfolio-types';
import { RootNotFoundError, errorMessage } from '../../lib/types';
import { getAlbumDir } from '../../lib/paths';
import { logger } from '../../utils/logger';

const log = logger.child('scanner');

/**
 * Code-unit order, so the same tree sorts identically on every machine
 */
export function sortNames(names: readonly string[]): string[] {
  return [...names].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
}

export function splitFilename(filename: string): { stem: string; ext: string } {
  const ext = path.extname(filename);
  return { stem: filename.slice(0, filename.length - ext.length), ext };
}

export function isReservedPoster(filename: string, config: ScannerConfig): boolean {
  const lower = filename.toLowerCase();
  return config.posterNames.some((name) => name.toLowerCase() === lower);
}

export function hasPosterSuffix(filename: string, config: ScannerConfig): boolean {
  return splitFilename(filename).stem.toLowerCase().endsWith(config.posterSuffix.toLowerCase());
}

export function classifyFile(filename: string, config: ScannerConfig): MediaType | null {
  if (isReservedPoster(filename, config) || hasPosterSuffix(filename, config)) {
    return null;
  }

  const ext = splitFilename(filename).ext.toLowerCase();
  if (config.photoExtensions.includes(ext)) return 'photo';
  if (config.videoExtensions.includes(ext)) return 'video';
  return null;
}

/**
 * List album directories directly under the root, skipping hidden and ignored ones
 */
export async function listAlbums(root: string, config: ScannerConfig): Promise<string[]> {
  let stat: Stats;
  try {
    stat = await fs.stat(root);
  } catch {
    throw new RootNotFoundError(root);
  }
  if (!stat.isDirectory()) {
    throw new RootNotFoundError(root);
  }

  const entries = await fs.readdir(root, { withFileTypes: true });
  const albums = entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .filter((name) => !name.startsWith('.') && !config.ignoreDirs.includes(name));

  return sortNames(albums);
}

export async function scanAlbum(root: string, album: string, config: ScannerConfig): Promise<AlbumScan> {
  const dir = getAlbumDir(root, album);
  const scan: AlbumScan = { name: album, dir, files: [], photos: [], videos: [], ignored: [] };

  for (const filename of sortNames(await fs.readdir(dir))) {
    let stat: Stats;
    try {
      stat = await fs.stat(path.join(dir, filename));
    } catch (error) {
      log.debug('Skipping unreadable entry', { album, filename, reason: errorMessage(error) });
      continue;
    }
    if (!stat.isFile()) continue;

    scan.files.push(filename);

    const type = classifyFile(filename, config);
    const file: ScannedFile = { filename, modifiedAt: stat.mtime };
    if (type === 'photo') {
      scan.photos.push(file);
    } else if (type === 'video') {
      scan.videos.push(file);
    } else {
      scan.ignored.push(filename);
    }
  }

  return scan;
}

/**
 * Walk every album of the portfolio in sorted order
 */
export async function scanPortfolio(root: string, config: ScannerConfig): Promise<AlbumScan[]> {
  const scans: AlbumScan[] = [];
  for (const album of await listAlbums(root, config)) {
    scans.push(await scanAlbum(root, album, config));
  }
  return scans;
}
