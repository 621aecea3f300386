import type { ScannerConfig } from '../../lib/config';
import type { AlbumScan } from '../../lib/portfolio-types';
import { toAssetPath } from '../../lib/paths';
import { classifyFile, splitFilename } from './scanner';

const POSTER_EXTENSIONS = ['.jpg', '.jpeg', '.png'];

export type AlbumFiles = Pick<AlbumScan, 'name' | 'files'>;

/**
 * Pick the poster image shown for a video:
 *   1. {video-stem}_poster.jpg|jpeg|png next to the video
 *   2. the album's reserved poster/cover, in configured preference order
 *   3. the first regular photo of the album
 * Returns null when the album offers none of them.
 */
export function resolveVideoThumbnail(
  album: AlbumFiles,
  videoFilename: string,
  config: ScannerConfig
): string | null {
  const byLowerName = new Map<string, string>();
  for (const filename of album.files) {
    const lower = filename.toLowerCase();
    if (!byLowerName.has(lower)) byLowerName.set(lower, filename);
  }

  const { stem } = splitFilename(videoFilename);
  for (const ext of POSTER_EXTENSIONS) {
    const match = byLowerName.get(`${stem}${config.posterSuffix}${ext}`.toLowerCase());
    if (match) return toAssetPath(album.name, match);
  }

  for (const posterName of config.posterNames) {
    const match = byLowerName.get(posterName.toLowerCase());
    if (match) return toAssetPath(album.name, match);
  }

  // classifyFile already rules out reserved and generated posters
  const firstPhoto = album.files.find((filename) => classifyFile(filename, config) === 'photo');
  return firstPhoto ? toAssetPath(album.name, firstPhoto) : null;
}
