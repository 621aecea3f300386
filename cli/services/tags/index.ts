/**
 * Theme tagging services
 */

export * from './keyword-tagger';
export * from './themes';
export * from './vocabulary';

import type { AlbumScan } from '../../lib/portfolio-types';
import { toAssetPath } from '../../lib/paths';
import { splitFilename } from '../portfolio/scanner';
import type { TaggableItem } from './keyword-tagger';

/**
 * Photos and videos of the scanned albums, album-major and in filename order
 */
export function collectTaggableItems(scans: readonly AlbumScan[]): TaggableItem[] {
  const items: TaggableItem[] = [];

  for (const scan of scans) {
    const media = new Set([...scan.photos, ...scan.videos].map((file) => file.filename));
    for (const filename of scan.files) {
      if (!media.has(filename)) continue;
      items.push({
        album: scan.name,
        filename,
        stem: splitFilename(filename).stem,
        path: toAssetPath(scan.name, filename),
      });
    }
  }

  return items;
}
