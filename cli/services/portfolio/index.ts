import type { PortfolioConfig, ScannerConfig } from '../../lib/config';
import {
  ASSET_META_FIELDS,
  type AlbumMeta,
  type AlbumScan,
  type MediaType,
  type PortfolioAsset,
  type PortfolioBuild,
  type PortfolioSummary,
  type ScannedFile,
  type TagAssignments,
} from '../../lib/portfolio-types';
import { getAlbumMetaPath, getPortfolioPaths, toAssetPath } from '../../lib/paths';
import { scanPortfolio } from './scanner';
import { createTitleDeriver, type TitleInput } from './title';
import { resolveVideoThumbnail } from './thumbnail';
import { attachTags, fileMetaFor, loadAlbumMeta, loadTagAssignments, mergeAssetMeta } from './metadata';

export { scanPortfolio } from './scanner';
export { renderAssetBlock, writeHostDocument } from './renderer';

/**
 * Local calendar date of a file's modification time, YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export interface AlbumBuildContext {
  scanner: ScannerConfig;
  tags: TagAssignments;
  deriveTitle: (input: TitleInput) => string;
}

/**
 * Photos first, then videos, each in filename order
 */
export function buildAlbumAssets(scan: AlbumScan, meta: AlbumMeta | null, ctx: AlbumBuildContext): PortfolioAsset[] {
  const build = (type: MediaType, files: ScannedFile[]): PortfolioAsset[] =>
    files.map((file, i) => {
      const src = toAssetPath(scan.name, file.filename);
      const thumb = type === 'video' ? resolveVideoThumbnail(scan, file.filename, ctx.scanner) ?? src : src;

      const asset: PortfolioAsset = {
        type,
        src,
        thumb,
        title: ctx.deriveTitle({ album: scan.name, filename: file.filename, index: i + 1, total: files.length }),
        album: scan.name,
        date: formatDate(file.modifiedAt),
      };

      return attachTags(mergeAssetMeta(asset, fileMetaFor(meta, file.filename)), ctx.tags);
    });

  const assets = [...build('photo', scan.photos), ...build('video', scan.videos)];

  // The album title is rendered once, on the album's first asset
  if (meta?.albumTitle && assets.length > 0) {
    assets[0] = { ...assets[0], albumTitle: meta.albumTitle };
  }

  return assets;
}

/**
 * Scan, title, resolve thumbnails and overlay metadata for the whole portfolio
 */
export async function buildPortfolio(config: PortfolioConfig): Promise<PortfolioBuild> {
  const paths = getPortfolioPaths(config);
  const scans = await scanPortfolio(paths.root, config.scanner);

  const ctx: AlbumBuildContext = {
    scanner: config.scanner,
    tags: await loadTagAssignments(paths.tags),
    deriveTitle: createTitleDeriver(config.titles.genericPrefixes),
  };

  const assets: PortfolioAsset[] = [];
  for (const scan of scans) {
    const meta = await loadAlbumMeta(getAlbumMetaPath(scan.dir, config));
    assets.push(...buildAlbumAssets(scan, meta, ctx));
  }

  return { albums: scans.map((scan) => scan.name), assets };
}

export function summarizePortfolio(build: PortfolioBuild): PortfolioSummary {
  const { assets } = build;
  const photos = assets.filter((a) => a.type === 'photo').length;
  const videos = assets.filter((a) => a.type === 'video').length;

  return {
    albums: build.albums.length,
    photos,
    videos,
    total: assets.length,
    withMeta: assets.filter((a) => ASSET_META_FIELDS.some((field) => a[field] !== undefined)).length,
    withAlbumTitle: assets.filter((a) => a.albumTitle !== undefined).length,
    withTags: assets.filter((a) => a.tags !== undefined).length,
  };
}
