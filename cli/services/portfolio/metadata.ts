import fs from 'fs-extra';
import { z } from 'zod';
import {
  AlbumMetaSchema,
  TagAssignmentsSchema,
  type AlbumMeta,
  type AssetMeta,
  type PortfolioAsset,
  type TagAssignments,
} from '../../lib/portfolio-types';
import { errorMessage, formatZodErrors } from '../../lib/types';
import { logger } from '../../utils/logger';

const log = logger.child('metadata');

type DocumentRead<T> = { status: 'missing' } | { status: 'invalid'; reason: string } | { status: 'ok'; data: T };

/**
 * Read an optional JSON document; a parse or schema failure is reported, not thrown
 */
export async function readOptionalDocument<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S
): Promise<DocumentRead<z.infer<S>>> {
  if (!(await fs.pathExists(filePath))) {
    return { status: 'missing' };
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(filePath, { encoding: 'utf-8' });
  } catch (error) {
    return { status: 'invalid', reason: errorMessage(error) };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    return { status: 'invalid', reason: `\n${formatZodErrors(result.error)}` };
  }
  return { status: 'ok', data: result.data };
}

/**
 * Load an album's meta.json. A malformed document counts as no metadata for that album only.
 */
export async function loadAlbumMeta(metaPath: string): Promise<AlbumMeta | null> {
  const read = await readOptionalDocument(metaPath, AlbumMetaSchema);
  if (read.status === 'invalid') {
    log.warn(`Ignoring malformed album metadata ${metaPath}: ${read.reason}`);
    return null;
  }
  return read.status === 'ok' ? read.data : null;
}

/**
 * Load the global tag assignment. A malformed document means no tags at all.
 */
export async function loadTagAssignments(tagsPath: string): Promise<TagAssignments> {
  const read = await readOptionalDocument(tagsPath, TagAssignmentsSchema);
  if (read.status === 'invalid') {
    log.warn(`Ignoring malformed tag document ${tagsPath}: ${read.reason}`);
    return {};
  }
  return read.status === 'ok' ? read.data : {};
}

/**
 * Copy the optional fields that are present; absent ones stay unset
 */
export function mergeAssetMeta(asset: PortfolioAsset, meta: AssetMeta | undefined): PortfolioAsset {
  if (!meta) return asset;

  const merged: PortfolioAsset = { ...asset };
  if (meta.caption !== undefined) merged.caption = meta.caption;
  if (meta.credit !== undefined) merged.credit = meta.credit;
  if (meta.featured !== undefined) merged.featured = meta.featured;
  if (meta.order !== undefined) merged.order = meta.order;
  if (meta.layout !== undefined) merged.layout = meta.layout;
  return merged;
}

/**
 * Exact-key lookup: no case folding or Unicode normalization
 */
export function fileMetaFor(albumMeta: AlbumMeta | null, filename: string): AssetMeta | undefined {
  const assets = albumMeta?.assets;
  if (!assets || !Object.prototype.hasOwnProperty.call(assets, filename)) return undefined;
  return assets[filename];
}

export function attachTags(asset: PortfolioAsset, tags: TagAssignments): PortfolioAsset {
  if (!Object.prototype.hasOwnProperty.call(tags, asset.src)) return asset;
  return { ...asset, tags: [...tags[asset.src]] };
}
