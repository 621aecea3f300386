/**
 * Portfolio asset types and the schemas of the JSON documents kept beside the albums
 */

import { z } from 'zod';

export type MediaType = 'photo' | 'video';

/**
 * Optional per-file fields an album's meta.json may carry
 */
export const AssetMetaSchema = z.object({
  caption: z.string().optional(),
  credit: z.string().optional(),
  featured: z.boolean().optional(),
  order: z.number().optional(),
  layout: z.string().optional(),
});

export const AlbumMetaSchema = z.object({
  albumTitle: z.string().nullish(),
  assets: z.record(AssetMetaSchema).optional(),
});

/**
 * tags.json: "{album}/{filename}" -> ordered tag list
 */
export const TagAssignmentsSchema = z.record(z.array(z.string()));

export const ThemeSchema = z.object({
  tag: z.string().min(1),
  label: z.string(),
  keywords: z.array(z.string()),
});

export const ThemesSchema = z.array(ThemeSchema);

export type AssetMeta = z.infer<typeof AssetMetaSchema>;
export type AlbumMeta = z.infer<typeof AlbumMetaSchema>;
export type TagAssignments = z.infer<typeof TagAssignmentsSchema>;
export type Theme = z.infer<typeof ThemeSchema>;

/**
 * Field order of the optional metadata copied from meta.json
 */
export const ASSET_META_FIELDS = ['caption', 'credit', 'featured', 'order', 'layout'] as const;

export interface ScannedFile {
  filename: string;
  modifiedAt: Date;
}

export interface AlbumScan {
  name: string;
  dir: string;
  /** Every regular file in the album, sorted */
  files: string[];
  photos: ScannedFile[];
  videos: ScannedFile[];
  /** Reserved posters, generated posters and unsupported files */
  ignored: string[];
}

export interface PortfolioAsset extends AssetMeta {
  type: MediaType;
  src: string;
  thumb: string;
  title: string;
  album: string;
  date: string;
  albumTitle?: string;
  tags?: string[];
}

export interface PortfolioBuild {
  albums: string[];
  assets: PortfolioAsset[];
}

export interface PortfolioSummary {
  albums: number;
  photos: number;
  videos: number;
  total: number;
  withMeta: number;
  withAlbumTitle: number;
  withTags: number;
}
