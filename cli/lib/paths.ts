import path from 'path';
import type { PortfolioConfig } from './config';

/**
 * Centralized path management for the portfolio.
 * Albums, documents and the host page all live under `config.root`.
 */

export interface PortfolioPaths {
  root: string;
  hostDocument: string;
  tags: string;
  themes: string;
}

/**
 * Get all document paths for a portfolio, resolved against the working directory
 */
export function getPortfolioPaths(config: PortfolioConfig): PortfolioPaths {
  const root = path.resolve(config.root);

  return {
    root,
    hostDocument: path.resolve(root, config.hostDocument),
    tags: path.join(root, config.tagsFile),
    themes: path.join(root, config.themesFile),
  };
}

export function getAlbumDir(root: string, album: string): string {
  return path.join(root, album);
}

export function getAlbumMetaPath(albumDir: string, config: PortfolioConfig): string {
  return path.join(albumDir, config.albumMetaFile);
}

/**
 * Relative asset path as used in the host page and in tags.json
 */
export function toAssetPath(album: string, filename: string): string {
  return `${album}/${filename}`;
}
