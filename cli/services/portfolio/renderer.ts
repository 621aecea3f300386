import fs from 'fs-extra';
import type { Markers } from '../../lib/config';
import type { PortfolioAsset } from '../../lib/portfolio-types';
import { MarkerNotFoundError } from '../../lib/types';

const ALBUM_RULE = '─'.repeat(45);

/**
 * Quote a string as a single-quoted JS literal that is safe inside a <script> element
 */
export function toJsString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\r/g, '\\r')
    .replace(/\n/g, '\\n')
    .replace(/\u2028/g, '\\u2028')
    .replace(/\u2029/g, '\\u2029')
    .replace(/<\//g, '<\\/');
  return `'${escaped}'`;
}

export function renderAssetRecord(asset: PortfolioAsset): string {
  const fields = [
    `    type:  ${toJsString(asset.type)}`,
    `    src:   ${toJsString(asset.src)}`,
    `    thumb: ${toJsString(asset.thumb)}`,
    `    title: ${toJsString(asset.title)}`,
    `    album: ${toJsString(asset.album)}`,
    `    date:  ${toJsString(asset.date)}`,
  ];

  if (asset.albumTitle) fields.push(`    albumTitle: ${toJsString(asset.albumTitle)}`);
  if (asset.caption !== undefined) fields.push(`    caption:  ${toJsString(asset.caption)}`);
  if (asset.credit !== undefined) fields.push(`    credit:   ${toJsString(asset.credit)}`);
  if (asset.featured) fields.push('    featured: true');
  if (asset.order !== undefined) fields.push(`    order:    ${asset.order}`);
  if (asset.layout !== undefined) fields.push(`    layout:   ${toJsString(asset.layout)}`);
  if (asset.tags && asset.tags.length > 0) {
    fields.push(`    tags:     [${asset.tags.map(toJsString).join(', ')}]`);
  }

  return ['  {', fields.join(',\n'), '  }'].join('\n');
}

/**
 * Render the whole marker-delimited block. Output depends only on the asset list.
 */
export function renderAssetBlock(assets: readonly PortfolioAsset[], markers: Markers): string {
  const lines = [markers.start, 'const ASSETS = ['];
  let currentAlbum: string | null = null;

  for (const asset of assets) {
    if (asset.album !== currentAlbum) {
      currentAlbum = asset.album;
      lines.push('', `  // ── Album: ${asset.album} ${ALBUM_RULE}`);
    }
    lines.push(`${renderAssetRecord(asset)},`);
  }

  lines.push('];', markers.end);
  return lines.join('\n');
}

/**
 * Offset of the first line at or after `from` whose only content is the marker.
 * Marker text inside a rendered string literal never matches.
 */
export function findMarkerLine(document: string, marker: string, from = 0): number {
  let lineStart = from;

  while (lineStart <= document.length) {
    const newline = document.indexOf('\n', lineStart);
    const line = document.slice(lineStart, newline === -1 ? document.length : newline);
    if (line.trim() === marker) {
      return lineStart + line.indexOf(marker);
    }
    if (newline === -1) break;
    lineStart = newline + 1;
  }

  return -1;
}

/**
 * Replace everything from the start marker line through the first end marker line after it
 */
export function spliceAssetBlock(document: string, block: string, markers: Markers, filePath?: string): string {
  const startIndex = findMarkerLine(document, markers.start);
  if (startIndex === -1) {
    throw new MarkerNotFoundError(markers.start, filePath);
  }

  const afterStart = document.indexOf('\n', startIndex);
  const endIndex = afterStart === -1 ? -1 : findMarkerLine(document, markers.end, afterStart + 1);
  if (endIndex === -1) {
    throw new MarkerNotFoundError(markers.end, filePath);
  }

  return document.slice(0, startIndex) + block + document.slice(endIndex + markers.end.length);
}

export interface HostWriteResult {
  changed: boolean;
}

/**
 * Splice the block into the host document, replacing it through a temp file and rename.
 * Nothing is written when a marker is missing or the content is unchanged.
 */
export async function writeHostDocument(
  filePath: string,
  block: string,
  markers: Markers
): Promise<HostWriteResult> {
  const current = await fs.readFile(filePath, 'utf-8');
  const updated = spliceAssetBlock(current, block, markers, filePath);

  if (updated === current) {
    return { changed: false };
  }

  const tempPath = `${filePath}.tmp`;
  await fs.writeFile(tempPath, updated, 'utf-8');
  await fs.rename(tempPath, filePath);
  return { changed: true };
}
