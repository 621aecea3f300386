import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import type { z } from 'zod';
import { PortfolioConfigSchema, type PortfolioConfig } from '../../cli/lib/config';

/** Local noon, so the rendered date does not depend on the machine's time zone */
export const FIXED_DATE = new Date(2024, 0, 15, 12);

export const HOST_BEFORE = ['<html>', '<body>', '<script>', ''].join('\n');
export const HOST_AFTER = ['', 'renderGallery(ASSETS);', '</script>', '</body>', '</html>', ''].join('\n');

export const HOST_TEMPLATE = `${HOST_BEFORE}// ASSETS:START\nconst ASSETS = [];\n// ASSETS:END${HOST_AFTER}`;

export async function createTempRoot(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Create an empty media file with a fixed modification time
 */
export async function writeMedia(root: string, relPath: string, date: Date = FIXED_DATE): Promise<string> {
  const filePath = path.join(root, relPath);
  await fs.outputFile(filePath, 'placeholder');
  await fs.utimes(filePath, date, date);
  return filePath;
}

export function testConfig(root: string, overrides: z.input<typeof PortfolioConfigSchema> = {}): PortfolioConfig {
  return PortfolioConfigSchema.parse({ ...overrides, root });
}
