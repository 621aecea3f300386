import fs from 'fs-extra';
import { ThemesSchema, type Theme } from '../../lib/portfolio-types';
import { ThemesNotFoundError, ValidationError, formatZodErrors } from '../../lib/types';

/**
 * Load the theme document. Unlike album metadata, assign-tags cannot proceed without it.
 */
export async function loadThemes(themesPath: string): Promise<Theme[]> {
  if (!(await fs.pathExists(themesPath))) {
    throw new ThemesNotFoundError(themesPath);
  }

  let raw: unknown;
  try {
    raw = await fs.readJson(themesPath, { encoding: 'utf-8' });
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ValidationError(`Invalid theme document ${themesPath}: ${error.message}`);
    }
    throw error;
  }

  const result = ThemesSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(
      `Invalid theme document ${themesPath}:\n${formatZodErrors(result.error)}`,
      result.error
    );
  }

  return result.data.map((theme) => ({
    ...theme,
    keywords: theme.keywords.map((keyword) => keyword.toLowerCase()),
  }));
}
