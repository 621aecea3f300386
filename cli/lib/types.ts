import { z } from 'zod';

/**
 * Error thrown when a document fails to parse or fails Zod validation
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly errors?: z.ZodError
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * The portfolio root directory does not exist or is not a directory
 */
export class RootNotFoundError extends Error {
  constructor(public readonly root: string) {
    super(`Portfolio root not found: ${root}`);
    this.name = 'RootNotFoundError';
  }
}

/**
 * The host document lacks one of the markers delimiting the asset block
 */
export class MarkerNotFoundError extends Error {
  constructor(
    public readonly marker: string,
    public readonly filePath?: string
  ) {
    super(`Marker "${marker}" not found${filePath ? ` in ${filePath}` : ''}`);
    this.name = 'MarkerNotFoundError';
  }
}

export class ThemesNotFoundError extends Error {
  constructor(public readonly filePath: string) {
    super(`Theme document not found: ${filePath}`);
    this.name = 'ThemesNotFoundError';
  }
}

export class AlbumNotFoundError extends Error {
  constructor(public readonly album: string) {
    super(`No media files found in album '${album}'`);
    this.name = 'AlbumNotFoundError';
  }
}

export class EmptyPortfolioError extends Error {
  constructor(public readonly root: string) {
    super(`No media files found under ${root}`);
    this.name = 'EmptyPortfolioError';
  }
}

/**
 * Format Zod errors into a human-readable string
 */
export function formatZodErrors(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.join('.');
      return `  - ${path || 'root'}: ${e.message}`;
    })
    .join('\n');
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Invalid command-line arguments
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
