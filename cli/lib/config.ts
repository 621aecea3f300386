import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { formatZodErrors, isNodeError, errorMessage } from './types';

/**
 * Zod schema for the filesystem scanner
 */
const ScannerConfigSchema = z.object({
  photoExtensions: z.array(z.string()).default(['.jpg', '.jpeg', '.png', '.webp', '.gif', '.avif']),
  videoExtensions: z.array(z.string()).default(['.mp4', '.mov', '.webm', '.avi']),
  // Preference order matters: the first one present becomes the album cover
  posterNames: z
    .array(z.string())
    .default(['poster.jpg', 'poster.jpeg', 'poster.png', 'cover.jpg', 'cover.jpeg', 'cover.png']),
  posterSuffix: z.string().min(1).default('_poster'),
  ignoreDirs: z.array(z.string()).default(['__pycache__', '.DS_Store', '.git', 'thumbs', 'node_modules']),
});

export type ScannerConfig = z.infer<typeof ScannerConfigSchema>;

const TitleConfigSchema = z.object({
  genericPrefixes: z
    .array(z.string())
    .default([
      'gemini generated image',
      'grok video',
      'magnifics mystic',
      'download',
      'image',
      'photo',
      'img',
      'file',
      'untitled',
      'screenshot',
      'captura de pantalla',
    ]),
});

const MarkersSchema = z.object({
  start: z.string().trim().min(1).default('// ASSETS:START'),
  end: z.string().trim().min(1).default('// ASSETS:END'),
});

export type Markers = z.infer<typeof MarkersSchema>;

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Zod schema for portfolio configuration
 */
export const PortfolioConfigSchema = z.object({
  root: z.string().default('.'),
  hostDocument: z.string().default('portfolio.html'),
  albumMetaFile: z.string().default('meta.json'),
  tagsFile: z.string().default('tags.json'),
  themesFile: z.string().default('proposed_themes.json'),
  markers: MarkersSchema.default({}),
  scanner: ScannerConfigSchema.default({}),
  titles: TitleConfigSchema.default({}),
  logLevel: LogLevelSchema.default('info'),
});

export type PortfolioConfig = z.infer<typeof PortfolioConfigSchema>;

export const StopwordsSchema = z.array(z.string());

export function defaultConfigDir(): string {
  return path.join(process.cwd(), 'config');
}

/**
 * Configuration manager for loading and validating config files
 */
export class ConfigManager {
  private static configCache: Map<string, unknown> = new Map();

  /**
   * Load and validate a configuration file
   */
  static async load<S extends z.ZodTypeAny>(
    configName: string,
    schema: S,
    configDir: string = defaultConfigDir()
  ): Promise<z.infer<S>> {
    const configPath = path.join(configDir, `${configName}.json`);

    let processed = this.configCache.get(configPath);
    if (processed === undefined) {
      let content: string;
      try {
        content = await fs.readFile(configPath, 'utf-8');
      } catch (error) {
        if (isNodeError(error) && error.code === 'ENOENT') {
          throw new Error(`Configuration file not found: ${configPath}`);
        }
        throw new Error(`Failed to load configuration ${configName}: ${errorMessage(error)}`);
      }

      try {
        processed = this.replaceEnvVars(JSON.parse(content));
      } catch (error) {
        throw new Error(`Failed to load configuration ${configName}: ${errorMessage(error)}`);
      }
      this.configCache.set(configPath, processed);
    }

    const result = schema.safeParse(processed);
    if (!result.success) {
      throw new Error(`Configuration validation failed for ${configName}:\n${formatZodErrors(result.error)}`);
    }
    return result.data;
  }

  /**
   * Load portfolio configuration, then apply environment overrides
   */
  static async loadPortfolioConfig(configDir?: string): Promise<PortfolioConfig> {
    const config = await this.load('portfolio.config', PortfolioConfigSchema, configDir);
    return this.applyEnvOverrides(config);
  }

  static async loadStopwords(configDir?: string): Promise<string[]> {
    return this.load('stopwords', StopwordsSchema, configDir);
  }

  /**
   * Clear configuration cache
   */
  static clearCache(): void {
    this.configCache.clear();
  }

  static applyEnvOverrides(config: PortfolioConfig, env: NodeJS.ProcessEnv = process.env): PortfolioConfig {
    const logLevel = LogLevelSchema.safeParse(env.LOG_LEVEL);
    return {
      ...config,
      root: env.PORTFOLIO_ROOT || config.root,
      hostDocument: env.PORTFOLIO_HTML || config.hostDocument,
      logLevel: logLevel.success ? logLevel.data : config.logLevel,
    };
  }

  /**
   * Replace environment variable placeholders in config
   */
  private static replaceEnvVars(value: unknown): unknown {
    if (typeof value === 'string') {
      // Replace ${VAR_NAME} with process.env.VAR_NAME
      return value.replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
        const envValue = process.env[varName];
        if (envValue === undefined) {
          throw new Error(`Environment variable ${varName} is not defined`);
        }
        return envValue;
      });
    }

    if (Array.isArray(value)) {
      return value.map((item) => this.replaceEnvVars(item));
    }

    if (value !== null && typeof value === 'object') {
      const result: Record<string, unknown> = {};
      for (const [key, item] of Object.entries(value)) {
        result[key] = this.replaceEnvVars(item);
      }
      return result;
    }

    return value;
  }
}
