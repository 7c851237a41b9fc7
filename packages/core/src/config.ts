/**
 * Configuration - Directory defaults and engine option validation
 *
 * Directory structure:
 *   $PKGMETA_HOME/
 *     templates/
 *       defaults.yaml           - Default template
 *       providers/<name>.yaml   - Flat provider templates
 *       providers/<name>/       - Hierarchical provider templates
 *         default.yaml
 *         <version>.yaml
 *
 * Environment variables:
 *   PKGMETA_HOME          - Override the base directory for all pkgmeta data
 *   PKGMETA_TEMPLATES_DIR - Override the template root specifically
 *   PKGMETA_LOG_LEVEL     - Log level (fatal, error, warn, info, debug, trace, silent)
 *
 * Platform defaults (when PKGMETA_HOME is not set):
 *   macOS:   ~/Library/Application Support/pkgmeta
 *   Windows: %APPDATA%\pkgmeta
 *   Linux:   $XDG_DATA_HOME/pkgmeta (defaults to ~/.local/share/pkgmeta)
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { z } from 'zod';
import { ConfigurationError } from './errors.ts';
import { LOG_LEVELS, getDefaultLogLevel } from './logger.ts';
import type { ProviderCategories } from './types.ts';

const DEFAULT_CATEGORIES_FILE = new URL('../data/provider-categories.json', import.meta.url);

/** Default lifetime of cached provider support decisions, in seconds */
export const DEFAULT_CACHE_TTL = 3600;

type DirectoryVariable = 'PKGMETA_HOME' | 'PKGMETA_TEMPLATES_DIR';

/**
 * Read a directory override, ignoring blank values.
 */
function _directoryFromEnv(name: DirectoryVariable, env: NodeJS.ProcessEnv): string | undefined {
   const value = env[name];

   return value && value.trim() !== '' ? value : undefined;
}

/**
 * Per-user data directory of the platform, under which pkgmeta/ lives.
 */
function _platformDataDir(platform: NodeJS.Platform, env: NodeJS.ProcessEnv): string {
   const userHome = os.homedir();

   switch (platform) {
      case 'darwin':
         return path.join(userHome, 'Library', 'Application Support');
      case 'win32':
         return env.APPDATA || path.join(userHome, 'AppData', 'Roaming');
      default:
         return env.XDG_DATA_HOME || path.join(userHome, '.local', 'share');
   }
}

/**
 * Get the pkgmeta home directory: PKGMETA_HOME, else `<platform data dir>/pkgmeta`.
 */
// eslint-disable-next-line no-process-env
export function getPkgmetaHome(env: NodeJS.ProcessEnv = process.env): string {
   return _directoryFromEnv('PKGMETA_HOME', env) ?? path.join(_platformDataDir(os.platform(), env), 'pkgmeta');
}

/**
 * Get the default template root: PKGMETA_TEMPLATES_DIR, else `<home>/templates`.
 */
// eslint-disable-next-line no-process-env
export function getDefaultTemplatesDir(env: NodeJS.ProcessEnv = process.env): string {
   return _directoryFromEnv('PKGMETA_TEMPLATES_DIR', env) ?? path.join(getPkgmetaHome(env), 'templates');
}

const providerListSchema = z.array(z.string().min(1)).default([]);

export const providerCategoriesSchema = z.object({
   system: providerListSchema,
   language: providerListSchema,
   specialized: providerListSchema,
});

export const engineConfigSchema = z.object({
   templatesDir: z.string().min(1).optional(),
   cacheTtl: z.number().int().positive().optional(),
   logLevel: z.enum([ 'fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent' ]).optional(),
   providerCategories: providerCategoriesSchema.optional(),
});

export type EngineConfigInput = z.input<typeof engineConfigSchema>;

/**
 * Engine configuration with every default filled in.
 */
export interface EngineConfig {

   /** Template root containing defaults.yaml and providers/ */
   templatesDir: string;

   /** Lifetime of cached support decisions, in seconds */
   cacheTtl: number;

   /** Log level for the engine's loggers */
   logLevel: (typeof LOG_LEVELS)[number];

   /** Provider category table for the support heuristic */
   providerCategories: ProviderCategories;
}

/**
 * Validate engine options and fill in defaults from the environment.
 *
 * @throws ConfigurationError when an option has the wrong shape
 */
export function resolveEngineConfig(input: unknown = {}): EngineConfig {
   const parsed = engineConfigSchema.safeParse(input ?? {});

   if (!parsed.success) {
      throw new ConfigurationError('Invalid engine configuration', _formatIssues(parsed.error));
   }

   const options = parsed.data;

   return {
      templatesDir: path.resolve(options.templatesDir ?? getDefaultTemplatesDir()),
      cacheTtl: options.cacheTtl ?? DEFAULT_CACHE_TTL,
      logLevel: options.logLevel ?? getDefaultLogLevel(),
      providerCategories: options.providerCategories ?? loadProviderCategories(),
   };
}

/**
 * Load the provider category table.
 *
 * @param file - JSON file to read (defaults to the table bundled with the package)
 * @throws ConfigurationError when the file cannot be read or has the wrong shape
 */
export function loadProviderCategories(file: string | URL = DEFAULT_CATEGORIES_FILE): ProviderCategories {
   let raw: unknown;

   try {
      raw = JSON.parse(fs.readFileSync(file, 'utf-8'));
   } catch(error) {
      throw new ConfigurationError(
         `Failed to read provider categories from ${String(file)}`,
         [ error instanceof Error ? error.message : String(error) ]
      );
   }

   const parsed = providerCategoriesSchema.safeParse(raw);

   if (!parsed.success) {
      throw new ConfigurationError('Invalid provider categories', _formatIssues(parsed.error));
   }

   return parsed.data;
}

function _formatIssues(error: z.ZodError): string[] {
   return error.issues.map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';

      return `${where}: ${issue.message}`;
   });
}
