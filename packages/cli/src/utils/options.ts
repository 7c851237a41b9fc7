/**
 * Shared option handling for pkgmeta commands
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { InvalidArgumentError } from 'commander';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { TemplateEngine } from '@pkgmeta/core';
import type { Command } from 'commander';

export interface EngineCommandOptions {
   templates?: string;
   json?: boolean;
   var?: Record<string, string>;
   repository?: string;
}

/**
 * Collect repeated `--var key=value` options into a map.
 */
export function collectVar(value: string, previous: Record<string, string> = {}): Record<string, string> {
   const separator = value.indexOf('=');

   if (separator <= 0) {
      throw new InvalidArgumentError(`Expected key=value, got "${value}"`);
   }

   return { ...previous, [value.slice(0, separator).trim()]: value.slice(separator + 1) };
}

/**
 * Add the options shared by every command that reads templates.
 */
export function withEngineOptions(command: Command): Command {
   return command
      .option('-t, --templates <dir>', 'Template root (default: $PKGMETA_TEMPLATES_DIR or <home>/templates)')
      .option('--json', 'Output as JSON')
      .option('--var <key=value>', 'Template variable (repeatable)', collectVar, {})
      .option('--repository <file>', 'Repository evidence as a JSON or YAML file');
}

export function createEngine(options: EngineCommandOptions): TemplateEngine {
   return new TemplateEngine(options.templates ? { templatesDir: options.templates } : {});
}

/**
 * Read a JSON or YAML file.
 */
export function readDataFile(file: string): unknown {
   const filePath = path.resolve(file);

   if (!fs.existsSync(filePath)) {
      throw new Error(`File not found: ${filePath}`);
   }

   // JSON documents are valid YAML
   return parseYaml(fs.readFileSync(filePath, 'utf-8'));
}

export function loadRepositoryData(options: EngineCommandOptions): unknown {
   return options.repository ? readDataFile(options.repository) : undefined;
}

/**
 * Render a value as JSON or YAML.
 */
export function formatData(value: unknown, json?: boolean): string {
   return json ? JSON.stringify(value, null, 2) : stringifyYaml(value).trimEnd();
}

export function formatError(error: unknown): string {
   return error instanceof Error ? error.message : String(error);
}

/**
 * Print an error in red and exit with status 1.
 */
export function fail(error: unknown): never {
   // eslint-disable-next-line no-console
   console.error(chalk.red(`Error: ${formatError(error)}`));
   // eslint-disable-next-line no-process-exit
   process.exit(1);
}
