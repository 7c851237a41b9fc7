#!/usr/bin/env tsx
/**
 * @pkgmeta/cli - Command-line interface for pkgmeta
 *
 * Provides commands for computing, merging, auditing and validating provider
 * metadata built from override-only templates.
 */

import { Command } from 'commander';
import { VERSION } from '@pkgmeta/core';
import { overridesCommand } from './commands/overrides.ts';
import { mergeCommand } from './commands/merge.ts';
import { supportCommand } from './commands/support.ts';
import { generateCommand } from './commands/generate.ts';
import { validateCommand } from './commands/validate.ts';
import { providersCommand } from './commands/providers.ts';
import { auditCommand } from './commands/audit.ts';
import { configCommand } from './commands/config.ts';

const program = new Command();

program
   .name('pkgmeta')
   .description('Compute and merge package metadata from override-only templates')
   .version(VERSION, '-V, --cli-version', 'Output the CLI version');

// Register commands
program.addCommand(overridesCommand);
program.addCommand(mergeCommand);
program.addCommand(supportCommand);
program.addCommand(generateCommand);
program.addCommand(validateCommand);
program.addCommand(providersCommand);
program.addCommand(auditCommand);
program.addCommand(configCommand);

program.parse();
