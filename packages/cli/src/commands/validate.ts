/**
 * Validate command - Check the shape of a merged configuration file
 */

/* eslint-disable no-console, no-process-exit */

import { Command } from 'commander';
import chalk from 'chalk';
import { configurationIssues } from '@pkgmeta/core';
import { fail, readDataFile } from '../utils/options.ts';

export const validateCommand = new Command('validate')
   .description('Validate a merged configuration (JSON or YAML)')
   .argument('<file>', 'Configuration file')
   .option('--json', 'Output as JSON')
   .action((file: string, options: { json?: boolean }) => {
      let issues: string[];

      try {
         issues = configurationIssues(readDataFile(file));
      } catch(error) {
         fail(error);
      }

      if (options.json) {
         console.log(JSON.stringify({ file, valid: issues.length === 0, issues }, null, 2));
      } else if (issues.length === 0) {
         console.log(chalk.green(`✓ ${file} is a valid configuration`));
      } else {
         console.error(chalk.red(`✗ ${file} is not a valid configuration:`));

         for (const issue of issues) {
            console.error(chalk.red(`  ${issue}`));
         }
      }

      if (issues.length > 0) {
         process.exit(1);
      }
   });
