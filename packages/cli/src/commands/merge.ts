/**
 * Merge command - Resolve the merged configuration of one or more providers
 */

/* eslint-disable no-console, no-process-exit */

import { Command } from 'commander';
import chalk from 'chalk';
import { createEngine, fail, formatData, loadRepositoryData, withEngineOptions } from '../utils/options.ts';
import type { EngineCommandOptions } from '../utils/options.ts';

interface MergeOptions extends EngineCommandOptions {
   check?: boolean;
}

export const mergeCommand = withEngineOptions(new Command('merge'))
   .description('Merge one or more providers onto the defaults, applying their null deletions')
   .argument('<software>', 'Software name')
   .argument('<providers...>', 'Providers to merge, later ones winning')
   .option('--check', 'Validate the merged configuration and exit with 1 when it is malformed')
   .action((software: string, providers: string[], options: MergeOptions) => {
      try {
         const engine = createEngine(options),
               repositoryData = loadRepositoryData(options);

         const unsupported = providers.filter((provider) => {
            return !engine.isSupported(software, provider, repositoryData);
         });

         if (unsupported.length > 0 && unsupported.length < providers.length) {
            console.error(chalk.yellow(`Skipping unsupported providers: ${unsupported.join(', ')}`));
         }

         const merged = engine.resolveMerged(software, providers, { repositoryData, context: options.var });

         console.log(formatData(merged, options.json));

         if (options.check && merged.supported !== false) {
            const issues = engine.validationIssues(merged);

            if (issues.length > 0) {
               for (const issue of issues) {
                  console.error(chalk.red(`  ${issue}`));
               }
               process.exit(1);
            }
         }
      } catch(error) {
         fail(error);
      }
   });
