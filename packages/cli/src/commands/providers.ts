/**
 * Providers command - List provider templates under the template root
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import chalk from 'chalk';
import { createEngine, fail } from '../utils/options.ts';
import type { EngineCommandOptions } from '../utils/options.ts';

export const providersCommand = new Command('providers')
   .description('List providers that have a template')
   .option('-t, --templates <dir>', 'Template root')
   .option('--json', 'Output as JSON')
   .action((options: EngineCommandOptions) => {
      try {
         const engine = createEngine(options);

         const providers = engine.listProviders().map((name) => {
            return {
               name,
               category: engine.resolver.categorize(name),
               versions: engine.store.listVersions(name),
            };
         });

         if (options.json) {
            console.log(JSON.stringify(providers, null, 2));
            return;
         }

         if (providers.length === 0) {
            console.log(chalk.yellow(`\nNo provider templates found in ${engine.config.templatesDir}\n`));
            return;
         }

         console.log(chalk.bold(`\nProviders (${providers.length})\n`));

         for (const provider of providers) {
            const versions = provider.versions.length > 0 ? chalk.dim(` versions: ${provider.versions.join(', ')}`) : '';

            console.log(`  ${chalk.bold(provider.name)} ${chalk.dim(`[${provider.category}]`)}${versions}`);
         }

         console.log('');
      } catch(error) {
         fail(error);
      }
   });
