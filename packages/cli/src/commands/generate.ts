/**
 * Generate command - Compute overrides for many providers at once
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { createEngine, fail, formatData, loadRepositoryData, withEngineOptions } from '../utils/options.ts';
import type { EngineCommandOptions } from '../utils/options.ts';

export const generateCommand = withEngineOptions(new Command('generate'))
   .description('Generate the defaults and every provider\'s overrides for a piece of software')
   .argument('<software>', 'Software name')
   .argument('[providers...]', 'Providers to include (default: every provider with a template)')
   .action((software: string, providers: string[], options: EngineCommandOptions) => {
      const spinner = ora({ isSilent: Boolean(options.json) });

      try {
         const engine = createEngine(options),
               selected = providers.length > 0 ? providers : engine.listProviders();

         if (selected.length === 0) {
            throw new Error(`No provider templates found in ${engine.config.templatesDir}`);
         }

         spinner.start(`Generating overrides for ${selected.length} providers...`);

         const result = engine.generate(software, selected, {
            repositoryData: loadRepositoryData(options),
            context: options.var,
         });

         spinner.succeed(`Generated overrides: ${result.supported.length} supported, ${result.unsupported.length} unsupported`);

         console.log(formatData(result, options.json));
      } catch(error) {
         if (spinner.isSpinning) {
            spinner.fail(chalk.red('Generation failed'));
         }
         fail(error);
      }
   });
