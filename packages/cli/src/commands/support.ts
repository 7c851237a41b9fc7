/**
 * Support command - Explain which providers can ship a piece of software
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import chalk from 'chalk';
import { createEngine, fail, loadRepositoryData, withEngineOptions } from '../utils/options.ts';
import type { EngineCommandOptions } from '../utils/options.ts';

interface SupportOptions extends EngineCommandOptions {
   providerVersion?: string;
}

export const supportCommand = withEngineOptions(new Command('support'))
   .description('Explain whether each provider supports a piece of software')
   .argument('<software>', 'Software name')
   .argument('<providers...>', 'Providers to check')
   .option('--provider-version <version>', 'Version overlay to check (e.g. 18.04)')
   .action((software: string, providers: string[], options: SupportOptions) => {
      try {
         const engine = createEngine(options),
               repositoryData = loadRepositoryData(options);

         const decisions = providers.map((provider) => {
            return { provider, ...engine.explainSupport(software, provider, repositoryData, options.providerVersion) };
         });

         if (options.json) {
            console.log(JSON.stringify(decisions, null, 2));
            return;
         }

         const width = Math.max(...providers.map((provider) => {
            return provider.length;
         }));

         console.log(chalk.bold(`\nProvider support for ${software}\n`));

         for (const decision of decisions) {
            const mark = decision.supported ? chalk.green('✓') : chalk.red('✗'),
                  status = decision.supported ? 'supported  ' : 'unsupported';

            console.log(`  ${mark} ${decision.provider.padEnd(width)}  ${status}  ${chalk.dim(`${decision.category}, decided by ${decision.source}`)}`);
         }

         console.log('');
      } catch(error) {
         fail(error);
      }
   });
