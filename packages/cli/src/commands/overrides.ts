/**
 * Overrides command - Show the minimal override fragment of one provider
 */

/* eslint-disable no-console */

import { Command } from 'commander';
import { createEngine, fail, formatData, loadRepositoryData, withEngineOptions } from '../utils/options.ts';
import type { EngineCommandOptions } from '../utils/options.ts';

interface OverridesOptions extends EngineCommandOptions {
   providerVersion?: string;
}

export const overridesCommand = withEngineOptions(new Command('overrides'))
   .description('Show the settings a provider overrides for a piece of software')
   .argument('<software>', 'Software name')
   .argument('<provider>', 'Provider name (e.g. apt, brew, winget)')
   .option('--provider-version <version>', 'Version overlay to apply (e.g. 22.04)')
   .action((software: string, provider: string, options: OverridesOptions) => {
      try {
         const engine = createEngine(options);

         const overrides = engine.computeOverrides(software, provider, {
            repositoryData: loadRepositoryData(options),
            context: options.var,
            providerVersion: options.providerVersion,
         });

         console.log(formatData(overrides, options.json));
      } catch(error) {
         fail(error);
      }
   });
