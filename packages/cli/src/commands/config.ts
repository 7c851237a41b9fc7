/**
 * Config command - Display current pkgmeta configuration
 */

/* eslint-disable no-console, no-process-env */

import { Command } from 'commander';
import chalk from 'chalk';
import {
   getPkgmetaHome,
   getDefaultTemplatesDir,
   getDefaultLogLevel,
   DEFAULT_CACHE_TTL,
   VERSION,
} from '@pkgmeta/core';

interface ConfigOptions {
   json?: boolean;
}

const ENV_VARS = [ 'PKGMETA_HOME', 'PKGMETA_TEMPLATES_DIR', 'PKGMETA_LOG_LEVEL' ] as const;

export const configCommand = new Command('config')
   .description('Display current pkgmeta configuration and paths')
   .option('--json', 'Output as JSON')
   .action((options: ConfigOptions) => {
      const home = getPkgmetaHome(),
            templatesDir = getDefaultTemplatesDir();

      const environment: Record<string, string | null> = {};

      for (const name of ENV_VARS) {
         environment[name] = process.env[name] || null;
      }

      const config = {
         version: VERSION,
         paths: {
            home,
            templates: templatesDir,
         },
         engine: {
            logLevel: getDefaultLogLevel(),
            cacheTtl: DEFAULT_CACHE_TTL,
         },
         environment,
      };

      if (options.json) {
         console.log(JSON.stringify(config, null, 2));
         return;
      }

      console.log(chalk.bold('\n⚙️  pkgmeta Configuration\n'));
      console.log(`  ${chalk.dim('Version:')}  ${VERSION}`);

      console.log(chalk.bold('\n  Paths:'));
      console.log(`    ${chalk.dim('Home:')}       ${home}${environment.PKGMETA_HOME ? chalk.yellow(' (from PKGMETA_HOME)') : ''}`);
      // eslint-disable-next-line max-len
      console.log(`    ${chalk.dim('Templates:')}  ${templatesDir}${environment.PKGMETA_TEMPLATES_DIR ? chalk.yellow(' (from PKGMETA_TEMPLATES_DIR)') : ''}`);

      console.log(chalk.bold('\n  Engine:'));
      console.log(`    ${chalk.dim('Log level:')}  ${config.engine.logLevel}`);
      console.log(`    ${chalk.dim('Cache TTL:')}  ${DEFAULT_CACHE_TTL}s`);

      console.log(chalk.bold('\n  Environment Variables:'));

      const set = ENV_VARS.filter((name) => {
         return environment[name] !== null;
      });

      if (set.length > 0) {
         for (const name of set) {
            console.log(`    ${chalk.green(name)}=${environment[name]}`);
         }
      } else {
         console.log(chalk.dim('    (none set, using defaults)'));
      }

      console.log('');
   });
