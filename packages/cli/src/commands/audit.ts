/**
 * Audit command - Find provider template entries that repeat the defaults
 */

/* eslint-disable no-console, no-process-exit */

import { Command } from 'commander';
import chalk from 'chalk';
import { createEngine, fail } from '../utils/options.ts';
import type { OverrideAudit } from '@pkgmeta/core';
import type { EngineCommandOptions } from '../utils/options.ts';

interface AuditOptions extends EngineCommandOptions {
   strict?: boolean;
}

export const auditCommand = new Command('audit')
   .description('Audit provider templates for values that repeat the defaults')
   .argument('[providers...]', 'Providers to audit (default: every provider with a template)')
   .option('-t, --templates <dir>', 'Template root')
   .option('--json', 'Output as JSON')
   .option('--strict', 'Exit with 1 when any template has redundant entries')
   .action((providers: string[], options: AuditOptions) => {
      let audits: OverrideAudit[];

      try {
         const engine = createEngine(options),
               selected = providers.length > 0 ? providers : engine.listProviders();

         audits = selected.map((provider) => {
            return engine.auditProvider(provider);
         });
      } catch(error) {
         fail(error);
      }

      if (options.json) {
         console.log(JSON.stringify(audits, null, 2));
      } else {
         printAudits(audits);
      }

      const hasFindings = audits.some((audit) => {
         return !audit.valid || audit.redundantPaths.length > 0;
      });

      if (options.strict && hasFindings) {
         process.exit(1);
      }
   });

function printAudits(audits: OverrideAudit[]): void {
   console.log(chalk.bold(`\nOverride audit (${audits.length} providers)\n`));

   for (const audit of audits) {
      const score = `${Math.round(audit.qualityScore * 100)}%`,
            color = audit.qualityScore >= 0.8 ? chalk.green : audit.qualityScore >= 0.5 ? chalk.yellow : chalk.red;

      console.log(`  ${chalk.bold(audit.provider)} ${color(score)}${audit.valid ? '' : chalk.red(' invalid')}`);

      for (const suggestion of audit.suggestions) {
         console.log(`    ${chalk.dim('-')} ${suggestion.path}: ${suggestion.reason}`);
      }
   }

   console.log('');
}
