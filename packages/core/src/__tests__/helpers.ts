/**
 * Shared helpers for core tests
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import pino from 'pino';
import { stringify } from 'yaml';
import type { Logger } from '../logger.ts';

export interface CapturedLog {
   level: number;
   msg: string;
   [key: string]: unknown;
}

/**
 * Create a temporary template root. String contents are written verbatim, anything
 * else is serialized as YAML.
 *
 * @param files - Map of relative path to content
 */
export async function createTemplateRoot(files: Record<string, unknown> = {}): Promise<string> {
   const root = await fs.mkdtemp(path.join(os.tmpdir(), 'pkgmeta-templates-test-'));

   for (const [ relativePath, content ] of Object.entries(files)) {
      const file = path.join(root, relativePath);

      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, typeof content === 'string' ? content : stringify(content));
   }

   return root;
}

export async function removeTemplateRoot(root: string): Promise<void> {
   await fs.rm(root, { recursive: true, force: true });
}

/**
 * Create a debug-level logger that keeps every record in memory.
 */
export function createCapturingLogger(): { logger: Logger; records: CapturedLog[] } {
   const records: CapturedLog[] = [];

   const logger = pino({ level: 'debug' }, {
      write(line: string): void {
         const parsed: unknown = JSON.parse(line);

         if (_isCapturedLog(parsed)) {
            records.push(parsed);
         }
      },
   });

   return { logger, records };
}

function _isCapturedLog(value: unknown): value is CapturedLog {
   return typeof value === 'object' && value !== null
      && 'level' in value && typeof value.level === 'number'
      && 'msg' in value && typeof value.msg === 'string';
}
