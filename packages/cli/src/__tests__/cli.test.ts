/**
 * CLI integration tests
 *
 * Tests the CLI commands by spawning child processes.
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { spawn } from 'child_process';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { fileURLToPath } from 'url';
import { stringify } from 'yaml';

const currentDir = path.dirname(fileURLToPath(import.meta.url));

const CLI_PATH = path.resolve(currentDir, '../index.ts');

const TEMPLATE_FILES: Record<string, unknown> = {
   'defaults.yaml': {
      version: '0.1',
      packages: { default: { name: '$software_name', version: 'latest' } },
      services: { default: { name: '$software_name', enabled: false } },
      urls: { website: null },
      platforms: [],
   },
   'providers/apt.yaml': { services: { default: { enabled: true } }, platforms: [ 'linux' ] },
   'providers/brew.yaml': {
      packages: { default: { name: '$software_name-cli' } },
      urls: { website: '${homepage | https://brew.sh}' },
      platforms: [ 'macos' ],
   },
   'providers/choco.yaml': { supported: false },
   'providers/winget.yaml': { packages: { default: { version: 'latest' } } },
   'providers/python/default.yaml': { packages: { default: { name: 'python3' } } },
   'providers/python/3.11.yaml': { packages: { default: { name: 'python3.11' } } },
};

interface CliResult {
   stdout: string;
   stderr: string;
   exitCode: number;
}

describe('CLI', () => {
   let tempDir: string,
       templatesDir: string;

   /**
    * Run CLI command and return output
    */
   function runCli(args: string[]): Promise<CliResult> {
      return new Promise((resolve) => {
         const proc = spawn(process.execPath, [ '--import', 'tsx', CLI_PATH, ...args ], {
            cwd: process.cwd(),
            env: {
               // eslint-disable-next-line no-process-env
               ...process.env,
               NO_COLOR: '1',
               PKGMETA_HOME: path.join(tempDir, 'home'),
               PKGMETA_LOG_LEVEL: 'silent',
               PKGMETA_TEMPLATES_DIR: '',
            },
         });

         let stdout = '',
             stderr = '';

         proc.stdout.on('data', (data: Buffer) => {
            stdout += data.toString();
         });

         proc.stderr.on('data', (data: Buffer) => {
            stderr += data.toString();
         });

         proc.on('close', (code) => {
            resolve({ stdout, stderr, exitCode: code ?? 0 });
         });
      });
   }

   async function runJson(args: string[]): Promise<unknown> {
      const { stdout, stderr, exitCode } = await runCli([ ...args, '--json' ]);

      expect(stderr).toBe('');
      expect(exitCode).toBe(0);

      return JSON.parse(stdout);
   }

   beforeAll(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'pkgmeta-cli-test-'));
      templatesDir = path.join(tempDir, 'templates');

      for (const [ relativePath, content ] of Object.entries(TEMPLATE_FILES)) {
         const file = path.join(templatesDir, relativePath);

         await fs.mkdir(path.dirname(file), { recursive: true });
         await fs.writeFile(file, stringify(content));
      }
   });

   afterAll(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
   });

   describe('--help', () => {
      it('shows help message', async () => {
         const { stdout, exitCode } = await runCli([ '--help' ]);

         expect(exitCode).toBe(0);
         expect(stdout).toContain('Usage: pkgmeta');
         expect(stdout).toContain('overrides');
         expect(stdout).toContain('merge');
         expect(stdout).toContain('generate');
         expect(stdout).toContain('validate');
      });
   });

   describe('package', () => {
      it('declares the runtime its bin shebang needs', async () => {
         const manifest: unknown = JSON.parse(await fs.readFile(path.resolve(currentDir, '../../package.json'), 'utf-8')),
               shebang = (await fs.readFile(CLI_PATH, 'utf-8')).split('\n')[0];

         expect(shebang).toBe('#!/usr/bin/env tsx');
         expect(manifest).toMatchObject({
            bin: { pkgmeta: './src/index.ts' },
            dependencies: { tsx: expect.any(String) },
         });
      });
   });

   describe('--cli-version', () => {
      it('shows version', async () => {
         const { stdout, exitCode } = await runCli([ '--cli-version' ]);

         expect(exitCode).toBe(0);
         expect(stdout).toMatch(/\d+\.\d+\.\d+/);
      });
   });

   describe('overrides command', () => {
      it('prints the override fragment as JSON', async () => {
         expect(await runJson([ 'overrides', 'nginx', 'apt', '-t', templatesDir ])).toEqual({
            version: '0.1',
            services: { default: { enabled: true } },
            platforms: [ 'linux' ],
         });
      });

      it('prints YAML by default', async () => {
         const { stdout, exitCode } = await runCli([ 'overrides', 'nginx', 'choco', '-t', templatesDir ]);

         expect(exitCode).toBe(0);
         expect(stdout).toContain('supported: false');
      });

      it('applies template variables', async () => {
         const result = await runJson([
            'overrides', 'nginx', 'brew',
            '-t', templatesDir,
            '--var', 'homepage=https://nginx.example',
         ]);

         expect(result).toEqual({
            version: '0.1',
            packages: { default: { name: 'nginx-cli' } },
            urls: { website: 'https://nginx.example' },
            platforms: [ 'macos' ],
         });
      });

      it('applies a provider version overlay', async () => {
         const result = await runJson([ 'overrides', 'python', 'python', '-t', templatesDir, '--provider-version', '3.11' ]);

         expect(result).toEqual({ version: '0.1', packages: { default: { name: 'python3.11' } } });
      });

      it('rejects malformed variables', async () => {
         const { stderr, exitCode } = await runCli([ 'overrides', 'nginx', 'apt', '--var', 'novalue' ]);

         expect(exitCode).toBe(1);
         expect(stderr).toContain('Expected key=value');
      });
   });

   describe('support command', () => {
      it('explains each decision', async () => {
         expect(await runJson([ 'support', 'nginx', 'apt', 'choco', 'gem', '-t', templatesDir ])).toEqual([
            { provider: 'apt', supported: true, source: 'template', category: 'system' },
            { provider: 'choco', supported: false, source: 'template-unsupported', category: 'system' },
            { provider: 'gem', supported: false, source: 'category', category: 'specialized' },
         ]);
      });

      it('honors a version overlay that declares the provider unsupported', async () => {
         const root = path.join(tempDir, 'versioned');

         await fs.mkdir(path.join(root, 'providers', 'apt'), { recursive: true });
         await fs.writeFile(path.join(root, 'providers', 'apt', 'default.yaml'), stringify({ platforms: [ 'linux' ] }));
         await fs.writeFile(path.join(root, 'providers', 'apt', '18.04.yaml'), stringify({ supported: false }));

         expect(await runJson([ 'support', 'nginx', 'apt', '-t', root, '--provider-version', '18.04' ])).toEqual([
            { provider: 'apt', supported: false, source: 'template-unsupported', category: 'system' },
         ]);
         expect(await runJson([ 'overrides', 'nginx', 'apt', '-t', root, '--provider-version', '18.04' ])).toEqual({
            version: '0.1',
            supported: false,
         });
      });

      it('reads repository evidence from a file', async () => {
         const evidenceFile = path.join(tempDir, 'evidence.json');

         await fs.writeFile(evidenceFile, JSON.stringify({ name: 'nginx', provider: 'cargo' }));

         expect(await runJson([ 'support', 'nginx', 'cargo', '-t', templatesDir, '--repository', evidenceFile ])).toEqual([
            { provider: 'cargo', supported: true, source: 'repository', category: 'specialized' },
         ]);
      });

      it('fails for a missing evidence file', async () => {
         const { stderr, exitCode } = await runCli([ 'support', 'nginx', 'apt', '--repository', '/nonexistent.json' ]);

         expect(exitCode).toBe(1);
         expect(stderr).toContain('Error: File not found');
      });
   });

   describe('merge command', () => {
      it('merges providers in order onto the resolved defaults', async () => {
         expect(await runJson([ 'merge', 'nginx', 'apt', 'brew', '-t', templatesDir, '--check' ])).toEqual({
            version: '0.1',
            packages: { default: { name: 'nginx-cli', version: 'latest' } },
            services: { default: { name: 'nginx', enabled: true } },
            urls: { website: 'https://brew.sh' },
            platforms: [ 'macos' ],
         });
      });

      it('returns the unsupported sentinel when no provider applies', async () => {
         expect(await runJson([ 'merge', 'nginx', 'choco', '-t', templatesDir ])).toEqual({
            version: '0.1',
            supported: false,
         });
      });

      it('removes values a later provider deletes with null', async () => {
         const root = path.join(tempDir, 'tombstones');

         await fs.mkdir(path.join(root, 'providers'), { recursive: true });
         await fs.writeFile(path.join(root, 'defaults.yaml'), stringify({
            version: '0.1',
            urls: { website: 'https://$software_name.org' },
            platforms: [],
         }));
         await fs.writeFile(path.join(root, 'providers', 'brew.yaml'), stringify({ platforms: [ 'macos' ] }));
         await fs.writeFile(path.join(root, 'providers', 'apt.yaml'), stringify({ urls: { website: null }, platforms: [ 'linux' ] }));

         expect(await runJson([ 'merge', 'nginx', 'brew', 'apt', '-t', root ])).toEqual({
            version: '0.1',
            platforms: [ 'linux' ],
         });
         expect(await runJson([ 'merge', 'nginx', 'brew', '-t', root ])).toEqual({
            version: '0.1',
            urls: { website: 'https://nginx.org' },
            platforms: [ 'macos' ],
         });
      });

      it('warns about skipped providers', async () => {
         const { stderr, exitCode } = await runCli([ 'merge', 'nginx', 'apt', 'choco', '-t', templatesDir, '--json' ]);

         expect(exitCode).toBe(0);
         expect(stderr).toContain('Skipping unsupported providers: choco');
      });
   });

   describe('generate command', () => {
      it('generates overrides for every provider', async () => {
         const result = await runJson([ 'generate', 'nginx', '-t', templatesDir ]);

         expect(result).toMatchObject({
            softwareName: 'nginx',
            supported: [ 'apt', 'brew', 'python', 'winget' ],
            unsupported: [ 'choco' ],
            providers: {
               choco: { version: '0.1', supported: false },
               python: { version: '0.1', packages: { default: { name: 'python3' } } },
               winget: { version: '0.1' },
            },
         });
      });

      it('fails when the template root has no providers', async () => {
         const { stderr, exitCode } = await runCli([ 'generate', 'nginx', '-t', path.join(tempDir, 'empty') ]);

         expect(exitCode).toBe(1);
         expect(stderr).toContain('No provider templates found');
      });
   });

   describe('validate command', () => {
      it('accepts a valid configuration', async () => {
         const file = path.join(tempDir, 'valid.yaml');

         await fs.writeFile(file, 'version: 0.1\npackages:\n  default:\n    name: nginx\nplatforms: [linux]\n');

         const { stdout, exitCode } = await runCli([ 'validate', file ]);

         expect(exitCode).toBe(0);
         expect(stdout).toContain('is a valid configuration');
      });

      it('reports issues and exits with 1', async () => {
         const file = path.join(tempDir, 'invalid.json');

         await fs.writeFile(file, JSON.stringify({ version: '1.2.3' }));

         const { stdout, exitCode } = await runCli([ 'validate', file, '--json' ]);

         expect(exitCode).toBe(1);

         const report: unknown = JSON.parse(stdout);

         expect(report).toMatchObject({ file, valid: false });
      });
   });

   describe('providers command', () => {
      it('lists providers with categories and versions', async () => {
         expect(await runJson([ 'providers', '-t', templatesDir ])).toEqual([
            { name: 'apt', category: 'system', versions: [] },
            { name: 'brew', category: 'system', versions: [] },
            { name: 'choco', category: 'system', versions: [] },
            { name: 'python', category: 'unknown', versions: [ '3.11' ] },
            { name: 'winget', category: 'system', versions: [] },
         ]);
      });
   });

   describe('audit command', () => {
      it('reports redundant entries', async () => {
         const audits = await runJson([ 'audit', 'winget', '-t', templatesDir ]);

         expect(audits).toMatchObject([
            { provider: 'winget', valid: true, redundantPaths: [ 'packages.default.version' ], qualityScore: 0 },
         ]);
      });

      it('exits with 1 in strict mode when entries are redundant', async () => {
         const { exitCode } = await runCli([ 'audit', 'winget', '-t', templatesDir, '--strict' ]);

         expect(exitCode).toBe(1);
      });

      it('passes strict mode for minimal templates', async () => {
         const { exitCode } = await runCli([ 'audit', 'apt', 'choco', '-t', templatesDir, '--strict' ]);

         expect(exitCode).toBe(0);
      });
   });

   describe('config command', () => {
      it('shows paths derived from PKGMETA_HOME', async () => {
         const config = await runJson([ 'config' ]);

         expect(config).toMatchObject({
            paths: {
               home: path.join(tempDir, 'home'),
               templates: path.join(tempDir, 'home', 'templates'),
            },
            engine: { logLevel: 'silent', cacheTtl: 3600 },
         });
      });
   });
});
