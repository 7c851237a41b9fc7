/**
 * Tests for TemplateStore
 */

import { describe, it, expect, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { TemplateStore, FALLBACK_DEFAULT_TEMPLATE } from '../template-store.ts';
import { createTemplateRoot, removeTemplateRoot, createCapturingLogger } from './helpers.ts';

describe('TemplateStore', () => {
   let root: string | undefined;

   afterEach(async () => {
      if (root) {
         await removeTemplateRoot(root);
         root = undefined;
      }
   });

   describe('loadDefault', () => {
      it('synthesizes a default template without writing it', async () => {
         root = await createTemplateRoot();

         const store = new TemplateStore(root);

         expect(store.loadDefault()).toEqual(FALLBACK_DEFAULT_TEMPLATE);
         expect(fs.existsSync(path.join(root, 'defaults.yaml'))).toBe(false);
      });

      it('reads defaults.yaml', async () => {
         root = await createTemplateRoot({
            'defaults.yaml': { version: '0.1', packages: { default: { name: '$software_name' } } },
         });

         expect(new TemplateStore(root).loadDefault()).toEqual({
            version: '0.1',
            packages: { default: { name: '$software_name' } },
         });
      });

      it('keeps the source text of an unquoted major.minor version', async () => {
         root = await createTemplateRoot({ 'defaults.yml': 'version: 0.1\nplatforms: []\n' });

         expect(new TemplateStore(root).loadDefault()).toEqual({ version: '0.1', platforms: [] });
      });

      it('does not collapse a trailing zero in the version', async () => {
         root = await createTemplateRoot({
            'defaults.yaml': 'version: 1.0\n',
            'providers/apt.yaml': 'version: 2.0\nplatforms: [linux]\n',
            'providers/brew.yaml': 'version: 3\n',
         });

         const store = new TemplateStore(root);

         expect(store.loadDefault()).toEqual({ version: '1.0' });
         expect(store.loadProvider('apt')).toEqual({ version: '2.0', platforms: [ 'linux' ] });
         expect(store.loadProvider('brew')).toEqual({ version: 3 });
      });
   });

   describe('loadProvider', () => {
      it('reads a flat provider template', async () => {
         root = await createTemplateRoot({ 'providers/apt.yaml': { services: { default: { enabled: true } } } });

         expect(new TemplateStore(root).loadProvider('apt')).toEqual({ services: { default: { enabled: true } } });
      });

      it('returns an empty template for unknown providers', async () => {
         root = await createTemplateRoot();

         expect(new TemplateStore(root).loadProvider('nonexistent')).toEqual({});
      });

      it('prefers the hierarchical layout over a flat file', async () => {
         root = await createTemplateRoot({
            'providers/apt.yaml': { packages: { default: { name: 'flat' } } },
            'providers/apt/default.yaml': { packages: { default: { name: 'tree' } } },
         });

         expect(new TemplateStore(root).loadProvider('apt')).toEqual({ packages: { default: { name: 'tree' } } });
      });

      it('caches frozen templates per provider', async () => {
         root = await createTemplateRoot({ 'providers/apt.yaml': { platforms: [ 'linux' ] } });

         const store = new TemplateStore(root),
               template = store.loadProvider('apt');

         expect(store.loadProvider('apt')).toBe(template);
         expect(Object.isFrozen(template)).toBe(true);
      });

      it('rejects provider names that escape the providers directory', async () => {
         const { logger, records } = createCapturingLogger();

         root = await createTemplateRoot({ 'secret.yaml': { token: 'test-secret' } });

         expect(new TemplateStore(root, { logger }).loadProvider('../secret')).toEqual({});
         expect(records[0].msg).toBe('Invalid provider name');
      });

      it('treats malformed YAML as empty and logs an error', async () => {
         const { logger, records } = createCapturingLogger();

         root = await createTemplateRoot({ 'providers/bad.yaml': 'packages: [unclosed\n' });

         expect(new TemplateStore(root, { logger }).loadProvider('bad')).toEqual({});
         expect(records[0].level).toBe(50);
         expect(records[0].msg).toBe('Failed to load template; treating it as empty');
         expect(records[0].file).toBe(path.join(root, 'providers', 'bad.yaml'));
      });

      it('treats a non-mapping template as empty and logs a warning', async () => {
         const { logger, records } = createCapturingLogger();

         root = await createTemplateRoot({ 'providers/list.yaml': '- a\n- b\n' });

         expect(new TemplateStore(root, { logger }).loadProvider('list')).toEqual({});
         expect(records[0].level).toBe(40);
      });

      it('treats an empty file as an empty template', async () => {
         root = await createTemplateRoot({ 'providers/empty.yaml': '' });

         expect(new TemplateStore(root).loadProvider('empty')).toEqual({});
      });
   });

   describe('version overlays', () => {
      const files = {
         'providers/python/default.yaml': {
            packages: { default: { name: 'python3' } },
            services: { default: { enabled: true } },
         },
         'providers/python/3.9.yaml': { packages: { default: { name: 'python3.9' } } },
         'providers/python/3.11.yaml': {
            packages: { default: { name: 'python3.11' } },
            services: { default: { enabled: null } },
         },
      };

      it('composes an exact overlay onto the provider default', async () => {
         root = await createTemplateRoot(files);

         expect(new TemplateStore(root).loadProvider('python', '3.11')).toEqual({
            packages: { default: { name: 'python3.11' } },
         });
      });

      it('falls back to the highest overlay not above the requested version', async () => {
         root = await createTemplateRoot(files);

         const store = new TemplateStore(root);

         expect(store.loadProvider('python', '3.10')).toEqual({
            packages: { default: { name: 'python3.9' } },
            services: { default: { enabled: true } },
         });
         expect(store.loadProvider('python', '3.12.4')).toEqual({
            packages: { default: { name: 'python3.11' } },
         });
      });

      it('uses the provider default when no overlay applies', async () => {
         root = await createTemplateRoot(files);

         expect(new TemplateStore(root).loadProvider('python', '2.7')).toEqual(files['providers/python/default.yaml']);
      });

      it('carries supported: false from an overlay', async () => {
         root = await createTemplateRoot({
            'providers/apt/default.yaml': { platforms: [ 'linux' ] },
            'providers/apt/18.04.yaml': { supported: false },
         });

         expect(new TemplateStore(root).loadProvider('apt', '18.04')).toEqual({ platforms: [ 'linux' ], supported: false });
      });

      it('lists overlays in version order', async () => {
         root = await createTemplateRoot(files);

         expect(new TemplateStore(root).listVersions('python')).toEqual([ '3.9', '3.11' ]);
      });
   });

   describe('loadInclude', () => {
      it('prefers a provider template of the same name', async () => {
         root = await createTemplateRoot({
            'providers/apt.yaml': { platforms: [ 'linux' ] },
            'apt.yaml': { platforms: [ 'other' ] },
         });

         expect(new TemplateStore(root).loadInclude('apt')).toEqual({ platforms: [ 'linux' ] });
      });

      it('reads templates from nested directories under the root', async () => {
         root = await createTemplateRoot({ 'common/service.yaml': { services: { default: { enabled: true } } } });

         expect(new TemplateStore(root).loadInclude('common/service')).toEqual({ services: { default: { enabled: true } } });
      });

      it('returns null for missing and invalid names', async () => {
         const { logger, records } = createCapturingLogger();

         root = await createTemplateRoot({ 'secret.yaml': { token: 'test-secret' } });

         const store = new TemplateStore(root, { logger });

         expect(store.loadInclude('missing')).toBeNull();
         expect(store.loadInclude('common/../secret')).toBeNull();
         expect(records.map((record) => {
            return record.msg;
         })).toEqual([ 'Invalid include name' ]);
      });
   });

   describe('listProviders', () => {
      it('lists flat and hierarchical providers', async () => {
         root = await createTemplateRoot({
            'providers/apt.yaml': { platforms: [ 'linux' ] },
            'providers/brew.yml': { platforms: [ 'macos' ] },
            'providers/python/default.yaml': {},
            'providers/notes/readme.txt': 'not a template',
         });

         expect(new TemplateStore(root).listProviders()).toEqual([ 'apt', 'brew', 'python' ]);
      });

      it('returns nothing without a providers directory', async () => {
         root = await createTemplateRoot();

         expect(new TemplateStore(root).listProviders()).toEqual([]);
         expect(new TemplateStore(root).hasProvider('apt')).toBe(false);
      });
   });
});
