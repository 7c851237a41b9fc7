/**
 * Template Store - Loads the default template and provider templates
 *
 * Layout of a template root:
 *   defaults.yaml                   - default template (synthesized when missing)
 *   providers/<name>.yaml           - flat provider template
 *   providers/<name>/default.yaml   - hierarchical provider template
 *   providers/<name>/<version>.yaml - version overlay for a hierarchical provider
 *
 * A hierarchical directory takes precedence over a flat file of the same name.
 * Malformed files are logged and treated as empty templates; they never throw.
 *
 * An unquoted top-level `version: 1.0` keeps its source text ("1.0") instead
 * of collapsing to the number 1.
 *
 * Loaded templates are deep-frozen and cached for the lifetime of the store.
 */

import * as fs from 'fs';
import * as path from 'path';
import fg from 'fast-glob';
import semver from 'semver';
import { isScalar, parseDocument } from 'yaml';
import { deepFreeze, enhancedMerge, isTemplate } from './merge.ts';
import { getLogger } from './logger.ts';
import type { Logger } from './logger.ts';
import type { Template } from './types.ts';

const YAML_EXTENSIONS = [ '.yaml', '.yml' ];

const PROVIDER_NAME_PATTERN = /^[A-Za-z0-9][\w.+-]*$/,
      INCLUDE_NAME_PATTERN = /^[A-Za-z0-9][\w.+-]*(?:\/[A-Za-z0-9][\w.+-]*)*$/,
      VERSION_TEXT_PATTERN = /^\d+\.\d+$/;

/**
 * Minimal default template used when the template root has no defaults.yaml.
 */
export const FALLBACK_DEFAULT_TEMPLATE: Readonly<Template> = deepFreeze({
   version: '0.1',
   packages: {
      default: {
         name: '$software_name',
         version: 'latest',
      },
   },
   services: {
      default: {
         name: '$software_name',
      },
   },
   directories: {
      config: {
         path: '/etc/$software_name',
         owner: 'root',
         group: 'root',
         mode: '0755',
      },
   },
   urls: {},
   category: {
      default: null,
      sub: null,
      tags: [],
   },
   platforms: [],
});

export interface TemplateStoreOptions {

   /** Logger for load failures (defaults to the `template-store` logger) */
   logger?: Logger;
}

/**
 * Read-only access to the templates under a template root.
 */
export class TemplateStore {

   private readonly _templatesDir: string;
   private readonly _providersDir: string;
   private readonly _logger: Logger;
   private readonly _providerCache = new Map<string, Template>();
   private readonly _includeCache = new Map<string, Template | null>();

   private _defaultTemplate: Template | null = null;

   public constructor(templatesDir: string, options: TemplateStoreOptions = {}) {
      this._templatesDir = path.resolve(templatesDir);
      this._providersDir = path.join(this._templatesDir, 'providers');
      this._logger = options.logger ?? getLogger('template-store');
   }

   /**
    * The template root this store reads from.
    */
   public get templatesDir(): string {
      return this._templatesDir;
   }

   /**
    * Load the default template.
    *
    * Returns a synthesized minimal template when the root has no defaults file.
    */
   public loadDefault(): Template {
      if (this._defaultTemplate) {
         return this._defaultTemplate;
      }

      const file = this._findYaml(path.join(this._templatesDir, 'defaults'));

      let template: Template;

      if (file) {
         template = deepFreeze(this._readTemplate(file));
      } else {
         this._logger.debug({ templatesDir: this._templatesDir }, 'No defaults.yaml found; using built-in defaults');
         template = FALLBACK_DEFAULT_TEMPLATE;
      }

      this._defaultTemplate = template;
      return template;
   }

   /**
    * Load a provider template, optionally with a version overlay applied.
    *
    * @param name - Provider name (e.g. "apt")
    * @param version - Version overlay to compose onto the provider default
    * @returns The template, or `{}` when the provider has none
    */
   public loadProvider(name: string, version?: string): Template {
      const cacheKey = version ? `${name}@${version}` : name,
            cached = this._providerCache.get(cacheKey);

      if (cached) {
         return cached;
      }

      let template = this._loadProviderBase(name);

      if (version) {
         const overlayFile = this._resolveVersionOverlay(name, version);

         if (overlayFile) {
            template = enhancedMerge(template, this._readTemplate(overlayFile));
         }
      }

      const frozen = deepFreeze(template);

      this._providerCache.set(cacheKey, frozen);
      return frozen;
   }

   /**
    * Load a template named by an `$include:` directive: the provider template of
    * that name, else `<root>/<name>.yaml`. Names may contain `/` but no `..`.
    *
    * @returns null when no such template exists
    */
   public loadInclude(name: string): Template | null {
      if (this._includeCache.has(name)) {
         return this._includeCache.get(name) ?? null;
      }

      let template: Template | null = null;

      if (!INCLUDE_NAME_PATTERN.test(name)) {
         this._logger.warn({ include: name }, 'Invalid include name');
      } else if (this.hasProvider(name)) {
         template = this.loadProvider(name);
      } else {
         const file = this._findYaml(path.join(this._templatesDir, name));

         template = file ? deepFreeze(this._readTemplate(file)) : null;
      }

      this._includeCache.set(name, template);
      return template;
   }

   /**
    * Check whether a provider has a template file at all.
    */
   public hasProvider(name: string): boolean {
      return this._findProviderFile(name) !== null;
   }

   /**
    * List every provider with a flat or hierarchical template, sorted by name.
    */
   public listProviders(): string[] {
      if (!fs.existsSync(this._providersDir)) {
         return [];
      }

      const files = fg.sync([ '*.{yaml,yml}', '*/default.{yaml,yml}' ], {
         cwd: this._providersDir,
         onlyFiles: true,
      });

      const names = new Set(files.map((file) => {
         return file.includes('/') ? file.split('/')[0] : file.replace(/\.ya?ml$/, '');
      }));

      return Array.from(names).filter((name) => {
         return PROVIDER_NAME_PATTERN.test(name);
      }).sort();
   }

   /**
    * List the version overlays of a hierarchical provider, lowest version first.
    */
   public listVersions(name: string): string[] {
      if (!PROVIDER_NAME_PATTERN.test(name)) {
         return [];
      }

      const dir = path.join(this._providersDir, name);

      if (!fs.existsSync(dir)) {
         return [];
      }

      const versions = fg.sync('*.{yaml,yml}', { cwd: dir, onlyFiles: true })
         .map((file) => {
            return file.replace(/\.ya?ml$/, '');
         })
         .filter((version) => {
            return version !== 'default';
         });

      return Array.from(new Set(versions)).sort(_compareVersions);
   }

   private _loadProviderBase(name: string): Template {
      if (!PROVIDER_NAME_PATTERN.test(name)) {
         this._logger.warn({ provider: name }, 'Invalid provider name');
         return {};
      }

      const file = this._findProviderFile(name);

      if (!file) {
         return {};
      }

      return this._readTemplate(file);
   }

   private _findProviderFile(name: string): string | null {
      if (!PROVIDER_NAME_PATTERN.test(name)) {
         return null;
      }

      return this._findYaml(path.join(this._providersDir, name, 'default'))
         ?? this._findYaml(path.join(this._providersDir, name));
   }

   private _resolveVersionOverlay(name: string, version: string): string | null {
      if (!PROVIDER_NAME_PATTERN.test(version) || version === 'default') {
         return null;
      }

      const dir = path.join(this._providersDir, name),
            exact = this._findYaml(path.join(dir, version));

      if (exact) {
         return exact;
      }

      const requested = semver.coerce(version);

      if (!requested) {
         return null;
      }

      const candidates = this.listVersions(name).filter((candidate) => {
         const coerced = semver.coerce(candidate);

         return coerced !== null && semver.lte(coerced, requested);
      });

      const best = candidates[candidates.length - 1];

      return best ? this._findYaml(path.join(dir, best)) : null;
   }

   private _findYaml(basePath: string): string | null {
      for (const ext of YAML_EXTENSIONS) {
         const candidate = `${basePath}${ext}`;

         if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
            return candidate;
         }
      }

      return null;
   }

   private _readTemplate(file: string): Template {
      let source: string,
          parsed: unknown,
          versionNode: unknown;

      try {
         source = fs.readFileSync(file, 'utf-8');

         const document = parseDocument(source);

         if (document.errors.length > 0) {
            throw document.errors[0];
         }

         parsed = document.toJS();
         versionNode = document.get('version', true);
      } catch(error) {
         this._logger.error({ file, err: error }, 'Failed to load template; treating it as empty');
         return {};
      }

      if (parsed === null || parsed === undefined) {
         return {};
      }

      if (!isTemplate(parsed)) {
         this._logger.warn({ file }, 'Template is not a mapping; treating it as empty');
         return {};
      }

      if (typeof parsed.version === 'number' && isScalar(versionNode) && versionNode.range) {
         const text = source.slice(versionNode.range[0], versionNode.range[1]).trim();

         if (VERSION_TEXT_PATTERN.test(text)) {
            parsed.version = text;
         }
      }

      return parsed;
   }

}

function _compareVersions(a: string, b: string): number {
   const left = semver.coerce(a),
         right = semver.coerce(b);

   if (left && right) {
      const order = semver.compare(left, right);

      if (order !== 0) {
         return order;
      }
   }

   return a.localeCompare(b);
}
