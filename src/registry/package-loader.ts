/**
 * Package loader: resolves package formats to cached structures and lists
 * installed packages.
 */

import { isAbsolute, join } from 'node:path';
import { CategoryVocabulary } from '../categories.js';
import { loadConfig, type LoaderConfig } from '../config.js';
import { FormatUnresolvedError, LoaderDisposedError, toError } from '../errors.js';
import { Logger } from '../observability/logger.js';
import { Package } from '../package.js';
import { GENERIC_PACKAGE_FORMAT, GenericPackage, type PackageStructure } from '../package-structure.js';
import { findPlugin, listPlugins } from './discovery.js';
import { ImportModuleFactory, invokeStructureFactory, type LoadResult, type ModuleFactory } from './entry-point.js';
import type { PluginMetaData } from './metadata.js';
import type { ScanOptions } from './scanner.js';
import { StructureCache } from './structure-cache.js';

/** Directory under each plugin path that holds structure plugins. */
export const STRUCTURE_PLUGIN_SUBDIR = join('packloader', 'packagestructure');

export interface PackageLoaderOptions {
  config?: LoaderConfig;
  moduleFactory?: ModuleFactory;
  logger?: Logger;
}

let activeLoader: PackageLoader | null = null;

/**
 * Resolves package formats to structures and hands out packages bound to
 * them.
 *
 * Each format's structure is created at most once and kept until
 * {@link PackageLoader.dispose}. Failed resolutions are not remembered: the
 * next request for the format repeats discovery.
 *
 * Hosts that need to serve some formats themselves subclass the loader,
 * override {@link PackageLoader.internalLoadPackage} and install the instance
 * with {@link PackageLoader.setPackageLoader} before anything calls
 * {@link PackageLoader.self}.
 */
export class PackageLoader {
  private readonly _config: LoaderConfig;
  private readonly _moduleFactory: ModuleFactory;
  private readonly _logger: Logger;
  private readonly _cache = new StructureCache();
  private readonly _pending: Map<string, Promise<LoadResult>> = new Map();
  private readonly _categories = new CategoryVocabulary();
  private readonly _isDefaultLoader: boolean;
  private _generation = 0;

  constructor(options?: PackageLoaderOptions) {
    this._config = options?.config ?? loadConfig();
    this._moduleFactory = options?.moduleFactory ?? new ImportModuleFactory();
    this._logger =
      options?.logger ??
      new Logger({
        name: 'packloader.loader',
        level: this._config.logging.level,
        format: this._config.logging.format,
      });
    // subclasses carry an override hook
    this._isDefaultLoader = new.target === PackageLoader;
  }

  /** Install the process-wide loader. Ignored once a loader is active. */
  static setPackageLoader(loader: PackageLoader): void {
    if (activeLoader === null) {
      activeLoader = loader;
      return;
    }
    activeLoader._logger.debug('Package loader already set, ignoring replacement');
  }

  /** The process-wide loader, created with defaults on first use. */
  static self(): PackageLoader {
    if (activeLoader === null) {
      activeLoader = new PackageLoader();
    }
    return activeLoader;
  }

  get isDefaultLoader(): boolean {
    return this._isDefaultLoader;
  }

  get config(): LoaderConfig {
    return this._config;
  }

  /** Directories searched for structure plugins, in precedence order. */
  structurePluginDirs(): string[] {
    return this._config.pluginPaths.map((p) => join(p, STRUCTURE_PLUGIN_SUBDIR));
  }

  private _scanOptions(): ScanOptions {
    return {
      maxDepth: this._config.scan.maxDepth,
      followSymlinks: this._config.scan.followSymlinks,
      logger: this._logger,
    };
  }

  /**
   * A package of `format`, bound to `path` when one is given. Resolves to an
   * invalid package when the format is empty or has no structure.
   */
  async loadPackage(format: string, path: string = ''): Promise<Package> {
    if (!this._isDefaultLoader) {
      try {
        const pkg = await this.internalLoadPackage(format);
        if (pkg.hasValidStructure()) {
          if (path) pkg.setPath(path);
          return pkg;
        }
      } catch (e) {
        this._logger.warn('Package loader override failed', { format, error: String(e) });
      }
    }

    if (format === '') return new Package();

    const structure = await this.loadPackageStructure(format);
    if (structure === null) return new Package();

    try {
      const pkg = new Package(structure);
      if (path) pkg.setPath(path);
      return pkg;
    } catch (e) {
      this._logger.warn('Package structure failed to initialize package', { format, error: String(e) });
      return new Package();
    }
  }

  /**
   * Override point consulted by {@link loadPackage} before the standard
   * mechanism on loaders that are not the default one. Return an invalid
   * package for formats the override does not serve.
   */
  protected internalLoadPackage(_format: string): Package | Promise<Package> {
    return new Package();
  }

  async loadPackageStructure(format: string): Promise<PackageStructure | null> {
    const result = await this.resolvePackageStructure(format);
    return result.ok ? result.structure : null;
  }

  /**
   * Resolve `format` to its structure, reporting why when there is none.
   * Concurrent calls for one format share a single attempt.
   */
  resolvePackageStructure(format: string): Promise<LoadResult> {
    const cached = this._cache.get(format);
    if (cached !== null) {
      return Promise.resolve({ ok: true, structure: cached });
    }

    const pending = this._pending.get(format);
    if (pending !== undefined) return pending;

    const attempt: Promise<LoadResult> = this._resolveUncached(format).finally(() => {
      if (this._pending.get(format) === attempt) this._pending.delete(format);
    });
    this._pending.set(format, attempt);
    return attempt;
  }

  private async _resolveUncached(format: string): Promise<LoadResult> {
    if (format === GENERIC_PACKAGE_FORMAT) {
      return { ok: true, structure: this._cache.set(format, new GenericPackage()) };
    }

    const searchDirs = this.structurePluginDirs();
    if (format === '') {
      return { ok: false, error: new FormatUnresolvedError(format, searchDirs) };
    }

    let metadata: PluginMetaData | null;
    try {
      metadata = findPlugin(searchDirs, format, this._scanOptions());
    } catch (e) {
      const error = new FormatUnresolvedError(format, searchDirs, { cause: toError(e) });
      this._logger.warn('Structure plugin discovery failed', { format, error: String(e) });
      return { ok: false, error };
    }

    if (metadata === null) {
      this._logger.debug('No structure plugin for format', { format, searchDirs });
      return { ok: false, error: new FormatUnresolvedError(format, searchDirs) };
    }

    const generation = this._generation;
    const result = await invokeStructureFactory(this._moduleFactory, metadata);
    if (result.ok && generation !== this._generation) {
      // disposed while the plugin was loading; the structure is never cached
      this._disposeStructure(format, result.structure);
      return { ok: false, error: new LoaderDisposedError(format) };
    }
    if (!result.ok) {
      this._logger.warn('Could not load installer for package type', {
        format,
        fileName: metadata.fileName,
        error: result.error.message,
      });
      return result;
    }
    return { ok: true, structure: this._cache.set(format, result.structure) };
  }

  /**
   * Installed packages of `format` under `root`.
   *
   * Without a root, the format's structure supplies its default package root,
   * falling back to `format` itself. An absolute root is searched alone; a
   * relative one under every data directory in order.
   */
  async listPackages(format: string, root: string = ''): Promise<PluginMetaData[]> {
    let actualRoot = root;
    if (actualRoot === '') {
      const structure = await this.loadPackageStructure(format);
      if (structure !== null) {
        try {
          actualRoot = new Package(structure).defaultPackageRoot;
        } catch (e) {
          this._logger.warn('Package structure failed to initialize package', { format, error: String(e) });
        }
      }
    }
    if (actualRoot === '') {
      actualRoot = format;
    }

    const roots = isAbsolute(actualRoot) ? [actualRoot] : this._config.dataDirs.map((dir) => join(dir, actualRoot));
    try {
      return listPlugins(roots, format, this._scanOptions());
    } catch (e) {
      this._logger.warn('Package listing failed', { format, roots, error: String(e) });
      return [];
    }
  }

  /** Every structure plugin visible on the plugin paths. */
  listPackageStructures(): PluginMetaData[] {
    try {
      return listPlugins(this.structurePluginDirs(), '', this._scanOptions());
    } catch (e) {
      this._logger.warn('Structure plugin listing failed', { error: String(e) });
      return [];
    }
  }

  /** Formats whose structure is currently cached. */
  cachedFormats(): string[] {
    return this._cache.formats();
  }

  knownCategories(): Set<string> {
    return this._categories.known();
  }

  registerCustomCategory(label: string): void {
    this._categories.register(label);
  }

  private _disposeStructure(format: string, structure: PackageStructure): void {
    try {
      structure.dispose?.();
    } catch (e) {
      this._logger.warn('Package structure failed to dispose', { format, error: String(e) });
    }
  }

  /**
   * Release every cached structure. Resolutions still in flight dispose what
   * they build instead of caching it.
   */
  dispose(): void {
    this._generation++;
    this._pending.clear();
    this._cache.clear();
  }
}
