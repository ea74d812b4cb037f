/**
 * Module factory seam: loading a plugin module and asking it for a package
 * structure.
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { ModuleLoadError, PackageLoaderError, toError } from '../errors.js';
import { isPackageStructure, type PackageStructure } from '../package-structure.js';
import type { JsonObject } from './binary-json.js';
import type { PluginMetaData } from './metadata.js';

export const NO_MATCHING_SERVICE = 'No service matching the requirements was found';

export interface StructureFactoryArgs {
  /** The plugin's own metadata record. */
  metadata: PluginMetaData;
  /** The plugin's raw metadata body, as construction configuration. */
  config: Readonly<JsonObject>;
}

export interface StructureFactory {
  /** Build a structure (or a promise of one), `null` when the plugin provides none. */
  create(args: StructureFactoryArgs): unknown;
}

/** Capability that turns a plugin file into its structure factory. */
export interface ModuleFactory {
  /** Rejects with `ModuleLoadError` when the file cannot provide a factory. */
  load(fileName: string): Promise<StructureFactory>;
}

export type LoadResult =
  | { ok: true; structure: PackageStructure }
  | { ok: false; error: PackageLoaderError };

type StructureConstructor = new (args: StructureFactoryArgs) => unknown;
type StructureFactoryFunction = (args: StructureFactoryArgs) => unknown;

function isStructureFactory(value: unknown): value is StructureFactory {
  return typeof value === 'object' && value !== null && 'create' in value && typeof value.create === 'function';
}

function isConstructor(value: unknown): value is StructureConstructor {
  return typeof value === 'function' && value.prototype !== undefined;
}

function isFactoryFunction(value: unknown): value is StructureFactoryFunction {
  return typeof value === 'function';
}

/**
 * Pick the factory a loaded module exposes.
 *
 * In order: a default export class (constructed with `new`), a default
 * export function (called), a `createPackageStructure` function, a default
 * export object with `create`, then the only named export object with
 * `create`. Factories may return the structure or a promise of it.
 */
export function factoryFromModule(fileName: string, loaded: Record<string, unknown>): StructureFactory {
  const def = loaded['default'];
  if (isConstructor(def)) {
    return { create: (args) => new def(args) };
  }
  if (isFactoryFunction(def)) {
    return { create: (args) => def(args) };
  }

  const fn = loaded['createPackageStructure'];
  if (isFactoryFunction(fn)) {
    return { create: (args) => fn(args) };
  }

  if (isStructureFactory(def)) return def;

  const candidates = Object.entries(loaded)
    .filter(([name]) => name !== 'default')
    .map(([, value]) => value)
    .filter(isStructureFactory);
  if (candidates.length === 1) return candidates[0];
  if (candidates.length === 0) {
    throw new ModuleLoadError(fileName, 'No package structure factory exported');
  }
  throw new ModuleLoadError(fileName, 'Ambiguous entry point: multiple factories exported');
}

/** Loads plugin files with dynamic `import()`. */
export class ImportModuleFactory implements ModuleFactory {
  async load(fileName: string): Promise<StructureFactory> {
    let loaded: Record<string, unknown>;
    try {
      loaded = await import(pathToFileURL(resolve(fileName)).href);
    } catch (e) {
      throw new ModuleLoadError(fileName, `Failed to import module: ${e}`, { cause: toError(e) });
    }
    return factoryFromModule(fileName, loaded);
  }
}

/** In-process table of factories keyed by plugin file, for statically linked structures. */
export class StaticModuleFactory implements ModuleFactory {
  private _factories: Map<string, StructureFactory> = new Map();

  constructor(entries?: Record<string, StructureFactory>) {
    for (const [fileName, factory] of Object.entries(entries ?? {})) {
      this.register(fileName, factory);
    }
  }

  register(fileName: string, factory: StructureFactory): void {
    this._factories.set(resolve(fileName), factory);
  }

  async load(fileName: string): Promise<StructureFactory> {
    const factory = this._factories.get(resolve(fileName));
    if (factory === undefined) {
      throw new ModuleLoadError(fileName, 'No factory registered for this file');
    }
    return factory;
  }
}

/**
 * Load the plugin behind `metadata` and build its structure, passing the
 * plugin's metadata as configuration. Never rejects.
 */
export async function invokeStructureFactory(
  moduleFactory: ModuleFactory,
  metadata: PluginMetaData,
): Promise<LoadResult> {
  const fileName = metadata.fileName;

  let factory: StructureFactory;
  try {
    factory = await moduleFactory.load(fileName);
  } catch (e) {
    const error = e instanceof PackageLoaderError ? e : new ModuleLoadError(fileName, String(e), { cause: toError(e) });
    return { ok: false, error };
  }

  let created: unknown;
  try {
    created = await factory.create({ metadata, config: metadata.rawData });
  } catch (e) {
    return {
      ok: false,
      error: new ModuleLoadError(fileName, `Structure construction failed: ${e}`, { cause: toError(e) }),
    };
  }

  if (!isPackageStructure(created)) {
    return { ok: false, error: new ModuleLoadError(fileName, NO_MATCHING_SERVICE) };
  }
  return { ok: true, structure: created };
}
