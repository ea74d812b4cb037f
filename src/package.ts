/**
 * Package handle: a borrowed structure paired with an on-disk root.
 */

import { isAbsolute, join } from 'node:path';
import type { PackageStructure } from './package-structure.js';

export interface FileDefinition {
  readonly key: string;
  readonly path: string;
  readonly name: string;
  readonly required: boolean;
  readonly directory: boolean;
}

export interface DefinitionOptions {
  name?: string;
  required?: boolean;
}

export class Package {
  private readonly _structure: PackageStructure | null;
  private _path = '';
  private _defaultPackageRoot = '';
  private _contentsPrefixPaths: string[] = [''];
  private _definitions: Map<string, FileDefinition> = new Map();

  /** Runs `structure.initPackage`; errors it throws propagate. */
  constructor(structure: PackageStructure | null = null) {
    this._structure = structure;
    structure?.initPackage(this);
  }

  get structure(): PackageStructure | null {
    return this._structure;
  }

  hasValidStructure(): boolean {
    return this._structure !== null;
  }

  get path(): string {
    return this._path;
  }

  /**
   * Bind the package to its root. Meant to be called once, before the
   * package is handed out.
   */
  setPath(path: string): void {
    if (path === this._path) return;
    this._path = path;
    this._structure?.pathChanged?.(this);
  }

  get defaultPackageRoot(): string {
    return this._defaultPackageRoot;
  }

  setDefaultPackageRoot(root: string): void {
    this._defaultPackageRoot = root;
  }

  get contentsPrefixPaths(): readonly string[] {
    return this._contentsPrefixPaths;
  }

  setContentsPrefixPaths(prefixes: readonly string[]): void {
    this._contentsPrefixPaths = prefixes.length > 0 ? [...prefixes] : [''];
  }

  addFileDefinition(key: string, path: string, options?: DefinitionOptions): void {
    this._addDefinition(key, path, false, options);
  }

  addDirectoryDefinition(key: string, path: string, options?: DefinitionOptions): void {
    this._addDefinition(key, path, true, options);
  }

  private _addDefinition(key: string, path: string, directory: boolean, options?: DefinitionOptions): void {
    this._definitions.set(key, {
      key,
      path,
      name: options?.name ?? key,
      required: options?.required ?? false,
      directory,
    });
  }

  definition(key: string): FileDefinition | null {
    return this._definitions.get(key) ?? null;
  }

  requiredFiles(): string[] {
    return [...this._definitions.values()].filter((d) => d.required).map((d) => d.key);
  }

  /**
   * Location of a defined file under the package root and first contents
   * prefix, or `null` for an unbound package or unknown key.
   */
  filePath(key: string): string | null {
    const def = this._definitions.get(key);
    if (def === undefined || this._path === '') return null;
    if (isAbsolute(def.path)) return def.path;
    return join(this._path, this._contentsPrefixPaths[0], def.path);
  }
}
