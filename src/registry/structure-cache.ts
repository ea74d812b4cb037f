/**
 * Owned mapping from package format to its structure instance.
 */

import type { PackageStructure } from '../package-structure.js';

export class StructureCache {
  private _structures: Map<string, PackageStructure> = new Map();

  get size(): number {
    return this._structures.size;
  }

  get(format: string): PackageStructure | null {
    return this._structures.get(format) ?? null;
  }

  has(format: string): boolean {
    return this._structures.has(format);
  }

  /**
   * Store `structure` for `format` unless one is already cached. Returns the
   * instance that ends up cached.
   */
  set(format: string, structure: PackageStructure): PackageStructure {
    const existing = this._structures.get(format);
    if (existing !== undefined) return existing;
    this._structures.set(format, structure);
    return structure;
  }

  formats(): string[] {
    return [...this._structures.keys()];
  }

  /** Drop every entry, disposing each instance once. */
  clear(): void {
    const owned = new Set(this._structures.values());
    this._structures.clear();
    for (const structure of owned) {
      structure.dispose?.();
    }
  }
}
