/**
 * Package structure capability and the built-in generic structure.
 */

import type { Package } from './package.js';

/** Well-known format served by {@link GenericPackage} without discovery. */
export const GENERIC_PACKAGE_FORMAT = 'KPackage/Generic';

/**
 * Strategy describing how packages of one format are laid out.
 *
 * Instances are owned by the loader's structure cache; a `Package` only
 * borrows one.
 */
export interface PackageStructure {
  /** Configure a freshly created package: default root, prefixes, files. */
  initPackage(pkg: Package): void;
  /** Called after the package's path changes. */
  pathChanged?(pkg: Package): void;
  /** Release resources when the owning cache is cleared. */
  dispose?(): void;
}

export function isPackageStructure(value: unknown): value is PackageStructure {
  return (
    typeof value === 'object' &&
    value !== null &&
    'initPackage' in value &&
    typeof value.initPackage === 'function'
  );
}

export class GenericPackage implements PackageStructure {
  initPackage(pkg: Package): void {
    pkg.setDefaultPackageRoot('kpackage/generic/');
    pkg.setContentsPrefixPaths(['contents/']);
    pkg.addFileDefinition('mainscript', 'ui/main.qml', { name: 'Main Script File', required: true });
  }
}
