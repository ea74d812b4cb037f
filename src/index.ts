/**
 * packloader - package structure discovery and loading.
 */

// Core
export {
  PackageLoader,
  STRUCTURE_PLUGIN_SUBDIR,
  PluginMetaData,
  StructureCache,
  ImportModuleFactory,
  StaticModuleFactory,
  invokeStructureFactory,
  NO_MATCHING_SERVICE,
} from './registry/index.js';
export type {
  PackageLoaderOptions,
  ModuleFactory,
  StructureFactory,
  StructureFactoryArgs,
  LoadResult,
  ScanOptions,
} from './registry/index.js';

// Packages
export { Package } from './package.js';
export type { FileDefinition, DefinitionOptions } from './package.js';
export { GenericPackage, GENERIC_PACKAGE_FORMAT, isPackageStructure } from './package-structure.js';
export type { PackageStructure } from './package-structure.js';
export { CategoryVocabulary, STANDARD_CATEGORIES } from './categories.js';

// Discovery
export {
  scanDescriptors,
  findPlugin,
  listPlugins,
  readIndex,
  writeIndex,
  INDEX_FILE_NAME,
  DESCRIPTOR_FILE_NAMES,
  decodeBinaryJson,
  encodeBinaryJson,
  parseDesktopEntry,
} from './registry/index.js';
export type { JsonObject, JsonValue } from './registry/index.js';

// Config
export { Config, loadConfig, defaultConfig, standardDataDirs, validateConfig, LoaderConfigSchema } from './config.js';
export type { LoaderConfig, LoadConfigOptions } from './config.js';

// Errors
export {
  PackageLoaderError,
  ConfigError,
  ConfigNotFoundError,
  FormatUnresolvedError,
  ModuleLoadError,
  InvalidMetadataError,
  IndexParseError,
  LoaderDisposedError,
  ErrorCodes,
} from './errors.js';
export type { ErrorCode, ErrorOptions } from './errors.js';

// Observability
export { Logger } from './observability/index.js';
export type { LogLevel, LogFormat, LoggerOptions, WritableOutput } from './observability/index.js';

export const VERSION = '0.1.0';
