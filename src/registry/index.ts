export { PackageLoader, STRUCTURE_PLUGIN_SUBDIR } from './package-loader.js';
export type { PackageLoaderOptions } from './package-loader.js';
export { PluginMetaData, DESCRIPTOR_FILE_NAMES, DESKTOP_DESCRIPTOR_NAME, JSON_DESCRIPTOR_NAME } from './metadata.js';
export { StructureCache } from './structure-cache.js';
export { scanDescriptors } from './scanner.js';
export type { ScanOptions } from './scanner.js';
export { discoverRoot, findPlugin, listPlugins } from './discovery.js';
export { INDEX_FILE_NAME, readIndex, writeIndex, parseIndexDocument } from './index-reader.js';
export { decodeBinaryJson, encodeBinaryJson, hasBinaryJsonTag, setJsonMember } from './binary-json.js';
export type { JsonObject, JsonValue } from './binary-json.js';
export { parseDesktopEntry, desktopEntryToJson, splitListValue, unescapeDesktopValue } from './desktop-file.js';
export {
  ImportModuleFactory,
  StaticModuleFactory,
  invokeStructureFactory,
  factoryFromModule,
  NO_MATCHING_SERVICE,
} from './entry-point.js';
export type { ModuleFactory, StructureFactory, StructureFactoryArgs, LoadResult } from './entry-point.js';
