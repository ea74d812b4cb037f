/**
 * Two-tier plugin discovery: a root's index when it has one, otherwise a
 * descriptor scan of the root.
 */

import { readIndex } from './index-reader.js';
import type { PluginMetaData } from './metadata.js';
import { scanDescriptors, type ScanOptions } from './scanner.js';

/** Records of one root: the index when present, else a scan. */
export function discoverRoot(root: string, options?: ScanOptions): { records: PluginMetaData[]; indexed: boolean } {
  const indexed = readIndex(root, options?.logger);
  if (indexed !== null) {
    return { records: indexed, indexed: true };
  }
  return { records: scanDescriptors(root, options), indexed: false };
}

/**
 * Installed plugins under every root, roots in order.
 *
 * Scanned records are kept only when they declare `format` among their
 * service types (any record when `format` is empty); indexed records are
 * taken as listed.
 */
export function listPlugins(roots: readonly string[], format: string, options?: ScanOptions): PluginMetaData[] {
  const result: PluginMetaData[] = [];
  for (const root of roots) {
    const { records, indexed } = discoverRoot(root, options);
    for (const record of records) {
      if (indexed || format === '' || record.serviceTypes.has(format)) {
        result.push(record);
      }
    }
  }
  return result;
}

/** First record whose plugin id is exactly `pluginId`, searching roots in order. */
export function findPlugin(
  roots: readonly string[],
  pluginId: string,
  options?: ScanOptions,
): PluginMetaData | null {
  for (const root of roots) {
    const { records } = discoverRoot(root, options);
    const match = records.find((record) => record.pluginId === pluginId);
    if (match !== undefined) return match;
  }
  return null;
}
