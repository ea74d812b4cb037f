/**
 * Recursive directory scanner for plugin descriptor files.
 */

import { lstatSync, readdirSync, realpathSync, statSync, type Stats } from 'node:fs';
import { join, resolve } from 'node:path';
import { defaultLogger, type Logger } from '../observability/logger.js';
import { DESCRIPTOR_FILE_NAMES, PluginMetaData } from './metadata.js';

export interface ScanOptions {
  maxDepth?: number;
  followSymlinks?: boolean;
  logger?: Logger;
}

function existsAndIsDir(p: string): boolean {
  try {
    return statSync(p).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Walk `root` for `metadata.json` / `metadata.desktop` descriptors and return
 * the valid records, depth first with entries in name order. A directory
 * holding both descriptors contributes its `metadata.json` only. A missing
 * root yields no records.
 */
export function scanDescriptors(root: string, options?: ScanOptions): PluginMetaData[] {
  const maxDepth = options?.maxDepth ?? 8;
  const followSymlinks = options?.followSymlinks ?? false;
  const logger = options?.logger ?? defaultLogger();

  const rootResolved = resolve(root);
  if (!existsAndIsDir(rootResolved)) return [];

  const visitedRealPaths = new Set<string>();
  const results: PluginMetaData[] = [];

  function readDescriptor(path: string): void {
    let record: PluginMetaData;
    try {
      record = PluginMetaData.fromDescriptor(path);
    } catch (e) {
      logger.debug('Skipping unreadable descriptor', { path, error: String(e) });
      return;
    }
    if (!record.isValid) {
      logger.debug('Skipping invalid descriptor', { path });
      return;
    }
    results.push(record);
  }

  function scanDir(dirPath: string, depth: number): void {
    if (depth > maxDepth) {
      logger.warn('Max scan depth exceeded', { dir: dirPath, maxDepth });
      return;
    }

    let real: string;
    try {
      real = realpathSync(dirPath);
    } catch {
      logger.warn('Cannot resolve directory', { dir: dirPath });
      return;
    }
    // each real directory is scanned once, whichever path reaches it first
    if (visitedRealPaths.has(real)) return;
    visitedRealPaths.add(real);

    let entries: string[];
    try {
      entries = readdirSync(dirPath).sort();
    } catch {
      logger.warn('Cannot read directory', { dir: dirPath });
      return;
    }

    const descriptor = DESCRIPTOR_FILE_NAMES.find((name) => entries.includes(name));
    if (descriptor !== undefined) {
      readDescriptor(join(dirPath, descriptor));
    }

    for (const name of entries) {
      if (name.startsWith('.')) continue;

      const entryPath = join(dirPath, name);
      let stat: Stats;
      try {
        stat = lstatSync(entryPath);
      } catch {
        logger.warn('Cannot stat entry', { path: entryPath });
        continue;
      }

      if (stat.isSymbolicLink()) {
        if (!followSymlinks || !existsAndIsDir(entryPath)) continue;
        scanDir(entryPath, depth + 1);
      } else if (stat.isDirectory()) {
        scanDir(entryPath, depth + 1);
      }
    }
  }

  scanDir(rootResolved, 1);
  return results;
}
