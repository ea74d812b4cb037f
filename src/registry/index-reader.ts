/**
 * Precomputed plugin index (`kpluginindex.json`) reading and generation.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { isAbsolute, join, relative } from 'node:path';
import { IndexParseError, toError } from '../errors.js';
import { defaultLogger, type Logger } from '../observability/logger.js';
import { decodeBinaryJson, encodeBinaryJson, hasBinaryJsonTag, type JsonObject, type JsonValue } from './binary-json.js';
import { PluginMetaData, isJsonObject } from './metadata.js';
import { scanDescriptors, type ScanOptions } from './scanner.js';

export const INDEX_FILE_NAME = 'kpluginindex.json';

export function indexPath(dir: string): string {
  return join(dir, INDEX_FILE_NAME);
}

/**
 * Decode index file contents. Tagged data is binary JSON; anything else is
 * read as UTF-8 JSON text.
 */
export function parseIndexDocument(bytes: Uint8Array): JsonValue {
  if (hasBinaryJsonTag(bytes)) {
    return decodeBinaryJson(bytes);
  }
  const text = new TextDecoder('utf-8').decode(bytes);
  try {
    const parsed: JsonValue = JSON.parse(text);
    return parsed;
  } catch (e) {
    throw new IndexParseError('neither binary JSON nor JSON text', undefined, { cause: toError(e) });
  }
}

/**
 * Records of the index inside `dir`, in index order, or `null` when `dir`
 * has no index. Entries that are not objects or not valid are dropped.
 */
export function readIndex(dir: string, logger: Logger = defaultLogger()): PluginMetaData[] | null {
  const file = indexPath(dir);
  if (!existsSync(file)) return null;

  let document: JsonValue;
  try {
    document = parseIndexDocument(readFileSync(file));
  } catch (e) {
    logger.warn('Ignoring unreadable plugin index', { file, error: String(e) });
    return [];
  }

  if (!Array.isArray(document)) {
    logger.warn('Plugin index must hold a top-level array', { file });
    return [];
  }

  const records: PluginMetaData[] = [];
  for (const [position, item] of document.entries()) {
    if (!isJsonObject(item)) {
      logger.debug('Skipping non-object index entry', { file, position });
      continue;
    }
    const fileName = typeof item['FileName'] === 'string' ? item['FileName'] : '';
    const record = PluginMetaData.fromJson(item, fileName, file, dir);
    if (!record.isValid) {
      logger.debug('Skipping invalid index entry', { file, position, pluginId: record.pluginId });
      continue;
    }
    records.push(record);
  }
  return records;
}

/**
 * Scan `dir` for descriptors and write their records as a binary index.
 * File names inside `dir` are stored relative to it.
 *
 * @returns number of records written
 */
export function writeIndex(dir: string, options?: ScanOptions & { logger?: Logger }): number {
  const records = scanDescriptors(dir, options);
  const entries: JsonObject[] = records.map((record) => {
    const rel = relative(dir, record.fileName);
    const stored = rel.startsWith('..') || isAbsolute(rel) ? record.fileName : rel;
    return { ...record.toJSON(), FileName: stored };
  });
  writeFileSync(indexPath(dir), encodeBinaryJson(entries));
  (options?.logger ?? defaultLogger()).info('Wrote plugin index', { dir, count: entries.length });
  return entries.length;
}
