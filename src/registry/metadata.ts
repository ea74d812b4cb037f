/**
 * Plugin metadata records built from index entries and descriptor files.
 */

import { readFileSync } from 'node:fs';
import { basename, dirname, extname, isAbsolute, resolve } from 'node:path';
import { InvalidMetadataError, toError } from '../errors.js';
import type { JsonObject, JsonValue } from './binary-json.js';
import { desktopEntryToJson, parseDesktopEntry, splitListValue } from './desktop-file.js';

export const DESKTOP_DESCRIPTOR_NAME = 'metadata.desktop';
export const JSON_DESCRIPTOR_NAME = 'metadata.json';
/** Descriptor file names in order of preference within one directory. */
export const DESCRIPTOR_FILE_NAMES: readonly string[] = [JSON_DESCRIPTOR_NAME, DESKTOP_DESCRIPTOR_NAME];

export function isJsonObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function stringField(obj: JsonObject | undefined, key: string): string {
  const value = obj?.[key];
  return typeof value === 'string' ? value : '';
}

function deepFreeze<T extends JsonValue>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function listField(value: JsonValue | undefined): string[] {
  if (typeof value === 'string') return splitListValue(value);
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string' && v.length > 0);
  return [];
}

export class PluginMetaData {
  readonly pluginId: string;
  readonly fileName: string;
  readonly metaDataFileName: string;
  readonly serviceTypes: ReadonlySet<string>;
  readonly isValid: boolean;
  readonly rawData: Readonly<JsonObject>;

  /**
   * @param data JSON body; copied and frozen.
   * @param fileName backing module or descriptor path.
   * @param metaDataFileName file the body was read from, defaults to `fileName`.
   */
  constructor(data: JsonObject, fileName: string, metaDataFileName?: string) {
    this.rawData = deepFreeze(structuredClone(data));
    this.fileName = fileName;
    this.metaDataFileName = metaDataFileName ?? fileName;

    const kplugin = this._kplugin();
    let id = stringField(kplugin, 'Id') || stringField(this.rawData, 'X-KDE-PluginInfo-Name');
    if (!id && fileName) {
      id = basename(fileName, extname(fileName));
    }
    this.pluginId = id;

    const types =
      kplugin?.['ServiceTypes'] ?? this.rawData['X-KDE-ServiceTypes'] ?? this.rawData['ServiceTypes'];
    this.serviceTypes = new Set(listField(types));

    this.isValid = fileName.length > 0 && Object.keys(this.rawData).length > 0 && id.length > 0;
  }

  /**
   * Build a record from an index entry. A relative `fileName` resolves
   * against `baseDir` when one is given.
   */
  static fromJson(obj: JsonObject, fileName: string, metaDataFileName?: string, baseDir?: string): PluginMetaData {
    const resolved = fileName && baseDir && !isAbsolute(fileName) ? resolve(baseDir, fileName) : fileName;
    return new PluginMetaData(obj, resolved, metaDataFileName);
  }

  /**
   * Read a `metadata.desktop` or `metadata.json` descriptor. When it names a
   * library (`X-KDE-Library`), that file becomes `fileName`.
   */
  static fromDescriptor(path: string): PluginMetaData {
    let text: string;
    try {
      text = readFileSync(path, 'utf-8');
    } catch (e) {
      throw new InvalidMetadataError(path, 'descriptor cannot be read', { cause: toError(e) });
    }

    let body: JsonObject;
    if (extname(path) === '.json') {
      let parsed: unknown;
      try {
        parsed = JSON.parse(text);
      } catch (e) {
        throw new InvalidMetadataError(path, 'descriptor is not valid JSON', { cause: toError(e) });
      }
      if (!isJsonObject(parsed)) {
        throw new InvalidMetadataError(path, 'descriptor must be a JSON object');
      }
      body = parsed;
    } else {
      body = desktopEntryToJson(parseDesktopEntry(text));
    }

    const library = stringField(body, 'X-KDE-Library');
    const fileName = library ? resolve(dirname(path), library) : path;
    return new PluginMetaData(body, fileName, path);
  }

  private _kplugin(): JsonObject | undefined {
    const kplugin = this.rawData['KPlugin'];
    return isJsonObject(kplugin) ? kplugin : undefined;
  }

  get name(): string {
    return stringField(this._kplugin(), 'Name') || stringField(this.rawData, 'Name');
  }

  get description(): string {
    return stringField(this._kplugin(), 'Description') || stringField(this.rawData, 'Comment');
  }

  get category(): string {
    return stringField(this._kplugin(), 'Category') || stringField(this.rawData, 'X-KDE-PluginInfo-Category');
  }

  get version(): string {
    return stringField(this._kplugin(), 'Version') || stringField(this.rawData, 'X-KDE-PluginInfo-Version');
  }

  get license(): string {
    return stringField(this._kplugin(), 'License') || stringField(this.rawData, 'X-KDE-PluginInfo-License');
  }

  get website(): string {
    return stringField(this._kplugin(), 'Website') || stringField(this.rawData, 'X-KDE-PluginInfo-Website');
  }

  get enabledByDefault(): boolean {
    const value = this._kplugin()?.['EnabledByDefault'] ?? this.rawData['X-KDE-PluginInfo-EnabledByDefault'];
    return value === true || value === 'true';
  }

  /** Index entry form: the body plus `FileName`. */
  toJSON(): JsonObject {
    return { ...structuredClone(this.rawData), FileName: this.fileName };
  }
}
