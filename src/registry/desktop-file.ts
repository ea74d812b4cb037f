/**
 * Reader for desktop-entry style descriptor files (`metadata.desktop`).
 */

import { setJsonMember, type JsonObject, type JsonValue } from './binary-json.js';

export const DESKTOP_ENTRY_GROUP = 'Desktop Entry';

export type DesktopGroups = Map<string, Map<string, string>>;

const ESCAPES: Record<string, string> = { s: ' ', n: '\n', t: '\t', r: '\r', '\\': '\\' };

/** Resolve the `\s \n \t \r \\` escapes of a raw value. */
export function unescapeDesktopValue(raw: string): string {
  return raw.replace(/\\([sntr\\])/g, (_m, ch: string) => ESCAPES[ch]);
}

/**
 * Parse desktop-entry text into groups of key/value pairs.
 *
 * Keys before the first group header are ignored. The first occurrence of a
 * key within a group wins. Values are kept escaped: list values must be split
 * before their escapes are resolved.
 */
export function parseDesktopEntry(text: string): DesktopGroups {
  const groups: DesktopGroups = new Map();
  let current: Map<string, string> | null = null;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) continue;

    if (line.startsWith('[') && line.endsWith(']')) {
      const name = line.slice(1, -1).trim();
      current = groups.get(name) ?? new Map<string, string>();
      groups.set(name, current);
      continue;
    }

    const eq = line.indexOf('=');
    if (eq <= 0 || current === null) continue;
    const key = line.slice(0, eq).trim();
    if (current.has(key)) continue;
    current.set(key, line.slice(eq + 1).trim());
  }
  return groups;
}

/**
 * Split a raw list value on `,` or `;` and unescape each item. `\,` and `\;`
 * are literal separators; `\\` is a literal backslash.
 */
export function splitListValue(value: string): string[] {
  const items: string[] = [];
  let current = '';
  for (let i = 0; i < value.length; i++) {
    const ch = value[i];
    if (ch === '\\' && i + 1 < value.length) {
      const next = value[i + 1];
      current += next === ',' || next === ';' ? next : ch + next;
      i++;
    } else if (ch === ',' || ch === ';') {
      items.push(unescapeDesktopValue(current.trim()));
      current = '';
    } else {
      current += ch;
    }
  }
  items.push(unescapeDesktopValue(current.trim()));
  return items.filter((item) => item.length > 0);
}

const KPLUGIN_STRING_KEYS: Record<string, string> = {
  Name: 'Name',
  Comment: 'Description',
  Icon: 'Icon',
  'X-KDE-PluginInfo-Name': 'Id',
  'X-KDE-PluginInfo-Version': 'Version',
  'X-KDE-PluginInfo-Website': 'Website',
  'X-KDE-PluginInfo-Category': 'Category',
  'X-KDE-PluginInfo-License': 'License',
};

/**
 * Convert the `[Desktop Entry]` group to the JSON body form used by index
 * entries. Keys without a structured counterpart stay at the top level.
 */
export function desktopEntryToJson(groups: DesktopGroups): JsonObject {
  const entry = groups.get(DESKTOP_ENTRY_GROUP);
  if (entry === undefined || entry.size === 0) return {};

  const kplugin: JsonObject = {};
  const body: JsonObject = {};
  const author: JsonObject = {};

  for (const [key, raw] of entry) {
    const value = unescapeDesktopValue(raw);
    const localized = /^(.+)\[([^\]]+)\]$/.exec(key);
    const baseKey = localized ? localized[1] : key;
    const mapped = KPLUGIN_STRING_KEYS[baseKey];

    if (mapped !== undefined) {
      kplugin[localized ? `${mapped}[${localized[2]}]` : mapped] = value;
    } else if (baseKey === 'X-KDE-PluginInfo-Author') {
      author['Name'] = value;
    } else if (baseKey === 'X-KDE-PluginInfo-Email') {
      author['Email'] = value;
    } else if (baseKey === 'X-KDE-PluginInfo-EnabledByDefault') {
      kplugin['EnabledByDefault'] = value.toLowerCase() === 'true';
    } else if (baseKey === 'X-KDE-ServiceTypes' || baseKey === 'ServiceTypes') {
      const existing = kplugin['ServiceTypes'];
      const merged: JsonValue[] = Array.isArray(existing) ? existing : [];
      for (const type of splitListValue(raw)) {
        if (!merged.includes(type)) merged.push(type);
      }
      kplugin['ServiceTypes'] = merged;
    } else {
      setJsonMember(body, key, value);
    }
  }

  if (Object.keys(author).length > 0) {
    kplugin['Authors'] = [author];
  }
  body['KPlugin'] = kplugin;
  return body;
}
