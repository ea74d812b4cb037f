/**
 * Category vocabulary for package listings. Labels have no effect on loading.
 */

export const STANDARD_CATEGORIES: readonly string[] = Object.freeze([
  'Accessibility',
  'Application Launchers',
  'Astronomy',
  'Date and Time',
  'Development Tools',
  'Education',
  'Environment and Weather',
  'Examples',
  'File System',
  'Fun and Games',
  'Graphics',
  'Language',
  'Mapping',
  'Miscellaneous',
  'Multimedia',
  'Online Services',
  'Productivity',
  'System Information',
  'Utilities',
  'Windows and Tasks',
]);

/** Standard labels plus host additions, compared lower-cased. */
export class CategoryVocabulary {
  private _custom: Set<string> = new Set();

  register(label: string): void {
    const normalized = label.trim().toLowerCase();
    if (normalized) this._custom.add(normalized);
  }

  known(): Set<string> {
    const all = new Set(this._custom);
    for (const label of STANDARD_CATEGORIES) all.add(label.toLowerCase());
    return all;
  }
}
