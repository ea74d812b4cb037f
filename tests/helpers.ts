/**
 * Shared test fixtures and helpers.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { defaultConfig, type LoaderConfig } from '../src/config.js';
import { Logger, type LogLevel } from '../src/observability/logger.js';
import type { Package } from '../src/package.js';
import type { PackageStructure } from '../src/package-structure.js';

export function touch(root: string, relativePath: string, content = ''): string {
  const full = join(root, relativePath);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
  return full;
}

/** Write a `metadata.desktop` declaring `id` with the given service types. */
export function writeDesktopDescriptor(
  root: string,
  relativeDir: string,
  id: string,
  serviceTypes: string[] = [],
  extra: Record<string, string> = {},
): string {
  const lines = ['[Desktop Entry]', `Name=${id} package`, `X-KDE-PluginInfo-Name=${id}`];
  if (serviceTypes.length > 0) lines.push(`X-KDE-ServiceTypes=${serviceTypes.join(',')}`);
  for (const [key, value] of Object.entries(extra)) lines.push(`${key}=${value}`);
  return touch(root, join(relativeDir, 'metadata.desktop'), lines.join('\n') + '\n');
}

export function createBufferLogger(level: LogLevel = 'debug'): {
  logger: Logger;
  lines: string[];
  entries: () => Array<Record<string, unknown>>;
} {
  const lines: string[] = [];
  const logger = new Logger({ name: 'test', level, output: { write: (s: string) => lines.push(s) } });
  return {
    logger,
    lines,
    entries: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

export function createTestConfig(overrides?: Partial<LoaderConfig>): LoaderConfig {
  return { ...defaultConfig('/nonexistent-home'), dataDirs: [], pluginPaths: [], ...overrides };
}

/** Minimal structure with a configurable default root. */
export class TestStructure implements PackageStructure {
  readonly label: string;
  readonly root: string;
  disposed = 0;
  pathChanges: string[] = [];

  constructor(label = 'test', root = '') {
    this.label = label;
    this.root = root;
  }

  initPackage(pkg: Package): void {
    pkg.setDefaultPackageRoot(this.root);
    pkg.addFileDefinition('config', 'config/main.xml');
  }

  pathChanged(pkg: Package): void {
    this.pathChanges.push(pkg.path);
  }

  dispose(): void {
    this.disposed++;
  }
}
