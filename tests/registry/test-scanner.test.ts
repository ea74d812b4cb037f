import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, mkdirSync, rmSync, symlinkSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { scanDescriptors } from '../../src/registry/scanner.js';
import { createBufferLogger, touch, writeDesktopDescriptor } from '../helpers.js';

let tempDir: string;

beforeEach(() => {
  tempDir = mkdtempSync(join(tmpdir(), 'scanner-test-'));
});

afterEach(() => {
  rmSync(tempDir, { recursive: true, force: true });
});

describe('scanDescriptors', () => {
  it('returns nothing for a missing root', () => {
    expect(scanDescriptors(join(tempDir, 'missing'))).toEqual([]);
  });

  it('finds descriptors recursively, depth first in name order', () => {
    writeDesktopDescriptor(tempDir, 'b', 'b');
    writeDesktopDescriptor(tempDir, 'a/nested', 'a.nested');
    writeDesktopDescriptor(tempDir, 'a', 'a');
    writeDesktopDescriptor(tempDir, 'c/deep/er', 'c.deeper');

    const ids = scanDescriptors(tempDir).map((r) => r.pluginId);
    expect(ids).toEqual(['a', 'a.nested', 'b', 'c.deeper']);
  });

  it('prefers metadata.json over metadata.desktop in the same directory', () => {
    writeDesktopDescriptor(tempDir, 'pkg', 'from.desktop');
    touch(tempDir, 'pkg/metadata.json', JSON.stringify({ KPlugin: { Id: 'from.json' } }));

    expect(scanDescriptors(tempDir).map((r) => r.pluginId)).toEqual(['from.json']);
  });

  it('ignores other files and hidden directories', () => {
    touch(tempDir, 'pkg/readme.md', '# hi');
    touch(tempDir, 'pkg/metadata.desktop.bak', '[Desktop Entry]\nX-KDE-PluginInfo-Name=bak\n');
    writeDesktopDescriptor(tempDir, '.hidden', 'hidden');
    writeDesktopDescriptor(tempDir, 'visible', 'visible');

    expect(scanDescriptors(tempDir).map((r) => r.pluginId)).toEqual(['visible']);
  });

  it('drops invalid and unreadable descriptors', () => {
    const { logger, entries } = createBufferLogger();
    touch(tempDir, 'empty/metadata.desktop', '# nothing here\n');
    touch(tempDir, 'broken/metadata.json', '{');
    writeDesktopDescriptor(tempDir, 'good', 'good');

    expect(scanDescriptors(tempDir, { logger }).map((r) => r.pluginId)).toEqual(['good']);
    expect(entries().map((e) => e['message'])).toEqual(['Skipping unreadable descriptor', 'Skipping invalid descriptor']);
  });

  it('stops at the maximum depth with a warning', () => {
    const { logger, entries } = createBufferLogger('warn');
    writeDesktopDescriptor(tempDir, 'one', 'one');
    writeDesktopDescriptor(tempDir, 'one/two/three', 'three');

    expect(scanDescriptors(tempDir, { maxDepth: 2, logger }).map((r) => r.pluginId)).toEqual(['one']);
    expect(entries()).toHaveLength(1);
    expect(entries()[0]['message']).toBe('Max scan depth exceeded');
  });

  it('follows symlinked directories only when asked, and only once', () => {
    const outside = mkdtempSync(join(tmpdir(), 'scanner-outside-'));
    try {
      writeDesktopDescriptor(outside, 'linked', 'linked');
      mkdirSync(join(tempDir, 'root'));
      symlinkSync(outside, join(tempDir, 'root', 'link1'), 'dir');
      symlinkSync(outside, join(tempDir, 'root', 'link2'), 'dir');

      const root = join(tempDir, 'root');
      expect(scanDescriptors(root)).toEqual([]);
      expect(scanDescriptors(root, { followSymlinks: true }).map((r) => r.pluginId)).toEqual(['linked']);
    } finally {
      rmSync(outside, { recursive: true, force: true });
    }
  });

  it('does not rescan a directory reached again through a link inside the tree', () => {
    writeDesktopDescriptor(tempDir, 'a', 'a');
    writeDesktopDescriptor(tempDir, 'c/nested', 'c.nested');
    symlinkSync(join(tempDir, 'a'), join(tempDir, 'b'), 'dir');
    symlinkSync(tempDir, join(tempDir, 'c', 'up'), 'dir');

    expect(scanDescriptors(tempDir, { followSymlinks: true }).map((r) => r.pluginId)).toEqual(['a', 'c.nested']);
  });
});
