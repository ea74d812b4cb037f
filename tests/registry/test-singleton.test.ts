import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createBufferLogger, createTestConfig } from '../helpers.js';

type LoaderModule = typeof import('../../src/registry/package-loader.js');

async function freshLoaderModule(): Promise<LoaderModule> {
  return import('../../src/registry/package-loader.js');
}

beforeEach(() => {
  vi.resetModules();
});

describe('PackageLoader singleton', () => {
  it('creates one default loader lazily', async () => {
    const { PackageLoader } = await freshLoaderModule();
    const first = PackageLoader.self();
    expect(PackageLoader.self()).toBe(first);
    expect(first.isDefaultLoader).toBe(true);
  });

  it('keeps a loader installed before first use', async () => {
    const { PackageLoader } = await freshLoaderModule();
    class HostLoader extends PackageLoader {}
    const { logger } = createBufferLogger();
    const host = new HostLoader({ config: createTestConfig(), logger });

    PackageLoader.setPackageLoader(host);
    expect(PackageLoader.self()).toBe(host);
    expect(PackageLoader.self().isDefaultLoader).toBe(false);

    PackageLoader.setPackageLoader(new PackageLoader({ config: createTestConfig(), logger }));
    expect(PackageLoader.self()).toBe(host);
  });

  it('ignores a loader installed after first use', async () => {
    const { PackageLoader } = await freshLoaderModule();
    class HostLoader extends PackageLoader {}
    const { logger } = createBufferLogger();

    const first = PackageLoader.self();
    PackageLoader.setPackageLoader(new HostLoader({ config: createTestConfig(), logger }));
    expect(PackageLoader.self()).toBe(first);
    expect(PackageLoader.self().isDefaultLoader).toBe(true);
  });

  it('logs a replacement it ignores', async () => {
    const { PackageLoader } = await freshLoaderModule();
    const { logger, entries } = createBufferLogger();
    const installed = new PackageLoader({ config: createTestConfig(), logger });
    PackageLoader.setPackageLoader(installed);

    PackageLoader.setPackageLoader(new PackageLoader({ config: createTestConfig(), logger }));
    expect(PackageLoader.self()).toBe(installed);
    expect(entries().map((e) => e['message'])).toEqual(['Package loader already set, ignoring replacement']);
  });
});
