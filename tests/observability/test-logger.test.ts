import { describe, it, expect } from 'vitest';
import { Logger, isLogLevel } from '../../src/observability/logger.js';

function createBufferOutput() {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => lines.push(s) },
    lines,
  };
}

describe('Logger', () => {
  it('logs JSON format by default', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ output });
    logger.info('test message', { format: 'theme' });
    expect(lines).toHaveLength(1);
    const parsed = JSON.parse(lines[0]);
    expect(parsed.level).toBe('info');
    expect(parsed.message).toBe('test message');
    expect(parsed.logger).toBe('packloader');
    expect(parsed.extra).toEqual({ format: 'theme' });
  });

  it('logs text format', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ name: 'loader', format: 'text', output });
    logger.warn('cannot load', { format: 'theme', dirs: ['/a', '/b'] });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \[WARN\] \[loader\] cannot load format=theme dirs=\/a,\/b\n$/);
  });

  it('respects log level filtering', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ level: 'warn', output });
    logger.debug('should not appear');
    logger.info('should not appear');
    logger.warn('should appear');
    logger.error('should appear');
    expect(lines).toHaveLength(2);
    expect(logger.isEnabled('info')).toBe(false);
  });

  it('redacts _secret_ prefix keys', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ output });
    logger.info('test', { _secret_token: 'test-secret', name: 'Bob' });
    const parsed = JSON.parse(lines[0]);
    expect(parsed.extra._secret_token).toBe('***REDACTED***');
    expect(parsed.extra.name).toBe('Bob');
  });

  it('does not redact when disabled', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ output, redactSensitive: false });
    logger.info('test', { _secret_token: 'test-secret' });
    expect(JSON.parse(lines[0]).extra._secret_token).toBe('test-secret');
  });

  it('creates children sharing output and level', () => {
    const { output, lines } = createBufferOutput();
    const child = new Logger({ name: 'packloader', level: 'error', output }).child('scanner');
    expect(child.name).toBe('packloader.scanner');
    expect(child.level).toBe('error');
    child.warn('hidden');
    child.error('shown');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).logger).toBe('packloader.scanner');
  });
});

describe('isLogLevel', () => {
  it('recognizes level names', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('loud')).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
