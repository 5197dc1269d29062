import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { fileURLToPath } from 'node:url';
import {
  DEFAULT_WAIT_CONFIG,
  loadWaitConfig,
  parseWaitConfig,
  resolveSessionTimeouts,
  resolveWaitSpec,
} from '../../src/config/loader.js';
import { ConfigurationError } from '../../src/exception/errors.js';
import type { WaitConfig } from '../../src/types/index.js';

const SHIPPED_CONFIG = fileURLToPath(new URL('../../config/waits.json', import.meta.url));

const config: WaitConfig = {
  defaults: { timeoutMs: 10_000, pollIntervalMs: 500 },
  profiles: {
    quick: { timeoutMs: 2000, pollIntervalMs: 100 },
    lenient: { ignoring: ['NoSuchElement'] },
  },
  session: { implicitWaitMs: 0, pageLoadMs: 30_000 },
};

describe('loadWaitConfig', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `wait-config-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('loads and validates a config file', async () => {
    const path = join(testDir, 'waits.json');
    await writeFile(path, JSON.stringify({ defaults: { timeoutMs: 3000 }, profiles: { quick: { timeoutMs: 500 } } }));

    const loaded = await loadWaitConfig(path);
    expect(loaded.defaults).toEqual({ timeoutMs: 3000 });
    expect(loaded.profiles.quick).toEqual({ timeoutMs: 500 });
    expect(loaded.session).toEqual({ implicitWaitMs: 0, pageLoadMs: 30_000 });
  });

  it('rejects a file that is not JSON', async () => {
    const path = join(testDir, 'broken.json');
    await writeFile(path, '{ defaults: ');

    await expect(loadWaitConfig(path)).rejects.toThrow(ConfigurationError);
    await expect(loadWaitConfig(path)).rejects.toThrow(`Wait config ${path} is not valid JSON`);
  });

  it('names the file and field of an invalid value', async () => {
    const path = join(testDir, 'invalid.json');
    await writeFile(path, JSON.stringify({ defaults: { timeoutMs: 1000, pollIntervalMs: 0 } }));

    await expect(loadWaitConfig(path)).rejects.toThrow(`Invalid ${path}: defaults.pollIntervalMs:`);
  });

  it('reads the bundled profiles', async () => {
    const loaded = await loadWaitConfig(SHIPPED_CONFIG);
    const fluent = resolveWaitSpec(loaded, 'fluent');

    expect(fluent.timeoutMs).toBe(30_000);
    expect(fluent.pollIntervalMs).toBe(5000);
    expect([...fluent.ignoring]).toEqual(['NoSuchElement']);
  });
});

describe('parseWaitConfig', () => {
  it('requires defaults', () => {
    expect(() => parseWaitConfig({ profiles: {} })).toThrow(/^Invalid wait config: defaults: /);
  });
});

describe('resolveWaitSpec', () => {
  it('uses the config defaults', () => {
    const spec = resolveWaitSpec(config);
    expect(spec.timeoutMs).toBe(10_000);
    expect(spec.pollIntervalMs).toBe(500);
    expect(spec.ignoring.size).toBe(0);
  });

  it('layers profile and overrides field by field', () => {
    const spec = resolveWaitSpec(config, 'quick', { ignoring: ['StaleElement'] }, { timeoutMs: 3000 });

    expect(spec.timeoutMs).toBe(3000);
    expect(spec.pollIntervalMs).toBe(100);
    expect([...spec.ignoring]).toEqual(['StaleElement']);
  });

  it('skips undefined fields and layers', () => {
    const spec = resolveWaitSpec(config, 'lenient', undefined, { timeoutMs: undefined, message: 'menu' });

    expect(spec.timeoutMs).toBe(10_000);
    expect(spec.message).toBe('menu');
    expect(spec.ignoring.has('NoSuchElement')).toBe(true);
  });

  it('rejects an unknown profile', () => {
    expect(() => resolveWaitSpec(config, 'glacial')).toThrow('Unknown wait profile "glacial"');
  });

  it('falls back to the built-in defaults', () => {
    expect(resolveWaitSpec(DEFAULT_WAIT_CONFIG).timeoutMs).toBe(10_000);
  });
});

describe('resolveSessionTimeouts', () => {
  it('prefers plan values over config values', () => {
    expect(resolveSessionTimeouts(config, { implicitWaitMs: 250 })).toEqual({ implicitWaitMs: 250, pageLoadMs: 30_000 });
    expect(resolveSessionTimeouts(config)).toEqual({ implicitWaitMs: 0, pageLoadMs: 30_000 });
  });
});
