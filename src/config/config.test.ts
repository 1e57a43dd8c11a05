import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  configExists,
  loadConfig,
  mergeWithDefaults,
  resolveConfigPath,
  resolveDbPath,
  saveConfig,
} from './config.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError, ConfigNotFoundError } from '../shared/errors.js';

let cwd: string;

function writeRawConfig(content: string): void {
  fs.mkdirSync(path.join(cwd, '.citegraph'), { recursive: true });
  fs.writeFileSync(resolveConfigPath(cwd), content, 'utf-8');
}

beforeEach(() => {
  cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'citegraph-config-'));
});

afterEach(() => {
  fs.rmSync(cwd, { recursive: true, force: true });
});

describe('config paths', () => {
  it('keeps everything under .citegraph', () => {
    expect(resolveConfigPath('/work')).toBe(path.join('/work', '.citegraph', 'config.json'));
    expect(resolveDbPath('/work')).toBe(path.join('/work', '.citegraph', 'citegraph.db'));
  });
});

describe('loadConfig', () => {
  it('throws ConfigNotFoundError before init', () => {
    expect(configExists(cwd)).toBe(false);
    expect(() => loadConfig(cwd)).toThrow(ConfigNotFoundError);
  });

  it('fills missing keys from the defaults', () => {
    writeRawConfig(JSON.stringify({ traversal: { max_depth: 3 }, provider: { kind: 'shards' } }));
    const config = loadConfig(cwd);
    expect(config.traversal).toEqual({ max_depth: 3, concurrency: 4 });
    expect(config.provider.kind).toBe('shards');
    expect(config.live).toEqual(DEFAULT_CONFIG.live);
  });

  it('rejects invalid JSON', () => {
    writeRawConfig('{ broken');
    expect(() => loadConfig(cwd)).toThrow(ConfigError);
  });

  it('names the offending key', () => {
    writeRawConfig(JSON.stringify({ traversal: { concurrency: 0 } }));
    expect(() => loadConfig(cwd)).toThrow(/Invalid config in .*: traversal\.concurrency: /);
  });

  it('rejects an unknown provider kind', () => {
    writeRawConfig(JSON.stringify({ provider: { kind: 'carrier-pigeon' } }));
    expect(() => loadConfig(cwd)).toThrow(ConfigError);
  });
});

describe('saveConfig', () => {
  it('writes a config that loads back unchanged', () => {
    const config = mergeWithDefaults({ live: { mailto: 'team@example.org' }, output: { layout: 'tree' } });
    saveConfig(cwd, config);
    expect(configExists(cwd)).toBe(true);
    expect(loadConfig(cwd)).toEqual(config);
  });
});

describe('mergeWithDefaults', () => {
  it('copies the lookup tables instead of sharing them', () => {
    const config = mergeWithDefaults({});
    config.shards.doi_prefixes['x'] = '10.1/';
    expect(DEFAULT_CONFIG.shards.doi_prefixes).toEqual({});
  });

  it('replaces the journal table when one is given', () => {
    const config = mergeWithDefaults({ shards: { journals: { '0000-0001': 'Test Journal' } } });
    expect(config.shards.journals).toEqual({ '0000-0001': 'Test Journal' });
  });
});
