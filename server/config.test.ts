import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfigFile, normalizeConfig, parseConfig } from './config.ts';

describe('server config', () => {
  let dir = '';

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'snake-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('uses defaults when nothing is set', () => {
    const warnings: string[] = [];
    const config = parseConfig(['--config', path.join(dir, 'missing.toml')], {}, msg => warnings.push(msg));
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(warnings).toEqual([]);
  });

  it('lets flags win over environment variables', () => {
    const warnings: string[] = [];
    const config = parseConfig(
      ['--config', path.join(dir, 'missing.toml'), '--port', '0', '--board-size=60', '--relative', '--speed', 'hard'],
      { PORT: '9000', LOG_LEVEL: 'debug', GAME_SEED: '7', LOCAL_STATE: 'yes' },
      msg => warnings.push(msg)
    );
    expect(config.port).toBe(0);
    expect(config.boardSize).toBe(60);
    expect(config.relativeActions).toBe(true);
    expect(config.localState).toBe(true);
    expect(config.speed).toBe('HARD');
    expect(config.logLevel).toBe('debug');
    expect(config.seed).toBe(7);
    expect(warnings).toEqual(['boardSize 60 is above 50; matches may run slower.']);
  });

  it('reads known keys from a TOML file', () => {
    const file = path.join(dir, 'server.toml');
    fs.writeFileSync(file, 'port = 6000\nspeed = "EASY"\nbogus = 1\n');
    expect(loadConfigFile(file)).toEqual({ port: 6000, speed: 'EASY' });

    const config = parseConfig(['--config', file], { PORT: '7000' }, () => {});
    expect(config.port).toBe(7000);
    expect(config.speed).toBe('EASY');
  });

  it('warns about a broken TOML file and ignores it', () => {
    const file = path.join(dir, 'broken.toml');
    fs.writeFileSync(file, 'port = = 1\n');
    const warnings: string[] = [];
    expect(loadConfigFile(file, msg => warnings.push(msg))).toEqual({});
    expect(warnings).toHaveLength(1);
    expect(warnings[0]?.startsWith(`failed to parse ${file}:`)).toBe(true);
  });

  it('falls back on invalid values with a warning each', () => {
    const warnings: string[] = [];
    const config = normalizeConfig(
      { logLevel: 'loud', speed: 'TURBO', seed: 'abc', localState: 'maybe', tickRateHz: 5000, host: '' },
      msg => warnings.push(msg)
    );
    expect(config.logLevel).toBe('info');
    expect(config.speed).toBe('MEDIUM');
    expect(config.seed).toBeUndefined();
    expect(config.localState).toBe(false);
    expect(config.tickRateHz).toBe(1000);
    expect(config.host).toBe('127.0.0.1');
    expect(warnings).toEqual([
      'host is invalid; using 127.0.0.1.',
      'tickRateHz was clamped to 1000.',
      'logLevel "loud" is invalid; using info.',
      'localState is invalid; using false.',
      'speed "TURBO" is invalid; using MEDIUM.',
      'seed is invalid; ignoring.'
    ]);
  });
});
