import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, readFileSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as settings from '../../../src/config/settings.js';

describe('settings', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `dotkit-settings-${Date.now()}`);
    mkdirSync(testDir, { recursive: true });
    configPath = join(testDir, 'home', 'config.yaml');
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('starts empty when no config file exists', () => {
    settings.init(configPath);
    expect(settings.all()).toEqual({});
    expect(settings.get('manifest_dir')).toBe('');
    expect(settings.getBoolean('non_interactive')).toBe(false);
  });

  it('ignores a config file that is not a mapping', () => {
    writeFileSync(join(testDir, 'list.yaml'), '- a\n- b\n');
    settings.init(join(testDir, 'list.yaml'));
    expect(settings.all()).toEqual({});
  });

  it('persists values and stores the flag as a boolean', () => {
    settings.init(configPath);
    settings.set('log_dir', '/var/tmp/dotkit');
    settings.set('non_interactive', 'true');

    expect(readFileSync(configPath, 'utf-8')).toBe('log_dir: /var/tmp/dotkit\nnon_interactive: true\n');

    settings.init(configPath);
    expect(settings.get('log_dir')).toBe('/var/tmp/dotkit');
    expect(settings.getBoolean('non_interactive')).toBe(true);
  });

  it('rejects a non-boolean value for the flag', () => {
    settings.init(configPath);
    expect(() => settings.set('non_interactive', 'yes')).toThrow(
      'Setting non_interactive takes true or false, got "yes"',
    );
  });

  it('recognizes only known keys', () => {
    expect(settings.isSettingKey('log_dir')).toBe(true);
    expect(settings.isSettingKey('theme')).toBe(false);
  });
});
