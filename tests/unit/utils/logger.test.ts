import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  appendLog,
  configureLogFile,
  currentLogFile,
  fileTimestamp,
  resetLogFile,
  stripAnsi,
} from '../../../src/utils/logger.js';

describe('logger', () => {
  let testDir: string;
  const fixed = () => new Date(2026, 2, 14, 15, 9, 26);

  beforeEach(() => {
    testDir = join(tmpdir(), `dotkit-logger-${Date.now()}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    resetLogFile();
    rmSync(testDir, { recursive: true, force: true });
  });

  it('formats file timestamps', () => {
    expect(fileTimestamp(fixed())).toBe('20260314_150926');
  });

  it('strips colour codes', () => {
    expect(stripAnsi('\u001b[33mwarn\u001b[39m')).toBe('warn');
  });

  it('drops entries until configured', () => {
    appendLog('WARN', 'nobody listens');
    expect(currentLogFile()).toBeNull();
  });

  it('creates the file lazily on the first entry', () => {
    const logDir = join(testDir, 'logs');
    configureLogFile(logDir, fixed);
    expect(existsSync(logDir)).toBe(false);

    appendLog('WARN', '\u001b[33mdisk almost full\u001b[39m');
    appendLog('ERROR', 'jq: exit code 100');

    expect(readdirSync(logDir)).toEqual(['install-20260314_150926.log']);
    const lines = readFileSync(join(logDir, 'install-20260314_150926.log'), 'utf-8').trimEnd().split('\n');
    expect(lines[0]).toBe('# dotkit install log');
    expect(lines.slice(-2)).toEqual([
      `[${fixed().toISOString()}] WARN disk almost full`,
      `[${fixed().toISOString()}] ERROR jq: exit code 100`,
    ]);
  });
});
