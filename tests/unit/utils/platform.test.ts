import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { detectPlatform, parseOsRelease } from '../../../src/utils/platform.js';

describe('platform', () => {
  describe('parseOsRelease', () => {
    it('reads quoted and bare values, ignoring comments', () => {
      const fields = parseOsRelease(
        '# distro info\nNAME="Ubuntu"\nID=ubuntu\nVERSION_ID=\'24.04\'\n\nBROKEN LINE\n',
      );
      expect(fields).toEqual({ NAME: 'Ubuntu', ID: 'ubuntu', VERSION_ID: '24.04' });
    });
  });

  describe('detectPlatform', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = join(tmpdir(), `dotkit-platform-${Date.now()}`);
      mkdirSync(testDir, { recursive: true });
    });

    afterEach(() => {
      rmSync(testDir, { recursive: true, force: true });
    });

    it('maps darwin to macos', () => {
      expect(detectPlatform('darwin')).toBe('macos');
    });

    it('uses the distribution id on linux', () => {
      const file = join(testDir, 'os-release');
      writeFileSync(file, 'ID="Debian"\n');
      expect(detectPlatform('linux', file)).toBe('debian');
    });

    it('falls back to linux without an os-release file', () => {
      expect(detectPlatform('linux', join(testDir, 'missing'))).toBe('linux');
    });

    it('passes other platforms through', () => {
      expect(detectPlatform('freebsd')).toBe('freebsd');
    });
  });
});
