import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { platformDocuments } from '../../../src/commands/validate.js';

describe('validate', () => {
  let testDir: string;

  beforeEach(() => {
    testDir = join(tmpdir(), `dotkit-validate-${Date.now()}`);
    mkdirSync(testDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('finds one document per platform, sorted', () => {
    for (const file of ['packages.yaml', 'packages.ubuntu.yaml', 'packages.macos.yaml', 'packages.yml', 'notes.yaml']) {
      writeFileSync(join(testDir, file), '');
    }
    expect(platformDocuments(testDir)).toEqual(['macos', 'ubuntu']);
  });
});
