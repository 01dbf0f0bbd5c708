import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createRunContext, type RunContext } from '../../../src/core/orchestrator.js';
import { formatIssue, verifyBatch } from '../../../src/core/verification.js';
import { makeManifest } from '../../helpers/manifest.js';
import { FakeRunner } from '../../helpers/fake-runner.js';

const manifest = makeManifest({
  categories: {
    python: { description: 'Python', priority: ['apt'] },
    tools: { description: 'Tools', priority: ['homebrew'] },
    editors: { description: 'Editors', priority: ['ppa'] },
  },
  packages: {
    'python-pytest': { category: 'python', apt: { package: 'python-pytest' } },
    git: { category: 'python', apt: { package: 'git' } },
    gnuplot: { category: 'python', apt: { package: 'gnuplot' } },
    stale: { category: 'python', apt: { package: 'stale-only-installed' } },
    zzz: { category: 'python', apt: { package: 'zzz' } },
    k9s: { category: 'tools', homebrew: { package: 'k9s', tap: 'derailed/k9s' } },
    wezterm: { category: 'tools', homebrew: { package: 'wezterm', cask: true } },
    neovim: { category: 'editors', ppa: { repository: 'ppa:neovim-ppa/unstable', package: 'neovim-nightly' } },
  },
});

describe('verifyBatch', () => {
  let testDir: string;
  let runner: FakeRunner;
  let warnings: string[];
  let ctx: RunContext;

  beforeEach(() => {
    testDir = join(tmpdir(), `dotkit-verify-${Date.now()}`);
    mkdirSync(testDir, { recursive: true });
    runner = new FakeRunner()
      .list('dpkg-query', ['stale-only-installed'])
      .list('apt-cache pkgnames', ['git', 'gnuplot', 'python3-pytest', 'python3-pytest-cov'])
      .list('brew formulae', ['wget'])
      .list('brew casks', ['wezterm']);
    warnings = [];
    ctx = createRunContext({
      manifest,
      platform: 'ubuntu',
      runner,
      log: () => {},
      warn: (msg) => warnings.push(msg),
      sourcesDir: testDir,
    });
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  function verify(groups: Parameters<typeof verifyBatch>[1]) {
    return verifyBatch({ manifest, cache: ctx.cache, adapters: ctx.adapters, log: (m) => warnings.push(m) }, groups);
  }

  it('reports a fuzzy issue with the rewritten name first', () => {
    const issues = verify({ apt: ['python-pytest', 'git'] });
    expect(issues).toEqual([
      {
        backend: 'apt',
        packageName: 'python-pytest',
        identifier: 'python-pytest',
        status: 'fuzzy',
        alternatives: ['python3-pytest'],
      },
    ]);
  });

  it('reports a missing issue when nothing similar exists', () => {
    const issues = verify({ apt: ['zzz'] });
    expect(issues).toEqual([
      { backend: 'apt', packageName: 'zzz', identifier: 'zzz', status: 'missing', alternatives: [] },
    ]);
  });

  it('counts an installed identifier as existing', () => {
    expect(verify({ apt: ['stale', 'gnuplot'] })).toEqual([]);
  });

  it('checks casks against the cask listing and leaves tapped formulae alone', () => {
    expect(verify({ homebrew: ['wezterm', 'k9s'] })).toEqual([]);
  });

  it('skips a backend with no listing and says so', () => {
    const empty = new FakeRunner();
    const bare = createRunContext({ manifest, platform: 'ubuntu', runner: empty, log: () => {}, sourcesDir: testDir });
    const log: string[] = [];
    const issues = verifyBatch(
      { manifest, cache: bare.cache, adapters: bare.adapters, log: (m) => log.push(m) },
      { apt: ['zzz'] },
    );
    expect(issues).toEqual([]);
    expect(log).toEqual(['Skipping verification for APT: no package listing available']);
  });

  it('verifies ppa packages only once their repository is added', () => {
    expect(verify({ ppa: ['neovim'] })).toEqual([]);

    writeFileSync(join(testDir, 'neovim.list'), 'deb https://ppa.launchpadcontent.net/neovim-ppa/unstable/ubuntu noble main\n');
    const issues = verify({ ppa: ['neovim'] });
    expect(issues.map((i) => [i.packageName, i.identifier])).toEqual([['neovim', 'neovim-nightly']]);
  });

  it('formats issues for display', () => {
    expect(
      formatIssue({ backend: 'apt', packageName: 'a', identifier: 'b', status: 'fuzzy', alternatives: ['c', 'd'] }),
    ).toBe('a (apt): "b" not found, similar: c, d');
    expect(
      formatIssue({ backend: 'apt', packageName: 'a', identifier: 'b', status: 'missing', alternatives: [] }),
    ).toBe('a (apt): "b" not found');
  });
});
