import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { PpaAdapter, keyringPath, repositoryPath } from '../../../../src/core/backends/ppa.js';
import type { InstallTarget } from '../../../../src/core/backends/types.js';
import { BackendCache } from '../../../../src/core/cache.js';
import { FakeRunner } from '../../../helpers/fake-runner.js';

function ppaTarget(name: string, repository: string, keyUrl?: string): InstallTarget {
  return { packageName: name, backend: 'ppa', identifiers: [name], repository, keyUrl };
}

describe('PpaAdapter', () => {
  let testDir: string;
  let sourcesDir: string;
  let runner: FakeRunner;
  let output: string[];
  let adapter: PpaAdapter;

  beforeEach(() => {
    testDir = join(tmpdir(), `dotkit-ppa-${Date.now()}`);
    sourcesDir = join(testDir, 'sources.list.d');
    mkdirSync(sourcesDir, { recursive: true });
    runner = new FakeRunner(['apt-get', 'add-apt-repository']);
    output = [];
    adapter = new PpaAdapter(
      { runner, cache: new BackendCache(runner), log: (msg) => output.push(msg) },
      { platform: 'ubuntu', sourcesDir, keyringDir: join(testDir, 'keyrings') },
    );
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  it('derives paths from the repository', () => {
    expect(repositoryPath('ppa:neovim-ppa/unstable')).toBe('neovim-ppa/unstable');
    expect(keyringPath('/k', 'ppa:neovim-ppa/unstable')).toBe('/k/neovim-ppa-unstable.gpg');
  });

  it('is only available on ubuntu with add-apt-repository', () => {
    expect(adapter.isAvailable()).toBe(true);
    const debian = new PpaAdapter(
      { runner, cache: new BackendCache(runner), log: () => {} },
      { platform: 'debian', sourcesDir },
    );
    expect(debian.isAvailable()).toBe(false);
  });

  it('finds repositories already in the source lists', () => {
    writeFileSync(
      join(sourcesDir, 'neovim-ppa-ubuntu-unstable-noble.sources'),
      'Types: deb\nURIs: https://ppa.launchpadcontent.net/neovim-ppa/unstable/ubuntu/\n',
    );
    expect(adapter.isRepositoryAdded('ppa:neovim-ppa/unstable')).toBe(true);
    expect(adapter.isRepositoryAdded('ppa:git-core/ppa')).toBe(false);
  });

  it('resolves the repository and signing key into the target', () => {
    const target = adapter.resolveTarget('neovim', {
      category: 'editors',
      ppa: { repository: 'ppa:neovim-ppa/unstable', package: 'neovim', gpg_key: 'https://keys.example.test/neovim.asc' },
    });
    expect(target).toEqual({
      packageName: 'neovim',
      backend: 'ppa',
      identifiers: ['neovim'],
      repository: 'ppa:neovim-ppa/unstable',
      keyUrl: 'https://keys.example.test/neovim.asc',
    });
  });

  it('adds a new repository once, refreshes once, installs once', () => {
    const summary = adapter.installBulk(
      [
        ppaTarget('neovim', 'ppa:neovim-ppa/unstable'),
        ppaTarget('python3-neovim', 'ppa:neovim-ppa/unstable'),
        ppaTarget('git', 'ppa:git-core/ppa'),
      ],
      false,
    );
    expect(runner.count('sudo add-apt-repository -y -n ppa:neovim-ppa/unstable')).toBe(1);
    expect(runner.count('sudo add-apt-repository -y -n ppa:git-core/ppa')).toBe(1);
    expect(runner.count('sudo apt-get update')).toBe(1);
    expect(runner.count('sudo apt-get install')).toBe(1);
    expect(runner.commands().filter((c) => c.startsWith('sudo'))).toEqual([
      'sudo add-apt-repository -y -n ppa:neovim-ppa/unstable',
      'sudo add-apt-repository -y -n ppa:git-core/ppa',
      'sudo apt-get update',
      'sudo apt-get install -y neovim python3-neovim git',
    ]);
    expect(summary).toMatchObject({ total: 3, succeeded: 3, failed: 0 });
  });

  it('does not add a repository that is already present', () => {
    writeFileSync(join(sourcesDir, 'git-core.list'), 'deb https://ppa.launchpadcontent.net/git-core/ppa/ubuntu noble main\n');
    adapter.installBulk([ppaTarget('git', 'ppa:git-core/ppa')], false);
    expect(runner.count('sudo add-apt-repository')).toBe(0);
    expect(runner.count('sudo apt-get update')).toBe(1);
  });

  it('stores the signing key before adding the repository', () => {
    runner.on('curl -fsSL https://keys.example.test/tools.asc', 'test-key-material\n');
    adapter.installBulk([ppaTarget('tool', 'ppa:example/tools', 'https://keys.example.test/tools.asc')], false);
    const keyring = join(testDir, 'keyrings', 'example-tools.gpg');
    expect(runner.calls.find((c) => c.command.startsWith('sudo gpg'))).toEqual({
      command: `sudo gpg --dearmor --yes -o ${keyring}`,
      input: 'test-key-material\n',
    });
    expect(runner.commands().indexOf(`sudo gpg --dearmor --yes -o ${keyring}`)).toBeLessThan(
      runner.commands().indexOf('sudo add-apt-repository -y -n ppa:example/tools'),
    );
  });

  it('fails only the packages whose repository could not be added', () => {
    runner.on('sudo add-apt-repository -y -n ppa:broken/repo', { exitCode: 1, stderr: 'ERROR: not found' });
    const summary = adapter.installBulk(
      [ppaTarget('bad', 'ppa:broken/repo'), ppaTarget('good', 'ppa:example/tools')],
      false,
    );
    expect(summary.results).toEqual([
      {
        packageName: 'bad',
        backend: 'ppa',
        status: 'failed',
        reason: 'repository ppa:broken/repo could not be added: exit code 1: ERROR: not found',
      },
      { packageName: 'good', backend: 'ppa', status: 'installed', reason: undefined },
    ]);
    expect(runner.commands()).toContain('sudo apt-get install -y good');
  });

  it('runs nothing in a dry run', () => {
    const summary = adapter.installBulk([ppaTarget('neovim', 'ppa:neovim-ppa/unstable')], true);
    expect(runner.count('sudo')).toBe(0);
    expect(output).toEqual([
      '[DRY RUN] sudo add-apt-repository -y -n ppa:neovim-ppa/unstable',
      '[DRY RUN] sudo apt-get update',
      '[DRY RUN] sudo apt-get install -y neovim',
    ]);
    expect(summary.results[0]?.status).toBe('planned');
  });
});
