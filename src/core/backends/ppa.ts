import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { PackageDefinition } from '../../types/manifest.js';
import { LIST_TIMEOUT_MS, REFRESH_TIMEOUT_MS, describeFailure, succeeded } from '../../utils/exec.js';
import { configOf } from '../query.js';
import { aptIdentifiers } from './apt.js';
import { BaseAdapter, type Invocation } from './base.js';
import {
  type AdapterContext,
  type BulkSummary,
  type InstallResult,
  type InstallTarget,
  summarize,
} from './types.js';

export const APT_SOURCES_DIR = '/etc/apt/sources.list.d';
export const APT_KEYRING_DIR = '/etc/apt/keyrings';

export interface PpaOptions {
  platform: string;
  sourcesDir?: string;
  keyringDir?: string;
}

export interface RepositoryOutcome {
  ok: boolean;
  reason?: string;
}

/** `ppa:user/repo` → `user/repo`, the part that shows up in source lists. */
export function repositoryPath(repository: string): string {
  return repository.replace(/^ppa:/, '');
}

export function keyringPath(dir: string, repository: string): string {
  return join(dir, `${repositoryPath(repository).replace(/\//g, '-')}.gpg`);
}

export class PpaAdapter extends BaseAdapter {
  readonly id = 'ppa' as const;
  readonly label = 'PPA';

  private readonly platform: string;
  private readonly sourcesDir: string;
  private readonly keyringDir: string;
  private readonly added = new Set<string>();

  constructor(ctx: AdapterContext, opts: PpaOptions) {
    super(ctx);
    this.platform = opts.platform;
    this.sourcesDir = opts.sourcesDir ?? APT_SOURCES_DIR;
    this.keyringDir = opts.keyringDir ?? APT_KEYRING_DIR;
  }

  isAvailable(): boolean {
    return this.platform === 'ubuntu' && this.ctx.runner.exists('add-apt-repository');
  }

  extractIdentifier(_packageName: string, pkg: PackageDefinition): string[] | null {
    const config = configOf(pkg, 'ppa');
    if (!config) return null;
    const ids = aptIdentifiers(config);
    return ids.length ? ids : null;
  }

  resolveTarget(packageName: string, pkg: PackageDefinition): InstallTarget | null {
    const config = configOf(pkg, 'ppa');
    const identifiers = this.extractIdentifier(packageName, pkg);
    if (!config || !identifiers) return null;
    return {
      packageName,
      backend: this.id,
      identifiers,
      repository: config.repository,
      keyUrl: config.gpg_key,
    };
  }

  // ── Repositories ──────────────────────────────────────────────────

  isRepositoryAdded(repository: string): boolean {
    if (this.added.has(repository)) return true;
    if (!existsSync(this.sourcesDir)) return false;

    const needle = repositoryPath(repository);
    for (const entry of readdirSync(this.sourcesDir)) {
      if (!entry.endsWith('.list') && !entry.endsWith('.sources')) continue;
      let content: string;
      try {
        content = readFileSync(join(this.sourcesDir, entry), 'utf-8');
      } catch {
        continue; // unreadable list file
      }
      if (content.includes(needle)) {
        this.added.add(repository);
        return true;
      }
    }
    return false;
  }

  addRepository(repository: string, keyUrl: string | undefined, dryRun: boolean): RepositoryOutcome {
    if (this.isRepositoryAdded(repository)) return { ok: true };

    if (keyUrl) {
      const fetch: Invocation = { cmd: 'curl', args: ['-fsSL', keyUrl] };
      const store: Invocation = {
        cmd: 'sudo',
        args: ['gpg', '--dearmor', '--yes', '-o', keyringPath(this.keyringDir, repository)],
      };
      this.announce(fetch, dryRun);
      this.announce(store, dryRun);
      if (!dryRun) {
        const key = this.ctx.runner.run(fetch.cmd, fetch.args, { timeoutMs: LIST_TIMEOUT_MS });
        if (!succeeded(key)) {
          return { ok: false, reason: `signing key could not be fetched: ${describeFailure(key)}` };
        }
        const stored = this.exec(store, LIST_TIMEOUT_MS, key.stdout);
        if (!succeeded(stored)) {
          return { ok: false, reason: `signing key could not be stored: ${describeFailure(stored)}` };
        }
      }
    }

    const add: Invocation = { cmd: 'sudo', args: ['add-apt-repository', '-y', '-n', repository] };
    this.announce(add, dryRun);
    if (dryRun) return { ok: true };

    const outcome = this.exec(add, REFRESH_TIMEOUT_MS);
    if (!succeeded(outcome)) {
      return { ok: false, reason: `repository ${repository} could not be added: ${describeFailure(outcome)}` };
    }
    this.added.add(repository);
    return { ok: true };
  }

  /** Refreshes the package index once. A failed refresh is reported but not fatal. */
  refreshIndex(dryRun: boolean): void {
    const update: Invocation = { cmd: 'sudo', args: ['apt-get', 'update'] };
    this.announce(update, dryRun);
    if (dryRun) return;
    const outcome = this.exec(update, REFRESH_TIMEOUT_MS);
    if (!succeeded(outcome)) {
      this.ctx.log(`  Package index refresh failed (${describeFailure(outcome)})`);
    }
  }

  // ── Installation ──────────────────────────────────────────────────

  /**
   * Adds every repository the targets need, refreshes the index exactly
   * once, then installs everything in one command.
   */
  installBulk(targets: InstallTarget[], dryRun: boolean): BulkSummary {
    const { pending, results } = this.partition(targets, dryRun);
    const ready = this.prepareRepositories(pending, dryRun, results);

    if (ready.length > 0) {
      this.refreshIndex(dryRun);
      results.push(...this.runBatch(ready, dryRun));
    }
    return summarize(results);
  }

  installOne(target: InstallTarget, dryRun: boolean): InstallResult {
    return this.installBulk([target], dryRun).results[0] ?? this.result(target, 'failed', 'no result');
  }

  protected installCommand(targets: InstallTarget[]): Invocation {
    return {
      cmd: 'sudo',
      args: ['apt-get', 'install', '-y', ...targets.flatMap((t) => t.identifiers)],
    };
  }

  private prepareRepositories(
    targets: InstallTarget[],
    dryRun: boolean,
    results: InstallResult[],
  ): InstallTarget[] {
    const outcomes = new Map<string, RepositoryOutcome>();
    for (const target of targets) {
      if (!target.repository || outcomes.has(target.repository)) continue;
      outcomes.set(target.repository, this.addRepository(target.repository, target.keyUrl, dryRun));
    }

    const ready: InstallTarget[] = [];
    for (const target of targets) {
      const outcome = target.repository ? outcomes.get(target.repository) : undefined;
      if (outcome && !outcome.ok) results.push(this.result(target, 'failed', outcome.reason));
      else ready.push(target);
    }
    return ready;
  }
}
