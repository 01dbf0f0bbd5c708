import type { BackendId, PackageDefinition } from '../../types/manifest.js';
import {
  type CommandResult,
  INSTALL_TIMEOUT_MS,
  describeFailure,
  formatCommand,
  succeeded,
} from '../../utils/exec.js';
import {
  type AdapterContext,
  type BackendAdapter,
  type BulkSummary,
  type InstallResult,
  type InstallTarget,
  DRY_RUN_PREFIX,
  summarize,
} from './types.js';

export interface Invocation {
  cmd: string;
  args: string[];
}

/**
 * Shared install flow. Subclasses say how a package maps to identifiers and
 * which command installs a set of targets; the batching, dry-run output and
 * per-package fallback live here.
 */
export abstract class BaseAdapter implements BackendAdapter {
  abstract readonly id: BackendId;
  abstract readonly label: string;

  constructor(protected readonly ctx: AdapterContext) {}

  abstract isAvailable(): boolean;
  abstract extractIdentifier(packageName: string, pkg: PackageDefinition): string[] | null;
  protected abstract installCommand(targets: InstallTarget[]): Invocation;

  resolveTarget(packageName: string, pkg: PackageDefinition): InstallTarget | null {
    const identifiers = this.extractIdentifier(packageName, pkg);
    if (!identifiers) return null;
    return { packageName, backend: this.id, identifiers };
  }

  checkInstalled(target: InstallTarget): boolean {
    return target.identifiers.every((id) =>
      this.ctx.cache.isInstalled(this.id, id, { cask: target.cask }),
    );
  }

  installOne(target: InstallTarget, dryRun: boolean): InstallResult {
    if (this.checkInstalled(target)) return this.result(target, 'already-installed');
    const [result] = this.runBatch([target], dryRun);
    return result ?? this.result(target, 'failed', 'no result');
  }

  installBulk(targets: InstallTarget[], dryRun: boolean): BulkSummary {
    const { pending, results } = this.partition(targets, dryRun);
    if (pending.length > 0) results.push(...this.runBatch(pending, dryRun));
    return summarize(results);
  }

  // ── Helpers for subclasses ────────────────────────────────────────

  /** Splits off targets that are already installed. */
  protected partition(targets: InstallTarget[], dryRun: boolean): {
    pending: InstallTarget[];
    results: InstallResult[];
  } {
    const pending: InstallTarget[] = [];
    const results: InstallResult[] = [];
    for (const target of targets) {
      if (this.checkInstalled(target)) {
        this.note(`  ${target.packageName} already installed (${this.label})`, dryRun);
        results.push(this.result(target, 'already-installed'));
      } else {
        pending.push(target);
      }
    }
    return { pending, results };
  }

  /**
   * Installs the targets with one command. When that command fails each
   * target is tried on its own, so the failure lands on the right package.
   */
  protected runBatch(targets: InstallTarget[], dryRun: boolean): InstallResult[] {
    if (targets.length === 0) return [];
    const invocation = this.installCommand(targets);

    if (dryRun) {
      this.announce(invocation, true);
      return targets.map((t) => this.result(t, 'planned'));
    }

    this.announce(invocation, false);
    const outcome = this.exec(invocation, INSTALL_TIMEOUT_MS);
    if (succeeded(outcome)) return targets.map((t) => this.result(t, 'installed'));
    if (targets.length === 1) {
      return targets.map((t) => this.result(t, 'failed', describeFailure(outcome)));
    }

    this.ctx.log(`  Batch install failed (${describeFailure(outcome)}), retrying one by one`);
    return targets.flatMap((t) => this.runBatch([t], false));
  }

  protected exec(invocation: Invocation, timeoutMs: number, input?: string): CommandResult {
    return this.ctx.runner.run(invocation.cmd, invocation.args, {
      timeoutMs,
      input,
      inherit: input === undefined,
    });
  }

  /** Progress line; in a dry run it carries the dry-run marker too. */
  protected note(msg: string, dryRun: boolean): void {
    this.ctx.log(dryRun ? `${DRY_RUN_PREFIX} ${msg}` : msg);
  }

  protected announce(invocation: Invocation, dryRun: boolean): void {
    const line = formatCommand(invocation.cmd, invocation.args);
    this.ctx.log(dryRun ? `${DRY_RUN_PREFIX} ${line}` : `  $ ${line}`);
  }

  protected result(
    target: InstallTarget,
    status: InstallResult['status'],
    reason?: string,
  ): InstallResult {
    return { packageName: target.packageName, backend: this.id, status, reason };
  }
}
