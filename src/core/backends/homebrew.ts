import type { PackageDefinition } from '../../types/manifest.js';
import {
  LIST_TIMEOUT_MS,
  REFRESH_TIMEOUT_MS,
  describeFailure,
  lines,
  succeeded,
} from '../../utils/exec.js';
import { configOf } from '../query.js';
import { BaseAdapter, type Invocation } from './base.js';
import { type BulkSummary, type InstallResult, type InstallTarget, summarize } from './types.js';

export class HomebrewAdapter extends BaseAdapter {
  readonly id = 'homebrew' as const;
  readonly label = 'Homebrew';

  private taps: Set<string> | null = null;

  isAvailable(): boolean {
    return this.ctx.runner.exists('brew');
  }

  extractIdentifier(_packageName: string, pkg: PackageDefinition): string[] | null {
    const config = configOf(pkg, 'homebrew');
    return config ? [config.package] : null;
  }

  resolveTarget(packageName: string, pkg: PackageDefinition): InstallTarget | null {
    const config = configOf(pkg, 'homebrew');
    if (!config) return null;
    return {
      packageName,
      backend: this.id,
      identifiers: [config.package],
      cask: config.cask === true,
      tap: config.tap,
    };
  }

  isTapped(tap: string): boolean {
    if (!this.taps) {
      const result = this.ctx.runner.run('brew', ['tap'], { timeoutMs: LIST_TIMEOUT_MS });
      this.taps = new Set(succeeded(result) ? lines(result.stdout) : []);
    }
    return this.taps.has(tap);
  }

  /**
   * Taps every third-party repository the targets need, once each. Returns
   * the taps that could not be added.
   */
  addTaps(targets: InstallTarget[], dryRun: boolean): Map<string, string> {
    const failures = new Map<string, string>();
    const wanted = new Set(targets.flatMap((t) => (t.tap ? [t.tap] : [])));

    for (const tap of wanted) {
      if (this.isTapped(tap)) continue;
      const invocation = { cmd: 'brew', args: ['tap', tap] };
      this.announce(invocation, dryRun);
      if (dryRun) continue;

      const outcome = this.exec(invocation, REFRESH_TIMEOUT_MS);
      if (succeeded(outcome)) {
        this.taps?.add(tap);
      } else {
        failures.set(tap, `tap ${tap} could not be added: ${describeFailure(outcome)}`);
      }
    }
    return failures;
  }

  installBulk(targets: InstallTarget[], dryRun: boolean): BulkSummary {
    const { pending, results } = this.partition(targets, dryRun);
    const tapFailures = this.addTaps(pending, dryRun);

    const ready: InstallTarget[] = [];
    for (const target of pending) {
      const failure = target.tap ? tapFailures.get(target.tap) : undefined;
      if (failure) results.push(this.result(target, 'failed', failure));
      else ready.push(target);
    }

    const formulae = ready.filter((t) => !t.cask);
    const casks = ready.filter((t) => t.cask);
    const installed: InstallResult[] = [
      ...this.runBatch(formulae, dryRun),
      ...this.runBatch(casks, dryRun),
    ];
    return summarize([...results, ...installed]);
  }

  installOne(target: InstallTarget, dryRun: boolean): InstallResult {
    if (this.checkInstalled(target)) return this.result(target, 'already-installed');
    const [failure] = [...this.addTaps([target], dryRun).values()];
    if (failure) return this.result(target, 'failed', failure);
    return super.installOne(target, dryRun);
  }

  protected installCommand(targets: InstallTarget[]): Invocation {
    const ids = targets.flatMap((t) => t.identifiers);
    const cask = targets.some((t) => t.cask);
    return { cmd: 'brew', args: cask ? ['install', '--cask', ...ids] : ['install', ...ids] };
  }
}
