import type { BackendId, PackageDefinition } from '../../types/manifest.js';
import type { CommandRunner } from '../../utils/exec.js';
import type { BackendCache } from '../cache.js';

/** One package resolved against one backend, ready to install. */
export interface InstallTarget {
  packageName: string;
  backend: BackendId;
  /** Backend identifiers installed together for this package. */
  identifiers: string[];
  cask?: boolean;
  tap?: string;
  repository?: string;
  keyUrl?: string;
  version?: string;
}

export type InstallStatus = 'installed' | 'already-installed' | 'planned' | 'failed';

export interface InstallResult {
  packageName: string;
  backend: BackendId;
  status: InstallStatus;
  reason?: string;
}

export interface BulkSummary {
  total: number;
  succeeded: number;
  skipped: number;
  failed: number;
  results: InstallResult[];
}

export interface AdapterContext {
  runner: CommandRunner;
  cache: BackendCache;
  log: (msg: string) => void;
}

export interface BackendAdapter {
  readonly id: BackendId;
  readonly label: string;
  /** The backend's tooling is present on this machine. */
  isAvailable(): boolean;
  /** Identifiers the package declares for this backend, or null without a config. */
  extractIdentifier(packageName: string, pkg: PackageDefinition): string[] | null;
  resolveTarget(packageName: string, pkg: PackageDefinition): InstallTarget | null;
  checkInstalled(target: InstallTarget): boolean;
  installOne(target: InstallTarget, dryRun: boolean): InstallResult;
  installBulk(targets: InstallTarget[], dryRun: boolean): BulkSummary;
}

export const DRY_RUN_PREFIX = '[DRY RUN]';

export function summarize(results: InstallResult[]): BulkSummary {
  return {
    total: results.length,
    succeeded: results.filter((r) => r.status === 'installed' || r.status === 'planned').length,
    skipped: results.filter((r) => r.status === 'already-installed').length,
    failed: results.filter((r) => r.status === 'failed').length,
    results,
  };
}
