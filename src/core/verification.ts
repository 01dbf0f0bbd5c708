import { BACKEND_IDS } from '../config/schema.js';
import type { BackendId, Manifest } from '../types/manifest.js';
import type { AdapterSet } from './backends/index.js';
import type { BackendCache } from './cache.js';
import { DEFAULT_MAX_RESULTS } from './fuzzy.js';
import { getPackage } from './query.js';

export type IssueStatus = 'missing' | 'fuzzy';

export interface VerificationIssue {
  backend: BackendId;
  packageName: string;
  /** The identifier that was looked up and not found. */
  identifier: string;
  status: IssueStatus;
  alternatives: string[];
}

export interface VerificationContext {
  manifest: Manifest;
  cache: BackendCache;
  adapters: AdapterSet;
  log: (msg: string) => void;
}

export type BackendGroups = Partial<Record<BackendId, string[]>>;

/**
 * Checks every package's identifiers against the backend listings and
 * returns one issue per identifier the backend does not know. Produces data
 * only; deciding what to do about an issue is up to the caller.
 */
export function verifyBatch(ctx: VerificationContext, groups: BackendGroups): VerificationIssue[] {
  const issues: VerificationIssue[] = [];

  for (const backend of BACKEND_IDS) {
    const names = groups[backend] ?? [];
    if (names.length === 0) continue;

    const adapter = ctx.adapters[backend];
    ctx.cache.init(backend);
    if (!ctx.cache.hasListing(backend)) {
      ctx.log(`Skipping verification for ${adapter.label}: no package listing available`);
      continue;
    }

    for (const name of names) {
      const target = adapter.resolveTarget(name, getPackage(ctx.manifest, name));
      if (!target) continue;
      // Third-party sources are only listed once they are added.
      if (target.tap) continue;
      if (target.repository && !ctx.adapters.ppa.isRepositoryAdded(target.repository)) continue;

      const opts = { cask: target.cask };
      for (const identifier of target.identifiers) {
        if (ctx.cache.exists(backend, identifier, opts)) continue;
        if (ctx.cache.isInstalled(backend, identifier, opts)) continue;

        const alternatives = ctx.cache.findSimilar(backend, identifier, DEFAULT_MAX_RESULTS, opts);
        issues.push({
          backend,
          packageName: name,
          identifier,
          status: alternatives.length > 0 ? 'fuzzy' : 'missing',
          alternatives,
        });
      }
    }
  }

  return issues;
}

export function formatIssue(issue: VerificationIssue): string {
  const head = `${issue.packageName} (${issue.backend}): "${issue.identifier}" not found`;
  return issue.status === 'fuzzy' ? `${head}, similar: ${issue.alternatives.join(', ')}` : head;
}
