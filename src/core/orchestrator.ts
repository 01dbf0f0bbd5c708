import { BACKEND_IDS } from '../config/schema.js';
import type { BackendId, Manifest } from '../types/manifest.js';
import { type CommandRunner, createRunner } from '../utils/exec.js';
import {
  type AdapterSet,
  type InstallResult,
  type InstallTarget,
  DRY_RUN_PREFIX,
  createAdapters,
} from './backends/index.js';
import { BackendCache } from './cache.js';
import { type Prompter, type UserChoices, resolveIssues } from './interaction.js';
import {
  getPackage,
  isApplicableToPlatform,
  ownEntry,
  packagesForProfile,
  priorityChain,
} from './query.js';
import { type BackendGroups, type VerificationIssue, verifyBatch } from './verification.js';

// ── Run context ─────────────────────────────────────────────────────

/** Everything one installation run shares. Built fresh for every run. */
export interface RunContext {
  manifest: Manifest;
  platform: string;
  runner: CommandRunner;
  cache: BackendCache;
  adapters: AdapterSet;
  log: (msg: string) => void;
  warn: (msg: string) => void;
}

export interface RunContextOptions {
  manifest: Manifest;
  platform: string;
  runner?: CommandRunner;
  log: (msg: string) => void;
  warn?: (msg: string) => void;
  /** Where apt source lists live; defaults to the system directory. */
  sourcesDir?: string;
  keyringDir?: string;
}

export function createRunContext(opts: RunContextOptions): RunContext {
  const runner = opts.runner ?? createRunner();
  const cache = new BackendCache(runner);
  const log = opts.log;
  return {
    manifest: opts.manifest,
    platform: opts.platform,
    runner,
    cache,
    adapters: createAdapters(
      { runner, cache, log },
      { platform: opts.platform, sourcesDir: opts.sourcesDir, keyringDir: opts.keyringDir },
    ),
    log,
    warn: opts.warn ?? log,
  };
}

// ── Report ──────────────────────────────────────────────────────────

export const SKIP_NO_BACKEND = 'no available backend';
export const SKIP_ALREADY_INSTALLED = 'already installed';
export const SKIP_BY_USER = 'skipped by user';
export const SKIP_NOT_IN_MANIFEST = 'not in manifest';

export function skipUnsupportedPlatform(platform: string): string {
  return `not supported on ${platform}`;
}

export type OutcomeStatus = 'installed' | 'planned' | 'skipped' | 'failed';

export interface PackageOutcome {
  packageName: string;
  backend: BackendId | null;
  status: OutcomeStatus;
  reason?: string;
}

export interface BackendTally {
  succeeded: number;
  skipped: number;
  failed: number;
}

export interface RunReport {
  profile: string | null;
  platform: string;
  dryRun: boolean;
  considered: number;
  succeeded: number;
  skipped: number;
  failed: number;
  outcomes: PackageOutcome[];
  byBackend: Partial<Record<BackendId, BackendTally>>;
  issues: VerificationIssue[];
  /** Issues whose package ended up skipped; these go to the retry log. */
  unresolved: VerificationIssue[];
  exitCode: 0 | 1;
}

export interface InstallOptions {
  dryRun: boolean;
  interactive: boolean;
  prompter?: Prompter;
}

// ── Backend resolution ──────────────────────────────────────────────

type Resolution = { target: InstallTarget } | { reason: string };

/**
 * First backend in the package's chain whose tooling is present and for
 * which the package declares a configuration.
 */
export function resolveBackend(
  ctx: RunContext,
  name: string,
  available: (backend: BackendId) => boolean,
): Resolution {
  const pkg = getPackage(ctx.manifest, name);
  if (!isApplicableToPlatform(pkg, ctx.platform)) {
    return { reason: skipUnsupportedPlatform(ctx.platform) };
  }
  for (const backend of priorityChain(ctx.manifest, name)) {
    if (!available(backend)) continue;
    const target = ctx.adapters[backend].resolveTarget(name, pkg);
    if (target) return { target };
  }
  return { reason: SKIP_NO_BACKEND };
}

function availabilityProbe(ctx: RunContext): (backend: BackendId) => boolean {
  const memo = new Map<BackendId, boolean>();
  return (backend) => {
    let found = memo.get(backend);
    if (found === undefined) {
      found = ctx.adapters[backend].isAvailable();
      memo.set(backend, found);
    }
    return found;
  };
}

function applyChoices(target: InstallTarget, choices: UserChoices): InstallTarget {
  const substitutions = choices.substitutionsFor(target.packageName);
  if (Object.keys(substitutions).length === 0) return target;
  return { ...target, identifiers: target.identifiers.map((id) => ownEntry(substitutions, id) ?? id) };
}

function toOutcome(result: InstallResult): PackageOutcome {
  switch (result.status) {
    case 'installed':
    case 'planned':
      return { packageName: result.packageName, backend: result.backend, status: result.status };
    case 'already-installed':
      return {
        packageName: result.packageName,
        backend: result.backend,
        status: 'skipped',
        reason: SKIP_ALREADY_INSTALLED,
      };
    case 'failed':
      return {
        packageName: result.packageName,
        backend: result.backend,
        status: 'failed',
        reason: result.reason,
      };
  }
}

// ── Pipeline ────────────────────────────────────────────────────────

type Sink = (msg: string) => void;

/** The run's log and warn sinks; every line of a dry run carries the dry-run marker. */
function progress(ctx: RunContext, dryRun: boolean): { log: Sink; warn: Sink } {
  if (!dryRun) return { log: ctx.log, warn: ctx.warn };
  const marked = (sink: Sink): Sink => (msg) => sink(`${DRY_RUN_PREFIX} ${msg}`);
  return { log: marked(ctx.log), warn: marked(ctx.warn) };
}

export async function installProfile(
  ctx: RunContext,
  profile: string,
  options: InstallOptions,
): Promise<RunReport> {
  const names = packagesForProfile(ctx.manifest, profile);
  progress(ctx, options.dryRun).log(`Profile "${profile}": ${names.length} package(s) on ${ctx.platform}`);
  return runPipeline(ctx, names, profile, options);
}

/** Installs an explicit list of packages, such as the contents of a retry log. */
export async function installPackages(
  ctx: RunContext,
  names: string[],
  options: InstallOptions,
): Promise<RunReport> {
  progress(ctx, options.dryRun).log(`Installing ${names.length} package(s) on ${ctx.platform}`);
  return runPipeline(ctx, names, null, options);
}

async function runPipeline(
  ctx: RunContext,
  names: string[],
  profile: string | null,
  options: InstallOptions,
): Promise<RunReport> {
  const outcomes: PackageOutcome[] = [];
  const targets = new Map<string, InstallTarget>();
  const groups: BackendGroups = {};
  const available = availabilityProbe(ctx);
  const { log, warn } = progress(ctx, options.dryRun);

  // Resolve a backend for every package and group by backend.
  for (const name of names) {
    if (!ownEntry(ctx.manifest.packages, name)) {
      warn(`${name}: ${SKIP_NOT_IN_MANIFEST}`);
      outcomes.push({ packageName: name, backend: null, status: 'skipped', reason: SKIP_NOT_IN_MANIFEST });
      continue;
    }
    const resolution = resolveBackend(ctx, name, available);
    if ('reason' in resolution) {
      log(`  ${name}: skipped (${resolution.reason})`);
      outcomes.push({ packageName: name, backend: null, status: 'skipped', reason: resolution.reason });
      continue;
    }
    const { target } = resolution;
    log(`  ${name} → ${ctx.adapters[target.backend].label}`);
    targets.set(name, target);
    (groups[target.backend] ??= []).push(name);
  }

  // Verify everything at once, then let the operator settle the issues.
  const issues = verifyBatch(
    { manifest: ctx.manifest, cache: ctx.cache, adapters: ctx.adapters, log: warn },
    groups,
  );
  const choices = await resolveIssues(issues, {
    interactive: options.interactive,
    prompter: options.prompter,
    log,
  });

  // Install one batch per backend.
  for (const backend of BACKEND_IDS) {
    const batch: InstallTarget[] = [];
    for (const name of groups[backend] ?? []) {
      const target = targets.get(name);
      if (!target) continue;
      if (choices.shouldSkip(name)) {
        outcomes.push({ packageName: name, backend, status: 'skipped', reason: SKIP_BY_USER });
        continue;
      }
      batch.push(applyChoices(target, choices));
    }
    if (batch.length === 0) continue;

    const adapter = ctx.adapters[backend];
    log(`Installing ${batch.length} package(s) with ${adapter.label}`);
    const summary = adapter.installBulk(batch, options.dryRun);
    for (const result of summary.results) {
      if (result.status === 'failed') warn(`${result.packageName}: ${result.reason ?? 'failed'}`);
      outcomes.push(toOutcome(result));
    }
  }

  const skippedNames = new Set(choices.skippedPackages());
  return buildReport({
    profile,
    platform: ctx.platform,
    dryRun: options.dryRun,
    considered: names.length,
    outcomes,
    issues,
    unresolved: issues.filter((i) => skippedNames.has(i.packageName)),
  });
}

function buildReport(input: {
  profile: string | null;
  platform: string;
  dryRun: boolean;
  considered: number;
  outcomes: PackageOutcome[];
  issues: VerificationIssue[];
  unresolved: VerificationIssue[];
}): RunReport {
  const { outcomes } = input;
  const byBackend: Partial<Record<BackendId, BackendTally>> = {};
  for (const outcome of outcomes) {
    if (!outcome.backend) continue;
    const tally = (byBackend[outcome.backend] ??= { succeeded: 0, skipped: 0, failed: 0 });
    if (outcome.status === 'failed') tally.failed++;
    else if (outcome.status === 'skipped') tally.skipped++;
    else tally.succeeded++;
  }

  const failed = outcomes.filter((o) => o.status === 'failed').length;
  return {
    ...input,
    succeeded: outcomes.filter((o) => o.status === 'installed' || o.status === 'planned').length,
    skipped: outcomes.filter((o) => o.status === 'skipped').length,
    failed,
    byBackend,
    exitCode: failed > 0 ? 1 : 0,
  };
}
