import { APP_NAME } from '../config/branding.js';
import { lintManifest, loadManifestDir } from '../core/manifest.js';
import {
  type InstallOptions,
  type RunContext,
  type RunReport,
  createRunContext,
} from '../core/orchestrator.js';
import { loadSettings, resolveLogDir, resolveManifestDir, resolveNonInteractive } from '../core/paths.js';
import { writeRetryLog } from '../core/retry-log.js';
import type { Manifest } from '../types/manifest.js';
import { configureLogFile, currentLogFile } from '../utils/logger.js';
import { detectPlatform } from '../utils/platform.js';
import { heading, info, plain, warn } from '../ui/output.js';
import { promptIssue } from '../ui/prompts.js';
import { withSpinner } from '../ui/spinner.js';
import { printSummary } from '../ui/table.js';

export interface ManifestOptions {
  manifestDir?: string;
  platform?: string;
}

export interface RunCommandOptions extends ManifestOptions {
  dryRun?: boolean;
  nonInteractive?: boolean;
  retryLog?: boolean;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function loadManifestFor(
  opts: ManifestOptions,
): Promise<{ manifest: Manifest; platform: string; dir: string }> {
  loadSettings();
  const dir = resolveManifestDir(opts.manifestDir);
  const platform = opts.platform ?? detectPlatform();
  const manifest = await withSpinner(`Loading manifests from ${dir}`, () =>
    loadManifestDir(dir, platform),
  );
  return { manifest, platform, dir };
}

/**
 * Shared body of `install` and `retry`: load, run, print the summary,
 * write the retry log. Returns the process exit code.
 */
export async function executeRun(
  opts: RunCommandOptions,
  run: (ctx: RunContext, options: InstallOptions) => Promise<RunReport>,
): Promise<number> {
  loadSettings();
  const logDir = resolveLogDir();
  configureLogFile(logDir);

  const { manifest, platform } = await loadManifestFor(opts);
  for (const warning of lintManifest(manifest)) warn(warning);

  const dryRun = opts.dryRun === true;
  if (dryRun) info('Dry run: no installation commands will be executed');

  const ctx = createRunContext({ manifest, platform, log: plain, warn });
  const report = await run(ctx, {
    dryRun,
    interactive: !resolveNonInteractive(opts.nonInteractive),
    prompter: promptIssue,
  });

  heading('Summary');
  printSummary(report);

  if (report.unresolved.length > 0 && opts.retryLog !== false && !dryRun) {
    const file = writeRetryLog(logDir, report.unresolved);
    info(`Skipped packages recorded in ${file}`);
    info(`Retry later with: ${APP_NAME} retry ${file}`);
  }

  const logFile = currentLogFile();
  if (logFile) info(`Warnings and errors logged to ${logFile}`);

  return report.exitCode;
}
