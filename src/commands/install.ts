import type { Command } from 'commander';
import { installProfile } from '../core/orchestrator.js';
import { fail } from '../ui/output.js';
import { type RunCommandOptions, errorMessage, executeRun } from './shared.js';

export function registerInstall(program: Command): void {
  program
    .command('install')
    .description('Install every package of a profile')
    .argument('<profile>', 'Profile name from the manifest (e.g., minimal, full)')
    .option('--dry-run', 'Resolve and verify, print the commands, install nothing')
    .option('--manifest-dir <path>', 'Directory holding packages.yaml')
    .option('--non-interactive', 'Skip every package with a verification issue')
    .option('--platform <id>', 'Override the detected platform (macos, ubuntu, ...)')
    .option('--no-retry-log', 'Do not write a retry log for skipped packages')
    .action(async (profile: string, opts: RunCommandOptions) => {
      try {
        const code = await executeRun(opts, (ctx, options) => installProfile(ctx, profile, options));
        if (code !== 0) process.exit(code);
      } catch (err) {
        fail(errorMessage(err));
        process.exit(1);
      }
    });
}
