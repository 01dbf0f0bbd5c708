import type { Command } from 'commander';
import { installPackages } from '../core/orchestrator.js';
import { loadRetryLog } from '../core/retry-log.js';
import { fail, info } from '../ui/output.js';
import { type RunCommandOptions, errorMessage, executeRun } from './shared.js';

export function registerRetry(program: Command): void {
  program
    .command('retry')
    .description('Retry the packages recorded in a retry log')
    .argument('<log-file>', 'missing-packages-*.json written by a previous install')
    .option('--dry-run', 'Resolve and verify, print the commands, install nothing')
    .option('--manifest-dir <path>', 'Directory holding packages.yaml')
    .option('--non-interactive', 'Skip every package with a verification issue')
    .option('--platform <id>', 'Override the detected platform (macos, ubuntu, ...)')
    .action(async (logFile: string, opts: RunCommandOptions) => {
      try {
        const names = loadRetryLog(logFile);
        if (names.length === 0) {
          info('Retry log lists no packages.');
          return;
        }
        const code = await executeRun({ ...opts, retryLog: true }, (ctx, options) =>
          installPackages(ctx, names, options),
        );
        if (code !== 0) process.exit(code);
      } catch (err) {
        fail(errorMessage(err));
        process.exit(1);
      }
    });
}
