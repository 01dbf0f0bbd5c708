import type { Command } from 'commander';
import { BackendIdSchema } from '../config/schema.js';
import { BackendCache } from '../core/cache.js';
import type { BackendId } from '../types/manifest.js';
import { createRunner } from '../utils/exec.js';
import { fail } from '../ui/output.js';
import { withSpinner } from '../ui/spinner.js';
import { printTable } from '../ui/table.js';
import { errorMessage } from './shared.js';

const LISTED: BackendId[] = ['apt', 'homebrew', 'mise'];

export function registerCacheStats(program: Command): void {
  program
    .command('cache-stats')
    .description('Load the package listings and show how large they are')
    .option('--backend <id>', 'Only this backend (apt, homebrew, mise, ppa)')
    .action(async (opts: { backend?: string }) => {
      try {
        const backends = opts.backend ? [BackendIdSchema.parse(opts.backend)] : LISTED;
        const cache = new BackendCache(createRunner());
        await withSpinner('Reading package listings', () => {
          for (const backend of backends) cache.init(backend);
        });

        printTable(
          ['Listing', 'Installed', 'Available', 'Casks installed', 'Casks available'],
          cache.stats().map((s) => [
            s.backend,
            String(s.installed),
            String(s.available),
            s.backend === 'homebrew' ? String(s.caskInstalled) : '-',
            s.backend === 'homebrew' ? String(s.caskAvailable) : '-',
          ]),
        );
      } catch (err) {
        fail(errorMessage(err));
        process.exit(1);
      }
    });
}
