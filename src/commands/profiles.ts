import type { Command } from 'commander';
import { packagesForProfile } from '../core/query.js';
import { fail, info } from '../ui/output.js';
import { printTable } from '../ui/table.js';
import { type ManifestOptions, errorMessage, loadManifestFor } from './shared.js';

interface ProfilesOptions extends ManifestOptions {
  json?: boolean;
}

export function registerProfiles(program: Command): void {
  program
    .command('profiles')
    .description('List the profiles defined in the manifest')
    .option('--manifest-dir <path>', 'Directory holding packages.yaml')
    .option('--platform <id>', 'Override the detected platform')
    .option('--json', 'Output as JSON')
    .action(async (opts: ProfilesOptions) => {
      try {
        const { manifest } = await loadManifestFor(opts);
        const profiles = Object.entries(manifest.profiles).map(([name, profile]) => ({
          name,
          description: profile.description ?? '',
          packages: packagesForProfile(manifest, name),
        }));

        if (opts.json) {
          console.log(JSON.stringify(profiles, null, 2));
          return;
        }

        if (profiles.length === 0) {
          info('No profiles defined.');
          return;
        }

        printTable(
          ['Profile', 'Packages', 'Description'],
          profiles.map((p) => [p.name, String(p.packages.length), p.description]),
        );
      } catch (err) {
        fail(errorMessage(err));
        process.exit(1);
      }
    });
}
