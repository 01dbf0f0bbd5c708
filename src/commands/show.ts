import type { Command } from 'commander';
import yaml from 'js-yaml';
import { BACKEND_IDS } from '../config/schema.js';
import { backendConfig, getPackage, isDelegatedToMise, priorityChain } from '../core/query.js';
import { fail } from '../ui/output.js';
import { type ManifestOptions, errorMessage, loadManifestFor } from './shared.js';

export function registerShow(program: Command): void {
  program
    .command('show')
    .description('Show how a package is defined after merging')
    .argument('<package>', 'Package name')
    .option('--manifest-dir <path>', 'Directory holding packages.yaml')
    .option('--platform <id>', 'Override the detected platform')
    .action(async (name: string, opts: ManifestOptions) => {
      try {
        const { manifest, platform } = await loadManifestFor(opts);
        const pkg = getPackage(manifest, name);

        console.log(`\n${name}${pkg.description ? ` — ${pkg.description}` : ''}\n`);
        console.log(`  Category:   ${pkg.category}`);
        console.log(`  Priority:   ${priorityChain(manifest, name).join(' → ')}`);
        console.log(`  Platforms:  ${pkg.platforms?.join(', ') ?? 'all'} (current: ${platform})`);
        if (isDelegatedToMise(pkg)) console.log('  Managed by: mise');

        for (const backend of BACKEND_IDS) {
          const config = backendConfig(manifest, name, backend);
          if (!config) continue;
          console.log(`\n  ${backend}:`);
          const body = yaml.dump(config).trimEnd();
          console.log(
            body === '{}'
              ? '    (defaults)'
              : body
                  .split('\n')
                  .map((l) => `    ${l}`)
                  .join('\n'),
          );
        }
        console.log('');
      } catch (err) {
        fail(errorMessage(err));
        process.exit(1);
      }
    });
}
