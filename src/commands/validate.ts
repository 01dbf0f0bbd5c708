import type { Command } from 'commander';
import { existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { BASE_MANIFEST_FILE, lintManifest, loadManifest } from '../core/manifest.js';
import { loadSettings, resolveManifestDir } from '../core/paths.js';
import { listCategories, listProfiles } from '../core/query.js';
import { fail, info, ok, warn } from '../ui/output.js';
import { errorMessage } from './shared.js';

const PLATFORM_FILE = /^packages\.([^.]+)\.yaml$/;

/** Platform ids that have their own document in the directory. */
export function platformDocuments(dir: string): string[] {
  return readdirSync(dir)
    .map((entry) => PLATFORM_FILE.exec(entry)?.[1])
    .filter((id): id is string => id !== undefined)
    .sort();
}

export function registerValidate(program: Command): void {
  program
    .command('validate')
    .description('Validate the base manifest and every platform document against it')
    .option('--manifest-dir <path>', 'Directory holding packages.yaml')
    .action((opts: { manifestDir?: string }) => {
      loadSettings();
      const dir = resolveManifestDir(opts.manifestDir);
      const basePath = join(dir, BASE_MANIFEST_FILE);
      if (!existsSync(basePath)) {
        fail(`No ${BASE_MANIFEST_FILE} in ${dir}`);
        process.exit(1);
      }

      let failures = 0;
      const check = (label: string, platformPath?: string) => {
        try {
          const manifest = loadManifest(basePath, platformPath);
          ok(
            `${label}: ${Object.keys(manifest.packages).length} packages, ` +
              `${listCategories(manifest).length} categories, ${listProfiles(manifest).length} profiles`,
          );
          for (const warning of lintManifest(manifest)) warn(`  ${warning}`);
        } catch (err) {
          failures++;
          fail(`${label}: ${errorMessage(err)}`);
        }
      };

      check(BASE_MANIFEST_FILE);
      for (const platform of platformDocuments(dir)) {
        check(`${BASE_MANIFEST_FILE} + packages.${platform}.yaml`, join(dir, `packages.${platform}.yaml`));
      }

      if (failures > 0) process.exit(1);
      info('All manifest documents are valid.');
    });
}
