import type { Command } from 'commander';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { DISPLAY_NAME } from '../config/branding.js';
import { BASE_MANIFEST_FILE, loadManifestDir } from '../core/manifest.js';
import {
  getConfigPath,
  getHomeRoot,
  loadSettings,
  resolveLogDir,
  resolveManifestDir,
} from '../core/paths.js';
import { createRunner } from '../utils/exec.js';
import { detectPlatform } from '../utils/platform.js';
import { fail, info, ok, warn } from '../ui/output.js';
import { errorMessage } from './shared.js';

const BACKEND_TOOLS: Array<[string, string[]]> = [
  ['mise', ['mise']],
  ['homebrew', ['brew']],
  ['apt', ['apt-get', 'apt-cache', 'dpkg-query']],
  ['ppa', ['add-apt-repository']],
];

interface DoctorOptions {
  checkTools?: boolean;
  checkPaths?: boolean;
  checkManifest?: boolean;
  manifestDir?: string;
}

export function registerDoctor(program: Command): void {
  program
    .command('doctor')
    .description('Health check for this machine and the manifests')
    .option('--check-tools', 'Check package manager tooling')
    .option('--check-paths', 'Check configuration and log directories')
    .option('--check-manifest', 'Load and validate the manifests for this platform')
    .option('--manifest-dir <path>', 'Directory holding packages.yaml')
    .action((opts: DoctorOptions) => {
      const runAll = !opts.checkTools && !opts.checkPaths && !opts.checkManifest;
      loadSettings();
      const platform = detectPlatform();

      console.log(`\n${DISPLAY_NAME} Doctor\n`);
      console.log(`  Platform: ${platform}`);
      console.log('');

      if (runAll || opts.checkTools) {
        console.log('Package managers:');
        const runner = createRunner();
        for (const [backend, tools] of BACKEND_TOOLS) {
          const missing = tools.filter((t) => !runner.exists(t));
          if (missing.length === 0) {
            ok(`  ${backend} — available`);
          } else {
            info(`  ${backend} — not available (missing ${missing.join(', ')})`);
          }
        }
        if (platform !== 'ubuntu') info('  ppa is only used on ubuntu');
        console.log('');
      }

      if (runAll || opts.checkPaths) {
        console.log('Paths:');
        for (const [label, path] of [
          ['Home', getHomeRoot()],
          ['Settings', getConfigPath()],
          ['Logs', resolveLogDir()],
        ] as const) {
          if (existsSync(path)) {
            ok(`  ${label} — ${path}`);
          } else {
            info(`  ${label} — not created yet (${path})`);
          }
        }
        console.log('');
      }

      if (runAll || opts.checkManifest) {
        console.log('Manifest:');
        const dir = resolveManifestDir(opts.manifestDir);
        if (!existsSync(join(dir, BASE_MANIFEST_FILE))) {
          warn(`  No ${BASE_MANIFEST_FILE} in ${dir}`);
        } else {
          try {
            const manifest = loadManifestDir(dir, platform);
            ok(`  ${manifest.sources.join(' + ')}`);
          } catch (err) {
            fail(`  ${errorMessage(err)}`);
          }
        }
        console.log('');
      }

      ok('Doctor complete.');
    });
}
