import type { Command } from 'commander';
import { APP_NAME } from '../config/branding.js';
import { detectPlatform } from '../utils/platform.js';

// Filled in by the bundler; plain tsc builds report "dev".
declare const __VERSION__: string;
declare const __COMMIT__: string;
declare const __DATE__: string;

export interface VersionInfo {
  version: string;
  commit: string;
  date: string;
  platform: string;
  node: string;
}

export function versionInfo(): VersionInfo {
  return {
    version: typeof __VERSION__ !== 'undefined' ? __VERSION__ : 'dev',
    commit: typeof __COMMIT__ !== 'undefined' ? __COMMIT__ : 'unknown',
    date: typeof __DATE__ !== 'undefined' ? __DATE__ : 'unknown',
    platform: detectPlatform(),
    node: process.version,
  };
}

export function registerVersion(program: Command): void {
  program
    .command('version')
    .description('Print version information')
    .option('--short', 'Print version number only')
    .option('--json', 'Print version info as JSON')
    .action((opts: { short?: boolean; json?: boolean }) => {
      const v = versionInfo();

      if (opts.short) {
        console.log(v.version);
        return;
      }

      if (opts.json) {
        console.log(JSON.stringify(v, null, 2));
        return;
      }

      console.log(`${APP_NAME} version ${v.version} (commit: ${v.commit}, built: ${v.date}) on ${v.platform}, node ${v.node}`);
    });
}
