import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { HOME_DIR, envVar } from '../config/branding.js';
import * as settings from '../config/settings.js';

// ── Directory constants ─────────────────────────────────────────────

const CONFIG_FILE = 'config.yaml';
const LOGS_DIR = 'logs';
export const DEFAULT_MANIFEST_DIR = join('install', 'manifests');

// ── Path resolution ─────────────────────────────────────────────────

export function getHomeRoot(): string {
  return process.env[envVar('HOME')] ?? join(homedir(), HOME_DIR);
}

export function getConfigPath(): string {
  return join(getHomeRoot(), CONFIG_FILE);
}

export function loadSettings(): void {
  settings.init(getConfigPath());
}

/** Flag, then environment, then the `manifest_dir` setting, then ./install/manifests. */
export function resolveManifestDir(flag?: string): string {
  const chosen =
    flag || process.env[envVar('MANIFEST_DIR')] || settings.get('manifest_dir') || DEFAULT_MANIFEST_DIR;
  return resolve(chosen);
}

export function resolveLogDir(): string {
  return resolve(
    process.env[envVar('LOG_DIR')] || settings.get('log_dir') || join(getHomeRoot(), LOGS_DIR),
  );
}

export function resolveNonInteractive(flag?: boolean): boolean {
  return flag === true || settings.getBoolean('non_interactive') || !process.stdin.isTTY;
}
