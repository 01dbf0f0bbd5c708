import { readFileSync, writeFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import yaml from 'js-yaml';

export const SETTING_KEYS = ['manifest_dir', 'log_dir', 'non_interactive'] as const;
export type SettingKey = (typeof SETTING_KEYS)[number];

let configPath = '';
let configData: Record<string, unknown> = {};

export function isSettingKey(key: string): key is SettingKey {
  return SETTING_KEYS.some((k) => k === key);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function init(path: string): void {
  configPath = path;
  try {
    const loaded: unknown = yaml.load(readFileSync(path, 'utf-8'));
    configData = isRecord(loaded) ? loaded : {};
  } catch {
    configData = {};
  }
}

export function get(key: SettingKey): string {
  const value = configData[key];
  return value != null ? String(value) : '';
}

export function getBoolean(key: SettingKey): boolean {
  return get(key) === 'true';
}

export function set(key: SettingKey, value: string): void {
  if (key === 'non_interactive' && value !== 'true' && value !== 'false') {
    throw new Error(`Setting ${key} takes true or false, got "${value}"`);
  }
  configData[key] = key === 'non_interactive' ? value === 'true' : value;
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, yaml.dump(configData), 'utf-8');
}

export function all(): Record<string, unknown> {
  return { ...configData };
}
