import type { Command } from 'commander';
import * as settings from '../config/settings.js';
import { loadSettings } from '../core/paths.js';
import { fail } from '../ui/output.js';
import { errorMessage } from './shared.js';

function settingKey(key: string): settings.SettingKey {
  if (!settings.isSettingKey(key)) {
    throw new Error(`Unknown setting "${key}" (known: ${settings.SETTING_KEYS.join(', ')})`);
  }
  return key;
}

export function registerConfig(program: Command): void {
  const cmd = program
    .command('config')
    .description('Manage user settings');

  cmd
    .command('set')
    .description('Set a config value')
    .argument('<key>', `Config key (${settings.SETTING_KEYS.join(', ')})`)
    .argument('<value>', 'Config value')
    .action((key: string, value: string) => {
      try {
        loadSettings();
        settings.set(settingKey(key), value);
        console.log(`Set ${key} = ${value}`);
      } catch (err) {
        fail(errorMessage(err));
        process.exit(1);
      }
    });

  cmd
    .command('get')
    .description('Get a config value')
    .argument('<key>', 'Config key')
    .action((key: string) => {
      try {
        loadSettings();
        const value = settings.get(settingKey(key));
        if (value) {
          console.log(value);
        }
      } catch (err) {
        fail(errorMessage(err));
        process.exit(1);
      }
    });
}
