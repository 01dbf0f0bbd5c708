#!/usr/bin/env node
import { Command } from 'commander';
import { APP_NAME, DESCRIPTION, DISPLAY_NAME } from './config/branding.js';
import {
  registerVersion,
  registerInstall,
  registerRetry,
  registerProfiles,
  registerShow,
  registerValidate,
  registerCacheStats,
  registerDoctor,
  registerConfig,
} from './commands/index.js';

const program = new Command()
  .name(APP_NAME)
  .description(
    `${DISPLAY_NAME}: ${DESCRIPTION}.\n` +
      'Installs profiles of packages through mise, Homebrew, APT and PPAs, following each\n' +
      "package's backend priority chain.",
  )
  .enablePositionalOptions()
  .showHelpAfterError(true);

registerVersion(program);
registerInstall(program);
registerRetry(program);
registerProfiles(program);
registerShow(program);
registerValidate(program);
registerCacheStats(program);
registerDoctor(program);
registerConfig(program);

await program.parseAsync();
