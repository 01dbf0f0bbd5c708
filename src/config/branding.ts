export const APP_NAME = 'dotkit';
export const DISPLAY_NAME = 'Dotkit';
export const DESCRIPTION = 'Manifest-driven package provisioning for dotfiles';
export const HOME_DIR = '.dotkit';
export const ENV_PREFIX = 'DOTKIT';

export function envVar(suffix: string): string {
  return `${ENV_PREFIX}_${suffix.toUpperCase()}`;
}
