import type { AptConfig, PackageDefinition } from '../../types/manifest.js';
import { configOf } from '../query.js';
import { BaseAdapter, type Invocation } from './base.js';
import type { InstallTarget } from './types.js';

/** `package` or `packages` of an apt-style block, as a list. */
export function aptIdentifiers(config: Pick<AptConfig, 'package' | 'packages'>): string[] {
  if (config.packages) return [...config.packages];
  return config.package ? [config.package] : [];
}

export class AptAdapter extends BaseAdapter {
  readonly id = 'apt' as const;
  readonly label = 'APT';

  isAvailable(): boolean {
    return this.ctx.runner.exists('apt-get');
  }

  extractIdentifier(_packageName: string, pkg: PackageDefinition): string[] | null {
    const config = configOf(pkg, 'apt');
    if (!config) return null;
    const ids = aptIdentifiers(config);
    return ids.length ? ids : null;
  }

  protected installCommand(targets: InstallTarget[]): Invocation {
    return {
      cmd: 'sudo',
      args: ['apt-get', 'install', '-y', ...targets.flatMap((t) => t.identifiers)],
    };
  }
}
