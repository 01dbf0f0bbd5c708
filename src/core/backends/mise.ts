import type { PackageDefinition } from '../../types/manifest.js';
import { configOf } from '../query.js';
import { BaseAdapter, type Invocation } from './base.js';
import type { InstallTarget } from './types.js';

export const DEFAULT_TOOL_VERSION = 'latest';

export class MiseAdapter extends BaseAdapter {
  readonly id = 'mise' as const;
  readonly label = 'mise';

  isAvailable(): boolean {
    return this.ctx.runner.exists('mise');
  }

  extractIdentifier(packageName: string, pkg: PackageDefinition): string[] | null {
    const config = configOf(pkg, 'mise');
    if (!config) return null;
    return [config.tool ?? packageName];
  }

  resolveTarget(packageName: string, pkg: PackageDefinition): InstallTarget | null {
    const config = configOf(pkg, 'mise');
    if (!config) return null;
    return {
      packageName,
      backend: this.id,
      identifiers: [config.tool ?? packageName],
      version: config.version ?? DEFAULT_TOOL_VERSION,
    };
  }

  protected installCommand(targets: InstallTarget[]): Invocation {
    const specs = targets.flatMap((t) =>
      t.identifiers.map((tool) => `${tool}@${t.version ?? DEFAULT_TOOL_VERSION}`),
    );
    return { cmd: 'mise', args: ['use', '--global', ...specs] };
  }
}
