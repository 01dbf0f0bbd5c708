import { AptAdapter } from './apt.js';
import { HomebrewAdapter } from './homebrew.js';
import { MiseAdapter } from './mise.js';
import { PpaAdapter, type PpaOptions } from './ppa.js';
import type { AdapterContext } from './types.js';

export interface AdapterSet {
  mise: MiseAdapter;
  homebrew: HomebrewAdapter;
  apt: AptAdapter;
  ppa: PpaAdapter;
}

export function createAdapters(ctx: AdapterContext, opts: PpaOptions): AdapterSet {
  return {
    mise: new MiseAdapter(ctx),
    homebrew: new HomebrewAdapter(ctx),
    apt: new AptAdapter(ctx),
    ppa: new PpaAdapter(ctx, opts),
  };
}

export { AptAdapter, HomebrewAdapter, MiseAdapter, PpaAdapter };
export type { PpaOptions };
export * from './types.js';
