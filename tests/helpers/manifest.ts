import type {
  CategoryDefinition,
  Manifest,
  PackageDefinition,
  ProfileDefinition,
} from '../../src/types/manifest.js';

export function makeManifest(input: {
  categories?: Record<string, CategoryDefinition>;
  packages?: Record<string, PackageDefinition>;
  profiles?: Record<string, ProfileDefinition>;
}): Manifest {
  return {
    version: '1.0',
    categories: input.categories ?? {},
    packages: input.packages ?? {},
    profiles: input.profiles ?? {},
    sources: ['packages.yaml'],
  };
}
