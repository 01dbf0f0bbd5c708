import type { Manifest, BackendId, BackendConfigMap, PackageDefinition } from '../types/manifest.js';
import { UnknownPackageError, UnknownProfileError } from './errors.js';

// Every function here is pure: no process calls, no filesystem.

/** Entry of a manifest record; inherited names such as `constructor` are not entries. */
export function ownEntry<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function listProfiles(manifest: Manifest): string[] {
  return Object.keys(manifest.profiles);
}

export function listCategories(manifest: Manifest): string[] {
  return Object.keys(manifest.categories);
}

export function getPackage(manifest: Manifest, name: string): PackageDefinition {
  const pkg = ownEntry(manifest.packages, name);
  if (!pkg) throw new UnknownPackageError(name);
  return pkg;
}

export function packagesByCategory(manifest: Manifest, category: string): string[] {
  return Object.entries(manifest.packages)
    .filter(([, pkg]) => pkg.category === category)
    .map(([name]) => name);
}

export function isApplicableToPlatform(pkg: PackageDefinition, platform: string): boolean {
  return !pkg.platforms || pkg.platforms.includes(platform);
}

export function packagesForPlatform(manifest: Manifest, platform: string): string[] {
  return Object.entries(manifest.packages)
    .filter(([, pkg]) => isApplicableToPlatform(pkg, platform))
    .map(([name]) => name);
}

/** The package's own priority override, else its category's default chain. */
export function priorityChain(manifest: Manifest, name: string): BackendId[] {
  const pkg = getPackage(manifest, name);
  if (pkg.priority) return [...pkg.priority];
  return [...(ownEntry(manifest.categories, pkg.category)?.priority ?? [])];
}

export function packagesForProfile(manifest: Manifest, profileName: string): string[] {
  const profile = ownEntry(manifest.profiles, profileName);
  if (!profile) throw new UnknownProfileError(profileName, listProfiles(manifest));

  if (profile.packages) return [...profile.packages];

  const included = profile.includes
    ? new Set(profile.includes.flatMap((cat) => packagesByCategory(manifest, cat)))
    : new Set(Object.keys(manifest.packages));
  const excluded = new Set((profile.excludes ?? []).flatMap((cat) => packagesByCategory(manifest, cat)));

  return [...included].filter((name) => !excluded.has(name));
}

export function isDelegatedToMise(pkg: PackageDefinition): boolean {
  return pkg.managed_by === 'mise';
}

/**
 * Backend configuration block of a package. A package delegated to mise
 * has an implicit (empty) mise configuration.
 */
export function backendConfig<B extends BackendId>(
  manifest: Manifest,
  name: string,
  backend: B,
): BackendConfigMap[B] | undefined {
  const pkg = getPackage(manifest, name);
  return configOf(pkg, backend);
}

export function configOf<B extends BackendId>(
  pkg: PackageDefinition,
  backend: B,
): BackendConfigMap[B] | undefined {
  const config: Partial<BackendConfigMap> = {
    mise: pkg.mise ?? (isDelegatedToMise(pkg) ? {} : undefined),
    homebrew: pkg.homebrew,
    apt: pkg.apt,
    ppa: pkg.ppa,
  };
  return config[backend];
}
