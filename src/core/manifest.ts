import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import yaml from 'js-yaml';
import type { ZodError } from 'zod';
import { ManifestDocumentSchema, BACKEND_IDS } from '../config/schema.js';
import type {
  Manifest,
  ManifestDocument,
  MiseTool,
  PackageDefinition,
  CategoryDefinition,
  BackendId,
} from '../types/manifest.js';
import { ManifestParseError, ManifestSchemaError } from './errors.js';
import { ownEntry } from './query.js';

export const BASE_MANIFEST_FILE = 'packages.yaml';
export const MISE_TOOLS_CATEGORY = 'mise_tools';

const MISE_TOOLS_CATEGORY_DEF: CategoryDefinition = {
  description: 'Tools delegated to mise',
  priority: ['mise'],
};

// ── Parsing ─────────────────────────────────────────────────────────

function firstIssue(err: ZodError): { key: string; message: string } {
  const issue = err.issues[0];
  return {
    key: issue && issue.path.length ? issue.path.join('.') : '(root)',
    message: issue?.message ?? 'invalid document',
  };
}

export function parseManifestDocument(raw: string, file: string): ManifestDocument {
  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (err) {
    throw new ManifestParseError(file, err instanceof Error ? err.message : String(err));
  }
  if (data == null) data = {};
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new ManifestParseError(file, 'top level must be a mapping');
  }

  const result = ManifestDocumentSchema.safeParse(data);
  if (!result.success) {
    const { key, message } = firstIssue(result.error);
    throw new ManifestSchemaError(file, key, message);
  }
  return result.data;
}

export function parseManifestFile(path: string): ManifestDocument {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ManifestParseError(path, err instanceof Error ? err.message : String(err));
  }
  return parseManifestDocument(raw, path);
}

// ── Merging ─────────────────────────────────────────────────────────

/**
 * Merges a platform document over a base document. Entries of `profiles`,
 * `categories` and `packages` are replaced whole when the platform document
 * names the same key: fields the platform entry leaves out are dropped, not
 * inherited from the base entry.
 */
export function mergeDocuments(
  base: ManifestDocument,
  platform: ManifestDocument,
): ManifestDocument {
  return {
    version: platform.version ?? base.version,
    profiles: { ...base.profiles, ...platform.profiles },
    categories: { ...base.categories, ...platform.categories },
    packages: { ...base.packages, ...platform.packages },
    mise_tools: mergeMiseTools(base.mise_tools, platform.mise_tools),
  };
}

function mergeMiseTools(
  base: MiseTool[] | undefined,
  platform: MiseTool[] | undefined,
): MiseTool[] | undefined {
  if (!base && !platform) return undefined;
  const byName = new Map<string, MiseTool>();
  for (const tool of base ?? []) byName.set(tool.name, tool);
  for (const tool of platform ?? []) byName.set(tool.name, tool);
  return [...byName.values()];
}

// ── Compact tool list expansion ─────────────────────────────────────

export function expandMiseTools(
  tools: MiseTool[],
  packages: Record<string, PackageDefinition>,
): Record<string, PackageDefinition> {
  const expanded: Record<string, PackageDefinition> = { ...packages };
  for (const tool of tools) {
    // An explicit package entry wins over the shorthand.
    if (ownEntry(expanded, tool.name)) continue;
    expanded[tool.name] = {
      category: MISE_TOOLS_CATEGORY,
      description: tool.description,
      priority: ['mise'],
      managed_by: 'mise',
      mise: { tool: tool.name, version: tool.version },
    };
  }
  return expanded;
}

// ── Validation ──────────────────────────────────────────────────────

type Section = 'profiles' | 'categories' | 'packages';

/** Path of the document that supplied an entry of the merged manifest. */
type SourceOf = (section: Section, key: string) => string;

function entrySources(basePath: string, platform?: { path: string; doc: ManifestDocument }): SourceOf {
  return (section, key) => {
    const entries = platform?.doc[section];
    return platform && entries && Object.hasOwn(entries, key) ? platform.path : basePath;
  };
}

function validateManifest(manifest: Manifest, sourceOf: SourceOf): void {
  for (const [name, pkg] of Object.entries(manifest.packages)) {
    if (!ownEntry(manifest.categories, pkg.category)) {
      throw new ManifestSchemaError(
        sourceOf('packages', name),
        `packages.${name}.category`,
        `unknown category "${pkg.category}"`,
      );
    }
  }

  for (const [name, profile] of Object.entries(manifest.profiles)) {
    const file = sourceOf('profiles', name);
    const byCategory = profile.includes !== undefined || profile.excludes !== undefined;
    if (profile.packages !== undefined && byCategory) {
      throw new ManifestSchemaError(
        file,
        `profiles.${name}`,
        'use either packages or includes/excludes, not both',
      );
    }
    for (const pkg of profile.packages ?? []) {
      if (!ownEntry(manifest.packages, pkg)) {
        throw new ManifestSchemaError(file, `profiles.${name}.packages`, `unknown package "${pkg}"`);
      }
    }
    for (const field of ['includes', 'excludes'] as const) {
      for (const cat of profile[field] ?? []) {
        if (!ownEntry(manifest.categories, cat)) {
          throw new ManifestSchemaError(file, `profiles.${name}.${field}`, `unknown category "${cat}"`);
        }
      }
    }
  }
}

// ── Loading ─────────────────────────────────────────────────────────

export function loadManifest(basePath: string, platformPath?: string): Manifest {
  let doc = parseManifestFile(basePath);
  if (!doc.version) {
    throw new ManifestSchemaError(basePath, 'version', 'Required');
  }

  const sources = [basePath];
  let platform: { path: string; doc: ManifestDocument } | undefined;
  if (platformPath) {
    platform = { path: platformPath, doc: parseManifestFile(platformPath) };
    doc = mergeDocuments(doc, platform.doc);
    sources.push(platformPath);
  }

  const categories = { ...doc.categories };
  const tools = doc.mise_tools ?? [];
  if (tools.length > 0 && !categories[MISE_TOOLS_CATEGORY]) {
    categories[MISE_TOOLS_CATEGORY] = MISE_TOOLS_CATEGORY_DEF;
  }

  const manifest: Manifest = {
    version: doc.version ?? '',
    profiles: { ...doc.profiles },
    categories,
    packages: expandMiseTools(tools, doc.packages ?? {}),
    sources,
  };

  validateManifest(manifest, entrySources(basePath, platform));
  return manifest;
}

export function platformManifestFile(platform: string): string {
  return `packages.${platform}.yaml`;
}

/** Base manifest plus the platform document when one exists beside it. */
export function resolveManifestPaths(
  dir: string,
  platform: string,
): { basePath: string; platformPath?: string } {
  const basePath = join(dir, BASE_MANIFEST_FILE);
  const candidate = join(dir, platformManifestFile(platform));
  return existsSync(candidate) ? { basePath, platformPath: candidate } : { basePath };
}

export function loadManifestDir(dir: string, platform: string): Manifest {
  const { basePath, platformPath } = resolveManifestPaths(dir, platform);
  return loadManifest(basePath, platformPath);
}

// ── Lint ────────────────────────────────────────────────────────────

function configuredBackends(pkg: PackageDefinition): BackendId[] {
  return BACKEND_IDS.filter((id) =>
    id === 'mise' ? pkg.mise !== undefined || pkg.managed_by === 'mise' : pkg[id] !== undefined,
  );
}

/** Soft problems that do not stop an installation run. */
export function lintManifest(manifest: Manifest): string[] {
  const warnings: string[] = [];

  for (const [name, pkg] of Object.entries(manifest.packages)) {
    const chain = pkg.priority ?? ownEntry(manifest.categories, pkg.category)?.priority ?? [];
    const configured = configuredBackends(pkg);
    if (configured.length === 0) {
      warnings.push(`Package "${name}" has no backend configuration`);
      continue;
    }
    for (const backend of configured) {
      if (!chain.includes(backend)) {
        warnings.push(
          `Package "${name}" configures ${backend} but its priority chain is [${chain.join(', ')}]`,
        );
      }
    }
  }

  const used = new Set(Object.values(manifest.packages).map((p) => p.category));
  for (const cat of Object.keys(manifest.categories)) {
    if (!used.has(cat)) warnings.push(`Category "${cat}" has no packages`);
  }

  return warnings;
}
