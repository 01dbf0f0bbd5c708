import { z } from 'zod';

// ── Backends ────────────────────────────────────────────────────────

export const BACKEND_IDS = ['mise', 'homebrew', 'apt', 'ppa'] as const;

export const BackendIdSchema = z.enum(BACKEND_IDS);

export const PriorityChainSchema = z
  .array(BackendIdSchema)
  .min(1, 'Priority list must name at least one backend');

// ── Per-backend package configuration ───────────────────────────────

const identifierPattern = /^[A-Za-z0-9][A-Za-z0-9+._@/-]*$/;
const Identifier = z.string().regex(identifierPattern, 'Invalid package identifier');

export const MiseConfigSchema = z.object({
  tool: Identifier.optional(),
  version: z.string().min(1).optional(),
});

export const HomebrewConfigSchema = z.object({
  package: Identifier,
  cask: z.boolean().optional(),
  tap: z
    .string()
    .regex(/^[A-Za-z0-9_.-]+\/[A-Za-z0-9_.-]+$/, 'Expected tap as user/repo')
    .optional(),
});

export const AptConfigSchema = z
  .object({
    package: Identifier.optional(),
    packages: z.array(Identifier).min(1).optional(),
  })
  .refine((c) => c.package !== undefined || c.packages !== undefined, {
    message: 'apt config needs package or packages',
  });

export const PpaConfigSchema = z
  .object({
    repository: z.string().regex(/^ppa:[^/\s]+\/[^/\s]+$/, 'Expected repository as ppa:user/repo'),
    package: Identifier.optional(),
    packages: z.array(Identifier).min(1).optional(),
    gpg_key: z.string().url().optional(),
  })
  .refine((c) => c.package !== undefined || c.packages !== undefined, {
    message: 'ppa config needs package or packages',
  });

// ── Manifest entries ────────────────────────────────────────────────

export const CategorySchema = z.object({
  description: z.string().min(1),
  priority: PriorityChainSchema,
});

export const PackageSchema = z.object({
  category: z.string().min(1),
  description: z.string().optional(),
  priority: PriorityChainSchema.optional(),
  platforms: z.array(z.string().min(1)).min(1).optional(),
  managed_by: z.literal('mise').optional(),
  mise: MiseConfigSchema.optional(),
  homebrew: HomebrewConfigSchema.optional(),
  apt: AptConfigSchema.optional(),
  ppa: PpaConfigSchema.optional(),
});

export const ProfileSchema = z.object({
  description: z.string().optional(),
  packages: z.array(z.string().min(1)).optional(),
  includes: z.array(z.string().min(1)).optional(),
  excludes: z.array(z.string().min(1)).optional(),
});

export const MiseToolSchema = z.object({
  name: Identifier,
  description: z.string().optional(),
  version: z.string().min(1).optional(),
});

// ── Documents ───────────────────────────────────────────────────────

const versionPattern = /^v?[0-9]+(\.[0-9]+)*$/;

/**
 * One manifest document as written on disk. The base document must carry a
 * version; a platform document may leave it out and inherit the base one.
 */
export const ManifestDocumentSchema = z.object({
  version: z
    .union([z.string(), z.number()])
    .transform(String)
    .pipe(z.string().regex(versionPattern, 'Relaxed semver: 1, 1.0, v1.2.3'))
    .optional(),
  profiles: z.record(z.string(), ProfileSchema).optional(),
  categories: z.record(z.string(), CategorySchema).optional(),
  packages: z.record(z.string(), PackageSchema).optional(),
  mise_tools: z.array(MiseToolSchema).optional(),
});

// ── Retry log ───────────────────────────────────────────────────────

export const RetryLogEntrySchema = z.object({
  backend: BackendIdSchema,
  package: z.string().min(1),
  actual_name: z.string(),
  status: z.enum(['missing', 'fuzzy']),
  alternatives: z.array(z.string()),
});

export const RetryLogSchema = z.object({
  date: z.string(),
  user: z.string(),
  host: z.string(),
  packages: z.array(RetryLogEntrySchema),
});
