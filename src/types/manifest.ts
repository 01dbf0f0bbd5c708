import type { z } from 'zod';
import type {
  BACKEND_IDS,
  CategorySchema,
  PackageSchema,
  ProfileSchema,
  MiseToolSchema,
  MiseConfigSchema,
  HomebrewConfigSchema,
  AptConfigSchema,
  PpaConfigSchema,
  ManifestDocumentSchema,
  RetryLogSchema,
  RetryLogEntrySchema,
} from '../config/schema.js';

export type BackendId = (typeof BACKEND_IDS)[number];

export type CategoryDefinition = z.infer<typeof CategorySchema>;
export type PackageDefinition = z.infer<typeof PackageSchema>;
export type ProfileDefinition = z.infer<typeof ProfileSchema>;
export type MiseTool = z.infer<typeof MiseToolSchema>;
export type ManifestDocument = z.infer<typeof ManifestDocumentSchema>;

export type MiseConfig = z.infer<typeof MiseConfigSchema>;
export type HomebrewConfig = z.infer<typeof HomebrewConfigSchema>;
export type AptConfig = z.infer<typeof AptConfigSchema>;
export type PpaConfig = z.infer<typeof PpaConfigSchema>;

export interface BackendConfigMap {
  mise: MiseConfig;
  homebrew: HomebrewConfig;
  apt: AptConfig;
  ppa: PpaConfig;
}

export type RetryLog = z.infer<typeof RetryLogSchema>;
export type RetryLogEntry = z.infer<typeof RetryLogEntrySchema>;

/** The merged, validated view of one or more manifest documents. */
export interface Manifest {
  version: string;
  profiles: Record<string, ProfileDefinition>;
  categories: Record<string, CategoryDefinition>;
  packages: Record<string, PackageDefinition>;
  /** Files the manifest was loaded from, base first. */
  sources: string[];
}
