import { describe, it, expect } from 'vitest';
import {
  AptConfigSchema,
  CategorySchema,
  HomebrewConfigSchema,
  ManifestDocumentSchema,
  PackageSchema,
  PpaConfigSchema,
  RetryLogSchema,
} from '../../../src/config/schema.js';

describe('manifest schemas', () => {
  describe('CategorySchema', () => {
    it('accepts a priority chain of known backends', () => {
      const result = CategorySchema.safeParse({ description: 'Core', priority: ['homebrew', 'apt'] });
      expect(result.success).toBe(true);
    });

    it('rejects an empty priority chain', () => {
      const result = CategorySchema.safeParse({ description: 'Core', priority: [] });
      expect(result.success).toBe(false);
    });

    it('rejects an unknown backend', () => {
      const result = CategorySchema.safeParse({ description: 'Core', priority: ['snap'] });
      expect(result.success).toBe(false);
    });
  });

  describe('backend configs', () => {
    it('requires package or packages for apt', () => {
      expect(AptConfigSchema.safeParse({}).success).toBe(false);
      expect(AptConfigSchema.safeParse({ package: 'git' }).success).toBe(true);
      expect(AptConfigSchema.safeParse({ packages: ['git', 'git-lfs'] }).success).toBe(true);
    });

    it('requires the ppa: prefix on repositories', () => {
      expect(
        PpaConfigSchema.safeParse({ repository: 'neovim-ppa/unstable', package: 'neovim' }).success,
      ).toBe(false);
      expect(
        PpaConfigSchema.safeParse({ repository: 'ppa:neovim-ppa/unstable', package: 'neovim' }).success,
      ).toBe(true);
    });

    it('rejects a signing key that is not a URL', () => {
      const result = PpaConfigSchema.safeParse({
        repository: 'ppa:example/tools',
        package: 'tool',
        gpg_key: 'not a url',
      });
      expect(result.success).toBe(false);
    });

    it('validates the tap format', () => {
      expect(HomebrewConfigSchema.safeParse({ package: 'k9s', tap: 'derailed/k9s' }).success).toBe(true);
      expect(HomebrewConfigSchema.safeParse({ package: 'k9s', tap: 'derailed' }).success).toBe(false);
    });

    it('rejects identifiers with spaces', () => {
      expect(HomebrewConfigSchema.safeParse({ package: 'two words' }).success).toBe(false);
    });
  });

  describe('PackageSchema', () => {
    it('only accepts mise as a delegation target', () => {
      expect(PackageSchema.safeParse({ category: 'core', managed_by: 'mise' }).success).toBe(true);
      expect(PackageSchema.safeParse({ category: 'core', managed_by: 'asdf' }).success).toBe(false);
    });

    it('requires a category', () => {
      expect(PackageSchema.safeParse({ apt: { package: 'git' } }).success).toBe(false);
    });
  });

  describe('ManifestDocumentSchema', () => {
    it('turns a numeric version into a string', () => {
      const result = ManifestDocumentSchema.parse({ version: 1 });
      expect(result.version).toBe('1');
    });

    it('accepts relaxed semver with a v prefix', () => {
      expect(ManifestDocumentSchema.parse({ version: 'v1.2.3' }).version).toBe('v1.2.3');
    });

    it('rejects a version that is not numeric', () => {
      expect(ManifestDocumentSchema.safeParse({ version: 'latest' }).success).toBe(false);
    });

    it('allows a document with no version', () => {
      expect(ManifestDocumentSchema.safeParse({ packages: {} }).success).toBe(true);
    });
  });

  describe('RetryLogSchema', () => {
    it('accepts a written retry log', () => {
      const result = RetryLogSchema.safeParse({
        date: '2026-01-01T00:00:00.000Z',
        user: 'tester',
        host: 'box',
        packages: [
          { backend: 'apt', package: 'foo', actual_name: 'foo', status: 'missing', alternatives: [] },
        ],
      });
      expect(result.success).toBe(true);
    });

    it('rejects an unknown status', () => {
      const result = RetryLogSchema.safeParse({
        date: 'x',
        user: 'u',
        host: 'h',
        packages: [
          { backend: 'apt', package: 'foo', actual_name: 'foo', status: 'broken', alternatives: [] },
        ],
      });
      expect(result.success).toBe(false);
    });
  });
});
