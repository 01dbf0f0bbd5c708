import type { BackendId } from '../types/manifest.js';

export const DEFAULT_MAX_RESULTS = 5;

const PYTHON_MINORS = ['3.9', '3.10', '3.11', '3.12'];

// ── Naming-convention rewrites ──────────────────────────────────────

function systemTransforms(needle: string): string[] {
  if (needle.startsWith('python-')) {
    const rest = needle.slice('python-'.length);
    return [`python3-${rest}`, ...PYTHON_MINORS.map((v) => `python${v}-${rest}`)];
  }
  if (needle.startsWith('lib-')) {
    const rest = needle.slice('lib-'.length);
    return [`lib${rest}`, `lib${rest}-dev`];
  }
  if (needle.endsWith('-dev')) {
    return [`lib${needle.slice(0, -'-dev'.length)}-dev`];
  }
  return [];
}

function homebrewTransforms(needle: string): string[] {
  return needle.endsWith('-cli') ? [needle.slice(0, -'-cli'.length)] : [`${needle}-cli`];
}

const MISE_ALIASES = new Map<string, string[]>([
  ['node', ['nodejs']],
  ['nodejs', ['node']],
  ['python', ['python3']],
  ['golang', ['go']],
  ['go', ['golang']],
]);

export function transformCandidates(backend: BackendId, needle: string): string[] {
  switch (backend) {
    case 'apt':
    case 'ppa':
      return systemTransforms(needle);
    case 'homebrew':
      return homebrewTransforms(needle);
    case 'mise':
      return [...(MISE_ALIASES.get(needle) ?? [])];
  }
}

// ── Substring scan ──────────────────────────────────────────────────

/** The needle itself, plus what follows its last `-` when it has one. */
export function scanTerms(needle: string): string[] {
  const dash = needle.lastIndexOf('-');
  if (dash <= 0 || dash === needle.length - 1) return [needle];
  return [needle, needle.slice(dash + 1)];
}

export function substringScan(pool: Iterable<string>, needle: string): string[] {
  const terms = scanTerms(needle);
  const hits: string[] = [];
  for (const entry of pool) {
    if (terms.some((t) => entry.includes(t))) hits.push(entry);
  }
  return hits;
}

// ── Ranking ─────────────────────────────────────────────────────────

export function matchScore(candidate: string, needle: string): number {
  if (candidate === needle) return 0;
  if (candidate.startsWith(needle)) return 1;
  if (candidate.includes(needle)) return 2;
  return 3;
}

/**
 * Deduplicates and orders candidates: exact match, then prefix, then
 * substring, then everything else. Ties keep their incoming order.
 */
export function rankCandidates(
  candidates: string[],
  needle: string,
  max = DEFAULT_MAX_RESULTS,
): string[] {
  const unique = [...new Set(candidates.filter((c) => c.length > 0))];
  return unique
    .map((candidate, index) => ({ candidate, index, score: matchScore(candidate, needle) }))
    .sort((a, b) => a.score - b.score || a.index - b.index)
    .slice(0, max)
    .map((r) => r.candidate);
}
