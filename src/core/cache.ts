import type { BackendId } from '../types/manifest.js';
import {
  type CommandRunner,
  LIST_TIMEOUT_MS,
  SEARCH_TIMEOUT_MS,
  lines,
  succeeded,
} from '../utils/exec.js';
import { DEFAULT_MAX_RESULTS, rankCandidates, substringScan, transformCandidates } from './fuzzy.js';

// ppa packages land in the same dpkg database as apt ones, so both
// backends read one slot.
type Slot = 'apt' | 'homebrew' | 'mise';

function slotOf(backend: BackendId): Slot {
  return backend === 'ppa' ? 'apt' : backend;
}

interface Listing {
  installed: Set<string>;
  available: Set<string>;
  caskInstalled: Set<string>;
  caskAvailable: Set<string>;
}

export interface LookupOptions {
  cask?: boolean;
}

export interface CacheStats {
  backend: Slot;
  initialized: boolean;
  installed: number;
  available: number;
  caskInstalled: number;
  caskAvailable: number;
}

function emptyListing(): Listing {
  return {
    installed: new Set(),
    available: new Set(),
    caskInstalled: new Set(),
    caskAvailable: new Set(),
  };
}

/** Backslash-escapes regex operators so names like `g++` match literally. */
function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** First whitespace-separated column of each non-empty line. */
function firstColumn(rows: string[]): string[] {
  return rows.map((l) => l.split(/\s+/)[0] ?? '');
}

/**
 * In-memory listings of installed and available packages, one slot per
 * package manager. A slot is filled by a single round of listing commands
 * the first time anything asks about it; membership checks after that never
 * spawn a process.
 */
export class BackendCache {
  private readonly slots = new Map<Slot, Listing>();

  constructor(private readonly runner: CommandRunner) {}

  isInitialized(backend: BackendId): boolean {
    return this.slots.has(slotOf(backend));
  }

  init(backend: BackendId): void {
    this.listing(backend);
  }

  clearAll(): void {
    this.slots.clear();
  }

  exists(backend: BackendId, id: string, opts: LookupOptions = {}): boolean {
    const l = this.listing(backend);
    return opts.cask ? l.caskAvailable.has(id) : l.available.has(id);
  }

  isInstalled(backend: BackendId, id: string, opts: LookupOptions = {}): boolean {
    const l = this.listing(backend);
    return opts.cask ? l.caskInstalled.has(id) : l.installed.has(id);
  }

  /** Whether the backend produced any availability listing at all. */
  hasListing(backend: BackendId): boolean {
    const l = this.listing(backend);
    return l.available.size > 0 || l.caskAvailable.size > 0;
  }

  available(backend: BackendId, opts: LookupOptions = {}): ReadonlySet<string> {
    const l = this.listing(backend);
    return opts.cask ? l.caskAvailable : l.available;
  }

  stats(): CacheStats[] {
    return [...this.slots.entries()].map(([backend, l]) => ({
      backend,
      initialized: true,
      installed: l.installed.size,
      available: l.available.size,
      caskInstalled: l.caskInstalled.size,
      caskAvailable: l.caskAvailable.size,
    }));
  }

  // ── Native search ─────────────────────────────────────────────────

  search(backend: BackendId, needle: string, opts: LookupOptions = {}): string[] {
    switch (slotOf(backend)) {
      case 'apt': {
        const pattern = escapeRegExp(needle);
        const exact = this.query('apt-cache', ['search', '--names-only', `^${pattern}$`], SEARCH_TIMEOUT_MS);
        const hits = exact.length ? exact : this.query('apt-cache', ['search', pattern], SEARCH_TIMEOUT_MS);
        // apt-cache also matches descriptions; keep what the index knows by name.
        return firstColumn(hits).filter((id) => this.exists(backend, id));
      }
      case 'homebrew':
        // Formulae and casks come back together; keep the namespace asked for.
        return this.query('brew', ['search', needle], SEARCH_TIMEOUT_MS).filter(
          (l) => !l.startsWith('==>') && this.exists(backend, l, opts),
        );
      case 'mise': {
        const lowered = needle.toLowerCase();
        return firstColumn(this.query('mise', ['plugins', 'ls-remote'], SEARCH_TIMEOUT_MS))
          .filter((id) => id.toLowerCase().includes(lowered));
      }
    }
  }

  /**
   * Alternatives for an identifier the cache does not know. Strategies run
   * in order and the first one that yields anything wins: the backend's own
   * search, naming-convention rewrites checked against the cache, then a
   * substring scan of the availability listing.
   */
  findSimilar(
    backend: BackendId,
    needle: string,
    max = DEFAULT_MAX_RESULTS,
    opts: LookupOptions = {},
  ): string[] {
    if (!needle) return [];
    this.init(backend);

    const strategies: Array<() => string[]> = [
      () => this.search(backend, needle, opts),
      () => transformCandidates(backend, needle).filter((c) => this.exists(backend, c, opts)),
      () => substringScan(this.available(backend, opts), needle),
    ];

    for (const strategy of strategies) {
      const found = strategy();
      if (found.length > 0) return rankCandidates(found, needle, max);
    }
    return [];
  }

  // ── Population ────────────────────────────────────────────────────

  private listing(backend: BackendId): Listing {
    const slot = slotOf(backend);
    const existing = this.slots.get(slot);
    if (existing) return existing;

    const listing = emptyListing();
    switch (slot) {
      case 'apt':
        this.fill(listing.installed, this.query('dpkg-query', ['-W', '--no-paging', '-f=${Package}\n']));
        this.fill(listing.available, this.query('apt-cache', ['pkgnames']));
        break;
      case 'homebrew':
        this.fill(listing.installed, this.query('brew', ['list', '--formula', '-1']));
        this.fill(listing.caskInstalled, this.query('brew', ['list', '--cask', '-1']));
        this.fill(listing.available, this.query('brew', ['formulae']));
        this.fill(listing.caskAvailable, this.query('brew', ['casks']));
        break;
      case 'mise':
        this.fill(
          listing.installed,
          firstColumn(this.query('mise', ['list', '--installed'])).map(
            (entry) => entry.split('@')[0] ?? entry,
          ),
        );
        this.fill(listing.available, firstColumn(this.query('mise', ['registry'])));
        break;
    }
    this.slots.set(slot, listing);
    return listing;
  }

  private fill(target: Set<string>, entries: string[]): void {
    for (const entry of entries) if (entry) target.add(entry);
  }

  /** Output lines of a listing command; nothing when the tool is absent or fails. */
  private query(cmd: string, args: string[], timeoutMs = LIST_TIMEOUT_MS): string[] {
    const result = this.runner.run(cmd, args, { timeoutMs });
    return succeeded(result) ? lines(result.stdout) : [];
  }
}
