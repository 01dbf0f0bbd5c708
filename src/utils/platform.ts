import { readFileSync } from 'node:fs';

export const OS_RELEASE_FILE = '/etc/os-release';
export const GENERIC_LINUX = 'linux';

/**
 * Key/value pairs of an os-release document. Values may be quoted with
 * single or double quotes; comments and blank lines are ignored.
 */
export function parseOsRelease(content: string): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;
    const eq = line.indexOf('=');
    if (eq <= 0) continue;
    const key = line.slice(0, eq);
    let value = line.slice(eq + 1);
    if (value.length >= 2 && (value[0] === '"' || value[0] === "'") && value.endsWith(value[0])) {
      value = value.slice(1, -1);
    }
    fields[key] = value;
  }
  return fields;
}

function readOsRelease(path: string): string | null {
  try {
    return readFileSync(path, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Platform string used by manifest filters: `macos` on Darwin, the
 * distribution id on Linux, the bare Node platform elsewhere.
 */
export function detectPlatform(
  nodePlatform: NodeJS.Platform = process.platform,
  osReleasePath = OS_RELEASE_FILE,
): string {
  if (nodePlatform === 'darwin') return 'macos';
  if (nodePlatform !== 'linux') return nodePlatform;

  const content = readOsRelease(osReleasePath);
  const id = content ? parseOsRelease(content).ID : undefined;
  return id ? id.toLowerCase() : GENERIC_LINUX;
}
