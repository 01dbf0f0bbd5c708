import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { hostname } from 'node:os';
import { join } from 'node:path';
import { RetryLogSchema } from '../config/schema.js';
import type { RetryLog } from '../types/manifest.js';
import { currentUser, fileTimestamp } from '../utils/logger.js';
import { RetryLogError } from './errors.js';
import type { VerificationIssue } from './verification.js';

export function retryLogFileName(date: Date): string {
  return `missing-packages-${fileTimestamp(date)}.json`;
}

export function buildRetryLog(issues: VerificationIssue[], date: Date): RetryLog {
  return {
    date: date.toISOString(),
    user: currentUser(),
    host: hostname(),
    packages: issues.map((issue) => ({
      backend: issue.backend,
      package: issue.packageName,
      actual_name: issue.identifier,
      status: issue.status,
      alternatives: [...issue.alternatives],
    })),
  };
}

/** Writes the issues to `<dir>/missing-packages-<timestamp>.json` and returns the path. */
export function writeRetryLog(dir: string, issues: VerificationIssue[], date = new Date()): string {
  mkdirSync(dir, { recursive: true });
  const file = join(dir, retryLogFileName(date));
  writeFileSync(file, JSON.stringify(buildRetryLog(issues, date), null, 2) + '\n', 'utf-8');
  return file;
}

export function readRetryLog(file: string): RetryLog {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (err) {
    throw new RetryLogError(file, err instanceof Error ? err.message : String(err));
  }
  const result = RetryLogSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new RetryLogError(file, issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid');
  }
  return result.data;
}

/** Unique package names recorded in a retry log, in the order they appear. */
export function loadRetryLog(file: string): string[] {
  return [...new Set(readRetryLog(file).packages.map((p) => p.package))];
}
