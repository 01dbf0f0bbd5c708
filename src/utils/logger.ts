import { appendFileSync, mkdirSync } from 'node:fs';
import { hostname, type, userInfo } from 'node:os';
import { join } from 'node:path';

export type LogLevel = 'WARN' | 'ERROR';

interface LoggerState {
  dir: string | null;
  file: string | null;
  now: () => Date;
}

const state: LoggerState = { dir: null, file: null, now: () => new Date() };

const ANSI_PATTERN = /\u001b\[[0-9;]*m/g;

/** `YYYYMMDD_HHMMSS` in local time, used in log and retry file names. */
export function fileTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

export function currentUser(): string {
  try {
    return userInfo().username;
  } catch {
    return process.env.USER ?? 'unknown';
  }
}

/**
 * Points the log at a directory. Nothing is written until the first
 * warning or error; until configured, entries are dropped.
 */
export function configureLogFile(dir: string, now: () => Date = () => new Date()): void {
  state.dir = dir;
  state.file = null;
  state.now = now;
}

export function resetLogFile(): void {
  state.dir = null;
  state.file = null;
  state.now = () => new Date();
}

export function currentLogFile(): string | null {
  return state.file;
}

function openLogFile(dir: string): string {
  const started = state.now();
  const file = join(dir, `install-${fileTimestamp(started)}.log`);
  mkdirSync(dir, { recursive: true });
  appendFileSync(
    file,
    [
      '# dotkit install log',
      `# date: ${started.toISOString()}`,
      `# user: ${currentUser()}@${hostname()}`,
      `# os: ${type()} ${process.platform}`,
      '',
    ].join('\n'),
  );
  return file;
}

export function appendLog(level: LogLevel, msg: string): void {
  if (!state.dir) return;
  state.file ??= openLogFile(state.dir);
  appendFileSync(state.file, `[${state.now().toISOString()}] ${level} ${stripAnsi(msg)}\n`);
}
