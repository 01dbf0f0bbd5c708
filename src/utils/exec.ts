import { spawnSync } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** The executable could not be found. */
  notFound: boolean;
  timedOut: boolean;
}

export interface RunOptions {
  timeoutMs?: number;
  /** Data written to the child's stdin. */
  input?: string;
  /** Let the child write straight to the terminal (installs). */
  inherit?: boolean;
}

/**
 * Every external process goes through a runner so that a run can be
 * replayed against scripted output in tests.
 */
export interface CommandRunner {
  run(cmd: string, args: string[], opts?: RunOptions): CommandResult;
  exists(cmd: string): boolean;
}

export const LIST_TIMEOUT_MS = 60_000;
export const SEARCH_TIMEOUT_MS = 30_000;
export const INSTALL_TIMEOUT_MS = 30 * 60_000;
export const REFRESH_TIMEOUT_MS = 10 * 60_000;

const MAX_BUFFER = 64 * 1024 * 1024;

export function createRunner(): CommandRunner {
  const existsMemo = new Map<string, boolean>();

  return {
    run(cmd, args, opts = {}) {
      const result = spawnSync(cmd, args, {
        encoding: 'utf-8',
        timeout: opts.timeoutMs ?? LIST_TIMEOUT_MS,
        input: opts.input,
        maxBuffer: MAX_BUFFER,
        stdio: opts.inherit ? ['inherit', 'inherit', 'inherit'] : ['pipe', 'pipe', 'pipe'],
      });
      const code = result.error && 'code' in result.error ? result.error.code : undefined;
      return {
        exitCode: result.status ?? 1,
        stdout: result.stdout ?? '',
        stderr: result.stderr ?? (result.error ? result.error.message : ''),
        notFound: code === 'ENOENT',
        timedOut: code === 'ETIMEDOUT',
      };
    },

    exists(cmd) {
      const memo = existsMemo.get(cmd);
      if (memo !== undefined) return memo;
      const found = spawnSync('which', [cmd], { stdio: 'ignore', timeout: 5000 }).status === 0;
      existsMemo.set(cmd, found);
      return found;
    },
  };
}

export function succeeded(result: CommandResult): boolean {
  return result.exitCode === 0 && !result.notFound && !result.timedOut;
}

export function describeFailure(result: CommandResult): string {
  if (result.notFound) return 'command not found';
  if (result.timedOut) return 'timed out';
  const detail = result.stderr.trim().split('\n').pop();
  return detail ? `exit code ${result.exitCode}: ${detail}` : `exit code ${result.exitCode}`;
}

export function lines(output: string): string[] {
  return output
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
}

/** Printable form of a command, for dry-run and progress output. */
export function formatCommand(cmd: string, args: string[]): string {
  return [cmd, ...args].join(' ');
}
