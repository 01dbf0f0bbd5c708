import { describe, it, expect } from 'vitest';
import {
  describeFailure,
  formatCommand,
  lines,
  succeeded,
  type CommandResult,
} from '../../../src/utils/exec.js';

function result(overrides: Partial<CommandResult>): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', notFound: false, timedOut: false, ...overrides };
}

describe('exec helpers', () => {
  it('treats only a clean zero exit as success', () => {
    expect(succeeded(result({}))).toBe(true);
    expect(succeeded(result({ exitCode: 1 }))).toBe(false);
    expect(succeeded(result({ notFound: true }))).toBe(false);
    expect(succeeded(result({ timedOut: true }))).toBe(false);
  });

  it('describes failures by their cause', () => {
    expect(describeFailure(result({ exitCode: 127, notFound: true }))).toBe('command not found');
    expect(describeFailure(result({ exitCode: 1, timedOut: true }))).toBe('timed out');
    expect(describeFailure(result({ exitCode: 100, stderr: 'Reading lists\nE: Unable to locate package zzz\n' }))).toBe(
      'exit code 100: E: Unable to locate package zzz',
    );
    expect(describeFailure(result({ exitCode: 2 }))).toBe('exit code 2');
  });

  it('splits output into trimmed non-empty lines', () => {
    expect(lines('  git \n\ncurl\n')).toEqual(['git', 'curl']);
  });

  it('formats a command with its arguments', () => {
    expect(formatCommand('sudo', ['apt-get', 'install', '-y', 'jq'])).toBe('sudo apt-get install -y jq');
  });
});
