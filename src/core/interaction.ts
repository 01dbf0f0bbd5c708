import { InstallAbortedError } from './errors.js';
import { formatIssue, type VerificationIssue } from './verification.js';

export type UserChoice =
  | { action: 'skip' }
  | { action: 'substitute'; substitutions: Record<string, string> };

export type IssueAnswer =
  | { kind: 'alternative'; value: string }
  | { kind: 'skip' }
  | { kind: 'abort' };

/** Asks the operator about one issue. The only place terminal input happens. */
export type Prompter = (issue: VerificationIssue, position: number, total: number) => Promise<IssueAnswer>;

export interface ResolveOptions {
  interactive: boolean;
  prompter?: Prompter;
  log: (msg: string) => void;
}

/** Decisions keyed by package name, consulted before anything is installed. */
export class UserChoices {
  private readonly choices = new Map<string, UserChoice>();

  record(packageName: string, choice: UserChoice): void {
    const current = this.choices.get(packageName);
    if (current?.action === 'skip') return;
    if (choice.action === 'substitute' && current?.action === 'substitute') {
      this.choices.set(packageName, {
        action: 'substitute',
        substitutions: { ...current.substitutions, ...choice.substitutions },
      });
      return;
    }
    this.choices.set(packageName, choice);
  }

  get(packageName: string): UserChoice | null {
    return this.choices.get(packageName) ?? null;
  }

  shouldSkip(packageName: string): boolean {
    return this.choices.get(packageName)?.action === 'skip';
  }

  /** Attempted identifier → replacement, for packages with a chosen alternative. */
  substitutionsFor(packageName: string): Record<string, string> {
    const choice = this.choices.get(packageName);
    return choice?.action === 'substitute' ? { ...choice.substitutions } : {};
  }

  skippedPackages(): string[] {
    return [...this.choices.entries()]
      .filter(([, choice]) => choice.action === 'skip')
      .map(([name]) => name);
  }

  summary(): { skipped: number; replaced: number } {
    const skipped = this.skippedPackages().length;
    return { skipped, replaced: this.choices.size - skipped };
  }
}

export async function resolveIssues(
  issues: VerificationIssue[],
  opts: ResolveOptions,
): Promise<UserChoices> {
  const choices = new UserChoices();
  if (issues.length === 0) return choices;

  opts.log(`Found ${issues.length} package issue(s):`);

  if (!opts.interactive || !opts.prompter) {
    for (const issue of issues) {
      opts.log(`  ${formatIssue(issue)} (skipped)`);
      choices.record(issue.packageName, { action: 'skip' });
    }
    return choices;
  }

  for (const [index, issue] of issues.entries()) {
    // Once a package is skipped its remaining identifiers need no answer.
    if (choices.shouldSkip(issue.packageName)) continue;

    const answer = await opts.prompter(issue, index + 1, issues.length);
    switch (answer.kind) {
      case 'abort':
        throw new InstallAbortedError();
      case 'skip':
        opts.log(`  Skipping ${issue.packageName}`);
        choices.record(issue.packageName, { action: 'skip' });
        break;
      case 'alternative':
        opts.log(`  Using ${answer.value} instead of ${issue.identifier}`);
        choices.record(issue.packageName, {
          action: 'substitute',
          substitutions: { [issue.identifier]: answer.value },
        });
        break;
    }
  }

  return choices;
}
