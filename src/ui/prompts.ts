import { select } from '@inquirer/prompts';
import type { IssueAnswer, Prompter } from '../core/interaction.js';

export async function askSelect<T extends string>(
  message: string,
  choices: { name: string; value: T }[],
): Promise<T> {
  return select({ message, choices });
}

const SKIP = '__skip__';
const ABORT = '__abort__';

export const promptIssue: Prompter = async (issue, position, total) => {
  const message =
    `[${position}/${total}] ${issue.packageName} (${issue.backend}): "${issue.identifier}" not found.` +
    (issue.alternatives.length ? ' Pick a replacement:' : '');

  const answer = await askSelect(message, [
    ...issue.alternatives.map((alt) => ({ name: alt, value: alt })),
    { name: 'Skip this package', value: SKIP },
    { name: 'Abort installation', value: ABORT },
  ]);

  const resolved: IssueAnswer =
    answer === SKIP ? { kind: 'skip' } : answer === ABORT ? { kind: 'abort' } : { kind: 'alternative', value: answer };
  return resolved;
};
