import ora from 'ora';

export async function withSpinner<T>(
  text: string,
  fn: () => T | Promise<T>,
): Promise<T> {
  // No animation when output is piped; dry-run output stays diffable.
  const spinner = ora({ text, isEnabled: process.stdout.isTTY === true }).start();
  try {
    const result = await fn();
    spinner.succeed();
    return result;
  } catch (err) {
    spinner.fail();
    throw err;
  }
}
