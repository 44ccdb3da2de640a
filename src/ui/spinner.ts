import ora from 'ora';
import type { Ora } from 'ora';

export function createSpinner(text: string, silent = false): Ora {
  return ora({ text, spinner: 'dots', isSilent: silent });
}

export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
  options: { silent?: boolean } = {},
): Promise<T> {
  const spinner = createSpinner(text, options.silent);
  spinner.start();
  try {
    const result = await fn();
    spinner.succeed();
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  }
}
