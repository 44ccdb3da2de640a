import { Command } from 'commander';

import { logger } from './ui/logger.js';
import {
  ConfigError,
  FetchError,
  OrchestrationError,
  TrackerRequestError,
} from './utils/errors.js';
import { getPackageInfo } from './utils/package-info.js';

const pkg = getPackageInfo();

export const program = new Command()
  .name('issuescout')
  .description(pkg.description)
  .version(pkg.version);

program
  .command('query')
  .description('Ask a question about the issues of a project')
  .argument('<question...>', 'Natural-language question, e.g. "bugs assigned to alice"')
  .option('-p, --project <id>', 'Project id or path (overrides the default project)')
  .option('--json', 'Print the structured response as JSON')
  .action(async (question: string[], options: { project?: string; json?: boolean }) => {
    const { queryCommand } = await import('./commands/query.js');
    await queryCommand(question.join(' '), options);
  });

const context = program.command('context').description('Manage cached project context');

context
  .command('refresh')
  .description('Fetch labels, members and milestones from the tracker')
  .argument('[project]', 'Project id (defaults to the configured project)')
  .action(async (project?: string) => {
    const { contextRefreshCommand } = await import('./commands/context.js');
    await contextRefreshCommand(project);
  });

context
  .command('show')
  .description('Print the saved context of a project')
  .argument('[project]', 'Project id (defaults to the configured project)')
  .action(async (project?: string) => {
    const { contextShowCommand } = await import('./commands/context.js');
    await contextShowCommand(project);
  });

context
  .command('clear')
  .description('Delete the saved context of a project')
  .argument('[project]', 'Project id (defaults to the configured project)')
  .action(async (project?: string) => {
    const { contextClearCommand } = await import('./commands/context.js');
    await contextClearCommand(project);
  });

const project = program.command('project').description('Select the default project');

project
  .command('use')
  .description('Set the default project')
  .argument('<id>', 'Project id or namespace/project path')
  .action(async (id: string) => {
    const { projectUseCommand } = await import('./commands/project.js');
    await projectUseCommand(id);
  });

project
  .command('current')
  .description('Show the default project')
  .action(async () => {
    const { projectCurrentCommand } = await import('./commands/project.js');
    await projectCurrentCommand();
  });

project
  .command('list')
  .description('List projects visible to the configured token')
  .option('-s, --search <term>', 'Only projects whose name matches the term')
  .option('-m, --mine', 'Only projects you are a member of')
  .action(async (options: { search?: string; mine?: boolean }) => {
    const { projectListCommand } = await import('./commands/project.js');
    await projectListCommand(options);
  });

const auth = program.command('auth').description('Check tracker credentials');

auth
  .command('status')
  .description('Verify the configured API token')
  .action(async () => {
    const { authStatusCommand } = await import('./commands/auth.js');
    await authStatusCommand();
  });

/** Prints an error the way the CLI reports failures and returns the exit code. */
export function reportError(error: unknown): number {
  if (error instanceof OrchestrationError) {
    logger.error(error.message);
    if (error.suggestion) logger.hint(error.suggestion);
    return 2;
  }

  if (error instanceof FetchError) {
    logger.error(error.message);
    logger.hint('Check trackerUrl and apiToken, then retry `issuescout context refresh`.');
    return 2;
  }

  if (error instanceof TrackerRequestError) {
    logger.error(error.message);
    logger.hint('Check trackerUrl and apiToken in your config.');
    return 2;
  }

  if (error instanceof ConfigError) {
    logger.error(error.message);
    return 1;
  }

  logger.error(error instanceof Error ? error.message : String(error));
  return 1;
}
