import { getConfigPath, loadConfig, updateConfigFile } from '../core/config.js';
import type { ConfigLocation } from '../core/config.js';
import { createGitLabClient } from '../core/services.js';
import type { AccountClient, ProjectSummary } from '../core/tracker-client.js';
import { logger } from '../ui/logger.js';
import { withSpinner } from '../ui/spinner.js';

export async function projectUseCommand(
  projectId: string,
  location: ConfigLocation = {},
): Promise<void> {
  await updateConfigFile({ defaultProjectId: projectId }, location);
  logger.success(`Default project set to ${projectId}`);
  logger.dim(`Written to ${getConfigPath(location)}`);
}

export async function projectCurrentCommand(location: ConfigLocation = {}): Promise<string | null> {
  const config = await loadConfig(location);
  if (!config.defaultProjectId) {
    logger.warn('No default project set.');
    logger.hint('Run `issuescout project use <id>` to pick one.');
    return null;
  }

  logger.info(`${config.defaultProjectId} on ${config.trackerUrl}`);
  return config.defaultProjectId;
}

export async function projectListCommand(
  options: { search?: string; mine?: boolean },
  location: ConfigLocation = {},
  client?: AccountClient,
): Promise<ProjectSummary[]> {
  const config = await loadConfig(location);
  const account = client ?? createGitLabClient(config);
  const projects = await withSpinner('Fetching projects...', () =>
    account.listProjects({ search: options.search, mine: options.mine }),
  );

  if (projects.length === 0) {
    logger.warn('No projects found.');
    return projects;
  }

  for (const p of projects) {
    logger.info(`${p.name} (ID: ${p.id}, Path: ${p.pathWithNamespace})`);
  }
  logger.hint('Run `issuescout project use <path>` to make one the default project.');
  return projects;
}
