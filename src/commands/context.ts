import { join } from 'node:path';

import { getConfigDir, loadConfig } from '../core/config.js';
import type { ConfigLocation } from '../core/config.js';
import { ContextPersistence } from '../core/context-persistence.js';
import { createServices, requireProject } from '../core/services.js';
import type { ServiceOverrides } from '../core/services.js';
import type { ProjectContext } from '../core/types.js';
import { buildContextSummary } from '../prompts/context-summary.js';
import { logger } from '../ui/logger.js';
import { withSpinner } from '../ui/spinner.js';

function contextPersistence(location: ConfigLocation): ContextPersistence {
  return new ContextPersistence(join(getConfigDir(location), 'contexts'));
}

export async function contextRefreshCommand(
  project: string | undefined,
  location: ConfigLocation = {},
  overrides: ServiceOverrides = {},
): Promise<ProjectContext> {
  const config = await loadConfig(location);
  const projectId = requireProject(config, project);
  const services = await createServices(config, getConfigDir(location), overrides);

  try {
    const context = await withSpinner(`Refreshing context for ${projectId}...`, () =>
      services.orchestrator.refreshContext(projectId),
    );
    logger.success(
      `${context.labels.length} labels, ${context.members.length} members, ` +
        `${context.milestones.length} milestones`,
    );
    logger.dim(`Saved to ${services.persistence.pathFor(projectId)}`);
    return context;
  } finally {
    await services.close();
  }
}

export async function contextShowCommand(
  project: string | undefined,
  location: ConfigLocation = {},
): Promise<ProjectContext | null> {
  const config = await loadConfig(location);
  const projectId = requireProject(config, project);
  const context = await contextPersistence(location).load(projectId);

  if (!context) {
    logger.warn(`No saved context for ${projectId}.`);
    logger.hint('Run `issuescout context refresh` to fetch it.');
    return null;
  }

  console.log(buildContextSummary(context));

  const ageMs = Date.now() - Date.parse(context.fetchedAt);
  if (ageMs > config.contextMaxAgeMinutes * 60 * 1000) {
    logger.warn(`This context is older than ${config.contextMaxAgeMinutes} minutes.`);
  }
  return context;
}

export async function contextClearCommand(
  project: string | undefined,
  location: ConfigLocation = {},
): Promise<void> {
  const config = await loadConfig(location);
  const projectId = requireProject(config, project);
  await contextPersistence(location).remove(projectId);
  logger.success(`Cleared saved context for ${projectId}`);
}
