import { getConfigDir, loadConfig } from '../core/config.js';
import type { ConfigLocation } from '../core/config.js';
import { createServices, requireProject } from '../core/services.js';
import type { ServiceOverrides } from '../core/services.js';
import type { AggregatedResponse } from '../core/types.js';
import { renderResponse } from '../ui/render.js';
import { withSpinner } from '../ui/spinner.js';

export interface QueryCommandOptions {
  project?: string;
  json?: boolean;
}

export async function queryCommand(
  question: string,
  options: QueryCommandOptions,
  location: ConfigLocation = {},
  overrides: ServiceOverrides = {},
): Promise<AggregatedResponse> {
  const config = await loadConfig(location);
  const projectId = requireProject(config, options.project);
  const services = await createServices(config, getConfigDir(location), overrides);

  try {
    await services.hydrate(projectId);
    const response = await withSpinner(
      `Searching ${projectId}...`,
      () =>
        services.orchestrator.planAndExecute(question, config.defaultProjectId ?? projectId, {
          projectOverride: options.project,
        }),
      { silent: options.json },
    );

    console.log(options.json ? JSON.stringify(response, null, 2) : renderResponse(response));
    return response;
  } finally {
    await services.close();
  }
}
