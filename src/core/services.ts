import { join } from 'node:path';

import { ConfigError } from '../utils/errors.js';
import { getPackageInfo } from '../utils/package-info.js';
import { logger } from '../ui/logger.js';
import type { IssueScoutConfig } from './config.js';
import { ContextFetcher } from './context-fetcher.js';
import { ContextPersistence } from './context-persistence.js';
import { ContextStore } from './context-store.js';
import { GitLabClient } from './gitlab-client.js';
import { connectMcpToolInvoker } from './mcp-tool-invoker.js';
import { QueryOrchestrator } from './orchestrator.js';
import { StrategyExecutor } from './strategy-executor.js';
import type { ToolInvoker } from './tool-invoker.js';
import { RestToolInvoker } from './tool-invoker.js';
import type { TrackerClient } from './tracker-client.js';
import type { ProjectContext } from './types.js';

export interface IssueScoutServices {
  config: IssueScoutConfig;
  store: ContextStore;
  persistence: ContextPersistence;
  fetcher: ContextFetcher;
  orchestrator: QueryOrchestrator;
  /** Seeds the store from the on-disk snapshot, if any. */
  hydrate(projectId: string): Promise<ProjectContext | undefined>;
  close(): Promise<void>;
}

export interface ServiceOverrides {
  tracker?: TrackerClient;
  invoker?: ToolInvoker;
}

export function requireToken(config: IssueScoutConfig): string {
  if (!config.apiToken) {
    throw new ConfigError(
      'No API token configured. Set apiToken in the config file or the ISSUESCOUT_TOKEN variable.',
    );
  }
  return config.apiToken;
}

export function requireProject(config: IssueScoutConfig, explicit?: string): string {
  const projectId = explicit ?? config.defaultProjectId;
  if (!projectId) {
    throw new ConfigError(
      'No project selected. Pass a project id or run `issuescout project use <id>`.',
    );
  }
  return projectId;
}

export function createGitLabClient(config: IssueScoutConfig): GitLabClient {
  return new GitLabClient({
    baseUrl: config.trackerUrl,
    token: requireToken(config),
    timeoutMs: config.requestTimeoutMs,
  });
}

/**
 * Wires the query pipeline from configuration. `overrides` replaces the
 * network-facing pieces, which is how tests run the whole pipeline in process.
 */
export async function createServices(
  config: IssueScoutConfig,
  configDir: string,
  overrides: ServiceOverrides = {},
): Promise<IssueScoutServices> {
  let gitlab: GitLabClient | undefined;
  const gitlabClient = (): GitLabClient => {
    gitlab ??= createGitLabClient(config);
    return gitlab;
  };

  const tracker = overrides.tracker ?? gitlabClient();
  const store = new ContextStore();
  const persistence = new ContextPersistence(join(configDir, 'contexts'));
  const fetcher = new ContextFetcher(tracker, store, {
    onRefreshed: (context) => persistence.save(context),
  });

  let invoker = overrides.invoker;
  let close = async (): Promise<void> => {};
  if (!invoker && config.mcpServerUrl) {
    const pkg = getPackageInfo();
    const mcp = await connectMcpToolInvoker({
      url: config.mcpServerUrl,
      token: config.apiToken,
      timeoutMs: config.requestTimeoutMs,
      clientName: pkg.name,
      clientVersion: pkg.version,
    });
    invoker = mcp;
    close = () => mcp.close();
  }
  invoker ??= new RestToolInvoker(gitlabClient(), config.searchTool);

  const executor = new StrategyExecutor(invoker, {
    toolName: config.searchTool,
    resultLimit: config.resultLimit,
  });
  const orchestrator = new QueryOrchestrator(store, fetcher, executor, {
    planner: {
      maxStrategyDimensions: config.maxStrategyDimensions,
      maxStrategies: config.maxStrategies,
    },
    contextMaxAgeMs: config.contextMaxAgeMinutes * 60 * 1000,
    autoRefresh: config.autoRefresh,
  });

  return {
    config,
    store,
    persistence,
    fetcher,
    orchestrator,
    async hydrate(projectId) {
      const existing = store.get(projectId);
      if (existing) return existing;

      const saved = await persistence.load(projectId);
      if (!saved) return undefined;

      logger.debug(`Loaded saved context for ${projectId} from ${persistence.pathFor(projectId)}`);
      store.put(projectId, saved);
      return store.get(projectId);
    },
    close,
  };
}
