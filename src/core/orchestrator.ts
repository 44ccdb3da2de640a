import { FetchError, NoContextError, OrchestrationError } from '../utils/errors.js';
import { logger } from '../ui/logger.js';
import type { ContextFetcher } from './context-fetcher.js';
import type { ContextStore } from './context-store.js';
import type { PlannerOptions } from './query-planner.js';
import { DEFAULT_PLANNER_OPTIONS, plan } from './query-planner.js';
import type { StrategyExecutor } from './strategy-executor.js';
import type { AggregatedResponse, ContextStatus, ProjectContext, Query } from './types.js';

export const DEFAULT_CONTEXT_MAX_AGE_MS = 60 * 60 * 1000;

export interface OrchestratorOptions {
  planner?: Partial<PlannerOptions>;
  contextMaxAgeMs?: number;
  /** Refresh stale or missing context before planning. */
  autoRefresh?: boolean;
  now?: () => number;
}

export interface QueryOptions {
  projectOverride?: string;
}

interface ResolvedContext {
  context: ProjectContext;
  status: ContextStatus;
}

export function createQuery(text: string, projectId: string, projectOverride?: string): Query {
  const query: Query = projectOverride ? { text, projectId, projectOverride } : { text, projectId };
  return Object.freeze(query);
}

export function effectiveProject(query: Query): string {
  return query.projectOverride ?? query.projectId;
}

/**
 * Entry point of the query pipeline: context lookup and refresh, planning,
 * execution. The active project is always passed in; nothing here holds a
 * "current project".
 */
export class QueryOrchestrator {
  private readonly plannerOptions: PlannerOptions;
  private readonly contextMaxAgeMs: number;
  private readonly autoRefresh: boolean;
  private readonly now: () => number;

  constructor(
    private readonly store: ContextStore,
    private readonly fetcher: ContextFetcher,
    private readonly executor: StrategyExecutor,
    options: OrchestratorOptions = {},
  ) {
    this.plannerOptions = { ...DEFAULT_PLANNER_OPTIONS, ...options.planner };
    this.contextMaxAgeMs = options.contextMaxAgeMs ?? DEFAULT_CONTEXT_MAX_AGE_MS;
    this.autoRefresh = options.autoRefresh ?? true;
    this.now = options.now ?? Date.now;
  }

  async planAndExecute(
    queryText: string,
    projectId: string,
    options: QueryOptions = {},
  ): Promise<AggregatedResponse> {
    const query = createQuery(queryText, projectId, options.projectOverride);
    if (!query.text.trim()) {
      throw new OrchestrationError('invalid-query', 'Query text is empty');
    }

    const project = effectiveProject(query);
    if (!project) {
      throw new OrchestrationError('invalid-query', 'No project selected', {
        suggestion: 'Pass --project or run `issuescout project use <id>`.',
      });
    }

    const { context, status } = await this.resolveContext(project);
    const strategies = plan(query, context, this.plannerOptions);
    logger.debug(`Planned ${strategies.length} strategies for "${query.text}"`);

    const response = await this.executor.execute(strategies, {
      projectId: project,
      queryText: query.text,
    });
    return { ...response, context: status };
  }

  refreshContext(projectId: string): Promise<ProjectContext> {
    return this.fetcher.refresh(projectId);
  }

  private async resolveContext(projectId: string): Promise<ResolvedContext> {
    const cached = this.store.get(projectId);
    const stale = this.store.isStale(projectId, this.contextMaxAgeMs, this.now());

    if (!stale && cached) {
      return {
        context: cached,
        status: { fetchedAt: cached.fetchedAt, refreshed: false, stale: false },
      };
    }

    if (!this.autoRefresh) {
      if (!cached) throw new NoContextError(projectId);
      return {
        context: cached,
        status: { fetchedAt: cached.fetchedAt, refreshed: false, stale: true },
      };
    }

    try {
      const fresh = await this.fetcher.refresh(projectId);
      return {
        context: fresh,
        status: { fetchedAt: fresh.fetchedAt, refreshed: true, stale: false },
      };
    } catch (error) {
      if (!(error instanceof FetchError)) throw error;
      if (!cached) throw new NoContextError(projectId, error);

      logger.warn(`Using stale context for ${projectId}: ${error.message}`);
      return {
        context: cached,
        status: {
          fetchedAt: cached.fetchedAt,
          refreshed: false,
          stale: true,
          refreshError: error.message,
        },
      };
    }
  }
}
