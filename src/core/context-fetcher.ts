import { FetchError } from '../utils/errors.js';
import type { FetchFailure } from '../utils/errors.js';
import { logger } from '../ui/logger.js';
import type { ContextStore } from './context-store.js';
import type { TrackerClient } from './tracker-client.js';
import type { ProjectContext } from './types.js';

export interface ContextFetcherOptions {
  /** Called after a fresh snapshot has been stored. */
  onRefreshed?: (context: ProjectContext) => Promise<void> | void;
  now?: () => Date;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Pulls labels, members and milestones for a project and commits them to the
 * store as one snapshot. Concurrent refreshes of the same project share a
 * single request; different projects never wait on each other.
 */
export class ContextFetcher {
  private readonly inFlight = new Map<string, Promise<ProjectContext>>();

  constructor(
    private readonly tracker: TrackerClient,
    private readonly store: ContextStore,
    private readonly options: ContextFetcherOptions = {},
  ) {}

  refresh(projectId: string): Promise<ProjectContext> {
    const pending = this.inFlight.get(projectId);
    if (pending) {
      logger.debug(`Joining in-flight context refresh for ${projectId}`);
      return pending;
    }

    const request = this.fetchSnapshot(projectId).finally(() => {
      this.inFlight.delete(projectId);
    });
    this.inFlight.set(projectId, request);
    return request;
  }

  isRefreshing(projectId: string): boolean {
    return this.inFlight.has(projectId);
  }

  private async fetchSnapshot(projectId: string): Promise<ProjectContext> {
    logger.debug(`Fetching context for ${projectId}`);

    const [labels, members, milestones] = await Promise.allSettled([
      this.tracker.listLabels(projectId),
      this.tracker.listMembers(projectId),
      this.tracker.listMilestones(projectId),
    ]);

    const failures: FetchFailure[] = [];
    if (labels.status === 'rejected') {
      failures.push({ part: 'labels', message: describeError(labels.reason) });
    }
    if (members.status === 'rejected') {
      failures.push({ part: 'members', message: describeError(members.reason) });
    }
    if (milestones.status === 'rejected') {
      failures.push({ part: 'milestones', message: describeError(milestones.reason) });
    }

    if (
      labels.status === 'rejected' ||
      members.status === 'rejected' ||
      milestones.status === 'rejected'
    ) {
      throw new FetchError(projectId, failures);
    }

    const now = this.options.now?.() ?? new Date();
    const context: ProjectContext = {
      projectId,
      labels: labels.value,
      members: members.value,
      milestones: milestones.value,
      fetchedAt: now.toISOString(),
    };

    this.store.put(projectId, context);
    const stored = this.store.get(projectId) ?? context;
    if (this.options.onRefreshed) {
      try {
        await this.options.onRefreshed(stored);
      } catch (error) {
        logger.warn(`Context for ${projectId} refreshed but not saved: ${describeError(error)}`);
      }
    }
    return stored;
  }
}
