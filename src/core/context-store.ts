import type { ProjectContext } from './types.js';

function freezeSnapshot(context: ProjectContext): ProjectContext {
  const snapshot: ProjectContext = {
    projectId: context.projectId,
    labels: context.labels.map((l) => ({ ...l })),
    members: context.members.map((m) => ({ ...m })),
    milestones: context.milestones.map((m) => ({ ...m })),
    fetchedAt: context.fetchedAt,
  };

  for (const list of [snapshot.labels, snapshot.members, snapshot.milestones]) {
    for (const entry of list) Object.freeze(entry);
    Object.freeze(list);
  }

  return Object.freeze(snapshot);
}

/**
 * Last-fetched metadata snapshot per project.
 *
 * Entries are deep-frozen copies and are only ever swapped whole, so a reader
 * holding a snapshot never sees it change underneath it.
 */
export class ContextStore {
  private readonly entries = new Map<string, ProjectContext>();

  get(projectId: string): ProjectContext | undefined {
    return this.entries.get(projectId);
  }

  put(projectId: string, context: ProjectContext): void {
    if (context.projectId !== projectId) {
      throw new Error(
        `Context for project ${context.projectId} cannot be stored under ${projectId}`,
      );
    }
    this.entries.set(projectId, freezeSnapshot(context));
  }

  invalidate(projectId: string): void {
    this.entries.delete(projectId);
  }

  isStale(projectId: string, maxAgeMs: number, now: number = Date.now()): boolean {
    const context = this.entries.get(projectId);
    if (!context) return true;

    const fetchedAt = Date.parse(context.fetchedAt);
    if (Number.isNaN(fetchedAt)) return true;

    return now - fetchedAt > maxAgeMs;
  }
}
