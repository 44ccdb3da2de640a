import type { AccountClient, TrackerClient } from '../../../src/core/tracker-client.js';
import type {
  IssueRecord,
  Label,
  Member,
  Milestone,
  ProjectContext,
} from '../../../src/core/types.js';

export function label(name: string, description: string | null = null): Label {
  return { name, description, openIssueCount: null };
}

export function member(username: string, displayName: string | null = null): Member {
  return { username, role: 'Developer', displayName };
}

export function milestone(title: string, state = 'active'): Milestone {
  return { title, dueDate: null, state };
}

export function makeContext(overrides: Partial<ProjectContext> = {}): ProjectContext {
  return {
    projectId: 'acme/web',
    labels: [label('bug'), label('feature')],
    members: [member('alice'), member('bob')],
    milestones: [],
    fetchedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

export function issue(id: number, overrides: Partial<IssueRecord> = {}): IssueRecord {
  return {
    id,
    iid: id,
    title: `Issue ${id}`,
    state: 'opened',
    assignees: [],
    labels: [],
    milestone: null,
    author: null,
    webUrl: null,
    createdAt: null,
    updatedAt: null,
    ...overrides,
  };
}

export function createFakeTracker(context: ProjectContext = makeContext()) {
  return {
    listLabels: vi.fn<TrackerClient['listLabels']>().mockResolvedValue(context.labels),
    listMembers: vi.fn<TrackerClient['listMembers']>().mockResolvedValue(context.members),
    listMilestones: vi.fn<TrackerClient['listMilestones']>().mockResolvedValue(context.milestones),
  };
}

export function createFakeAccount() {
  return {
    listProjects: vi.fn<AccountClient['listProjects']>().mockResolvedValue([
      { id: 42, name: 'web', pathWithNamespace: 'acme/web', webUrl: null },
    ]),
    currentUser: vi
      .fn<AccountClient['currentUser']>()
      .mockResolvedValue({ username: 'alice', name: 'Alice Adams' }),
  };
}
