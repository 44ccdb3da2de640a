export interface Label {
  name: string;
  description: string | null;
  openIssueCount: number | null;
}

export interface Member {
  username: string;
  role: string | null;
  displayName: string | null;
}

export interface Milestone {
  title: string;
  dueDate: string | null;
  state: string;
}

/**
 * Cached metadata for one project. Snapshots are replaced whole and
 * never mutated once handed out by the store.
 */
export interface ProjectContext {
  projectId: string;
  labels: Label[];
  members: Member[];
  milestones: Milestone[];
  /** ISO-8601 timestamp of the fetch that produced this snapshot. */
  fetchedAt: string;
}

export interface Query {
  readonly text: string;
  readonly projectId: string;
  readonly projectOverride?: string;
}

export type IssueState = 'opened' | 'closed';

/** Dimensions beyond the implicit state filter. */
export type FilterDimension = 'assignee' | 'labels' | 'milestone';

export interface StrategyFilters {
  assignee?: string;
  labels?: string[];
  milestone?: string;
  state: IssueState;
}

export interface SearchStrategy {
  name: string;
  filters: StrategyFilters;
  dimensions: FilterDimension[];
  /** Number of context entities this strategy filters on. */
  matchCount: number;
}

export interface IssueRecord {
  id: number;
  iid: number;
  title: string;
  state: string;
  assignees: string[];
  labels: string[];
  milestone: string | null;
  author: string | null;
  webUrl: string | null;
  createdAt: string | null;
  updatedAt: string | null;
}

export interface ToolResult {
  strategy: SearchStrategy;
  records: IssueRecord[];
  sufficient: boolean;
}

export type AttemptStatus = 'sufficient' | 'insufficient' | 'failed';

export interface StrategyAttempt {
  strategy: string;
  status: AttemptStatus;
  recordCount: number;
  error?: string;
  /** Set when the result filled the requested limit. */
  limitReached?: boolean;
}

export interface AggregatedItem {
  record: IssueRecord;
  /** Names of the strategies that surfaced this record, first-seen order. */
  strategies: string[];
}

export interface ContextStatus {
  fetchedAt: string;
  refreshed: boolean;
  stale: boolean;
  refreshError?: string;
}

export interface AggregatedResponse {
  projectId: string;
  query: string;
  items: AggregatedItem[];
  /** Strategy whose result was sufficient, or null when results are partial. */
  satisfiedBy: string | null;
  attempts: StrategyAttempt[];
  context?: ContextStatus;
}
