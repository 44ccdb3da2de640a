import type { IssueRecord, IssueState, Label, Member, Milestone } from './types.js';

/** Metadata endpoints the context fetcher depends on. */
export interface TrackerClient {
  listLabels(projectId: string): Promise<Label[]>;
  listMembers(projectId: string): Promise<Member[]>;
  listMilestones(projectId: string): Promise<Milestone[]>;
}

export interface IssueSearchParams {
  projectId: string;
  state?: IssueState | 'all';
  labels?: string[];
  assigneeUsername?: string;
  milestone?: string;
  limit: number;
}

export interface IssueSearchClient {
  searchIssues(params: IssueSearchParams): Promise<IssueRecord[]>;
}

export interface ProjectSummary {
  id: number;
  name: string;
  pathWithNamespace: string;
  webUrl: string | null;
}

export interface ProjectListOptions {
  search?: string;
  /** Only projects the token's user is a member of. */
  mine?: boolean;
  limit?: number;
}

export interface TrackerUser {
  username: string;
  name: string | null;
}

/** Account-level lookups behind `project list` and `auth status`. */
export interface AccountClient {
  listProjects(options?: ProjectListOptions): Promise<ProjectSummary[]>;
  currentUser(): Promise<TrackerUser>;
}

export const DEFAULT_ISSUE_LIMIT = 20;
export const MAX_ISSUE_LIMIT = 50;

export function clampIssueLimit(limit: number | undefined): number {
  if (limit === undefined || !Number.isFinite(limit)) return DEFAULT_ISSUE_LIMIT;
  return Math.min(MAX_ISSUE_LIMIT, Math.max(1, Math.trunc(limit)));
}
