import { z } from 'zod';

import { TrackerRequestError } from '../utils/errors.js';
import type {
  AccountClient,
  IssueSearchClient,
  IssueSearchParams,
  ProjectListOptions,
  ProjectSummary,
  TrackerClient,
  TrackerUser,
} from './tracker-client.js';
import { clampIssueLimit } from './tracker-client.js';
import type { IssueRecord, Label, Member, Milestone } from './types.js';

const LabelSchema = z.object({
  name: z.string(),
  description: z.string().nullish(),
  open_issues_count: z.number().nullish(),
});

const MemberSchema = z.object({
  username: z.string(),
  name: z.string().nullish(),
  access_level: z.number().nullish(),
});

const MilestoneSchema = z.object({
  title: z.string(),
  state: z.string(),
  due_date: z.string().nullish(),
});

const ProjectSchema = z.object({
  id: z.number(),
  name: z.string(),
  path_with_namespace: z.string(),
  web_url: z.string().nullish(),
});

const UserSchema = z.object({
  username: z.string(),
  name: z.string().nullish(),
});

const UserRefSchema = z.object({ username: z.string() });

export const IssueSchema = z.object({
  id: z.number(),
  iid: z.number(),
  title: z.string(),
  state: z.string(),
  assignees: z.array(UserRefSchema).nullish(),
  assignee: UserRefSchema.nullish(),
  labels: z.array(z.string()).nullish(),
  milestone: z.object({ title: z.string() }).nullish(),
  author: UserRefSchema.nullish(),
  web_url: z.string().nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
});

export type GitLabIssue = z.infer<typeof IssueSchema>;

const ACCESS_LEVEL_ROLES: Record<number, string> = {
  10: 'Guest',
  20: 'Reporter',
  30: 'Developer',
  40: 'Maintainer',
  50: 'Owner',
};

export function accessLevelToRole(level: number): string {
  return ACCESS_LEVEL_ROLES[level] ?? `Level ${level}`;
}

export function toIssueRecord(issue: GitLabIssue): IssueRecord {
  const assignees = issue.assignees?.map((a) => a.username) ?? [];
  if (assignees.length === 0 && issue.assignee) {
    assignees.push(issue.assignee.username);
  }

  return {
    id: issue.id,
    iid: issue.iid,
    title: issue.title,
    state: issue.state,
    assignees,
    labels: issue.labels ?? [],
    milestone: issue.milestone?.title ?? null,
    author: issue.author?.username ?? null,
    webUrl: issue.web_url ?? null,
    createdAt: issue.created_at ?? null,
    updatedAt: issue.updated_at ?? null,
  };
}

const PAGE_SIZE = 100;
const DEFAULT_PROJECT_LIST_LIMIT = 20;

function parseNextPage(header: string | null): number | null {
  if (!header) return null;
  const page = Number.parseInt(header, 10);
  return Number.isInteger(page) && page > 0 ? page : null;
}

export interface GitLabClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
}

/** GitLab REST v4 client covering project metadata, issue search and account lookups. */
export class GitLabClient implements TrackerClient, IssueSearchClient, AccountClient {
  private readonly baseUrl: string;
  private readonly token: string;
  private readonly timeoutMs: number;

  constructor(options: GitLabClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  async listLabels(projectId: string): Promise<Label[]> {
    const labels = await this.getAllPages(this.projectPath(projectId, 'labels'), LabelSchema);
    return labels.map((l) => ({
      name: l.name,
      description: l.description ?? null,
      openIssueCount: l.open_issues_count ?? null,
    }));
  }

  async listMembers(projectId: string): Promise<Member[]> {
    const members = await this.getAllPages(
      this.projectPath(projectId, 'members/all'),
      MemberSchema,
    );
    return members.map((m) => ({
      username: m.username,
      role: m.access_level == null ? null : accessLevelToRole(m.access_level),
      displayName: m.name ?? null,
    }));
  }

  async listMilestones(projectId: string): Promise<Milestone[]> {
    const milestones = await this.getAllPages(
      this.projectPath(projectId, 'milestones'),
      MilestoneSchema,
    );
    return milestones.map((m) => ({
      title: m.title,
      dueDate: m.due_date ?? null,
      state: m.state,
    }));
  }

  /** Projects visible to the token, optionally filtered by name or membership. */
  async listProjects(options: ProjectListOptions = {}): Promise<ProjectSummary[]> {
    const query: Record<string, string> = {
      simple: 'true',
      per_page: String(options.limit ?? DEFAULT_PROJECT_LIST_LIMIT),
    };
    if (options.search) query.search = options.search;
    if (options.mine) query.membership = 'true';

    const { data } = await this.get('/api/v4/projects', z.array(ProjectSchema), query);
    return data.map((p) => ({
      id: p.id,
      name: p.name,
      pathWithNamespace: p.path_with_namespace,
      webUrl: p.web_url ?? null,
    }));
  }

  /** The user the access token belongs to. */
  async currentUser(): Promise<TrackerUser> {
    const { data } = await this.get('/api/v4/user', UserSchema, {});
    return { username: data.username, name: data.name ?? null };
  }

  async searchIssues(params: IssueSearchParams): Promise<IssueRecord[]> {
    const query: Record<string, string> = {
      per_page: String(clampIssueLimit(params.limit)),
    };
    if (params.state) query.state = params.state;
    if (params.labels && params.labels.length > 0) query.labels = params.labels.join(',');
    if (params.assigneeUsername) query.assignee_username = params.assigneeUsername;
    if (params.milestone) query.milestone = params.milestone;

    const { data: issues } = await this.get(
      this.projectPath(params.projectId, 'issues'),
      z.array(IssueSchema),
      query,
    );
    return issues.map(toIssueRecord);
  }

  private projectPath(projectId: string, resource: string): string {
    return `/api/v4/projects/${encodeURIComponent(projectId)}/${resource}`;
  }

  /**
   * Follows `x-next-page` until GitLab reports no further page. A failure on
   * any page fails the whole listing.
   */
  private async getAllPages<T>(
    path: string,
    itemSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T[]> {
    const items: T[] = [];
    let page = 1;

    while (true) {
      const { data, nextPage } = await this.get(path, z.array(itemSchema), {
        per_page: String(PAGE_SIZE),
        page: String(page),
      });
      items.push(...data);

      if (nextPage === null || nextPage <= page) return items;
      page = nextPage;
    }
  }

  private async get<T>(
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    query: Record<string, string>,
  ): Promise<{ data: T; nextPage: number | null }> {
    const url = new URL(this.baseUrl + path);
    for (const [key, value] of Object.entries(query)) {
      url.searchParams.set(key, value);
    }

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { 'PRIVATE-TOKEN': this.token, Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TrackerRequestError(
        `Could not reach ${this.baseUrl} (${reason})`,
        undefined,
        { cause: error },
      );
    }

    if (response.status === 401 || response.status === 403) {
      throw new TrackerRequestError(
        `GitLab rejected the access token (${response.status}). Check apiToken in your config.`,
        response.status,
      );
    }

    if (!response.ok) {
      throw new TrackerRequestError(
        `GitLab API returned ${response.status}: ${response.statusText}`,
        response.status,
      );
    }

    const raw: unknown = await response.json();
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new TrackerRequestError(`Unexpected GitLab API response: ${parsed.error.message}`);
    }

    return { data: parsed.data, nextPage: parseNextPage(response.headers.get('x-next-page')) };
  }
}
