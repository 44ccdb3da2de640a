import { z } from 'zod';

import { ToolInvocationError } from '../utils/errors.js';
import type { IssueSearchClient } from './tracker-client.js';
import { clampIssueLimit } from './tracker-client.js';
import type { IssueRecord, SearchStrategy } from './types.js';

export type ToolArgs = Record<string, unknown>;

/** Runs a named tracker tool and returns the issues it produced. */
export interface ToolInvoker {
  invoke(toolName: string, args: ToolArgs): Promise<IssueRecord[]>;
}

export const SEARCH_TOOL_NAME = 'list_issues';

const SearchToolArgsSchema = z.object({
  project_id: z.string().min(1),
  state: z.enum(['opened', 'closed', 'all']).optional(),
  labels: z.string().optional(),
  assignee_username: z.string().optional(),
  milestone: z.string().optional(),
  limit: z.number().int().optional(),
});

export type SearchToolArgs = z.infer<typeof SearchToolArgsSchema>;

/** Translates a strategy into the tracker's native issue-search parameters. */
export function toSearchArgs(
  strategy: SearchStrategy,
  projectId: string,
  limit?: number,
): SearchToolArgs {
  const { assignee, labels, milestone, state } = strategy.filters;
  const args: SearchToolArgs = {
    project_id: projectId,
    state,
    limit: clampIssueLimit(limit),
  };
  if (labels && labels.length > 0) args.labels = labels.join(',');
  if (assignee) args.assignee_username = assignee;
  if (milestone) args.milestone = milestone;
  return args;
}

/** Serves the issue-search tool straight from the tracker's REST API. */
export class RestToolInvoker implements ToolInvoker {
  constructor(
    private readonly client: IssueSearchClient,
    private readonly toolName: string = SEARCH_TOOL_NAME,
  ) {}

  async invoke(toolName: string, args: ToolArgs): Promise<IssueRecord[]> {
    if (toolName !== this.toolName) {
      throw new ToolInvocationError(toolName, 'unknown tool');
    }

    const parsed = SearchToolArgsSchema.safeParse(args);
    if (!parsed.success) {
      throw new ToolInvocationError(toolName, `invalid arguments: ${parsed.error.message}`);
    }

    const { project_id, state, labels, assignee_username, milestone, limit } = parsed.data;
    try {
      return await this.client.searchIssues({
        projectId: project_id,
        state,
        labels: labels ? labels.split(',') : undefined,
        assigneeUsername: assignee_username,
        milestone,
        limit: clampIssueLimit(limit),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ToolInvocationError(toolName, message, { cause: error });
    }
  }
}
