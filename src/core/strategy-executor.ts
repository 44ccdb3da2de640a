import { AllStrategiesFailedError } from '../utils/errors.js';
import type { StrategyFailure } from '../utils/errors.js';
import { logger } from '../ui/logger.js';
import { aggregate } from './response-aggregator.js';
import type { ToolInvoker } from './tool-invoker.js';
import { SEARCH_TOOL_NAME, toSearchArgs } from './tool-invoker.js';
import { DEFAULT_ISSUE_LIMIT, clampIssueLimit } from './tracker-client.js';
import type {
  AggregatedResponse,
  IssueRecord,
  SearchStrategy,
  StrategyAttempt,
  ToolResult,
} from './types.js';

export interface StrategyExecutorOptions {
  toolName?: string;
  resultLimit?: number;
}

export interface ExecutionTarget {
  projectId: string;
  queryText: string;
}

/**
 * A result is sufficient when it found something using at least one filter
 * beyond state. A bare state filter only counts when nothing else was planned.
 */
export function isSufficient(
  strategy: SearchStrategy,
  records: readonly IssueRecord[],
  strategyCount: number,
): boolean {
  if (records.length === 0) return false;
  return strategy.dimensions.length > 0 || strategyCount === 1;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Tries strategies one at a time, in rank order, and stops at the first
 * sufficient result. Later strategies depend on earlier ones having come up
 * short, so invocations are never run in parallel.
 */
export class StrategyExecutor {
  private readonly toolName: string;
  private readonly resultLimit: number;

  constructor(
    private readonly invoker: ToolInvoker,
    options: StrategyExecutorOptions = {},
  ) {
    this.toolName = options.toolName ?? SEARCH_TOOL_NAME;
    this.resultLimit = clampIssueLimit(options.resultLimit ?? DEFAULT_ISSUE_LIMIT);
  }

  async execute(
    strategies: readonly SearchStrategy[],
    target: ExecutionTarget,
  ): Promise<AggregatedResponse> {
    const attempts: StrategyAttempt[] = [];
    const failures: StrategyFailure[] = [];
    const supplementary: ToolResult[] = [];
    let satisfied: ToolResult | null = null;

    for (const strategy of strategies) {
      const args = toSearchArgs(strategy, target.projectId, this.resultLimit);
      logger.debug(`Trying strategy "${strategy.name}"`);

      let records: IssueRecord[];
      try {
        records = await this.invoker.invoke(this.toolName, args);
      } catch (error) {
        const message = describeError(error);
        logger.warn(`Strategy "${strategy.name}" failed: ${message}`);
        failures.push({ strategy: strategy.name, message });
        attempts.push({
          strategy: strategy.name,
          status: 'failed',
          recordCount: 0,
          error: message,
        });
        continue;
      }

      const result: ToolResult = {
        strategy,
        records,
        sufficient: isSufficient(strategy, records, strategies.length),
      };
      const attempt: StrategyAttempt = {
        strategy: strategy.name,
        status: result.sufficient ? 'sufficient' : 'insufficient',
        recordCount: records.length,
      };
      // A full page means the tracker may hold more matches than were returned.
      if (records.length >= this.resultLimit) attempt.limitReached = true;
      attempts.push(attempt);

      if (result.sufficient) {
        satisfied = result;
        break;
      }
      supplementary.push(result);
    }

    if (failures.length > 0 && failures.length === attempts.length) {
      throw new AllStrategiesFailedError(failures);
    }

    const ordered = satisfied ? [satisfied, ...supplementary] : supplementary;
    return {
      projectId: target.projectId,
      query: target.queryText,
      items: aggregate(ordered),
      satisfiedBy: satisfied?.strategy.name ?? null,
      attempts,
    };
  }
}
