import type { Mock } from 'vitest';

import { createQuery } from '../../src/core/orchestrator.js';
import { fallbackStrategy, plan } from '../../src/core/query-planner.js';
import { StrategyExecutor, isSufficient } from '../../src/core/strategy-executor.js';
import type { ToolInvoker } from '../../src/core/tool-invoker.js';
import type { SearchStrategy } from '../../src/core/types.js';
import { logger } from '../../src/ui/logger.js';
import { AllStrategiesFailedError, ToolInvocationError } from '../../src/utils/errors.js';
import { issue, makeContext } from './helpers/fixtures.js';

vi.mock('../../src/ui/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
}));

const target = { projectId: 'acme/web', queryText: 'bugs assigned to alice' };

function planned(): SearchStrategy[] {
  return plan(createQuery('bugs assigned to alice', 'acme/web'), makeContext());
}

function labelsStrategy(name: string): SearchStrategy {
  return {
    name: `labels=${name} state=opened`,
    filters: { state: 'opened', labels: [name] },
    dimensions: ['labels'],
    matchCount: 1,
  };
}

describe('StrategyExecutor', () => {
  let invoke: Mock<ToolInvoker['invoke']>;
  let executor: StrategyExecutor;

  beforeEach(() => {
    vi.clearAllMocks();
    invoke = vi.fn<ToolInvoker['invoke']>();
    executor = new StrategyExecutor({ invoke });
  });

  it('should stop after the first sufficient result', async () => {
    invoke.mockResolvedValue([issue(1)]);

    const response = await executor.execute(planned(), target);

    expect(invoke).toHaveBeenCalledTimes(1);
    expect(invoke).toHaveBeenCalledWith('list_issues', {
      project_id: 'acme/web',
      state: 'opened',
      limit: 20,
      labels: 'bug',
      assignee_username: 'alice',
    });
    expect(response.satisfiedBy).toBe('assignee=alice labels=bug state=opened');
    expect(response.items).toEqual([
      { record: issue(1), strategies: ['assignee=alice labels=bug state=opened'] },
    ]);
    expect(response.attempts).toEqual([
      { strategy: 'assignee=alice labels=bug state=opened', status: 'sufficient', recordCount: 1 },
    ]);
  });

  it('should move on while results come back empty', async () => {
    invoke.mockResolvedValueOnce([]).mockResolvedValueOnce([issue(2)]);

    const response = await executor.execute(planned(), target);

    expect(invoke).toHaveBeenCalledTimes(2);
    expect(response.satisfiedBy).toBe('assignee=alice state=opened');
    expect(response.attempts.map((a) => a.status)).toEqual(['insufficient', 'sufficient']);
  });

  it('should return an empty response when no strategy finds anything', async () => {
    invoke.mockResolvedValue([]);

    const response = await executor.execute(planned(), target);

    expect(invoke).toHaveBeenCalledTimes(3);
    expect(response.items).toEqual([]);
    expect(response.satisfiedBy).toBeNull();
  });

  it('should put the satisfying records first and merge earlier partial results', async () => {
    const strategies = [fallbackStrategy(), labelsStrategy('bug')];
    invoke
      .mockResolvedValueOnce([issue(1), issue(2)])
      .mockResolvedValueOnce([issue(2), issue(3)]);

    const response = await executor.execute(strategies, target);

    expect(response.items.map((item) => item.record.id)).toEqual([2, 3, 1]);
    expect(response.items[0].strategies).toEqual(['labels=bug state=opened', 'state=opened']);
    expect(response.attempts[0]).toEqual({
      strategy: 'state=opened',
      status: 'insufficient',
      recordCount: 2,
    });
  });

  it('should record a failed strategy and continue with the next one', async () => {
    invoke
      .mockRejectedValueOnce(new ToolInvocationError('list_issues', 'timeout'))
      .mockResolvedValueOnce([issue(5)]);

    const response = await executor.execute(planned(), target);

    expect(response.satisfiedBy).toBe('assignee=alice state=opened');
    expect(response.attempts[0]).toEqual({
      strategy: 'assignee=alice labels=bug state=opened',
      status: 'failed',
      recordCount: 0,
      error: 'Tool list_issues failed: timeout',
    });
    expect(logger.warn).toHaveBeenCalledWith(
      'Strategy "assignee=alice labels=bug state=opened" failed: Tool list_issues failed: timeout',
    );
  });

  it('should not raise when some strategies fail and the rest find nothing', async () => {
    invoke.mockRejectedValueOnce(new Error('boom')).mockResolvedValue([]);

    const response = await executor.execute(planned(), target);

    expect(response.items).toEqual([]);
    expect(response.attempts.map((a) => a.status)).toEqual([
      'failed',
      'insufficient',
      'insufficient',
    ]);
  });

  it('should raise AllStrategiesFailedError when every strategy fails', async () => {
    invoke.mockRejectedValue(new Error('connection refused'));

    const error = await executor.execute(planned(), target).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AllStrategiesFailedError);
    if (!(error instanceof AllStrategiesFailedError)) return;
    expect(error.kind).toBe('all-strategies-failed');
    expect(error.failures).toHaveLength(3);
    expect(error.failures[2]).toEqual({
      strategy: 'labels=bug state=opened',
      message: 'connection refused',
    });
  });

  it('should never run two invocations at once', async () => {
    let active = 0;
    let peak = 0;
    invoke.mockImplementation(async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      active -= 1;
      return [];
    });

    await executor.execute(planned(), target);

    expect(peak).toBe(1);
  });

  it('should pass the configured tool name and clamp the result limit', async () => {
    const custom = new StrategyExecutor({ invoke }, { toolName: 'search_issues', resultLimit: 80 });
    invoke.mockResolvedValue([issue(1)]);

    await custom.execute([labelsStrategy('bug')], target);

    expect(invoke).toHaveBeenCalledWith('search_issues', {
      project_id: 'acme/web',
      state: 'opened',
      limit: 50,
      labels: 'bug',
    });
  });

  it('should flag results that filled the result limit', async () => {
    const small = new StrategyExecutor({ invoke }, { resultLimit: 2 });
    invoke.mockResolvedValueOnce([issue(1)]).mockResolvedValueOnce([issue(2), issue(3)]);

    const response = await small.execute([fallbackStrategy(), labelsStrategy('bug')], target);

    expect(response.attempts).toEqual([
      { strategy: 'state=opened', status: 'insufficient', recordCount: 1 },
      {
        strategy: 'labels=bug state=opened',
        status: 'sufficient',
        recordCount: 2,
        limitReached: true,
      },
    ]);
    expect(response.attempts[0]).not.toHaveProperty('limitReached');
  });
});

describe('isSufficient', () => {
  it('should accept a state-only result only when it was the sole strategy', () => {
    expect(isSufficient(fallbackStrategy(), [issue(1)], 1)).toBe(true);
    expect(isSufficient(fallbackStrategy(), [issue(1)], 2)).toBe(false);
    expect(isSufficient(labelsStrategy('bug'), [], 1)).toBe(false);
  });
});
