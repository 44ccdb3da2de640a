import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { MockInstance } from 'vitest';

import { authStatusCommand } from '../../src/commands/auth.js';
import { contextClearCommand, contextShowCommand } from '../../src/commands/context.js';
import {
  projectCurrentCommand,
  projectListCommand,
  projectUseCommand,
} from '../../src/commands/project.js';
import { queryCommand } from '../../src/commands/query.js';
import type { ConfigLocation } from '../../src/core/config.js';
import type { ToolInvoker } from '../../src/core/tool-invoker.js';
import { logger } from '../../src/ui/logger.js';
import { ConfigError, TrackerRequestError } from '../../src/utils/errors.js';
import { createFakeAccount, createFakeTracker, issue } from '../unit/helpers/fixtures.js';

vi.mock('../../src/ui/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    dim: vi.fn(),
    hint: vi.fn(),
  },
}));

vi.mock('../../src/ui/spinner.js', () => ({
  withSpinner: vi.fn(<T>(_text: string, fn: () => Promise<T>) => fn()),
}));

describe('query flow', () => {
  let dir: string;
  let location: ConfigLocation;
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), 'issuescout-flow-'));
    location = { dir, env: {} };
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    logSpy.mockRestore();
    await rm(dir, { recursive: true, force: true });
  });

  function lastOutput(): string {
    const [output] = logSpy.mock.calls[logSpy.mock.calls.length - 1];
    return String(output);
  }

  it('should answer a query, save the context and reuse it on the next run', async () => {
    const tracker = createFakeTracker();
    const invoker: ToolInvoker = {
      invoke: vi.fn<ToolInvoker['invoke']>().mockResolvedValue([issue(21, { labels: ['bug'] })]),
    };
    await projectUseCommand('acme/web', location);

    const first = await queryCommand('bugs assigned to alice', { json: true }, location, {
      tracker,
      invoker,
    });

    expect(first.satisfiedBy).toBe('assignee=alice labels=bug state=opened');
    expect(first.context?.refreshed).toBe(true);
    expect(JSON.parse(lastOutput())).toMatchObject({
      projectId: 'acme/web',
      items: [{ record: { id: 21 }, strategies: ['assignee=alice labels=bug state=opened'] }],
    });

    const second = await queryCommand('feature work for bob', { json: true }, location, {
      tracker,
      invoker,
    });

    expect(tracker.listLabels).toHaveBeenCalledTimes(1);
    expect(second.context?.refreshed).toBe(false);
    expect(second.satisfiedBy).toBe('assignee=bob labels=feature state=opened');
  });

  it('should show and clear the saved context', async () => {
    const tracker = createFakeTracker();
    const invoker: ToolInvoker = { invoke: vi.fn<ToolInvoker['invoke']>().mockResolvedValue([]) };
    await queryCommand('open bugs', { project: 'acme/web', json: true }, location, {
      tracker,
      invoker,
    });

    const shown = await contextShowCommand('acme/web', location);
    expect(shown?.labels.map((l) => l.name)).toEqual(['bug', 'feature']);
    expect(logSpy).toHaveBeenLastCalledWith(
      expect.stringContaining('## Project Context for acme/web'),
    );

    await contextClearCommand('acme/web', location);
    expect(await contextShowCommand('acme/web', location)).toBeNull();
  });

  it('should query the --project override rather than the default project', async () => {
    const tracker = createFakeTracker();
    const invoke = vi.fn<ToolInvoker['invoke']>().mockResolvedValue([]);
    await projectUseCommand('acme/web', location);

    const response = await queryCommand(
      'open bugs',
      { project: 'acme/api', json: true },
      location,
      { tracker, invoker: { invoke } },
    );

    expect(response.projectId).toBe('acme/api');
    expect(tracker.listLabels).toHaveBeenCalledWith('acme/api');
    expect(await projectCurrentCommand(location)).toBe('acme/web');
  });

  it('should require a project when none is configured', async () => {
    await expect(
      queryCommand('open bugs', { json: true }, location, { tracker: createFakeTracker() }),
    ).rejects.toBeInstanceOf(ConfigError);
  });

  it('should list projects with the search and membership filters', async () => {
    const account = createFakeAccount();

    const projects = await projectListCommand({ search: 'web', mine: true }, location, account);

    expect(projects.map((p) => p.pathWithNamespace)).toEqual(['acme/web']);
    expect(account.listProjects).toHaveBeenCalledWith({ search: 'web', mine: true });
    expect(logger.info).toHaveBeenCalledWith('web (ID: 42, Path: acme/web)');
  });

  it('should say so when no project matches', async () => {
    const account = createFakeAccount();
    account.listProjects.mockResolvedValue([]);

    expect(await projectListCommand({ search: 'nothing' }, location, account)).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith('No projects found.');
  });

  it('should report who the token belongs to', async () => {
    const account = createFakeAccount();

    const user = await authStatusCommand(location, account);

    expect(user.username).toBe('alice');
    expect(logger.success).toHaveBeenCalledWith('Authenticated as alice on https://gitlab.com');
  });

  it('should fail auth status when the tracker rejects the token', async () => {
    const account = createFakeAccount();
    account.currentUser.mockRejectedValue(
      new TrackerRequestError('GitLab rejected the access token (401).', 401),
    );

    await expect(authStatusCommand(location, account)).rejects.toBeInstanceOf(
      TrackerRequestError,
    );
    expect(logger.success).not.toHaveBeenCalled();
  });

  it('should require a token to check auth status', async () => {
    await expect(authStatusCommand(location)).rejects.toBeInstanceOf(ConfigError);
  });
});
