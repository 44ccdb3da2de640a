export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class TrackerRequestError extends Error {
  readonly status: number | undefined;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TrackerRequestError';
    this.status = status;
  }
}

export interface FetchFailure {
  part: 'labels' | 'members' | 'milestones';
  message: string;
}

export class FetchError extends Error {
  readonly projectId: string;
  readonly failures: FetchFailure[];

  constructor(projectId: string, failures: FetchFailure[]) {
    const detail = failures.map((f) => `${f.part}: ${f.message}`).join('; ');
    super(`Failed to fetch context for project ${projectId} (${detail})`);
    this.name = 'FetchError';
    this.projectId = projectId;
    this.failures = failures;
  }
}

export class ToolInvocationError extends Error {
  readonly toolName: string;

  constructor(toolName: string, message: string, options?: { cause?: unknown }) {
    super(`Tool ${toolName} failed: ${message}`, options);
    this.name = 'ToolInvocationError';
    this.toolName = toolName;
  }
}

export type OrchestrationErrorKind = 'all-strategies-failed' | 'no-context' | 'invalid-query';

export class OrchestrationError extends Error {
  readonly kind: OrchestrationErrorKind;
  readonly suggestion: string | undefined;

  constructor(
    kind: OrchestrationErrorKind,
    message: string,
    options?: { suggestion?: string; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'OrchestrationError';
    this.kind = kind;
    this.suggestion = options?.suggestion;
  }
}

const REFRESH_SUGGESTION = 'Run `issuescout context refresh` to fetch the project context.';

export interface StrategyFailure {
  strategy: string;
  message: string;
}

export class AllStrategiesFailedError extends OrchestrationError {
  readonly failures: StrategyFailure[];

  constructor(failures: StrategyFailure[]) {
    const detail = failures.map((f) => `  - ${f.strategy}: ${f.message}`).join('\n');
    super('all-strategies-failed', `All ${failures.length} search strategies failed:\n${detail}`, {
      suggestion: 'Check the tracker connection, then run `issuescout context refresh`.',
    });
    this.name = 'AllStrategiesFailedError';
    this.failures = failures;
  }
}

export class NoContextError extends OrchestrationError {
  readonly projectId: string;

  constructor(projectId: string, cause?: unknown) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super('no-context', `No project context available for ${projectId}${reason}`, {
      suggestion: REFRESH_SUGGESTION,
      cause,
    });
    this.name = 'NoContextError';
    this.projectId = projectId;
  }
}
