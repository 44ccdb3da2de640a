import chalk from 'chalk';

import type { AggregatedItem, AggregatedResponse, StrategyAttempt } from '../core/types.js';

function formatItem(item: AggregatedItem): string[] {
  const { record } = item;
  const state = record.state === 'opened' ? chalk.green(record.state) : chalk.magenta(record.state);
  const assignees = record.assignees.length > 0 ? record.assignees.join(', ') : 'unassigned';

  const lines = [
    `${chalk.bold(`#${record.iid}`)} ${record.title} ${chalk.dim('[')}${state}${chalk.dim(']')}`,
  ];
  const meta = [`assignee: ${assignees}`];
  if (record.labels.length > 0) meta.push(`labels: ${record.labels.join(', ')}`);
  if (record.milestone) meta.push(`milestone: ${record.milestone}`);
  lines.push(chalk.dim(`    ${meta.join('  ·  ')}`));
  if (record.webUrl) lines.push(chalk.dim(`    ${record.webUrl}`));
  return lines;
}

function formatAttempt(attempt: StrategyAttempt): string {
  const marker =
    attempt.status === 'sufficient'
      ? chalk.green('✔')
      : attempt.status === 'failed'
        ? chalk.red('✖')
        : chalk.yellow('·');
  const detail =
    attempt.status === 'failed'
      ? chalk.red(attempt.error ?? 'failed')
      : `${attempt.recordCount} found`;
  return `  ${marker} ${attempt.strategy} ${chalk.dim('→')} ${detail}`;
}

/** Human-readable rendering of a query response. */
export function renderResponse(response: AggregatedResponse): string {
  const lines: string[] = [];

  if (response.items.length === 0) {
    lines.push(chalk.yellow(`No issues found in ${response.projectId}.`));
  } else {
    const noun = response.items.length === 1 ? 'issue' : 'issues';
    lines.push(chalk.bold(`${response.items.length} ${noun} in ${response.projectId}`));
    lines.push('');
    for (const item of response.items) {
      lines.push(...formatItem(item));
    }
  }

  lines.push('');
  if (response.satisfiedBy) {
    lines.push(chalk.dim(`Matched by: ${response.satisfiedBy}`));
  } else if (response.items.length > 0) {
    lines.push(chalk.yellow('No strategy was specific enough; showing everything that was found.'));
  }

  lines.push(chalk.dim('Strategies tried:'));
  lines.push(...response.attempts.map(formatAttempt));

  if (response.attempts.some((attempt) => attempt.limitReached)) {
    lines.push('');
    lines.push(
      chalk.yellow(
        'Result limit reached. There may be more issues; add filters to narrow the search.',
      ),
    );
  }

  if (response.context?.stale) {
    const reason = response.context.refreshError
      ? ` (refresh failed: ${response.context.refreshError})`
      : '';
    lines.push('');
    const { fetchedAt } = response.context;
    lines.push(chalk.yellow(`Project context from ${fetchedAt} is stale${reason}.`));
  }

  return lines.join('\n');
}
