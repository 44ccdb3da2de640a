import type {
  FilterDimension,
  IssueState,
  Label,
  Member,
  Milestone,
  ProjectContext,
  Query,
  SearchStrategy,
  StrategyFilters,
} from './types.js';

export interface PlannerOptions {
  /** Upper bound on non-state filter dimensions per strategy. */
  maxStrategyDimensions: number;
  /** Upper bound on the number of strategies emitted. */
  maxStrategies: number;
}

export const DEFAULT_PLANNER_OPTIONS: PlannerOptions = {
  maxStrategyDimensions: 3,
  maxStrategies: 8,
};

const CLOSED_STATE_TERMS = new Set([
  'closed',
  'resolved',
  'done',
  'merged',
  'finished',
  'completed',
]);

// Shorter keys would match inside too many unrelated words.
const MIN_SUBSTRING_KEY_LENGTH = 3;

/**
 * Lower-cased lexical terms of `text`. Dots, underscores and hyphens stay
 * inside a term so usernames like `jane.doe` survive, but are trimmed from
 * its ends.
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}._-]+/u)
    .map((term) => term.replace(/^[._-]+|[._-]+$/g, ''))
    .filter((term) => term.length > 0);
}

function containsSequence(terms: string[], sequence: string[]): boolean {
  for (let start = 0; start + sequence.length <= terms.length; start++) {
    if (sequence.every((part, offset) => terms[start + offset] === part)) {
      return true;
    }
  }
  return false;
}

/** Whether an entity key (label name, username, title…) occurs in the query terms. */
export function keyMatches(key: string, terms: string[]): boolean {
  const keyTerms = tokenize(key);
  if (keyTerms.length === 0) return false;

  if (keyTerms.length > 1) {
    return containsSequence(terms, keyTerms);
  }

  const [single] = keyTerms;
  if (single.length < MIN_SUBSTRING_KEY_LENGTH) {
    return terms.includes(single);
  }
  return terms.some((term) => term.includes(single));
}

function matchEntities<T>(
  entities: readonly T[],
  keysOf: (entity: T) => (string | null)[],
  terms: string[],
): T[] {
  return entities.filter((entity) =>
    keysOf(entity).some((key) => key !== null && keyMatches(key, terms)),
  );
}

export function detectState(terms: string[]): IssueState {
  return terms.some((term) => CLOSED_STATE_TERMS.has(term)) ? 'closed' : 'opened';
}

export function strategyName(filters: StrategyFilters): string {
  const parts: string[] = [];
  if (filters.assignee) parts.push(`assignee=${filters.assignee}`);
  if (filters.labels && filters.labels.length > 0) parts.push(`labels=${filters.labels.join(',')}`);
  if (filters.milestone) parts.push(`milestone=${filters.milestone}`);
  parts.push(`state=${filters.state}`);
  return parts.join(' ');
}

function buildStrategy(filters: StrategyFilters): SearchStrategy {
  const dimensions: FilterDimension[] = [];
  let matchCount = 0;
  if (filters.assignee) {
    dimensions.push('assignee');
    matchCount += 1;
  }
  if (filters.labels && filters.labels.length > 0) {
    dimensions.push('labels');
    matchCount += filters.labels.length;
  }
  if (filters.milestone) {
    dimensions.push('milestone');
    matchCount += 1;
  }
  return { name: strategyName(filters), filters, dimensions, matchCount };
}

/**
 * State-only strategy used when nothing in the query is grounded. It defaults
 * to open issues; closed-state wording in the query still applies here, the
 * same way it applies to every other strategy.
 */
export function fallbackStrategy(state: IssueState = 'opened'): SearchStrategy {
  return buildStrategy({ state });
}

/**
 * True when every filter value of `strategy` exists in `context`. The planner
 * runs every candidate through this before emitting it.
 */
export function isGrounded(strategy: SearchStrategy, context: ProjectContext): boolean {
  const { assignee, labels, milestone, state } = strategy.filters;
  if (state !== 'opened' && state !== 'closed') return false;
  if (assignee !== undefined && !context.members.some((m) => m.username === assignee)) {
    return false;
  }
  const knownLabels = new Set(context.labels.map((l) => l.name));
  if (labels !== undefined && !labels.every((name) => knownLabels.has(name))) {
    return false;
  }
  if (milestone !== undefined && !context.milestones.some((m) => m.title === milestone)) {
    return false;
  }
  return true;
}

function labelOptions(matched: Label[]): (Label[] | null)[] {
  if (matched.length === 0) return [null];
  const singles = matched.length > 1 ? matched.map((label) => [label]) : [];
  return [matched, ...singles, null];
}

/**
 * Turns a natural-language query into ranked search strategies, using only
 * values found in the project context. Never returns an empty list.
 */
export function plan(
  query: Query,
  context: ProjectContext,
  options: PlannerOptions = DEFAULT_PLANNER_OPTIONS,
): SearchStrategy[] {
  const terms = tokenize(query.text);
  const state = detectState(terms);

  const members = matchEntities<Member>(context.members, (m) => [m.username, m.displayName], terms);
  const labels = matchEntities<Label>(context.labels, (l) => [l.name], terms);
  const milestones = matchEntities<Milestone>(context.milestones, (m) => [m.title], terms);

  const candidates: SearchStrategy[] = [];
  for (const member of [...members, null]) {
    for (const labelSet of labelOptions(labels)) {
      for (const milestone of [...milestones, null]) {
        const filters: StrategyFilters = { state };
        if (member) filters.assignee = member.username;
        if (labelSet) filters.labels = labelSet.map((l) => l.name);
        if (milestone) filters.milestone = milestone.title;

        const strategy = buildStrategy(filters);
        if (strategy.dimensions.length === 0) continue;
        if (strategy.dimensions.length > options.maxStrategyDimensions) continue;
        candidates.push(strategy);
      }
    }
  }

  let kept = candidates;
  if (candidates.length > options.maxStrategies) {
    const byMatches = candidates
      .map((strategy, order) => ({ strategy, order }))
      .sort((a, b) => b.strategy.matchCount - a.strategy.matchCount);
    const keep = new Set(byMatches.slice(0, options.maxStrategies).map((c) => c.order));
    kept = candidates.filter((_, order) => keep.has(order));
  }

  const ranked = kept
    .filter((strategy) => isGrounded(strategy, context))
    .sort((a, b) => b.dimensions.length - a.dimensions.length);

  return ranked.length > 0 ? ranked : [fallbackStrategy(state)];
}
