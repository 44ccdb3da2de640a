import type { AggregatedItem, ToolResult } from './types.js';

/**
 * Merges tool results into one list, deduplicated by tracker id in
 * first-seen order, recording which strategies surfaced each record.
 * Aggregating the same results again yields the same list.
 */
export function aggregate(results: readonly ToolResult[]): AggregatedItem[] {
  const items = new Map<number, AggregatedItem>();

  for (const result of results) {
    for (const record of result.records) {
      if (typeof record.id !== 'number' || !Number.isFinite(record.id)) {
        throw new TypeError(`Record from strategy "${result.strategy.name}" has no numeric id`);
      }

      const existing = items.get(record.id);
      if (!existing) {
        items.set(record.id, { record, strategies: [result.strategy.name] });
      } else if (!existing.strategies.includes(result.strategy.name)) {
        existing.strategies.push(result.strategy.name);
      }
    }
  }

  return [...items.values()];
}
