import { buildContextSummary } from '../../src/prompts/context-summary.js';
import { label, makeContext } from './helpers/fixtures.js';

describe('buildContextSummary', () => {
  it('should list labels, members and milestones', () => {
    const summary = buildContextSummary(
      makeContext({
        labels: [
          { name: 'bug', description: 'Something is broken', openIssueCount: 4 },
          { name: 'feature', description: null, openIssueCount: null },
        ],
        members: [
          { username: 'alice', role: 'Developer', displayName: 'Alice Adams' },
          { username: 'bob', role: null, displayName: null },
        ],
        milestones: [{ title: 'v2.0', dueDate: '2026-06-30', state: 'active' }],
      }),
    );

    expect(summary.split('\n')).toEqual([
      '## Project Context for acme/web',
      '',
      '**Available Labels:**',
      '- `bug`: Something is broken (4)',
      '- `feature`: No description',
      '',
      '**Project Members:**',
      '- `alice` (Developer): Alice Adams',
      '- `bob` (Member): bob',
      '',
      '**Milestones:**',
      '- `v2.0` [active] due 2026-06-30',
      '',
      '*Context last updated: 2026-01-01T00:00:00.000Z*',
    ]);
  });

  it('should cap long label lists', () => {
    const labels = Array.from({ length: 22 }, (_, i) => label(`area-${i}`));

    const lines = buildContextSummary(makeContext({ labels })).split('\n');

    expect(lines).toContain('- `area-19`: No description');
    expect(lines).not.toContain('- `area-20`: No description');
    expect(lines).toContain('- …and 2 more');
  });

  it('should omit empty sections', () => {
    const summary = buildContextSummary(makeContext({ labels: [], members: [], milestones: [] }));

    expect(summary).toBe(
      '## Project Context for acme/web\n\n*Context last updated: 2026-01-01T00:00:00.000Z*',
    );
  });
});
