import type { ProjectContext } from '../core/types.js';

const MAX_LABELS = 20;
const MAX_MEMBERS = 15;

/**
 * Markdown summary of a project context, for LLM prompts and `context show`.
 */
export function buildContextSummary(context: ProjectContext): string {
  const lines: string[] = [`## Project Context for ${context.projectId}`, ''];

  if (context.labels.length > 0) {
    lines.push('**Available Labels:**');
    for (const label of context.labels.slice(0, MAX_LABELS)) {
      const usage = label.openIssueCount !== null ? ` (${label.openIssueCount})` : '';
      lines.push(`- \`${label.name}\`: ${label.description || 'No description'}${usage}`);
    }
    if (context.labels.length > MAX_LABELS) {
      lines.push(`- …and ${context.labels.length - MAX_LABELS} more`);
    }
    lines.push('');
  }

  if (context.members.length > 0) {
    lines.push('**Project Members:**');
    for (const member of context.members.slice(0, MAX_MEMBERS)) {
      const name = member.displayName ?? member.username;
      lines.push(`- \`${member.username}\` (${member.role ?? 'Member'}): ${name}`);
    }
    if (context.members.length > MAX_MEMBERS) {
      lines.push(`- …and ${context.members.length - MAX_MEMBERS} more`);
    }
    lines.push('');
  }

  if (context.milestones.length > 0) {
    lines.push('**Milestones:**');
    for (const milestone of context.milestones) {
      const due = milestone.dueDate ? ` due ${milestone.dueDate}` : '';
      lines.push(`- \`${milestone.title}\` [${milestone.state}]${due}`);
    }
    lines.push('');
  }

  lines.push(`*Context last updated: ${context.fetchedAt}*`);
  return lines.join('\n');
}
