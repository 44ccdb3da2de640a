import { rm } from 'node:fs/promises';
import { join } from 'node:path';

import { z } from 'zod';

import { readFileIfExists, writeFileAtomic } from '../utils/fs.js';
import type { ProjectContext } from './types.js';

const ProjectContextSchema = z.object({
  projectId: z.string(),
  labels: z.array(
    z.object({
      name: z.string(),
      description: z.string().nullable(),
      openIssueCount: z.number().nullable(),
    }),
  ),
  members: z.array(
    z.object({
      username: z.string(),
      role: z.string().nullable(),
      displayName: z.string().nullable(),
    }),
  ),
  milestones: z.array(
    z.object({
      title: z.string(),
      dueDate: z.string().nullable(),
      state: z.string(),
    }),
  ),
  fetchedAt: z.string(),
});

/** Replaces characters that are not allowed in file names. */
export function sanitizeProjectId(projectId: string): string {
  return projectId.replace(/[/\\:*?"<>|]/g, '_');
}

/** JSON snapshots of project contexts, one file per project. */
export class ContextPersistence {
  constructor(private readonly dir: string) {}

  pathFor(projectId: string): string {
    return join(this.dir, `${sanitizeProjectId(projectId)}.json`);
  }

  /** Returns null when the file is missing, malformed or belongs to another project. */
  async load(projectId: string): Promise<ProjectContext | null> {
    const raw = await readFileIfExists(this.pathFor(projectId));
    if (raw === null) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      return null;
    }

    const parsed = ProjectContextSchema.safeParse(json);
    if (!parsed.success || parsed.data.projectId !== projectId) return null;
    return parsed.data;
  }

  async save(context: ProjectContext): Promise<void> {
    await writeFileAtomic(this.pathFor(context.projectId), JSON.stringify(context, null, 2) + '\n');
  }

  async remove(projectId: string): Promise<void> {
    await rm(this.pathFor(projectId), { force: true });
  }
}
