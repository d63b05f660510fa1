/**
 * Whole-system checkpoints as JSON files.
 *
 * A checkpoint holds one snapshot per agent, including the kind and config it
 * was created from, so it can rebuild a mesh from nothing. Loading is only
 * allowed into a system with no agents.
 */

import { readdir, readFile, rm } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { z } from 'zod';
import type { AgentSystem } from '../agents/runtime/agent-system.js';
import { AgentMeshError } from '../agents/runtime/failures.js';
import { AgentSnapshotSchema, type AgentSnapshot } from '../agents/runtime/persistence.js';
import { writeJsonAtomic } from './file-store.js';
import logger from '../lib/logger.js';
import { formatIssues } from '../lib/validate.js';

const CheckpointSchema = z.object({
  version: z.literal(1),
  name: z.string(),
  createdAt: z.string(),
  agents: z.array(AgentSnapshotSchema),
});

export type Checkpoint = z.infer<typeof CheckpointSchema>;

export interface CheckpointInfo {
  file: string;
  name: string;
  createdAt: string;
  agentCount: number;
}

export interface CheckpointManagerOptions {
  now?: () => Date;
}

function slug(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9_-]+/g, '-').replace(/^-+|-+$/g, '') || 'checkpoint';
}

export class CheckpointManager {
  private readonly now: () => Date;

  constructor(
    private readonly system: AgentSystem,
    readonly dir: string,
    options: CheckpointManagerOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** Write every agent's snapshot to a new file. Returns the file name. */
  async save(name = 'checkpoint'): Promise<string> {
    const createdAt = this.now().toISOString();
    const agents: AgentSnapshot[] = [];
    for (const id of this.system.listAgents()) {
      const snapshot = this.system.captureSnapshot(id);
      if (snapshot) agents.push(snapshot);
    }
    const file = `${createdAt.replace(/[:.]/g, '-')}_${slug(name)}.json`;
    const checkpoint: Checkpoint = { version: 1, name, createdAt, agents };
    await writeJsonAtomic(join(this.dir, file), this.dir, checkpoint);
    logger.info({ file, agents: agents.length }, 'Checkpoint saved');
    return file;
  }

  /** Valid checkpoints, newest first. Unreadable files are skipped. */
  async list(): Promise<CheckpointInfo[]> {
    let files: string[];
    try {
      files = await readdir(this.dir);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    const found: CheckpointInfo[] = [];
    for (const file of files.filter((f) => f.endsWith('.json'))) {
      try {
        const checkpoint = await this.read(file);
        found.push({
          file,
          name: checkpoint.name,
          createdAt: checkpoint.createdAt,
          agentCount: checkpoint.agents.length,
        });
      } catch (err) {
        logger.warn({ file, err: err instanceof Error ? err.message : String(err) }, 'Skipping unreadable checkpoint');
      }
    }
    return found.sort((a, b) => b.createdAt.localeCompare(a.createdAt) || b.file.localeCompare(a.file));
  }

  async latest(): Promise<CheckpointInfo | null> {
    const [newest] = await this.list();
    return newest ?? null;
  }

  /** Rebuild every agent in the checkpoint. Returns the ids restored. */
  async load(file: string): Promise<string[]> {
    if (this.system.listAgents().length > 0) {
      throw new AgentMeshError('invalid-config', 'Checkpoints can only be loaded into an empty system');
    }
    const checkpoint = await this.read(file);
    const restored: string[] = [];
    for (const snapshot of checkpoint.agents) {
      await this.system.createAgent(snapshot.agentId, snapshot.kind, snapshot.config ?? {}, { snapshot });
      restored.push(snapshot.agentId);
    }
    logger.info({ file, agents: restored.length }, 'Checkpoint loaded');
    return restored;
  }

  async delete(file: string): Promise<void> {
    await rm(this.pathFor(file), { force: true });
  }

  private async read(file: string): Promise<Checkpoint> {
    const raw: unknown = JSON.parse(await readFile(this.pathFor(file), 'utf8'));
    const parsed = CheckpointSchema.safeParse(raw);
    if (!parsed.success) {
      throw new AgentMeshError('invalid-config', `Invalid checkpoint ${file}: ${formatIssues(parsed.error.issues)}`);
    }
    return parsed.data;
  }

  /** Only plain file names inside the checkpoint directory are accepted. */
  private pathFor(file: string): string {
    if (basename(file) !== file || file.startsWith('.')) {
      throw new AgentMeshError('invalid-config', `Invalid checkpoint file name: ${file}`);
    }
    return join(this.dir, file);
  }
}
