/**
 * One JSON file per agent under a state directory.
 *
 * Writes go to a temporary file in the same directory and are renamed into
 * place, so a reader sees either the previous snapshot or the new one.
 * Agent ids are encoded into file names; the directory is created on demand.
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { randomUUID } from 'node:crypto';
import type { AgentId } from '../agents/runtime/agent-protocol.js';
import type { AgentSnapshot, PersistenceStore } from '../agents/runtime/persistence.js';

export function snapshotFileName(agentId: AgentId): string {
  return `${encodeURIComponent(agentId)}.json`;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function writeJsonAtomic(path: string, dir: string, value: unknown): Promise<void> {
  await mkdir(dir, { recursive: true });
  const tmp = join(dir, `.${randomUUID()}.tmp`);
  try {
    await writeFile(tmp, JSON.stringify(value, null, 2), 'utf8');
    await rename(tmp, path);
  } catch (err) {
    await rm(tmp, { force: true });
    throw err;
  }
}

export class FilePersistenceStore implements PersistenceStore {
  constructor(readonly dir: string) {}

  pathFor(agentId: AgentId): string {
    return join(this.dir, snapshotFileName(agentId));
  }

  async load(agentId: AgentId): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(this.pathFor(agentId), 'utf8');
    } catch (err) {
      if (isMissing(err)) return null;
      throw err;
    }
    return JSON.parse(text);
  }

  async save(agentId: AgentId, snapshot: AgentSnapshot): Promise<void> {
    await writeJsonAtomic(this.pathFor(agentId), this.dir, snapshot);
  }

  async remove(agentId: AgentId): Promise<void> {
    await rm(this.pathFor(agentId), { force: true });
  }
}
