import { randomUUID } from 'crypto';
import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { Plan, ResearchContext } from '../types/index.js';

/**
 * Persistence for research contexts across iterations and runs.
 * Matching by query is the store's business; the controller only asks for the latest.
 */
export interface MemoryStore {
  save(context: ResearchContext): Promise<string>;
  get(id: string): Promise<ResearchContext | null>;
  findLatestByQuery(query: string): Promise<ResearchContext | null>;
  update(id: string, context: ResearchContext): Promise<boolean>;
}

export function createContext(query: string, plan: Plan): ResearchContext {
  const now = new Date().toISOString();
  return {
    query,
    plan,
    sub_tasks: [],
    results: [],
    synthesis: null,
    iteration: 1,
    created_at: now,
    updated_at: now,
  };
}

// Fields the store itself relies on; anything else in the directory is skipped
const storedContextSchema = z.object({
  query: z.string(),
  iteration: z.number(),
  created_at: z.string(),
  updated_at: z.string(),
  synthesis: z.record(z.unknown()).nullable(),
});

function isStoredContext(value: unknown): value is ResearchContext {
  return storedContextSchema.safeParse(value).success;
}

function matchesQuery(context: ResearchContext, query: string): boolean {
  return context.query.toLowerCase().includes(query.toLowerCase());
}

function latest(contexts: ResearchContext[]): ResearchContext | null {
  let best: ResearchContext | null = null;
  for (const context of contexts) {
    if (!best || context.updated_at > best.updated_at) best = context;
  }
  return best;
}

function touch(context: ResearchContext): ResearchContext {
  return { ...context, updated_at: new Date().toISOString() };
}

/**
 * Process-local store, used for tests and MEMORY_TYPE=in_memory
 */
export class InMemoryMemoryStore implements MemoryStore {
  private contexts = new Map<string, ResearchContext>();

  async save(context: ResearchContext): Promise<string> {
    const id = randomUUID();
    this.contexts.set(id, structuredClone(touch(context)));
    return id;
  }

  async get(id: string): Promise<ResearchContext | null> {
    const context = this.contexts.get(id);
    return context ? structuredClone(context) : null;
  }

  async findLatestByQuery(query: string): Promise<ResearchContext | null> {
    const found = latest([...this.contexts.values()].filter(c => matchesQuery(c, query)));
    return found ? structuredClone(found) : null;
  }

  async update(id: string, context: ResearchContext): Promise<boolean> {
    if (!this.contexts.has(id)) return false;
    this.contexts.set(id, structuredClone(touch(context)));
    return true;
  }
}

/**
 * One JSON file per context id under a directory
 */
export class FileMemoryStore implements MemoryStore {
  constructor(private readonly directory: string) {}

  private pathFor(id: string): string {
    return join(this.directory, `${id}.json`);
  }

  private async write(id: string, context: ResearchContext): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.pathFor(id), JSON.stringify(context, null, 2), 'utf-8');
  }

  async save(context: ResearchContext): Promise<string> {
    const id = randomUUID();
    await this.write(id, touch(context));
    console.error(`[Memory] Saved context ${id} for "${context.query}"`);
    return id;
  }

  async get(id: string): Promise<ResearchContext | null> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(await readFile(this.pathFor(id), 'utf-8'));
    } catch {
      return null;
    }
    if (!isStoredContext(parsed)) {
      console.error(`[Memory] Ignoring ${id}.json: not a research context`);
      return null;
    }
    return parsed;
  }

  async findLatestByQuery(query: string): Promise<ResearchContext | null> {
    let files: string[];
    try {
      files = await readdir(this.directory);
    } catch {
      return null;  // Nothing saved yet
    }

    const contexts = await Promise.all(
      files
        .filter(f => f.endsWith('.json'))
        .map(f => this.get(f.slice(0, -'.json'.length)))
    );

    return latest(contexts.filter((c): c is ResearchContext => c !== null && matchesQuery(c, query)));
  }

  async update(id: string, context: ResearchContext): Promise<boolean> {
    const existing = await this.get(id);
    if (!existing) return false;
    try {
      await this.write(id, touch(context));
      return true;
    } catch (error) {
      console.error(`[Memory] Failed to update context ${id}:`, error);
      return false;
    }
  }
}

export function createMemoryStore(config: { type: 'file' | 'in_memory'; directory: string }): MemoryStore {
  return config.type === 'in_memory'
    ? new InMemoryMemoryStore()
    : new FileMemoryStore(config.directory);
}
