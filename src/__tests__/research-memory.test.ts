import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  FileMemoryStore,
  InMemoryMemoryStore,
  MemoryStore,
  createContext,
  createMemoryStore,
} from '../storage/research-memory.js';
import { createFallbackPlan } from '../planning.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'research-memory-'));
});

afterEach(async () => {
  vi.useRealTimers();
  await rm(dir, { recursive: true, force: true });
});

const stores: Array<[string, () => MemoryStore]> = [
  ['FileMemoryStore', () => new FileMemoryStore(join(dir, 'contexts'))],
  ['InMemoryMemoryStore', () => new InMemoryMemoryStore()],
];

describe.each(stores)('%s', (_name, makeStore) => {
  it('saves and reads back a context', async () => {
    const store = makeStore();
    const context = createContext('Solid state batteries', createFallbackPlan('Solid state batteries'));
    const id = await store.save(context);

    const loaded = await store.get(id);
    expect(loaded).toMatchObject({ query: 'Solid state batteries', iteration: 1, synthesis: null, results: [] });
  });

  it('returns null for an unknown id', async () => {
    expect(await makeStore().get('missing')).toBeNull();
  });

  it('refuses to update an unknown id', async () => {
    const store = makeStore();
    expect(await store.update('missing', createContext('q', createFallbackPlan('q')))).toBe(false);
  });

  it('updates a saved context and refreshes updated_at', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
    const store = makeStore();
    const context = createContext('q', createFallbackPlan('q'));
    const id = await store.save(context);

    vi.setSystemTime(new Date('2026-01-02T00:00:00.000Z'));
    expect(await store.update(id, { ...context, iteration: 2 })).toBe(true);

    expect(await store.get(id)).toMatchObject({
      iteration: 2,
      created_at: '2026-01-01T00:00:00.000Z',
      updated_at: '2026-01-02T00:00:00.000Z',
    });
  });

  it('finds the most recently updated context whose query contains the text', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    const store = makeStore();

    vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
    await store.save(createContext('Heat pumps in cold climates', createFallbackPlan('a')));
    vi.setSystemTime(new Date('2026-01-03T00:00:00.000Z'));
    await store.save(createContext('HEAT PUMPS for apartments', createFallbackPlan('b')));
    vi.setSystemTime(new Date('2026-01-05T00:00:00.000Z'));
    await store.save(createContext('District heating', createFallbackPlan('c')));

    const found = await store.findLatestByQuery('heat pumps');
    expect(found?.query).toBe('HEAT PUMPS for apartments');
  });

  it('returns null when nothing matches', async () => {
    const store = makeStore();
    await store.save(createContext('Wind power', createFallbackPlan('w')));
    expect(await store.findLatestByQuery('nuclear')).toBeNull();
  });

  it('hands out copies rather than live references', async () => {
    const store = makeStore();
    const id = await store.save(createContext('q', createFallbackPlan('q')));
    const first = await store.get(id);
    first?.plan.objectives.push('mutated');
    expect((await store.get(id))?.plan.objectives).toEqual(['q']);
  });
});

describe('FileMemoryStore', () => {
  it('writes one JSON file per context id', async () => {
    const store = new FileMemoryStore(dir);
    const id = await store.save(createContext('q', createFallbackPlan('q')));
    expect(await readdir(dir)).toEqual([`${id}.json`]);
  });

  it('skips files in the directory that are not research contexts', async () => {
    const store = new FileMemoryStore(dir);
    const id = await store.save(createContext('heat pumps', createFallbackPlan('heat pumps')));
    await writeFile(join(dir, 'stray.json'), '{}', 'utf-8');
    await writeFile(join(dir, 'broken.json'), '{"query": ', 'utf-8');

    expect(await store.get('stray')).toBeNull();
    expect(await store.get('broken')).toBeNull();
    expect((await store.findLatestByQuery('heat'))?.query).toBe('heat pumps');
    expect(await store.get(id)).not.toBeNull();
  });

  it('finds nothing before the directory exists', async () => {
    const store = new FileMemoryStore(join(dir, 'not-created-yet'));
    expect(await store.findLatestByQuery('anything')).toBeNull();
  });
});

describe('createMemoryStore', () => {
  it('selects the implementation from the memory type', () => {
    expect(createMemoryStore({ type: 'in_memory', directory: dir })).toBeInstanceOf(InMemoryMemoryStore);
    expect(createMemoryStore({ type: 'file', directory: dir })).toBeInstanceOf(FileMemoryStore);
  });
});
