import { describe, it, expect, vi } from 'vitest';
import { LLMGateway } from '../clients/llm.js';
import { SearchProvider } from '../services/perplexity.js';
import { SearchProviderError } from '../errors.js';
import { runTask, runAll, evaluateResults, createFallbackEvaluation, agentIdFor } from '../execution.js';
import { SubTask } from '../types/index.js';
import { failingGateway, fakeSearch, hit } from './helpers/fakes.js';

function task(id: string, queries: string[]): SubTask {
  return {
    id,
    title: `Title ${id}`,
    description: `Description ${id}`,
    focus_area: `focus ${id}`,
    search_queries: queries,
    expected_output: 'findings',
  };
}

const goodEvaluation = JSON.stringify({
  summary: 'Heat pumps cut emissions',
  key_insights: ['COP above 3 is common'],
  credible_sources: ['https://a.example/1'],
  limitations: [],
  confidence: 'High',
  relevance_score: 88,
});

function replying(reply: string): LLMGateway {
  return { complete: vi.fn(async () => reply) };
}

describe('runTask', () => {
  it('searches every query and evaluates the combined results', async () => {
    const search = fakeSearch({
      'heat pumps': [hit('https://a.example/1', 'A')],
      'heat pump cost': [hit('https://b.example/2', 'B'), hit('https://c.example/3', 'C')],
    });

    const result = await runTask(task('task_1', ['heat pumps', 'heat pump cost']), {
      gateway: replying(goodEvaluation),
      search,
      maxSearchResults: 10,
    });

    expect(result.agent_id).toBe('subagent_task_1');
    expect(result.error).toBeUndefined();
    expect(result.search_results).toEqual([
      { title: 'A', url: 'https://a.example/1', snippet: 'A snippet', query: 'heat pumps' },
      { title: 'B', url: 'https://b.example/2', snippet: 'B snippet', query: 'heat pump cost' },
      { title: 'C', url: 'https://c.example/3', snippet: 'C snippet', query: 'heat pump cost' },
    ]);
    expect(result.evaluation).toEqual({
      summary: 'Heat pumps cut emissions',
      key_insights: ['COP above 3 is common'],
      credible_sources: ['https://a.example/1'],
      limitations: [],
      confidence: 'high',
      relevance_score: 88,
      sources_analyzed: 3,
    });
  });

  it('passes the result limit to the provider', async () => {
    const search = fakeSearch({ q: [hit('https://a.example/1', 'A'), hit('https://b.example/2', 'B')] });
    const result = await runTask(task('task_1', ['q']), { gateway: replying(goodEvaluation), search, maxSearchResults: 1 });
    expect(result.search_results.map(r => r.url)).toEqual(['https://a.example/1']);
  });

  it('keeps results from queries that succeeded when another query fails', async () => {
    const search: SearchProvider = {
      async search(query) {
        if (query === 'broken') throw new SearchProviderError('rate limited', query, 429);
        return [hit('https://a.example/1', 'A')];
      },
    };

    const result = await runTask(task('task_1', ['broken', 'works']), { gateway: replying(goodEvaluation), search, maxSearchResults: 5 });
    expect(result.search_results.map(r => r.query)).toEqual(['works']);
    expect(result.evaluation?.sources_analyzed).toBe(1);
  });

  it('reports no results without calling the model', async () => {
    const gateway = replying(goodEvaluation);
    const result = await runTask(task('task_1', ['nothing']), { gateway, search: fakeSearch({}), maxSearchResults: 5 });

    expect(gateway.complete).not.toHaveBeenCalled();
    expect(result.evaluation).toEqual({
      summary: 'No search results found',
      key_insights: [],
      credible_sources: [],
      limitations: ['No search results were returned'],
      confidence: 'low',
      relevance_score: 0,
      sources_analyzed: 0,
    });
  });

  it('uses the fallback evaluation when the reply cannot be decoded', async () => {
    const search = fakeSearch({
      q: ['https://1.example', 'https://2.example', 'https://3.example', 'https://4.example'].map(url => hit(url, url)),
    });
    const subTask = task('task_1', ['q']);
    const result = await runTask(subTask, { gateway: replying('Sorry, no JSON today'), search, maxSearchResults: 10 });

    expect(result.evaluation).toEqual({
      summary: 'Analyzed 4 search results for focus task_1',
      key_insights: ['Information gathered from multiple sources'],
      credible_sources: ['https://1.example', 'https://2.example', 'https://3.example'],
      limitations: ['Limited evaluation due to parsing error'],
      confidence: 'medium',
      relevance_score: 70,
      sources_analyzed: 4,
    });
  });

  it('converts a gateway failure into an error result without search results', async () => {
    const search = fakeSearch({ q: [hit('https://a.example/1', 'A')] });
    const result = await runTask(task('task_1', ['q']), { gateway: failingGateway('boom'), search, maxSearchResults: 5 });

    expect(result.evaluation).toBeUndefined();
    expect(result.error).toBe('Evaluation failed for task_1: boom');
    expect(result.search_results).toEqual([]);
  });
});

describe('evaluateResults', () => {
  it('falls back to defaults for a reply missing optional fields', async () => {
    const results = [{ title: 'A', url: 'https://a.example/1', snippet: 's', query: 'q' }];
    const evaluation = await evaluateResults(replying('{"summary": "short"}'), task('t', ['q']), results);
    expect(evaluation).toEqual({
      summary: 'short',
      key_insights: [],
      credible_sources: [],
      limitations: [],
      confidence: 'medium',
      relevance_score: 70,
      sources_analyzed: 1,
    });
  });

  it('builds the fallback from the first three non-empty urls', () => {
    const results = ['', 'https://a.example', 'https://b.example'].map(url => ({ title: 't', url, snippet: 's', query: 'q' }));
    expect(createFallbackEvaluation(task('t', ['q']), results).credible_sources).toEqual(['https://a.example', 'https://b.example']);
  });
});

describe('runAll', () => {
  it('returns one result per task in input order regardless of completion order', async () => {
    const delays: Record<string, number> = { slow: 30, fast: 1, medium: 10 };
    const search: SearchProvider = {
      search: (query) => new Promise(resolve => setTimeout(() => resolve([hit(`https://${query}.example`, query)]), delays[query])),
    };

    const tasks = [task('a', ['slow']), task('b', ['fast']), task('c', ['medium'])];
    const results = await runAll(tasks, 'q', { gateway: replying(goodEvaluation), search, maxSearchResults: 5 });

    expect(results.map(r => r.agent_id)).toEqual(tasks.map(agentIdFor));
    expect(results.map(r => r.search_results[0].url)).toEqual([
      'https://slow.example',
      'https://fast.example',
      'https://medium.example',
    ]);
  });

  it('isolates a failing task from the others', async () => {
    const gateway: LLMGateway = {
      async complete(system) {
        if (system.includes('focus b')) throw new Error('model overloaded');
        return goodEvaluation;
      },
    };
    const search = fakeSearch({ q: [hit('https://a.example/1', 'A')] });

    const results = await runAll([task('a', ['q']), task('b', ['q']), task('c', ['q'])], 'q', { gateway, search, maxSearchResults: 5 });

    expect(results.map(r => r.error ?? 'ok')).toEqual(['ok', 'Evaluation failed for b: model overloaded', 'ok']);
  });
});
