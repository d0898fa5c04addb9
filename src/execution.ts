import { z } from 'zod';
import { LLMGateway } from './clients/llm.js';
import { SearchProvider } from './services/perplexity.js';
import { ResearchRole, askRole } from './roles.js';
import { confidence, score, textList } from './parsing.js';
import { EvaluationError, errorMessage } from './errors.js';
import { Evaluation, SearchResult, SubTask, SubTaskResult } from './types/index.js';

export interface TaskRunnerDeps {
  gateway: LLMGateway;
  search: SearchProvider;
  maxSearchResults: number;
}

export function agentIdFor(task: SubTask): string {
  return `subagent_${task.id}`;
}

/**
 * Run every search query of a task concurrently.
 * Results keep originating-query order, then provider order; a failing query contributes nothing.
 */
async function gatherSearchResults(task: SubTask, deps: TaskRunnerDeps): Promise<SearchResult[]> {
  const perQuery = await Promise.all(
    task.search_queries.map(async (query) => {
      try {
        const hits = await deps.search.search(query, deps.maxSearchResults);
        return hits.map(hit => ({ title: hit.title, url: hit.link, snippet: hit.snippet, query }));
      } catch (error) {
        console.error(`[Exec] Search failed for "${query}" (${task.id}):`, errorMessage(error));
        return [];
      }
    })
  );
  return perQuery.flat();
}

function buildSubagentSystem(task: SubTask): string {
  return `You are a Subagent focused on: ${task.focus_area}

Your task: ${task.description}

Your responsibilities:
1. Conduct focused web searches on your assigned topic
2. Evaluate and filter search results for relevance and quality
3. Extract key information and insights
4. Provide structured, factual responses
5. Identify credible sources and cite them properly

Always respond in JSON format for structured data processing.
Be thorough, objective, and focus on your specific research area.`;
}

const evaluationSchema = z.object({
  summary: z.string(),
  key_insights: textList(),
  credible_sources: textList(),
  limitations: textList(),
  confidence: confidence(),
  relevance_score: score(70),
});

interface EvaluationInput {
  task: SubTask;
  results: SearchResult[];
}

export function createFallbackEvaluation(task: SubTask, results: SearchResult[]): Evaluation {
  return {
    summary: `Analyzed ${results.length} search results for ${task.focus_area}`,
    key_insights: ['Information gathered from multiple sources'],
    credible_sources: results.slice(0, 3).map(r => r.url).filter(url => url.length > 0),
    limitations: ['Limited evaluation due to parsing error'],
    confidence: 'medium',
    relevance_score: 70,
    sources_analyzed: results.length,
  };
}

function buildEvaluationRole(task: SubTask): ResearchRole<EvaluationInput, typeof evaluationSchema> {
  return {
    tag: 'Exec',
    system: buildSubagentSystem(task),
    schema: evaluationSchema,
    fallback: ({ results }) => createFallbackEvaluation(task, results),
    buildPrompt: ({ results }) => {
      const resultsText = results
        .map(r => `Title: ${r.title}\nSource: ${r.url}\nContent: ${r.snippet}`)
        .join('\n\n');

      return `
Task Focus: ${task.focus_area}
Expected Output: ${task.expected_output}

Search Results:
${resultsText}

Evaluate these search results and provide:
1. Summary of findings
2. Key insights relevant to the task
3. Assessment of source credibility
4. Gaps or limitations in the information

Respond with a JSON object:
{
  "summary": "comprehensive summary of findings",
  "key_insights": ["list of key insights"],
  "credible_sources": ["list of most credible source URLs"],
  "limitations": ["list of limitations or gaps"],
  "confidence": "high/medium/low",
  "relevance_score": <0-100>
}
`.trim();
    },
  };
}

/**
 * Evaluate a task's search results with one gateway call.
 * Unparseable replies degrade to the fallback evaluation; a failed gateway call raises EvaluationError.
 */
export async function evaluateResults(
  gateway: LLMGateway,
  task: SubTask,
  results: SearchResult[]
): Promise<Evaluation> {
  // Nothing to evaluate: skip the model entirely
  if (results.length === 0) {
    return {
      summary: 'No search results found',
      key_insights: [],
      credible_sources: [],
      limitations: ['No search results were returned'],
      confidence: 'low',
      relevance_score: 0,
      sources_analyzed: 0,
    };
  }

  try {
    const reply = await askRole(gateway, buildEvaluationRole(task), { task, results }, { rethrowGatewayErrors: true });
    return { ...reply.value, sources_analyzed: results.length };
  } catch (error) {
    throw new EvaluationError(`Evaluation failed for ${task.id}: ${errorMessage(error)}`, task.id, error);
  }
}

export async function runTask(task: SubTask, deps: TaskRunnerDeps): Promise<SubTaskResult> {
  const agentId = agentIdFor(task);
  try {
    const searchResults = await gatherSearchResults(task, deps);
    const evaluation = await evaluateResults(deps.gateway, task, searchResults);
    console.error(`[Exec]   ${agentId} completed (${searchResults.length} results, confidence=${evaluation.confidence})`);
    return {
      agent_id: agentId,
      task,
      search_results: searchResults,
      evaluation,
      timestamp: new Date().toISOString(),
    };
  } catch (error) {
    console.error(`[Exec]   ${agentId} failed:`, errorMessage(error));
    return {
      agent_id: agentId,
      task,
      search_results: [],
      error: errorMessage(error),
      timestamp: new Date().toISOString(),
    };
  }
}

/**
 * Fan out all tasks, join when every one has succeeded or been converted to an error result.
 * Output order matches input order regardless of completion order.
 */
export async function runAll(tasks: SubTask[], query: string, deps: TaskRunnerDeps): Promise<SubTaskResult[]> {
  console.error(`[Exec] Running ${tasks.length} subagents in parallel for "${query}"...`);
  const start = Date.now();

  const results = await Promise.all(tasks.map(task => runTask(task, deps)));

  const elapsed = ((Date.now() - start) / 1000).toFixed(1);
  const failed = results.filter(r => r.error !== undefined).length;
  console.error(`[Exec] ${tasks.length - failed}/${tasks.length} subagents succeeded in ${elapsed}s`);

  return results;
}
