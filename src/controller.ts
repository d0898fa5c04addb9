/**
 * Research Controller - drives the iterative research loop
 * Flow: Plan → Decompose → [Run sub-tasks → Synthesize → Decide → (Continue)]* → Cite → Persist
 */

import { LLMGateway, createLLMGateway } from './clients/llm.js';
import { SearchProvider, createPerplexityProvider } from './services/perplexity.js';
import { MemoryStore, createContext, createMemoryStore } from './storage/research-memory.js';
import { ResearchConfig, describeConfig, loadConfig, requireLLM } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { plan, decompose, buildRefinementPlan, buildGapTasks } from './planning.js';
import { runAll } from './execution.js';
import { synthesize, decideContinuation } from './synthesis.js';
import { attribute, extractSources } from './citations.js';
import { ProgressInfo } from './jobs.js';
import {
  ContinuationDecision,
  ControllerState,
  Plan,
  ResearchContext,
  ResearchOutcome,
  ResearchStatus,
  SubTask,
  SubTaskResult,
  Synthesis,
} from './types/index.js';

// Progress callback type for real-time state updates
export type OnProgressCallback = (progress: ProgressInfo) => void;

export interface ControllerDeps {
  config: ResearchConfig;
  gateway: LLMGateway | null;  // null = no backend configured; run() refuses to start
  search: SearchProvider;
  memory: MemoryStore;
}

export interface RunOptions {
  maxIterations?: number;
  onProgress?: OnProgressCallback;
}

interface NextRound {
  query: string;
  tasks: SubTask[];
}

/**
 * Prompt context carried into decomposition and synthesis: the current plan
 * plus whatever an earlier run on the same query concluded.
 */
function buildPromptContext(researchPlan: Plan, previous: ResearchContext | null): Record<string, unknown> {
  const context: Record<string, unknown> = {
    objectives: researchPlan.objectives,
    scope: researchPlan.scope,
    key_areas: researchPlan.key_areas,
  };
  if (previous?.synthesis) {
    context.prior_summary = previous.synthesis.executive_summary;
    context.prior_iterations = previous.iteration;
  }
  return context;
}

export class ResearchController {
  constructor(private readonly deps: ControllerDeps) {}

  getConfig(): ResearchConfig {
    return this.deps.config;
  }

  describeConfig(): Record<string, string | number> {
    return describeConfig(this.deps.config);
  }

  private requireGateway(): LLMGateway {
    if (!this.deps.gateway) {
      throw new ConfigurationError('No LLM configuration found. Set OPENAI_API_KEY, GEMINI_API_KEY or ANTHROPIC_API_KEY');
    }
    return this.deps.gateway;
  }

  async run(query: string, options: RunOptions = {}): Promise<ResearchOutcome> {
    const gateway = this.requireGateway();
    const { config } = this.deps;

    const trimmedQuery = query.trim();
    if (!trimmedQuery) {
      throw new Error('Research query must not be empty');
    }

    const maxIterations = Math.max(1, Math.floor(options.maxIterations ?? config.maxIterations));
    const states: ControllerState[] = [];
    const enter = (state: ControllerState, iteration: number, note?: string) => {
      states.push(state);
      console.error(`[Research] ${state}${iteration > 0 ? ` (iteration ${iteration}/${maxIterations})` : ''}${note ? `: ${note}` : ''}`);
      options.onProgress?.({ state, iteration, maxIterations, note });
    };

    console.error(`[Research] Starting research on: "${trimmedQuery}"`);

    // PLANNING
    enter('PLANNING', 0);
    const researchPlan = await plan(gateway, trimmedQuery);
    const previous = await this.findPrevious(trimmedQuery);
    const promptContext = buildPromptContext(researchPlan, previous);
    let context: ResearchContext = createContext(trimmedQuery, researchPlan);
    const contextId = await this.saveContext(context);

    let tasks = await decompose(gateway, trimmedQuery, researchPlan, promptContext);
    enter('DECOMPOSED', 0, `${tasks.length} sub-tasks`);

    const allResults: SubTaskResult[] = [];
    const decisions: ContinuationDecision[] = [];
    let activeQuery = trimmedQuery;
    let synthesis: Synthesis;
    let rounds = 0;

    for (let iteration = 1; ; iteration++) {
      rounds = iteration;
      const roundTasks = tasks.slice(0, config.maxSubagents);

      enter('RUNNING_SUBTASKS', iteration, `${roundTasks.length} sub-tasks for "${activeQuery}"`);
      const roundResults = await runAll(roundTasks, activeQuery, {
        gateway,
        search: this.deps.search,
        maxSearchResults: config.search.maxResults,
      });
      // Join barrier: the round is merged only once every unit has finished
      allResults.push(...roundResults);

      enter('SYNTHESIZING', iteration);
      synthesis = await synthesize(gateway, activeQuery, roundResults, promptContext);

      enter('DECIDING', iteration);
      const decision = await decideContinuation(gateway, synthesis, iteration, maxIterations);
      decisions.push(decision);

      context = { ...context, sub_tasks: roundTasks, results: [...allResults], synthesis, iteration };
      await this.updateContext(contextId, context);

      if (!decision.needs_more_research || iteration >= maxIterations) {
        break;
      }

      enter('CONTINUING', iteration, decision.reasoning);
      const next = await this.planNextRound(gateway, activeQuery, decision);
      activeQuery = next.query;
      tasks = next.tasks;
    }

    enter('DONE', rounds, `after ${rounds} iteration(s)`);

    const report = await attribute(gateway, synthesis, allResults, config.citationStyle);
    context = { ...context, synthesis: report, results: [...allResults], iteration: rounds };
    await this.updateContext(contextId, context);

    console.error(`[Research] Research complete: ${report.citation_metadata.total_citations} citations over ${report.citation_metadata.sources_used} sources`);

    return {
      query: trimmedQuery,
      context_id: contextId,
      report,
      original_synthesis: synthesis,
      sources_used: extractSources(allResults),
      results: allResults,
      iterations: rounds,
      states,
      decisions,
      timestamp: new Date().toISOString(),
    };
  }

  /**
   * Task set for the next round. A refined query goes back through the planner;
   * otherwise each identified gap becomes its own sub-task.
   */
  private async planNextRound(
    gateway: LLMGateway,
    activeQuery: string,
    decision: ContinuationDecision
  ): Promise<NextRound> {
    const refinedQuery = decision.refined_queries[0];
    if (refinedQuery) {
      console.error(`[Research] Re-decomposing around refined query: "${refinedQuery}"`);
      const refinementPlan = buildRefinementPlan(refinedQuery, decision.specific_gaps);
      return { query: refinedQuery, tasks: await decompose(gateway, refinedQuery, refinementPlan) };
    }

    const gapTasks = buildGapTasks(decision.specific_gaps);
    console.error(`[Research] Created ${gapTasks.length} gap-filling tasks`);
    return { query: activeQuery, tasks: gapTasks };
  }

  async getStatus(query: string): Promise<ResearchStatus> {
    const context = await this.deps.memory.findLatestByQuery(query);
    if (!context) {
      return { found: false, query };
    }
    return {
      found: true,
      query,
      iteration: context.iteration,
      created_at: context.created_at,
      updated_at: context.updated_at,
      has_synthesis: context.synthesis !== null,
    };
  }

  // Memory is best-effort: a broken store must not cost the caller its report

  private async findPrevious(query: string): Promise<ResearchContext | null> {
    try {
      return await this.deps.memory.findLatestByQuery(query);
    } catch (error) {
      console.error('[Memory] Lookup failed:', errorMessage(error));
      return null;
    }
  }

  private async saveContext(context: ResearchContext): Promise<string | null> {
    try {
      return await this.deps.memory.save(context);
    } catch (error) {
      console.error('[Memory] Save failed:', errorMessage(error));
      return null;
    }
  }

  private async updateContext(id: string | null, context: ResearchContext): Promise<void> {
    if (id === null) return;
    try {
      const updated = await this.deps.memory.update(id, context);
      if (!updated) console.error(`[Memory] Context ${id} not found for update`);
    } catch (error) {
      console.error(`[Memory] Update of ${id} failed:`, errorMessage(error));
    }
  }
}

/**
 * Wire the controller from an environment record (process.env under the MCP host).
 * A missing model backend is reported when a run starts, not here.
 */
export function createResearchController(env: Record<string, string | undefined>): ResearchController {
  const config = loadConfig(env);
  let gateway: LLMGateway | null = null;
  try {
    gateway = createLLMGateway(requireLLM(config));
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    console.error(`[Research] ${error.message}`);
  }

  return new ResearchController({
    config,
    gateway,
    search: createPerplexityProvider(config.search.apiKey),
    memory: createMemoryStore(config.memory),
  });
}
