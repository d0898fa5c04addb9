import { z } from 'zod';
import { LLMGateway } from './clients/llm.js';
import { ResearchRole, askRole } from './roles.js';
import { confidence, score, text, textList } from './parsing.js';
import { LEAD_RESEARCHER_SYSTEM } from './planning.js';
import { ContinuationDecision, SubTaskResult, Synthesis } from './types/index.js';

export const DEFAULT_MAX_ITERATIONS = 3;

// Per sub-task, how many search hits are shown to the synthesizer
const RESULTS_PER_TASK_IN_PROMPT = 5;

const synthesisSchema = z.object({
  executive_summary: z.string(),
  key_findings: textList(),
  detailed_analysis: text(),
  sources: textList(),
  gaps_identified: textList(),
  recommendations: textList(),
  confidence_level: confidence(),
  completeness_score: score(70),
});

type SynthesisBody = z.infer<typeof synthesisSchema>;

interface SynthesisInput {
  query: string;
  results: SubTaskResult[];
}

/**
 * Compact, JSON-friendly view of sub-task results for the synthesis prompt
 */
export function summarizeResultsForPrompt(results: SubTaskResult[]): unknown[] {
  return results.map(r => {
    const base = {
      agent_id: r.agent_id,
      task: r.task.title,
      focus_area: r.task.focus_area,
      top_results: r.search_results
        .slice(0, RESULTS_PER_TASK_IN_PROMPT)
        .map(s => ({ title: s.title, url: s.url })),
    };
    return r.error !== undefined
      ? { ...base, error: r.error }
      : { ...base, evaluation: r.evaluation };
  });
}

export function createFallbackSynthesis(query: string, rawReply: string): SynthesisBody {
  return {
    executive_summary: `Research completed on ${query}`,
    key_findings: ['Research findings compiled from multiple sources'],
    detailed_analysis: rawReply,
    sources: [],
    gaps_identified: [],
    recommendations: [],
    confidence_level: 'medium',
    completeness_score: 70,
  };
}

const synthesisRole: ResearchRole<SynthesisInput, typeof synthesisSchema> = {
  tag: 'Synthesis',
  system: LEAD_RESEARCHER_SYSTEM,
  schema: synthesisSchema,
  fallback: ({ query }, rawReply) => createFallbackSynthesis(query, rawReply),
  buildPrompt: ({ query, results }) => `
Research Query: ${query}
Subagent Results: ${JSON.stringify(summarizeResultsForPrompt(results), null, 2)}

Synthesize these results into a comprehensive research report.
Some subagents may have failed (they carry an "error" field); note the gap rather than guessing.

Respond with a JSON object containing:
{
  "executive_summary": "Brief overview of findings",
  "key_findings": ["list of main findings"],
  "detailed_analysis": "Comprehensive analysis of the research",
  "sources": ["list of sources used"],
  "gaps_identified": ["any gaps in the research"],
  "recommendations": ["recommendations for further research"],
  "confidence_level": "high/medium/low",
  "completeness_score": <0-100>
}

Return ONLY the JSON, no explanation.
`.trim(),
};

/**
 * Merge one round's sub-task results into a single report. Never throws.
 */
export async function synthesize(
  gateway: LLMGateway,
  query: string,
  results: SubTaskResult[],
  context?: Record<string, unknown>
): Promise<Synthesis> {
  const reply = await askRole(gateway, synthesisRole, { query, results }, { context });
  const synthesis: Synthesis = {
    query,
    ...reply.value,
    synthesis_timestamp: new Date().toISOString(),
  };

  console.error(`[Synthesis] ${reply.status === 'ok' ? 'Synthesized' : 'Fallback synthesis for'} "${query}": ${synthesis.key_findings.length} findings, confidence=${synthesis.confidence_level}, completeness=${synthesis.completeness_score}`);
  return synthesis;
}

const booleanish = z.preprocess(
  value => (value === 'true' ? true : value === 'false' ? false : value),
  z.boolean()
);

const decisionSchema = z.object({
  needs_more_research: booleanish,
  reasoning: text('No reasoning provided'),
  specific_gaps: textList(),
  refined_queries: textList(),
  priority: confidence(),
});

interface DecisionInput {
  synthesis: Synthesis;
  iteration: number;
  maxIterations: number;
}

/**
 * Numeric stop rule used whenever the judge's reply is unusable.
 * This is what bounds the loop when the gateway misbehaves.
 */
export function createFallbackDecision(iteration: number, maxIterations: number): ContinuationDecision {
  return {
    needs_more_research: iteration < maxIterations,
    reasoning: `Default decision based on iteration ${iteration}`,
    specific_gaps: [],
    refined_queries: [],
    priority: 'medium',
    current_iteration: iteration,
  };
}

const decisionRole: ResearchRole<DecisionInput, typeof decisionSchema> = {
  tag: 'Synthesis',
  system: LEAD_RESEARCHER_SYSTEM,
  schema: decisionSchema,
  fallback: ({ iteration, maxIterations }) => createFallbackDecision(iteration, maxIterations),
  buildPrompt: ({ synthesis, iteration, maxIterations }) => `
Current Research Synthesis: ${JSON.stringify(synthesis, null, 2)}
Current Iteration: ${iteration} of at most ${maxIterations}

Evaluate if additional research is needed based on:
1. Completeness of findings
2. Confidence level
3. Identified gaps
4. Quality of sources

Respond with a JSON object:
{
  "needs_more_research": true/false,
  "reasoning": "explanation of decision",
  "specific_gaps": ["specific areas that need more research"],
  "refined_queries": ["specific queries for next iteration"],
  "priority": "high/medium/low"
}

Return ONLY the JSON, no explanation.
`.trim(),
};

export async function decideContinuation(
  gateway: LLMGateway,
  synthesis: Synthesis,
  iteration: number,
  maxIterations: number = DEFAULT_MAX_ITERATIONS
): Promise<ContinuationDecision> {
  const reply = await askRole(gateway, decisionRole, { synthesis, iteration, maxIterations });
  const decision: ContinuationDecision = { ...reply.value, current_iteration: iteration };

  console.error(`[Synthesis] Iteration ${iteration}: needs_more_research=${decision.needs_more_research} (${decision.specific_gaps.length} gaps, ${decision.refined_queries.length} refined queries)`);
  return decision;
}
