export type Confidence = 'high' | 'medium' | 'low';

export type CitationStyle = 'markdown' | 'apa' | 'mla';

/**
 * Research plan produced once per top-level query
 */
export interface Plan {
  objectives: string[];
  scope: string;
  key_areas: string[];
  methodologies: string[];
  success_criteria: string[];
  estimated_iterations: number;  // >= 1
}

/**
 * One unit of focused research, consumed by exactly one Task Runner invocation
 */
export interface SubTask {
  id: string;              // Unique within a round, e.g. "task_1" or "gap_task_2"
  title: string;
  description: string;
  focus_area: string;
  search_queries: string[];
  expected_output: string;
}

/**
 * Raw hit as returned by a search provider
 */
export interface SearchHit {
  title: string;
  link: string;
  snippet: string;
}

export interface SearchResult {
  title: string;
  url: string;       // Identity key, not unique across results
  snippet: string;
  query: string;     // Originating search query
}

export interface Evaluation {
  summary: string;
  key_insights: string[];
  credible_sources: string[];
  limitations: string[];
  confidence: Confidence;
  relevance_score: number;  // 0-100
  sources_analyzed: number;
}

interface SubTaskResultBase {
  agent_id: string;
  task: SubTask;
  search_results: SearchResult[];
  timestamp: string;
}

export interface SubTaskSuccess extends SubTaskResultBase {
  evaluation: Evaluation;
  error?: undefined;
}

export interface SubTaskFailure extends SubTaskResultBase {
  evaluation?: undefined;
  error: string;
}

/**
 * Either an evaluation or an error, never both
 */
export type SubTaskResult = SubTaskSuccess | SubTaskFailure;

export interface Source {
  url: string;       // Identity
  title: string;
  domain: string;
  context: string;
}

export interface Synthesis {
  query: string;
  executive_summary: string;
  key_findings: string[];
  detailed_analysis: string;
  sources: string[];
  gaps_identified: string[];
  recommendations: string[];
  confidence_level: Confidence;
  completeness_score: number;  // 0-100
  synthesis_timestamp: string;
}

export interface ContinuationDecision {
  needs_more_research: boolean;
  reasoning: string;
  specific_gaps: string[];
  refined_queries: string[];
  priority: Confidence;
  current_iteration: number;
}

export interface Citation {
  claim: string;
  source_index: number;   // Valid index into the deduplicated source list
  source_url: string;
  source_title: string;
  citation_markup: string;
}

export interface CitationMetadata {
  total_citations: number;
  sources_used: number;
  style: CitationStyle;
}

export interface CitedReport extends Synthesis {
  citations: Citation[];
  citation_metadata: CitationMetadata;
}

/**
 * Persisted research state, one per orchestration run
 */
export interface ResearchContext {
  query: string;
  plan: Plan;
  sub_tasks: SubTask[];
  results: SubTaskResult[];
  synthesis: Synthesis | CitedReport | null;
  iteration: number;
  created_at: string;
  updated_at: string;
}

export type ControllerState =
  | 'PLANNING'
  | 'DECOMPOSED'
  | 'RUNNING_SUBTASKS'
  | 'SYNTHESIZING'
  | 'DECIDING'
  | 'CONTINUING'
  | 'DONE';

/**
 * Final artifact of one run (JSON-compatible)
 */
export interface ResearchOutcome {
  query: string;
  context_id: string | null;  // null when the memory store was unavailable
  report: CitedReport;
  original_synthesis: Synthesis;
  sources_used: Source[];
  results: SubTaskResult[];
  iterations: number;
  states: ControllerState[];
  decisions: ContinuationDecision[];
  timestamp: string;
}

export type ResearchStatus =
  | {
      found: true;
      query: string;
      iteration: number;
      created_at: string;
      updated_at: string;
      has_synthesis: boolean;
    }
  | { found: false; query: string };
