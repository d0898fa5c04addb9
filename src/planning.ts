import { z } from 'zod';
import { LLMGateway } from './clients/llm.js';
import { ResearchRole, askRole } from './roles.js';
import { text, textList } from './parsing.js';
import { Plan, SubTask } from './types/index.js';

export const MIN_TASKS = 2;
export const MAX_TASKS = 4;

export const LEAD_RESEARCHER_SYSTEM = `You are a LeadResearcher agent responsible for planning, coordinating, and synthesizing research.

Your responsibilities:
1. Plan research approaches for complex queries
2. Decompose research tasks into parallelizable sub-tasks
3. Synthesize results from multiple subagents
4. Determine if additional research iterations are needed
5. Ensure comprehensive coverage of the research topic

Always respond in JSON format for structured data processing.
Be thorough, analytical, and systematic in your approach.`;

const planSchema = z.object({
  objectives: textList().refine(list => list.length > 0, 'objectives must not be empty'),
  scope: text('Comprehensive research on the given topic'),
  key_areas: textList(),
  methodologies: textList(),
  success_criteria: textList(),
  estimated_iterations: z.coerce.number().catch(1).transform(n => (Number.isFinite(n) ? Math.max(1, Math.round(n)) : 1)),
});

/**
 * Deterministic plan seeded from the query; used whenever the planner reply is unusable
 */
export function createFallbackPlan(query: string): Plan {
  return {
    objectives: [query],
    scope: 'Comprehensive research on the given topic',
    key_areas: ['General information', 'Current trends', 'Expert opinions'],
    methodologies: ['Web search', 'Content analysis'],
    success_criteria: ['Comprehensive coverage', 'Verified sources'],
    estimated_iterations: 2,
  };
}

const planRole: ResearchRole<{ query: string }, typeof planSchema> = {
  tag: 'Planning',
  system: LEAD_RESEARCHER_SYSTEM,
  schema: planSchema,
  fallback: ({ query }) => createFallbackPlan(query),
  buildPrompt: ({ query }) => `
Research Query: ${query}

Create a comprehensive research plan that includes:
1. Research objectives and scope
2. Key areas to investigate
3. Potential sources and methodologies
4. Success criteria
5. Timeline considerations

Respond with a JSON object containing:
{
  "objectives": ["list of research objectives"],
  "scope": "description of research scope",
  "key_areas": ["list of key areas to investigate"],
  "methodologies": ["list of research methodologies"],
  "success_criteria": ["list of success criteria"],
  "estimated_iterations": <number>
}

Return ONLY the JSON, no explanation.
`.trim(),
};

export async function plan(
  gateway: LLMGateway,
  query: string,
  context?: Record<string, unknown>
): Promise<Plan> {
  const reply = await askRole(gateway, planRole, { query }, { context });
  console.error(`[Planning] Plan ${reply.status === 'ok' ? 'created' : 'fell back'}: ${reply.value.objectives.length} objectives, ${reply.value.key_areas.length} key areas`);
  return reply.value;
}

/**
 * Canned two-task decomposition derived mechanically from the query
 */
export function createFallbackTasks(query: string): SubTask[] {
  return [
    {
      id: 'task_1',
      title: 'General Information Search',
      description: `Search for general information about ${query}`,
      focus_area: 'Overview and basics',
      search_queries: [query, `what is ${query}`],
      expected_output: 'Comprehensive overview of the topic',
    },
    {
      id: 'task_2',
      title: 'Current Trends and Developments',
      description: `Find current trends and recent developments related to ${query}`,
      focus_area: 'Recent developments',
      search_queries: [`${query} trends`, `${query} latest`],
      expected_output: 'Current state and trends',
    },
  ];
}

const rawTaskSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).optional().catch(undefined),
  title: text(),
  description: text(),
  focus_area: text(),
  search_queries: textList(),
  expected_output: text(),
});

const taskListSchema = z.union([
  z.array(z.unknown()),
  z.object({ tasks: z.array(z.unknown()) }).transform(wrapper => wrapper.tasks),
]);

/**
 * Give every task a unique id; missing or duplicate ids become task_<position>
 */
function assignIds(tasks: SubTask[]): SubTask[] {
  const seen = new Set<string>();
  return tasks.map((task, i) => {
    let id = task.id.trim();
    if (!id || seen.has(id)) {
      id = `task_${i + 1}`;
      let suffix = 2;
      while (seen.has(id)) id = `task_${i + 1}_${suffix++}`;
    }
    seen.add(id);
    return { ...task, id };
  });
}

/**
 * Enforce the structural contract on whatever the decomposer returned:
 * MIN_TASKS..MAX_TASKS tasks, unique ids, every field present, at least one search query.
 */
export function normalizeTasks(entries: unknown[], query: string): SubTask[] {
  const tasks: SubTask[] = [];

  for (const entry of entries) {
    if (tasks.length === MAX_TASKS) break;
    const parsed = rawTaskSchema.safeParse(entry);
    if (!parsed.success) continue;

    const raw = parsed.data;
    if (!raw.title && !raw.description && raw.search_queries.length === 0) continue;

    const title = raw.title || raw.focus_area || `Research task ${tasks.length + 1}`;
    tasks.push({
      id: raw.id ?? '',
      title,
      description: raw.description || title,
      focus_area: raw.focus_area || title,
      search_queries: raw.search_queries.length > 0 ? raw.search_queries : [raw.title || query],
      expected_output: raw.expected_output || 'Relevant findings for this focus area',
    });
  }

  if (tasks.length < MIN_TASKS) {
    for (const canned of createFallbackTasks(query)) {
      if (tasks.length >= MIN_TASKS) break;
      tasks.push({ ...canned, id: tasks.length === 0 ? canned.id : '' });
    }
  }

  return assignIds(tasks);
}

interface DecomposeInput {
  query: string;
  plan: Plan;
}

const decomposeRole: ResearchRole<DecomposeInput, typeof taskListSchema> = {
  tag: 'Planning',
  system: LEAD_RESEARCHER_SYSTEM,
  schema: taskListSchema,
  fallback: ({ query }) => createFallbackTasks(query),
  buildPrompt: ({ query, plan }) => `
Research Query: ${query}
Research Plan: ${JSON.stringify(plan, null, 2)}

Decompose this research into ${MIN_TASKS}-${MAX_TASKS} parallelizable sub-tasks that can be executed by different subagents.
Each sub-task should focus on a specific aspect of the research.

Respond with a JSON array of sub-tasks:
[
  {
    "id": "task_1",
    "title": "Task title",
    "description": "Detailed task description",
    "focus_area": "Specific area of focus",
    "search_queries": ["specific search terms to use"],
    "expected_output": "What this task should produce"
  }
]

Return ONLY the JSON, no explanation.
`.trim(),
};

export async function decompose(
  gateway: LLMGateway,
  query: string,
  plan: Plan,
  context?: Record<string, unknown>
): Promise<SubTask[]> {
  const reply = await askRole(gateway, decomposeRole, { query, plan }, { context });
  const tasks = normalizeTasks(reply.value, query);
  console.error(`[Planning] Decomposed into ${tasks.length} sub-tasks: ${tasks.map(t => t.id).join(', ')}`);
  return tasks;
}

/**
 * Synthetic plan used to re-decompose around a refined query
 */
export function buildRefinementPlan(refinedQuery: string, gaps: string[]): Plan {
  return {
    objectives: [`Refined research on: ${refinedQuery}`],
    scope: 'Addressing identified gaps',
    key_areas: gaps.length > 0 ? [...gaps] : ['General research'],
    methodologies: ['Web search', 'Content analysis'],
    success_criteria: ['Address identified gaps'],
    estimated_iterations: 1,
  };
}

/**
 * One sub-task per identified gap, bypassing the decomposer
 */
export function buildGapTasks(gaps: string[]): SubTask[] {
  const targets = gaps.length > 0 ? gaps : ['General follow-up research'];
  return targets.map((gap, i) => ({
    id: `gap_task_${i + 1}`,
    title: `Address Gap: ${gap}`,
    description: `Research to address the identified gap: ${gap}`,
    focus_area: gap,
    search_queries: [gap, `${gap} research`, `${gap} latest`],
    expected_output: `Information to address the gap: ${gap}`,
  }));
}
