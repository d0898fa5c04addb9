import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { LLMConfig, LLMProvider } from './clients/llm.js';
import { CitationStyle } from './types/index.js';

export type MemoryType = 'file' | 'in_memory';

export interface ResearchConfig {
  llm: LLMConfig | null;  // null = no backend configured (fatal at run start)
  search: {
    apiKey?: string;
    maxResults: number;
  };
  maxIterations: number;
  maxSubagents: number;
  researchTimeoutMs: number;
  citationStyle: CitationStyle;
  memory: {
    type: MemoryType;
    directory: string;
  };
  reportsDir: string;
}

const DEFAULT_MODELS: Record<LLMProvider, string> = {
  openai: 'gpt-4o-mini',
  gemini: 'gemini-2.5-flash',
  anthropic: 'claude-3-5-haiku-latest',
};

const KEY_VARS: Record<LLMProvider, string> = {
  openai: 'OPENAI_API_KEY',
  gemini: 'GEMINI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  LLM_PROVIDER: z.enum(['openai', 'gemini', 'anthropic']).optional(),
  LLM_MODEL: z.string().min(1).optional(),
  LLM_TIMEOUT_MS: positiveInt(60000),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  OPENAI_API_KEY: z.string().min(1).optional(),
  GEMINI_API_KEY: z.string().min(1).optional(),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  PERPLEXITY_API_KEY: z.string().min(1).optional(),
  MAX_SEARCH_RESULTS: positiveInt(10),
  MAX_ITERATIONS: positiveInt(3),
  MAX_SUBAGENTS: positiveInt(4),
  RESEARCH_TIMEOUT_SECONDS: positiveInt(300),
  CITATION_STYLE: z.enum(['markdown', 'apa', 'mla']).default('markdown'),
  MEMORY_TYPE: z.enum(['file', 'in_memory']).default('file'),
  RESEARCH_MEMORY_DIR: z.string().min(1).optional(),
  RESEARCH_REPORTS_DIR: z.string().min(1).optional(),
});

type ParsedEnv = z.infer<typeof envSchema>;

/**
 * Build the run configuration from an environment record.
 * Empty strings count as unset (MCP hosts often pass "" for blank fields).
 */
export function loadConfig(env: Record<string, string | undefined>): ResearchConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') cleaned[key] = value.trim();
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigurationError(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;

  return {
    llm: resolveLLM(e),
    search: {
      apiKey: e.PERPLEXITY_API_KEY,
      maxResults: e.MAX_SEARCH_RESULTS,
    },
    maxIterations: e.MAX_ITERATIONS,
    maxSubagents: e.MAX_SUBAGENTS,
    researchTimeoutMs: e.RESEARCH_TIMEOUT_SECONDS * 1000,
    citationStyle: e.CITATION_STYLE,
    memory: {
      type: e.MEMORY_TYPE,
      directory: e.RESEARCH_MEMORY_DIR ?? join(homedir(), '.research-memory'),
    },
    reportsDir: e.RESEARCH_REPORTS_DIR ?? join(homedir(), 'research-reports'),
  };
}

function resolveLLM(e: ParsedEnv): LLMConfig | null {
  const keys: Record<LLMProvider, string | undefined> = {
    openai: e.OPENAI_API_KEY,
    gemini: e.GEMINI_API_KEY,
    anthropic: e.ANTHROPIC_API_KEY,
  };

  let provider: LLMProvider | undefined = e.LLM_PROVIDER;
  if (!provider) {
    provider = (['openai', 'gemini', 'anthropic'] as const).find(p => keys[p]);
  }
  if (!provider) return null;

  const apiKey = keys[provider];
  if (!apiKey) return null;

  return {
    provider,
    model: e.LLM_MODEL ?? DEFAULT_MODELS[provider],
    apiKey,
    timeout: e.LLM_TIMEOUT_MS,
    temperature: e.LLM_TEMPERATURE,
  };
}

/**
 * Fail fast when no model backend is usable
 */
export function requireLLM(config: ResearchConfig): LLMConfig {
  if (!config.llm) {
    const vars = Object.values(KEY_VARS).join(', ');
    throw new ConfigurationError(`No LLM configuration found. Set one of ${vars} (and LLM_PROVIDER if it names a specific one)`);
  }
  return config.llm;
}

function mask(secret?: string): string {
  if (!secret) return 'not set';
  return secret.length <= 4 ? '****' : `****${secret.slice(-4)}`;
}

/**
 * Printable view of the configuration with secrets masked
 */
export function describeConfig(config: ResearchConfig): Record<string, string | number> {
  return {
    llm_provider: config.llm?.provider ?? 'not configured',
    llm_model: config.llm?.model ?? '-',
    llm_api_key: mask(config.llm?.apiKey),
    search_engine: 'perplexity',
    search_api_key: mask(config.search.apiKey),
    max_search_results: config.search.maxResults,
    max_iterations: config.maxIterations,
    max_subagents: config.maxSubagents,
    research_timeout_seconds: config.researchTimeoutMs / 1000,
    citation_style: config.citationStyle,
    memory_type: config.memory.type,
    memory_directory: config.memory.directory,
    reports_directory: config.reportsDir,
  };
}
