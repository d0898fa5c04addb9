import { z } from 'zod';

export type LLMProvider = 'gemini' | 'openai' | 'anthropic';

export interface LLMConfig {
  provider: LLMProvider;
  model: string;
  apiKey: string;
  timeout?: number;  // Timeout in milliseconds (default: 60000)
  maxOutputTokens?: number;  // Max output tokens (default: 4096)
  temperature?: number;  // Temperature for sampling (default: 0.1)
}

export interface LLMResponse {
  model: string;
  content: string;
}

/**
 * Opaque completion capability consumed by every research role.
 * Replies are plain text; JSON shape is a convention between caller and prompt.
 */
export interface LLMGateway {
  complete(systemRole: string, prompt: string, context?: Record<string, unknown>): Promise<string>;
}

export class LLMError extends Error {
  constructor(
    message: string,
    public readonly model: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'LLMError';
  }
}

// Provider reply shapes, reduced to the fields we read
const geminiResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).optional(),
    }).optional(),
  })).optional(),
});

const openAIResponseSchema = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullable().optional() }).optional(),
  })).optional(),
});

const anthropicResponseSchema = z.object({
  content: z.array(z.object({
    type: z.string().optional(),
    text: z.string().optional(),
  })).optional(),
});

/**
 * Call Gemini API directly using native fetch
 */
async function callGemini(
  system: string,
  prompt: string,
  model: string,
  apiKey: string,
  timeout: number,
  maxOutputTokens: number,
  temperature: number
): Promise<string> {
  const url = `https://generativelanguage.googleapis.com/v1beta/models/${model}:generateContent?key=${apiKey}`;

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        systemInstruction: { parts: [{ text: system }] },
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: { temperature, maxOutputTokens },
      }),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`Gemini API error: ${response.status} ${response.statusText}`);
    }

    const data = geminiResponseSchema.parse(await response.json());
    return data.candidates?.[0]?.content?.parts?.[0]?.text || '';
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Call OpenAI API directly using native fetch
 */
async function callOpenAI(
  system: string,
  prompt: string,
  model: string,
  apiKey: string,
  timeout: number,
  maxOutputTokens: number,
  temperature: number
): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch('https://api.openai.com/v1/chat/completions', {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model,
        messages: [
          { role: 'system', content: system },
          { role: 'user', content: prompt },
        ],
        max_completion_tokens: maxOutputTokens,
        temperature,
      }),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`OpenAI API error: ${response.status} ${response.statusText}`);
    }

    const data = openAIResponseSchema.parse(await response.json());
    return data.choices?.[0]?.message?.content || '';
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Call Anthropic API directly using native fetch
 */
async function callAnthropic(
  system: string,
  prompt: string,
  model: string,
  apiKey: string,
  timeout: number,
  maxOutputTokens: number,
  temperature: number
): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch('https://api.anthropic.com/v1/messages', {
      method: 'POST',
      headers: {
        'x-api-key': apiKey,
        'anthropic-version': '2023-06-01',
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model,
        system,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: maxOutputTokens,
        temperature,
      }),
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new Error(`Anthropic API error: ${response.status} ${response.statusText}`);
    }

    const data = anthropicResponseSchema.parse(await response.json());
    return data.content?.find(block => block.type === 'text')?.text || '';
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Call a single LLM. An empty reply comes back as ''; transport and
 * provider errors are raised as LLMError.
 */
export async function callLLM(
  system: string,
  prompt: string,
  config: LLMConfig
): Promise<LLMResponse> {
  const timeout = config.timeout || 60000;
  const maxOutputTokens = config.maxOutputTokens || 4096;
  const temperature = config.temperature ?? 0.1;

  try {
    let content: string;

    if (config.provider === 'gemini') {
      content = await callGemini(system, prompt, config.model, config.apiKey, timeout, maxOutputTokens, temperature);
    } else if (config.provider === 'openai') {
      content = await callOpenAI(system, prompt, config.model, config.apiKey, timeout, maxOutputTokens, temperature);
    } else {
      content = await callAnthropic(system, prompt, config.model, config.apiKey, timeout, maxOutputTokens, temperature);
    }

    if (content.length === 0) {
      console.error(`[LLM] ${config.model} returned an empty reply`);
    }

    return { model: config.model, content };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[LLM] ${config.model} failed:`, message);
    throw new LLMError(`LLM call failed: ${message}`, config.model, error);
  }
}

/**
 * Render a context mapping as "key: value" lines
 */
export function formatContext(context: Record<string, unknown>): string {
  return Object.entries(context)
    .filter(([, value]) => value !== undefined && value !== null)
    .map(([key, value]) => `${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join('\n');
}

/**
 * Gateway backed by a single configured provider.
 * Provider failures surface as LLMError; an empty reply is returned as ''.
 */
export function createLLMGateway(config: LLMConfig): LLMGateway {
  return {
    async complete(systemRole, prompt, context) {
      const fullPrompt = context && Object.keys(context).length > 0
        ? `Context:\n${formatContext(context)}\n\n${prompt}`
        : prompt;

      const response = await callLLM(systemRole, fullPrompt, config);
      return response.content;
    },
  };
}
