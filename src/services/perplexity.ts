/**
 * Direct Perplexity API integration
 * Uses the Perplexity Search API for ranked web results
 */

import { z } from 'zod';
import { SearchProviderError } from '../errors.js';
import { SearchHit } from '../types/index.js';

export interface SearchProvider {
  search(query: string, maxResults: number): Promise<SearchHit[]>;
}

const searchResponseSchema = z.object({
  results: z.array(z.object({
    title: z.string().optional(),
    url: z.string().optional(),
    snippet: z.string().optional(),
  })).optional(),
});

export async function perplexitySearch(
  query: string,
  maxResults: number,
  apiKey?: string,
  timeout: number = 30000
): Promise<SearchHit[]> {
  if (!apiKey) {
    throw new SearchProviderError('PERPLEXITY_API_KEY is required', query);
  }

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch('https://api.perplexity.ai/search', {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        query,
        max_results: maxResults,
      }),
      signal: controller.signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new SearchProviderError(`Perplexity API error (${response.status}): ${errorText}`, query, response.status);
    }

    const data = searchResponseSchema.parse(await response.json());

    return (data.results || [])
      .slice(0, maxResults)
      .map(r => ({
        title: r.title ?? '',
        link: r.url ?? '',
        snippet: r.snippet ?? '',
      }));
  } catch (error) {
    if (error instanceof SearchProviderError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new SearchProviderError(`Perplexity request failed: ${message}`, query);
  } finally {
    clearTimeout(timeoutId);
  }
}

export function createPerplexityProvider(apiKey?: string): SearchProvider {
  return {
    search: (query, maxResults) => perplexitySearch(query, maxResults, apiKey),
  };
}
