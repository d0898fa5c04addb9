import { z } from 'zod';
import { LLMGateway } from './clients/llm.js';
import { ResearchRole, askRole } from './roles.js';
import { Citation, CitationStyle, CitedReport, Source, SubTaskResult, Synthesis } from './types/index.js';

// Snippet length shown per source in the attribution prompt
const CONTEXT_PREVIEW_CHARS = 200;

const CITATION_SYSTEM = `You are a CitationAgent responsible for processing research reports and inserting proper citations.

Your responsibilities:
1. Identify statements that need citations
2. Match statements to appropriate sources
3. Insert citations in the specified format
4. Ensure all claims are properly attributed
5. Maintain the original content while adding citations

Always respond in JSON format for structured data processing.
Be thorough in citation placement and maintain academic standards.`;

export function extractDomain(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

/**
 * Collect every source seen across all rounds, deduplicated by url (first seen wins).
 * Search hits come first within a result, then the subagent's credible sources.
 */
export function extractSources(results: SubTaskResult[]): Source[] {
  const sources: Source[] = [];
  const seen = new Set<string>();

  const add = (source: Source) => {
    if (!source.url || seen.has(source.url)) return;
    seen.add(source.url);
    sources.push(source);
  };

  for (const result of results) {
    for (const hit of result.search_results) {
      add({
        url: hit.url,
        title: hit.title,
        domain: extractDomain(hit.url),
        context: hit.snippet,
      });
    }

    for (const url of result.evaluation?.credible_sources ?? []) {
      add({
        url,
        title: `Source from ${result.agent_id}`,
        domain: extractDomain(url),
        context: 'Credible source identified by subagent',
      });
    }
  }

  return sources;
}

/**
 * Citation text for a source in the configured style (index is 0-based)
 */
export function formatCitationMarkup(source: Source, index: number, style: CitationStyle): string {
  switch (style) {
    case 'apa':
      return `(${source.title}, ${source.domain})`;
    case 'mla':
      return `("${source.title}")`;
    default:
      return `[Source ${index + 1}](${source.url})`;
  }
}

function styleInstruction(style: CitationStyle): string {
  switch (style) {
    case 'apa':
      return 'APA-style parenthetical: (Title, domain)';
    case 'mla':
      return 'MLA-style parenthetical: ("Title")';
    default:
      return 'markdown link: [Source X](url), where X is the source number shown below';
  }
}

const rawCitationSchema = z.object({
  claim: z.string().catch(''),
  source_index: z.number(),
  citation_markup: z.string().optional().catch(undefined),
  citation_markdown: z.string().optional().catch(undefined),
});

const sectionSchema = z.object({
  cited_content: z.string(),
  citations: z.array(z.unknown()).catch([]),
});

type SectionReply = z.infer<typeof sectionSchema>;

interface SectionInput {
  content: string;
  sources: Source[];
  style: CitationStyle;
}

const sectionRole: ResearchRole<SectionInput, typeof sectionSchema> = {
  tag: 'Citations',
  system: CITATION_SYSTEM,
  schema: sectionSchema,
  fallback: ({ content }): SectionReply => ({ cited_content: content, citations: [] }),
  buildPrompt: ({ content, sources, style }) => {
    const sourcesText = sources
      .map((s, i) => `Source ${i + 1} (source_index ${i}): ${s.title} (${s.url}) - ${s.context.slice(0, CONTEXT_PREVIEW_CHARS)}`)
      .join('\n');

    return `
Content to process:
${content}

Available sources:
${sourcesText}

Analyze the content and identify statements that need citations. For each statement that requires a citation:
1. Identify the specific claim or fact
2. Match it to the most appropriate source
3. Insert a citation as a ${styleInstruction(style)}

Keep the content otherwise unchanged, including its line breaks.

Respond with a JSON object:
{
  "cited_content": "content with citations inserted",
  "citations": [
    {
      "claim": "specific claim that was cited",
      "source_index": <0-based index of source>,
      "citation_markup": "the citation text you inserted"
    }
  ]
}

Return ONLY the JSON, no explanation.
`.trim();
  },
};

/**
 * Keep only citations whose source_index points into the source list,
 * back-filling url, title and markup from the source entry.
 */
export function validateCitations(entries: unknown[], sources: Source[], style: CitationStyle): Citation[] {
  const citations: Citation[] = [];

  for (const entry of entries) {
    const parsed = rawCitationSchema.safeParse(entry);
    if (!parsed.success) continue;

    const { claim, source_index, citation_markup, citation_markdown } = parsed.data;
    if (!Number.isInteger(source_index) || source_index < 0 || source_index >= sources.length) {
      console.error(`[Citations] Dropping citation with out-of-range source_index ${source_index}`);
      continue;
    }

    const source = sources[source_index];
    citations.push({
      claim,
      source_index,
      source_url: source.url,
      source_title: source.title,
      citation_markup: citation_markup || citation_markdown || formatCitationMarkup(source, source_index, style),
    });
  }

  return citations;
}

interface SectionOutcome {
  content: string;
  citations: Citation[];
}

async function citeSection(
  gateway: LLMGateway,
  name: string,
  content: string,
  sources: Source[],
  style: CitationStyle
): Promise<SectionOutcome> {
  if (!content.trim() || sources.length === 0) {
    return { content, citations: [] };
  }

  const reply = await askRole(gateway, sectionRole, { content, sources, style });
  if (reply.status === 'degraded') {
    console.error(`[Citations] Section ${name} passed through without citations`);
    return { content, citations: [] };
  }

  const citations = validateCitations(reply.value.citations, sources, style);
  console.error(`[Citations] Section ${name}: ${citations.length} citations`);
  return { content: reply.value.cited_content, citations };
}

/**
 * Insert citations into the synthesis, section by section.
 * A failing section passes through unchanged; the rest of the report is unaffected.
 */
export async function attribute(
  gateway: LLMGateway,
  synthesis: Synthesis,
  allResults: SubTaskResult[],
  style: CitationStyle = 'markdown'
): Promise<CitedReport> {
  const sources = extractSources(allResults);
  console.error(`[Citations] ${sources.length} unique sources from ${allResults.length} sub-task results`);

  const [summary, analysis, findings] = await Promise.all([
    citeSection(gateway, 'executive_summary', synthesis.executive_summary, sources, style),
    citeSection(gateway, 'detailed_analysis', synthesis.detailed_analysis, sources, style),
    citeSection(gateway, 'key_findings', synthesis.key_findings.join('\n'), sources, style),
  ]);

  const keyFindings = findings.content === synthesis.key_findings.join('\n')
    ? [...synthesis.key_findings]
    : findings.content.split('\n').map(line => line.trim()).filter(line => line.length > 0);

  const citations = [...summary.citations, ...analysis.citations, ...findings.citations];

  return {
    ...synthesis,
    executive_summary: summary.content,
    detailed_analysis: analysis.content,
    key_findings: keyFindings,
    citations,
    citation_metadata: {
      total_citations: citations.length,
      sources_used: sources.length,
      style,
    },
  };
}
