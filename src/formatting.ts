/**
 * Format research outcomes as clean markdown and save them to disk
 */

import { writeFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { ResearchOutcome } from './types/index.js';

// Longest slug taken from the query for report filenames
const MAX_SLUG_CHARS = 80;

function bulletList(items: string[]): string {
  return items.map(item => `- ${item}`).join('\n');
}

/**
 * Render the cited report as markdown.
 * Empty optional sections (gaps, recommendations, sources) are left out.
 */
export function formatMarkdown(outcome: ResearchOutcome): string {
  const { report } = outcome;
  const sections: string[] = [];

  sections.push(`# Research Results: ${outcome.query}\n`);

  sections.push(`## Executive Summary\n`);
  sections.push(report.executive_summary);
  sections.push('');

  if (report.key_findings.length > 0) {
    sections.push(`## Key Findings\n`);
    sections.push(bulletList(report.key_findings));
    sections.push('');
  }

  if (report.detailed_analysis.trim()) {
    sections.push(`## Detailed Analysis\n`);
    sections.push(report.detailed_analysis);
    sections.push('');
  }

  if (report.gaps_identified.length > 0) {
    sections.push(`## Gaps Identified\n`);
    sections.push(bulletList(report.gaps_identified));
    sections.push('');
  }

  if (report.recommendations.length > 0) {
    sections.push(`## Recommendations\n`);
    sections.push(bulletList(report.recommendations));
    sections.push('');
  }

  if (outcome.sources_used.length > 0) {
    sections.push(`## Sources\n`);
    outcome.sources_used.forEach((source, i) => {
      sections.push(`${i + 1}. [${source.title}](${source.url})`);
    });
    sections.push('');
  }

  sections.push('---');
  sections.push(
    `*${outcome.iterations} iteration(s) · ${report.citation_metadata.total_citations} citations · ` +
    `confidence: ${report.confidence_level} · completeness: ${report.completeness_score}/100*`
  );

  return sections.join('\n');
}

/**
 * Filename stem for a saved report: research-YYYY-MM-DD-HHMMSS-<slug>-<rand>
 */
export function generateReportName(query: string, now: Date = new Date()): string {
  // Time plus random suffix keeps similar queries from colliding
  const iso = now.toISOString();
  const date = iso.slice(0, 10);
  const time = iso.slice(11, 19).replaceAll(':', '');
  const rand = Math.random().toString(36).slice(2, 8);

  const slug = query
    .toLowerCase()
    .slice(0, MAX_SLUG_CHARS)
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

  return slug
    ? `research-${date}-${time}-${slug}-${rand}`
    : `research-${date}-${time}-${rand}`;
}

export interface SavedReport {
  jsonPath: string;
  markdownPath: string;
}

/**
 * Write the outcome as <name>.json and its markdown rendering as <name>.md
 */
export async function saveResearchOutcome(outcome: ResearchOutcome, dir: string): Promise<SavedReport> {
  const name = generateReportName(outcome.query);
  const jsonPath = join(dir, `${name}.json`);
  const markdownPath = join(dir, `${name}.md`);

  await mkdir(dir, { recursive: true });
  await writeFile(jsonPath, JSON.stringify(outcome, null, 2), 'utf-8');
  await writeFile(markdownPath, formatMarkdown(outcome), 'utf-8');

  console.error(`[Reports] Saved report to: ${markdownPath}`);
  return { jsonPath, markdownPath };
}
