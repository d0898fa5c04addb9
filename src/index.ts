#!/usr/bin/env node
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { ResearchController, createResearchController } from './controller.js';
import { jobs, loadJob } from './jobs.js';
import { submitResearchJob } from './job-orchestrator.js';

// Create the MCP server
const server = new McpServer({
  name: 'iterative-research-mcp',
  version: '1.0.0',
});

// Created on first use so process.env has been populated by the MCP host
let controller: ResearchController | null = null;

function getController(): ResearchController {
  if (!controller) {
    controller = createResearchController(process.env);
  }
  return controller;
}

function jsonContent(value: unknown, isError = false) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(value, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

server.registerTool(
  'start_research',
  {
    title: 'Iterative Multi-Agent Research (Async)',
    description: `Runs **iterative multi-agent research** on a query: a lead researcher plans the work and splits it into focused sub-tasks, parallel subagents search and evaluate sources, findings are synthesized, and the loop continues on identified gaps until the research is judged complete or the iteration bound is reached. The final report carries citations checked against the collected sources.

**When to use this tool:**
- Investigating a topic that needs several angles covered
- Comparing approaches, products or positions with sourced evidence
- Building a cited overview of recent developments

Returns a job id immediately. Poll \`check_research_status\` for the result.`,
    inputSchema: {
      query: z.string().min(1).describe('The research question. Example: "What are the trade-offs of event sourcing for small teams?"'),
      max_iterations: z
        .number()
        .int()
        .min(1)
        .max(10)
        .optional()
        .describe('Upper bound on research rounds. Defaults to MAX_ITERATIONS (3).'),
    },
  },
  async ({ query, max_iterations }) => {
    const { job, started, settled } = await submitResearchJob({ query, max_iterations }, getController);
    settled.catch(error => console.error(`[Jobs] Background run for ${job.id} crashed:`, error));

    if (!started) {
      return jsonContent({
        job_id: job.id,
        status: job.status,
        error: job.error,
        query,
      }, true);
    }

    return jsonContent({
      job_id: started.jobId,
      status: 'pending',
      message: `Research job started with up to ${started.maxIterations} iteration(s). Poll check_research_status every ~30 seconds; the job fails if it runs longer than ${started.timeoutSeconds} seconds.`,
      max_iterations: started.maxIterations,
      timeout_seconds: started.timeoutSeconds,
      query,
    });
  }
);

server.registerTool(
  'check_research_status',
  {
    title: 'Check Research Job Status',
    description: `Check the status of an async research job started with start_research.

**Status values:**
- pending: Job is queued
- running: Research is in progress, progress shows the current state and iteration
- completed: Research finished, the markdown report is returned
- failed: Research failed, error is included`,
    inputSchema: {
      job_id: z.string().describe('The job_id returned from start_research'),
    },
  },
  async ({ job_id }) => {
    // First check in-memory cache
    let job = jobs.get(job_id);

    // If not in memory, try loading from file (handles server restart case)
    if (!job) {
      const fileJob = await loadJob(job_id);
      if (fileJob) {
        job = fileJob;
        jobs.set(job_id, job);
        console.error(`[Jobs] Loaded job ${job_id} from file`);
      }
    }

    if (!job) {
      return jsonContent({
        error: 'Job not found',
        message: `No job with ID "${job_id}".`,
      }, true);
    }

    if (job.status === 'completed' && job.result) {
      return {
        content: [
          {
            type: 'text' as const,
            text: job.result + (job.reportPath ? `\n\n---\n**Report saved to**: \`${job.reportPath}\`` : ''),
          },
        ],
      };
    }

    const response: Record<string, unknown> = {
      job_id: job.id,
      status: job.status,
      query: job.query,
      created_at: new Date(job.createdAt).toISOString(),
    };

    if (job.progress !== undefined) {
      response.progress = job.progress;
    }

    if (job.completedAt) {
      response.completed_at = new Date(job.completedAt).toISOString();
      response.duration_seconds = Math.round((job.completedAt - job.createdAt) / 1000);
    }

    if (job.status === 'failed' && job.error) {
      response.error = job.error;
    }

    return jsonContent(response);
  }
);

server.registerTool(
  'get_research_status',
  {
    title: 'Get Stored Research Status',
    description: 'Look up the most recent stored research context whose query contains the given text (case-insensitive). Reports the iteration reached and whether a synthesis exists.',
    inputSchema: {
      query: z.string().describe('Query text to look up'),
    },
  },
  async ({ query }) => jsonContent(await getController().getStatus(query))
);

server.registerTool(
  'get_research_config',
  {
    title: 'Get Research Configuration',
    description: 'Show the active research configuration. API keys are masked.',
    inputSchema: {},
  },
  async () => jsonContent(getController().describeConfig())
);

// Start the server
async function main() {
  console.error('[Research MCP] Starting server...');

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error('[Research MCP] Server ready on stdio');
  console.error('[Research MCP] Available tools: start_research, check_research_status, get_research_status, get_research_config');

  const shutdown = async () => {
    console.error('\n[Research MCP] Shutting down...');
    try {
      await server.close();
    } catch (error) {
      console.error('[Research MCP] Error while closing:', error);
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((error) => {
  console.error('[Research MCP] Fatal error:', error);
  process.exit(1);
});
