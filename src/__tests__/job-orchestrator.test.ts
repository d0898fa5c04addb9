import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { startResearchJob, submitResearchJob, withTimeout, ResearchTimeoutError } from '../job-orchestrator.js';
import { ResearchJob, generateJobId, jobs, loadJob, saveJob } from '../jobs.js';
import { createResearchController } from '../controller.js';
import { LLMGateway } from '../clients/llm.js';
import { ResearchOutcome } from '../types/index.js';
import { fakeGateway } from './helpers/fakes.js';
import { standardReplies, testController } from './helpers/scenario.js';

let dir: string;
let jobsDir: string;
let reportsDir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'research-jobs-'));
  jobsDir = join(dir, 'jobs');
  reportsDir = join(dir, 'reports');
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function newJob(query = 'q'): ResearchJob {
  return { id: generateJobId(), status: 'pending', query, createdAt: Date.now() };
}

describe('jobs', () => {
  it('generates distinct ids', () => {
    const id = generateJobId();
    expect(id).toMatch(/^research-\d+-[a-z0-9]*$/);
    expect(generateJobId()).not.toBe(id);
  });

  it('saves and loads a job', async () => {
    const job = newJob();
    await saveJob(job, jobsDir);
    expect(await loadJob(job.id, jobsDir)).toEqual(job);
  });

  it('returns null for an unknown job', async () => {
    expect(await loadJob('research-0-missing', jobsDir)).toBeNull();
  });

  it('writes saves of the same job in call order', async () => {
    const job = newJob();
    const first = saveJob({ ...job, status: 'running' }, jobsDir);
    const second = saveJob({ ...job, status: 'completed' }, jobsDir);
    await Promise.all([first, second]);
    expect((await loadJob(job.id, jobsDir))?.status).toBe('completed');
  });
});

describe('withTimeout', () => {
  it('resolves with the work when it finishes in time', async () => {
    expect(await withTimeout(Promise.resolve('done'), 1000)).toBe('done');
  });

  it('rejects when the budget runs out', async () => {
    await expect(withTimeout(new Promise<string>(() => {}), 20)).rejects.toBeInstanceOf(ResearchTimeoutError);
  });
});

describe('startResearchJob', () => {
  it('runs the research in the background and stores the report', async () => {
    const job = newJob();
    const controller = testController({ gateway: fakeGateway(standardReplies()) });

    const { started, settled } = startResearchJob(job, { query: 'q' }, controller, { jobsDir, reportsDir });
    expect(started).toEqual({ jobId: job.id, maxIterations: 3, timeoutSeconds: 300 });
    expect(job.status).toBe('running');

    await settled;

    expect(job.status).toBe('completed');
    expect(job.progress).toBe('Complete');
    expect(job.result?.startsWith('# Research Results: q\n')).toBe(true);
    expect(job.reportPath?.startsWith(reportsDir)).toBe(true);
    expect(job.reportPath?.endsWith('.md')).toBe(true);
    expect(await readFile(job.reportPath ?? '', 'utf-8')).toBe(job.result);

    const persisted = await loadJob(job.id, jobsDir);
    expect(persisted).toMatchObject({ status: 'completed', maxIterations: 3, reportPath: job.reportPath });
  });

  it('honours a per-job iteration bound', async () => {
    const job = newJob();
    const controller = testController({ gateway: fakeGateway(standardReplies()) });
    const { started, settled } = startResearchJob(job, { query: 'q', max_iterations: 1 }, controller, { jobsDir, reportsDir });
    await settled;
    expect(started.maxIterations).toBe(1);
    expect(job.maxIterations).toBe(1);
  });

  it('marks the job failed when no backend is configured', async () => {
    const job = newJob();
    const { settled } = startResearchJob(job, { query: 'q' }, testController({ gateway: null }), { jobsDir, reportsDir });
    await settled;

    expect(job.status).toBe('failed');
    expect(job.progress).toBe('Failed');
    expect(job.error).toMatch(/^No LLM configuration found/);
    expect((await loadJob(job.id, jobsDir))?.status).toBe('failed');
  });

  it('marks the job failed when the run exceeds the time budget', async () => {
    const stalled: LLMGateway = { complete: () => new Promise<string>(() => {}) };
    const job = newJob();
    const controller = testController({ gateway: stalled, config: { researchTimeoutMs: 20 } });

    const { settled } = startResearchJob(job, { query: 'q' }, controller, { jobsDir, reportsDir });
    await settled;

    expect(job.status).toBe('failed');
    expect(job.error).toBe('Research exceeded the 0.02s time budget');
  });

  it('ignores progress from a run abandoned by the time budget', async () => {
    const inner = fakeGateway(standardReplies());
    let release: () => void = () => {};
    const gate = new Promise<void>(resolve => {
      release = resolve;
    });
    const delayed: LLMGateway = {
      complete: async (system, prompt, context) => {
        await gate;
        return inner.complete(system, prompt, context);
      },
    };
    const job = newJob();
    const controller = testController({ gateway: delayed, config: { researchTimeoutMs: 20 } });
    const run = controller.run.bind(controller);
    let abandoned: Promise<ResearchOutcome> | undefined;
    vi.spyOn(controller, 'run').mockImplementation((query, options) => {
      abandoned = run(query, options);
      return abandoned;
    });

    const { settled } = startResearchJob(job, { query: 'q' }, controller, { jobsDir, reportsDir });
    await settled;
    expect(job.status).toBe('failed');

    release();
    expect((await abandoned)?.iterations).toBe(1);

    expect(job.status).toBe('failed');
    expect(job.progress).toBe('Failed');
    expect((await loadJob(job.id, jobsDir))?.progress).toBe('Failed');
  });
});

describe('submitResearchJob', () => {
  it('registers the job and runs it', async () => {
    const controller = testController({ gateway: fakeGateway(standardReplies()) });
    const { job, started, settled } = await submitResearchJob({ query: 'q' }, () => controller, { jobsDir, reportsDir });

    expect(jobs.get(job.id)).toBe(job);
    expect(started).toEqual({ jobId: job.id, maxIterations: 3, timeoutSeconds: 300 });
    await settled;
    expect((await loadJob(job.id, jobsDir))?.status).toBe('completed');
  });

  it('fails the job when the configuration is invalid', async () => {
    const { job, started, settled } = await submitResearchJob(
      { query: 'q' },
      () => createResearchController({ MAX_ITERATIONS: 'abc' }),
      { jobsDir, reportsDir }
    );
    await settled;

    expect(started).toBeNull();
    expect(job.status).toBe('failed');
    expect(job.progress).toBe('Failed');
    expect(job.error).toMatch(/^Invalid configuration: MAX_ITERATIONS: /);

    const persisted = await loadJob(job.id, jobsDir);
    expect(persisted).toMatchObject({ status: 'failed', error: job.error });
  });
});
