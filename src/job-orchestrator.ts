import { ResearchController, OnProgressCallback } from './controller.js';
import { ResearchJob, saveJob, JOBS_DIR, ProgressInfo, jobs, generateJobId } from './jobs.js';
import { formatMarkdown, saveResearchOutcome } from './formatting.js';
import { errorMessage } from './errors.js';
import { ResearchOutcome } from './types/index.js';

export interface StartResearchParams {
  query: string;
  max_iterations?: number;
}

export interface JobStartResult {
  jobId: string;
  maxIterations: number;
  timeoutSeconds: number;
}

export interface JobOptions {
  jobsDir?: string;
  reportsDir?: string;
}

export interface SubmittedJob {
  job: ResearchJob;
  /** null when the job failed before it could start */
  started: JobStartResult | null;
  settled: Promise<void>;
}

export class ResearchTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Research exceeded the ${timeoutMs / 1000}s time budget`);
    this.name = 'ResearchTimeoutError';
  }
}

/**
 * Race a run against the overall wall-clock budget.
 * The run itself is not cancelled; its late result is ignored.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ResearchTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Start a research job.
 *
 * Flow:
 * 1. Resolve the iteration bound for the job
 * 2. Fire off the run in background
 * 3. Return jobId immediately so the caller can poll
 *
 * The returned promise of the background run is exposed for callers (and tests)
 * that want to wait for the job to settle.
 */
export function startResearchJob(
  job: ResearchJob,
  params: StartResearchParams,
  controller: ResearchController,
  options: JobOptions = {}
): { started: JobStartResult; settled: Promise<void> } {
  const config = controller.getConfig();
  const maxIterations = Math.max(1, params.max_iterations ?? config.maxIterations);
  job.maxIterations = maxIterations;

  const settled = executeResearchInBackground(job, params.query, maxIterations, controller, options);

  return {
    started: {
      jobId: job.id,
      maxIterations,
      timeoutSeconds: Math.round(config.researchTimeoutMs / 1000),
    },
    settled,
  };
}

/**
 * Register and persist a new job, then start it.
 * A controller that cannot be built fails the job before it starts.
 */
export async function submitResearchJob(
  params: StartResearchParams,
  getController: () => ResearchController,
  options: JobOptions = {}
): Promise<SubmittedJob> {
  const jobsDir = options.jobsDir ?? JOBS_DIR;
  const job: ResearchJob = {
    id: generateJobId(),
    status: 'pending',
    query: params.query,
    createdAt: Date.now(),
    progress: 'Initializing...',
  };
  jobs.set(job.id, job);
  await saveJob(job, jobsDir);
  console.error(`[Jobs] Created job ${job.id} for: "${params.query}"`);

  let controller: ResearchController;
  try {
    controller = getController();
  } catch (error) {
    job.status = 'failed';
    job.completedAt = Date.now();
    job.error = errorMessage(error);
    job.progress = 'Failed';
    await saveJob(job, jobsDir);
    console.error(`[Jobs] Job ${job.id} failed before starting:`, job.error);
    return { job, started: null, settled: Promise.resolve() };
  }

  const { started, settled } = startResearchJob(job, params, controller, options);
  return { job, started, settled };
}

/**
 * Execute the run in background, recording progress and the final outcome on the job
 */
async function executeResearchInBackground(
  job: ResearchJob,
  query: string,
  maxIterations: number,
  controller: ResearchController,
  options: JobOptions
): Promise<void> {
  const jobsDir = options.jobsDir ?? JOBS_DIR;
  const reportsDir = options.reportsDir ?? controller.getConfig().reportsDir;

  try {
    job.status = 'running';
    job.progress = 'Starting research...';
    await saveJob(job, jobsDir);

    // Update the job in real-time as the controller moves between states
    const onProgress: OnProgressCallback = (progress: ProgressInfo) => {
      // A run abandoned by the time budget keeps reporting; the job is already settled
      if (job.status !== 'running') return;
      job.progress = progress;
      // Fire-and-forget save to avoid blocking
      saveJob(job, jobsDir).catch(err => console.error(`[Jobs] Failed to save progress:`, err));
    };

    const outcome: ResearchOutcome = await withTimeout(
      controller.run(query, { maxIterations, onProgress }),
      controller.getConfig().researchTimeoutMs
    );

    job.status = 'completed';
    job.completedAt = Date.now();
    job.result = formatMarkdown(outcome);
    job.progress = 'Complete';

    // A report that cannot be written still leaves the job completed
    try {
      const saved = await saveResearchOutcome(outcome, reportsDir);
      job.reportPath = saved.markdownPath;
    } catch (err) {
      console.error(`[Jobs] Failed to save report:`, err);
    }

    await saveJob(job, jobsDir);
    console.error(`[Jobs] Job ${job.id} completed successfully`);
  } catch (error) {
    job.status = 'failed';
    job.completedAt = Date.now();
    job.error = errorMessage(error);
    job.progress = 'Failed';
    await saveJob(job, jobsDir);
    console.error(`[Jobs] Job ${job.id} failed:`, job.error);
  }
}
