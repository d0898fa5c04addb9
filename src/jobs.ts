import { writeFile, readFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import { ControllerState } from './types/index.js';

// Jobs directory for file-based persistence
export const JOBS_DIR = join(homedir(), '.research-jobs');

// Structured progress info so callers can poll sensibly
export interface ProgressInfo {
  state: ControllerState;
  iteration: number;         // 0 while planning
  maxIterations: number;
  note?: string;             // e.g. "3 sub-tasks", "refined query: ..."
}

export interface ResearchJob {
  id: string;
  status: 'pending' | 'running' | 'completed' | 'failed';
  query: string;
  maxIterations?: number;
  createdAt: number;
  completedAt?: number;
  result?: string; // Markdown report
  reportPath?: string; // Path to saved JSON outcome
  error?: string;
  progress?: string | ProgressInfo;
}

// In-memory job storage
export const jobs = new Map<string, ResearchJob>();

/**
 * Generate unique job ID
 */
export function generateJobId(): string {
  return `research-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

// Pending writes per job id; saves of one job land in call order
const saveChains = new Map<string, Promise<void>>();

async function writeJobFile(jobId: string, snapshot: string, dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, `${jobId}.json`), snapshot, 'utf-8');
  } catch (error) {
    console.error(`[Jobs] Failed to save job ${jobId}:`, error);
  }
}

/**
 * Save job to file system.
 * The job is serialized at call time, so a late progress save never overwrites a newer state.
 */
export function saveJob(job: ResearchJob, dir: string = JOBS_DIR): Promise<void> {
  const snapshot = JSON.stringify(job, null, 2);
  const previous = saveChains.get(job.id) ?? Promise.resolve();
  const next: Promise<void> = previous.then(async () => {
    await writeJobFile(job.id, snapshot, dir);
    if (saveChains.get(job.id) === next) saveChains.delete(job.id);
  });
  saveChains.set(job.id, next);
  return next;
}

/**
 * Load job from file system
 */
export async function loadJob(jobId: string, dir: string = JOBS_DIR): Promise<ResearchJob | null> {
  try {
    const data = await readFile(join(dir, `${jobId}.json`), 'utf-8');
    const job: ResearchJob = JSON.parse(data);
    return job;
  } catch {
    return null;
  }
}
