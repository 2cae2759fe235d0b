import { writeFile, readFile, mkdir } from 'fs/promises';
import { join } from 'path';
import { homedir } from 'os';
import { z } from 'zod';

// Jobs directory for file-based persistence
export const JOBS_DIR = join(homedir(), '.medagents-jobs');

const batchJobSchema = z.object({
  id: z.string(),
  status: z.enum(['pending', 'running', 'completed', 'failed']),
  datasetPath: z.string(),
  createdAt: z.number(),
  completedAt: z.number().optional(),
  progress: z.object({ completed: z.number(), total: z.number() }).optional(),
  outputPath: z.string().optional(),
  logPath: z.string().optional(),
  failedQuestions: z.number().optional(),
  error: z.string().optional(),
});

export type BatchJob = z.infer<typeof batchJobSchema>;
export type BatchJobProgress = NonNullable<BatchJob['progress']>;

// In-memory job storage
export const jobs = new Map<string, BatchJob>();

/**
 * Generate unique job ID
 */
export function generateJobId(): string {
  return `batch-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Save job to file system
 */
export async function saveJob(job: BatchJob, dir = JOBS_DIR): Promise<void> {
  await mkdir(dir, { recursive: true });
  await writeFile(join(dir, `${job.id}.json`), JSON.stringify(job, null, 2), 'utf-8');
}

/**
 * Load job from file system; null when no such job was saved
 */
export async function loadJob(jobId: string, dir = JOBS_DIR): Promise<BatchJob | null> {
  let data: string;
  try {
    data = await readFile(join(dir, `${jobId}.json`), 'utf-8');
  } catch (error) {
    if (isNotFound(error)) return null;
    throw error;
  }
  let json: unknown;
  try {
    json = JSON.parse(data);
  } catch (error) {
    // A save interrupted mid-write leaves truncated JSON behind
    console.error(`[Jobs] Ignoring malformed job file for ${jobId}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
  const parsed = batchJobSchema.safeParse(json);
  if (!parsed.success) {
    console.error(`[Jobs] Ignoring malformed job file for ${jobId}: ${parsed.error.issues[0]?.message}`);
    return null;
  }
  return parsed.data;
}

/**
 * Serialize saves of one job so the file always ends in the latest state.
 * Each call writes the job as it is when its turn comes.
 */
export function createJobSaver(job: BatchJob, dir = JOBS_DIR): () => Promise<void> {
  let tail: Promise<void> = Promise.resolve();
  return () => {
    const next = tail.then(() => saveJob(job, dir));
    // Failures reach the caller through `next`; the chain itself keeps going
    tail = next.catch(() => undefined);
    return next;
  };
}

/**
 * In-memory job, falling back to the saved file (handles server restarts)
 */
export async function findJob(jobId: string, dir = JOBS_DIR): Promise<BatchJob | null> {
  const cached = jobs.get(jobId);
  if (cached) return cached;

  const fileJob = await loadJob(jobId, dir);
  if (fileJob) {
    jobs.set(jobId, fileJob);
    console.error(`[Jobs] Loaded job ${jobId} from file`);
  }
  return fileJob;
}
