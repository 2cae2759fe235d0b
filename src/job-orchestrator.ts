import { BatchOptions, runBatch, ServiceFactory } from './batch.js';
import { BatchJob, createJobSaver, saveJob } from './jobs.js';

export interface JobStartResult {
  jobId: string;
  estimatedSeconds: number;
}

/**
 * Rough wall-clock per question: ~20 calls at a few seconds each.
 */
const SECONDS_PER_QUESTION = 60;

/**
 * Start a batch job and return immediately.
 *
 * Flow:
 * 1. Mark the job running and persist it
 * 2. Fire the batch in the background; progress is saved as questions finish
 * 3. Return jobId and a wait estimate
 */
export async function startBatchJob(
  job: BatchJob,
  options: BatchOptions,
  createService: ServiceFactory | undefined,
  jobsDir?: string
): Promise<JobStartResult> {
  job.status = 'running';
  job.progress = { completed: 0, total: 0 };
  await saveJob(job, jobsDir);

  executeBatchInBackground(job, options, createService, jobsDir).catch(error =>
    console.error(`[Jobs] Job ${job.id} background task crashed:`, error)
  );

  const estimateCount = options.endPos !== undefined && options.endPos >= 0
    ? Math.max(0, options.endPos - (options.startPos ?? 0))
    : 1;
  return {
    jobId: job.id,
    estimatedSeconds: options.dryRun ? 5 : Math.max(1, estimateCount) * SECONDS_PER_QUESTION,
  };
}

/**
 * Run the batch, recording progress and the final outcome on the job
 */
export async function executeBatchInBackground(
  job: BatchJob,
  options: BatchOptions,
  createService: ServiceFactory | undefined,
  jobsDir?: string
): Promise<void> {
  const save = createJobSaver(job, jobsDir);
  try {
    const result = await runBatch(
      {
        ...options,
        onProgress: (completed, total) => {
          job.progress = { completed, total };
          options.onProgress?.(completed, total);
          // Progress saves must not hold up the batch
          save().catch(err => console.error('[Jobs] Failed to save progress:', err));
        },
      },
      createService
    );

    job.status = 'completed';
    job.completedAt = Date.now();
    job.outputPath = result.outputPath;
    job.logPath = result.logPath;
    job.failedQuestions = result.failed;
    job.progress = { completed: result.total, total: result.total };
    await save();
    console.error(`[Jobs] Job ${job.id} completed: ${result.outputPath}`);
  } catch (error) {
    job.status = 'failed';
    job.completedAt = Date.now();
    job.error = error instanceof Error ? error.message : String(error);
    await save();
    console.error(`[Jobs] Job ${job.id} failed:`, job.error);
  }
}
