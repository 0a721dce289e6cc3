/* JobEngine
 *
 * Tracks fire-and-forget startup tasks and exposes a barrier over them.
 * Responsibilities:
 *  - Start every task on a later microtask so `launch()` never runs caller
 *    code synchronously.
 *  - Record each task's outcome on its JobRecord. A failing task never rejects
 *    anything shared, so siblings keep running.
 *  - `awaitAll()` waits for every tracked job (including jobs launched while
 *    it waits), surfaces the first failure in completion order, and clears the
 *    collection only when every job succeeded.
 */

import { AwaitAllFailedError, JobTimeoutError } from '../errors/errors.js';

export type JobState = 'running' | 'succeeded' | 'failed';

/**
 * Handle to one launched task.
 */
export interface JobRecord {
  readonly id: number;
  readonly label: string;
  readonly state: JobState;
  /** Failure reason once `state` is 'failed'. */
  readonly error: unknown;
  /** Settles (never rejects) once the job is terminal. */
  readonly settled: Promise<void>;
}

export interface JobEngineOptions {
  /** Mark jobs still running after this many milliseconds as failed. */
  timeoutMs?: number;
}

class StartJob implements JobRecord {
  state: JobState = 'running';
  error: unknown = undefined;
  failureOrder = 0;
  settled: Promise<void> = Promise.resolve();

  constructor(
    readonly id: number,
    readonly label: string
  ) {}
}

export class JobEngine {
  private readonly jobs: StartJob[] = [];
  private readonly timeoutMs?: number;
  private jobCounter = 0;
  private failureCounter = 0;

  constructor(options: JobEngineOptions = {}) {
    this.timeoutMs = options.timeoutMs;
  }

  /** Number of tracked jobs (running or terminal). */
  get size(): number {
    return this.jobs.length;
  }

  /**
   * Schedule `task` and start tracking it.
   *
   * @param task - Work to run concurrently with the caller
   * @param label - Name used in failures (defaults to `job_<n>`)
   * @returns The job's record, already appended to the collection
   */
  launch(task: () => Promise<unknown> | unknown, label?: string): JobRecord {
    const id = ++this.jobCounter;
    const job = new StartJob(id, label ?? `job_${id}`);

    const run = Promise.resolve().then(task);
    job.settled = this.withTimeout(run, job).then(
      () => {
        job.state = 'succeeded';
      },
      (err: unknown) => {
        job.state = 'failed';
        job.error = err;
        job.failureOrder = ++this.failureCounter;
      }
    );

    this.jobs.push(job);
    return job;
  }

  /**
   * Wait until every tracked job is terminal.
   *
   * @throws {AwaitAllFailedError} carrying the first failure; the collection is
   *   kept so later waits report it again
   */
  async awaitAll(): Promise<void> {
    const waited = new Set<StartJob>();
    for (;;) {
      const batch = this.jobs.filter((job) => !waited.has(job));
      if (batch.length === 0) break;
      batch.forEach((job) => waited.add(job));
      await Promise.all(batch.map((job) => job.settled));
    }

    const failed = this.firstFailure();
    if (failed) throw new AwaitAllFailedError(failed.error, failed.label);

    this.jobs.length = 0;
  }

  /** True when no tracked job is still running. Does not clear anything. */
  isAllDone(): boolean {
    return this.jobs.every((job) => job.state !== 'running');
  }

  /** Snapshot of the tracked records, in launch order. */
  getJobs(): readonly JobRecord[] {
    return this.jobs.slice();
  }

  private firstFailure(): StartJob | undefined {
    let first: StartJob | undefined;
    for (const job of this.jobs) {
      if (job.state !== 'failed') continue;
      if (!first || job.failureOrder < first.failureOrder) first = job;
    }
    return first;
  }

  private withTimeout(run: Promise<unknown>, job: StartJob): Promise<unknown> {
    const timeoutMs = this.timeoutMs;
    if (timeoutMs === undefined) return run;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new JobTimeoutError(job.label, timeoutMs)), timeoutMs);
    });
    // A late settle of `run` is absorbed by the race's own subscription.
    return Promise.race([run, expired]).finally(() => clearTimeout(timer));
  }
}
