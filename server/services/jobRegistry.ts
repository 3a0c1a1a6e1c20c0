/**
 * Job Registry
 *
 * In-memory table of compression jobs awaiting a completion notification,
 * one entry per uploaded video. It is independent of the persisted video
 * state and exists only to drive the per-connection notification loops.
 *
 * Every method is synchronous. A scan-and-mutate sequence therefore runs to
 * completion on the event loop before any other upload handler or
 * notification loop can observe the table, which is what makes
 * {@link JobRegistry.takeCompleted} an atomic take.
 *
 * Jobs are not persisted: a restart drops everything still pending, and a
 * completed job whose owner never reconnects stays here for the life of the
 * process.
 */

import logger from "../logger";

export interface Job {
  userId: number;
  videoId: number;
  routeId: number | null;
  completed: boolean;
  createdAt: Date;
}

export type NewJob = Pick<Job, "userId" | "videoId" | "routeId">;

export type JobCompletedListener = (job: Job) => void;

export class DuplicateJobError extends Error {
  constructor(public readonly videoId: number) {
    super(`A job for video ${videoId} is already registered`);
    this.name = "DuplicateJobError";
  }
}

export class JobRegistry {
  // Map keeps insertion order, so scans visit jobs oldest first
  private readonly jobs = new Map<number, Job>();
  private readonly listeners = new Set<JobCompletedListener>();

  add(input: NewJob): Job {
    if (this.jobs.has(input.videoId)) {
      throw new DuplicateJobError(input.videoId);
    }
    const job: Job = { ...input, completed: false, createdAt: new Date() };
    this.jobs.set(job.videoId, job);
    return job;
  }

  /**
   * Flip the registered job (the same object, not a copy) to completed and
   * tell subscribers. Returns null when no job is registered for the video.
   */
  markCompleted(videoId: number): Job | null {
    const job = this.jobs.get(videoId);
    if (!job) return null;
    job.completed = true;

    for (const listener of this.listeners) {
      try {
        listener(job);
      } catch (error) {
        logger.error("[JobRegistry] Completion listener threw", {
          videoId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return job;
  }

  /**
   * Remove and return every completed job owned by `userId`. A job handed out
   * here is gone from the registry, so no other caller can take it.
   */
  takeCompleted(userId: number): Job[] {
    const taken: Job[] = [];
    for (const job of this.jobs.values()) {
      if (job.userId === userId && job.completed) {
        taken.push(job);
      }
    }
    for (const job of taken) {
      this.jobs.delete(job.videoId);
    }
    return taken;
  }

  /** Put back a job that was taken but could not be delivered. */
  restore(job: Job): boolean {
    if (this.jobs.has(job.videoId)) return false;
    this.jobs.set(job.videoId, job);
    return true;
  }

  discard(videoId: number): boolean {
    return this.jobs.delete(videoId);
  }

  get(videoId: number): Job | undefined {
    return this.jobs.get(videoId);
  }

  list(): Job[] {
    return Array.from(this.jobs.values());
  }

  get size(): number {
    return this.jobs.size;
  }

  clear(): void {
    this.jobs.clear();
  }

  /** Subscribe to completions. Returns the unsubscribe function. */
  onCompleted(listener: JobCompletedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

export const jobRegistry = new JobRegistry();
