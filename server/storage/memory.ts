import type { JobHistory, Video } from "@shared/schema";
import type { CreateJobHistory, CreateVideo, Storage } from "./types";

/**
 * Process-local storage used when no database is configured, and by tests.
 * Contents are lost on restart.
 */
export class MemStorage implements Storage {
  private videos: Map<number, Video>;
  private jobs: JobHistory[];
  private currentVideoId: number;
  private currentJobId: number;

  constructor() {
    this.videos = new Map();
    this.jobs = [];
    this.currentVideoId = 1;
    this.currentJobId = 1;
  }

  async createVideo(data: CreateVideo): Promise<Video> {
    const id = this.currentVideoId++;
    const now = new Date();
    const video: Video = {
      ...data,
      id,
      completed: false,
      failed: false,
      createdAt: now,
      updatedAt: now,
    };
    this.videos.set(id, video);
    return { ...video };
  }

  async getVideo(id: number): Promise<Video | null> {
    const video = this.videos.get(id);
    return video ? { ...video } : null;
  }

  async findVideoByPath(path: string): Promise<Video | null> {
    const video = Array.from(this.videos.values()).find((v) => v.path === path);
    return video ? { ...video } : null;
  }

  async markVideoCompleted(id: number): Promise<Video | null> {
    return this.settle(id, { completed: true });
  }

  async markVideoFailed(id: number): Promise<Video | null> {
    return this.settle(id, { failed: true });
  }

  async recordJob(data: CreateJobHistory): Promise<JobHistory> {
    const job: JobHistory = {
      ...data,
      id: this.currentJobId++,
      completed: true,
      createdAt: new Date(),
    };
    this.jobs.push(job);
    return { ...job };
  }

  async listJobsForUser(userId: number, limit: number): Promise<JobHistory[]> {
    return this.jobs
      .filter((job) => job.userId === userId)
      .reverse()
      .slice(0, limit)
      .map((job) => ({ ...job }));
  }

  private settle(id: number, flags: { completed: true } | { failed: true }): Video | null {
    const video = this.videos.get(id);
    if (!video || video.completed || video.failed) return null;
    const updated: Video = { ...video, ...flags, updatedAt: new Date() };
    this.videos.set(id, updated);
    return { ...updated };
  }
}
