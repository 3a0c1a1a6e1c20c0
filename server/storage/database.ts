import { and, desc, eq } from "drizzle-orm";
import { jobs, videos, type JobHistory, type Video } from "@shared/schema";
import { getDb } from "../db";
import type { CreateJobHistory, CreateVideo, Storage } from "./types";

export class DatabaseStorage implements Storage {
  async createVideo(data: CreateVideo): Promise<Video> {
    const [video] = await getDb()
      .insert(videos)
      .values({ ...data, completed: false, failed: false })
      .returning();
    if (!video) throw new Error("Video insert returned no row");
    return video;
  }

  async getVideo(id: number): Promise<Video | null> {
    const [video] = await getDb().select().from(videos).where(eq(videos.id, id)).limit(1);
    return video ?? null;
  }

  async findVideoByPath(path: string): Promise<Video | null> {
    const [video] = await getDb().select().from(videos).where(eq(videos.path, path)).limit(1);
    return video ?? null;
  }

  async markVideoCompleted(id: number): Promise<Video | null> {
    return this.settle(id, { completed: true });
  }

  async markVideoFailed(id: number): Promise<Video | null> {
    return this.settle(id, { failed: true });
  }

  async recordJob(data: CreateJobHistory): Promise<JobHistory> {
    const [job] = await getDb()
      .insert(jobs)
      .values({ ...data, completed: true })
      .returning();
    if (!job) throw new Error("Job history insert returned no row");
    return job;
  }

  async listJobsForUser(userId: number, limit: number): Promise<JobHistory[]> {
    return getDb()
      .select()
      .from(jobs)
      .where(eq(jobs.userId, userId))
      .orderBy(desc(jobs.createdAt), desc(jobs.id))
      .limit(limit);
  }

  private async settle(
    id: number,
    flags: { completed: true } | { failed: true }
  ): Promise<Video | null> {
    const [video] = await getDb()
      .update(videos)
      .set({ ...flags, updatedAt: new Date() })
      .where(and(eq(videos.id, id), eq(videos.completed, false), eq(videos.failed, false)))
      .returning();
    return video ?? null;
  }
}
