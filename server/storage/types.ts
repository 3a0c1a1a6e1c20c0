import type { InsertJobHistory, InsertVideo, JobHistory, Video } from "@shared/schema";

export type CreateVideo = Required<Pick<InsertVideo, "path" | "routeId" | "userId">>;

export type CreateJobHistory = Required<Pick<InsertJobHistory, "userId" | "videoId" | "routeId">>;

/**
 * Persistence for uploaded videos. The two mark* methods only touch a row
 * that is still pending, so a record is flipped at most once and never ends
 * up both completed and failed.
 */
export interface VideoStore {
  createVideo(data: CreateVideo): Promise<Video>;
  getVideo(id: number): Promise<Video | null>;
  findVideoByPath(path: string): Promise<Video | null>;
  markVideoCompleted(id: number): Promise<Video | null>;
  markVideoFailed(id: number): Promise<Video | null>;
}

export interface JobHistoryStore {
  recordJob(data: CreateJobHistory): Promise<JobHistory>;
  listJobsForUser(userId: number, limit: number): Promise<JobHistory[]>;
}

export interface Storage extends VideoStore, JobHistoryStore {}
