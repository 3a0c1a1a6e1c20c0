import { isDatabaseAvailable } from "../db";
import logger from "../logger";
import { DatabaseStorage } from "./database";
import { MemStorage } from "./memory";
import type { Storage } from "./types";

export type { Storage, VideoStore, JobHistoryStore, CreateVideo, CreateJobHistory } from "./types";
export { DatabaseStorage } from "./database";
export { MemStorage } from "./memory";

export function createStorage(): Storage {
  if (isDatabaseAvailable()) {
    return new DatabaseStorage();
  }
  logger.warn("[Storage] DATABASE_URL not set, videos and job history are kept in memory");
  return new MemStorage();
}
