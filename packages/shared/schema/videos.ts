import {
  pgTable,
  serial,
  integer,
  boolean,
  timestamp,
  varchar,
  index,
} from "drizzle-orm/pg-core";

// Uploaded clips. `path` points at the compressed output, which does not
// exist on disk until the transcode finishes.
export const videos = pgTable(
  "videos",
  {
    id: serial("id").primaryKey(),
    path: varchar("path", { length: 1024 }).notNull(),
    routeId: integer("route_id"),
    userId: integer("user_id").notNull(),
    completed: boolean("completed").default(false).notNull(),
    failed: boolean("failed").default(false).notNull(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    updatedAt: timestamp("updated_at").defaultNow().notNull(),
  },
  (table) => ({
    pathIdx: index("IDX_videos_path").on(table.path),
    userIdx: index("IDX_videos_user").on(table.userId),
  })
);

// Durable trace of every delivered completion notification (append-only)
export const jobs = pgTable(
  "jobs",
  {
    id: serial("id").primaryKey(),
    createdAt: timestamp("created_at").defaultNow().notNull(),
    userId: integer("user_id").notNull(),
    videoId: integer("video_id")
      .notNull()
      .references(() => videos.id),
    routeId: integer("route_id"),
    completed: boolean("completed").default(true).notNull(),
  },
  (table) => ({
    userIdx: index("IDX_jobs_user").on(table.userId, table.createdAt),
  })
);

export type Video = typeof videos.$inferSelect;
export type InsertVideo = typeof videos.$inferInsert;
export type JobHistory = typeof jobs.$inferSelect;
export type InsertJobHistory = typeof jobs.$inferInsert;
