import { defineConfig } from "drizzle-kit";

if (!process.env.DATABASE_URL) {
  throw new Error("DATABASE_URL is required to generate or push video migrations");
}

export default defineConfig({
  out: "./migrations",
  schema: "./packages/shared/schema",
  dialect: "postgresql",
  dbCredentials: {
    url: process.env.DATABASE_URL,
  },
  tablesFilter: ["videos", "jobs"],
  strict: true,
});
