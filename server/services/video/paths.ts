/**
 * Video Pipeline — Storage Paths
 *
 * Every stored file is named `<unique token>-<sanitised original name>`.
 * The token is a nanoid, so two uploads of the same filename, even at the
 * same instant, land on different paths.
 */

import { basename, extname, join, resolve } from "node:path";
import { nanoid } from "nanoid";
import { DEFAULT_VIDEO_NAME, MAX_FILENAME_LENGTH, OUTPUT_EXTENSION } from "../../config/constants";

export function sanitizeFilename(name?: string | null): string {
  const cleaned = basename(name ?? "")
    .replace(/[^A-Za-z0-9._-]/g, "_")
    .replace(/^\.+/, "")
    .slice(-MAX_FILENAME_LENGTH);
  return cleaned || DEFAULT_VIDEO_NAME;
}

export function generateFileName(suggestedName?: string | null): string {
  return `${nanoid()}-${sanitizeFilename(suggestedName)}`;
}

export function generateFilePath(videosDir: string, suggestedName?: string | null): string {
  return join(resolve(videosDir), generateFileName(suggestedName));
}

/** Path for the compressed rendition: same naming scheme, always `.mp4`. */
export function generateOutputPath(videosDir: string, suggestedName?: string | null): string {
  const safe = sanitizeFilename(suggestedName);
  const stem = safe.slice(0, safe.length - extname(safe).length) || "video";
  return generateFilePath(videosDir, `${stem}${OUTPUT_EXTENSION}`);
}
