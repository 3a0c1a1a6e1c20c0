/**
 * Video Pipeline — Utilities
 *
 * Runtime availability check for ffmpeg.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export async function checkFfmpegAvailable(ffmpegPath = "ffmpeg"): Promise<boolean> {
  try {
    await execFileAsync(ffmpegPath, ["-version"], { timeout: 5000 });
    return true;
  } catch {
    return false;
  }
}
