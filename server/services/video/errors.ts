/**
 * Video Pipeline — Errors
 */

export type IngestStage = "directory" | "write" | "record";

/**
 * Upload could not be stored. Raised before any job exists, and after the
 * raw file (if any) has been removed.
 */
export class IngestError extends Error {
  constructor(
    public readonly stage: IngestStage,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "IngestError";
  }
}

/** ffmpeg could not be started or exited unsuccessfully. */
export class TranscodeFailure extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    super(message);
    this.name = "TranscodeFailure";
  }
}
