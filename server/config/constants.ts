/**
 * Application Constants
 *
 * Named constants extracted from magic numbers across the codebase.
 * Grouped by feature area for discoverability.
 *
 * NOTE: Values that operators tune per deployment live in ./env.ts
 */

// ============================================================================
// Socket.io Configuration
// ============================================================================

/** Time (ms) to wait for a pong before considering the connection dead */
export const SOCKET_PING_TIMEOUT_MS = 20_000;

/** Interval (ms) between ping packets sent to clients */
export const SOCKET_PING_INTERVAL_MS = 25_000;

/** Time (ms) to wait for transport upgrade to complete */
export const SOCKET_UPGRADE_TIMEOUT_MS = 10_000;

/** Maximum size (bytes) of a single HTTP long-polling request body (1 MB) */
export const SOCKET_MAX_HTTP_BUFFER_SIZE = 1_048_576;

/** Close reason sent to a connection replaced by a newer one for the same user */
export const CONNECTION_REPLACED_REASON = "connection_replaced";

// ============================================================================
// Video Pipeline
// ============================================================================

/** Name used when an upload arrives without a filename */
export const DEFAULT_VIDEO_NAME = "video.mp4";

/** Container every compressed output is written as */
export const OUTPUT_EXTENSION = ".mp4";

/** Longest sanitised filename kept after the unique prefix */
export const MAX_FILENAME_LENGTH = 120;

/** Bytes of ffmpeg stderr kept on a TranscodeFailure */
export const TRANSCODE_STDERR_TAIL_BYTES = 2_000;

/** Content types accepted on the raw upload endpoint */
export const UPLOAD_CONTENT_TYPES = ["video/*", "application/octet-stream"] as const;

// ============================================================================
// Rate limits
// ============================================================================

/** Upload window (ms) for the per-user upload limiter (15 min) */
export const UPLOAD_RATE_WINDOW_MS = 15 * 60 * 1000;

/** Uploads allowed per user per window */
export const UPLOAD_RATE_MAX = 20;

// ============================================================================
// Job history
// ============================================================================

/** Default and maximum page size for GET /api/jobs */
export const JOB_HISTORY_DEFAULT_LIMIT = 20;
export const JOB_HISTORY_MAX_LIMIT = 100;
