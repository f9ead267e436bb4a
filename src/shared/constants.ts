/**
 * Shared constants — limits and heuristics that are not part of a preset.
 */

/** Sleep slice for the poller; stop signals are observed at this granularity */
export const POLL_SLICE_MS = 50;

/** Extra delay added per consecutive read failure */
export const FAILURE_BACKOFF_STEP_MS = 50;

/** How long shutdown waits for the poller to acknowledge a stop */
export const POLLER_STOP_GRACE_MS = 1000;

/** Image entries added within this window are checked for byte-level duplicates */
export const DEFAULT_IMAGE_DUPLICATE_WINDOW_SEC = 30;

/** Bytes compared at the head of two image files */
export const DEFAULT_IMAGE_COMPARE_BYTES = 1024;

/** Ceiling for raw image reads that go through a pipe (32MB) */
export const DEFAULT_MAX_IMAGE_BYTES = 32 * 1024 * 1024;

/** Text attached to an image is used as its content only when this short */
export const MAX_IMAGE_CAPTION_BYTES = 512;

/** Longest path accepted in a clipboard script */
export const MAX_SCRIPT_PATH_LENGTH = 4096;

/** Timeout for a single OS clipboard query */
export const QUERY_TIMEOUT_MS = 5000;

/** File names */
export const HISTORY_FILE_NAME = '.clipring_history.json';
export const IMAGE_DIR_NAME = 'clipring_images';
export const IMAGE_FILE_PREFIX = 'clipring_';

/** Current persisted document version */
export const HISTORY_FORMAT_VERSION = 2;

/** Characters of content shown per entry in the console */
export const CONSOLE_PREVIEW_LENGTH = 80;
