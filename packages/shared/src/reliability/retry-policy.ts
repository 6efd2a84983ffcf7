export const DEFAULT_JOB_ATTEMPTS = 3;
export const DEFAULT_BACKOFF_BASE_MS = 500;

export const DEFAULT_BULLMQ_JOB_OPTIONS = {
  attempts: DEFAULT_JOB_ATTEMPTS,
  backoff: {
    type: "exponential",
    delay: DEFAULT_BACKOFF_BASE_MS
  },
  removeOnComplete: 1000,
  removeOnFail: 5000
} as const;

/**
 * Dead-lettered replies are kept until replayed; they are never retried by
 * BullMQ itself.
 */
export const DEAD_LETTER_JOB_OPTIONS = {
  attempts: 1,
  removeOnComplete: false,
  removeOnFail: false
} as const;
