export type RouterThresholds = {
  high: number;
  mid: number;
};

export type ScoreTierCutoffs = {
  warm: number;
  hot: number;
};

export type ScoringConfig = {
  floor: number;
  ceiling: number;
  halfLifeDays: number;
  weights: {
    Interested: number;
    MaybeInterested: number;
    NotInterested: number;
  };
};

export type WorkerConfig = {
  workerName: string;
  logLevel: string;
  redisUrl?: string;
  databaseUrl?: string;
  inferenceProvider: string;
  inferenceTimeoutMs: number;
  directoryTimeoutMs: number;
  contextWindowSize: number;
  thresholds: RouterThresholds;
  scoreTiers: ScoreTierCutoffs;
  scoring: ScoringConfig;
  fuzzyMaxEditDistance: number;
  calibrationMinSamples: number;
  calibrationRecomputeEveryMs: number;
};

export const DEFAULT_THRESHOLDS: RouterThresholds = { high: 0.8, mid: 0.6 };

export const DEFAULT_SCORE_TIERS: ScoreTierCutoffs = { warm: 20, hot: 50 };

export const DEFAULT_SCORING: ScoringConfig = {
  floor: 0,
  ceiling: 100,
  halfLifeDays: 30,
  weights: {
    Interested: 15,
    MaybeInterested: 5,
    NotInterested: -10
  }
};

function readNumber(
  env: Record<string, string | undefined>,
  key: string,
  fallback: number,
  bounds: { min?: number; max?: number; integer?: boolean } = {}
): number {
  const raw = env[key]?.trim();
  if (!raw) {
    return fallback;
  }
  const parsed = bounds.integer ? Number.parseInt(raw, 10) : Number.parseFloat(raw);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  if (bounds.min !== undefined && parsed < bounds.min) {
    return fallback;
  }
  if (bounds.max !== undefined && parsed > bounds.max) {
    return fallback;
  }
  return parsed;
}

function readOptionalString(env: Record<string, string | undefined>, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

export function loadWorkerConfig(env: Record<string, string | undefined> = process.env): WorkerConfig {
  const thresholds: RouterThresholds = {
    high: readNumber(env, "THRESHOLD_HIGH", DEFAULT_THRESHOLDS.high, { min: 0, max: 1 }),
    mid: readNumber(env, "THRESHOLD_MID", DEFAULT_THRESHOLDS.mid, { min: 0, max: 1 })
  };
  const scoreTiers: ScoreTierCutoffs = {
    warm: readNumber(env, "SCORE_TIER_WARM", DEFAULT_SCORE_TIERS.warm, { min: 0 }),
    hot: readNumber(env, "SCORE_TIER_HOT", DEFAULT_SCORE_TIERS.hot, { min: 0 })
  };

  return {
    workerName: readOptionalString(env, "WORKER_NAME") ?? "reply-worker",
    logLevel: readOptionalString(env, "LOG_LEVEL") ?? "info",
    redisUrl: readOptionalString(env, "REDIS_URL"),
    databaseUrl: readOptionalString(env, "DATABASE_URL"),
    inferenceProvider: readOptionalString(env, "INFERENCE_PROVIDER") ?? "keyword",
    inferenceTimeoutMs: readNumber(env, "INFERENCE_TIMEOUT_MS", 8000, { min: 1, integer: true }),
    directoryTimeoutMs: readNumber(env, "DIRECTORY_TIMEOUT_MS", 5000, { min: 1, integer: true }),
    contextWindowSize: readNumber(env, "CONTEXT_WINDOW_SIZE", 5, { min: 0, integer: true }),
    thresholds,
    scoreTiers,
    scoring: {
      ...DEFAULT_SCORING,
      ceiling: readNumber(env, "SCORE_CEILING", DEFAULT_SCORING.ceiling, { min: 1 }),
      halfLifeDays: readNumber(env, "SCORE_HALF_LIFE_DAYS", DEFAULT_SCORING.halfLifeDays, { min: 0.01 })
    },
    fuzzyMaxEditDistance: readNumber(env, "FUZZY_MAX_EDIT_DISTANCE", 3, { min: 0, integer: true }),
    calibrationMinSamples: readNumber(env, "CALIBRATION_MIN_SAMPLES", 20, { min: 1, integer: true }),
    calibrationRecomputeEveryMs: readNumber(env, "CALIBRATION_RECOMPUTE_EVERY_MS", 3_600_000, {
      min: 1000,
      integer: true
    })
  };
}
