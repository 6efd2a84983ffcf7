import type { IntentLabel } from "@reply-triage/shared";
import type { CalibrationParams, CalibrationSample } from "./types.js";

export const DEFAULT_CALIBRATION_PARAMS: CalibrationParams = {
  version: 0,
  contextWeight: 0.1,
  maxContextBoost: 0.5,
  flipRetention: 0.78,
  sampleCount: 0,
  computedAtMs: 0
};

const FLIP_RETENTION_BOUNDS = { min: 0.3, max: 1 };
const CONTEXT_WEIGHT_BOUNDS = { min: 0, max: 0.25 };
const MIN_GROUP_SAMPLES = 5;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Adjacent label changes in (newest, ...older).
 */
export function countFlips(labels: readonly IntentLabel[]): number {
  let flips = 0;
  for (let index = 1; index < labels.length; index += 1) {
    if (labels[index] !== labels[index - 1]) {
      flips += 1;
    }
  }
  return flips;
}

export function countAgreeing(label: IntentLabel, contextLabels: readonly IntentLabel[]): number {
  return contextLabels.filter((candidate) => candidate === label).length;
}

/**
 * `contextLabels` are the prior labels, most recent first.
 */
export function applyCalibration(
  input: { label: IntentLabel; rawConfidence: number; contextLabels: readonly IntentLabel[] },
  params: CalibrationParams
): number {
  const raw = clamp(input.rawConfidence, 0, 1);
  const agreeing = countAgreeing(input.label, input.contextLabels);
  const boost = Math.min(params.maxContextBoost, params.contextWeight * agreeing);
  const boosted = raw + (1 - raw) * boost;
  const flips = countFlips([input.label, ...input.contextLabels]);
  return clamp(boosted * params.flipRetention ** flips, 0, 1);
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function accuracy(samples: readonly CalibrationSample[]): number {
  return samples.filter((sample) => sample.predictedLabel === sample.confirmedLabel).length / samples.length;
}

/**
 * Refits the calibration parameters from the full sample log. Returns null
 * while there are fewer than `minSamples` samples; the caller keeps the
 * current parameters in that case.
 */
export function fitCalibration(input: {
  samples: readonly CalibrationSample[];
  current: CalibrationParams;
  minSamples: number;
  nowMs: number;
}): CalibrationParams | null {
  const { samples, current } = input;
  if (samples.length < input.minSamples) {
    return null;
  }

  let flipRetention = current.flipRetention;
  const flipped = samples.filter(
    (sample) => countFlips([sample.predictedLabel, ...sample.contextLabels]) > 0
  );
  if (flipped.length >= MIN_GROUP_SAMPLES) {
    const meanRaw = mean(flipped.map((sample) => sample.rawConfidence));
    if (meanRaw > 0) {
      flipRetention = clamp(accuracy(flipped) / meanRaw, FLIP_RETENTION_BOUNDS.min, FLIP_RETENTION_BOUNDS.max);
    }
  }

  let contextWeight = current.contextWeight;
  const consistent = samples.filter(
    (sample) =>
      sample.contextLabels.length > 0 && countFlips([sample.predictedLabel, ...sample.contextLabels]) === 0
  );
  if (consistent.length >= MIN_GROUP_SAMPLES) {
    const meanRaw = mean(consistent.map((sample) => sample.rawConfidence));
    const meanAgreeing = mean(consistent.map((sample) => sample.contextLabels.length));
    const observed = accuracy(consistent);
    contextWeight =
      meanRaw < 1 && observed > meanRaw
        ? clamp((observed - meanRaw) / ((1 - meanRaw) * meanAgreeing), CONTEXT_WEIGHT_BOUNDS.min, CONTEXT_WEIGHT_BOUNDS.max)
        : CONTEXT_WEIGHT_BOUNDS.min;
  }

  return {
    version: current.version + 1,
    contextWeight,
    maxContextBoost: current.maxContextBoost,
    flipRetention,
    sampleCount: samples.length,
    computedAtMs: input.nowMs
  };
}
