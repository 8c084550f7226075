import { z } from 'zod';
import type { FitnessDocument } from '../../ports/FitnessServicePort.js';
import { InvalidRequestError, MetricUnavailableError } from '../../utils/errors.js';
import {
  buildMetric,
  requireNonZero,
  secondsToHours,
  secondsToMinutes,
  toPercentage,
  type Metric,
} from './metrics.js';

const count = z.number().nullish().catch(null).transform((value) => value ?? 0);
const optionalCount = z.number().nullish().catch(null).transform((value) => value ?? null);

// An empty sleepNeed object counts as absent.
const sleepNeedSchema = z
  .record(z.unknown())
  .nullish()
  .catch(null)
  .transform((value) => (value && Object.keys(value).length > 0 ? value : null))
  .pipe(z.object({ actual: count, baseline: count }).nullable());

const dailySleepSchema = z.object({
  deepSleepSeconds: count,
  lightSleepSeconds: count,
  remSleepSeconds: count,
  sleepTimeSeconds: count,
  awakeCount: optionalCount,
  awakeSleepSeconds: count,
  sleepStartTimestampGMT: count,
  sleepEndTimestampGMT: count,
  sleepNeed: sleepNeedSchema,
});

const sleepDocumentSchema = z.object({
  dailySleepDTO: z
    .record(z.unknown())
    .nullish()
    .catch(null)
    .transform((value) => value ?? {}),
});

export type SleepData = z.infer<typeof dailySleepSchema>;

export type SleepInsight = (data: SleepData) => Metric;

export type SleepStage = 'deep' | 'light' | 'rem';

interface StageRange {
  label: string;
  min: number;
  max: number;
  target: number;
  weight: number;
}

const STAGE_RANGES: Record<SleepStage, StageRange> = {
  deep: { label: 'Deep', min: 16, max: 33, target: 24.5, weight: 2 },
  light: { label: 'Light', min: 30, max: 64, target: 47, weight: 1.5 },
  rem: { label: 'REM', min: 21, max: 31, target: 26, weight: 2 },
};

const STAGES: SleepStage[] = ['deep', 'light', 'rem'];

export function extractSleepData(document: FitnessDocument): SleepData {
  const { dailySleepDTO } = sleepDocumentSchema.parse(document);
  return dailySleepSchema.parse(dailySleepDTO);
}

function stagePercentages(data: SleepData): Record<SleepStage, number> {
  return {
    deep: toPercentage(data.deepSleepSeconds, data.sleepTimeSeconds),
    light: toPercentage(data.lightSleepSeconds, data.sleepTimeSeconds),
    rem: toPercentage(data.remSleepSeconds, data.sleepTimeSeconds),
  };
}

function timeInBedSeconds(data: SleepData): number {
  return (data.sleepEndTimestampGMT - data.sleepStartTimestampGMT) / 1000;
}

export function timeInBed(data: SleepData): Metric {
  if (!data.sleepEndTimestampGMT || !data.sleepStartTimestampGMT) {
    throw new MetricUnavailableError('Sleep timestamp data not available');
  }
  const seconds = timeInBedSeconds(data);
  return buildMetric(
    seconds,
    'seconds',
    `Total time in bed: ${seconds.toFixed(2)} seconds (${secondsToHours(seconds).toFixed(2)} hours)`
  );
}

export function sleepEfficiency(data: SleepData): Metric {
  if (!data.sleepTimeSeconds || !data.sleepEndTimestampGMT || !data.sleepStartTimestampGMT) {
    throw new MetricUnavailableError('Required sleep data not available');
  }
  const inBed = timeInBedSeconds(data);
  if (inBed === 0) {
    throw new InvalidRequestError('Invalid sleep data: time in bed is zero');
  }
  const efficiency = toPercentage(data.sleepTimeSeconds, inBed);
  return buildMetric(
    efficiency,
    '%',
    `Sleep efficiency: ${efficiency.toFixed(2)}% of time in bed spent sleeping`
  );
}

export function awakeningsPerHour(data: SleepData): Metric {
  requireNonZero(data, 'sleepTimeSeconds', 'awakenings per hour');
  if (data.awakeCount === null) {
    throw new MetricUnavailableError('No awakeCount data available for awakenings per hour');
  }
  const value = data.awakeCount / secondsToHours(data.sleepTimeSeconds);
  return buildMetric(
    value,
    'awakenings/hour',
    `Average ${value.toFixed(2)} awakenings per hour of sleep`
  );
}

function stagePercent(stage: SleepStage): SleepInsight {
  const { label } = STAGE_RANGES[stage];
  return (data) => {
    requireNonZero(data, 'sleepTimeSeconds', `${stage} sleep percent`);
    const percent = stagePercentages(data)[stage];
    return buildMetric(percent, '%', `${label} sleep percent: ${percent.toFixed(2)}%`);
  };
}

export const deepSleepPercent = stagePercent('deep');
export const remSleepPercent = stagePercent('rem');
export const lightSleepPercent = stagePercent('light');

export function sleepFragmentationIndex(data: SleepData): Metric {
  const stagedHours = secondsToHours(
    data.deepSleepSeconds + data.lightSleepSeconds + data.remSleepSeconds
  );
  if (stagedHours === 0) {
    throw new MetricUnavailableError('No sleep time data available');
  }

  const fragmentation =
    data.awakeCount !== null
      ? data.awakeCount / stagedHours
      : secondsToHours(data.awakeSleepSeconds) / stagedHours;

  return buildMetric(
    fragmentation,
    'index',
    `Sleep fragmentation index: ${fragmentation.toFixed(2)} (lower is better)`
  );
}

function describeStage(stage: SleepStage, percent: number, sleepTimeSeconds: number): string {
  const { label, min, max } = STAGE_RANGES[stage];
  const summary = `${label} sleep: ${percent.toFixed(1)}% (optimal: ${min}-${max}%)`;

  if (percent < min) {
    const gap = min - percent;
    const deficitMinutes = (gap / 100) * secondsToMinutes(sleepTimeSeconds);
    return `${summary} - ${gap.toFixed(1)}pp below minimum (${deficitMinutes.toFixed(1)} min deficit)`;
  }
  if (percent > max) {
    return `${summary} - ${(percent - max).toFixed(1)}pp above maximum`;
  }
  return `${summary} - within optimal range`;
}

export function analyzeStageComposition(data: SleepData): string {
  if (data.sleepTimeSeconds === 0) {
    return 'No sleep data available';
  }
  const percentages = stagePercentages(data);
  return STAGES.map((stage) => describeStage(stage, percentages[stage], data.sleepTimeSeconds)).join(
    ' | '
  );
}

/** 0-100 score: each stage loses `weight` points per percentage point away from its target. */
export function stageQualityScore(data: SleepData): number {
  const percentages = stagePercentages(data);
  const scores = STAGES.map((stage) => {
    const { target, weight } = STAGE_RANGES[stage];
    return Math.max(0, 100 - Math.abs(percentages[stage] - target) * weight);
  });
  return scores.reduce((sum, score) => sum + score, 0) / scores.length;
}

export function stageCompositionAnalysis(data: SleepData): Metric {
  requireNonZero(data, 'sleepTimeSeconds', 'stage composition analysis');
  const score = stageQualityScore(data);
  return buildMetric(
    score,
    'score (0-100)',
    `Overall sleep stage quality: ${score.toFixed(2)}/100 | ${analyzeStageComposition(data)}`
  );
}

export function sleepNeedGapMinutes(data: SleepData): Metric {
  const need = data.sleepNeed;
  if (!need) {
    throw new MetricUnavailableError('No sleep need data available');
  }
  const gap = need.actual - need.baseline;
  return buildMetric(
    gap,
    'minutes',
    `Sleep need gap: ${gap.toFixed(2)} minutes (positive = deficit, negative = surplus)`
  );
}

export const sleepInsights: Record<string, SleepInsight> = {
  time_in_bed: timeInBed,
  sleep_efficiency: sleepEfficiency,
  awakenings_per_hour: awakeningsPerHour,
  deep_sleep_percent: deepSleepPercent,
  rem_sleep_percent: remSleepPercent,
  light_sleep_percent: lightSleepPercent,
  sleep_fragmentation_index: sleepFragmentationIndex,
  stage_composition_analysis: stageCompositionAnalysis,
  sleep_need_gap_minutes: sleepNeedGapMinutes,
};
