import { z } from 'zod';
import type { FitnessDocument } from '../../ports/FitnessServicePort.js';
import {
  buildMetric,
  formatInteger,
  metersToKilometers,
  requireNonZero,
  secondsToMinutes,
  toPercentage,
  type Metric,
} from './metrics.js';

// Missing, null or non-numeric fields read as zero.
const count = z.number().nullish().catch(null).transform((value) => value ?? 0);

const activitySchema = z.object({
  totalSteps: count,
  dailyStepGoal: count,
  totalKilocalories: count,
  totalDistanceMeters: count,
  sedentarySeconds: count,
  activeKilocalories: count,
  activeSeconds: count,
});

export type ActivityData = z.infer<typeof activitySchema>;

export interface ActivityContext {
  /** Minutes elapsed since local midnight, at least 1. */
  minutesSinceMidnight: number;
}

export type ActivityInsight = (data: ActivityData, context: ActivityContext) => Metric;

export function extractActivityData(document: FitnessDocument): ActivityData {
  return activitySchema.parse(document);
}

export function stepGoalPercent(data: ActivityData): Metric {
  requireNonZero(data, 'dailyStepGoal', 'step goal percent');
  const percent = toPercentage(data.totalSteps, data.dailyStepGoal);
  return buildMetric(
    percent,
    '%',
    `Step goal progress: ${percent.toFixed(2)}% (${formatInteger(data.totalSteps)} / ${formatInteger(data.dailyStepGoal)} steps)`
  );
}

export function caloriesPerStep(data: ActivityData): Metric {
  requireNonZero(data, 'totalSteps', 'calories per step');
  const value = data.totalKilocalories / data.totalSteps;
  return buildMetric(value, 'kcal/step', `Average calories per step: ${value.toFixed(2)} kcal/step`);
}

export function caloriesPerKm(data: ActivityData): Metric {
  requireNonZero(data, 'totalDistanceMeters', 'calories per km');
  const value = data.totalKilocalories / metersToKilometers(data.totalDistanceMeters);
  return buildMetric(
    value,
    'kcal/km',
    `Average calories per kilometer: ${value.toFixed(2)} kcal/km`
  );
}

export function strideLength(data: ActivityData): Metric {
  requireNonZero(data, 'totalSteps', 'stride length');
  const value = data.totalDistanceMeters / data.totalSteps;
  return buildMetric(
    value,
    'm/step',
    `Average stride length: ${value.toFixed(2)} meters per step`
  );
}

export function sedentaryRatio(data: ActivityData, context: ActivityContext): Metric {
  const elapsed = context.minutesSinceMidnight;
  const value = secondsToMinutes(data.sedentarySeconds) / elapsed;
  return buildMetric(
    value,
    'ratio',
    `Sedentary time ratio: ${value.toFixed(2)} (${Math.floor(data.sedentarySeconds / 60)} min sedentary / ${elapsed} min elapsed)`
  );
}

export function stepsPerKm(data: ActivityData): Metric {
  requireNonZero(data, 'totalDistanceMeters', 'steps per km');
  const value = data.totalSteps / metersToKilometers(data.totalDistanceMeters);
  return buildMetric(value, 'steps/km', `Average steps per kilometer: ${value.toFixed(2)} steps/km`);
}

export function activeMinutesPercent(data: ActivityData, context: ActivityContext): Metric {
  const elapsed = context.minutesSinceMidnight;
  const value = toPercentage(secondsToMinutes(data.activeSeconds), elapsed);
  return buildMetric(
    value,
    '%',
    `Active time percentage: ${value.toFixed(2)}% (${Math.floor(data.activeSeconds / 60)} min active / ${elapsed} min elapsed)`
  );
}

export function caloriesPerActiveMinute(data: ActivityData): Metric {
  requireNonZero(data, 'activeSeconds', 'calories per active minute');
  const value = data.activeKilocalories / secondsToMinutes(data.activeSeconds);
  return buildMetric(
    value,
    'kcal/min',
    `Average calories per active minute: ${value.toFixed(2)} kcal/min`
  );
}

export const activityInsights: Record<string, ActivityInsight> = {
  step_goal_percent: stepGoalPercent,
  calories_per_step: caloriesPerStep,
  calories_per_km: caloriesPerKm,
  stride_length: strideLength,
  sedentary_ratio: sedentaryRatio,
  steps_per_km: stepsPerKm,
  active_minutes_percent: activeMinutesPercent,
  calories_per_active_min: caloriesPerActiveMinute,
};
