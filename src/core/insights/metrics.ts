import { MetricUnavailableError } from '../../utils/errors.js';

export interface Metric {
  metric: number;
  unit: string;
  description: string;
}

function roundTo(value: number, decimals = 2): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function buildMetric(value: number, unit: string, description: string): Metric {
  return { metric: roundTo(value), unit, description };
}

/** Throws a 404-mapped error when a required input is zero or missing. */
export function requireNonZero<T extends object>(
  data: T,
  field: keyof T & string,
  metricName: string
): void {
  const value: unknown = data[field];
  if (value === 0 || value === null || value === undefined) {
    throw new MetricUnavailableError(`No ${field} data available for ${metricName}`);
  }
}

export function toPercentage(value: number, total: number): number {
  return (value / total) * 100;
}

export function secondsToHours(seconds: number): number {
  return seconds / 3600;
}

export function secondsToMinutes(seconds: number): number {
  return seconds / 60;
}

export function metersToKilometers(meters: number): number {
  return meters / 1000;
}

export function formatInteger(value: number): string {
  return value.toLocaleString('en-US');
}
