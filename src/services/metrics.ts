// src/services/metrics.ts
import { MetricId } from '../nlu/lexicon.js';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function numberAt(payload: unknown, section: string, field: string): number | null {
  if (!isObject(payload)) return null;
  const group = payload[section];
  if (!isObject(group)) return null;
  const value = group[field];
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

function rainfall(payload: unknown): number {
  // 0 in "1h" counts as no reading and falls through to "3h"
  return numberAt(payload, 'rain', '1h') || numberAt(payload, 'rain', '3h') || 0.0;
}

/**
 * Map an OpenWeather current-conditions payload to the value of one metric.
 * Returns null when the provider left the field out.
 */
export function resolveMetric(metric: MetricId, payload: unknown): number | null {
  switch (metric) {
    case 'temperature':
      return numberAt(payload, 'main', 'temp');
    case 'humidity':
      return numberAt(payload, 'main', 'humidity');
    case 'pressure':
      return numberAt(payload, 'main', 'pressure');
    case 'wind_speed':
      return numberAt(payload, 'wind', 'speed');
    case 'rainfall':
      return rainfall(payload);
    default: {
      // unreachable for a MetricId; callers outside the type system get null
      const unhandled: never = metric;
      void unhandled;
      return null;
    }
  }
}
