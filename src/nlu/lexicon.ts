// src/nlu/lexicon.ts

export type MetricId = 'temperature' | 'rainfall' | 'humidity' | 'wind_speed' | 'pressure';

export interface MetricDefinition {
  id: MetricId;
  label: string;
  /** Unit reported by the provider in the metric unit system */
  unit: string;
  /** Tested against lower-cased text, in order; first hit wins */
  patterns: readonly RegExp[];
}

export const METRIC_ORDER: readonly MetricId[] = ['temperature', 'rainfall', 'humidity', 'wind_speed', 'pressure'];

// Patterns are substring matches unless they carry \b themselves.
const DEFINITIONS: Record<MetricId, MetricDefinition> = {
  temperature: {
    id: 'temperature',
    label: 'Temperature',
    unit: '°C',
    patterns: [/temp(?:erature)?/, /hotter/, /colder/, /degrees/, /°c/, /°f/, /\bweather\b/],
  },
  rainfall: {
    id: 'rainfall',
    label: 'Rainfall',
    unit: 'mm',
    patterns: [/rain(?:fall)?/, /precipitation/, /mm of rain/, /rainy/],
  },
  humidity: {
    id: 'humidity',
    label: 'Humidity',
    unit: '%',
    patterns: [/humidity/, /humid/],
  },
  wind_speed: {
    id: 'wind_speed',
    label: 'Wind Speed',
    unit: 'm/s',
    patterns: [/wind(?: speed)?/, /windspeed/, /wind gust/],
  },
  pressure: {
    id: 'pressure',
    label: 'Pressure',
    unit: 'hPa',
    patterns: [/pressure/, /hpa/, /atm/],
  },
};

export const METRICS: Readonly<Record<MetricId, MetricDefinition>> = Object.freeze(DEFINITIONS);

export function isMetricId(value: string): value is MetricId {
  return METRIC_ORDER.some(id => id === value);
}

export function getMetric(id: MetricId): MetricDefinition {
  return METRICS[id];
}
