// src/utils/errors.ts
import type { MetricQueryError } from '../services/query.js';

export type WeatherErrorCode =
  | 'INVALID_INPUT'
  | 'CREDENTIALS_MISSING'
  | 'PROVIDER_ERROR'
  | 'ALL_LOCATIONS_FAILED';

export class WeatherError extends Error {
  readonly code: WeatherErrorCode;
  constructor(code: WeatherErrorCode, message: string) {
    super(message);
    this.name = 'WeatherError';
    this.code = code;
  }
}

/** Bad or missing request parameters; the caller can fix these. */
export class InvalidInputError extends WeatherError {
  constructor(message: string) {
    super('INVALID_INPUT', message);
    this.name = 'InvalidInputError';
  }
}

export class UnknownMetricError extends InvalidInputError {
  readonly metric: string;
  constructor(metric: string) {
    super(`Metric '${metric}' not supported.`);
    this.name = 'UnknownMetricError';
    this.metric = metric;
  }
}

export class NoValidLocationError extends InvalidInputError {
  readonly rawLocation: string;
  constructor(rawLocation: string) {
    super('No valid location found after parsing/sanitization');
    this.name = 'NoValidLocationError';
    this.rawLocation = rawLocation;
  }
}

export class CredentialsMissingError extends WeatherError {
  constructor() {
    super('CREDENTIALS_MISSING', 'OpenWeather API key is missing. Set OWM_API_KEY (or OWA) in environment.');
    this.name = 'CredentialsMissingError';
  }
}

/**
 * Upstream failure for one location. `status` is null when no response came
 * back at all (network error or timeout).
 */
export class ProviderError extends WeatherError {
  readonly status: number | null;
  readonly body: string;
  constructor(message: string, status: number | null, body = '') {
    super('PROVIDER_ERROR', message);
    this.name = 'ProviderError';
    this.status = status;
    this.body = body;
  }
}

export class AllLocationsFailedError extends WeatherError {
  readonly errors: MetricQueryError[];
  constructor(errors: MetricQueryError[]) {
    super('ALL_LOCATIONS_FAILED', `All ${errors.length} location lookup(s) failed`);
    this.name = 'AllLocationsFailedError';
    this.errors = errors;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
