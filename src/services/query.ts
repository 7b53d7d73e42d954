// src/services/query.ts
import { MetricId, getMetric, isMetricId } from '../nlu/lexicon.js';
import { sanitizeLocation, splitLocations } from '../nlu/location.js';
import { AllLocationsFailedError, InvalidInputError, NoValidLocationError, UnknownMetricError, errorMessage } from '../utils/errors.js';
import { info, warn } from '../utils/logger.js';
import { resolveMetric } from './metrics.js';
import { WeatherGateway } from './weather.js';

export interface MetricQueryResult {
  metric: MetricId;
  location: string;
  value: number | null;
  units: string;
  provider: string;
}

export interface MetricQueryError {
  location: string;
  error: string;
}

export interface MetricQueryResponse {
  results: MetricQueryResult[];
  errors: MetricQueryError[];
}

type LocationOutcome =
  | { status: 'ok'; result: MetricQueryResult }
  | { status: 'failed'; error: MetricQueryError };

/**
 * Turn the raw location parameter into sanitized candidates.
 * Splitting happens first so each piece is cleaned on its own.
 */
export function locationCandidates(rawLocation: string): string[] {
  const candidates: string[] = [];
  for (const part of splitLocations(rawLocation)) {
    const clean = sanitizeLocation(part);
    if (clean) candidates.push(clean);
  }
  return candidates;
}

export class MetricQueryService {
  private gateway: WeatherGateway;

  constructor(gateway: WeatherGateway) {
    this.gateway = gateway;
  }

  /**
   * Look up one metric for every location in `rawLocation`.
   *
   * Per-location failures come back in `errors`; only request-level problems
   * throw: an unknown metric, a missing location, no usable candidate, or
   * every candidate failing.
   */
  async query(metric: string, rawLocation: string | null | undefined): Promise<MetricQueryResponse> {
    const metricId = metric.trim().toLowerCase();
    if (!isMetricId(metricId)) throw new UnknownMetricError(metricId);
    if (!rawLocation || !rawLocation.trim()) {
      throw new InvalidInputError('`location` query param is required');
    }

    const candidates = locationCandidates(rawLocation);
    if (candidates.length === 0) throw new NoValidLocationError(rawLocation);

    info('Metric query', { metric: metricId, rawLocation, candidates });

    const outcomes = await Promise.all(candidates.map(location => this.lookup(metricId, location)));

    const results: MetricQueryResult[] = [];
    const errors: MetricQueryError[] = [];
    for (const outcome of outcomes) {
      if (outcome.status === 'ok') {
        results.push(outcome.result);
      } else {
        errors.push(outcome.error);
      }
    }

    if (results.length === 0 && errors.length > 0) {
      throw new AllLocationsFailedError(errors);
    }

    return { results, errors };
  }

  private async lookup(metric: MetricId, location: string): Promise<LocationOutcome> {
    try {
      const payload = await this.gateway.fetchCurrent(location);
      return {
        status: 'ok',
        result: {
          metric,
          location,
          value: resolveMetric(metric, payload),
          units: getMetric(metric).unit,
          provider: this.gateway.name,
        },
      };
    } catch (err) {
      warn('Location lookup failed', { metric, location, error: errorMessage(err) });
      return { status: 'failed', error: { location, error: errorMessage(err) } };
    }
  }
}
