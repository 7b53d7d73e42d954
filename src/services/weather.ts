// src/services/weather.ts
import { Config } from '../config.js';
import { CredentialsMissingError, InvalidInputError, ProviderError, errorMessage } from '../utils/errors.js';
import { debug, info } from '../utils/logger.js';

export const PROVIDER_NAME = 'openweathermap';

/**
 * Anything that can fetch current conditions for one place.
 * The payload is provider-shaped JSON; MetricResolver reads it.
 */
export interface WeatherGateway {
  readonly name: string;
  fetchCurrent(location: string): Promise<unknown>;
}

export class OpenWeatherGateway implements WeatherGateway {
  readonly name = PROVIDER_NAME;
  private config: Config;

  constructor(config: Config) {
    this.config = config;
  }

  async initialize(): Promise<void> {
    if (this.isConfigured()) {
      info('OpenWeatherGateway initialized', { baseUrl: this.config.weather.baseUrl });
    } else {
      info('OpenWeatherGateway: no API key, metric queries will fail until OWM_API_KEY is set');
    }
  }

  isConfigured(): boolean {
    return !!this.config.weather.apiKey;
  }

  async fetchCurrent(location: string): Promise<unknown> {
    const apiKey = this.config.weather.apiKey;
    if (!apiKey) throw new CredentialsMissingError();
    if (!location) throw new InvalidInputError('Location is empty.');

    const url = new URL(`${this.config.weather.baseUrl}/weather`);
    url.searchParams.set('q', location);
    url.searchParams.set('appid', apiKey);
    url.searchParams.set('units', 'metric');

    debug('Calling OpenWeather API', { url: redactKey(url) });

    const timeout = this.config.weather.timeout;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    // The timer covers the body reads too, not just the headers
    try {
      const response = await untilAborted(controller.signal, fetch(url, { signal: controller.signal }));

      if (!response.ok) {
        const body = await untilAborted(controller.signal, response.text());
        throw new ProviderError(`${response.status} ${response.statusText}: ${body}`, response.status, body);
      }

      return await untilAborted(controller.signal, response.json());
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      const reason = controller.signal.aborted ? `timed out after ${timeout}ms` : errorMessage(err);
      throw new ProviderError(`Request to OpenWeather failed: ${reason}`, null);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  close(): void {}
}

/** Settle with `work`, or reject as soon as `signal` aborts. */
function untilAborted<T>(signal: AbortSignal, work: Promise<T>): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error('aborted'));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void work
      .then(resolve, reject)
      .finally(() => signal.removeEventListener('abort', onAbort));
  });
}

function redactKey(url: URL): string {
  const copy = new URL(url);
  if (copy.searchParams.has('appid')) copy.searchParams.set('appid', '***');
  return copy.toString();
}
