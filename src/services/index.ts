// src/services/index.ts
import { Config } from '../config.js';
import { MetricQueryService } from './query.js';
import { OpenWeatherGateway } from './weather.js';
import { info } from '../utils/logger.js';

export interface ServiceContainer {
  // Config (source of truth)
  config: Config;

  // Provider boundary
  weather: OpenWeatherGateway;

  // Fan-out over locations
  queries: MetricQueryService;
}

export async function initServices(config: Config): Promise<ServiceContainer> {
  info('Initializing services...');

  const weather = new OpenWeatherGateway(config);
  await weather.initialize();

  const queries = new MetricQueryService(weather);

  info('All services initialized');

  return { config, weather, queries };
}

export function closeServices(services: ServiceContainer): void {
  info('Closing services...');
  services.weather.close();
}

