// src/config.ts
import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

// === Schema ===

const ConfigSchema = z.object({
  server: z.object({
    port: z.number().int().min(0).max(65535),
    host: z.string(),
    corsOrigin: z.string(),
  }),

  weather: z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().url(),
    timeout: z.number().positive(),
  }),

  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    file: z.string().optional(),
    console: z.boolean(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

// === Loader ===

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const config = ConfigSchema.parse({
    server: {
      port: parseInt(env.PORT || '8000'),
      host: env.HOST || 'localhost',
      corsOrigin: env.CORS_ORIGIN || '*',
    },
    weather: {
      // OWA is the older name, still accepted
      apiKey: env.OWM_API_KEY || env.OWA || undefined,
      baseUrl: env.OWM_BASE_URL || 'https://api.openweathermap.org/data/2.5',
      timeout: parseInt(env.WEATHER_TIMEOUT || '10000'),
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
      file: env.LOG_FILE || undefined,
      console: env.LOG_CONSOLE !== 'false',
    },
  });

  return config;
}
