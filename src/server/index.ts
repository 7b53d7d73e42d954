// src/server/index.ts
// HTTP API: intent extraction and metric lookup

import express from 'express';
import cors from 'cors';
import { createServer, Server } from 'http';
import { AddressInfo } from 'net';
import { z } from 'zod';
import { extractIntent } from '../nlu/extractor.js';
import { METRIC_ORDER, METRICS } from '../nlu/lexicon.js';
import { MetricQueryService } from '../services/query.js';
import { AllLocationsFailedError, InvalidInputError, errorMessage } from '../utils/errors.js';
import { info, error, debug } from '../utils/logger.js';

const ExtractRequestSchema = z.object({
  text: z.string(),
});

export interface ExtractResponse {
  metrics: string[];
  raw_text: string;
  location: string | null;
  time: string | null;
}

export interface AppOptions {
  queries: MetricQueryService;
  corsOrigin?: string;
}

export function createApp(options: AppOptions): express.Express {
  const app = express();
  const { queries } = options;

  app.use(cors({ origin: options.corsOrigin ?? '*' }));
  app.use(express.json({ limit: '1mb' }));

  app.post('/extract_metric', (req, res) => {
    const parsed = ExtractRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: '`text` must be a string' });
      return;
    }

    const text = parsed.data.text;
    try {
      const intent = extractIntent(text);
      debug('Extracted intent', { ...intent });
      const body: ExtractResponse = {
        metrics: intent.metrics,
        raw_text: text,
        location: intent.location,
        time: intent.time,
      };
      res.json(body);
    } catch (err) {
      const trace = err instanceof Error && err.stack ? err.stack : String(err);
      error('extract_metric failed', { error: errorMessage(err), trace });
      res.status(500).json({ error: errorMessage(err), trace });
    }
  });

  app.get('/get_metric', async (req, res) => {
    const metric = typeof req.query.metric === 'string' ? req.query.metric : '';
    const location = typeof req.query.location === 'string' ? req.query.location : undefined;

    try {
      const response = await queries.query(metric, location);
      info('get_metric answered', {
        metric,
        results: response.results.length,
        errors: response.errors.length,
      });
      res.json(response);
    } catch (err) {
      if (err instanceof InvalidInputError) {
        res.status(400).json({ error: err.message });
      } else if (err instanceof AllLocationsFailedError) {
        res.status(502).json({ errors: err.errors });
      } else {
        error('get_metric failed', { error: errorMessage(err) });
        res.status(500).json({ error: 'Failed to query metric' });
      }
    }
  });

  app.get('/metrics', (_req, res) => {
    res.json(METRIC_ORDER.map(key => {
      const { id, label, unit } = METRICS[key];
      return { id, label, unit };
    }));
  });

  return app;
}

export class NluServer {
  private app: express.Express;
  private server: Server;

  constructor(options: AppOptions) {
    this.app = createApp(options);
    this.server = createServer(this.app);
  }

  start(port: number = 8000, host: string = 'localhost'): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, host, () => {
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Server is not listening on a TCP port'));
          return;
        }
        info(`NLU server running at http://${host}:${address.port}`);
        resolve(address);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close(err => (err ? reject(err) : resolve()));
    });
  }
}
