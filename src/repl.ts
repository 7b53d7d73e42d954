// src/repl.ts
import readline from 'readline';
import { extractIntent, ExtractionResult } from './nlu/extractor.js';
import { getMetric, MetricId } from './nlu/lexicon.js';
import { sanitizeLocation } from './nlu/location.js';
import { MetricQueryResponse, MetricQueryService } from './services/query.js';
import { AllLocationsFailedError, errorMessage } from './utils/errors.js';
import { info } from './utils/logger.js';

export interface MetricAnswer {
  metric: MetricId;
  response?: MetricQueryResponse;
  failure?: string;
}

function formatValue(value: number | null, unit: string): string {
  return value === null ? 'no reading' : `${value} ${unit}`;
}

/**
 * Render answers as plain lines, one per location.
 */
export function formatAnswer(intent: ExtractionResult, answers: MetricAnswer[]): string {
  if (intent.metrics.length === 0) {
    return "I couldn't tell which measurement you want. Try temperature, rain, humidity, wind or pressure.";
  }
  if (!intent.location) {
    return 'Where? Mention a place, e.g. "in Paris".';
  }

  const lines: string[] = [];
  for (const answer of answers) {
    const { label, unit } = getMetric(answer.metric);
    if (answer.failure) {
      lines.push(`${label}: ${answer.failure}`);
      continue;
    }
    for (const result of answer.response?.results ?? []) {
      lines.push(`${label} in ${result.location}: ${formatValue(result.value, unit)}`);
    }
    for (const failed of answer.response?.errors ?? []) {
      lines.push(`${label} in ${failed.location}: unavailable (${failed.error})`);
    }
  }
  if (intent.time) {
    lines.push(`(showing current conditions; "${intent.time}" is not supported yet)`);
  }
  return lines.join('\n');
}

/**
 * Extract an intent from a question and query every metric it names.
 */
export async function answerQuestion(queries: MetricQueryService, text: string): Promise<string> {
  const intent = extractIntent(text);
  const answers: MetricAnswer[] = [];

  if (intent.location && sanitizeLocation(intent.location) !== null) {
    for (const metric of intent.metrics) {
      try {
        answers.push({ metric, response: await queries.query(metric, intent.location) });
      } catch (err) {
        const failure = err instanceof AllLocationsFailedError
          ? err.errors.map(e => `${e.location}: ${e.error}`).join('; ')
          : errorMessage(err);
        answers.push({ metric, failure });
      }
    }
  } else if (intent.location) {
    return `"${intent.location}" doesn't look like a place I can look up.`;
  }

  return formatAnswer(intent, answers);
}

export async function startRepl(queries: MetricQueryService): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: '> ',
  });

  console.log('Ask about the weather (e.g. "humidity in Paris and Tokyo"). Type "exit" to quit.');
  rl.prompt();

  return new Promise((resolve) => {
    rl.on('line', async (line) => {
      const input = line.trim();
      if (input === 'exit' || input === 'quit') {
        rl.close();
        return;
      }
      if (input) {
        rl.pause();
        console.log(await answerQuestion(queries, input));
        rl.resume();
      }
      rl.prompt();
    });

    rl.on('close', () => {
      info('REPL closed');
      resolve();
    });
  });
}
