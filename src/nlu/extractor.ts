// src/nlu/extractor.ts
import { METRIC_ORDER, METRICS, MetricId } from './lexicon.js';

export interface ExtractionResult {
  /** Matched metrics in lexicon order, each at most once */
  metrics: MetricId[];
  /** Raw location phrase, unsanitized */
  location: string | null;
  time: string | null;
}

// Only the first "in <phrase>" clause is captured. A second clause
// ("rain in Paris and snow in London") ends up inside the same phrase
// and is left for the splitter to divide.
const LOCATION_PATTERN = /\bin\s+([A-Za-z0-9 \-_,]+)/i;

const TIME_PATTERN = new RegExp(
  '\\b(' +
    [
      'january', 'february', 'march', 'april', 'may', 'june', 'july',
      'august', 'september', 'october', 'november', 'december',
      'jan', 'feb', 'mar', 'apr', 'jun', 'jul', 'aug', 'sept', 'sep', 'oct', 'nov', 'dec',
      'today', 'now', 'yesterday', 'last week', 'this week', 'next week',
    ].join('|') +
    ')\\b'
);

export function detectMetrics(lowered: string): MetricId[] {
  return METRIC_ORDER.filter(id => METRICS[id].patterns.some(pattern => pattern.test(lowered)));
}

export function detectLocation(text: string): string | null {
  const match = text.match(LOCATION_PATTERN);
  const phrase = match?.[1]?.trim();
  return phrase ? phrase : null;
}

export function detectTime(lowered: string): string | null {
  const match = lowered.match(TIME_PATTERN);
  return match ? match[1] : null;
}

/**
 * Pull metrics, a location phrase and a time phrase out of free text.
 * Pure: the result depends on `text` alone.
 */
export function extractIntent(text: string): ExtractionResult {
  const lowered = text.toLowerCase();
  return {
    metrics: detectMetrics(lowered),
    location: detectLocation(text),
    time: detectTime(lowered),
  };
}
