import { z } from 'zod';
import type { CityWeather, WeatherInfoResponse, WeatherReport } from '../types.js';

const CityWeatherSchema = z
  .object({
    temperature: z.number(),
    condition: z.string(),
    humidity: z.number(),
    wind_speed: z.number()
  })
  .passthrough();

export const WeatherInfoResponseSchema = z
  .object({
    timestamp: z.string(),
    results: z.record(CityWeatherSchema)
  })
  .passthrough();

const ErrorBodySchema = z.object({ error: z.string() });

export const SEPARATOR = '='.repeat(60);

export class MalformedBackendResponseError extends Error {
  constructor(details: string) {
    super(`Malformed response from weather backend: ${details}`);
    this.name = 'MalformedBackendResponseError';
  }
}

export function decodeWeatherInfo(body: string): WeatherReport {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    throw new MalformedBackendResponseError('body is not valid JSON');
  }
  const parsed = WeatherInfoResponseSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new MalformedBackendResponseError(details);
  }

  const { timestamp, results }: WeatherInfoResponse = parsed.data;
  const order = new Set(resultsKeyOrder(body).filter((city) => Object.hasOwn(results, city)));
  for (const city of Object.keys(results)) order.add(city);
  return { timestamp, cities: [...order].map((city): [string, CityWeather] => [city, results[city]]) };
}

/**
 * Keys of the top-level `results` object in the order they appear in `text`.
 * JSON.parse puts integer-like keys ("10001") first, so the order is read from
 * the source. Expects text that already parsed as JSON.
 */
export function resultsKeyOrder(text: string): string[] {
  const keys: string[] = [];
  let depth = 0;
  let resultsDepth = -1;
  let awaitingResults = false;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '{' || ch === '[') {
      depth++;
      if (awaitingResults && ch === '{') resultsDepth = depth;
      awaitingResults = false;
    } else if (ch === '}' || ch === ']') {
      if (depth === resultsDepth) return keys;
      depth--;
    } else if (ch === '"') {
      const end = closingQuote(text, i);
      const token: unknown = JSON.parse(text.slice(i, end + 1));
      i = end;
      awaitingResults = false;
      if (typeof token !== 'string' || nextSignificant(text, end + 1) !== ':') continue;
      if (depth === resultsDepth) keys.push(token);
      else if (depth === 1 && resultsDepth === -1 && token === 'results') awaitingResults = true;
    } else if (awaitingResults && ch !== ':' && !/\s/.test(ch)) {
      awaitingResults = false;
    }
  }
  return keys;
}

function closingQuote(text: string, start: number): number {
  for (let i = start + 1; i < text.length; i++) {
    if (text[i] === '\\') i++;
    else if (text[i] === '"') return i;
  }
  return text.length - 1;
}

function nextSignificant(text: string, from: number): string | undefined {
  for (let i = from; i < text.length; i++) {
    if (!/\s/.test(text[i])) return text[i];
  }
  return undefined;
}

/** The backend's `error` field from a failure body, if there is one. */
export function extractErrorMessage(body: string): string | undefined {
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(body));
    return parsed.success ? parsed.data.error : undefined;
  } catch {
    return undefined;
  }
}

function formatCity(city: string, info: CityWeather): string[] {
  return [
    `\n🌍 ${city}`,
    `   Temperature: ${info.temperature}°C`,
    `   Condition: ${info.condition}`,
    `   Humidity: ${info.humidity}%`,
    `   Wind Speed: ${info.wind_speed} km/h`
  ];
}

export function formatWeatherReport(report: WeatherReport): string {
  const lines = [`Weather Information (Retrieved: ${report.timestamp})`, SEPARATOR];
  for (const [city, info] of report.cities) {
    lines.push(...formatCity(city, info));
  }
  return lines.join('\n');
}
