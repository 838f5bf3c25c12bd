import fs from 'fs';
import http from 'http';
import path from 'path';
import { z } from 'zod';
import { describeError } from './errors.js';
import type { Logger } from './log.js';
import type { CityWeather } from '../types.js';
import { MAX_CITIES, WEATHER_INFO_TOOL } from '../tools/weather_info.js';
import { PROBE_PATH, TOOL_PATH } from './weatherClient.js';

const CityTableSchema = z.record(
  z.object({
    temperature: z.number(),
    condition: z.string(),
    humidity: z.number(),
    wind_speed: z.number()
  })
);

export type CityTable = Record<string, CityWeather>;

const UNKNOWN_CITY: CityWeather = { temperature: 20, condition: 'Unknown', humidity: 50, wind_speed: 10 };

let cache: CityTable | null = null;

export function loadCityTable(): CityTable {
  if (cache) return cache;
  const full = path.resolve(process.cwd(), 'resources', 'cities.json');
  cache = CityTableSchema.parse(JSON.parse(fs.readFileSync(full, 'utf-8')));
  return cache;
}

export interface MockReply {
  status: number;
  body: Record<string, unknown>;
}

const WeatherRequestSchema = z.object({ cities: z.array(z.string()) });

function errorReply(status: number, error: string, timestamp: string): MockReply {
  return { status, body: { tool: WEATHER_INFO_TOOL, status: 'error', timestamp, error, code: status } };
}

export function lookupWeather(body: unknown, table: CityTable, now: () => Date = () => new Date()): MockReply {
  const timestamp = now().toISOString();
  const parsed = WeatherRequestSchema.safeParse(body);
  if (!parsed.success) {
    return errorReply(400, 'Request body must be an object with a "cities" array of strings', timestamp);
  }
  const { cities } = parsed.data;
  if (cities.length === 0) {
    return errorReply(400, 'Cities list cannot be empty', timestamp);
  }
  if (cities.length > MAX_CITIES) {
    return errorReply(
      400,
      `Too many cities requested. Maximum is ${MAX_CITIES}, you requested ${cities.length}`,
      timestamp
    );
  }

  const results: Record<string, CityWeather & { city: string }> = {};
  for (const city of cities) {
    const known = Object.hasOwn(table, city.toLowerCase()) ? table[city.toLowerCase()] : undefined;
    results[city] = { city, ...(known ?? UNKNOWN_CITY) };
  }
  return { status: 200, body: { tool: WEATHER_INFO_TOOL, status: 'success', timestamp, results } };
}

export function healthBody(): Record<string, unknown> {
  return {
    service: 'Weather API - MCP Tool Provider',
    status: 'ok',
    version: '0.3.0',
    mcp_compatible: true,
    tools: [WEATHER_INFO_TOOL],
    endpoint: TOOL_PATH
  };
}

/** Routes one request of the mock backend; `body` is the raw request text. */
export function routeMockRequest(method: string, url: string, body: string, table: CityTable): MockReply {
  const pathname = url.split('?')[0];
  if (method === 'GET' && pathname === PROBE_PATH) {
    return { status: 200, body: healthBody() };
  }
  if (method === 'POST' && pathname === TOOL_PATH) {
    let payload: unknown;
    try {
      payload = JSON.parse(body);
    } catch {
      payload = undefined;
    }
    return lookupWeather(payload, table);
  }
  return { status: 404, body: { error: 'Not found' } };
}

/** Serves the mock routes on `port`. Listen failures such as EADDRINUSE are logged. */
export function startMockBackend(port: number, table: CityTable, log: Logger): http.Server {
  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => {
      const reply = routeMockRequest(req.method ?? 'GET', req.url ?? '/', Buffer.concat(chunks).toString('utf-8'), table);
      log.info(`${req.method} ${req.url} -> ${reply.status}`);
      res.writeHead(reply.status, { 'content-type': 'application/json' });
      res.end(JSON.stringify(reply.body));
    });
  });
  server.on('error', (error) => {
    log.error(`Mock backend could not listen on port ${port}: ${describeError(error)}`);
  });
  server.listen(port, () => {
    log.info(`Mock Weather API listening on http://localhost:${port}`);
  });
  return server;
}
