import axios, { type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import { loadConfig, type BridgeConfig } from '../src/lib/config.js';
import { createLogger, type Logger } from '../src/lib/log.js';

export interface RecordedCall {
  method?: string;
  url?: string;
  data?: unknown;
  timeout?: number;
}

export interface FakeReply {
  status: number;
  body: string;
}

export type Route = (config: InternalAxiosRequestConfig) => FakeReply | Promise<FakeReply>;

/** An axios instance whose requests are answered in process by `route`. */
export function fakeHttp(route: Route, calls: RecordedCall[] = []): AxiosInstance {
  return axios.create({
    baseURL: 'http://localhost:3000',
    adapter: async (config) => {
      calls.push({ method: config.method, url: config.url, data: config.data, timeout: config.timeout });
      const reply = await route(config);
      return { data: reply.body, status: reply.status, statusText: String(reply.status), headers: {}, config };
    }
  });
}

export function networkError(code: string, message: string): Route {
  return (config) => {
    throw new axios.AxiosError(message, code, config);
  };
}

export function testConfig(env: Record<string, string> = {}): BridgeConfig {
  return loadConfig(env);
}

export function captureLog(): { log: Logger; lines: string[] } {
  const lines: string[] = [];
  return { log: createLogger('debug', (line) => lines.push(line)), lines };
}

export const PARIS_BODY = JSON.stringify({
  tool: 'weather_info',
  status: 'success',
  timestamp: '2024-01-01T00:00:00Z',
  results: { Paris: { city: 'Paris', temperature: 18, condition: 'Cloudy', humidity: 60, wind_speed: 12 } }
});

export const PARIS_REPORT = [
  'Weather Information (Retrieved: 2024-01-01T00:00:00Z)',
  '='.repeat(60),
  '',
  '🌍 Paris',
  '   Temperature: 18°C',
  '   Condition: Cloudy',
  '   Humidity: 60%',
  '   Wind Speed: 12 km/h'
].join('\n');
