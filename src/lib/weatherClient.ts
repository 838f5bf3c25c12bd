import http from 'http';
import https from 'https';
import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import type { BridgeConfig } from './config.js';
import type { BackendReply } from '../types.js';

export const TOOL_PATH = '/mcp/tool/weather_info';
export const PROBE_PATH = '/mcp';

// Network-level failures that mean nothing is listening at the configured address.
const CONNECTION_FAILURES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EADDRNOTAVAIL',
  'ECONNRESET',
  'EAI_AGAIN',
  'ETIMEDOUT'
]);

// axios reports its own timeout as ECONNABORTED (ETIMEDOUT with clarifyTimeoutError).
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

// Requests whose socket finished connecting to the backend.
const connected = new WeakSet<http.ClientRequest>();

export class BackendUnavailableError extends Error {
  constructor(baseUrl: string, cause: unknown) {
    super(`Weather API server at ${baseUrl} is unreachable`, { cause });
    this.name = 'BackendUnavailableError';
  }
}

export function reachedServer(request: unknown): boolean {
  return request instanceof http.ClientRequest && connected.has(request);
}

/**
 * True when the failure happened before any connection to the backend existed:
 * one of the network codes above, or a timeout that fired while still connecting.
 */
export function isConnectionFailure(err: unknown): boolean {
  if (!axios.isAxiosError(err) || err.response || typeof err.code !== 'string') return false;
  if (TIMEOUT_CODES.has(err.code)) return !reachedServer(err.request);
  return CONNECTION_FAILURES.has(err.code);
}

function connectTimeoutError(ms: number): Error {
  return Object.assign(new Error(`connect ETIMEDOUT after ${ms}ms`), { code: 'ETIMEDOUT' });
}

/**
 * An axios `transport` that records which requests got a connected socket and
 * destroys a request whose socket is still connecting after `connectTimeoutMs`.
 */
export function connectTrackingTransport(connectTimeoutMs: number) {
  return {
    request(options: http.RequestOptions, callback?: (res: http.IncomingMessage) => void): http.ClientRequest {
      const req = options.protocol === 'https:' ? https.request(options, callback) : http.request(options, callback);
      req.once('socket', (socket) => {
        if (!socket.connecting) {
          connected.add(req);
          return;
        }
        const timer = setTimeout(() => req.destroy(connectTimeoutError(connectTimeoutMs)), connectTimeoutMs);
        socket.once('connect', () => {
          clearTimeout(timer);
          connected.add(req);
        });
        req.once('close', () => clearTimeout(timer));
      });
      return req;
    }
  };
}

export type ProbeResult =
  | { ok: true; status: number; tools: string[] }
  | { ok: false; status?: number; reason: string };

export interface WeatherClient {
  readonly baseUrl: string;
  /** Single attempt, no retries. Every HTTP status resolves; only transport failures reject. */
  callWeatherInfo(args: unknown): Promise<BackendReply>;
  probe(): Promise<ProbeResult>;
}

export function createHttp(config: BridgeConfig, overrides: CreateAxiosDefaults = {}): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    transport: connectTrackingTransport(config.timeoutMs),
    ...overrides
  });
}

export function createWeatherClient(config: BridgeConfig, http: AxiosInstance = createHttp(config)): WeatherClient {
  async function callWeatherInfo(args: unknown): Promise<BackendReply> {
    try {
      const res = await http.post<string>(TOOL_PATH, args, {
        headers: {
          'Accept': 'application/json',
          'Content-Type': 'application/json'
        },
        timeout: config.timeoutMs,
        responseType: 'text',
        validateStatus: () => true
      });
      return { status: res.status, body: typeof res.data === 'string' ? res.data : JSON.stringify(res.data) };
    } catch (error) {
      if (isConnectionFailure(error)) {
        throw new BackendUnavailableError(config.baseUrl, error);
      }
      throw error;
    }
  }

  async function probe(): Promise<ProbeResult> {
    try {
      const res = await http.get<unknown>(PROBE_PATH, {
        headers: { 'Accept': 'application/json' },
        timeout: config.probeTimeoutMs,
        validateStatus: () => true
      });
      if (res.status !== 200) {
        return { ok: false, status: res.status, reason: `unexpected status ${res.status}` };
      }
      return { ok: true, status: res.status, tools: advertisedTools(res.data) };
    } catch (error: unknown) {
      const reason = axios.isAxiosError(error) ? error.code ?? error.message : String(error);
      return { ok: false, reason };
    }
  }

  return { baseUrl: config.baseUrl, callWeatherInfo, probe };
}

function advertisedTools(body: unknown): string[] {
  if (typeof body !== 'object' || body === null || !('tools' in body)) return [];
  const tools = body.tools;
  return Array.isArray(tools) ? tools.filter((t): t is string => typeof t === 'string') : [];
}
