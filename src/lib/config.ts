import { z } from 'zod';
import { ConfigError } from './errors.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

export const ConfigSchema = z.object({
  WEATHER_API_URL: z
    .string()
    .trim()
    .url()
    .default('http://localhost:3000')
    .transform((url) => url.replace(/\/+$/, '')),
  WEATHER_API_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  WEATHER_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(2_000),
  WEATHER_BRIDGE_PROBE: booleanFlag.default('true'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
});

export interface BridgeConfig {
  baseUrl: string;
  timeoutMs: number;
  probeTimeoutMs: number;
  probeOnStartup: boolean;
  logLevel: LogLevel;
}

export const MockConfigSchema = z.object({
  MOCK_PORT: z.coerce.number().int().min(1).max(65_535).default(3000)
});

type Env = Record<string, string | undefined>;

function parseEnv<T extends z.AnyZodObject>(schema: T, env: Env): z.infer<T> {
  const relevant: Env = {};
  for (const key of Object.keys(schema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== '') relevant[key] = value;
  }

  const parsed = schema.safeParse(relevant);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  return parsed.data;
}

/** Reads the bridge settings once; empty variables count as unset. */
export function loadConfig(env: Env = process.env): BridgeConfig {
  const data = parseEnv(ConfigSchema, env);
  return {
    baseUrl: data.WEATHER_API_URL,
    timeoutMs: data.WEATHER_API_TIMEOUT_MS,
    probeTimeoutMs: data.WEATHER_PROBE_TIMEOUT_MS,
    probeOnStartup: data.WEATHER_BRIDGE_PROBE,
    logLevel: data.LOG_LEVEL
  };
}

/** Port of the development mock backend; empty counts as unset. */
export function loadMockPort(env: Env = process.env): number {
  return parseEnv(MockConfigSchema, env).MOCK_PORT;
}

export function backendPort(baseUrl: string): string {
  const url = new URL(baseUrl);
  if (url.port) return url.port;
  return url.protocol === 'https:' ? '443' : '80';
}
