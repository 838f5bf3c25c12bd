import type { BridgeConfig } from './config.js';
import { runLineLoop } from './lineTransport.js';
import { createLogger, type Logger } from './log.js';
import { createWeatherClient, type WeatherClient } from './weatherClient.js';
import { buildBridge } from '../serverCommon.js';

/** Advisory only: the bridge serves requests whatever the outcome. */
export async function probeBackend(client: WeatherClient, log: Logger): Promise<void> {
  const result = await client.probe();
  if (result.ok) {
    const tools = result.tools.length ? ` (tools: ${result.tools.join(', ')})` : '';
    log.info(`Connected to Weather API server at ${client.baseUrl}${tools}`);
  } else if (result.status !== undefined) {
    log.warn(`Weather API server returned unexpected status ${result.status}`);
  } else {
    log.warn(`Cannot connect to Weather API server at ${client.baseUrl} (${result.reason})`);
    log.warn('Start the weather backend before calling tools (npm run mock:backend for local development)');
  }
}

export async function runBridge(
  config: BridgeConfig,
  io: { input: NodeJS.ReadableStream; output: NodeJS.WritableStream } = { input: process.stdin, output: process.stdout },
  log: Logger = createLogger(config.logLevel)
): Promise<void> {
  const client = createWeatherClient(config);
  log.info(`MCP stdio bridge started, forwarding to ${config.baseUrl}`);
  if (config.probeOnStartup) await probeBackend(client, log);

  const bridge = buildBridge(config, { log, client });
  await runLineLoop({ ...io, bridge, log });
  log.info('Input closed, shutting down');
}
