import type { InitializeResult, ListToolsResult } from '@modelcontextprotocol/sdk/types.js';
import type { BridgeConfig } from './lib/config.js';
import { BridgeError, METHOD_NOT_FOUND, describeError, internalError } from './lib/errors.js';
import { failure, success } from './lib/frame.js';
import type { Logger } from './lib/log.js';
import { createWeatherClient, type WeatherClient } from './lib/weatherClient.js';
import { callWeatherInfo, weatherInfoTool } from './tools/weather_info.js';
import type { JsonRpcRequest, JsonRpcResponse } from './types.js';

export const PROTOCOL_VERSION = '2024-11-05';
export const SERVER_INFO = { name: 'weather-api-bridge', version: '0.3.0' };

export interface Bridge {
  /** Resolves to `undefined` for notifications, which are never answered. */
  handle(request: JsonRpcRequest): Promise<JsonRpcResponse | undefined>;
}

export interface BridgeDeps {
  log: Logger;
  client?: WeatherClient;
}

type Handler = (request: JsonRpcRequest) => unknown;

export function buildBridge(config: BridgeConfig, deps: BridgeDeps): Bridge {
  const { log } = deps;
  const client = deps.client ?? createWeatherClient(config);

  const initialize: InitializeResult = {
    protocolVersion: PROTOCOL_VERSION,
    capabilities: { tools: {} },
    serverInfo: SERVER_INFO
  };
  const toolList: ListToolsResult = { tools: [weatherInfoTool] };

  const handlers: Record<string, Handler> = {
    initialize: () => initialize,
    'tools/list': () => toolList,
    'tools/call': (request) => callWeatherInfo(client, request.params, log),
    ping: () => ({})
  };

  async function handle(request: JsonRpcRequest): Promise<JsonRpcResponse | undefined> {
    const { id, method } = request;
    log.debug(`Received request: ${method}`);

    if (method === 'notifications/initialized') return undefined;
    if (id === undefined && method.startsWith('notifications/')) return undefined;

    const handler = Object.hasOwn(handlers, method) ? handlers[method] : undefined;
    if (!handler) {
      return failure(id, METHOD_NOT_FOUND, `Method not found: ${method}`);
    }

    try {
      return success(id, await handler(request));
    } catch (error: unknown) {
      if (error instanceof BridgeError) {
        return failure(id, error.code, error.message);
      }
      log.error(`Error processing request ${method}: ${describeError(error)}`);
      const internal = internalError(error);
      return failure(id, internal.code, internal.message);
    }
  }

  return { handle };
}
