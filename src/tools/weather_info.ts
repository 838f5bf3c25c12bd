import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { backendPort } from '../lib/config.js';
import { BridgeError, INTERNAL_ERROR, METHOD_NOT_FOUND, describeError, internalError } from '../lib/errors.js';
import type { Logger } from '../lib/log.js';
import { decodeWeatherInfo, extractErrorMessage, formatWeatherReport } from '../lib/results.js';
import { BackendUnavailableError, type WeatherClient } from '../lib/weatherClient.js';
import type { BackendReply } from '../types.js';

export const WEATHER_INFO_TOOL = 'weather_info';
export const MAX_CITIES = 20;

export const weatherInfoTool: Tool = {
  name: WEATHER_INFO_TOOL,
  description: 'Get weather information for specified cities from the Weather API',
  inputSchema: {
    type: 'object',
    properties: {
      cities: {
        type: 'array',
        items: { type: 'string' },
        description: `List of city names (max ${MAX_CITIES})`
      }
    },
    required: ['cities']
  }
};

export function unavailableMessage(baseUrl: string): string {
  return `Cannot connect to Weather API server at ${baseUrl}. Please ensure the weather backend is running on port ${backendPort(baseUrl)}.`;
}

/**
 * Forwards a `tools/call` to the backend and turns the HTTP outcome into a tool result.
 * Every failure surfaces as a `BridgeError`; the city limit is left to the backend.
 */
export async function callWeatherInfo(
  client: WeatherClient,
  params: Record<string, unknown> | undefined,
  log: Logger
): Promise<CallToolResult> {
  const name = params?.name;
  if (name !== WEATHER_INFO_TOOL) {
    throw new BridgeError(METHOD_NOT_FOUND, `Unknown tool: ${String(name)}`);
  }
  const args = params?.arguments ?? {};

  let reply: BackendReply;
  try {
    reply = await client.callWeatherInfo(args);
  } catch (error: unknown) {
    if (error instanceof BackendUnavailableError) {
      log.warn(describeError(error));
      throw new BridgeError(INTERNAL_ERROR, unavailableMessage(client.baseUrl));
    }
    log.error(`Error calling HTTP endpoint: ${describeError(error)}`);
    throw internalError(error);
  }

  if (reply.status !== 200) {
    throw new BridgeError(reply.status, extractErrorMessage(reply.body) ?? 'HTTP request failed');
  }

  let text: string;
  try {
    text = formatWeatherReport(decodeWeatherInfo(reply.body));
  } catch (error: unknown) {
    log.error(`Error calling HTTP endpoint: ${describeError(error)}`);
    throw internalError(error);
  }

  return { content: [{ type: 'text', text }] };
}
