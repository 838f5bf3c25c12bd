import { Readable, Writable } from 'node:stream';
import { createWeatherClient } from '../src/lib/weatherClient.js';
import { probeBackend, runBridge } from '../src/lib/startup.js';
import { captureLog, fakeHttp, networkError, testConfig, type RecordedCall, type Route } from './helpers.js';

function clientFor(route: Route, calls: RecordedCall[] = []) {
  return createWeatherClient(testConfig(), fakeHttp(route, calls));
}

describe('WeatherClient.probe', () => {
  test('issues GET /mcp with the probe timeout', async () => {
    const calls: RecordedCall[] = [];
    const result = await clientFor(() => ({ status: 200, body: '{"status":"ok","tools":["weather_info"]}' }), calls).probe();
    expect(result).toEqual({ ok: true, status: 200, tools: ['weather_info'] });
    expect(calls).toEqual([{ method: 'get', url: '/mcp', data: undefined, timeout: 2000 }]);
  });

  test('tolerates a body without a tool list', async () => {
    await expect(clientFor(() => ({ status: 200, body: 'OK' })).probe()).resolves.toEqual({ ok: true, status: 200, tools: [] });
  });

  test('reports unexpected statuses and connection failures', async () => {
    await expect(clientFor(() => ({ status: 503, body: '' })).probe()).resolves.toEqual({
      ok: false,
      status: 503,
      reason: 'unexpected status 503'
    });
    await expect(clientFor(networkError('ECONNREFUSED', 'connect ECONNREFUSED')).probe()).resolves.toEqual({
      ok: false,
      reason: 'ECONNREFUSED'
    });
  });
});

describe('probeBackend', () => {
  test('logs a successful connection with the advertised tools', async () => {
    const { log, lines } = captureLog();
    await probeBackend(clientFor(() => ({ status: 200, body: '{"tools":["weather_info"]}' })), log);
    expect(lines).toEqual(['[weather-bridge] INFO Connected to Weather API server at http://localhost:3000 (tools: weather_info)']);
  });

  test('warns on an unexpected status', async () => {
    const { log, lines } = captureLog();
    await probeBackend(clientFor(() => ({ status: 500, body: '' })), log);
    expect(lines).toEqual(['[weather-bridge] WARN Weather API server returned unexpected status 500']);
  });

  test('warns with a hint when nothing is listening', async () => {
    const { log, lines } = captureLog();
    await probeBackend(clientFor(networkError('ECONNREFUSED', 'connect ECONNREFUSED')), log);
    expect(lines).toEqual([
      '[weather-bridge] WARN Cannot connect to Weather API server at http://localhost:3000 (ECONNREFUSED)',
      '[weather-bridge] WARN Start the weather backend before calling tools (npm run mock:backend for local development)'
    ]);
  });
});

describe('runBridge', () => {
  test('serves the input stream and returns when it ends', async () => {
    const { log, lines } = captureLog();
    const chunks: string[] = [];
    const output = new Writable({
      write(chunk: Buffer | string, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      }
    });
    const config = testConfig({ WEATHER_BRIDGE_PROBE: 'false' });

    await runBridge(config, { input: Readable.from([Buffer.from('{"id":1,"method":"ping"}\n')]), output }, log);

    expect(chunks.join('')).toBe('{"jsonrpc":"2.0","id":1,"result":{}}\n');
    expect(lines).toEqual([
      '[weather-bridge] INFO MCP stdio bridge started, forwarding to http://localhost:3000',
      '[weather-bridge] DEBUG Received request: ping',
      '[weather-bridge] INFO Input closed, shutting down'
    ]);
  });
});
