import 'dotenv/config';
import { loadMockPort } from './lib/config.js';
import { describeError } from './lib/errors.js';
import { createLogger } from './lib/log.js';
import { loadCityTable, startMockBackend } from './lib/mockWeather.js';

// Local stand-in for the Weather API: GET /mcp and POST /mcp/tool/weather_info.
const log = createLogger('info');

try {
  const server = startMockBackend(loadMockPort(), loadCityTable(), log);
  server.on('error', () => {
    process.exitCode = 1;
  });
} catch (err) {
  log.error(describeError(err));
  process.exitCode = 1;
}
