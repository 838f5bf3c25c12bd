#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './lib/config.js';
import { runBridge } from './lib/startup.js';

async function main() {
  const config = loadConfig();
  await runBridge(config);
}

main().catch((err) => {
  console.error('MCP stdio bridge failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
