import readline from 'node:readline';
import type { Bridge } from '../serverCommon.js';
import { describeError, FrameParseError } from './errors.js';
import { parseFrame, serializeResponse } from './frame.js';
import type { Logger } from './log.js';
import type { JsonRpcRequest } from '../types.js';

export interface LineTransportOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  bridge: Bridge;
  log: Logger;
}

/**
 * Reads one frame at a time and answers it before looking at the next line.
 * Resolves when the input stream ends, or once the output stream has failed
 * (for example EPIPE after the client went away).
 */
export async function runLineLoop({ input, output, bridge, log }: LineTransportOptions): Promise<void> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });

  // Stays attached after the loop: a late EPIPE must not become an uncaught 'error'.
  let outputFailed = false;
  output.on('error', (error: Error) => {
    log.error(`Output stream failed: ${describeError(error)}`);
    outputFailed = true;
    rl.close();
  });

  try {
    for await (const line of rl) {
      if (outputFailed) break;
      let request: JsonRpcRequest | undefined;
      try {
        request = parseFrame(line);
      } catch (error: unknown) {
        if (!(error instanceof FrameParseError)) throw error;
        log.error(error.message);
        continue;
      }
      if (!request) continue;

      try {
        const response = await bridge.handle(request);
        if (response && !outputFailed) output.write(`${serializeResponse(response)}\n`);
      } catch (error: unknown) {
        log.error(`Error processing request: ${describeError(error)}`);
      }
    }
  } finally {
    rl.close();
  }
}
