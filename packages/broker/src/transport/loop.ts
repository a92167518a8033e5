import { once } from 'node:events';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { Logger } from '../logging/logger.js';
import type { Router } from '../router/router.js';
import type { OutboundEvent } from '../types/index.js';
import { decodeLine, encodeEvent } from './protocol.js';

export type TransportLoopOptions = {
  readonly input: Readable;
  readonly output: Writable;
  readonly router: Pick<Router, 'handle'>;
  readonly logger: Logger;
};

/**
 * Reads one request per line and writes each resulting event as its own line.
 * Requests are handled one after another. The promise settles when input ends,
 * or when the output fails (the reader went away), after logging the failure.
 */
export async function runTransportLoop(options: TransportLoopOptions): Promise<void> {
  const { input, output, router, logger } = options;
  const lines = createInterface({ input, crlfDelay: Infinity });

  let closed = false;
  let markClosed: () => void = () => {};
  const outputClosed = new Promise<void>((resolve) => {
    markClosed = resolve;
  });
  const onOutputError = (error: Error): void => {
    if (closed) {
      return;
    }
    closed = true;
    logger.error(`Output failed, stopping: ${error.message}`);
    lines.close();
    markClosed();
  };
  output.on('error', onOutputError);

  const writeEvent = async (event: OutboundEvent): Promise<void> => {
    if (closed) {
      return;
    }
    if (!output.write(`${encodeEvent(event)}\n`)) {
      // An error emitted before we subscribed would never reach `once`.
      await Promise.race([once(output, 'drain'), outputClosed]);
    }
  };

  let lineNumber = 0;
  try {
    for await (const raw of lines) {
      if (closed) {
        break;
      }
      lineNumber++;
      const line = raw.trim();
      if (!line) {
        continue;
      }

      const decoded = decodeLine(line);
      if (!decoded.ok) {
        logger.warn(`Rejected line ${lineNumber}: ${decoded.error.message}`);
        await writeEvent({ type: 'error', message: decoded.error.message });
        continue;
      }

      for await (const event of router.handle(decoded.value)) {
        if (closed) {
          break;
        }
        await writeEvent(event);
      }
    }
  } finally {
    output.off('error', onOutputError);
  }

  logger.debug(`Input closed after ${lineNumber} lines`);
}
