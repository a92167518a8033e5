#!/usr/bin/env node
import { loadBrokerSettings } from './config/config.js';
import { ConversationStore } from './conversation/store.js';
import { createLogger } from './logging/logger.js';
import { Router } from './router/router.js';
import { runTransportLoop } from './transport/loop.js';

async function main(): Promise<void> {
  const settings = loadBrokerSettings(process.env);
  if (!settings.ok) {
    process.stderr.write(`${settings.error.message}\n`);
    process.exitCode = 1;
    return;
  }

  const logger = createLogger({ level: settings.value.logLevel });
  const store = new ConversationStore({ ttlMs: settings.value.conversationTtlMs });
  const router = new Router({ store, env: process.env, logger });

  logger.info('Broker ready');
  await runTransportLoop({ input: process.stdin, output: process.stdout, router, logger });
  // Still open when the loop stopped because stdout went away.
  process.stdin.destroy();
}

main().catch((error: unknown) => {
  process.stderr.write(`Fatal: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
  process.exitCode = 1;
});
