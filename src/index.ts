#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { engineEvents } from './engine/events.js';
import { createServer } from './server.js';

const SHUTDOWN_SIGNALS = ['SIGTERM', 'SIGINT'] as const;

let activeServer: ReturnType<typeof createServer> | undefined;
let shutdownPromise: Promise<void> | undefined;

async function main(): Promise<void> {
  activeServer = createServer();
  await activeServer.connect(new StdioServerTransport());
}

function shutdown(exitCode: number, reason: string): Promise<void> {
  shutdownPromise ??= (async () => {
    let resolvedCode = exitCode;
    try {
      await activeServer?.close();
    } catch (err) {
      resolvedCode = 1;
      engineEvents.emit('error', err);
      console.error(`Shutdown failure (${reason})`);
    } finally {
      process.exit(resolvedCode);
    }
  })();
  return shutdownPromise;
}

for (const signal of SHUTDOWN_SIGNALS) {
  process.once(signal, () => {
    void shutdown(0, signal);
  });
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  void shutdown(1, 'fatal error');
});
