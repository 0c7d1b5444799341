/**
 * Server Entry Point
 *
 * Loads the config, connects the store and serves the API.
 */

import { serve } from '@hono/node-server';
import { ConfigurationError, getConfig } from '@/config/config';
import type { Config } from '@/config/schema';
import { createApp, createServices, startServices, stopServices } from '@/server';
import { buildStartupInfo, c, displayStartup, logError } from '@/utils';

function loadConfigOrExit(): Config {
  try {
    return getConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`\n  ${c.error('✗')} ${error.message}`);
      for (const issue of error.issues) console.error(`    - ${issue}`);
      console.error('');
      process.exit(1);
    }
    throw error;
  }
}

async function main(): Promise<void> {
  const config = loadConfigOrExit();
  const services = createServices(config);
  await startServices(services);

  const app = createApp(services);
  const server = serve({ fetch: app.fetch, port: config.server.port }, () => {
    displayStartup(buildStartupInfo(config));
  });

  const shutdown = (): void => {
    server.close();
    stopServices(services)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logError('Shutdown failed', error);
        process.exit(1);
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  logError('Startup failed', error);
  process.exit(1);
});
