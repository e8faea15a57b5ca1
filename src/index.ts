#!/usr/bin/env node
/**
 * namecom-ddns - Entry Point
 *
 * Keeps a name.com A record pointed at this machine's public IP
 */
import { createApplication, logger, ConfigError, type Application } from './core/index.js';

async function main(): Promise<void> {
  logger.info('namecom-ddns starting...');

  let app: Application;
  try {
    app = createApplication({ handleSignals: true });
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, `${error.message}, aborting...`);
    } else {
      logger.fatal({ error }, 'Failed to start namecom-ddns');
    }
    process.exit(1);
  }

  await app.start();
  process.exit(0);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
