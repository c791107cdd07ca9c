// src/main.ts

import dotenv from 'dotenv';
import { ZodError } from 'zod';
import { loadConfigFromEnv } from './config/env';
import { IngestionService } from './service';
import { errorMessage } from './utils/errors';

dotenv.config();

async function main(): Promise<void> {
  const service = await IngestionService.init(loadConfigFromEnv());
  await service.start();

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    service.logger.info('Shutting down', { signal });
    service
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        service.logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  if (error instanceof ZodError) {
    console.error('Invalid configuration:');
    for (const issue of error.errors) {
      console.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
  } else {
    console.error('Failed to start:', errorMessage(error));
  }
  process.exit(1);
});
