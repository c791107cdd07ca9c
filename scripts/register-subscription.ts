#!/usr/bin/env tsx

/**
 * Record which user owns an upstream subscription, in the session store the
 * running service reads.
 *
 * Usage:
 *   tsx scripts/register-subscription.ts <subscriptionId> <userId>
 *   tsx scripts/register-subscription.ts --remove <subscriptionId>
 */

import dotenv from 'dotenv';
import { loadConfigFromEnv } from '../src/config/env';
import { Logger } from '../src/observability/Logger';
import { SubscriptionRegistry } from '../src/pipeline/SubscriptionRegistry';
import { errorMessage } from '../src/utils/errors';

dotenv.config();

const USAGE = 'Usage: register-subscription <subscriptionId> <userId> | --remove <subscriptionId>';

async function run(args: string[]): Promise<void> {
  const [first, second] = args;
  if (!first || !second || args.length > 2) {
    throw new Error(USAGE);
  }

  const config = loadConfigFromEnv();
  const registry = SubscriptionRegistry.openShared(config.sessionStore, new Logger(config.logging));

  try {
    if (first === '--remove') {
      const removed = await registry.unregister(second);
      console.log(removed ? `🗑️  Removed owner of ${second}` : `ℹ️  ${second} had no registered owner`);
      return;
    }

    await registry.register(first, second);
    console.log(`✅ ${first} is owned by ${second}`);
  } finally {
    await registry.disconnect();
  }
}

run(process.argv.slice(2)).catch((error: unknown) => {
  console.error('❌ Registration failed:', errorMessage(error));
  process.exit(1);
});
