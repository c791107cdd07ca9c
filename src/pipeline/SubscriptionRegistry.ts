// src/pipeline/SubscriptionRegistry.ts

import type Keyv from 'keyv';
import { createKeyv } from '../storage/keyv';
import type { KeyvBackendConfig } from '../storage/keyv';
import type { Logger } from '../observability/Logger';
import { IngestorError, OwnerNotFoundError } from '../utils/errors';

export interface OwnerResolver {
  resolveOwner(subscriptionId: string): Promise<string>;
}

/**
 * Maps an upstream subscription to the user whose delegated token reads its resources.
 * Whatever creates subscriptions registers them here; unknown ids fall back to the default owner.
 */
export class SubscriptionRegistry implements OwnerResolver {
  private store: Keyv<string>;

  constructor(
    backend: KeyvBackendConfig,
    private logger: Logger,
    private defaultOwnerUserId?: string
  ) {
    this.store = createKeyv(backend, 'subscriptions');
  }

  /**
   * Registry for a process other than the service, such as the registration
   * script. Only a networked backend is visible to the running service.
   */
  static openShared(backend: KeyvBackendConfig, logger: Logger): SubscriptionRegistry {
    if (backend.backend === 'memory') {
      throw new IngestorError(
        'Registering owners from outside the service needs a redis or postgres session store',
        'CONFIG_ERROR'
      );
    }
    return new SubscriptionRegistry(backend, logger);
  }

  async register(subscriptionId: string, userId: string): Promise<void> {
    await this.store.set(subscriptionId, userId);
    this.logger.info('Subscription owner registered', { subscriptionId, userId });
  }

  async unregister(subscriptionId: string): Promise<boolean> {
    return this.store.delete(subscriptionId);
  }

  async resolveOwner(subscriptionId: string): Promise<string> {
    const owner = (await this.store.get(subscriptionId)) ?? this.defaultOwnerUserId;
    if (!owner) {
      throw new OwnerNotFoundError(subscriptionId);
    }
    return owner;
  }

  async disconnect(): Promise<void> {
    await this.store.disconnect();
  }
}
