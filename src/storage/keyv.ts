// src/storage/keyv.ts

import Keyv from 'keyv';
import KeyvRedis from '@keyv/redis';
import KeyvPostgres from '@keyv/postgres';
import { IngestorError } from '../utils/errors';

export interface KeyvBackendConfig {
  backend: 'memory' | 'redis' | 'postgres';
  url?: string;
}

/**
 * String-valued Keyv namespace on the configured backend.
 */
export function createKeyv(config: KeyvBackendConfig, namespace: string): Keyv<string> {
  if (config.backend === 'memory') {
    return new Keyv<string>({ namespace });
  }

  if (!config.url) {
    throw new IngestorError(`The ${config.backend} backend requires a url`, 'CONFIG_ERROR');
  }

  return config.backend === 'redis'
    ? new Keyv<string>({ store: new KeyvRedis(config.url), namespace })
    : new Keyv<string>({ store: new KeyvPostgres({ uri: config.url }), namespace });
}
