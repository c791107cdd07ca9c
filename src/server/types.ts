// src/server/types.ts

import type { RefreshLockStatus } from '../core/token/DistributedRefreshLock';
import type { WorkerStatus } from '../pipeline/types';
import type { QueueCounts } from '../storage/types';

export interface HealthReport {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  worker: WorkerStatus;
  queue: QueueCounts;
  messages: number;
  distributedLocks: RefreshLockStatus;
}
