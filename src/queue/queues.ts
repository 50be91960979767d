import { Queue } from 'bullmq';
import { getRedisConnectionConfig } from '@/config/redis';
import { QUEUE_NAMES } from './jobTypes';

export const reconcileQueue = new Queue(QUEUE_NAMES.RECONCILE, {
  connection: getRedisConnectionConfig(),
  defaultJobOptions: {
    attempts: 3,
    backoff: { type: 'exponential', delay: 1000 },
    removeOnComplete: 100,
    removeOnFail: 200,
  },
});
