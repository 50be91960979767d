import { Worker, Job } from 'bullmq';
import { getRedisConnectionConfig } from '@/config/redis';
import { env } from '@/config/env';
import { ReconcileJob, ReconcileReport, Stores } from '@/contracts';
import { reconcile } from '@/orchestrator/reconciliation';
import { QUEUE_NAMES } from '@/queue/jobTypes';

export async function processReconcileJob(job: Pick<Job<ReconcileJob>, 'id' | 'data'>, stores: Stores): Promise<ReconcileReport> {
  const now = new Date(job.data.scheduledAt ?? Date.now());
  console.log(JSON.stringify({ level: 'info', message: 'Processing reconcile job', jobId: job.id, now: now.toISOString() }));
  return reconcile(stores, {
    now,
    pendingGraceMs: env.PENDING_ORDER_GRACE_MS,
    lookbackMs: env.RECONCILE_LOOKBACK_MS,
  });
}

export function createReconcileWorker(stores: Stores): Worker<ReconcileJob, ReconcileReport> {
  return new Worker<ReconcileJob, ReconcileReport>(
    QUEUE_NAMES.RECONCILE,
    async (job: Job<ReconcileJob, ReconcileReport>) => processReconcileJob(job, stores),
    // One sweep at a time; overlapping sweeps would only race each other's deletes
    { connection: getRedisConnectionConfig(), concurrency: 1 },
  );
}
