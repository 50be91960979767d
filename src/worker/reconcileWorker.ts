import 'dotenv/config';
import { env } from '@/config/env';
import { closeRedisClient } from '@/config/redis';
import { getStores } from '@/db/client';
import { scheduleReconciliation } from '@/queue/producers';
import { reconcileQueue } from '@/queue/queues';
import { createReconcileWorker } from './processors/reconcileProcessor';

async function main() {
  console.log(JSON.stringify({ level: 'info', message: 'Starting reconcile worker...' }));

  const worker = createReconcileWorker(getStores());
  worker.on('completed', (job, report) => {
    console.log(JSON.stringify({ level: 'info', message: 'Reconcile job completed', jobId: job.id, ...report }));
  });
  worker.on('failed', (job, err) => {
    console.error(JSON.stringify({ level: 'error', message: 'Reconcile job failed', jobId: job?.id, error: String(err) }));
  });

  await scheduleReconciliation(env.RECONCILE_INTERVAL_MS);
  console.log(JSON.stringify({ level: 'info', message: 'Reconcile worker running', everyMs: env.RECONCILE_INTERVAL_MS }));

  const shutdown = () => {
    Promise.all([worker.close(), reconcileQueue.close()])
      .then(() => closeRedisClient())
      .then(() => process.exit(0))
      .catch((err) => {
        console.error(JSON.stringify({ level: 'error', message: 'Worker shutdown failed', error: String(err) }));
        process.exit(1);
      });
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err) => {
  console.error(JSON.stringify({ level: 'error', message: 'Reconcile worker crashed', error: String(err) }));
  process.exit(1);
});
