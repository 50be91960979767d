import { reconcileQueue } from './queues';
import { JOB_NAMES, RECONCILE_SCHEDULE_ID } from './jobTypes';
import { ReconcileJob } from '@/contracts';

export async function scheduleReconciliation(everyMs: number): Promise<void> {
  const payload: ReconcileJob = {};
  await reconcileQueue.add(JOB_NAMES.RECONCILE, payload, {
    repeat: { every: everyMs },
    jobId: RECONCILE_SCHEDULE_ID,
  });
  console.log(JSON.stringify({ level: 'info', message: 'Scheduled reconcile sweep', everyMs }));
}

// One-off sweep, e.g. after an incident
export async function enqueueReconcileNow(): Promise<void> {
  const payload: ReconcileJob = { scheduledAt: Date.now() };
  await reconcileQueue.add(JOB_NAMES.RECONCILE, payload);
  console.log(JSON.stringify({ level: 'info', message: 'Enqueued reconcile sweep', scheduledAt: payload.scheduledAt }));
}
