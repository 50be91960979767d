// Re-export job payload types from contracts
export type { ReconcileJob, ReconcileReport } from '@/contracts';

export const QUEUE_NAMES = {
  RECONCILE: 'reconcile-queue',
} as const;

export const JOB_NAMES = {
  RECONCILE: 'RECONCILE',
} as const;

// Fixed id so repeated scheduling replaces the schedule instead of stacking it
export const RECONCILE_SCHEDULE_ID = 'reconcile-sweep';
