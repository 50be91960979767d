export interface ReconcileJob {
  // Epoch millis the job was scheduled for; the sweep uses wall clock when absent
  scheduledAt?: number;
}

export interface ReconcileReport {
  rolledForward: number;
  failed: number;
  linesRemoved: number;
  usersForgotten: number;
}
