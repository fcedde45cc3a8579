import type { JobStatus } from '../api';

export function getStatusClass(status: JobStatus): string {
  if (status === 'completed') return 'status-completed';
  if (status === 'failed') return 'status-failed';
  if (status === 'cancelled') return 'status-cancelled';
  if (status === 'pending') return 'status-pending';
  return 'status-processing';
}

/**
 * True while the job is being worked on by the pipeline
 */
export function isActive(status: JobStatus): boolean {
  return status === 'validating' || status === 'preparing' || status === 'encoding';
}
