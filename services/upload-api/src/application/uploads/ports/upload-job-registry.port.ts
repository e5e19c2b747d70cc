import type { UploadJobSnapshot } from '../../../domain/uploads/upload-job';

export const UPLOAD_JOB_REGISTRY = Symbol('UPLOAD_JOB_REGISTRY');

export interface UploadJobRegistryPort {
  register(job: UploadJobSnapshot): void;
  get(jobId: string): UploadJobSnapshot | undefined;
  /**
   * Replaces the stored snapshot with `transition(current)`. Returns the new
   * snapshot, or `undefined` when the job is not registered.
   */
  update(jobId: string, transition: (current: UploadJobSnapshot) => UploadJobSnapshot): UploadJobSnapshot | undefined;
  scheduleEviction(jobId: string, retentionMs: number): void;
  remove(jobId: string): boolean;
  evictExpired(now?: number): number;
}
