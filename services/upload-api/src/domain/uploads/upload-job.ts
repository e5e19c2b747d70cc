export type UploadJobStatus = 'QUEUED' | 'UPLOADING' | 'COMPLETED' | 'FAILED' | 'CANCELLED';

export type UploadJobTerminalStatus = Extract<UploadJobStatus, 'COMPLETED' | 'FAILED' | 'CANCELLED'>;

const TERMINAL_STATUSES: ReadonlySet<UploadJobStatus> = new Set<UploadJobStatus>([
  'COMPLETED',
  'FAILED',
  'CANCELLED',
]);

/**
 * Progress of one server-driven upload. Snapshots are never mutated: every
 * transition returns a new value, which the registry swaps in whole so that
 * readers never observe a half-applied update.
 */
export interface UploadJobSnapshot {
  readonly jobId: string;
  readonly status: UploadJobStatus;
  readonly progress: number;
  readonly uploadedParts: number;
  readonly totalParts: number;
  readonly uploadedBytes: number;
  readonly totalBytes: number;
  readonly chunkSize: number;
  readonly objectKey: string;
  readonly fileName: string;
  readonly contentType: string;
  readonly tempFilePath: string;
  readonly cancelRequested: boolean;
  readonly submittedAt: string;
  readonly uploadId?: string;
  readonly errorMessage?: string;
  readonly downloadUrl?: string;
  readonly startedAt?: string;
  readonly finishedAt?: string;
}

export interface CreateQueuedUploadJobInput {
  jobId: string;
  objectKey: string;
  fileName: string;
  contentType: string;
  tempFilePath: string;
  totalBytes: number;
  totalParts: number;
  chunkSize: number;
  submittedAt: string;
}

export class UploadJobTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: UploadJobStatus,
    readonly attempted: string,
  ) {
    super(`Upload job ${jobId} cannot ${attempted} while ${from}.`);
    this.name = 'UploadJobTransitionError';
  }
}

export function createQueuedUploadJob(input: CreateQueuedUploadJobInput): UploadJobSnapshot {
  return {
    jobId: input.jobId,
    status: 'QUEUED',
    progress: 0,
    uploadedParts: 0,
    totalParts: input.totalParts,
    uploadedBytes: 0,
    totalBytes: input.totalBytes,
    chunkSize: input.chunkSize,
    objectKey: input.objectKey,
    fileName: input.fileName,
    contentType: input.contentType,
    tempFilePath: input.tempFilePath,
    cancelRequested: false,
    submittedAt: input.submittedAt,
  };
}

export function isTerminalUploadJobStatus(status: UploadJobStatus): status is UploadJobTerminalStatus {
  return TERMINAL_STATUSES.has(status);
}

export function markUploadJobStarted(job: UploadJobSnapshot, at: string): UploadJobSnapshot {
  assertStatus(job, ['QUEUED'], 'start');
  return { ...job, status: 'UPLOADING', startedAt: at };
}

export function attachUploadSession(job: UploadJobSnapshot, uploadId: string): UploadJobSnapshot {
  assertStatus(job, ['UPLOADING'], 'attach an upload session');
  return { ...job, uploadId };
}

export function recordUploadedPart(
  job: UploadJobSnapshot,
  partNumber: number,
  partSizeBytes: number,
): UploadJobSnapshot {
  assertStatus(job, ['UPLOADING'], 'record a part');
  const uploadedBytes = job.uploadedBytes + partSizeBytes;
  return {
    ...job,
    uploadedParts: partNumber,
    uploadedBytes,
    progress: computeProgressPercent(uploadedBytes, job.totalBytes),
  };
}

export function markUploadJobCompleted(
  job: UploadJobSnapshot,
  input: { at: string; downloadUrl?: string },
): UploadJobSnapshot {
  assertStatus(job, ['UPLOADING'], 'complete');
  return {
    ...job,
    status: 'COMPLETED',
    progress: 100,
    downloadUrl: input.downloadUrl,
    finishedAt: input.at,
  };
}

export function markUploadJobFailed(job: UploadJobSnapshot, errorMessage: string, at: string): UploadJobSnapshot {
  assertStatus(job, ['QUEUED', 'UPLOADING'], 'fail');
  return {
    ...job,
    status: 'FAILED',
    errorMessage,
    finishedAt: at,
  };
}

export function markUploadJobCancelled(job: UploadJobSnapshot, at: string): UploadJobSnapshot {
  assertStatus(job, ['QUEUED', 'UPLOADING'], 'be cancelled');
  return {
    ...job,
    status: 'CANCELLED',
    errorMessage: 'Upload cancelled by request.',
    finishedAt: at,
  };
}

export function requestUploadJobCancellation(job: UploadJobSnapshot): UploadJobSnapshot {
  assertStatus(job, ['QUEUED', 'UPLOADING'], 'accept a cancellation request');
  return job.cancelRequested ? job : { ...job, cancelRequested: true };
}

export function computeProgressPercent(uploadedBytes: number, totalBytes: number): number {
  if (totalBytes <= 0) {
    return 0;
  }
  return (uploadedBytes / totalBytes) * 100;
}

function assertStatus(job: UploadJobSnapshot, allowed: readonly UploadJobStatus[], attempted: string): void {
  if (!allowed.includes(job.status)) {
    throw new UploadJobTransitionError(job.jobId, job.status, attempted);
  }
}

export interface UploadJobStatusView {
  jobId: string;
  status: UploadJobStatus | 'NOT_FOUND';
  progress: number;
  uploadedParts: number;
  totalParts: number;
  uploadedBytes: number;
  totalBytes: number;
  fileName?: string;
  objectKey?: string;
  cancelRequested?: boolean;
  errorMessage?: string;
  downloadUrl?: string;
}

export function toUploadJobStatusView(job: UploadJobSnapshot): UploadJobStatusView {
  return {
    jobId: job.jobId,
    status: job.status,
    progress: job.progress,
    uploadedParts: job.uploadedParts,
    totalParts: job.totalParts,
    uploadedBytes: job.uploadedBytes,
    totalBytes: job.totalBytes,
    fileName: job.fileName,
    objectKey: job.objectKey,
    cancelRequested: job.cancelRequested,
    errorMessage: job.errorMessage,
    downloadUrl: job.downloadUrl,
  };
}

export function notFoundUploadJobStatus(jobId: string): UploadJobStatusView {
  return {
    jobId,
    status: 'NOT_FOUND',
    progress: -1,
    uploadedParts: 0,
    totalParts: 0,
    uploadedBytes: 0,
    totalBytes: 0,
    errorMessage: 'Job not found or already cleaned up',
  };
}
