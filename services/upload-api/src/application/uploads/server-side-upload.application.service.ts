import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { createJsonLogEntry, generateId, type LogLevel } from '@resumable-upload/shared';
import { open, rm, stat } from 'node:fs/promises';
import { buildUploadObjectKey, toSafeFileName } from '../../domain/uploads/object-key';
import { planMultipartUpload, type CompletedPart } from '../../domain/uploads/upload-plan';
import {
  attachUploadSession,
  createQueuedUploadJob,
  isTerminalUploadJobStatus,
  markUploadJobCancelled,
  markUploadJobCompleted,
  markUploadJobFailed,
  markUploadJobStarted,
  notFoundUploadJobStatus,
  recordUploadedPart,
  requestUploadJobCancellation,
  toUploadJobStatusView,
  type UploadJobSnapshot,
  type UploadJobStatusView,
} from '../../domain/uploads/upload-job';
import { UploadApiConfigService } from '../../infrastructure/config/upload-api-config.service';
import {
  COMPLETED_UPLOAD_REPOSITORY,
  type CompletedUploadRepositoryPort,
} from './ports/completed-upload-repository.port';
import { OBJECT_STORE, type ObjectStorePort } from './ports/object-store.port';
import { UPLOAD_JOB_EXECUTOR, type UploadJobExecutorPort } from './ports/upload-job-executor.port';
import { UPLOAD_JOB_REGISTRY, type UploadJobRegistryPort } from './ports/upload-job-registry.port';

const SERVICE_NAME = 'upload-api';

/** Largest single read handed to the file system; Node rejects lengths beyond int32. */
export const MAX_READ_SLICE_BYTES = 2 ** 30;

/** Largest part buffer a server-driven job allocates. */
export const MAX_JOB_BUFFER_BYTES = 2 ** 31 - 1;

export interface SubmitAsyncUploadInput {
  tempFilePath: string;
  originalFileName: string;
  contentType: string;
  chunkSize?: number;
}

export interface SubmitAsyncUploadResult {
  jobId: string;
  objectKey: string;
  message: string;
}

class UploadJobCancelledSignal extends Error {
  constructor(readonly jobId: string) {
    super(`Upload job ${jobId} was cancelled.`);
    this.name = 'UploadJobCancelledSignal';
  }
}

@Injectable()
export class ServerSideUploadApplicationService {
  private readonly logger = new Logger(ServerSideUploadApplicationService.name);

  constructor(
    @Inject(OBJECT_STORE)
    private readonly objectStore: ObjectStorePort,
    @Inject(COMPLETED_UPLOAD_REPOSITORY)
    private readonly completedUploads: CompletedUploadRepositoryPort,
    @Inject(UPLOAD_JOB_REGISTRY)
    private readonly registry: UploadJobRegistryPort,
    @Inject(UPLOAD_JOB_EXECUTOR)
    private readonly executor: UploadJobExecutorPort,
    private readonly config: UploadApiConfigService,
  ) {}

  async submitAsyncUpload(input: SubmitAsyncUploadInput): Promise<SubmitAsyncUploadResult> {
    if (!input.originalFileName.trim()) {
      throw new BadRequestException({ message: 'File name cannot be empty.', errorCode: 'EMPTY_FILE_NAME' });
    }

    const sizeBytes = await this.readTempFileSize(input.tempFilePath);
    const decision = planMultipartUpload(
      {
        fileName: input.originalFileName,
        contentType: input.contentType,
        sizeBytes,
        requestedChunkSize: input.chunkSize,
      },
      this.config.uploadPolicy,
    );
    if (decision.outcome === 'rejected') {
      throw new BadRequestException({ message: decision.reason, errorCode: decision.code });
    }

    const bufferBytes = Math.min(decision.plan.chunkSize, sizeBytes);
    if (bufferBytes > MAX_JOB_BUFFER_BYTES) {
      throw new BadRequestException({
        message: `Chunk size ${decision.plan.chunkSize} exceeds the server-side upload limit of ${MAX_JOB_BUFFER_BYTES} bytes.`,
        errorCode: 'CHUNK_SIZE_TOO_LARGE',
      });
    }

    const jobId = generateId();
    const fileName = toSafeFileName(input.originalFileName);
    const objectKey = buildUploadObjectKey(this.config.objectKeyPrefix, generateId(), fileName);

    this.registry.register(
      createQueuedUploadJob({
        jobId,
        objectKey,
        fileName,
        contentType: input.contentType,
        tempFilePath: input.tempFilePath,
        totalBytes: sizeBytes,
        totalParts: decision.plan.totalParts,
        chunkSize: decision.plan.chunkSize,
        submittedAt: new Date().toISOString(),
      }),
    );

    this.log('info', 'Upload job queued', jobId, {
      objectKey,
      metadata: { sizeBytes, chunkSize: decision.plan.chunkSize, totalParts: decision.plan.totalParts },
    });

    const admission = await this.executor.submit(() => this.runUploadJob(jobId));

    return {
      jobId,
      objectKey,
      message:
        admission === 'caller-ran'
          ? 'Upload job finished; fetch its status for the result.'
          : 'Upload job accepted; poll its status for progress.',
    };
  }

  getStatus(jobId: string): UploadJobStatusView {
    const job = this.registry.get(jobId);
    return job ? toUploadJobStatusView(job) : notFoundUploadJobStatus(jobId);
  }

  cancelJob(jobId: string): UploadJobStatusView {
    const job = this.requireJob(jobId);
    if (isTerminalUploadJobStatus(job.status)) {
      throw new ConflictException({
        message: `Upload job ${jobId} already finished with status ${job.status}.`,
        errorCode: 'UPLOAD_JOB_FINISHED',
      });
    }

    const updated = this.registry.update(jobId, requestUploadJobCancellation) ?? job;
    this.log('info', 'Upload job cancellation requested', jobId, { objectKey: job.objectKey });
    return toUploadJobStatusView(updated);
  }

  acknowledgeJob(jobId: string): void {
    const job = this.requireJob(jobId);
    if (!isTerminalUploadJobStatus(job.status)) {
      throw new ConflictException({
        message: `Upload job ${jobId} is still ${job.status}.`,
        errorCode: 'UPLOAD_JOB_RUNNING',
      });
    }
    this.registry.remove(jobId);
  }

  async runUploadJob(jobId: string): Promise<void> {
    const job = this.registry.get(jobId);
    if (!job) {
      this.log('warn', 'Upload job disappeared before it started', jobId);
      return;
    }

    let uploadId: string | undefined;

    try {
      this.throwIfCancelled(jobId);
      this.registry.update(jobId, (current) => markUploadJobStarted(current, new Date().toISOString()));

      const createdUploadId = await this.objectStore.createMultipartUpload({
        objectKey: job.objectKey,
        contentType: job.contentType,
      });
      uploadId = createdUploadId;
      this.registry.update(jobId, (current) => attachUploadSession(current, createdUploadId));

      const parts = await this.uploadParts(job, createdUploadId);

      this.throwIfCancelled(jobId);
      const completion = await this.objectStore.completeMultipartUpload({
        uploadId: createdUploadId,
        objectKey: job.objectKey,
        parts,
      });
      // The object is final from here on; there is no session left to abort.
      uploadId = undefined;

      let storedBytes: number;
      try {
        const head = await this.objectStore.headObject(job.objectKey);
        storedBytes = head.sizeBytes;
        await this.completedUploads.save({
          fileName: job.fileName,
          sizeBytes: head.sizeBytes,
          objectKey: job.objectKey,
          status: 'COMPLETED',
          checksum: completion.eTag || head.eTag,
        });
      } catch (error) {
        this.log('error', 'Object stored but its completion record was not written; object is orphaned', jobId, {
          uploadId: createdUploadId,
          objectKey: job.objectKey,
          error,
        });
        throw error;
      }

      const downloadUrl = await this.tryPresignDownload(jobId, job.objectKey);
      this.registry.update(jobId, (current) =>
        markUploadJobCompleted(current, { at: new Date().toISOString(), downloadUrl }),
      );
      this.log('info', 'Upload job completed', jobId, {
        uploadId: createdUploadId,
        objectKey: job.objectKey,
        metadata: { sizeBytes: storedBytes, parts: parts.length },
      });
    } catch (error) {
      await this.settleFailedJob(jobId, job, uploadId, error);
    } finally {
      await this.deleteTempFile(jobId, job.tempFilePath);
      this.registry.scheduleEviction(jobId, this.config.jobRetentionMs);
    }
  }

  private async uploadParts(job: UploadJobSnapshot, uploadId: string): Promise<CompletedPart[]> {
    const handle = await open(job.tempFilePath, 'r');
    const buffer = Buffer.alloc(Math.min(job.chunkSize, job.totalBytes));
    const parts: CompletedPart[] = [];

    try {
      for (let partNumber = 1; partNumber <= job.totalParts; partNumber += 1) {
        this.throwIfCancelled(job.jobId);

        const position = (partNumber - 1) * job.chunkSize;
        const length = Math.min(job.chunkSize, job.totalBytes - position);
        const bytesRead = await readWindow(handle, buffer, length, position);
        if (bytesRead < length) {
          throw new Error(
            `Temporary file ended early at part ${partNumber}: expected ${length} bytes, read ${bytesRead}.`,
          );
        }

        const result = await this.objectStore.uploadPart({
          uploadId,
          objectKey: job.objectKey,
          partNumber,
          body: buffer.subarray(0, bytesRead),
        });
        parts.push({ partNumber, eTag: result.eTag });

        this.registry.update(job.jobId, (current) => recordUploadedPart(current, partNumber, bytesRead));
      }
    } finally {
      await handle.close();
    }

    return parts;
  }

  private async settleFailedJob(
    jobId: string,
    job: UploadJobSnapshot,
    uploadId: string | undefined,
    error: unknown,
  ): Promise<void> {
    const finishedAt = new Date().toISOString();

    if (error instanceof UploadJobCancelledSignal) {
      this.registry.update(jobId, (current) => markUploadJobCancelled(current, finishedAt));
      this.log('info', 'Upload job cancelled', jobId, { uploadId, objectKey: job.objectKey });
    } else {
      const message = error instanceof Error ? error.message : String(error);
      this.registry.update(jobId, (current) => markUploadJobFailed(current, message, finishedAt));
      this.log('error', 'Upload job failed', jobId, { uploadId, objectKey: job.objectKey, error });
    }

    if (!uploadId) {
      return;
    }

    try {
      await this.objectStore.abortMultipartUpload({ uploadId, objectKey: job.objectKey });
    } catch (abortError) {
      this.log('warn', 'Failed to abort multipart upload after job failure', jobId, {
        uploadId,
        objectKey: job.objectKey,
        error: abortError,
      });
    }
  }

  private async tryPresignDownload(jobId: string, objectKey: string): Promise<string | undefined> {
    try {
      return await this.objectStore.presignGetObject(objectKey, this.config.presignedUrlExpirationSeconds);
    } catch (error) {
      this.log('warn', 'Could not sign download URL for completed upload', jobId, { objectKey, error });
      return undefined;
    }
  }

  private async deleteTempFile(jobId: string, tempFilePath: string): Promise<void> {
    try {
      await rm(tempFilePath, { force: true });
    } catch (error) {
      this.log('warn', 'Failed to delete temporary upload file', jobId, {
        metadata: { tempFilePath },
        error,
      });
    }
  }

  private async readTempFileSize(tempFilePath: string): Promise<number> {
    try {
      const stats = await stat(tempFilePath);
      return stats.size;
    } catch (error) {
      throw new BadRequestException({
        message: 'Uploaded file is no longer available on the server.',
        errorCode: 'TEMP_FILE_MISSING',
        details: { reason: error instanceof Error ? error.message : String(error) },
      });
    }
  }

  private requireJob(jobId: string): UploadJobSnapshot {
    const job = this.registry.get(jobId);
    if (!job) {
      throw new NotFoundException({
        message: `Upload job ${jobId} was not found.`,
        errorCode: 'UPLOAD_JOB_NOT_FOUND',
      });
    }
    return job;
  }

  private throwIfCancelled(jobId: string): void {
    if (this.registry.get(jobId)?.cancelRequested) {
      throw new UploadJobCancelledSignal(jobId);
    }
  }

  private log(
    level: LogLevel,
    message: string,
    jobId: string,
    fields: { uploadId?: string; objectKey?: string; metadata?: Record<string, unknown>; error?: unknown } = {},
  ): void {
    const line = JSON.stringify(
      createJsonLogEntry({
        level,
        service: SERVICE_NAME,
        message,
        correlationId: jobId,
        jobId,
        ...fields,
      }),
    );

    if (level === 'error') {
      this.logger.error(line);
    } else if (level === 'warn') {
      this.logger.warn(line);
    } else {
      this.logger.log(line);
    }
  }
}

export interface PositionalReader {
  read(buffer: Buffer, offset: number, length: number, position: number): Promise<{ bytesRead: number }>;
}

export async function readWindow(
  handle: PositionalReader,
  buffer: Buffer,
  length: number,
  position: number,
  maxSliceBytes: number = MAX_READ_SLICE_BYTES,
): Promise<number> {
  let offset = 0;
  while (offset < length) {
    const sliceLength = Math.min(length - offset, maxSliceBytes);
    const { bytesRead } = await handle.read(buffer, offset, sliceLength, position + offset);
    if (bytesRead === 0) {
      break;
    }
    offset += bytesRead;
  }
  return offset;
}
