import {
  BadRequestException,
  ConflictException,
  Inject,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { createJsonLogEntry, ensureCorrelationId, generateId } from '@resumable-upload/shared';
import { toCompletedUploadView, type CompletedUploadView } from '../../domain/uploads/completed-upload';
import { buildUploadObjectKey, fileNameFromObjectKey } from '../../domain/uploads/object-key';
import {
  normalizeCompletedParts,
  planMultipartUpload,
  type CompletedPartInput,
} from '../../domain/uploads/upload-plan';
import { UploadApiConfigService } from '../../infrastructure/config/upload-api-config.service';
import {
  COMPLETED_UPLOAD_REPOSITORY,
  CompletedUploadAlreadyExistsError,
  type CompletedUploadRepositoryPort,
} from './ports/completed-upload-repository.port';
import {
  OBJECT_STORE,
  UploadSessionNotFoundError,
  type ObjectStorePort,
} from './ports/object-store.port';

const SERVICE_NAME = 'upload-api';

export interface InitializeUploadInput {
  fileName: unknown;
  size: unknown;
  contentType: unknown;
  chunkSize?: unknown;
  correlationId?: string;
}

export interface InitializeUploadResult {
  uploadId: string;
  objectKey: string;
  partSize: number;
  minPartNumber: number;
  maxPartNumber: number;
}

export interface GeneratePresignedUrlsInput {
  uploadId: unknown;
  objectKey: unknown;
  startPartNumber: unknown;
  endPartNumber: unknown;
}

export interface PresignedPartUrl {
  partNumber: number;
  url: string;
  expiresAt: string;
}

export interface UploadSessionInput {
  uploadId: unknown;
  objectKey: unknown;
  correlationId?: string;
}

export interface UploadedPartView {
  partNumber: number;
  etag: string;
  size: number;
}

export interface CompleteUploadInput extends UploadSessionInput {
  parts: unknown;
}

@Injectable()
export class MultipartUploadApplicationService {
  private readonly logger = new Logger(MultipartUploadApplicationService.name);

  constructor(
    @Inject(OBJECT_STORE)
    private readonly objectStore: ObjectStorePort,
    @Inject(COMPLETED_UPLOAD_REPOSITORY)
    private readonly completedUploads: CompletedUploadRepositoryPort,
    private readonly config: UploadApiConfigService,
  ) {}

  async initializeUpload(input: InitializeUploadInput): Promise<InitializeUploadResult> {
    const fileName = normalizeRequiredString(input.fileName, 'fileName');
    const contentType = normalizeRequiredString(input.contentType, 'contentType');
    const sizeBytes = normalizeInteger(input.size, 'size');
    const requestedChunkSize = normalizeOptionalPositiveInteger(input.chunkSize, 'chunkSize');

    const decision = planMultipartUpload(
      { fileName, contentType, sizeBytes, requestedChunkSize },
      this.config.uploadPolicy,
    );
    if (decision.outcome === 'rejected') {
      throw new BadRequestException({ message: decision.reason, errorCode: decision.code });
    }

    const objectKey = buildUploadObjectKey(this.config.objectKeyPrefix, generateId(), fileName);
    const uploadId = await this.objectStore.createMultipartUpload({ objectKey, contentType });

    this.log('Multipart upload initialized', input.correlationId, {
      uploadId,
      objectKey,
      metadata: {
        sizeBytes,
        partSize: decision.plan.chunkSize,
        totalParts: decision.plan.totalParts,
      },
    });

    return {
      uploadId,
      objectKey,
      partSize: decision.plan.chunkSize,
      minPartNumber: decision.plan.minPartNumber,
      maxPartNumber: decision.plan.maxPartNumber,
    };
  }

  async generatePresignedUrls(input: GeneratePresignedUrlsInput): Promise<PresignedPartUrl[]> {
    const uploadId = normalizeRequiredString(input.uploadId, 'uploadId');
    const objectKey = normalizeRequiredString(input.objectKey, 'objectKey');
    const startPartNumber = normalizePositiveInteger(input.startPartNumber, 'startPartNumber');
    const endPartNumber = normalizePositiveInteger(input.endPartNumber, 'endPartNumber');

    if (endPartNumber < startPartNumber) {
      throw new BadRequestException({
        message: `endPartNumber (${endPartNumber}) must not be lower than startPartNumber (${startPartNumber}).`,
        errorCode: 'INVALID_PART_RANGE',
      });
    }

    const maxParts = this.config.presignMaxPartsPerRequest;
    const requested = endPartNumber - startPartNumber + 1;
    if (requested > maxParts) {
      throw new BadRequestException({
        message: `Cannot presign ${requested} parts at once; the limit is ${maxParts}.`,
        errorCode: 'TOO_MANY_PARTS_REQUESTED',
      });
    }

    const expiresInSeconds = this.config.presignedUrlExpirationSeconds;
    const expiresAt = new Date(Date.now() + expiresInSeconds * 1000).toISOString();
    const urls: PresignedPartUrl[] = [];

    for (let partNumber = startPartNumber; partNumber <= endPartNumber; partNumber += 1) {
      const url = await this.objectStore.presignUploadPart({
        uploadId,
        objectKey,
        partNumber,
        expiresInSeconds,
      });
      urls.push({ partNumber, url, expiresAt });
    }

    return urls;
  }

  async getUploadStatus(input: UploadSessionInput): Promise<UploadedPartView[]> {
    const uploadId = normalizeRequiredString(input.uploadId, 'uploadId');
    const objectKey = normalizeRequiredString(input.objectKey, 'objectKey');

    const parts = await this.withSession(() => this.objectStore.listParts({ uploadId, objectKey }));

    return parts.map((part) => ({
      partNumber: part.partNumber,
      etag: part.eTag,
      size: part.sizeBytes,
    }));
  }

  async completeUpload(input: CompleteUploadInput): Promise<CompletedUploadView> {
    const uploadId = normalizeRequiredString(input.uploadId, 'uploadId');
    const objectKey = normalizeRequiredString(input.objectKey, 'objectKey');

    if (!Array.isArray(input.parts)) {
      throw new BadRequestException({ message: 'Field "parts" must be an array.', errorCode: 'NO_PARTS' });
    }
    const partInputs: CompletedPartInput[] = input.parts.map(toCompletedPartInput);
    const partsDecision = normalizeCompletedParts(partInputs);
    if (partsDecision.outcome === 'rejected') {
      throw new BadRequestException({ message: partsDecision.reason, errorCode: partsDecision.code });
    }

    if (await this.completedUploads.existsByObjectKey(objectKey)) {
      throw new ConflictException({
        message: 'Upload has already been completed.',
        errorCode: 'UPLOAD_ALREADY_COMPLETED',
      });
    }

    const completion = await this.withSession(() =>
      this.objectStore.completeMultipartUpload({ uploadId, objectKey, parts: partsDecision.parts }),
    );

    let record;
    try {
      const head = await this.objectStore.headObject(objectKey);
      record = await this.completedUploads.save({
        fileName: fileNameFromObjectKey(objectKey),
        sizeBytes: head.sizeBytes,
        objectKey,
        status: 'COMPLETED',
        checksum: completion.eTag || head.eTag,
      });
    } catch (error) {
      this.logger.error(
        JSON.stringify(
          createJsonLogEntry({
            level: 'error',
            service: SERVICE_NAME,
            message: 'Object stored but its completion record was not written; object is orphaned',
            correlationId: ensureCorrelationId(input.correlationId),
            uploadId,
            objectKey,
            error,
          }),
        ),
      );
      if (error instanceof CompletedUploadAlreadyExistsError) {
        throw new ConflictException({
          message: 'Upload has already been completed.',
          errorCode: 'UPLOAD_ALREADY_COMPLETED',
        });
      }
      throw error;
    }

    const downloadUrl = await this.objectStore.presignGetObject(
      objectKey,
      this.config.presignedUrlExpirationSeconds,
    );

    this.log('Multipart upload completed', input.correlationId, {
      uploadId,
      objectKey,
      metadata: { recordId: record.id, sizeBytes: record.sizeBytes, parts: partsDecision.parts.length },
    });

    return toCompletedUploadView(record, downloadUrl);
  }

  async abortUpload(input: UploadSessionInput): Promise<void> {
    const uploadId = normalizeRequiredString(input.uploadId, 'uploadId');
    const objectKey = normalizeRequiredString(input.objectKey, 'objectKey');

    try {
      await this.objectStore.abortMultipartUpload({ uploadId, objectKey });
    } catch (error) {
      if (!(error instanceof UploadSessionNotFoundError)) {
        throw error;
      }
      this.logger.warn(
        JSON.stringify(
          createJsonLogEntry({
            level: 'warn',
            service: SERVICE_NAME,
            message: 'Multipart upload already gone; nothing to abort',
            correlationId: ensureCorrelationId(input.correlationId),
            uploadId,
            objectKey,
          }),
        ),
      );
      return;
    }

    this.log('Multipart upload aborted', input.correlationId, { uploadId, objectKey });
  }

  private async withSession<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (error instanceof UploadSessionNotFoundError) {
        throw new NotFoundException({
          message: `Upload session ${error.uploadId} was not found for ${error.objectKey}.`,
          errorCode: 'UPLOAD_SESSION_NOT_FOUND',
        });
      }
      throw error;
    }
  }

  private log(
    message: string,
    correlationId: string | undefined,
    fields: { uploadId?: string; objectKey?: string; metadata?: Record<string, unknown> },
  ): void {
    this.logger.log(
      JSON.stringify(
        createJsonLogEntry({
          level: 'info',
          service: SERVICE_NAME,
          message,
          correlationId: ensureCorrelationId(correlationId),
          ...fields,
        }),
      ),
    );
  }
}

function toCompletedPartInput(value: unknown): CompletedPartInput {
  if (!value || typeof value !== 'object') {
    return {};
  }
  return {
    partNumber: Reflect.get(value, 'partNumber'),
    eTag: Reflect.get(value, 'eTag'),
  };
}

function normalizeRequiredString(value: unknown, fieldName: string): string {
  if (typeof value !== 'string') {
    throw new BadRequestException(`Field "${fieldName}" must be a string.`);
  }

  const normalized = value.trim();
  if (!normalized) {
    throw new BadRequestException(`Field "${fieldName}" is required.`);
  }

  return normalized;
}

function normalizePositiveInteger(value: unknown, fieldName: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new BadRequestException(`Field "${fieldName}" must be a number.`);
  }
  if (!Number.isInteger(value) || value <= 0) {
    throw new BadRequestException(`Field "${fieldName}" must be a positive integer.`);
  }
  return value;
}

function normalizeInteger(value: unknown, fieldName: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new BadRequestException(`Field "${fieldName}" must be an integer.`);
  }
  return value;
}

function normalizeOptionalPositiveInteger(value: unknown, fieldName: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new BadRequestException(`Field "${fieldName}" must be an integer.`);
  }
  return value > 0 ? value : undefined;
}
