import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { S3_MULTIPART_LIMITS } from '@resumable-upload/shared';
import { parseContentTypePrefixes, type UploadPolicyConfig } from '../../domain/uploads/upload-plan';

const MIB = 1024 * 1024;

const DEFAULTS = {
  port: 3000,
  minioEndpoint: 'localhost',
  minioApiPort: 9000,
  minioUseSsl: false,
  minioRootUser: 'minioadmin',
  minioRootPassword: 'minioadmin',
  s3Region: 'us-east-1',
  minioUploadsBucket: 'uploads',
  objectKeyPrefix: 'uploads',
  maxFileSizeBytes: 10 * 1024 * MIB,
  defaultChunkSizeBytes: 8 * MIB,
  minChunkSizeBytes: S3_MULTIPART_LIMITS.minPartSizeBytes,
  maxChunkSizeBytes: S3_MULTIPART_LIMITS.maxPartSizeBytes,
  acceptedContentTypePrefixes: 'video/',
  presignedUrlExpirationMinutes: 60,
  presignMaxPartsPerRequest: 100,
  jobCoreWorkers: 2,
  jobMaxWorkers: 4,
  jobQueueCapacity: 200,
  jobRetentionMs: 60 * 60 * 1000,
  jobSweepIntervalMs: 60 * 1000,
} as const;

export const UPLOAD_API_ENV_FILE_PATHS = [
  '.env.local',
  '.env',
  '../../.env.local',
  '../../.env',
];

export function defaultTempDirectory(): string {
  return path.join(tmpdir(), 'upload-api');
}

@Injectable()
export class UploadApiConfigService {
  constructor(private readonly config: ConfigService) {}

  get port(): number { return this.config.get<number>('UPLOAD_API_PORT', DEFAULTS.port); }

  get databaseUrl(): string | undefined {
    return optionalString(this.config.get<string>('DATABASE_URL'));
  }

  get minioEndpoint(): string { return this.config.get<string>('MINIO_ENDPOINT', DEFAULTS.minioEndpoint); }
  get minioApiPort(): number { return this.config.get<number>('MINIO_API_PORT', DEFAULTS.minioApiPort); }
  get minioUseSsl(): boolean { return this.config.get<boolean>('MINIO_USE_SSL', DEFAULTS.minioUseSsl); }
  get minioRootUser(): string { return this.config.get<string>('MINIO_ROOT_USER', DEFAULTS.minioRootUser); }
  get minioRootPassword(): string {
    return this.config.get<string>('MINIO_ROOT_PASSWORD', DEFAULTS.minioRootPassword);
  }
  get s3Region(): string { return this.config.get<string>('S3_REGION', DEFAULTS.s3Region); }
  get minioUploadsBucket(): string {
    return this.config.get<string>('MINIO_BUCKET_UPLOADS', DEFAULTS.minioUploadsBucket);
  }

  get objectKeyPrefix(): string {
    return this.config.get<string>('UPLOAD_OBJECT_KEY_PREFIX', DEFAULTS.objectKeyPrefix);
  }
  get maxFileSizeBytes(): number {
    return this.config.get<number>('UPLOAD_MAX_FILE_SIZE_BYTES', DEFAULTS.maxFileSizeBytes);
  }
  get defaultChunkSizeBytes(): number {
    return this.config.get<number>('UPLOAD_DEFAULT_CHUNK_SIZE_BYTES', DEFAULTS.defaultChunkSizeBytes);
  }
  get minChunkSizeBytes(): number {
    return this.config.get<number>('UPLOAD_MIN_CHUNK_SIZE_BYTES', DEFAULTS.minChunkSizeBytes);
  }
  get maxChunkSizeBytes(): number {
    return this.config.get<number>('UPLOAD_MAX_CHUNK_SIZE_BYTES', DEFAULTS.maxChunkSizeBytes);
  }
  get acceptedContentTypePrefixes(): string[] {
    return parseContentTypePrefixes(
      this.config.get<string>('UPLOAD_ACCEPTED_CONTENT_TYPE_PREFIXES', DEFAULTS.acceptedContentTypePrefixes),
    );
  }
  get presignedUrlExpirationMinutes(): number {
    return this.config.get<number>(
      'UPLOAD_PRESIGNED_URL_EXPIRATION_MINUTES',
      DEFAULTS.presignedUrlExpirationMinutes,
    );
  }
  get presignedUrlExpirationSeconds(): number {
    return this.presignedUrlExpirationMinutes * 60;
  }
  get presignMaxPartsPerRequest(): number {
    return this.config.get<number>(
      'UPLOAD_PRESIGN_MAX_PARTS_PER_REQUEST',
      DEFAULTS.presignMaxPartsPerRequest,
    );
  }
  get tempDirectory(): string {
    return this.config.get<string>('UPLOAD_TEMP_DIRECTORY') ?? defaultTempDirectory();
  }

  get jobCoreWorkers(): number { return this.config.get<number>('UPLOAD_JOB_CORE_WORKERS', DEFAULTS.jobCoreWorkers); }
  get jobMaxWorkers(): number { return this.config.get<number>('UPLOAD_JOB_MAX_WORKERS', DEFAULTS.jobMaxWorkers); }
  get jobQueueCapacity(): number {
    return this.config.get<number>('UPLOAD_JOB_QUEUE_CAPACITY', DEFAULTS.jobQueueCapacity);
  }
  get jobRetentionMs(): number {
    return this.config.get<number>('UPLOAD_JOB_RETENTION_MS', DEFAULTS.jobRetentionMs);
  }
  get jobSweepIntervalMs(): number {
    return this.config.get<number>('UPLOAD_JOB_SWEEP_INTERVAL_MS', DEFAULTS.jobSweepIntervalMs);
  }

  get uploadPolicy(): UploadPolicyConfig {
    return {
      maxFileSizeBytes: this.maxFileSizeBytes,
      defaultChunkSizeBytes: this.defaultChunkSizeBytes,
      minChunkSizeBytes: this.minChunkSizeBytes,
      maxChunkSizeBytes: this.maxChunkSizeBytes,
      acceptedContentTypePrefixes: this.acceptedContentTypePrefixes,
    };
  }
}

export function validateUploadApiEnvironment(raw: Record<string, unknown>): Record<string, unknown> {
  const minChunk = toPositiveInt(raw.UPLOAD_MIN_CHUNK_SIZE_BYTES, DEFAULTS.minChunkSizeBytes, 'UPLOAD_MIN_CHUNK_SIZE_BYTES');
  const maxChunk = toPositiveInt(raw.UPLOAD_MAX_CHUNK_SIZE_BYTES, DEFAULTS.maxChunkSizeBytes, 'UPLOAD_MAX_CHUNK_SIZE_BYTES');
  const defaultChunk = toPositiveInt(
    raw.UPLOAD_DEFAULT_CHUNK_SIZE_BYTES,
    DEFAULTS.defaultChunkSizeBytes,
    'UPLOAD_DEFAULT_CHUNK_SIZE_BYTES',
  );
  const coreWorkers = toPositiveInt(raw.UPLOAD_JOB_CORE_WORKERS, DEFAULTS.jobCoreWorkers, 'UPLOAD_JOB_CORE_WORKERS');
  const maxWorkers = toPositiveInt(raw.UPLOAD_JOB_MAX_WORKERS, DEFAULTS.jobMaxWorkers, 'UPLOAD_JOB_MAX_WORKERS');
  const acceptedPrefixes =
    optionalString(raw.UPLOAD_ACCEPTED_CONTENT_TYPE_PREFIXES) ?? DEFAULTS.acceptedContentTypePrefixes;

  if (minChunk < S3_MULTIPART_LIMITS.minPartSizeBytes || maxChunk > S3_MULTIPART_LIMITS.maxPartSizeBytes) {
    throw new Error(
      `[upload-api] chunk size bounds must stay within ${S3_MULTIPART_LIMITS.minPartSizeBytes}..${S3_MULTIPART_LIMITS.maxPartSizeBytes} bytes.`,
    );
  }
  if (minChunk > maxChunk) {
    throw new Error('[upload-api] UPLOAD_MIN_CHUNK_SIZE_BYTES must not exceed UPLOAD_MAX_CHUNK_SIZE_BYTES.');
  }
  if (defaultChunk < minChunk || defaultChunk > maxChunk) {
    throw new Error('[upload-api] UPLOAD_DEFAULT_CHUNK_SIZE_BYTES must lie between the minimum and maximum chunk sizes.');
  }
  if (coreWorkers > maxWorkers) {
    throw new Error('[upload-api] UPLOAD_JOB_CORE_WORKERS must not exceed UPLOAD_JOB_MAX_WORKERS.');
  }
  if (parseContentTypePrefixes(acceptedPrefixes).length === 0) {
    throw new Error('[upload-api] UPLOAD_ACCEPTED_CONTENT_TYPE_PREFIXES must list at least one prefix.');
  }

  return {
    ...raw,
    UPLOAD_API_PORT: toPositiveInt(raw.UPLOAD_API_PORT, DEFAULTS.port, 'UPLOAD_API_PORT'),
    DATABASE_URL: optionalString(raw.DATABASE_URL) ?? '',
    MINIO_ENDPOINT: optionalString(raw.MINIO_ENDPOINT) ?? DEFAULTS.minioEndpoint,
    MINIO_API_PORT: toPositiveInt(raw.MINIO_API_PORT, DEFAULTS.minioApiPort, 'MINIO_API_PORT'),
    MINIO_USE_SSL: toBoolean(raw.MINIO_USE_SSL, DEFAULTS.minioUseSsl, 'MINIO_USE_SSL'),
    MINIO_ROOT_USER: optionalString(raw.MINIO_ROOT_USER) ?? DEFAULTS.minioRootUser,
    MINIO_ROOT_PASSWORD: optionalString(raw.MINIO_ROOT_PASSWORD) ?? DEFAULTS.minioRootPassword,
    S3_REGION: optionalString(raw.S3_REGION) ?? DEFAULTS.s3Region,
    MINIO_BUCKET_UPLOADS: optionalString(raw.MINIO_BUCKET_UPLOADS) ?? DEFAULTS.minioUploadsBucket,
    UPLOAD_OBJECT_KEY_PREFIX: optionalString(raw.UPLOAD_OBJECT_KEY_PREFIX) ?? DEFAULTS.objectKeyPrefix,
    UPLOAD_MAX_FILE_SIZE_BYTES: toPositiveInt(
      raw.UPLOAD_MAX_FILE_SIZE_BYTES,
      DEFAULTS.maxFileSizeBytes,
      'UPLOAD_MAX_FILE_SIZE_BYTES',
    ),
    UPLOAD_MIN_CHUNK_SIZE_BYTES: minChunk,
    UPLOAD_MAX_CHUNK_SIZE_BYTES: maxChunk,
    UPLOAD_DEFAULT_CHUNK_SIZE_BYTES: defaultChunk,
    UPLOAD_ACCEPTED_CONTENT_TYPE_PREFIXES: acceptedPrefixes,
    UPLOAD_PRESIGNED_URL_EXPIRATION_MINUTES: toPositiveInt(
      raw.UPLOAD_PRESIGNED_URL_EXPIRATION_MINUTES,
      DEFAULTS.presignedUrlExpirationMinutes,
      'UPLOAD_PRESIGNED_URL_EXPIRATION_MINUTES',
    ),
    UPLOAD_PRESIGN_MAX_PARTS_PER_REQUEST: toPositiveInt(
      raw.UPLOAD_PRESIGN_MAX_PARTS_PER_REQUEST,
      DEFAULTS.presignMaxPartsPerRequest,
      'UPLOAD_PRESIGN_MAX_PARTS_PER_REQUEST',
    ),
    UPLOAD_TEMP_DIRECTORY: optionalString(raw.UPLOAD_TEMP_DIRECTORY) ?? defaultTempDirectory(),
    UPLOAD_JOB_CORE_WORKERS: coreWorkers,
    UPLOAD_JOB_MAX_WORKERS: maxWorkers,
    UPLOAD_JOB_QUEUE_CAPACITY: toPositiveInt(
      raw.UPLOAD_JOB_QUEUE_CAPACITY,
      DEFAULTS.jobQueueCapacity,
      'UPLOAD_JOB_QUEUE_CAPACITY',
    ),
    UPLOAD_JOB_RETENTION_MS: toPositiveInt(raw.UPLOAD_JOB_RETENTION_MS, DEFAULTS.jobRetentionMs, 'UPLOAD_JOB_RETENTION_MS'),
    UPLOAD_JOB_SWEEP_INTERVAL_MS: toPositiveInt(
      raw.UPLOAD_JOB_SWEEP_INTERVAL_MS,
      DEFAULTS.jobSweepIntervalMs,
      'UPLOAD_JOB_SWEEP_INTERVAL_MS',
    ),
  };
}

function optionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const normalized = value.trim();
  return normalized.length > 0 ? normalized : undefined;
}

function toPositiveInt(value: unknown, fallback: number, name: string): number {
  if (value === undefined || value === null || value === '') return fallback;
  const parsed = typeof value === 'number' ? value : Number.parseInt(String(value), 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`[upload-api] ${name} must be a positive integer.`);
  }
  return Math.trunc(parsed);
}

function toBoolean(value: unknown, fallback: boolean, name: string): boolean {
  if (value === undefined || value === null || value === '') return fallback;
  if (typeof value === 'boolean') return value;
  const normalized = String(value).trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new Error(`[upload-api] ${name} must be "true" or "false".`);
}
