import test from 'node:test';
import assert from 'node:assert/strict';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { validateUploadApiEnvironment } from '../../../services/upload-api/src/infrastructure/config/upload-api-config.service';
import { FIVE_MIB, createTestConfig } from './support/test-config';

test('UploadApiConfigService exposes defaults when the environment is empty', () => {
  const config = createTestConfig();

  assert.equal(config.port, 3000);
  assert.equal(config.databaseUrl, undefined);
  assert.equal(config.minioEndpoint, 'localhost');
  assert.equal(config.minioApiPort, 9000);
  assert.equal(config.minioUseSsl, false);
  assert.equal(config.minioUploadsBucket, 'uploads');
  assert.equal(config.objectKeyPrefix, 'uploads');
  assert.equal(config.presignedUrlExpirationSeconds, 3600);
  assert.equal(config.presignMaxPartsPerRequest, 100);
  assert.equal(config.tempDirectory, path.join(tmpdir(), 'upload-api'));
  assert.equal(config.jobCoreWorkers, 2);
  assert.equal(config.jobMaxWorkers, 4);
  assert.equal(config.jobQueueCapacity, 200);
  assert.equal(config.jobRetentionMs, 3_600_000);
  assert.equal(config.jobSweepIntervalMs, 60_000);
  assert.deepEqual(config.uploadPolicy, {
    maxFileSizeBytes: 10 * 1024 * 1024 * 1024,
    defaultChunkSizeBytes: 8 * 1024 * 1024,
    minChunkSizeBytes: FIVE_MIB,
    maxChunkSizeBytes: 5 * 1024 * 1024 * 1024,
    acceptedContentTypePrefixes: ['video/'],
  });
});

test('validateUploadApiEnvironment normalises string values from the environment', () => {
  const env = validateUploadApiEnvironment({
    UPLOAD_API_PORT: '8080',
    MINIO_USE_SSL: 'TRUE',
    DATABASE_URL: '  ',
    UPLOAD_ACCEPTED_CONTENT_TYPE_PREFIXES: 'Video/, audio/',
    UPLOAD_DEFAULT_CHUNK_SIZE_BYTES: String(FIVE_MIB),
  });

  assert.equal(env.UPLOAD_API_PORT, 8080);
  assert.equal(env.MINIO_USE_SSL, true);
  assert.equal(env.DATABASE_URL, '');
  assert.equal(env.UPLOAD_DEFAULT_CHUNK_SIZE_BYTES, FIVE_MIB);

  const config = createTestConfig({ UPLOAD_ACCEPTED_CONTENT_TYPE_PREFIXES: 'Video/, audio/' });
  assert.deepEqual(config.acceptedContentTypePrefixes, ['video/', 'audio/']);
});

test('validateUploadApiEnvironment rejects malformed values', () => {
  assert.throws(
    () => validateUploadApiEnvironment({ UPLOAD_API_PORT: 'abc' }),
    /\[upload-api\] UPLOAD_API_PORT must be a positive integer\./,
  );
  assert.throws(
    () => validateUploadApiEnvironment({ MINIO_USE_SSL: 'yes' }),
    /\[upload-api\] MINIO_USE_SSL must be "true" or "false"\./,
  );
  assert.throws(
    () => validateUploadApiEnvironment({ UPLOAD_JOB_QUEUE_CAPACITY: '-1' }),
    /\[upload-api\] UPLOAD_JOB_QUEUE_CAPACITY must be a positive integer\./,
  );
});

test('validateUploadApiEnvironment enforces chunk and worker bounds', () => {
  assert.throws(
    () => validateUploadApiEnvironment({ UPLOAD_MIN_CHUNK_SIZE_BYTES: '1024' }),
    /chunk size bounds must stay within/,
  );
  assert.throws(
    () =>
      validateUploadApiEnvironment({
        UPLOAD_MIN_CHUNK_SIZE_BYTES: String(FIVE_MIB * 4),
        UPLOAD_MAX_CHUNK_SIZE_BYTES: String(FIVE_MIB * 2),
        UPLOAD_DEFAULT_CHUNK_SIZE_BYTES: String(FIVE_MIB * 2),
      }),
    /UPLOAD_MIN_CHUNK_SIZE_BYTES must not exceed UPLOAD_MAX_CHUNK_SIZE_BYTES/,
  );
  assert.throws(
    () => validateUploadApiEnvironment({ UPLOAD_DEFAULT_CHUNK_SIZE_BYTES: String(FIVE_MIB - 1) }),
    /UPLOAD_DEFAULT_CHUNK_SIZE_BYTES must lie between the minimum and maximum chunk sizes/,
  );
  assert.throws(
    () => validateUploadApiEnvironment({ UPLOAD_JOB_CORE_WORKERS: '5' }),
    /UPLOAD_JOB_CORE_WORKERS must not exceed UPLOAD_JOB_MAX_WORKERS/,
  );
  assert.throws(
    () => validateUploadApiEnvironment({ UPLOAD_ACCEPTED_CONTENT_TYPE_PREFIXES: ' , ' }),
    /must list at least one prefix/,
  );
});
