import test from 'node:test';
import assert from 'node:assert/strict';
import { existsSync } from 'node:fs';
import { mkdtemp, rm, truncate, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { ConflictException, HttpException, NotFoundException } from '@nestjs/common';
import {
  MAX_JOB_BUFFER_BYTES,
  ServerSideUploadApplicationService,
  readWindow,
  type PositionalReader,
} from '../../../services/upload-api/src/application/uploads/server-side-upload.application.service';
import type { UploadJobSnapshot } from '../../../services/upload-api/src/domain/uploads/upload-job';
import { BoundedWorkerPool } from '../../../services/upload-api/src/infrastructure/jobs/bounded-worker-pool';
import { InMemoryUploadJobRegistry } from '../../../services/upload-api/src/infrastructure/jobs/in-memory-upload-job-registry';
import { InMemoryCompletedUploadRepository } from '../../../services/upload-api/src/infrastructure/persistence/in-memory-completed-upload.repository';
import { FakeObjectStore } from './support/fake-object-store';
import { createGate } from './support/gate';
import { FIVE_MIB, createTestConfig } from './support/test-config';

const THREE_PART_SIZE = FIVE_MIB * 2 + 1000;

class RecordingRegistry extends InMemoryUploadJobRegistry {
  readonly history: UploadJobSnapshot[] = [];

  update(jobId: string, transition: (current: UploadJobSnapshot) => UploadJobSnapshot) {
    const next = super.update(jobId, transition);
    if (next) {
      this.history.push(next);
    }
    return next;
  }
}

interface HarnessOptions {
  store?: FakeObjectStore;
  registry?: RecordingRegistry;
  pool?: BoundedWorkerPool;
  env?: Record<string, unknown>;
}

function createHarness(options: HarnessOptions = {}) {
  const store = options.store ?? new FakeObjectStore();
  const registry = options.registry ?? new RecordingRegistry();
  const pool = options.pool ?? new BoundedWorkerPool({ coreWorkers: 2, maxWorkers: 4, queueCapacity: 10 });
  const repository = new InMemoryCompletedUploadRepository();
  const service = new ServerSideUploadApplicationService(
    store,
    repository,
    registry,
    pool,
    createTestConfig(options.env),
  );
  return { store, registry, pool, repository, service };
}

async function writeTempFile(name: string, content: Buffer): Promise<string> {
  const directory = await mkdtemp(path.join(tmpdir(), 'upload-api-test-'));
  const filePath = path.join(directory, name);
  await writeFile(filePath, content);
  return filePath;
}

function patternedBuffer(size: number): Buffer {
  const buffer = Buffer.alloc(size);
  for (let index = 0; index < size; index += 1) {
    buffer[index] = index % 251;
  }
  return buffer;
}

test('submitAsyncUpload streams the file part by part and completes the job', async () => {
  const { service, pool, registry, store, repository } = createHarness();
  const content = patternedBuffer(THREE_PART_SIZE);
  const tempFilePath = await writeTempFile('clip.mp4', content);

  const accepted = await service.submitAsyncUpload({
    tempFilePath,
    originalFileName: 'clip.mp4',
    contentType: 'video/mp4',
    chunkSize: FIVE_MIB,
  });
  await pool.onIdle();

  assert.match(accepted.objectKey, /^uploads\/[0-9a-f-]{36}\/clip\.mp4$/);
  assert.equal(accepted.message, 'Upload job accepted; poll its status for progress.');

  const status = service.getStatus(accepted.jobId);
  assert.equal(status.status, 'COMPLETED');
  assert.equal(status.progress, 100);
  assert.equal(status.uploadedParts, 3);
  assert.equal(status.totalParts, 3);
  assert.equal(status.uploadedBytes, THREE_PART_SIZE);
  assert.equal(status.totalBytes, THREE_PART_SIZE);
  assert.equal(status.downloadUrl, `https://store.test/${accepted.objectKey}?expires=3600`);

  assert.deepEqual(
    registry.history.map((snapshot) => snapshot.status),
    ['UPLOADING', 'UPLOADING', 'UPLOADING', 'UPLOADING', 'UPLOADING', 'COMPLETED'],
  );
  assert.deepEqual(
    registry.history.map((snapshot) => snapshot.uploadedBytes),
    [0, 0, FIVE_MIB, FIVE_MIB * 2, THREE_PART_SIZE, THREE_PART_SIZE],
  );

  assert.equal(existsSync(tempFilePath), false);
  assert.ok(store.objects.get(accepted.objectKey)?.body.equals(content));
  const record = await repository.findByObjectKey(accepted.objectKey);
  assert.equal(record?.sizeBytes, THREE_PART_SIZE);
  assert.equal(record?.fileName, 'clip.mp4');
});

test('a failing part marks the job FAILED, aborts the session and deletes the temp file', async () => {
  const { service, pool, store, repository } = createHarness({ store: new FakeObjectStore({ failOnPart: 2 }) });
  const tempFilePath = await writeTempFile('clip.mp4', patternedBuffer(THREE_PART_SIZE));

  const accepted = await service.submitAsyncUpload({
    tempFilePath,
    originalFileName: 'clip.mp4',
    contentType: 'video/mp4',
    chunkSize: FIVE_MIB,
  });
  await pool.onIdle();

  const status = service.getStatus(accepted.jobId);
  assert.equal(status.status, 'FAILED');
  assert.equal(status.errorMessage, 'Simulated failure on part 2');
  assert.equal(status.uploadedParts, 1);
  assert.equal(status.uploadedBytes, FIVE_MIB);
  assert.deepEqual(store.abortedUploads, ['upload-1']);
  assert.equal(existsSync(tempFilePath), false);
  assert.equal(await repository.existsByObjectKey(accepted.objectKey), false);
});

test('a failing abort after a failed part is only logged', async () => {
  const { service, pool } = createHarness({
    store: new FakeObjectStore({ failOnPart: 1, failAbort: true }),
  });
  const tempFilePath = await writeTempFile('clip.mp4', patternedBuffer(1024));

  const accepted = await service.submitAsyncUpload({
    tempFilePath,
    originalFileName: 'clip.mp4',
    contentType: 'video/mp4',
  });
  await pool.onIdle();

  assert.equal(service.getStatus(accepted.jobId).status, 'FAILED');
  assert.equal(existsSync(tempFilePath), false);
});

test('a download URL signing failure still completes the job without a URL', async () => {
  const { service, pool } = createHarness({ store: new FakeObjectStore({ failPresignGet: true }) });
  const tempFilePath = await writeTempFile('clip.mp4', patternedBuffer(2048));

  const accepted = await service.submitAsyncUpload({
    tempFilePath,
    originalFileName: 'clip.mp4',
    contentType: 'video/mp4',
  });
  await pool.onIdle();

  const status = service.getStatus(accepted.jobId);
  assert.equal(status.status, 'COMPLETED');
  assert.equal(status.downloadUrl, undefined);
});

test('submitAsyncUpload validates the file before registering a job', async () => {
  const { service, store, registry } = createHarness();
  const videoPath = await writeTempFile('clip.mp4', patternedBuffer(16));
  const emptyPath = await writeTempFile('empty.mp4', Buffer.alloc(0));

  const rejectsWith = (errorCode: string) => (error: unknown) => {
    assert.ok(error instanceof HttpException);
    assert.equal(error.getStatus(), 400);
    assert.equal(Reflect.get(Object(error.getResponse()), 'errorCode'), errorCode);
    return true;
  };

  await assert.rejects(
    () => service.submitAsyncUpload({ tempFilePath: videoPath, originalFileName: 'doc.pdf', contentType: 'application/pdf' }),
    rejectsWith('UNSUPPORTED_CONTENT_TYPE'),
  );
  await assert.rejects(
    () => service.submitAsyncUpload({ tempFilePath: emptyPath, originalFileName: 'empty.mp4', contentType: 'video/mp4' }),
    rejectsWith('EMPTY_FILE'),
  );
  await assert.rejects(
    () =>
      service.submitAsyncUpload({
        tempFilePath: path.join(path.dirname(videoPath), 'missing.mp4'),
        originalFileName: 'missing.mp4',
        contentType: 'video/mp4',
      }),
    rejectsWith('TEMP_FILE_MISSING'),
  );
  await assert.rejects(
    () => service.submitAsyncUpload({ tempFilePath: videoPath, originalFileName: ' ', contentType: 'video/mp4' }),
    rejectsWith('EMPTY_FILE_NAME'),
  );
  await assert.rejects(
    () =>
      service.submitAsyncUpload({
        tempFilePath: videoPath,
        originalFileName: 'clip.mp4',
        contentType: 'video/mp4',
        chunkSize: 6 * 1024 * 1024 * 1024,
      }),
    rejectsWith('CHUNK_SIZE_TOO_LARGE'),
  );

  assert.deepEqual(store.calls, []);
  assert.equal(registry.size(), 0);
  assert.equal(existsSync(videoPath), true);
});

test('getStatus returns the NOT_FOUND sentinel for unknown jobs', () => {
  const { service } = createHarness();

  assert.deepEqual(service.getStatus('no-such-job'), {
    jobId: 'no-such-job',
    status: 'NOT_FOUND',
    progress: -1,
    uploadedParts: 0,
    totalParts: 0,
    uploadedBytes: 0,
    totalBytes: 0,
    errorMessage: 'Job not found or already cleaned up',
  });
});

test('a job cancelled while queued never opens a session', async () => {
  const gate = createGate();
  const store = new FakeObjectStore({ beforeCreate: () => gate.wait() });
  const pool = new BoundedWorkerPool({ coreWorkers: 1, maxWorkers: 1, queueCapacity: 5 });
  const { service } = createHarness({ store, pool });
  const firstPath = await writeTempFile('first.mp4', patternedBuffer(64));
  const secondPath = await writeTempFile('second.mp4', patternedBuffer(64));

  const first = await service.submitAsyncUpload({
    tempFilePath: firstPath,
    originalFileName: 'first.mp4',
    contentType: 'video/mp4',
  });
  const second = await service.submitAsyncUpload({
    tempFilePath: secondPath,
    originalFileName: 'second.mp4',
    contentType: 'video/mp4',
  });

  const cancelView = service.cancelJob(second.jobId);
  assert.equal(cancelView.status, 'QUEUED');
  assert.equal(cancelView.cancelRequested, true);

  gate.release();
  await pool.onIdle();

  assert.equal(service.getStatus(first.jobId).status, 'COMPLETED');
  const cancelled = service.getStatus(second.jobId);
  assert.equal(cancelled.status, 'CANCELLED');
  assert.equal(cancelled.errorMessage, 'Upload cancelled by request.');
  assert.equal(store.calls.filter((call) => call === 'createMultipartUpload').length, 1);
  assert.equal(existsSync(secondPath), false);
});

test('a job cancelled mid-upload stops before the next part and aborts the session', async () => {
  const registry = new RecordingRegistry();
  let service: ServerSideUploadApplicationService | undefined;
  const store = new FakeObjectStore({
    beforePart: (partNumber) => {
      const jobId = registry.history[0]?.jobId;
      if (partNumber === 1 && jobId && service) {
        service.cancelJob(jobId);
      }
    },
  });
  const harness = createHarness({ store, registry });
  service = harness.service;
  const tempFilePath = await writeTempFile('clip.mp4', patternedBuffer(THREE_PART_SIZE));

  const accepted = await harness.service.submitAsyncUpload({
    tempFilePath,
    originalFileName: 'clip.mp4',
    contentType: 'video/mp4',
    chunkSize: FIVE_MIB,
  });
  await harness.pool.onIdle();

  const status = harness.service.getStatus(accepted.jobId);
  assert.equal(status.status, 'CANCELLED');
  assert.equal(status.uploadedParts, 1);
  assert.deepEqual(store.abortedUploads, ['upload-1']);
  assert.equal(store.calls.filter((call) => call === 'uploadPart').length, 1);
  assert.equal(existsSync(tempFilePath), false);
});

test('cancelJob and acknowledgeJob enforce the job lifecycle', async () => {
  const { service, pool } = createHarness();
  const tempFilePath = await writeTempFile('clip.mp4', patternedBuffer(128));

  assert.throws(() => service.cancelJob('unknown'), NotFoundException);
  assert.throws(() => service.acknowledgeJob('unknown'), NotFoundException);

  const accepted = await service.submitAsyncUpload({
    tempFilePath,
    originalFileName: 'clip.mp4',
    contentType: 'video/mp4',
  });
  await pool.onIdle();

  assert.throws(() => service.cancelJob(accepted.jobId), ConflictException);

  service.acknowledgeJob(accepted.jobId);
  assert.equal(service.getStatus(accepted.jobId).status, 'NOT_FOUND');
});

test('acknowledgeJob refuses jobs that are still running', async () => {
  const gate = createGate();
  const { service, pool } = createHarness({ store: new FakeObjectStore({ beforeCreate: () => gate.wait() }) });
  const tempFilePath = await writeTempFile('clip.mp4', patternedBuffer(128));

  const accepted = await service.submitAsyncUpload({
    tempFilePath,
    originalFileName: 'clip.mp4',
    contentType: 'video/mp4',
  });

  assert.throws(() => service.acknowledgeJob(accepted.jobId), ConflictException);

  gate.release();
  await pool.onIdle();
  assert.equal(service.getStatus(accepted.jobId).status, 'COMPLETED');
});

test('finished job snapshots are evicted after the retention window', async () => {
  let now = 1_000;
  const registry = new RecordingRegistry(() => now);
  const { service, pool } = createHarness({ registry, env: { UPLOAD_JOB_RETENTION_MS: '5000' } });
  const tempFilePath = await writeTempFile('clip.mp4', patternedBuffer(128));

  const accepted = await service.submitAsyncUpload({
    tempFilePath,
    originalFileName: 'clip.mp4',
    contentType: 'video/mp4',
  });
  await pool.onIdle();

  now = 5_999;
  assert.equal(service.getStatus(accepted.jobId).status, 'COMPLETED');

  now = 6_000;
  assert.equal(service.getStatus(accepted.jobId).status, 'NOT_FOUND');
  assert.equal(registry.evictExpired(), 1);
  assert.equal(registry.size(), 0);
});

test('readWindow splits one part into bounded reads at the right file offsets', async () => {
  const source = patternedBuffer(10);
  const reads: Array<{ offset: number; length: number; position: number }> = [];
  const reader: PositionalReader = {
    async read(buffer, offset, length, position) {
      reads.push({ offset, length, position });
      const bytesRead = source.copy(buffer, offset, position, Math.min(position + length, source.length));
      return { bytesRead };
    },
  };
  const target = Buffer.alloc(8);

  const bytesRead = await readWindow(reader, target, 8, 2, 3);

  assert.equal(bytesRead, 8);
  assert.deepEqual(reads, [
    { offset: 0, length: 3, position: 2 },
    { offset: 3, length: 3, position: 5 },
    { offset: 6, length: 2, position: 8 },
  ]);
  assert.deepEqual(target, source.subarray(2, 10));
});

test('readWindow stops at end of file and reports the bytes it got', async () => {
  const source = patternedBuffer(5);
  const reader: PositionalReader = {
    async read(buffer, offset, length, position) {
      const end = Math.min(position + length, source.length);
      return { bytesRead: position >= end ? 0 : source.copy(buffer, offset, position, end) };
    },
  };

  assert.equal(await readWindow(reader, Buffer.alloc(8), 8, 0, 4), 5);
});

test('submitAsyncUpload refuses a part buffer larger than a job may allocate', async () => {
  const { service, store, registry } = createHarness();
  const filePath = await writeTempFile('large.mp4', Buffer.alloc(0));
  const chunkSize = MAX_JOB_BUFFER_BYTES + 4096;

  try {
    await truncate(filePath, chunkSize + 4096);

    await assert.rejects(
      () =>
        service.submitAsyncUpload({
          tempFilePath: filePath,
          originalFileName: 'large.mp4',
          contentType: 'video/mp4',
          chunkSize,
        }),
      (error: unknown) => {
        assert.ok(error instanceof HttpException);
        assert.equal(error.getStatus(), 400);
        assert.equal(Reflect.get(Object(error.getResponse()), 'errorCode'), 'CHUNK_SIZE_TOO_LARGE');
        return true;
      },
    );
    assert.deepEqual(store.calls, []);
    assert.equal(registry.size(), 0);
  } finally {
    await rm(path.dirname(filePath), { recursive: true, force: true });
  }
});
