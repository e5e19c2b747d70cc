import test from 'node:test';
import assert from 'node:assert/strict';
import {
  createQueuedUploadJob,
  markUploadJobStarted,
  type UploadJobSnapshot,
} from '../../../services/upload-api/src/domain/uploads/upload-job';
import { InMemoryUploadJobRegistry } from '../../../services/upload-api/src/infrastructure/jobs/in-memory-upload-job-registry';
import { UploadJobRegistrySweeperService } from '../../../services/upload-api/src/presentation/workers/upload-job-registry-sweeper.service';
import { createTestConfig } from './support/test-config';

function queuedJob(jobId: string): UploadJobSnapshot {
  return createQueuedUploadJob({
    jobId,
    objectKey: `uploads/${jobId}/clip.mp4`,
    fileName: 'clip.mp4',
    contentType: 'video/mp4',
    tempFilePath: `/tmp/${jobId}`,
    totalBytes: 100,
    totalParts: 1,
    chunkSize: 100,
    submittedAt: '2026-01-01T00:00:00.000Z',
  });
}

test('InMemoryUploadJobRegistry swaps whole snapshots on update', () => {
  const registry = new InMemoryUploadJobRegistry(() => 0);
  const original = queuedJob('job-1');
  registry.register(original);

  const updated = registry.update('job-1', (current) => markUploadJobStarted(current, '2026-01-01T00:00:01.000Z'));

  assert.equal(updated?.status, 'UPLOADING');
  assert.equal(registry.get('job-1'), updated);
  assert.equal(original.status, 'QUEUED');
  assert.equal(registry.update('missing', (current) => current), undefined);
});

test('InMemoryUploadJobRegistry hides and evicts entries once their retention expires', () => {
  let now = 10_000;
  const registry = new InMemoryUploadJobRegistry(() => now);
  registry.register(queuedJob('job-1'));
  registry.register(queuedJob('job-2'));

  registry.scheduleEviction('job-1', 500);
  registry.scheduleEviction('missing', 500);

  now = 10_499;
  assert.equal(registry.get('job-1')?.jobId, 'job-1');
  assert.equal(registry.evictExpired(), 0);

  now = 10_500;
  assert.equal(registry.get('job-1'), undefined);
  assert.equal(registry.update('job-1', (current) => current), undefined);
  assert.equal(registry.size(), 2);
  assert.equal(registry.evictExpired(), 1);
  assert.equal(registry.size(), 1);
  assert.equal(registry.get('job-2')?.jobId, 'job-2');
});

test('InMemoryUploadJobRegistry keeps the eviction deadline across updates and supports removal', () => {
  let now = 0;
  const registry = new InMemoryUploadJobRegistry(() => now);
  registry.register(queuedJob('job-1'));
  registry.scheduleEviction('job-1', 100);

  registry.update('job-1', (current) => ({ ...current, progress: 50 }));
  now = 100;
  assert.equal(registry.get('job-1'), undefined);

  registry.register(queuedJob('job-2'));
  assert.equal(registry.remove('job-2'), true);
  assert.equal(registry.remove('job-2'), false);
});

test('UploadJobRegistrySweeperService evicts expired snapshots on each sweep', () => {
  const registry = new InMemoryUploadJobRegistry(() => 0);
  registry.register(queuedJob('job-1'));
  registry.scheduleEviction('job-1', 1_000);
  const sweeper = new UploadJobRegistrySweeperService(registry, createTestConfig());

  assert.equal(sweeper.runSweep(999), 0);
  assert.equal(sweeper.runSweep(1_000), 1);
  assert.equal(registry.size(), 0);
});
