import type { UploadJobSnapshot } from '../../domain/uploads/upload-job';
import type { UploadJobRegistryPort } from '../../application/uploads/ports/upload-job-registry.port';

interface RegistryEntry {
  snapshot: UploadJobSnapshot;
  expiresAt?: number;
}

export type Clock = () => number;

export class InMemoryUploadJobRegistry implements UploadJobRegistryPort {
  private readonly entries = new Map<string, RegistryEntry>();

  constructor(private readonly now: Clock = Date.now) {}

  register(job: UploadJobSnapshot): void {
    this.entries.set(job.jobId, { snapshot: job });
  }

  get(jobId: string): UploadJobSnapshot | undefined {
    const entry = this.entries.get(jobId);
    if (!entry || this.isExpired(entry, this.now())) {
      return undefined;
    }
    return entry.snapshot;
  }

  update(
    jobId: string,
    transition: (current: UploadJobSnapshot) => UploadJobSnapshot,
  ): UploadJobSnapshot | undefined {
    const entry = this.entries.get(jobId);
    if (!entry || this.isExpired(entry, this.now())) {
      return undefined;
    }

    const next = transition(entry.snapshot);
    this.entries.set(jobId, { snapshot: next, expiresAt: entry.expiresAt });
    return next;
  }

  scheduleEviction(jobId: string, retentionMs: number): void {
    const entry = this.entries.get(jobId);
    if (!entry) {
      return;
    }
    this.entries.set(jobId, { snapshot: entry.snapshot, expiresAt: this.now() + retentionMs });
  }

  remove(jobId: string): boolean {
    return this.entries.delete(jobId);
  }

  evictExpired(now: number = this.now()): number {
    let evicted = 0;
    for (const [jobId, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(jobId);
        evicted += 1;
      }
    }
    return evicted;
  }

  size(): number {
    return this.entries.size;
  }

  private isExpired(entry: RegistryEntry, now: number): boolean {
    return entry.expiresAt !== undefined && entry.expiresAt <= now;
  }
}
