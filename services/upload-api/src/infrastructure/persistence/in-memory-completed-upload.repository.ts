import { Injectable } from '@nestjs/common';
import type { CompletedUploadRecord, NewCompletedUpload } from '../../domain/uploads/completed-upload';
import {
  CompletedUploadAlreadyExistsError,
  type CompletedUploadRepositoryPort,
} from '../../application/uploads/ports/completed-upload-repository.port';

@Injectable()
export class InMemoryCompletedUploadRepository implements CompletedUploadRepositoryPort {
  private readonly records = new Map<string, CompletedUploadRecord>();
  private sequence = 0;

  async save(input: NewCompletedUpload): Promise<CompletedUploadRecord> {
    if (this.records.has(input.objectKey)) {
      throw new CompletedUploadAlreadyExistsError(input.objectKey);
    }

    this.sequence += 1;
    const record: CompletedUploadRecord = {
      ...input,
      id: String(this.sequence),
      createdAt: new Date().toISOString(),
    };

    this.records.set(record.objectKey, record);
    return record;
  }

  async existsByObjectKey(objectKey: string): Promise<boolean> {
    return this.records.has(objectKey);
  }

  async findByObjectKey(objectKey: string): Promise<CompletedUploadRecord | undefined> {
    return this.records.get(objectKey);
  }
}
