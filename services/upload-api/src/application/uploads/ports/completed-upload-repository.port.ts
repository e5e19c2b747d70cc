import type { CompletedUploadRecord, NewCompletedUpload } from '../../../domain/uploads/completed-upload';

export const COMPLETED_UPLOAD_REPOSITORY = Symbol('COMPLETED_UPLOAD_REPOSITORY');

export interface CompletedUploadRepositoryPort {
  save(input: NewCompletedUpload): Promise<CompletedUploadRecord>;
  existsByObjectKey(objectKey: string): Promise<boolean>;
  findByObjectKey(objectKey: string): Promise<CompletedUploadRecord | undefined>;
}

export class CompletedUploadAlreadyExistsError extends Error {
  constructor(readonly objectKey: string, options?: { cause?: unknown }) {
    super(`A completed upload is already recorded for ${objectKey}.`, options);
    this.name = 'CompletedUploadAlreadyExistsError';
  }
}
