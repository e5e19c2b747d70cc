export interface CreateMultipartUploadInput {
  objectKey: string;
  contentType: string;
}

export interface UploadSessionRef {
  uploadId: string;
  objectKey: string;
}

export interface UploadPartInput extends UploadSessionRef {
  partNumber: number;
  body: Buffer;
}

export interface UploadedPartResult {
  partNumber: number;
  eTag: string;
}

export interface StoredPart {
  partNumber: number;
  eTag: string;
  sizeBytes: number;
}

export interface CompleteMultipartUploadInput extends UploadSessionRef {
  parts: Array<{ partNumber: number; eTag: string }>;
}

export interface CompleteMultipartUploadResult {
  eTag: string;
}

export interface StoredObjectHead {
  objectKey: string;
  sizeBytes: number;
  eTag?: string;
}

export interface PresignUploadPartInput extends UploadSessionRef {
  partNumber: number;
  expiresInSeconds: number;
}

/**
 * Raised by adapters when the store reports that a multipart session does not
 * exist (never opened, already completed or already aborted).
 */
export class UploadSessionNotFoundError extends Error {
  constructor(
    readonly uploadId: string,
    readonly objectKey: string,
    options?: { cause?: unknown },
  ) {
    super(`Multipart upload ${uploadId} for ${objectKey} was not found.`, options);
    this.name = 'UploadSessionNotFoundError';
  }
}

export const OBJECT_STORE = Symbol('OBJECT_STORE');

export interface ObjectStorePort {
  createMultipartUpload(input: CreateMultipartUploadInput): Promise<string>;
  uploadPart(input: UploadPartInput): Promise<UploadedPartResult>;
  listParts(input: UploadSessionRef): Promise<StoredPart[]>;
  completeMultipartUpload(input: CompleteMultipartUploadInput): Promise<CompleteMultipartUploadResult>;
  abortMultipartUpload(input: UploadSessionRef): Promise<void>;
  headObject(objectKey: string): Promise<StoredObjectHead>;
  presignUploadPart(input: PresignUploadPartInput): Promise<string>;
  presignGetObject(objectKey: string, expiresInSeconds: number): Promise<string>;
}
