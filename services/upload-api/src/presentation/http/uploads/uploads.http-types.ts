export interface InitUploadRequestBody {
  fileName?: unknown;
  size?: unknown;
  contentType?: unknown;
  chunkSize?: unknown;
}

export interface CompletedPartRequestBody {
  partNumber?: unknown;
  eTag?: unknown;
}

export interface CompleteUploadRequestBody {
  uploadId?: unknown;
  objectKey?: unknown;
  parts?: CompletedPartRequestBody[];
}

export interface AbortUploadRequestBody {
  uploadId?: unknown;
  objectKey?: unknown;
}

export interface SubmitUploadJobRequestBody {
  chunkSize?: string;
}

/** The fields of a multer disk-storage file this API reads. */
export interface UploadedTempFile {
  path: string;
  originalname: string;
  mimetype: string;
  size: number;
}
