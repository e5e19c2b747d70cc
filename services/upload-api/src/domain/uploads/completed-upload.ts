export type CompletedUploadStatus = 'COMPLETED';

export interface NewCompletedUpload {
  fileName: string;
  sizeBytes: number;
  objectKey: string;
  status: CompletedUploadStatus;
  checksum?: string;
}

export interface CompletedUploadRecord extends NewCompletedUpload {
  id: string;
  createdAt: string;
}

export interface CompletedUploadView {
  id: string;
  filename: string;
  size: number;
  objectKey: string;
  status: CompletedUploadStatus;
  downloadUrl: string;
  createdAt: string;
}

export function toCompletedUploadView(record: CompletedUploadRecord, downloadUrl: string): CompletedUploadView {
  return {
    id: record.id,
    filename: record.fileName,
    size: record.sizeBytes,
    objectKey: record.objectKey,
    status: record.status,
    downloadUrl,
    createdAt: record.createdAt,
  };
}
