import { Injectable } from '@nestjs/common';
import { Client } from 'minio';
import {
  UploadSessionNotFoundError,
  type CompleteMultipartUploadInput,
  type CompleteMultipartUploadResult,
  type CreateMultipartUploadInput,
  type ObjectStorePort,
  type PresignUploadPartInput,
  type StoredObjectHead,
  type StoredPart,
  type UploadPartInput,
  type UploadSessionRef,
  type UploadedPartResult,
} from '../../application/uploads/ports/object-store.port';
import { UploadApiConfigService } from '../config/upload-api-config.service';

const NO_SUCH_UPLOAD = 'NoSuchUpload';

@Injectable()
export class MinioObjectStoreAdapter implements ObjectStorePort {
  private readonly client: Client;
  private readonly bucket: string;

  constructor(config: UploadApiConfigService) {
    this.client = new Client({
      endPoint: config.minioEndpoint,
      port: config.minioApiPort,
      useSSL: config.minioUseSsl,
      accessKey: config.minioRootUser,
      secretKey: config.minioRootPassword,
      region: config.s3Region,
    });
    this.bucket = config.minioUploadsBucket;
  }

  async createMultipartUpload(input: CreateMultipartUploadInput): Promise<string> {
    return this.client.initiateNewMultipartUpload(this.bucket, input.objectKey, {
      'Content-Type': input.contentType,
    });
  }

  async uploadPart(input: UploadPartInput): Promise<UploadedPartResult> {
    const result = await this.withSession(input, () =>
      this.client.uploadPart(
        {
          bucketName: this.bucket,
          objectName: input.objectKey,
          uploadID: input.uploadId,
          partNumber: input.partNumber,
          headers: { 'Content-Length': input.body.length },
        },
        input.body,
      ),
    );

    return {
      partNumber: input.partNumber,
      eTag: normalizeEtag(result.etag) ?? '',
    };
  }

  async listParts(input: UploadSessionRef): Promise<StoredPart[]> {
    const parts = await this.withSession(input, () =>
      this.client.listParts(this.bucket, input.objectKey, input.uploadId),
    );

    return parts
      .map((part) => ({
        partNumber: part.part,
        eTag: normalizeEtag(part.etag) ?? '',
        sizeBytes: Number(part.size),
      }))
      .sort((a, b) => a.partNumber - b.partNumber);
  }

  async completeMultipartUpload(input: CompleteMultipartUploadInput): Promise<CompleteMultipartUploadResult> {
    const result = await this.withSession(input, () =>
      this.client.completeMultipartUpload(
        this.bucket,
        input.objectKey,
        input.uploadId,
        input.parts.map((part) => ({ part: part.partNumber, etag: part.eTag })),
      ),
    );

    return { eTag: normalizeEtag(result.etag) ?? '' };
  }

  async abortMultipartUpload(input: UploadSessionRef): Promise<void> {
    await this.withSession(input, () =>
      this.client.abortMultipartUpload(this.bucket, input.objectKey, input.uploadId),
    );
  }

  async headObject(objectKey: string): Promise<StoredObjectHead> {
    const stat = await this.client.statObject(this.bucket, objectKey);

    return {
      objectKey,
      sizeBytes: Number.isFinite(stat.size) ? Number(stat.size) : 0,
      eTag: normalizeEtag(stat.etag),
    };
  }

  async presignUploadPart(input: PresignUploadPartInput): Promise<string> {
    return this.client.presignedUrl('PUT', this.bucket, input.objectKey, input.expiresInSeconds, {
      partNumber: String(input.partNumber),
      uploadId: input.uploadId,
    });
  }

  async presignGetObject(objectKey: string, expiresInSeconds: number): Promise<string> {
    return this.client.presignedGetObject(this.bucket, objectKey, expiresInSeconds);
  }

  private async withSession<T>(session: UploadSessionRef, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (Reflect.get(Object(error), 'code') === NO_SUCH_UPLOAD) {
        throw new UploadSessionNotFoundError(session.uploadId, session.objectKey, { cause: error });
      }
      throw error;
    }
  }
}

function normalizeEtag(etag?: string): string | undefined {
  if (!etag) {
    return undefined;
  }

  return etag.replace(/^"|"$/g, '');
}
