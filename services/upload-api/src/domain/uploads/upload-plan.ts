import { S3_MULTIPART_LIMITS } from '@resumable-upload/shared';

export interface UploadPolicyConfig {
  maxFileSizeBytes: number;
  defaultChunkSizeBytes: number;
  minChunkSizeBytes: number;
  maxChunkSizeBytes: number;
  acceptedContentTypePrefixes: string[];
}

export interface UploadPlanRequest {
  fileName: string;
  contentType: string;
  sizeBytes: number;
  requestedChunkSize?: number;
}

export interface UploadPartPlan {
  chunkSize: number;
  totalParts: number;
  minPartNumber: 1;
  maxPartNumber: number;
}

export type UploadRejectionCode =
  | 'EMPTY_FILE_NAME'
  | 'UNSUPPORTED_CONTENT_TYPE'
  | 'EMPTY_FILE'
  | 'FILE_TOO_LARGE'
  | 'CHUNK_SIZE_TOO_SMALL'
  | 'CHUNK_SIZE_TOO_LARGE'
  | 'TOO_MANY_PARTS';

export type UploadPlanDecision =
  | {
      outcome: 'accepted';
      plan: UploadPartPlan;
    }
  | {
      outcome: 'rejected';
      code: UploadRejectionCode;
      reason: string;
    };

export function planMultipartUpload(
  request: UploadPlanRequest,
  policy: UploadPolicyConfig,
): UploadPlanDecision {
  if (!request.fileName.trim()) {
    return rejected('EMPTY_FILE_NAME', 'File name cannot be empty.');
  }

  if (!isAcceptedContentType(request.contentType, policy.acceptedContentTypePrefixes)) {
    return rejected(
      'UNSUPPORTED_CONTENT_TYPE',
      `Content type "${request.contentType}" is not accepted. Allowed: ${policy.acceptedContentTypePrefixes.join(', ')}.`,
    );
  }

  if (request.sizeBytes <= 0) {
    return rejected('EMPTY_FILE', 'File size must be greater than zero.');
  }

  if (request.sizeBytes > policy.maxFileSizeBytes) {
    return rejected(
      'FILE_TOO_LARGE',
      `File size ${request.sizeBytes} exceeds maximum allowed size (${policy.maxFileSizeBytes} bytes).`,
    );
  }

  const chunkSize = resolveChunkSize(request.requestedChunkSize, policy.defaultChunkSizeBytes);

  if (chunkSize < policy.minChunkSizeBytes) {
    return rejected(
      'CHUNK_SIZE_TOO_SMALL',
      `Chunk size must be at least ${policy.minChunkSizeBytes} bytes, got ${chunkSize}.`,
    );
  }

  if (chunkSize > policy.maxChunkSizeBytes) {
    return rejected(
      'CHUNK_SIZE_TOO_LARGE',
      `Chunk size cannot exceed ${policy.maxChunkSizeBytes} bytes, got ${chunkSize}.`,
    );
  }

  const totalParts = computeTotalParts(request.sizeBytes, chunkSize);
  if (totalParts > S3_MULTIPART_LIMITS.maxPartNumber) {
    return rejected(
      'TOO_MANY_PARTS',
      `File would need ${totalParts} parts; the object store accepts at most ${S3_MULTIPART_LIMITS.maxPartNumber}.`,
    );
  }

  return {
    outcome: 'accepted',
    plan: {
      chunkSize,
      totalParts,
      minPartNumber: 1,
      maxPartNumber: totalParts,
    },
  };
}

export function resolveChunkSize(requestedChunkSize: number | undefined, defaultChunkSize: number): number {
  return requestedChunkSize !== undefined && requestedChunkSize > 0 ? requestedChunkSize : defaultChunkSize;
}

export function computeTotalParts(sizeBytes: number, chunkSize: number): number {
  return Math.ceil(sizeBytes / chunkSize);
}

export function isAcceptedContentType(contentType: string, acceptedPrefixes: readonly string[]): boolean {
  const normalized = contentType.trim().toLowerCase();
  if (!normalized) {
    return false;
  }
  return acceptedPrefixes.some((prefix) => normalized.startsWith(prefix.trim().toLowerCase()));
}

export function parseContentTypePrefixes(raw: string): string[] {
  return raw
    .split(',')
    .map((value) => value.trim().toLowerCase())
    .filter((value) => value.length > 0);
}

export interface CompletedPartInput {
  partNumber?: unknown;
  eTag?: unknown;
}

export interface CompletedPart {
  partNumber: number;
  eTag: string;
}

export type CompletedPartsDecision =
  | {
      outcome: 'accepted';
      parts: CompletedPart[];
    }
  | {
      outcome: 'rejected';
      code: 'NO_PARTS' | 'INVALID_PART_NUMBER' | 'MISSING_ETAG' | 'DUPLICATE_PART_NUMBER';
      reason: string;
    };

/**
 * Checks the caller's part list before completion and returns it sorted by
 * part number. Gaps are allowed; the store decides whether they are fatal.
 */
export function normalizeCompletedParts(parts: readonly CompletedPartInput[]): CompletedPartsDecision {
  if (parts.length === 0) {
    return { outcome: 'rejected', code: 'NO_PARTS', reason: 'Parts list cannot be empty.' };
  }

  const seen = new Set<number>();
  const normalized: CompletedPart[] = [];

  for (const part of parts) {
    const partNumber = part.partNumber;
    if (typeof partNumber !== 'number' || !Number.isInteger(partNumber) || partNumber <= 0) {
      return {
        outcome: 'rejected',
        code: 'INVALID_PART_NUMBER',
        reason: `Part numbers must be positive integers, got: ${String(partNumber)}.`,
      };
    }

    const eTag = typeof part.eTag === 'string' ? part.eTag.trim() : '';
    if (!eTag) {
      return {
        outcome: 'rejected',
        code: 'MISSING_ETAG',
        reason: `ETag cannot be empty for part ${partNumber}.`,
      };
    }

    if (seen.has(partNumber)) {
      return {
        outcome: 'rejected',
        code: 'DUPLICATE_PART_NUMBER',
        reason: `Duplicate part number found: ${partNumber}.`,
      };
    }

    seen.add(partNumber);
    normalized.push({ partNumber, eTag });
  }

  normalized.sort((a, b) => a.partNumber - b.partNumber);
  return { outcome: 'accepted', parts: normalized };
}

function rejected(code: UploadRejectionCode, reason: string): UploadPlanDecision {
  return { outcome: 'rejected', code, reason };
}
