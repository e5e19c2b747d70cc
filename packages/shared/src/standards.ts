const MIB = 1024 * 1024;

/**
 * Hard limits of the S3 multipart protocol. Deployments may narrow them
 * through configuration but never widen them.
 */
export const S3_MULTIPART_LIMITS = {
  minPartSizeBytes: 5 * MIB,
  maxPartSizeBytes: 5 * 1024 * MIB,
  maxPartNumber: 10_000,
} as const;
