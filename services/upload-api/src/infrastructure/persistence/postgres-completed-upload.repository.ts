import { Logger, type OnModuleDestroy } from '@nestjs/common';
import { Pool } from 'pg';
import type {
  CompletedUploadRecord,
  CompletedUploadStatus,
  NewCompletedUpload,
} from '../../domain/uploads/completed-upload';
import {
  CompletedUploadAlreadyExistsError,
  type CompletedUploadRepositoryPort,
} from '../../application/uploads/ports/completed-upload-repository.port';

const UNIQUE_VIOLATION = '23505';

interface CompletedUploadRow {
  id: string;
  file_name: string;
  size_bytes: string;
  object_key: string;
  status: CompletedUploadStatus;
  checksum: string | null;
  created_at: Date;
}

export class PostgresCompletedUploadRepository implements CompletedUploadRepositoryPort, OnModuleDestroy {
  private readonly logger = new Logger(PostgresCompletedUploadRepository.name);
  private readonly pool: Pool;

  constructor(connectionString: string) {
    this.pool = new Pool({
      connectionString,
      max: 10,
      idleTimeoutMillis: 10_000,
    });

    this.pool.on('error', (error) => {
      this.logger.error(
        `Postgres pool error: ${error instanceof Error ? error.message : String(error)}`,
      );
    });
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }

  async save(input: NewCompletedUpload): Promise<CompletedUploadRecord> {
    try {
      const result = await this.pool.query<CompletedUploadRow>(
        `
          insert into upload_api.completed_uploads (
            file_name,
            size_bytes,
            object_key,
            status,
            checksum,
            created_at
          )
          values ($1, $2, $3, $4, $5, now())
          returning id, file_name, size_bytes, object_key, status, checksum, created_at
        `,
        [input.fileName, input.sizeBytes, input.objectKey, input.status, input.checksum ?? null],
      );

      const row = result.rows[0];
      if (!row) {
        throw new Error(`Insert into completed_uploads returned no row for ${input.objectKey}.`);
      }
      return toRecord(row);
    } catch (error) {
      if (Reflect.get(Object(error), 'code') === UNIQUE_VIOLATION) {
        throw new CompletedUploadAlreadyExistsError(input.objectKey, { cause: error });
      }
      throw error;
    }
  }

  async existsByObjectKey(objectKey: string): Promise<boolean> {
    const result = await this.pool.query<{ exists: boolean }>(
      `
        select exists(
          select 1 from upload_api.completed_uploads where object_key = $1
        ) as exists
      `,
      [objectKey],
    );

    return result.rows[0]?.exists ?? false;
  }

  async findByObjectKey(objectKey: string): Promise<CompletedUploadRecord | undefined> {
    const result = await this.pool.query<CompletedUploadRow>(
      `
        select id, file_name, size_bytes, object_key, status, checksum, created_at
        from upload_api.completed_uploads
        where object_key = $1
      `,
      [objectKey],
    );

    const row = result.rows[0];
    return row ? toRecord(row) : undefined;
  }
}

function toRecord(row: CompletedUploadRow): CompletedUploadRecord {
  return {
    id: String(row.id),
    fileName: row.file_name,
    sizeBytes: Number(row.size_bytes),
    objectKey: row.object_key,
    status: row.status,
    checksum: row.checksum ?? undefined,
    createdAt: row.created_at.toISOString(),
  };
}
