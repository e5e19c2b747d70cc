import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MulterModule } from '@nestjs/platform-express';
import { mkdirSync } from 'node:fs';
import { ServiceInfoQuery } from './application/system/service-info.query';
import { MultipartUploadApplicationService } from './application/uploads/multipart-upload.application.service';
import { COMPLETED_UPLOAD_REPOSITORY } from './application/uploads/ports/completed-upload-repository.port';
import { OBJECT_STORE } from './application/uploads/ports/object-store.port';
import { UPLOAD_JOB_EXECUTOR } from './application/uploads/ports/upload-job-executor.port';
import { UPLOAD_JOB_REGISTRY } from './application/uploads/ports/upload-job-registry.port';
import { ServerSideUploadApplicationService } from './application/uploads/server-side-upload.application.service';
import {
  UPLOAD_API_ENV_FILE_PATHS,
  UploadApiConfigService,
  validateUploadApiEnvironment,
} from './infrastructure/config/upload-api-config.service';
import { BoundedWorkerPool } from './infrastructure/jobs/bounded-worker-pool';
import { InMemoryUploadJobRegistry } from './infrastructure/jobs/in-memory-upload-job-registry';
import { InMemoryCompletedUploadRepository } from './infrastructure/persistence/in-memory-completed-upload.repository';
import { PostgresCompletedUploadRepository } from './infrastructure/persistence/postgres-completed-upload.repository';
import { MinioObjectStoreAdapter } from './infrastructure/storage/minio-object-store.adapter';
import { MultipartUploadsController } from './presentation/http/uploads/multipart-uploads.controller';
import { UploadJobsController } from './presentation/http/uploads/upload-jobs.controller';
import { AppController } from './presentation/http/system/app.controller';
import { UploadJobRegistrySweeperService } from './presentation/workers/upload-job-registry-sweeper.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: UPLOAD_API_ENV_FILE_PATHS,
      validate: validateUploadApiEnvironment,
    }),
    MulterModule.registerAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const config = new UploadApiConfigService(configService);
        mkdirSync(config.tempDirectory, { recursive: true });
        return {
          dest: config.tempDirectory,
          limits: { fileSize: config.maxFileSizeBytes },
        };
      },
    }),
  ],
  controllers: [AppController, MultipartUploadsController, UploadJobsController],
  providers: [
    UploadApiConfigService,
    ServiceInfoQuery,
    MinioObjectStoreAdapter,
    {
      provide: OBJECT_STORE,
      useExisting: MinioObjectStoreAdapter,
    },
    {
      provide: COMPLETED_UPLOAD_REPOSITORY,
      inject: [UploadApiConfigService],
      useFactory: (config: UploadApiConfigService) =>
        config.databaseUrl
          ? new PostgresCompletedUploadRepository(config.databaseUrl)
          : new InMemoryCompletedUploadRepository(),
    },
    {
      provide: UPLOAD_JOB_REGISTRY,
      useFactory: () => new InMemoryUploadJobRegistry(),
    },
    {
      provide: UPLOAD_JOB_EXECUTOR,
      inject: [UploadApiConfigService],
      useFactory: (config: UploadApiConfigService) =>
        new BoundedWorkerPool({
          coreWorkers: config.jobCoreWorkers,
          maxWorkers: config.jobMaxWorkers,
          queueCapacity: config.jobQueueCapacity,
        }),
    },
    MultipartUploadApplicationService,
    ServerSideUploadApplicationService,
    UploadJobRegistrySweeperService,
  ],
})
export class AppModule {}
