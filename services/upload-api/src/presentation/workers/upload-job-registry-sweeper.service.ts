import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { createJsonLogEntry } from '@resumable-upload/shared';
import {
  UPLOAD_JOB_REGISTRY,
  type UploadJobRegistryPort,
} from '../../application/uploads/ports/upload-job-registry.port';
import { UploadApiConfigService } from '../../infrastructure/config/upload-api-config.service';

@Injectable()
export class UploadJobRegistrySweeperService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(UploadJobRegistrySweeperService.name);
  private timer?: NodeJS.Timeout;

  constructor(
    @Inject(UPLOAD_JOB_REGISTRY)
    private readonly registry: UploadJobRegistryPort,
    private readonly config: UploadApiConfigService,
  ) {}

  onModuleInit(): void {
    const intervalMs = this.config.jobSweepIntervalMs;
    this.timer = setInterval(() => {
      this.runSweep();
    }, intervalMs);
    this.timer.unref();

    this.logger.log(JSON.stringify(createJsonLogEntry({
      level: 'info',
      service: 'upload-api',
      message: 'Upload job registry sweeper started.',
      correlationId: 'system',
      metadata: {
        intervalMs,
        retentionMs: this.config.jobRetentionMs,
      },
    })));
  }

  onModuleDestroy(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  runSweep(now: number = Date.now()): number {
    try {
      const evicted = this.registry.evictExpired(now);
      if (evicted > 0) {
        this.logger.log(JSON.stringify(createJsonLogEntry({
          level: 'info',
          service: 'upload-api',
          message: 'Evicted expired upload job snapshots.',
          correlationId: 'system',
          metadata: {
            evicted,
          },
        })));
      }
      return evicted;
    } catch (error) {
      this.logger.error(JSON.stringify(createJsonLogEntry({
        level: 'error',
        service: 'upload-api',
        message: 'Upload job registry sweep failed.',
        correlationId: 'system',
        error,
      })));
      return 0;
    }
  }
}
