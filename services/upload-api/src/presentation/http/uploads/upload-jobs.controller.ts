import {
  BadRequestException,
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UploadedFile,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { rm } from 'node:fs/promises';
import { ServerSideUploadApplicationService } from '../../../application/uploads/server-side-upload.application.service';
import type { SubmitUploadJobRequestBody, UploadedTempFile } from './uploads.http-types';

@Controller('api/upload-jobs')
export class UploadJobsController {
  constructor(private readonly uploadJobs: ServerSideUploadApplicationService) {}

  @Post()
  @HttpCode(HttpStatus.ACCEPTED)
  @UseInterceptors(FileInterceptor('file'))
  async submitUploadJob(
    @UploadedFile() file: UploadedTempFile | undefined,
    @Body() body: SubmitUploadJobRequestBody,
  ) {
    if (!file) {
      throw new BadRequestException('Field "file" is required.');
    }

    try {
      return await this.uploadJobs.submitAsyncUpload({
        tempFilePath: file.path,
        originalFileName: file.originalname,
        contentType: file.mimetype,
        chunkSize: parseOptionalChunkSize(body?.chunkSize),
      });
    } catch (error) {
      await rm(file.path, { force: true });
      throw error;
    }
  }

  @Get(':jobId')
  getUploadJobStatus(@Param('jobId') jobId: string) {
    return this.uploadJobs.getStatus(jobId);
  }

  @Post(':jobId/cancel')
  @HttpCode(HttpStatus.OK)
  cancelUploadJob(@Param('jobId') jobId: string) {
    return this.uploadJobs.cancelJob(jobId);
  }

  @Delete(':jobId')
  @HttpCode(HttpStatus.NO_CONTENT)
  acknowledgeUploadJob(@Param('jobId') jobId: string): void {
    this.uploadJobs.acknowledgeJob(jobId);
  }
}

function parseOptionalChunkSize(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new BadRequestException({
      message: `Field "chunkSize" must be an integer, got "${raw}".`,
      errorCode: 'INVALID_CHUNK_SIZE',
    });
  }
  return value;
}
