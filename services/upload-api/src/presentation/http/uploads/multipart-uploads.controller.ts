import {
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { MultipartUploadApplicationService } from '../../../application/uploads/multipart-upload.application.service';
import type {
  AbortUploadRequestBody,
  CompleteUploadRequestBody,
  InitUploadRequestBody,
} from './uploads.http-types';

@Controller('api/uploads')
export class MultipartUploadsController {
  constructor(private readonly multipartUploads: MultipartUploadApplicationService) {}

  @Post('init')
  @HttpCode(HttpStatus.OK)
  async initializeUpload(
    @Body() body: InitUploadRequestBody,
    @Headers('x-correlation-id') correlationId?: string,
  ) {
    return this.multipartUploads.initializeUpload({
      fileName: body?.fileName,
      size: body?.size,
      contentType: body?.contentType,
      chunkSize: body?.chunkSize,
      correlationId,
    });
  }

  @Get(':uploadId/parts')
  async getPresignedPartUrls(
    @Param('uploadId') uploadId: string,
    @Query('objectKey') objectKey: string,
    @Query('startPartNumber', ParseIntPipe) startPartNumber: number,
    @Query('endPartNumber', ParseIntPipe) endPartNumber: number,
  ) {
    return this.multipartUploads.generatePresignedUrls({
      uploadId,
      objectKey,
      startPartNumber,
      endPartNumber,
    });
  }

  @Get(':uploadId/status')
  async getUploadStatus(
    @Param('uploadId') uploadId: string,
    @Query('objectKey') objectKey: string,
  ) {
    return this.multipartUploads.getUploadStatus({ uploadId, objectKey });
  }

  @Post('complete')
  @HttpCode(HttpStatus.OK)
  async completeUpload(
    @Body() body: CompleteUploadRequestBody,
    @Headers('x-correlation-id') correlationId?: string,
  ) {
    return this.multipartUploads.completeUpload({
      uploadId: body?.uploadId,
      objectKey: body?.objectKey,
      parts: body?.parts,
      correlationId,
    });
  }

  @Post('abort')
  @HttpCode(HttpStatus.NO_CONTENT)
  async abortUpload(
    @Body() body: AbortUploadRequestBody,
    @Headers('x-correlation-id') correlationId?: string,
  ): Promise<void> {
    await this.multipartUploads.abortUpload({
      uploadId: body?.uploadId,
      objectKey: body?.objectKey,
      correlationId,
    });
  }
}
