import { Injectable } from '@nestjs/common';

@Injectable()
export class ServiceInfoQuery {
  getInfo() {
    return {
      service: 'upload-api',
      kind: 'http-upload-api',
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }
}
