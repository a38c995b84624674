import { Injectable } from '@nestjs/common';

@Injectable()
export class ServiceInfoQuery {
  getInfo() {
    return {
      service: 'intake-service',
      kind: 'http-intake',
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }
}
