import { Injectable } from '@nestjs/common';

@Injectable()
export class ServiceInfoQuery {
  getInfo() {
    return {
      service: 'worker-service',
      kind: 'log-worker',
      status: 'ok',
      timestamp: new Date().toISOString(),
    };
  }
}
