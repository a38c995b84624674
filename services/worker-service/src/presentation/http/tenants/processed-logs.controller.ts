import { Controller, Get, Param } from '@nestjs/common';
import {
  ProcessedLogsQuery,
  type ProcessedLogListView,
  type ProcessedLogView,
} from '../../../application/tenants/processed-logs.query';

/** Read side of the Tenant Store; every route is scoped to the tenant in the path. */
@Controller('tenants/:tenantId/processed-logs')
export class ProcessedLogsController {
  constructor(private readonly processedLogsQuery: ProcessedLogsQuery) {}

  @Get()
  async list(@Param('tenantId') tenantId: string): Promise<ProcessedLogListView> {
    return this.processedLogsQuery.list(tenantId);
  }

  @Get(':logId')
  async get(
    @Param('tenantId') tenantId: string,
    @Param('logId') logId: string,
  ): Promise<ProcessedLogView> {
    return this.processedLogsQuery.get(tenantId, logId);
  }
}
