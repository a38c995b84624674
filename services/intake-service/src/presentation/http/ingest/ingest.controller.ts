import {
  Body,
  Controller,
  Headers,
  HttpCode,
  HttpStatus,
  Post,
} from '@nestjs/common';
import {
  IngestApplicationService,
  type IngestAcceptedResponse,
} from '../../../application/ingest/ingest.application.service';

@Controller()
export class IngestController {
  constructor(private readonly ingestService: IngestApplicationService) {}

  /**
   * Accepts one log submission as `application/json` or `text/plain`. Both arrive as raw
   * strings; see `main.ts` for the body parser setup.
   */
  @Post('ingest')
  @HttpCode(HttpStatus.ACCEPTED)
  async ingest(
    @Body() body: unknown,
    @Headers('content-type') contentType?: string,
    @Headers('x-tenant-id') tenantId?: string,
    @Headers('idempotency-key') idempotencyKey?: string,
    @Headers('x-correlation-id') correlationId?: string,
  ): Promise<IngestAcceptedResponse> {
    return this.ingestService.ingest({
      // Unparsed content types leave an empty object behind.
      body: typeof body === 'string' ? body : '',
      contentType,
      tenantIdHeader: tenantId,
      idempotencyKey,
      correlationId,
    });
  }
}
