import { Body, Controller, Logger, Post, Res } from '@nestjs/common';
import { formatJsonLogLine } from '@log-ingest/shared';
import { ProcessLogDeliveryUseCase } from '../../../application/processing/process-log-delivery.use-case';
import type { DeliveryOutcome } from '../../../domain/processing/delivery-outcome';
import { MalformedDeliveryError } from '../../../domain/processing/processing.errors';
import { decodePushEnvelope, mapOutcomeToPushResponse, type PushResponseBody } from './push-envelope';

interface StatusSettable {
  status(code: number): unknown;
}

@Controller()
export class PushDeliveryController {
  private readonly logger = new Logger(PushDeliveryController.name);

  constructor(private readonly processLogDelivery: ProcessLogDeliveryUseCase) {}

  @Post('process')
  async process(
    @Body() body: unknown,
    @Res({ passthrough: true }) response: StatusSettable,
  ): Promise<PushResponseBody> {
    const outcome = await this.toOutcome(body);
    const mapped = mapOutcomeToPushResponse(outcome);
    response.status(mapped.statusCode);
    return mapped.body;
  }

  private async toOutcome(body: unknown): Promise<DeliveryOutcome> {
    const envelope = decodePushEnvelope(body);
    if (!envelope.ok) {
      this.logger.warn(formatJsonLogLine({
        level: 'warn',
        service: 'worker-service',
        message: `Discarding push delivery: ${envelope.reason}`,
        metadata: { transport: 'push' },
      }));
      return { action: 'discard', reason: envelope.reason, error: new MalformedDeliveryError(envelope.reason) };
    }

    return this.processLogDelivery.execute({
      body: envelope.data,
      transport: 'push',
      transportMessageId: envelope.messageId,
    });
  }
}
