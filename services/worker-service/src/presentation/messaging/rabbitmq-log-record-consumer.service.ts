import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import * as amqp from 'amqplib';
import {
  applyRabbitMqDeliveryAction,
  assertLogIngestTopology,
  createRabbitMqConsumerJsonLogLine,
  formatJsonLogLine,
  getRabbitMqDeliveryAttempt,
  openAmqpChannel,
  resolveLogIngestTopology,
  type DeliveryAction,
  type DeliveryActionDecision,
  type RabbitMqConsumerChannelLike,
  type RabbitMqConsumerMessageLike,
} from '@log-ingest/shared';
import { ProcessLogDeliveryUseCase } from '../../application/processing/process-log-delivery.use-case';
import { WorkerServiceConfigService } from '../../infrastructure/config/worker-service-config.service';

const SERVICE_NAME = 'worker-service';

@Injectable()
export class RabbitMqLogRecordConsumerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(RabbitMqLogRecordConsumerService.name);
  private connection?: amqp.ChannelModel;
  private channel?: amqp.Channel;
  private consumerTag?: string;

  constructor(
    private readonly processLogDelivery: ProcessLogDeliveryUseCase,
    private readonly config: WorkerServiceConfigService,
  ) {}

  async onModuleInit(): Promise<void> {
    if (!this.config.consumerEnabled) {
      this.logger.log(formatJsonLogLine({
        level: 'info',
        service: SERVICE_NAME,
        message: 'RabbitMQ consumer disabled; only push deliveries are processed.',
      }));
      return;
    }

    await this.startConsumer();
  }

  async onModuleDestroy(): Promise<void> {
    await this.stopConsumer();
  }

  /**
   * Runs one delivery through the use case and settles it on the channel. Never rejects: a
   * failure to settle leaves the message unacknowledged and the broker redelivers it.
   */
  async handleDelivery(
    channel: RabbitMqConsumerChannelLike,
    message: RabbitMqConsumerMessageLike,
  ): Promise<DeliveryActionDecision | undefined> {
    const queue = this.config.logWorkerQueue;
    const deliveryAttempt = getRabbitMqDeliveryAttempt(message, queue);

    let action: DeliveryAction;
    let reason: string | undefined;
    try {
      const outcome = await this.processLogDelivery.execute({
        body: message.content,
        transport: 'rabbitmq',
        transportMessageId: typeof message.properties.messageId === 'string' ? message.properties.messageId : undefined,
        deliveryAttempt,
      });
      action = outcome.action;
      reason = outcome.action === 'ack' ? undefined : outcome.reason;
    } catch (error) {
      action = 'retry';
      reason = 'unexpected-processing-error';
      this.logger.error(createRabbitMqConsumerJsonLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: 'Unexpected error while processing delivery; scheduling retry.',
        queue,
        amqpMessage: message,
        error,
        metadata: { deliveryAttempt },
      }));
    }

    try {
      const decision = applyRabbitMqDeliveryAction({
        channel,
        message,
        queue,
        action,
        retentionWindowMs: this.config.retentionWindowMs,
        parkingReason: action === 'discard' ? 'malformed-delivery' : undefined,
      });

      if (decision.action !== 'acked') {
        this.logger.warn(createRabbitMqConsumerJsonLogLine({
          level: 'warn',
          service: SERVICE_NAME,
          message: decision.action === 'parked'
            ? `Delivery parked in ${decision.parkingExchange ?? 'parking exchange'} (${decision.parkingReason ?? 'unknown'}).`
            : 'Delivery rejected; it returns after the acknowledgment deadline.',
          queue,
          amqpMessage: message,
          metadata: {
            settlement: decision.action,
            deliveryAttempt: decision.deliveryAttempt,
            reason,
          },
        }));
      }

      return decision;
    } catch (error) {
      this.logger.error(createRabbitMqConsumerJsonLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: 'Failed to settle delivery; the broker will redeliver it.',
        queue,
        amqpMessage: message,
        error,
        metadata: { action, deliveryAttempt },
      }));
      return undefined;
    }
  }

  private async startConsumer(): Promise<void> {
    const queue = this.config.logWorkerQueue;
    const prefetch = this.config.prefetch;

    let consumerTag = '';
    const { connection, channel } = await openAmqpChannel({
      connect: () => amqp.connect(this.config.rabbitmqUrl),
      createChannel: (opened) => opened.createChannel(),
      setup: async (opened, openedConnection) => {
        consumerTag = await this.setupConsumer(opened, openedConnection);
      },
      onCloseError: (error, label) => {
        this.logger.warn(formatJsonLogLine({
          level: 'warn',
          service: SERVICE_NAME,
          message: `AMQP consumer ${label} close failed after a failed setup.`,
          queue,
          error,
        }));
      },
    });

    this.connection = connection;
    this.channel = channel;
    this.consumerTag = consumerTag;
    this.logger.log(formatJsonLogLine({
      level: 'info',
      service: SERVICE_NAME,
      message: `Consuming log records from queue "${queue}" with prefetch=${prefetch}.`,
      queue,
      metadata: { prefetch },
    }));
  }

  private async setupConsumer(channel: amqp.Channel, connection: amqp.ChannelModel): Promise<string> {
    const queue = this.config.logWorkerQueue;

    connection.on('error', (error: unknown) => {
      this.logger.error(formatJsonLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: 'AMQP consumer connection error.',
        queue,
        error,
      }));
    });
    connection.on('close', () => {
      this.logger.warn(formatJsonLogLine({
        level: 'warn',
        service: SERVICE_NAME,
        message: 'AMQP consumer connection closed.',
        queue,
      }));
    });
    channel.on('error', (error: unknown) => {
      this.logger.error(formatJsonLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: 'AMQP consumer channel error.',
        queue,
        error,
      }));
    });
    channel.on('close', () => {
      this.logger.warn(formatJsonLogLine({
        level: 'warn',
        service: SERVICE_NAME,
        message: 'AMQP consumer channel closed.',
        queue,
      }));
    });

    await assertLogIngestTopology(
      channel,
      resolveLogIngestTopology({
        exchange: this.config.rabbitmqLogsExchange,
        queue,
        retryDelayMs: this.config.ackDeadlineMs,
      }),
    );
    await channel.prefetch(this.config.prefetch);

    const consumed = await channel.consume(queue, async (message: amqp.ConsumeMessage | null) => {
      if (!message) {
        return;
      }
      await this.handleDelivery(channel, message);
    });
    return consumed.consumerTag;
  }

  private async stopConsumer(): Promise<void> {
    const channel = this.channel;
    const connection = this.connection;
    const consumerTag = this.consumerTag;

    this.channel = undefined;
    this.connection = undefined;
    this.consumerTag = undefined;

    await this.runShutdownStep('cancel consumer', async () => {
      if (channel && consumerTag) {
        await channel.cancel(consumerTag);
      }
    });
    await this.runShutdownStep('close channel', async () => {
      await channel?.close();
    });
    await this.runShutdownStep('close connection', async () => {
      await connection?.close();
    });
  }

  private async runShutdownStep(label: string, step: () => Promise<void>): Promise<void> {
    try {
      await step();
    } catch (error) {
      this.logger.warn(formatJsonLogLine({
        level: 'warn',
        service: SERVICE_NAME,
        message: `AMQP consumer shutdown step failed: ${label}.`,
        error,
      }));
    }
  }
}
