import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { once } from 'node:events';
import * as amqp from 'amqplib';
import {
  assertLogIngestTopology,
  encodeLogRecordAcceptedEvent,
  EVENT_ROUTING_KEYS_V1,
  formatJsonLogLine,
  openAmqpChannel,
  resolveLogIngestTopology,
  type LogRecordAcceptedEvent,
} from '@log-ingest/shared';
import type {
  LogRecordPublisher,
  PublishReceipt,
} from '../../application/ingest/ports/log-record-publisher.port';
import { IntakeServiceConfigService } from '../config/intake-service-config.service';

const SERVICE_NAME = 'intake-service';

@Injectable()
export class RabbitMqLogRecordPublisherAdapter implements LogRecordPublisher, OnModuleDestroy {
  private readonly logger = new Logger(RabbitMqLogRecordPublisherAdapter.name);
  private connection?: amqp.ChannelModel;
  private channel?: amqp.ConfirmChannel;
  private channelPromise?: Promise<amqp.ConfirmChannel>;

  constructor(private readonly config: IntakeServiceConfigService) {}

  async publish(event: LogRecordAcceptedEvent): Promise<PublishReceipt> {
    const channel = await this.getChannel();
    const routingKey = EVENT_ROUTING_KEYS_V1[event.type];

    const published = channel.publish(
      this.config.rabbitmqLogsExchange,
      routingKey,
      encodeLogRecordAcceptedEvent(event),
      {
        contentType: 'application/json',
        contentEncoding: 'utf-8',
        deliveryMode: 2,
        // Read back by the consumer to enforce the retention window.
        timestamp: Date.now(),
        messageId: event.messageId,
        type: event.type,
        correlationId: event.correlationId,
        headers: {
          kind: event.kind,
          version: event.version,
          producer: event.producer,
          tenantId: event.payload.tenantId,
        },
      },
    );

    if (!published) {
      await once(channel, 'drain');
    }

    await channel.waitForConfirms();
    this.logger.log(formatJsonLogLine({
      level: 'info',
      service: SERVICE_NAME,
      message: 'Log record published to RabbitMQ.',
      correlationId: event.correlationId,
      messageId: event.messageId,
      messageType: event.type,
      routingKey,
      tenantId: event.payload.tenantId,
      logId: event.payload.logId,
    }));

    return { messageId: event.messageId };
  }

  async onModuleDestroy(): Promise<void> {
    await this.closeChannelAndConnection();
  }

  private async getChannel(): Promise<amqp.ConfirmChannel> {
    if (this.channel) {
      return this.channel;
    }

    if (!this.channelPromise) {
      this.channelPromise = this.createChannel();
    }

    try {
      return await this.channelPromise;
    } finally {
      this.channelPromise = undefined;
    }
  }

  private async createChannel(): Promise<amqp.ConfirmChannel> {
    const { connection, channel } = await openAmqpChannel({
      connect: () => amqp.connect(this.config.rabbitmqUrl),
      createChannel: (opened) => opened.createConfirmChannel(),
      setup: (opened, openedConnection) => this.setupChannel(opened, openedConnection),
      onCloseError: (error, label) => {
        this.logger.warn(formatJsonLogLine({
          level: 'warn',
          service: SERVICE_NAME,
          message: `AMQP publisher ${label} close failed after a failed setup.`,
          error,
        }));
      },
    });

    this.connection = connection;
    this.channel = channel;
    return channel;
  }

  private async setupChannel(channel: amqp.ConfirmChannel, connection: amqp.ChannelModel): Promise<void> {
    connection.on('error', (error: unknown) => {
      this.logger.error(formatJsonLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: 'AMQP publisher connection error.',
        error,
      }));
      this.resetChannelState();
    });

    connection.on('close', () => {
      this.logger.warn(formatJsonLogLine({
        level: 'warn',
        service: SERVICE_NAME,
        message: 'AMQP publisher connection closed.',
      }));
      this.resetChannelState();
    });

    channel.on('error', (error: unknown) => {
      this.logger.error(formatJsonLogLine({
        level: 'error',
        service: SERVICE_NAME,
        message: 'AMQP publisher channel error.',
        error,
      }));
      this.resetChannelState();
    });

    channel.on('close', () => {
      this.logger.warn(formatJsonLogLine({
        level: 'warn',
        service: SERVICE_NAME,
        message: 'AMQP publisher channel closed.',
      }));
      this.resetChannelState();
    });

    // Declaring the queue here lets records buffer before any worker has started.
    await assertLogIngestTopology(
      channel,
      resolveLogIngestTopology({
        exchange: this.config.rabbitmqLogsExchange,
        queue: this.config.logWorkerQueue,
        retryDelayMs: this.config.ackDeadlineMs,
      }),
    );
  }

  private resetChannelState(): void {
    this.channel = undefined;
    this.connection = undefined;
  }

  private async closeChannelAndConnection(): Promise<void> {
    const channel = this.channel;
    const connection = this.connection;
    this.resetChannelState();

    await closeQuietly(channel, this.logger, 'channel');
    await closeQuietly(connection, this.logger, 'connection');
  }
}

async function closeQuietly(
  closable: { close(): Promise<void> } | undefined,
  logger: Logger,
  label: string,
): Promise<void> {
  if (!closable) {
    return;
  }

  try {
    await closable.close();
  } catch (error) {
    logger.warn(formatJsonLogLine({
      level: 'warn',
      service: SERVICE_NAME,
      message: `AMQP publisher ${label} close failed during shutdown.`,
      error,
    }));
  }
}
