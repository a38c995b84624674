export interface AmqpClosable {
  close(): Promise<void>;
}

export interface OpenAmqpChannelOptions<TConnection extends AmqpClosable, TChannel extends AmqpClosable> {
  connect(): Promise<TConnection>;
  createChannel(connection: TConnection): Promise<TChannel>;
  /** Listeners, topology, prefetch, consume. A rejection here closes both channel and connection. */
  setup(channel: TChannel, connection: TConnection): Promise<void>;
  onCloseError(error: unknown, label: 'channel' | 'connection'): void;
}

export interface OpenedAmqpChannel<TConnection, TChannel> {
  connection: TConnection;
  channel: TChannel;
}

/**
 * Opens a connection and a channel and runs `setup` on them. Nothing stays open when any
 * step fails: the channel and connection are closed and the original error is rethrown.
 */
export async function openAmqpChannel<TConnection extends AmqpClosable, TChannel extends AmqpClosable>(
  options: OpenAmqpChannelOptions<TConnection, TChannel>,
): Promise<OpenedAmqpChannel<TConnection, TChannel>> {
  const connection = await options.connect();
  let channel: TChannel | undefined;

  try {
    channel = await options.createChannel(connection);
    await options.setup(channel, connection);
    return { connection, channel };
  } catch (error) {
    if (channel) {
      await closeReportingErrors(channel, 'channel', options.onCloseError);
    }
    await closeReportingErrors(connection, 'connection', options.onCloseError);
    throw error;
  }
}

async function closeReportingErrors(
  closable: AmqpClosable,
  label: 'channel' | 'connection',
  onCloseError: (error: unknown, label: 'channel' | 'connection') => void,
): Promise<void> {
  try {
    await closable.close();
  } catch (error) {
    onCloseError(error, label);
  }
}
