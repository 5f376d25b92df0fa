/**
 * RabbitMQ transport (amqplib).
 *
 * Topology:
 *   <exchange>               durable topic exchange, routing key = event name
 *   <queue per subscription> durable, bound to one event name
 *   <exchange>.dead-letter   durable topic exchange + catch-all queue of the same name
 *
 * Publishes go through a confirm channel, so publish() resolves only after
 * the broker has taken responsibility for the message. Each consumer gets its
 * own channel with a prefetch limit.
 */

import amqp from 'amqplib';
import type { Channel, ConfirmChannel, ConsumeMessage, Options } from 'amqplib';
import type {
  BrokerTransport,
  MessageHeaders,
  MessageListener,
  QueueBinding
} from './transport';
import { HEADER_ORIGIN_QUEUE } from './transport';

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

export interface AmqpTransportOptions {
  url: string;
  exchange: string;
  prefetch: number;
}

export class AmqpTransport implements BrokerTransport {
  private connection: AmqpConnection | null = null;
  private publishChannel: ConfirmChannel | null = null;
  private closing = false;
  private disconnectListeners: Array<(error: Error) => void> = [];

  constructor(private readonly options: AmqpTransportOptions) {}

  get deadLetterExchange(): string {
    return `${this.options.exchange}.dead-letter`;
  }

  // ===========================================================================
  // CONNECTION
  // ===========================================================================

  async connect(): Promise<void> {
    this.closing = false;

    const connection = await amqp.connect(this.options.url);
    connection.on('error', (error: Error) => {
      console.error('[AmqpTransport] Connection error:', error.message);
    });
    connection.on('close', () => this.handleClose(connection));

    let channel: ConfirmChannel;
    try {
      channel = await connection.createConfirmChannel();
      logChannelErrors(channel, 'publish channel');
      await channel.assertExchange(this.options.exchange, 'topic', { durable: true });
      await channel.assertExchange(this.deadLetterExchange, 'topic', { durable: true });
      await channel.assertQueue(this.deadLetterExchange, { durable: true });
      await channel.bindQueue(this.deadLetterExchange, this.deadLetterExchange, '#');
    } catch (error) {
      await connection.close().catch((closeError: unknown) => {
        console.error('[AmqpTransport] Closing half-open connection failed:', toError(closeError, 'close failed').message);
      });
      throw error;
    }

    this.watchChannel(connection, channel, 'publish channel');
    this.connection = connection;
    this.publishChannel = channel;
    console.log(`[AmqpTransport] Connected, exchange "${this.options.exchange}" ready`);
  }

  async close(): Promise<void> {
    this.closing = true;
    const connection = this.connection;
    this.connection = null;
    this.publishChannel = null;
    if (connection) {
      await connection.close();
    }
  }

  onDisconnect(listener: (error: Error) => void): void {
    this.disconnectListeners.push(listener);
  }

  private handleClose(connection: AmqpConnection): void {
    this.failConnection(connection, new Error('AMQP connection closed unexpectedly'));
  }

  /**
   * A channel the broker closes takes the whole connection down with it,
   * so the bus reconnects and re-declares every consumer.
   */
  private watchChannel(connection: AmqpConnection, channel: Channel, label: string): void {
    channel.on('close', () => {
      this.failConnection(connection, new Error(`AMQP ${label} closed unexpectedly`));
    });
  }

  private failConnection(connection: AmqpConnection, error: Error): void {
    if (connection !== this.connection) return;

    this.connection = null;
    this.publishChannel = null;
    if (this.closing) return;

    for (const listener of this.disconnectListeners) {
      listener(error);
    }
    connection.close().catch((closeError: unknown) => {
      console.error('[AmqpTransport] Closing failed connection:', toError(closeError, 'close failed').message);
    });
  }

  // ===========================================================================
  // PUBLISHING
  // ===========================================================================

  async publish(routingKey: string, body: Buffer, headers: MessageHeaders): Promise<void> {
    const channel = this.requirePublishChannel();
    await new Promise<void>((resolve, reject) => {
      channel.publish(
        this.options.exchange,
        routingKey,
        body,
        messageOptions(headers),
        (err: unknown) => (err ? reject(toError(err, `Broker rejected ${routingKey}`)) : resolve())
      );
    });
  }

  async sendToQueue(queue: string, body: Buffer, headers: MessageHeaders): Promise<void> {
    const channel = this.requirePublishChannel();
    await new Promise<void>((resolve, reject) => {
      channel.sendToQueue(
        queue,
        body,
        messageOptions(headers),
        (err: unknown) => (err ? reject(toError(err, `Broker rejected requeue to ${queue}`)) : resolve())
      );
    });
  }

  async deadLetter(binding: QueueBinding, body: Buffer, headers: MessageHeaders): Promise<void> {
    const channel = this.requirePublishChannel();
    await new Promise<void>((resolve, reject) => {
      channel.publish(
        this.deadLetterExchange,
        binding.routingKey,
        body,
        messageOptions({ ...headers, [HEADER_ORIGIN_QUEUE]: binding.queue }),
        (err: unknown) => (err ? reject(toError(err, `Broker rejected dead letter from ${binding.queue}`)) : resolve())
      );
    });
  }

  // ===========================================================================
  // CONSUMING
  // ===========================================================================

  async consume(binding: QueueBinding, listener: MessageListener): Promise<void> {
    if (!this.connection) {
      throw new Error('Not connected to RabbitMQ');
    }

    const connection = this.connection;
    const channel: Channel = await connection.createChannel();
    logChannelErrors(channel, `consumer channel for ${binding.queue}`);
    await channel.prefetch(this.options.prefetch);
    await channel.assertQueue(binding.queue, { durable: true });
    await channel.bindQueue(binding.queue, this.options.exchange, binding.routingKey);

    await channel.consume(
      binding.queue,
      (msg: ConsumeMessage | null) => {
        if (!msg) {
          console.warn(`[AmqpTransport] Consumer for ${binding.queue} was cancelled by the broker`);
          return;
        }
        listener({
          body: msg.content,
          headers: toHeaders(msg.properties.headers),
          routingKey: msg.fields.routingKey,
          redelivered: msg.fields.redelivered,
          ack: () => channel.ack(msg)
        });
      },
      { noAck: false }
    );
    // Setup failures above reject consume(); only a live consumer is watched
    this.watchChannel(connection, channel, `consumer channel for ${binding.queue}`);
  }

  private requirePublishChannel(): ConfirmChannel {
    if (!this.publishChannel) {
      throw new Error('Not connected to RabbitMQ');
    }
    return this.publishChannel;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function messageOptions(headers: MessageHeaders): Options.Publish {
  return {
    persistent: true,
    contentType: 'application/json',
    headers
  };
}

function toHeaders(raw: unknown): MessageHeaders {
  const headers: MessageHeaders = {};
  if (raw && typeof raw === 'object') {
    for (const [key, value] of Object.entries(raw)) {
      if (typeof value === 'string' || typeof value === 'number') {
        headers[key] = value;
      }
    }
  }
  return headers;
}

function logChannelErrors(channel: Channel, label: string): void {
  channel.on('error', (error: Error) => {
    console.error(`[AmqpTransport] ${label} error:`, error.message);
  });
}

function toError(err: unknown, message: string): Error {
  return err instanceof Error ? err : new Error(message, { cause: err });
}
