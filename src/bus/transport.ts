/**
 * Broker Transport
 *
 * The narrow surface the EventBus needs from a message broker. Two
 * implementations are provided:
 * 1. AmqpTransport - RabbitMQ through amqplib
 * 2. InMemoryTransport - in-process broker for tests and local runs
 *
 * The transport moves bytes; envelopes, validation, retries and dead-letter
 * policy live in the EventBus.
 */

export type MessageHeaders = Record<string, string | number>;

/**
 * A queue bound to one routing key on the event exchange.
 */
export interface QueueBinding {
  queue: string;
  routingKey: string;
}

/**
 * One delivery from the broker. The message stays with the broker until
 * ack() is called; an unacknowledged message is redelivered after a
 * reconnect.
 */
export interface TransportMessage {
  readonly body: Buffer;
  readonly headers: MessageHeaders;
  readonly routingKey: string;
  /** The broker handed this message out before and it was never acked */
  readonly redelivered: boolean;
  ack(): void;
}

export type MessageListener = (message: TransportMessage) => void;

export interface BrokerTransport {
  /** Open the connection and declare the exchanges */
  connect(): Promise<void>;

  close(): Promise<void>;

  /**
   * Publish a persistent message to the event exchange.
   * Resolves once the broker has confirmed it.
   */
  publish(routingKey: string, body: Buffer, headers: MessageHeaders): Promise<void>;

  /**
   * Put a message straight onto one queue (used for requeues).
   * Resolves once the broker has confirmed it.
   */
  sendToQueue(queue: string, body: Buffer, headers: MessageHeaders): Promise<void>;

  /**
   * Route a message to the dead-letter destination.
   * Resolves once the broker has confirmed it.
   */
  deadLetter(binding: QueueBinding, body: Buffer, headers: MessageHeaders): Promise<void>;

  /**
   * Declare a durable queue, bind it and start consuming.
   * Must be called again for every binding after a reconnect.
   */
  consume(binding: QueueBinding, listener: MessageListener): Promise<void>;

  /**
   * Register a callback for unexpected connection loss.
   * Not called for close().
   */
  onDisconnect(listener: (error: Error) => void): void;
}

export const HEADER_ATTEMPT = 'x-delivery-attempt';
export const HEADER_ERROR = 'x-last-error';
export const HEADER_ORIGIN_QUEUE = 'x-origin-queue';

/**
 * Read the delivery attempt number from message headers (first delivery = 1).
 */
export function readAttempt(headers: MessageHeaders): number {
  const value = headers[HEADER_ATTEMPT];
  const attempt = typeof value === 'number' ? value : parseInt(value ?? '1', 10);
  return Number.isFinite(attempt) && attempt >= 1 ? attempt : 1;
}
