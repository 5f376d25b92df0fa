/**
 * In-process broker.
 *
 * Behaves like a single RabbitMQ node with one topic exchange: durable
 * queues survive a disconnect, unacknowledged messages are redelivered after
 * reconnecting, publishes resolve once "confirmed". Used by the test suite
 * and when the service runs without RABBITMQ_URL.
 *
 * Failure knobs for tests:
 * - failNextConnects(n): the next n connect() calls reject
 * - holdConfirms: publishes are routed but never confirmed until released
 * - simulateDisconnect(): drop the connection as if the broker went away
 */

import type {
  BrokerTransport,
  MessageHeaders,
  MessageListener,
  QueueBinding,
  TransportMessage
} from './transport';

interface StoredMessage {
  body: Buffer;
  headers: MessageHeaders;
  routingKey: string;
  redelivered: boolean;
}

interface QueueState {
  binding: QueueBinding;
  ready: StoredMessage[];
  unacked: Set<StoredMessage>;
  listener: MessageListener | null;
}

interface PendingConfirm {
  resolve: () => void;
  reject: (error: Error) => void;
}

export interface DeadLetterRecord {
  queue: string;
  routingKey: string;
  body: Buffer;
  headers: MessageHeaders;
}

export class InMemoryTransport implements BrokerTransport {
  readonly deadLetters: DeadLetterRecord[] = [];

  /** When true, publishes wait for releaseConfirms() */
  holdConfirms = false;

  private queues: Map<string, QueueState> = new Map();
  private connected = false;
  /** Bumped on every disconnect; acks from an older connection fail */
  private generation = 0;
  private connectFailuresLeft = 0;
  private connectAttempts = 0;
  private pendingConfirms: PendingConfirm[] = [];
  private disconnectListeners: Array<(error: Error) => void> = [];

  // ===========================================================================
  // CONNECTION
  // ===========================================================================

  async connect(): Promise<void> {
    this.connectAttempts++;
    if (this.connectFailuresLeft > 0) {
      this.connectFailuresLeft--;
      throw new Error('connect ECONNREFUSED (in-memory broker unavailable)');
    }
    this.connected = true;
  }

  async close(): Promise<void> {
    this.dropConnection(new Error('Connection closed'));
  }

  onDisconnect(listener: (error: Error) => void): void {
    this.disconnectListeners.push(listener);
  }

  get totalConnectAttempts(): number {
    return this.connectAttempts;
  }

  failNextConnects(count: number): void {
    this.connectFailuresLeft = count;
  }

  /**
   * Drop the connection as if the broker went away.
   * Disconnect listeners are notified; close() does not notify them.
   */
  simulateDisconnect(error: Error = new Error('Connection reset by broker')): void {
    this.dropConnection(error);
    for (const listener of this.disconnectListeners) {
      listener(error);
    }
  }

  // ===========================================================================
  // PUBLISHING
  // ===========================================================================

  async publish(routingKey: string, body: Buffer, headers: MessageHeaders): Promise<void> {
    this.assertConnected();

    for (const queue of this.queues.values()) {
      if (matchesRoutingKey(queue.binding.routingKey, routingKey)) {
        this.enqueue(queue, { body, headers: { ...headers }, routingKey, redelivered: false });
      }
    }

    await this.confirm();
  }

  async sendToQueue(queueName: string, body: Buffer, headers: MessageHeaders): Promise<void> {
    this.assertConnected();

    const queue = this.queues.get(queueName);
    if (!queue) {
      throw new Error(`Queue ${queueName} does not exist`);
    }
    this.enqueue(queue, { body, headers: { ...headers }, routingKey: queue.binding.routingKey, redelivered: false });

    await this.confirm();
  }

  async deadLetter(binding: QueueBinding, body: Buffer, headers: MessageHeaders): Promise<void> {
    this.assertConnected();
    this.deadLetters.push({
      queue: binding.queue,
      routingKey: binding.routingKey,
      body,
      headers: { ...headers }
    });
    await this.confirm();
  }

  /**
   * Confirm every publish held back by holdConfirms.
   */
  releaseConfirms(): void {
    const pending = this.pendingConfirms;
    this.pendingConfirms = [];
    for (const confirm of pending) {
      confirm.resolve();
    }
  }

  // ===========================================================================
  // CONSUMING
  // ===========================================================================

  async consume(binding: QueueBinding, listener: MessageListener): Promise<void> {
    this.assertConnected();

    let queue = this.queues.get(binding.queue);
    if (!queue) {
      queue = { binding, ready: [], unacked: new Set(), listener: null };
      this.queues.set(binding.queue, queue);
    }
    queue.listener = listener;
    this.scheduleDispatch(queue);
  }

  /**
   * Messages waiting in a queue plus those delivered but not yet acked.
   */
  queueDepth(queueName: string): number {
    const queue = this.queues.get(queueName);
    return queue ? queue.ready.length + queue.unacked.size : 0;
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private enqueue(queue: QueueState, message: StoredMessage): void {
    queue.ready.push(message);
    this.scheduleDispatch(queue);
  }

  private scheduleDispatch(queue: QueueState): void {
    setImmediate(() => this.dispatch(queue));
  }

  private dispatch(queue: QueueState): void {
    while (this.connected && queue.listener && queue.ready.length > 0) {
      const stored = queue.ready.shift();
      if (!stored) break;

      queue.unacked.add(stored);
      const generation = this.generation;
      const message: TransportMessage = {
        body: stored.body,
        headers: stored.headers,
        routingKey: stored.routingKey,
        redelivered: stored.redelivered,
        ack: () => {
          if (generation !== this.generation) {
            throw new Error('Channel closed: delivery belongs to a previous connection');
          }
          queue.unacked.delete(stored);
        }
      };
      queue.listener(message);
    }
  }

  private async confirm(): Promise<void> {
    if (!this.holdConfirms) return;
    await new Promise<void>((resolve, reject) => {
      this.pendingConfirms.push({ resolve, reject });
    });
  }

  private dropConnection(error: Error): void {
    this.connected = false;
    this.generation++;

    for (const queue of this.queues.values()) {
      queue.listener = null;
      // Unacked messages go back to the head of the queue for redelivery
      for (const stored of queue.unacked) {
        stored.redelivered = true;
      }
      queue.ready.unshift(...queue.unacked);
      queue.unacked.clear();
    }

    const pending = this.pendingConfirms;
    this.pendingConfirms = [];
    for (const confirm of pending) {
      confirm.reject(error);
    }
  }

  private assertConnected(): void {
    if (!this.connected) {
      throw new Error('Channel closed: not connected to broker');
    }
  }
}

function matchesRoutingKey(pattern: string, routingKey: string): boolean {
  return pattern === '#' || pattern === routingKey;
}
