/**
 * EventBus - at-least-once, schema-validated publish/subscribe
 *
 * Wraps a BrokerTransport with the delivery policy every service shares:
 *
 * PUBLISH
 *   validate payload → build frozen envelope → publish persistent message →
 *   wait for broker confirmation (bounded by publishTimeoutMs).
 *   Fails with PublishError { SchemaInvalid | Timeout | ConnectionLost }.
 *   A publish in flight when the connection drops fails with ConnectionLost;
 *   the bus never resends on its own.
 *
 * SUBSCRIBE
 *   One durable queue per (service, consumer, event name). Deliveries of one
 *   subscription reach the handler one at a time, in delivery order.
 *   - handler resolves                → ack
 *   - handler throws / misses deadline → attempt 1: requeued once after
 *                                        exponential backoff; attempt 2:
 *                                        dead-lettered
 *   - malformed envelope / payload     → dead-lettered, never handed over
 *   A handler that misses its deadline still holds the subscription until it
 *   settles. A broker redelivery (the message was handed out before and
 *   never acked) counts as one more attempt.
 *
 * CONNECTION
 *   On unexpected loss the bus reconnects with exponential backoff
 *   (initial delay doubling up to the cap) and re-binds every subscription.
 *   Requeues still waiting on their backoff are dropped; the broker hands
 *   those messages out again as redeliveries.
 */

import { encodeEnvelope, createEnvelope, decodeEnvelope } from '../events/envelope';
import type { EventEnvelope } from '../events/envelope';
import type { EventName, EventPayload } from '../events/schemas';
import { HandlerTimeoutError, PublishError, SchemaError } from '../errors';
import { Counters } from '../utils/counters';
import { KeyedSerializer } from '../utils/KeyedSerializer';
import {
  HEADER_ATTEMPT,
  HEADER_ERROR,
  readAttempt
} from './transport';
import type {
  BrokerTransport,
  MessageHeaders,
  QueueBinding,
  TransportMessage
} from './transport';

// =============================================================================
// TYPES
// =============================================================================

export interface EventBusOptions {
  /** Stamped as `source` on every envelope and used in queue names */
  serviceName: string;
  publishTimeoutMs: number;
  handlerDeadlineMs: number;
  maxDeliveryAttempts: number;
  requeueBaseDelayMs: number;
  reconnectInitialDelayMs: number;
  reconnectMaxDelayMs: number;
  now?: () => Date;
}

export type ConnectionState = 'idle' | 'connected' | 'reconnecting' | 'closed';

export interface PublishAck {
  eventId: string;
  eventName: EventName;
  correlationId: string;
  confirmedAt: string;
}

export type EventHandler<N extends EventName> = (envelope: EventEnvelope<N>) => Promise<void>;

export interface SubscribeOptions {
  /** Distinguishes several subscribers to the same event within one service */
  consumer?: string;
}

export interface Subscription {
  readonly eventName: EventName;
  readonly queue: string;
}

interface ActiveSubscription extends Subscription {
  binding: QueueBinding;
  deliver(message: TransportMessage): Promise<void>;
}

interface InFlightPublish {
  fail(error: PublishError): void;
}

// =============================================================================
// EVENT BUS
// =============================================================================

export class EventBus {
  private state: ConnectionState = 'idle';
  private subscriptions: Map<string, ActiveSubscription> = new Map();
  private inFlight: Set<InFlightPublish> = new Set();
  private timers: Set<NodeJS.Timeout> = new Set();
  private requeueTimers: Set<NodeJS.Timeout> = new Set();
  private wakeups: Set<() => void> = new Set();
  private deliveryQueue = new KeyedSerializer();
  private reconnecting: Promise<void> | null = null;
  private readonly now: () => Date;

  constructor(
    private readonly transport: BrokerTransport,
    private readonly options: EventBusOptions,
    private readonly counters: Counters = new Counters()
  ) {
    this.now = options.now ?? (() => new Date());
    this.transport.onDisconnect(error => this.handleDisconnect(error));
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  get serviceName(): string {
    return this.options.serviceName;
  }

  listSubscriptions(): Subscription[] {
    return [...this.subscriptions.values()].map(({ eventName, queue }) => ({ eventName, queue }));
  }

  // ===========================================================================
  // CONNECTION LIFECYCLE
  // ===========================================================================

  async connect(): Promise<void> {
    if (this.state === 'connected') return;
    await this.transport.connect();
    this.state = 'connected';
    console.log(`[EventBus] ${this.options.serviceName} connected`);
  }

  /**
   * Stop consuming and drop pending requeue timers. Messages whose requeue
   * had not been sent yet are still unacknowledged, so the broker keeps them.
   */
  async close(): Promise<void> {
    this.state = 'closed';
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.cancelRequeues();
    for (const wake of [...this.wakeups]) {
      wake();
    }
    this.failInFlight('connection closed');
    await this.transport.close();
    console.log(`[EventBus] ${this.options.serviceName} closed`);
  }

  private handleDisconnect(error: Error): void {
    if (this.state === 'closed') return;

    console.warn(`[EventBus] Connection lost: ${error.message}`);
    this.state = 'reconnecting';
    this.failInFlight(error.message);
    this.cancelRequeues();

    if (!this.reconnecting) {
      this.reconnecting = this.reconnectLoop().finally(() => {
        this.reconnecting = null;
      });
    }
  }

  private async reconnectLoop(): Promise<void> {
    let attempt = 0;

    while (this.state === 'reconnecting') {
      const delay = Math.min(
        this.options.reconnectInitialDelayMs * 2 ** attempt,
        this.options.reconnectMaxDelayMs
      );
      attempt++;
      await this.sleep(delay);
      if (this.state !== 'reconnecting') return;

      try {
        await this.transport.connect();
        for (const subscription of this.subscriptions.values()) {
          await this.bind(subscription);
        }
        this.state = 'connected';
        this.counters.increment('bus.reconnects');
        console.log(`[EventBus] Reconnected after ${attempt} attempt(s)`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[EventBus] Reconnect attempt ${attempt} failed: ${message}`);
      }
    }
  }

  /**
   * Resolves once the reconnect loop (if any) has finished.
   */
  async whenReconnected(): Promise<void> {
    if (this.reconnecting) {
      await this.reconnecting;
    }
  }

  private cancelRequeues(): void {
    for (const timer of this.requeueTimers) {
      clearTimeout(timer);
    }
    this.requeueTimers.clear();
  }

  private failInFlight(reason: string): void {
    const pending = [...this.inFlight];
    this.inFlight.clear();
    for (const publish of pending) {
      publish.fail(new PublishError('ConnectionLost', 'unknown', `Connection lost before confirmation: ${reason}`));
    }
  }

  // ===========================================================================
  // PUBLISH
  // ===========================================================================

  /**
   * Publish an event and wait for the broker to confirm it.
   *
   * @throws PublishError with kind SchemaInvalid, Timeout or ConnectionLost
   */
  async publish<N extends EventName>(
    eventName: N,
    payload: EventPayload<N>,
    correlationId: string
  ): Promise<PublishAck> {
    let envelope: EventEnvelope<N>;
    try {
      envelope = createEnvelope(eventName, payload, {
        correlationId,
        source: this.options.serviceName,
        now: this.now
      });
    } catch (error) {
      this.counters.increment('bus.publish_failed');
      const message = error instanceof Error ? error.message : String(error);
      throw new PublishError('SchemaInvalid', eventName, message, { cause: error });
    }

    if (this.state !== 'connected') {
      this.counters.increment('bus.publish_failed');
      throw new PublishError('ConnectionLost', eventName, `Cannot publish ${eventName}: bus is ${this.state}`);
    }

    const body = encodeEnvelope(envelope);
    await this.awaitConfirmation(eventName, this.transport.publish(eventName, body, { [HEADER_ATTEMPT]: 1 }));

    this.counters.increment('bus.published');
    return {
      eventId: envelope.id,
      eventName,
      correlationId,
      confirmedAt: this.now().toISOString()
    };
  }

  /**
   * Race a transport confirmation against the publish timeout and
   * connection loss.
   */
  private awaitConfirmation(eventName: EventName, confirmation: Promise<void>): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const settle = (error?: PublishError): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.timers.delete(timer);
        this.inFlight.delete(entry);
        if (error) {
          this.counters.increment('bus.publish_failed');
          reject(error);
        } else {
          resolve();
        }
      };

      const entry: InFlightPublish = {
        fail: error => settle(new PublishError(error.kind, eventName, error.message))
      };
      const timer = setTimeout(() => {
        settle(new PublishError(
          'Timeout',
          eventName,
          `Broker did not confirm ${eventName} within ${this.options.publishTimeoutMs}ms`
        ));
      }, this.options.publishTimeoutMs);

      this.timers.add(timer);
      this.inFlight.add(entry);

      confirmation.then(
        () => settle(),
        (error: unknown) => {
          const message = error instanceof Error ? error.message : String(error);
          settle(new PublishError('ConnectionLost', eventName, `Publish of ${eventName} failed: ${message}`, { cause: error }));
        }
      );
    });
  }

  // ===========================================================================
  // SUBSCRIBE
  // ===========================================================================

  /**
   * Register a handler for one event name.
   * The bus must be connected.
   */
  async subscribe<N extends EventName>(
    eventName: N,
    handler: EventHandler<N>,
    options: SubscribeOptions = {}
  ): Promise<Subscription> {
    const consumer = options.consumer ?? 'default';
    const queue = `${this.options.serviceName}.${consumer}.${eventName}`;

    if (this.subscriptions.has(queue)) {
      throw new Error(`Already subscribed to ${eventName} as ${consumer}`);
    }

    const binding: QueueBinding = { queue, routingKey: eventName };
    const subscription: ActiveSubscription = {
      eventName,
      queue,
      binding,
      deliver: message => this.handleDelivery(eventName, binding, handler, message)
    };

    this.subscriptions.set(queue, subscription);
    try {
      await this.bind(subscription);
    } catch (error) {
      this.subscriptions.delete(queue);
      throw error;
    }

    console.log(`[EventBus] Subscribed ${queue}`);
    return { eventName, queue };
  }

  private async bind(subscription: ActiveSubscription): Promise<void> {
    await this.transport.consume(subscription.binding, message => {
      void this.deliveryQueue.run(subscription.queue, () => subscription.deliver(message));
    });
  }

  /**
   * Process one delivery. Never rejects: every outcome ends in an ack,
   * a requeue or a dead letter, and is counted.
   */
  private async handleDelivery<N extends EventName>(
    eventName: N,
    binding: QueueBinding,
    handler: EventHandler<N>,
    message: TransportMessage
  ): Promise<void> {
    const decoded = decodeEnvelope(message.body, eventName);

    if (!decoded.ok) {
      this.counters.increment('bus.schema_rejected');
      console.warn(`[EventBus] Rejected delivery on ${binding.queue}: ${decoded.error.message}`);
      await this.deadLetter(binding, message, decoded.error);
      return;
    }

    const envelope = decoded.value;
    const attempt = readAttempt(message.headers) + (message.redelivered ? 1 : 0);

    if (attempt > this.options.maxDeliveryAttempts) {
      await this.deadLetter(
        binding,
        message,
        new Error(`Redelivered after ${attempt - 1} unfinished attempt(s)`),
        attempt - 1
      );
      return;
    }

    const task = Promise.resolve().then(() => handler(envelope));

    try {
      await this.withDeadline(eventName, task);
      this.counters.increment('bus.delivered');
      this.ack(binding, message);
    } catch (error) {
      this.counters.increment('bus.handler_failed');
      const reason = error instanceof Error ? error : new Error(String(error));
      console.warn(
        `[EventBus] Handler for ${eventName} failed (attempt ${attempt}/${this.options.maxDeliveryAttempts}, ` +
        `event ${envelope.id}): ${reason.message}`
      );

      if (attempt < this.options.maxDeliveryAttempts) {
        this.scheduleRequeue(binding, message, attempt, reason);
      } else {
        await this.deadLetter(binding, message, reason, attempt);
      }
    } finally {
      // Holds the subscription's slot until an overrunning handler is done
      await Promise.allSettled([task]);
    }
  }

  private withDeadline(eventName: EventName, task: Promise<void>): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.timers.delete(timer);
        reject(new HandlerTimeoutError(eventName, this.options.handlerDeadlineMs));
      }, this.options.handlerDeadlineMs);
      this.timers.add(timer);

      task.then(
        () => {
          clearTimeout(timer);
          this.timers.delete(timer);
          resolve();
        },
        (error: unknown) => {
          clearTimeout(timer);
          this.timers.delete(timer);
          reject(error);
        }
      );
    });
  }

  /**
   * Put the message back on its queue after a backoff delay.
   * The delivery is acked only once the copy is confirmed; the
   * subscription keeps processing other deliveries meanwhile.
   */
  private scheduleRequeue(
    binding: QueueBinding,
    message: TransportMessage,
    attempt: number,
    reason: Error
  ): void {
    const delay = this.options.requeueBaseDelayMs * 2 ** (attempt - 1);
    const headers: MessageHeaders = {
      ...message.headers,
      [HEADER_ATTEMPT]: attempt + 1,
      [HEADER_ERROR]: reason.message
    };

    const timer = setTimeout(() => {
      this.requeueTimers.delete(timer);
      this.transport.sendToQueue(binding.queue, message.body, headers).then(
        () => {
          this.counters.increment('bus.requeued');
          this.ack(binding, message);
        },
        (error: unknown) => {
          // Left unacked: the broker redelivers it after reconnecting
          this.counters.increment('bus.requeue_failed');
          const text = error instanceof Error ? error.message : String(error);
          console.error(`[EventBus] Requeue to ${binding.queue} failed: ${text}`);
        }
      );
    }, delay);
    this.requeueTimers.add(timer);
  }

  private async deadLetter(
    binding: QueueBinding,
    message: TransportMessage,
    reason: Error,
    attempts?: number
  ): Promise<void> {
    const headers: MessageHeaders = {
      ...message.headers,
      [HEADER_ERROR]: reason instanceof SchemaError ? `schema: ${reason.message}` : reason.message
    };
    if (attempts !== undefined) {
      headers[HEADER_ATTEMPT] = attempts;
    }

    try {
      await this.transport.deadLetter(binding, message.body, headers);
      this.counters.increment('bus.dead_lettered');
      this.ack(binding, message);
      console.warn(`[EventBus] Dead-lettered message from ${binding.queue}: ${reason.message}`);
    } catch (error) {
      this.counters.increment('bus.dead_letter_failed');
      const text = error instanceof Error ? error.message : String(error);
      console.error(`[EventBus] Dead-lettering from ${binding.queue} failed, leaving it unacked: ${text}`);
    }
  }

  private ack(binding: QueueBinding, message: TransportMessage): void {
    try {
      message.ack();
    } catch (error) {
      this.counters.increment('bus.ack_failed');
      const text = error instanceof Error ? error.message : String(error);
      console.error(`[EventBus] Ack on ${binding.queue} failed: ${text}`);
    }
  }

  /**
   * Backoff wait that close() cuts short.
   */
  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const wake = (): void => {
        clearTimeout(timer);
        this.wakeups.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      this.wakeups.add(wake);
    });
  }
}
