/**
 * Wires the service's components together. Everything is built here and
 * passed down through constructors; nothing is a module-level singleton.
 */

import { EventBus } from './bus/EventBus';
import type { BrokerTransport } from './bus/transport';
import type { RetryOptions } from './bus/retry';
import { ConfigManager } from './config/config';
import type { EnvironmentConfig } from './config/config';
import { MatchingEngine } from './matchers/MatchingEngine';
import type { DriverMatcher } from './matchers/MatchingEngine';
import { TripOrchestrator } from './orchestrator/TripOrchestrator';
import { InMemoryRepository } from './persistence/InMemoryRepository';
import type { TripRepository } from './persistence/TripRepository';
import { DriverEventsConsumer } from './services/DriverEventsConsumer';
import { AvailabilityTracker } from './state/AvailabilityTracker';
import { Counters } from './utils/counters';

export interface RuntimeOptions {
  transport: BrokerTransport;
  env: EnvironmentConfig;
  repository?: TripRepository;
  configManager?: ConfigManager;
  /** Replaces the matching engine (tests) */
  matcher?: DriverMatcher;
  clock?: () => Date;
  retry?: RetryOptions;
}

export interface Runtime {
  readonly env: EnvironmentConfig;
  readonly counters: Counters;
  readonly bus: EventBus;
  readonly repository: TripRepository;
  readonly tracker: AvailabilityTracker;
  readonly configManager: ConfigManager;
  readonly orchestrator: TripOrchestrator;
  readonly driverEvents: DriverEventsConsumer;
  readonly startedAt: Date;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createRuntime(options: RuntimeOptions): Runtime {
  const { env, transport } = options;
  const clock = options.clock ?? (() => new Date());
  const counters = new Counters();

  const bus = new EventBus(
    transport,
    {
      serviceName: env.serviceName,
      publishTimeoutMs: env.bus.publishTimeoutMs,
      handlerDeadlineMs: env.bus.handlerDeadlineMs,
      maxDeliveryAttempts: env.bus.maxDeliveryAttempts,
      requeueBaseDelayMs: env.bus.requeueBaseDelayMs,
      reconnectInitialDelayMs: env.bus.reconnectInitialDelayMs,
      reconnectMaxDelayMs: env.bus.reconnectMaxDelayMs,
      now: clock
    },
    counters
  );

  const repository = options.repository ?? new InMemoryRepository();
  const tracker = new AvailabilityTracker(repository, clock);
  const configManager = options.configManager ?? new ConfigManager();
  const matcher = options.matcher ?? new MatchingEngine(() => configManager.getDefaultConfig());

  const orchestrator = new TripOrchestrator({
    bus,
    repository,
    tracker,
    matcher,
    counters,
    clock,
    retry: options.retry
  });
  const driverEvents = new DriverEventsConsumer(bus, tracker, counters);

  return {
    env,
    counters,
    bus,
    repository,
    tracker,
    configManager,
    orchestrator,
    driverEvents,
    startedAt: clock(),

    async start() {
      await bus.connect();
      await tracker.hydrate();
      await orchestrator.start();
      await driverEvents.start();
    },

    async stop() {
      await bus.close();
    }
  };
}
