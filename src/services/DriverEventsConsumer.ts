/**
 * Feeds driver.available / driver.offline from the driver service into
 * the availability tracker.
 *
 * A busy driver reporting in, or an unknown driver going offline, is a
 * stale report: logged, counted and acked. Anything else propagates so the
 * bus requeues the delivery.
 */

import type { EventBus } from '../bus/EventBus';
import type { EventEnvelope } from '../events/envelope';
import type { AvailabilityTracker } from '../state/AvailabilityTracker';
import { DriverBusyError, DriverNotFoundError } from '../errors';
import { Counters } from '../utils/counters';

export class DriverEventsConsumer {
  constructor(
    private readonly bus: EventBus,
    private readonly tracker: AvailabilityTracker,
    private readonly counters: Counters = new Counters()
  ) {}

  async start(): Promise<void> {
    const options = { consumer: 'availability' };
    await this.bus.subscribe('driver.available', envelope => this.onAvailable(envelope), options);
    await this.bus.subscribe('driver.offline', envelope => this.onOffline(envelope), options);
  }

  async onAvailable(envelope: EventEnvelope<'driver.available'>): Promise<void> {
    const { driverId, location, name, rating } = envelope.payload;
    try {
      await this.tracker.markAvailable(driverId, location, { name, rating });
    } catch (error) {
      if (!(error instanceof DriverBusyError)) throw error;
      this.counters.increment('drivers.stale_reports');
      console.warn(`[DriverEvents] Ignoring driver.available: ${error.message}`);
    }
  }

  async onOffline(envelope: EventEnvelope<'driver.offline'>): Promise<void> {
    const { driverId } = envelope.payload;
    try {
      await this.tracker.markUnavailable(driverId);
    } catch (error) {
      if (!(error instanceof DriverBusyError) && !(error instanceof DriverNotFoundError)) throw error;
      this.counters.increment('drivers.stale_reports');
      console.warn(`[DriverEvents] Ignoring driver.offline: ${error.message}`);
    }
  }
}
