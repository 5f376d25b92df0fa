/**
 * Availability Tracker
 * Owns driver status, location and active trip
 *
 * Status changes:
 *   offline   → available  markAvailable (location known)
 *   available → on_trip    assign (check-and-set)
 *   on_trip   → available  release (only for the active trip)
 *   available → offline    markUnavailable
 *
 * The in-memory map is the source of truth while the process runs; every
 * change is written through to the repository. Checks and updates happen
 * before the first await, so two handlers can never both take one driver.
 */

import { DriverStatus, MAX_DRIVER_RATING } from '../models/types';
import type { Coordinates, Driver, DriverCandidate, DriverProfile } from '../models/types';
import type { TripRepository } from '../persistence/TripRepository';
import {
  DriverBusyError,
  DriverNoLongerAvailableError,
  DriverNotFoundError
} from '../errors';

export type ProfileUpdate = Partial<Omit<DriverProfile, 'id'>>;

export class AvailabilityTracker {
  private drivers: Map<string, Driver> = new Map();

  constructor(
    private readonly repository: TripRepository,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Load drivers saved by a previous run.
   */
  async hydrate(): Promise<number> {
    const stored = await this.repository.listDrivers();
    for (const driver of stored) {
      this.drivers.set(driver.id, driver);
    }
    console.log(`[AvailabilityTracker] Loaded ${stored.length} driver(s)`);
    return stored.length;
  }

  // ===========================================================================
  // QUERIES
  // ===========================================================================

  get(driverId: string): Driver | undefined {
    const driver = this.drivers.get(driverId);
    return driver ? structuredClone(driver) : undefined;
  }

  list(): Driver[] {
    return [...this.drivers.values()]
      .sort((a, b) => a.id.localeCompare(b.id))
      .map(driver => structuredClone(driver));
  }

  /**
   * Read-only view for the matching engine. Drivers that never reported
   * a location cannot be ranked and are left out.
   */
  snapshot(): DriverCandidate[] {
    const candidates: DriverCandidate[] = [];
    for (const driver of this.drivers.values()) {
      if (!driver.location) continue;
      candidates.push({
        id: driver.id,
        location: { ...driver.location },
        available: driver.status === DriverStatus.AVAILABLE && driver.activeTripId === null,
        rating: driver.rating,
        idleSince: driver.idleSince ?? driver.updatedAt
      });
    }
    return candidates;
  }

  // ===========================================================================
  // UPDATES
  // ===========================================================================

  /**
   * Add a driver, or update name and rating of a known one.
   * New drivers start offline.
   */
  async register(profile: DriverProfile): Promise<Driver> {
    const now = this.now();
    const existing = this.drivers.get(profile.id);

    const driver: Driver = existing
      ? { ...existing, name: profile.name, rating: profile.rating, updatedAt: now }
      : {
          ...profile,
          location: null,
          status: DriverStatus.OFFLINE,
          activeTripId: null,
          idleSince: null,
          updatedAt: now
        };

    return this.commit(driver);
  }

  /**
   * A driver reports in as ready for work at a location. Unknown drivers
   * are registered on the spot.
   *
   * @throws DriverBusyError if the driver has an active trip
   */
  async markAvailable(driverId: string, location: Coordinates, profile: ProfileUpdate = {}): Promise<Driver> {
    const now = this.now();
    const existing = this.drivers.get(driverId);

    if (existing?.activeTripId) {
      throw new DriverBusyError(driverId, existing.activeTripId);
    }

    const base: Driver = existing ?? {
      id: driverId,
      name: profile.name ?? driverId,
      rating: profile.rating ?? MAX_DRIVER_RATING,
      location: null,
      status: DriverStatus.OFFLINE,
      activeTripId: null,
      idleSince: null,
      updatedAt: now
    };

    const wasAvailable = base.status === DriverStatus.AVAILABLE;
    return this.commit({
      ...base,
      name: profile.name ?? base.name,
      rating: profile.rating ?? base.rating,
      location: { ...location },
      status: DriverStatus.AVAILABLE,
      // A location update keeps the driver's place in the idle queue
      idleSince: wasAvailable && base.idleSince ? base.idleSince : now,
      updatedAt: now
    });
  }

  /**
   * @throws DriverNotFoundError for unknown drivers
   * @throws DriverBusyError if the driver has an active trip
   */
  async markUnavailable(driverId: string): Promise<Driver> {
    const existing = this.require(driverId);
    if (existing.activeTripId) {
      throw new DriverBusyError(driverId, existing.activeTripId);
    }

    return this.commit({
      ...existing,
      status: DriverStatus.OFFLINE,
      idleSince: null,
      updatedAt: this.now()
    });
  }

  /**
   * Commit a driver to a trip. Succeeds only if the driver is available
   * with no active trip at the moment of the call.
   *
   * @throws DriverNoLongerAvailableError
   */
  async assign(driverId: string, tripId: string): Promise<Driver> {
    const existing = this.drivers.get(driverId);
    if (!existing || existing.status !== DriverStatus.AVAILABLE || existing.activeTripId !== null) {
      throw new DriverNoLongerAvailableError(driverId);
    }

    return this.commit({
      ...existing,
      status: DriverStatus.ON_TRIP,
      activeTripId: tripId,
      idleSince: null,
      updatedAt: this.now()
    });
  }

  /**
   * Free a driver from a trip. Ignored unless `tripId` is the driver's
   * active trip, so a late or repeated release cannot free a driver that
   * has since been given another trip.
   *
   * @returns whether the driver was released
   */
  async release(driverId: string, tripId: string, location?: Coordinates): Promise<boolean> {
    const existing = this.drivers.get(driverId);
    if (!existing || existing.activeTripId !== tripId) {
      console.warn(
        `[AvailabilityTracker] Ignoring release of ${driverId} from ${tripId}: ` +
        `active trip is ${existing?.activeTripId ?? 'none'}`
      );
      return false;
    }

    const now = this.now();
    await this.commit({
      ...existing,
      location: location ? { ...location } : existing.location,
      status: DriverStatus.AVAILABLE,
      activeTripId: null,
      idleSince: now,
      updatedAt: now
    });
    return true;
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private require(driverId: string): Driver {
    const driver = this.drivers.get(driverId);
    if (!driver) {
      throw new DriverNotFoundError(driverId);
    }
    return driver;
  }

  private async commit(driver: Driver): Promise<Driver> {
    this.drivers.set(driver.id, driver);
    await this.repository.saveDriver(driver);
    return structuredClone(driver);
  }

  private now(): string {
    return this.clock().toISOString();
  }
}
