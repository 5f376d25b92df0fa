import type { Driver, Trip } from '../models/types';
import type { TripRepository } from './TripRepository';

/**
 * Map-backed repository. Used in tests and for local runs; records are
 * cloned on the way in and out.
 */
export class InMemoryRepository implements TripRepository {
  private trips: Map<string, Trip> = new Map();
  private drivers: Map<string, Driver> = new Map();

  async saveTrip(trip: Trip): Promise<void> {
    this.trips.set(trip.id, structuredClone(trip));
  }

  async loadTrip(tripId: string): Promise<Trip | null> {
    const trip = this.trips.get(tripId);
    return trip ? structuredClone(trip) : null;
  }

  async listTrips(): Promise<Trip[]> {
    return [...this.trips.values()]
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map(trip => structuredClone(trip));
  }

  async saveDriver(driver: Driver): Promise<void> {
    this.drivers.set(driver.id, structuredClone(driver));
  }

  async loadDriver(driverId: string): Promise<Driver | null> {
    const driver = this.drivers.get(driverId);
    return driver ? structuredClone(driver) : null;
  }

  async listDrivers(): Promise<Driver[]> {
    return [...this.drivers.values()].map(driver => structuredClone(driver));
  }
}
