import type { Driver, Trip } from '../models/types';

/**
 * Storage collaborator for trips and drivers.
 *
 * Loads return null for unknown ids. Implementations must hand out copies:
 * mutating a loaded record never changes what is stored until it is saved.
 */
export interface TripRepository {
  saveTrip(trip: Trip): Promise<void>;
  loadTrip(tripId: string): Promise<Trip | null>;
  listTrips(): Promise<Trip[]>;

  saveDriver(driver: Driver): Promise<void>;
  loadDriver(driverId: string): Promise<Driver | null>;
  listDrivers(): Promise<Driver[]>;
}
