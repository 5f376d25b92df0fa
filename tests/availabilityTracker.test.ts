import { describe, it, expect, beforeEach } from 'vitest';
import { AvailabilityTracker } from '../src/state/AvailabilityTracker';
import { InMemoryRepository } from '../src/persistence/InMemoryRepository';
import { DriverStatus } from '../src/models/types';
import {
  DriverBusyError,
  DriverNoLongerAvailableError,
  DriverNotFoundError
} from '../src/errors';
import { near } from './helpers';

describe('AvailabilityTracker', () => {
  let repository: InMemoryRepository;
  let tracker: AvailabilityTracker;
  let now: Date;

  const advance = (ms: number) => {
    now = new Date(now.getTime() + ms);
  };

  beforeEach(() => {
    now = new Date('2024-05-01T12:00:00.000Z');
    repository = new InMemoryRepository();
    tracker = new AvailabilityTracker(repository, () => now);
  });

  // ===========================================================================
  // REGISTRATION & STATUS
  // ===========================================================================

  describe('Registration and status', () => {
    it('should register a driver as offline and persist it', async () => {
      const driver = await tracker.register({ id: 'D1', name: 'Dana', rating: 4.8 });

      expect(driver).toEqual({
        id: 'D1',
        name: 'Dana',
        rating: 4.8,
        location: null,
        status: DriverStatus.OFFLINE,
        activeTripId: null,
        idleSince: null,
        updatedAt: '2024-05-01T12:00:00.000Z'
      });
      expect(await repository.loadDriver('D1')).toEqual(driver);
    });

    it('should mark a driver available and start their idle time', async () => {
      await tracker.register({ id: 'D1', name: 'Dana', rating: 4.8 });
      advance(60_000);

      const driver = await tracker.markAvailable('D1', near(0.01));

      expect(driver.status).toBe(DriverStatus.AVAILABLE);
      expect(driver.location).toEqual(near(0.01));
      expect(driver.idleSince).toBe('2024-05-01T12:01:00.000Z');
    });

    it('should keep idle time across location updates', async () => {
      await tracker.markAvailable('D1', near(0.01));
      advance(30_000);

      const driver = await tracker.markAvailable('D1', near(0.02));

      expect(driver.location).toEqual(near(0.02));
      expect(driver.idleSince).toBe('2024-05-01T12:00:00.000Z');
      expect(driver.updatedAt).toBe('2024-05-01T12:00:30.000Z');
    });

    it('should register unknown drivers that report in', async () => {
      const driver = await tracker.markAvailable('D7', near(0.01), { rating: 4.1 });

      expect(driver.name).toBe('D7');
      expect(driver.rating).toBe(4.1);
      expect(driver.status).toBe(DriverStatus.AVAILABLE);
    });

    it('should take a driver offline', async () => {
      await tracker.markAvailable('D1', near(0.01));

      const driver = await tracker.markUnavailable('D1');

      expect(driver.status).toBe(DriverStatus.OFFLINE);
      expect(driver.idleSince).toBeNull();
      expect(tracker.snapshot()[0].available).toBe(false);
    });

    it('should fail to take an unknown driver offline', async () => {
      await expect(tracker.markUnavailable('ghost')).rejects.toBeInstanceOf(DriverNotFoundError);
    });

    it('should load drivers saved earlier', async () => {
      await tracker.markAvailable('D1', near(0.01));
      const restarted = new AvailabilityTracker(repository, () => now);

      expect(await restarted.hydrate()).toBe(1);
      expect(restarted.get('D1')?.status).toBe(DriverStatus.AVAILABLE);
    });
  });

  // ===========================================================================
  // ASSIGNMENT
  // ===========================================================================

  describe('Assignment', () => {
    beforeEach(async () => {
      await tracker.markAvailable('D1', near(0.01));
    });

    it('should put an available driver on the trip', async () => {
      const driver = await tracker.assign('D1', 'T1');

      expect(driver.status).toBe(DriverStatus.ON_TRIP);
      expect(driver.activeTripId).toBe('T1');
      expect((await repository.loadDriver('D1'))?.activeTripId).toBe('T1');
    });

    it('should let only one of two concurrent assignments win', async () => {
      const results = await Promise.allSettled([
        tracker.assign('D1', 'T1'),
        tracker.assign('D1', 'T2')
      ]);

      expect(results.map(r => r.status)).toEqual(['fulfilled', 'rejected']);
      expect(tracker.get('D1')?.activeTripId).toBe('T1');
    });

    it('should refuse offline and unknown drivers', async () => {
      await tracker.register({ id: 'D2', name: 'Eli', rating: 4 });

      await expect(tracker.assign('D2', 'T1')).rejects.toBeInstanceOf(DriverNoLongerAvailableError);
      await expect(tracker.assign('ghost', 'T1')).rejects.toBeInstanceOf(DriverNoLongerAvailableError);
    });

    it('should not let a driver on a trip go available or offline', async () => {
      await tracker.assign('D1', 'T1');

      await expect(tracker.markAvailable('D1', near(0.02))).rejects.toBeInstanceOf(DriverBusyError);
      await expect(tracker.markUnavailable('D1')).rejects.toBeInstanceOf(DriverBusyError);
      expect(tracker.get('D1')?.status).toBe(DriverStatus.ON_TRIP);
    });

    it('should show drivers on a trip as unavailable in the snapshot', async () => {
      await tracker.markAvailable('D2', near(0.02));
      await tracker.register({ id: 'D3', name: 'No Location', rating: 5 });
      await tracker.assign('D1', 'T1');

      const snapshot = tracker.snapshot();

      expect(snapshot.map(c => [c.id, c.available])).toEqual([
        ['D1', false],
        ['D2', true]
      ]);
    });
  });

  // ===========================================================================
  // RELEASE
  // ===========================================================================

  describe('Release', () => {
    beforeEach(async () => {
      await tracker.markAvailable('D1', near(0.01));
      await tracker.assign('D1', 'T1');
    });

    it('should make the driver available at the drop-off point', async () => {
      advance(600_000);

      expect(await tracker.release('D1', 'T1', near(0.2))).toBe(true);

      const driver = tracker.get('D1');
      expect(driver?.status).toBe(DriverStatus.AVAILABLE);
      expect(driver?.activeTripId).toBeNull();
      expect(driver?.location).toEqual(near(0.2));
      expect(driver?.idleSince).toBe('2024-05-01T12:10:00.000Z');
    });

    it('should ignore a release for a different trip', async () => {
      expect(await tracker.release('D1', 'T9')).toBe(false);

      expect(tracker.get('D1')?.activeTripId).toBe('T1');
    });

    it('should ignore a repeated release', async () => {
      await tracker.release('D1', 'T1');
      await tracker.assign('D1', 'T2');

      expect(await tracker.release('D1', 'T1')).toBe(false);
      expect(tracker.get('D1')?.activeTripId).toBe('T2');
    });
  });
});
