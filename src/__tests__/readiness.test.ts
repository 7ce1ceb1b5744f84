/**
 * Unit tests for the location readiness checker
 * Device and classifier are stubbed; budgets are shortened to keep tests fast.
 */

import { LocationReadinessChecker } from '../location/readiness';
import { shouldGoToLocationAccess, shouldGoToServiceUnavailable, isReady } from '../location/result';
import { AccessLevelClassifier, DeviceLocationProvider, ReadinessTimeouts } from '../location/types';
import {
  AccessLevel,
  AddressedLocation,
  Coordinate,
  LocationReadinessStatus,
  PermissionStatus,
} from '../types/domain';
import { ErrorCode, GeofencingError } from '../errors';

const FIX: Coordinate = { lat: 25.52, lng: 90.22 };

const FAST: ReadinessTimeouts = {
  basicChecksMs: 50,
  coordinateMs: 50,
  addressMs: 20,
  zoneValidationMs: 50,
};

function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}

function createDevice(overrides: Partial<DeviceLocationProvider> = {}) {
  return {
    isLocationServiceEnabled: jest.fn(async (): Promise<boolean> => true),
    checkPermissionStatus: jest.fn(async (): Promise<PermissionStatus> => PermissionStatus.WHILE_IN_USE),
    requestPermission: jest.fn(async (): Promise<PermissionStatus> => PermissionStatus.WHILE_IN_USE),
    getCoordinateOnly: jest.fn(async (): Promise<Coordinate | null> => FIX),
    getCoordinateWithAddress: jest.fn(async (): Promise<AddressedLocation | null> => null),
    ...overrides,
  };
}

function createClassifier(level: AccessLevel = AccessLevel.FULL_ACCESS) {
  return {
    detectAccessLevel: jest.fn(async (): Promise<AccessLevel> => level),
  };
}

function createChecker(device: DeviceLocationProvider, classifier: AccessLevelClassifier) {
  return new LocationReadinessChecker(device, classifier, FAST);
}

describe('LocationReadinessChecker', () => {
  describe('Basic checks', () => {
    it('should need setup without acquiring a fix when GPS is off', async () => {
      const device = createDevice({ isLocationServiceEnabled: jest.fn(async () => false) });
      const classifier = createClassifier();

      const result = await createChecker(device, classifier).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.NEEDS_SETUP);
      expect(result.errorMessage).toBe('GPS is disabled');
      expect(result.isServiceAvailable).toBe(false);
      expect(result.locationData).toBeUndefined();
      expect(device.checkPermissionStatus).not.toHaveBeenCalled();
      expect(device.getCoordinateOnly).not.toHaveBeenCalled();
      expect(device.getCoordinateWithAddress).not.toHaveBeenCalled();
      expect(classifier.detectAccessLevel).not.toHaveBeenCalled();
      expect(shouldGoToLocationAccess(result)).toBe(true);
    });

    it('should need setup when permission is denied', async () => {
      const device = createDevice({ checkPermissionStatus: jest.fn(async () => PermissionStatus.DENIED) });

      const result = await createChecker(device, createClassifier()).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.NEEDS_SETUP);
      expect(result.errorMessage).toBe('Location permission needs user approval');
      expect(device.getCoordinateOnly).not.toHaveBeenCalled();
    });

    it('should need setup when permission is permanently denied', async () => {
      const device = createDevice({
        checkPermissionStatus: jest.fn(async () => PermissionStatus.DENIED_FOREVER),
      });

      const result = await createChecker(device, createClassifier()).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.NEEDS_SETUP);
      expect(result.errorMessage).toBe('Location permission permanently denied');
    });

    it('should proceed with "always" permission', async () => {
      const device = createDevice({ checkPermissionStatus: jest.fn(async () => PermissionStatus.ALWAYS) });

      const result = await createChecker(device, createClassifier()).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.READY);
    });

    it('should need setup when the permission query hangs', async () => {
      const device = createDevice({ checkPermissionStatus: jest.fn(() => never<PermissionStatus>()) });

      const result = await createChecker(device, createClassifier()).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.NEEDS_SETUP);
      expect(result.errorMessage).toBe('GPS check timed out');
      expect(device.getCoordinateOnly).not.toHaveBeenCalled();
    });

    it('should not query permission after the basic checks have timed out', async () => {
      const device = createDevice({
        isLocationServiceEnabled: jest.fn(
          () => new Promise<boolean>((resolve) => setTimeout(() => resolve(true), 80))
        ),
      });

      const result = await createChecker(device, createClassifier()).checkLocationReadiness();
      await new Promise((resolve) => setTimeout(resolve, 120));

      expect(result.status).toBe(LocationReadinessStatus.NEEDS_SETUP);
      expect(result.errorMessage).toBe('GPS check timed out');
      expect(device.checkPermissionStatus).not.toHaveBeenCalled();
    });

    it('should need setup when the service query throws', async () => {
      const device = createDevice({
        isLocationServiceEnabled: jest.fn(async (): Promise<boolean> => {
          throw new Error('platform channel closed');
        }),
      });

      const result = await createChecker(device, createClassifier()).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.NEEDS_SETUP);
      expect(result.errorMessage).toBe('Basic checks failed: platform channel closed');
    });
  });

  describe('Coordinate acquisition', () => {
    it('should time out without location data when no fix arrives', async () => {
      let seenSignal: AbortSignal | undefined;
      const device = createDevice({
        getCoordinateOnly: jest.fn((signal?: AbortSignal) => {
          seenSignal = signal;
          return never<Coordinate | null>();
        }),
      });
      const classifier = createClassifier();

      const result = await createChecker(device, classifier).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.TIMEOUT);
      expect(result.errorMessage).toBe('Location detection timed out');
      expect(result.locationData).toBeUndefined();
      expect(result.isServiceAvailable).toBe(false);
      expect(seenSignal?.aborted).toBe(true);
      expect(device.getCoordinateWithAddress).not.toHaveBeenCalled();
      expect(classifier.detectAccessLevel).not.toHaveBeenCalled();
      expect(shouldGoToLocationAccess(result)).toBe(true);
    });

    it('should time out when the provider returns no fix', async () => {
      const device = createDevice({ getCoordinateOnly: jest.fn(async () => null) });

      const result = await createChecker(device, createClassifier()).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.TIMEOUT);
      expect(result.locationData).toBeUndefined();
    });

    it('should time out when the fix fails', async () => {
      const device = createDevice({
        getCoordinateOnly: jest.fn(async (): Promise<Coordinate | null> => {
          throw new Error('no satellites');
        }),
      });

      const result = await createChecker(device, createClassifier()).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.TIMEOUT);
      expect(result.errorMessage).toBe('Location detection timed out');
    });

    it('should use the resolved address when it arrives in time', async () => {
      const device = createDevice({
        getCoordinateWithAddress: jest.fn(async () => ({ coordinate: FIX, address: 'Main Bazaar Road' })),
      });

      const result = await createChecker(device, createClassifier()).checkLocationReadiness();

      expect(result.locationData).toEqual({ coordinate: FIX, address: 'Main Bazaar Road' });
    });

    it('should fall back to the bare coordinate when the address lookup hangs', async () => {
      const device = createDevice({
        getCoordinateWithAddress: jest.fn(() => never<AddressedLocation | null>()),
      });

      const result = await createChecker(device, createClassifier()).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.READY);
      expect(result.locationData).toEqual({ coordinate: FIX });
    });

    it('should fall back to the bare coordinate when the address lookup fails', async () => {
      const device = createDevice({
        getCoordinateWithAddress: jest.fn(async (): Promise<AddressedLocation | null> => {
          throw new Error('geocoder offline');
        }),
      });

      const result = await createChecker(device, createClassifier()).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.READY);
      expect(result.locationData).toEqual({ coordinate: FIX });
    });

    it('should ignore an address lookup that returns an invalid coordinate', async () => {
      const device = createDevice({
        getCoordinateWithAddress: jest.fn(async () => ({ coordinate: { lat: 200, lng: 0 }, address: 'Nowhere' })),
      });

      const result = await createChecker(device, createClassifier()).checkLocationReadiness();

      expect(result.locationData).toEqual({ coordinate: FIX });
    });

    it('should report an error when the fix is not a valid coordinate', async () => {
      const device = createDevice({ getCoordinateOnly: jest.fn(async () => ({ lat: 123, lng: 0 })) });
      const classifier = createClassifier();

      const result = await createChecker(device, classifier).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.ERROR);
      expect(result.errorMessage).toBe(
        'Failed to check location: Location provider returned an invalid coordinate'
      );
      expect(classifier.detectAccessLevel).not.toHaveBeenCalled();
      expect(shouldGoToLocationAccess(result)).toBe(true);
    });
  });

  describe('Zone validation', () => {
    it('should be ready inside an active zone', async () => {
      const classifier = createClassifier(AccessLevel.FULL_ACCESS);

      const result = await createChecker(createDevice(), classifier).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.READY);
      expect(result.isServiceAvailable).toBe(true);
      expect(result.locationData).toEqual({ coordinate: FIX });
      expect(result.errorMessage).toBeUndefined();
      expect(isReady(result)).toBe(true);
      expect(shouldGoToLocationAccess(result)).toBe(false);
      expect(shouldGoToServiceUnavailable(result)).toBe(false);
      expect(classifier.detectAccessLevel).toHaveBeenCalledWith(FIX, expect.anything());
    });

    it('should be out of service with location data for viewing-only access', async () => {
      const result = await createChecker(
        createDevice(),
        createClassifier(AccessLevel.VIEWING_ONLY)
      ).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.OUT_OF_SERVICE);
      expect(result.isServiceAvailable).toBe(false);
      expect(result.locationData).toEqual({ coordinate: FIX });
      expect(result.errorMessage).toBe('Viewing only - outside delivery zone');
      expect(shouldGoToServiceUnavailable(result)).toBe(true);
      expect(shouldGoToLocationAccess(result)).toBe(false);
    });

    it('should be out of service with location data for no access', async () => {
      const result = await createChecker(createDevice(), createClassifier(AccessLevel.NO_ACCESS)).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.OUT_OF_SERVICE);
      expect(result.locationData).toEqual({ coordinate: FIX });
      expect(result.errorMessage).toBe('No access - outside service area');
    });

    it('should be out of service, not an error, when classification fails', async () => {
      const classifier = {
        detectAccessLevel: jest.fn(async (): Promise<AccessLevel> => {
          throw new GeofencingError(ErrorCode.CLASSIFICATION_FAILED, 'Unable to load delivery zones: offline');
        }),
      };

      const result = await createChecker(createDevice(), classifier).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.OUT_OF_SERVICE);
      expect(result.errorMessage).toBe('Zone validation failed: Unable to load delivery zones: offline');
      expect(result.locationData).toEqual({ coordinate: FIX });
    });

    it('should be out of service when classification hangs', async () => {
      let seenSignal: AbortSignal | undefined;
      const classifier = {
        detectAccessLevel: jest.fn((_coordinate: Coordinate, signal?: AbortSignal) => {
          seenSignal = signal;
          return never<AccessLevel>();
        }),
      };

      const result = await createChecker(createDevice(), classifier).checkLocationReadiness();

      expect(result.status).toBe(LocationReadinessStatus.OUT_OF_SERVICE);
      expect(result.errorMessage).toBe('Zone validation timed out');
      expect(seenSignal?.aborted).toBe(true);
    });
  });

  describe('Results', () => {
    it('should return frozen results', async () => {
      const result = await createChecker(createDevice(), createClassifier()).checkLocationReadiness();

      expect(Object.isFrozen(result)).toBe(true);
    });

    it('should give the same answer on repeated checks', async () => {
      const device = createDevice();
      const checker = createChecker(device, createClassifier());

      const first = await checker.checkLocationReadiness();
      const second = await checker.checkLocationReadiness();

      expect(second).toEqual(first);
      expect(device.getCoordinateOnly).toHaveBeenCalledTimes(2);
    });

    it('should run stages in order', async () => {
      const calls: string[] = [];
      const device = createDevice({
        isLocationServiceEnabled: jest.fn(async () => {
          calls.push('service');
          return true;
        }),
        checkPermissionStatus: jest.fn(async () => {
          calls.push('permission');
          return PermissionStatus.WHILE_IN_USE;
        }),
        getCoordinateOnly: jest.fn(async () => {
          calls.push('fix');
          return FIX;
        }),
        getCoordinateWithAddress: jest.fn(async () => {
          calls.push('address');
          return null;
        }),
      });
      const classifier = {
        detectAccessLevel: jest.fn(async () => {
          calls.push('zone');
          return AccessLevel.FULL_ACCESS;
        }),
      };

      await createChecker(device, classifier).checkLocationReadiness();

      expect(calls).toEqual(['service', 'permission', 'fix', 'address', 'zone']);
    });
  });

  describe('requestAccessAndCheck', () => {
    it('should run the full check once permission is granted', async () => {
      const device = createDevice();

      const result = await createChecker(device, createClassifier()).requestAccessAndCheck();

      expect(result.status).toBe(LocationReadinessStatus.READY);
      expect(device.requestPermission).toHaveBeenCalledTimes(1);
      expect(device.getCoordinateOnly).toHaveBeenCalledTimes(1);
    });

    it('should need setup when the user declines', async () => {
      const device = createDevice({ requestPermission: jest.fn(async () => PermissionStatus.DENIED) });

      const result = await createChecker(device, createClassifier()).requestAccessAndCheck();

      expect(result.status).toBe(LocationReadinessStatus.NEEDS_SETUP);
      expect(result.errorMessage).toBe('Location permission needs user approval');
      expect(device.getCoordinateOnly).not.toHaveBeenCalled();
    });

    it('should need setup when the prompt is blocked', async () => {
      const device = createDevice({
        requestPermission: jest.fn(async (): Promise<PermissionStatus> => {
          throw new GeofencingError(ErrorCode.PERMISSION_DENIED_FOREVER, 'Permission blocked');
        }),
      });

      const result = await createChecker(device, createClassifier()).requestAccessAndCheck();

      expect(result.status).toBe(LocationReadinessStatus.NEEDS_SETUP);
      expect(result.errorMessage).toBe('Location permission permanently denied');
    });

    it('should report an error when the prompt fails unexpectedly', async () => {
      const device = createDevice({
        requestPermission: jest.fn(async (): Promise<PermissionStatus> => {
          throw new Error('prompt crashed');
        }),
      });

      const result = await createChecker(device, createClassifier()).requestAccessAndCheck();

      expect(result.status).toBe(LocationReadinessStatus.ERROR);
      expect(result.errorMessage).toBe('Failed to request location permission: prompt crashed');
    });
  });
});
