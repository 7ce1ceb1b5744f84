/**
 * Example usage of the readiness checker
 * Wires a simulated device and an in-memory zone list the way an app shell would
 */

import {
  LocationReadinessChecker,
  ZoneAccessLevelClassifier,
  ZoneRepository,
  StaticZoneSource,
  DeviceLocationProvider,
  DeliveryZone,
  LocationReadinessResult,
  PermissionStatus,
  ZoneType,
  shouldGoToLocationAccess,
  shouldGoToServiceUnavailable,
} from './index';

const zones: DeliveryZone[] = [
  {
    id: 'zone-main-bazaar',
    name: 'Main Bazaar',
    zoneType: ZoneType.CIRCLE,
    center: { lat: 25.5138, lng: 90.2172 },
    radiusKm: 5,
    isActive: true,
    zoneNumber: 1,
  },
  {
    id: 'zone-old-town',
    name: 'Old Town',
    zoneType: ZoneType.POLYGON,
    boundaryCoordinates: [
      { lat: 25.53, lng: 90.19 },
      { lat: 25.53, lng: 90.2 },
      { lat: 25.54, lng: 90.2 },
      { lat: 25.54, lng: 90.19 },
      { lat: 25.53, lng: 90.19 },
    ],
    isActive: true,
    zoneNumber: 2,
  },
];

// Stands in for the platform location API
const simulatedDevice: DeviceLocationProvider = {
  isLocationServiceEnabled: async () => true,
  checkPermissionStatus: async () => PermissionStatus.WHILE_IN_USE,
  requestPermission: async () => PermissionStatus.WHILE_IN_USE,
  getCoordinateOnly: async () => ({ lat: 25.52, lng: 90.22 }),
  getCoordinateWithAddress: async () => ({
    coordinate: { lat: 25.52, lng: 90.22 },
    address: 'Main Bazaar Road',
  }),
};

async function exampleUsage(device: DeviceLocationProvider = simulatedDevice): Promise<LocationReadinessResult> {
  const repository = new ZoneRepository(new StaticZoneSource(zones));
  const checker = new LocationReadinessChecker(device, new ZoneAccessLevelClassifier(repository));

  const result = await checker.checkLocationReadiness();

  console.log(`Status: ${result.status}`);
  console.log(`Service available: ${result.isServiceAvailable}`);
  if (result.locationData) {
    const { coordinate, address } = result.locationData;
    console.log(`Location: ${coordinate.lat}, ${coordinate.lng}${address ? ` (${address})` : ''}`);
  }
  if (result.errorMessage) {
    console.log(`Reason: ${result.errorMessage}`);
  }

  if (shouldGoToLocationAccess(result)) {
    console.log('Next: location access screen');
  } else if (shouldGoToServiceUnavailable(result)) {
    console.log('Next: service unavailable screen');
  } else {
    console.log('Next: home');
  }

  return result;
}

// Run the example
if (require.main === module) {
  exampleUsage().catch(console.error);
}

export { exampleUsage };
