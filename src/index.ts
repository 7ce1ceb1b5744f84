/**
 * Main entry point for delivery-zone geofencing and location readiness
 */

export { LocationReadinessChecker, isPermissionGranted } from './location/readiness';
export {
  createReadinessResult,
  isReady,
  shouldGoToLocationAccess,
  shouldGoToServiceUnavailable,
} from './location/result';
export { raceWithTimeout } from './location/timeout';
export type { TimedOutcome } from './location/timeout';
export type { DeviceLocationProvider, AccessLevelClassifier, ReadinessTimeouts } from './location/types';
export {
  haversineDistance,
  containsPoint,
  distanceToZone,
  findClosestZone,
  validatePolygon,
  validateCircle,
  validateZone,
  boundingBox,
  isInBoundingBox,
  coordinatesEqual,
} from './geometry';
export { ZoneRepository, OUTSIDE_ZONES_MESSAGE } from './zones/repository';
export { ZoneAccessLevelClassifier } from './zones/classifier';
export { StaticZoneSource, HttpZoneSource } from './zones/sources';
export type { ZoneSource, HttpZoneSourceOptions } from './zones/sources';
export type {
  Coordinate,
  DeliveryZone,
  PolygonZone,
  CircleZone,
  BoundingBox,
  LocationData,
  AddressedLocation,
  LocationReadinessResult,
  ZoneDetectionResult,
  AccessClassification,
  ErrorInfo,
} from './types/domain';
export { ZoneType, AccessLevel, PermissionStatus, LocationReadinessStatus } from './types/domain';
export { GeofencingError, ErrorCode } from './errors';
export { config } from './config';
export { logger } from './config/logger';
