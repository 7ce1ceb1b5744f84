/**
 * Core domain models for delivery-zone geofencing and location readiness.
 * These are plain value types; behavior lives in the geometry engine and the
 * readiness checker.
 */

/**
 * A point in decimal degrees
 */
export interface Coordinate {
  readonly lat: number;
  readonly lng: number;
}

/**
 * Shape of a delivery zone
 */
export enum ZoneType {
  POLYGON = 'polygon',
  CIRCLE = 'circle',
}

interface DeliveryZoneBase {
  readonly id: string;
  readonly name: string;
  readonly isActive: boolean;
  readonly townId?: string;
  readonly zoneNumber?: number;
  readonly priority?: number; // higher is checked first
}

/**
 * Irregular zone bounded by a ring of at least three points.
 * The ring is expected to be closed (first point repeated at the end).
 */
export interface PolygonZone extends DeliveryZoneBase {
  readonly zoneType: ZoneType.POLYGON;
  readonly boundaryCoordinates: readonly Coordinate[];
}

export interface CircleZone extends DeliveryZoneBase {
  readonly zoneType: ZoneType.CIRCLE;
  readonly center: Coordinate;
  readonly radiusKm: number;
}

export type DeliveryZone = PolygonZone | CircleZone;

/**
 * Axis-aligned bounds of a set of coordinates
 */
export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLng: number;
  maxLng: number;
}

/**
 * How much of the app a user at a given coordinate may use
 */
export enum AccessLevel {
  FULL_ACCESS = 'fullAccess',
  VIEWING_ONLY = 'viewingOnly',
  NO_ACCESS = 'noAccess',
}

/**
 * Device location permission as reported by the OS.
 * DENIED can still be prompted for; DENIED_FOREVER has to be changed in settings.
 */
export enum PermissionStatus {
  WHILE_IN_USE = 'whileInUse',
  ALWAYS = 'always',
  DENIED = 'denied',
  DENIED_FOREVER = 'deniedForever',
}

/**
 * Terminal outcome of a readiness check
 */
export enum LocationReadinessStatus {
  READY = 'ready', // GPS on, permission granted, coordinate obtained, inside a zone
  NEEDS_SETUP = 'needsSetup', // GPS off or no permission
  OUT_OF_SERVICE = 'outOfService', // outside delivery zones, or zone check failed
  ERROR = 'error', // unexpected failure
  TIMEOUT = 'timeout', // no coordinate within the budget
}

/**
 * A resolved device position, optionally with a reverse-geocoded address
 */
export interface LocationData {
  readonly coordinate: Coordinate;
  readonly address?: string;
}

export interface AddressedLocation extends LocationData {
  readonly address: string;
}

export interface LocationReadinessResult {
  readonly status: LocationReadinessStatus;
  readonly locationData?: LocationData;
  readonly errorMessage?: string;
  readonly isServiceAvailable: boolean;
}

/**
 * Outcome of matching a coordinate against the active zone list
 */
export type ZoneDetectionResult =
  | {
      isInZone: true;
      zone: DeliveryZone;
      coordinate: Coordinate;
    }
  | {
      isInZone: false;
      coordinate: Coordinate;
      closestZone: DeliveryZone | null;
      distanceKm: number | null;
      message: string;
    };

/**
 * Access level together with the facts it was derived from
 */
export interface AccessClassification {
  accessLevel: AccessLevel;
  zone?: DeliveryZone;
  closestZone?: DeliveryZone;
  distanceKm?: number;
  message: string;
}

/**
 * Structured error information
 */
export interface ErrorInfo {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}
