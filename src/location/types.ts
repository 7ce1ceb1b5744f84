/**
 * Collaborator contracts for the readiness checker
 * Device access and zone classification are injected so the checker can run
 * against any platform location API and any zone backend.
 */

import { AccessLevel, AddressedLocation, Coordinate, PermissionStatus } from '../types/domain';

/**
 * OS location services.
 * Suspending methods receive an AbortSignal that fires when the caller stops
 * waiting; implementations should stop work then, and results delivered
 * afterwards are ignored.
 */
export interface DeviceLocationProvider {
  isLocationServiceEnabled(signal?: AbortSignal): Promise<boolean>;

  checkPermissionStatus(signal?: AbortSignal): Promise<PermissionStatus>;

  /**
   * May prompt the user. Rejects with a PERMISSION_DENIED_FOREVER
   * GeofencingError when the user has blocked the prompt.
   */
  requestPermission(): Promise<PermissionStatus>;

  /**
   * Position fix without any network dependency
   */
  getCoordinateOnly(signal?: AbortSignal): Promise<Coordinate | null>;

  /**
   * Position fix enriched with a reverse-geocoded address
   */
  getCoordinateWithAddress(signal?: AbortSignal): Promise<AddressedLocation | null>;
}

/**
 * Decides how much of the app a coordinate unlocks
 */
export interface AccessLevelClassifier {
  detectAccessLevel(coordinate: Coordinate, signal?: AbortSignal): Promise<AccessLevel>;
}

/**
 * Per-stage budgets of a readiness check, in milliseconds
 */
export interface ReadinessTimeouts {
  basicChecksMs: number;
  coordinateMs: number;
  addressMs: number;
  zoneValidationMs: number;
}
