/**
 * Location readiness checker
 *
 * Turns "the app just started" into a single routing decision within a bounded
 * time: device checks, then a coordinate fix, then zone validation. Each stage
 * races its own budget and translates its expected failures into a terminal
 * status; only unanticipated faults come back as ERROR. A check never throws
 * and never retries.
 */

import {
  AccessLevel,
  Coordinate,
  LocationData,
  LocationReadinessResult,
  LocationReadinessStatus,
  PermissionStatus,
} from '../types/domain';
import { CoordinateSchema } from '../types/validation';
import { GeofencingError, ErrorCode } from '../errors';
import { config } from '../config';
import { describeError, logger } from '../config/logger';
import { AccessLevelClassifier, DeviceLocationProvider, ReadinessTimeouts } from './types';
import { createReadinessResult } from './result';
import { raceWithTimeout } from './timeout';

interface StageResult {
  passed: boolean;
  reason: string;
}

const DEFAULT_TIMEOUTS: ReadinessTimeouts = {
  basicChecksMs: config.readiness.basicChecksTimeoutMs,
  coordinateMs: config.readiness.coordinateTimeoutMs,
  addressMs: config.readiness.addressTimeoutMs,
  zoneValidationMs: config.readiness.zoneValidationTimeoutMs,
};

export function isPermissionGranted(permission: PermissionStatus): boolean {
  return permission === PermissionStatus.WHILE_IN_USE || permission === PermissionStatus.ALWAYS;
}

function describePermission(permission: PermissionStatus): StageResult {
  switch (permission) {
    case PermissionStatus.WHILE_IN_USE:
    case PermissionStatus.ALWAYS:
      return { passed: true, reason: 'All basic checks passed' };
    case PermissionStatus.DENIED:
      return { passed: false, reason: 'Location permission needs user approval' };
    case PermissionStatus.DENIED_FOREVER:
      return { passed: false, reason: 'Location permission permanently denied' };
    default:
      return { passed: false, reason: 'Unknown permission state' };
  }
}

export class LocationReadinessChecker {
  private readonly timeouts: ReadinessTimeouts;

  constructor(
    private readonly locationProvider: DeviceLocationProvider,
    private readonly classifier: AccessLevelClassifier,
    timeouts: Partial<ReadinessTimeouts> = {}
  ) {
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...timeouts };
  }

  /**
   * Check whether the app can go straight to shopping.
   * Safe to call repeatedly, e.g. again after the user returns from settings.
   */
  async checkLocationReadiness(): Promise<LocationReadinessResult> {
    try {
      const basicChecks = await this.performBasicChecks();
      if (!basicChecks.passed) {
        logger.info('Location readiness: needs setup', { reason: basicChecks.reason });
        return createReadinessResult(LocationReadinessStatus.NEEDS_SETUP, {
          errorMessage: basicChecks.reason,
        });
      }

      const locationData = await this.acquireLocation();
      if (!locationData) {
        logger.info('Location readiness: timed out acquiring a fix');
        return createReadinessResult(LocationReadinessStatus.TIMEOUT, {
          errorMessage: 'Location detection timed out',
        });
      }

      const zoneCheck = await this.validateZone(locationData.coordinate);

      if (zoneCheck.passed) {
        logger.info('Location readiness: ready', { ...locationData.coordinate });
        return createReadinessResult(LocationReadinessStatus.READY, { locationData });
      }

      logger.info('Location readiness: out of service', {
        ...locationData.coordinate,
        reason: zoneCheck.reason,
      });
      return createReadinessResult(LocationReadinessStatus.OUT_OF_SERVICE, {
        locationData,
        errorMessage: zoneCheck.reason,
      });
    } catch (error) {
      logger.error('Location readiness check failed unexpectedly', { error: describeError(error) });

      return createReadinessResult(LocationReadinessStatus.ERROR, {
        errorMessage: `Failed to check location: ${describeError(error)}`,
      });
    }
  }

  /**
   * Prompt for permission, then run a full readiness check.
   * The prompt waits on the user, so it is not bounded by a stage budget.
   */
  async requestAccessAndCheck(): Promise<LocationReadinessResult> {
    let permission: PermissionStatus;

    try {
      permission = await this.locationProvider.requestPermission();
    } catch (error) {
      if (error instanceof GeofencingError && error.code === ErrorCode.PERMISSION_DENIED_FOREVER) {
        return createReadinessResult(LocationReadinessStatus.NEEDS_SETUP, {
          errorMessage: describePermission(PermissionStatus.DENIED_FOREVER).reason,
        });
      }

      logger.error('Location permission request failed', { error: describeError(error) });
      return createReadinessResult(LocationReadinessStatus.ERROR, {
        errorMessage: `Failed to request location permission: ${describeError(error)}`,
      });
    }

    if (!isPermissionGranted(permission)) {
      return createReadinessResult(LocationReadinessStatus.NEEDS_SETUP, {
        errorMessage: describePermission(permission).reason,
      });
    }

    return this.checkLocationReadiness();
  }

  /**
   * Location service and permission, bounded so a hung permission query
   * cannot block startup
   */
  private async performBasicChecks(): Promise<StageResult> {
    try {
      const outcome = await raceWithTimeout(
        (signal) => this.doBasicChecks(signal),
        this.timeouts.basicChecksMs
      );

      if (outcome.status === 'timedOut') {
        logger.warn('GPS check timed out', { timeoutMs: this.timeouts.basicChecksMs });
        return { passed: false, reason: 'GPS check timed out' };
      }

      return outcome.value;
    } catch (error) {
      logger.warn('Basic location checks failed', { error: describeError(error) });
      return { passed: false, reason: `Basic checks failed: ${describeError(error)}` };
    }
  }

  private async doBasicChecks(signal: AbortSignal): Promise<StageResult> {
    const isEnabled = await this.locationProvider.isLocationServiceEnabled(signal);
    if (!isEnabled) {
      return { passed: false, reason: 'GPS is disabled' };
    }
    if (signal.aborted) {
      return { passed: false, reason: 'GPS check timed out' };
    }

    const permission = await this.locationProvider.checkPermissionStatus(signal);
    return describePermission(permission);
  }

  /**
   * Coordinate-only fix first; then a short, optional attempt at an address.
   * Returns null when no fix arrives in time.
   */
  private async acquireLocation(): Promise<LocationData | null> {
    let fix: Coordinate | null;

    try {
      const outcome = await raceWithTimeout(
        (signal) => this.locationProvider.getCoordinateOnly(signal),
        this.timeouts.coordinateMs
      );

      if (outcome.status === 'timedOut') {
        logger.warn('Coordinate fix timed out', { timeoutMs: this.timeouts.coordinateMs });
        return null;
      }

      fix = outcome.value;
    } catch (error) {
      logger.warn('Coordinate fix failed', { error: describeError(error) });
      return null;
    }

    if (!fix) return null;

    const coordinate = this.assertCoordinate(fix);
    const addressed = await this.resolveAddress();

    return addressed ?? { coordinate };
  }

  private async resolveAddress(): Promise<LocationData | null> {
    try {
      const outcome = await raceWithTimeout(
        (signal) => this.locationProvider.getCoordinateWithAddress(signal),
        this.timeouts.addressMs
      );

      if (outcome.status === 'timedOut') {
        logger.debug('Address lookup timed out, using bare coordinate');
        return null;
      }
      if (!outcome.value) return null;

      const parsed = CoordinateSchema.safeParse(outcome.value.coordinate);
      if (!parsed.success) {
        logger.warn('Address lookup returned an invalid coordinate, ignoring it');
        return null;
      }

      return { coordinate: parsed.data, address: outcome.value.address };
    } catch (error) {
      logger.debug('Address lookup failed, using bare coordinate', { error: describeError(error) });
      return null;
    }
  }

  private assertCoordinate(fix: Coordinate): Coordinate {
    const parsed = CoordinateSchema.safeParse(fix);

    if (!parsed.success) {
      throw new GeofencingError(ErrorCode.INVALID_COORDINATE, 'Location provider returned an invalid coordinate', {
        details: { lat: fix.lat, lng: fix.lng },
      });
    }

    return parsed.data;
  }

  /**
   * Zone check failures are reported as out of service rather than as errors
   */
  private async validateZone(coordinate: Coordinate): Promise<StageResult> {
    try {
      const outcome = await raceWithTimeout(
        (signal) => this.classifier.detectAccessLevel(coordinate, signal),
        this.timeouts.zoneValidationMs
      );

      if (outcome.status === 'timedOut') {
        logger.warn('Zone validation timed out', { timeoutMs: this.timeouts.zoneValidationMs });
        return { passed: false, reason: 'Zone validation timed out' };
      }

      switch (outcome.value) {
        case AccessLevel.FULL_ACCESS:
          return { passed: true, reason: 'Full access - delivery available' };
        case AccessLevel.VIEWING_ONLY:
          return { passed: false, reason: 'Viewing only - outside delivery zone' };
        case AccessLevel.NO_ACCESS:
          return { passed: false, reason: 'No access - outside service area' };
        default:
          return { passed: false, reason: 'Zone validation returned an unknown access level' };
      }
    } catch (error) {
      logger.warn('Zone validation failed', { error: describeError(error) });
      return { passed: false, reason: `Zone validation failed: ${describeError(error)}` };
    }
  }
}
